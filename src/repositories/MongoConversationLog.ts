import ConversationLogModel from '../models/ConversationLog';
import { ConversationLogRecord, ConversationLogRepository } from './types';

export class MongoConversationLog implements ConversationLogRepository {
  async append(record: ConversationLogRecord): Promise<void> {
    await ConversationLogModel.create({
      ...record,
      timestamp: new Date(record.timestamp),
    });
  }

  async listBySession(sessionId: string): Promise<ConversationLogRecord[]> {
    const documents = await ConversationLogModel.find({ sessionId })
      .sort({ timestamp: 1, _id: 1 })
      .lean()
      .exec();

    return documents.map((document) => ({
      timestamp: document.timestamp.toISOString(),
      sessionId: document.sessionId,
      userMessage: document.userMessage,
      rawDecision: document.rawDecision,
      decision: document.decision,
      operationResults: document.operationResults,
      finalReply: document.finalReply,
      storeUpdate: document.storeUpdate,
    }));
  }
}
