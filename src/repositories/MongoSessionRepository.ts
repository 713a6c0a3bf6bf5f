import SessionModel from '../models/Session';
import { deserializeSession, serializeSession } from '../services/SessionCodec';
import { Session } from '../types/session';
import { logger } from '../utils/logger';
import { SessionRepository } from './types';

export class MongoSessionRepository implements SessionRepository {
  async load(sessionId: string): Promise<Session | null> {
    const document = await SessionModel.findOne({ sessionId }).lean().exec();
    if (!document) {
      return null;
    }
    return deserializeSession(document.payload, sessionId);
  }

  async save(session: Session): Promise<void> {
    await SessionModel.updateOne(
      { sessionId: session.sessionId },
      {
        $set: {
          currentState: session.currentState,
          payload: serializeSession(session),
          lastActivityAt: session.updatedAt,
        },
      },
      { upsert: true }
    ).exec();
    logger.debug('Session persisted', { sessionId: session.sessionId });
  }

  async delete(sessionId: string): Promise<void> {
    await SessionModel.deleteOne({ sessionId }).exec();
  }
}
