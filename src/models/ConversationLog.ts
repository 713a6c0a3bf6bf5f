import mongoose from 'mongoose';
import { Decision, StoreUpdate } from '../types/decision';
import { OperationResult } from '../types/operations';

export interface ConversationLogDocument {
  sessionId: string;
  timestamp: Date;
  userMessage: string;
  rawDecision: string;
  decision: Decision | null;
  operationResults: OperationResult[];
  finalReply: string;
  storeUpdate: StoreUpdate;
}

const ConversationLogSchema = new mongoose.Schema<ConversationLogDocument>(
  {
    sessionId: { type: String, required: true, index: true },
    timestamp: { type: Date, required: true },
    userMessage: { type: String, default: '' },
    rawDecision: { type: String, default: '' },
    decision: { type: mongoose.Schema.Types.Mixed, default: null },
    operationResults: { type: [mongoose.Schema.Types.Mixed], default: [] },
    finalReply: { type: String, default: '' },
    storeUpdate: { type: mongoose.Schema.Types.Mixed, default: {} },
  },
  { collection: 'conversation_logs', minimize: false }
);

export default mongoose.model<ConversationLogDocument>('ConversationLog', ConversationLogSchema);
