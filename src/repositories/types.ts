import { Decision, StoreUpdate } from '../types/decision';
import { OperationResult } from '../types/operations';
import { Session } from '../types/session';

export interface SessionRepository {
  load(sessionId: string): Promise<Session | null>;
  save(session: Session): Promise<void>;
  delete(sessionId: string): Promise<void>;
}

// One audit record per handled turn.
export interface ConversationLogRecord {
  timestamp: string;
  sessionId: string;
  userMessage: string;
  rawDecision: string;
  decision: Decision | null;
  operationResults: OperationResult[];
  finalReply: string;
  storeUpdate: StoreUpdate;
}

export interface ConversationLogRepository {
  append(record: ConversationLogRecord): Promise<void>;
  listBySession(sessionId: string): Promise<ConversationLogRecord[]>;
}
