export const CONVERSATION_MODES = ['informational', 'conversational', 'onboarding'] as const;

export type ConversationMode = (typeof CONVERSATION_MODES)[number];

export interface StoreUpdate {
  personalDetails?: Record<string, unknown>;
  quoteDetails?: Record<string, unknown>;
}

// An operation as the model asked for it, before validation.
export interface OperationCall {
  name: string;
  params: Record<string, unknown>;
}

export interface Decision {
  mode: ConversationMode;
  reply: string;
  nextQuestion: string | null;
  extracted: Record<string, unknown>;
  storeUpdate: StoreUpdate;
  operations: OperationCall[];
  reasoning: string;
  done: boolean;
}

export interface DecisionOutcome {
  decision: Decision;
  raw: string;
  parsed: boolean;
}

export const fallbackDecision = (raw: string): Decision => ({
  mode: 'conversational',
  reply: raw,
  nextQuestion: null,
  extracted: {},
  storeUpdate: {},
  operations: [],
  reasoning: 'parse_fail',
  done: false,
});
