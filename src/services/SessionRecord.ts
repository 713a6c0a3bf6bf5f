import { CUSTOMER_FIELDS, CustomerData, CustomerField } from '../types/customer';
import { QuoteData } from '../types/quote';
import {
  ConversationTurn,
  FormCompletion,
  PaymentData,
  PolicyData,
  Session,
  SessionState,
} from '../types/session';

// Every write to a session record goes through the helpers below.

export const emptyFormCompletion = (): FormCompletion => ({
  personal_details: { completed: false, completionPercentage: 0 },
  insurance_requirements: { completed: false, completionPercentage: 0 },
  rider_selection: { completed: false, completionPercentage: 0 },
  payment_details: { completed: false, completionPercentage: 0 },
});

export const createSessionRecord = (sessionId: string, now: Date = new Date()): Session => ({
  sessionId,
  createdAt: now,
  updatedAt: now,
  currentState: SessionState.ONBOARDING,
  customerData: {},
  customerExtras: {},
  selectedVariant: null,
  quoteData: {},
  policyData: {},
  paymentData: {},
  conversationHistory: [],
  stateTransitions: [],
  formCompletion: emptyFormCompletion(),
});

// updatedAt never moves backwards, even if the clock does.
export const touch = (session: Session, now: Date = new Date()): void => {
  if (now.getTime() > session.updatedAt.getTime()) {
    session.updatedAt = now;
  }
};

const setField = <K extends CustomerField>(
  target: CustomerData,
  key: K,
  value: CustomerData[K]
): void => {
  target[key] = value;
};

/**
 * Additive merge: only non-null values are written, keys already present
 * and absent from `updates` are left alone. Returns the keys written.
 */
export const mergeCustomerData = (
  session: Session,
  updates: CustomerData,
  extras: Record<string, unknown> = {}
): CustomerField[] => {
  const written: CustomerField[] = [];
  for (const key of CUSTOMER_FIELDS) {
    const value = updates[key];
    if (value === undefined || value === null) {
      continue;
    }
    setField(session.customerData, key, value);
    written.push(key);
  }
  for (const [key, value] of Object.entries(extras)) {
    if (value !== undefined && value !== null) {
      session.customerExtras[key] = value;
    }
  }
  return written;
};

export const appendTurn = (session: Session, turn: ConversationTurn): void => {
  session.conversationHistory.push(turn);
  touch(session, turn.timestamp);
};

export const setQuoteData = (session: Session, quoteData: QuoteData): void => {
  session.quoteData = quoteData;
  if (quoteData.best) {
    session.selectedVariant = quoteData.best.variant;
  }
};

export const setPaymentData = (session: Session, paymentData: PaymentData): void => {
  session.paymentData = { ...session.paymentData, ...paymentData };
};

export const setPolicyData = (session: Session, policyData: PolicyData): void => {
  session.policyData = { ...session.policyData, ...policyData };
};

/**
 * Clears everything collected so far and returns the session to onboarding.
 * The audit trail survives and records the reset itself.
 */
export const resetSession = (session: Session, now: Date = new Date()): void => {
  session.stateTransitions.push({
    timestamp: now,
    fromState: session.currentState,
    toState: SessionState.ONBOARDING,
    context: { trigger: 'reset' },
  });
  session.currentState = SessionState.ONBOARDING;
  session.customerData = {};
  session.customerExtras = {};
  session.selectedVariant = null;
  session.quoteData = {};
  session.policyData = {};
  session.paymentData = {};
  session.conversationHistory = [];
  session.formCompletion = emptyFormCompletion();
  touch(session, now);
};
