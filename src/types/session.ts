import { CustomerData, PaymentMethod } from './customer';
import { QuoteData, Variant } from './quote';

export enum SessionState {
  ONBOARDING = 'onboarding',
  ELIGIBILITY_CHECK = 'eligibility_check',
  PRODUCT_SELECTION = 'product_selection',
  QUOTE_GENERATION = 'quote_generation',
  ADDON_RIDERS = 'addon_riders',
  PAYMENT_INITIATED = 'payment_initiated',
  DOCUMENT_COLLECTION = 'document_collection',
  POLICY_ISSUED = 'policy_issued',
}

export type FormGroup =
  | 'personal_details'
  | 'insurance_requirements'
  | 'rider_selection'
  | 'payment_details';

export const FORM_GROUPS: readonly FormGroup[] = [
  'personal_details',
  'insurance_requirements',
  'rider_selection',
  'payment_details',
];

export interface FormProgress {
  completed: boolean;
  completionPercentage: number;
}

export type FormCompletion = Record<FormGroup, FormProgress>;

export interface ConversationTurn {
  timestamp: Date;
  userMessage: string;
  botResponse: string;
  state: SessionState;
  actionsTaken: string[];
  dataCollected: Record<string, unknown>;
}

export interface StateTransition {
  timestamp: Date;
  fromState: SessionState;
  toState: SessionState;
  context: Record<string, unknown>;
}

export interface PaymentData {
  paymentId?: string;
  transactionId?: string;
  paymentUrl?: string;
  amount?: number;
  currency?: string;
  paymentMethod?: PaymentMethod;
  status?: string;
  failureReason?: string;
  updatedAt?: string;
}

export interface PolicyData {
  policyNumber?: string;
  variant?: Variant;
  paymentId?: string;
  issuedAt?: string;
}

export interface Session {
  sessionId: string;
  createdAt: Date;
  updatedAt: Date;
  currentState: SessionState;
  customerData: CustomerData;
  customerExtras: Record<string, unknown>;
  selectedVariant: Variant | null;
  quoteData: QuoteData;
  policyData: PolicyData;
  paymentData: PaymentData;
  conversationHistory: ConversationTurn[];
  stateTransitions: StateTransition[];
  formCompletion: FormCompletion;
}

export interface DataCollectionStatus {
  collected: string[];
  missing: string[];
  completionPercentage: number;
  nextRequiredField: string | null;
}
