import { z } from 'zod';
import { toBoolean, toInteger, toNumber, toText } from '../utils/coerce';
import { Quote, QuoteInputs } from './quote';
import { PaymentStatus } from './payment';
import { SessionState } from './session';

const optionalNumber = z.preprocess(toNumber, z.number().optional());
const optionalInteger = z.preprocess(toInteger, z.number().int().optional());
const optionalBoolean = z.preprocess(toBoolean, z.boolean().optional());
const optionalText = z.preprocess(toText, z.string().optional());

export const premiumCalculationParams = z.object({
  age: optionalInteger,
  gender: optionalText,
  coverage_amount: optionalNumber,
  policy_term: optionalInteger,
  premium_paying_term: optionalInteger,
  smoker: optionalBoolean,
  occupation: optionalText,
  payment_frequency: optionalText,
});

export const eligibilityCheckParams = z.object({
  age: optionalInteger,
  smoker: optionalBoolean,
  annual_income: optionalNumber,
  occupation: optionalText,
  health_condition: optionalText,
  family_medical_history: optionalBoolean,
});

export const paymentInitiationParams = z.object({
  amount: optionalNumber,
  payment_method: optionalText,
  return_url: optionalText,
});

export const stateTransitionParams = z.object({
  target_state: z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.nativeEnum(SessionState)
  ),
  context: z.record(z.unknown()).default({}),
});

const emptyParams = z.object({}).passthrough();

export const operationSchema = z.discriminatedUnion('name', [
  z.object({ name: z.literal('premium_calculation'), params: premiumCalculationParams }),
  z.object({ name: z.literal('eligibility_check'), params: eligibilityCheckParams }),
  z.object({ name: z.literal('plan_comparison'), params: emptyParams }),
  z.object({ name: z.literal('policy_documents'), params: emptyParams }),
  z.object({ name: z.literal('payment_initiation'), params: paymentInitiationParams }),
  z.object({ name: z.literal('state_transition'), params: stateTransitionParams }),
]);

export type Operation = z.infer<typeof operationSchema>;
export type OperationName = Operation['name'];

export const OPERATION_NAMES = [
  'premium_calculation',
  'eligibility_check',
  'plan_comparison',
  'policy_documents',
  'payment_initiation',
  'state_transition',
] as const satisfies readonly OperationName[];

export interface EligibilityResult {
  eligible: boolean;
  status: string;
  riskProfile: 'low' | 'low_medium' | 'medium' | 'high' | null;
  riskFactors: string[];
  reason: string | null;
  conditions?: string[];
  benefits?: string[];
}

export interface PlanSummary {
  variant: string;
  description: string;
  pros: string[];
  cons: string[];
  annualPremium: number | null;
}

export type OperationOutput =
  | {
      kind: 'premium_calculation';
      quotes: Quote[];
      best: Quote;
      inputs: QuoteInputs;
      // Underwriting limits the cover breaks; the quotes are still priced.
      warnings: string[];
    }
  | { kind: 'eligibility_check'; eligibility: EligibilityResult }
  | { kind: 'plan_comparison'; plans: PlanSummary[] }
  | { kind: 'policy_documents'; documents: string[]; requiredKycDocuments: string[] }
  | {
      kind: 'payment_initiation';
      paymentId: string;
      transactionId: string;
      paymentUrl: string;
      amount: number;
      status: PaymentStatus;
    }
  | { kind: 'state_transition'; fromState: SessionState; toState: SessionState };

export type OperationResult =
  | { name: string; params: Record<string, unknown>; success: true; output: OperationOutput }
  | { name: string; params: Record<string, unknown>; success: false; error: string };
