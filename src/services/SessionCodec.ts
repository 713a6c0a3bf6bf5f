import { z } from 'zod';
import { CustomerData, PaymentFrequency, PaymentMethod } from '../types/customer';
import { Quote, QuoteData, Variant } from '../types/quote';
import { Session, SessionState } from '../types/session';
import { SessionDataCorruptError } from '../utils/errors';

const timestamp = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const genderSchema = z.enum(['male', 'female', 'other']);
const healthSchema = z.enum(['good', 'minor', 'major']);
const riskSchema = z.enum(['low', 'low_medium', 'medium', 'high']);

const customerDataSchema: z.ZodType<CustomerData> = z.object({
  fullName: z.string().nullish(),
  dateOfBirth: z.string().nullish(),
  age: z.number().nullish(),
  gender: genderSchema.nullish(),
  occupation: z.string().nullish(),
  smoker: z.boolean().nullish(),
  mobileNumber: z.string().nullish(),
  email: z.string().nullish(),
  pinCode: z.string().nullish(),
  annualIncome: z.number().nullish(),
  healthCondition: healthSchema.nullish(),
  familyMedicalHistory: z.boolean().nullish(),
  coverageAmount: z.number().nullish(),
  policyTerm: z.number().nullish(),
  premiumPayingTerm: z.number().nullish(),
  premiumFrequency: z.nativeEnum(PaymentFrequency).nullish(),
  ridersInterest: z.array(z.string()).nullish(),
  paymentMethod: z.nativeEnum(PaymentMethod).nullish(),
  eligibilityStatus: z.string().nullish(),
  riskProfile: riskSchema.nullish(),
  existingCustomer: z.boolean().nullish(),
});

const appliedDiscountSchema = z.object({
  name: z.string(),
  percentage: z.number(),
  amount: z.number(),
});

const modalPremiumsSchema = z.object({
  [PaymentFrequency.MONTHLY]: z.number(),
  [PaymentFrequency.QUARTERLY]: z.number(),
  [PaymentFrequency.HALF_YEARLY]: z.number(),
  [PaymentFrequency.YEARLY]: z.number(),
});

export const quoteSchema: z.ZodType<Quote> = z.object({
  variant: z.nativeEnum(Variant),
  annualPremium: z.number(),
  modalPremiums: modalPremiumsSchema,
  sumAssured: z.number(),
  policyTerm: z.number(),
  premiumPayingTerm: z.number(),
  totalPremiumPayable: z.number(),
  features: z.array(z.string()),
  benefits: z.object({
    deathBenefit: z.number(),
    terminalIllness: z.number(),
    accidentalDeath: z.number().optional(),
    maturityBenefit: z.number().optional(),
  }),
  discountsApplied: z.object({
    online_purchase: appliedDiscountSchema.optional(),
    high_sum_assured: appliedDiscountSchema.optional(),
    non_tobacco: appliedDiscountSchema.optional(),
    loyalty: appliedDiscountSchema.optional(),
  }),
  discountAmount: z.number(),
  recommended: z.boolean(),
  basePremium: z.number(),
  adjustedPremium: z.number(),
  calculationBreakdown: z.object({
    variant: z.nativeEnum(Variant),
    ageBand: z.string(),
    gender: genderSchema,
    tobaccoUser: z.boolean(),
    occupationCategory: z.string(),
    healthCondition: healthSchema,
    policyTerm: z.number(),
    sumAssuredBand: z.string(),
    paymentFrequency: z.nativeEnum(PaymentFrequency),
    ratePerThousand: z.number(),
    factors: z.object({
      policyTerm: z.number(),
      tobacco: z.number(),
      occupation: z.number(),
      health: z.number(),
      sumAssured: z.number(),
      paymentFrequency: z.number(),
    }),
  }),
});

const quoteDataSchema: z.ZodType<QuoteData> = z.object({
  quotes: z.array(quoteSchema).optional(),
  best: quoteSchema.optional(),
  inputs: z
    .object({
      age: z.number(),
      gender: genderSchema,
      coverageAmount: z.number(),
      policyTerm: z.number(),
      premiumPayingTerm: z.number(),
      smoker: z.boolean(),
    })
    .optional(),
  generatedAt: z.string().optional(),
});

const progressSchema = z.object({
  completed: z.boolean(),
  completionPercentage: z.number().min(0).max(100),
});

const sessionSchema = z.object({
  sessionId: z.string().min(1),
  createdAt: timestamp,
  updatedAt: timestamp,
  currentState: z.nativeEnum(SessionState),
  customerData: customerDataSchema,
  customerExtras: z.record(z.unknown()),
  selectedVariant: z.nativeEnum(Variant).nullable(),
  quoteData: quoteDataSchema,
  policyData: z.object({
    policyNumber: z.string().optional(),
    variant: z.nativeEnum(Variant).optional(),
    paymentId: z.string().optional(),
    issuedAt: z.string().optional(),
  }),
  paymentData: z.object({
    paymentId: z.string().optional(),
    transactionId: z.string().optional(),
    paymentUrl: z.string().optional(),
    amount: z.number().optional(),
    currency: z.string().optional(),
    paymentMethod: z.nativeEnum(PaymentMethod).optional(),
    status: z.string().optional(),
    failureReason: z.string().optional(),
    updatedAt: z.string().optional(),
  }),
  conversationHistory: z.array(
    z.object({
      timestamp,
      userMessage: z.string(),
      botResponse: z.string(),
      state: z.nativeEnum(SessionState),
      actionsTaken: z.array(z.string()),
      dataCollected: z.record(z.unknown()),
    })
  ),
  stateTransitions: z.array(
    z.object({
      timestamp,
      fromState: z.nativeEnum(SessionState),
      toState: z.nativeEnum(SessionState),
      context: z.record(z.unknown()),
    })
  ),
  formCompletion: z.object({
    personal_details: progressSchema,
    insurance_requirements: progressSchema,
    rider_selection: progressSchema,
    payment_details: progressSchema,
  }),
});

export type SerializedSession = z.input<typeof sessionSchema>;

export const serializeSession = (session: Session): SerializedSession => ({
  ...session,
  createdAt: session.createdAt.toISOString(),
  updatedAt: session.updatedAt.toISOString(),
  conversationHistory: session.conversationHistory.map((turn) => ({
    ...turn,
    timestamp: turn.timestamp.toISOString(),
  })),
  stateTransitions: session.stateTransitions.map((entry) => ({
    ...entry,
    timestamp: entry.timestamp.toISOString(),
  })),
});

/**
 * Decodes a stored record. Anything that does not match the session shape
 * raises SessionDataCorruptError; nothing is patched up on the way in.
 */
export const deserializeSession = (raw: unknown, sessionId: string): Session => {
  const result = sessionSchema.safeParse(raw);
  if (!result.success) {
    const reason = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new SessionDataCorruptError(sessionId, reason);
  }
  if (result.data.sessionId !== sessionId) {
    throw new SessionDataCorruptError(
      sessionId,
      `record belongs to session ${result.data.sessionId}`
    );
  }
  return result.data;
};
