import { Gender, HealthCondition, PaymentFrequency, RiskProfile } from './customer';

export enum Variant {
  LIFE_SHIELD = 'Life Shield',
  LIFE_SHIELD_PLUS = 'Life Shield Plus',
  LIFE_SHIELD_ROP = 'Life Shield ROP',
}

// Declaration order doubles as the tie-break order when premiums are equal.
export const VARIANTS: readonly Variant[] = [
  Variant.LIFE_SHIELD,
  Variant.LIFE_SHIELD_PLUS,
  Variant.LIFE_SHIELD_ROP,
];

export interface QuoteProfile {
  age?: number;
  gender?: Gender;
  tobaccoUser?: boolean;
  occupation?: string;
  healthCondition?: HealthCondition;
  paymentFrequency?: PaymentFrequency;
  annualIncome?: number;
  riskProfile?: RiskProfile;
  purchaseChannel?: 'online' | 'offline';
  existingCustomer?: boolean;
}

export type DiscountKey = 'online_purchase' | 'high_sum_assured' | 'non_tobacco' | 'loyalty';

export interface AppliedDiscount {
  name: string;
  percentage: number;
  amount: number;
}

export interface QuoteBenefits {
  deathBenefit: number;
  terminalIllness: number;
  accidentalDeath?: number;
  maturityBenefit?: number;
}

export interface CalculationBreakdown {
  variant: Variant;
  ageBand: string;
  gender: Gender;
  tobaccoUser: boolean;
  occupationCategory: string;
  healthCondition: HealthCondition;
  policyTerm: number;
  sumAssuredBand: string;
  paymentFrequency: PaymentFrequency;
  ratePerThousand: number;
  factors: {
    policyTerm: number;
    tobacco: number;
    occupation: number;
    health: number;
    sumAssured: number;
    paymentFrequency: number;
  };
}

export type ModalPremiums = Record<PaymentFrequency, number>;

export interface Quote {
  readonly variant: Variant;
  readonly annualPremium: number;
  readonly modalPremiums: Readonly<ModalPremiums>;
  readonly sumAssured: number;
  readonly policyTerm: number;
  readonly premiumPayingTerm: number;
  readonly totalPremiumPayable: number;
  readonly features: readonly string[];
  readonly benefits: Readonly<QuoteBenefits>;
  readonly discountsApplied: Readonly<Partial<Record<DiscountKey, AppliedDiscount>>>;
  readonly discountAmount: number;
  readonly recommended: boolean;
  readonly basePremium: number;
  readonly adjustedPremium: number;
  readonly calculationBreakdown: Readonly<CalculationBreakdown>;
}

export interface QuoteInputs {
  age: number;
  gender: Gender;
  coverageAmount: number;
  policyTerm: number;
  premiumPayingTerm: number;
  smoker: boolean;
}

export interface QuoteData {
  quotes?: Quote[];
  best?: Quote;
  inputs?: QuoteInputs;
  generatedAt?: string;
}
