export type Gender = 'male' | 'female' | 'other';

export type HealthCondition = 'good' | 'minor' | 'major';

export type RiskProfile = 'low' | 'low_medium' | 'medium' | 'high';

export enum PaymentFrequency {
  MONTHLY = 'monthly',
  QUARTERLY = 'quarterly',
  HALF_YEARLY = 'half_yearly',
  YEARLY = 'yearly',
}

export enum PaymentMethod {
  CREDIT_CARD = 'credit_card',
  DEBIT_CARD = 'debit_card',
  NET_BANKING = 'net_banking',
  UPI = 'upi',
  WALLET = 'wallet',
}

/**
 * Facts collected about the customer across turns. Every slot is optional
 * and nullable; a slot counts as collected once it holds a non-null value.
 */
export interface CustomerData {
  fullName?: string | null;
  dateOfBirth?: string | null;
  age?: number | null;
  gender?: Gender | null;
  occupation?: string | null;
  smoker?: boolean | null;
  mobileNumber?: string | null;
  email?: string | null;
  pinCode?: string | null;
  annualIncome?: number | null;
  healthCondition?: HealthCondition | null;
  familyMedicalHistory?: boolean | null;
  coverageAmount?: number | null;
  policyTerm?: number | null;
  premiumPayingTerm?: number | null;
  premiumFrequency?: PaymentFrequency | null;
  ridersInterest?: string[] | null;
  paymentMethod?: PaymentMethod | null;
  eligibilityStatus?: string | null;
  riskProfile?: RiskProfile | null;
  existingCustomer?: boolean | null;
}

export type CustomerField = keyof CustomerData;

export const CUSTOMER_FIELDS: readonly CustomerField[] = [
  'fullName',
  'dateOfBirth',
  'age',
  'gender',
  'occupation',
  'smoker',
  'mobileNumber',
  'email',
  'pinCode',
  'annualIncome',
  'healthCondition',
  'familyMedicalHistory',
  'coverageAmount',
  'policyTerm',
  'premiumPayingTerm',
  'premiumFrequency',
  'ridersInterest',
  'paymentMethod',
  'eligibilityStatus',
  'riskProfile',
  'existingCustomer',
];
