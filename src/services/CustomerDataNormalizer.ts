import { differenceInYears, format, isValid, parse } from 'date-fns';
import {
  CustomerData,
  CustomerField,
  Gender,
  HealthCondition,
  PaymentFrequency,
  PaymentMethod,
} from '../types/customer';
import { StoreUpdate } from '../types/decision';
import { isRecord, toBoolean, toInteger, toNumber, toText } from '../utils/coerce';
import { logger } from '../utils/logger';

export const DATE_OF_BIRTH_FORMATS = [
  'yyyy-MM-dd',
  'dd-MM-yyyy',
  'dd/MM/yyyy',
  'd MMM yyyy',
  'd MMMM yyyy',
] as const;

// Keys are compared lowercased with separators removed, so `full_name`,
// `fullName` and `Full Name` all land on the same slot.
const ALIAS_TABLE: Record<string, CustomerField> = {
  fullname: 'fullName',
  name: 'fullName',
  dateofbirth: 'dateOfBirth',
  dob: 'dateOfBirth',
  age: 'age',
  gender: 'gender',
  occupation: 'occupation',
  profession: 'occupation',
  smoker: 'smoker',
  tobaccouser: 'smoker',
  tobacco: 'smoker',
  mobilenumber: 'mobileNumber',
  mobile: 'mobileNumber',
  phone: 'mobileNumber',
  phonenumber: 'mobileNumber',
  email: 'email',
  pincode: 'pinCode',
  postalcode: 'pinCode',
  annualincome: 'annualIncome',
  income: 'annualIncome',
  healthcondition: 'healthCondition',
  familymedicalhistory: 'familyMedicalHistory',
  coverageamount: 'coverageAmount',
  coverage: 'coverageAmount',
  sumassured: 'coverageAmount',
  policyterm: 'policyTerm',
  policytermyears: 'policyTerm',
  premiumpayingterm: 'premiumPayingTerm',
  premiumpayingtermyears: 'premiumPayingTerm',
  premiumfrequency: 'premiumFrequency',
  paymentfrequency: 'premiumFrequency',
  frequency: 'premiumFrequency',
  ridersinterest: 'ridersInterest',
  riders: 'ridersInterest',
  paymentmethod: 'paymentMethod',
  existingcustomer: 'existingCustomer',
};

const FIELD_ALIASES = new Map(Object.entries(ALIAS_TABLE));

const compactKey = (key: string): string => key.toLowerCase().replace(/[^a-z0-9]/g, '');

export const normalizeGender = (value: unknown): Gender | undefined => {
  const text = toText(value)?.toLowerCase();
  if (!text) {
    return undefined;
  }
  if (['m', 'male', 'man'].includes(text)) {
    return 'male';
  }
  if (['f', 'female', 'woman'].includes(text)) {
    return 'female';
  }
  if (['other', 'non-binary', 'nonbinary'].includes(text)) {
    return 'other';
  }
  return undefined;
};

export const normalizeSmoker = (value: unknown): boolean | undefined => {
  const flag = toBoolean(value);
  if (flag !== undefined) {
    return flag;
  }
  const text = toText(value)?.toLowerCase();
  if (!text) {
    return undefined;
  }
  if (/\b(non|never|don'?t|do not)\b/.test(text)) {
    return false;
  }
  if (/\b(smoker|smoke|smokes|tobacco)\b/.test(text)) {
    return true;
  }
  return undefined;
};

const normalizeHealthCondition = (value: unknown): HealthCondition | undefined => {
  const text = toText(value)?.toLowerCase();
  if (!text) {
    return undefined;
  }
  if (['good', 'healthy', 'excellent', 'none'].includes(text)) {
    return 'good';
  }
  if (text === 'minor' || text === 'major') {
    return text;
  }
  return undefined;
};

export const normalizeFrequency = (value: unknown): PaymentFrequency | undefined => {
  const text = toText(value)?.toLowerCase().replace(/[\s-]+/g, '_');
  if (!text) {
    return undefined;
  }
  if (text.startsWith('month')) {
    return PaymentFrequency.MONTHLY;
  }
  if (text.startsWith('quarter')) {
    return PaymentFrequency.QUARTERLY;
  }
  if (text.startsWith('half') || text.startsWith('semi')) {
    return PaymentFrequency.HALF_YEARLY;
  }
  if (text.startsWith('year') || text.startsWith('annual')) {
    return PaymentFrequency.YEARLY;
  }
  return undefined;
};

export const normalizePaymentMethod = (value: unknown): PaymentMethod | undefined => {
  const text = toText(value)?.toLowerCase();
  if (!text) {
    return undefined;
  }
  if (text.includes('upi')) {
    return PaymentMethod.UPI;
  }
  if (text.includes('debit')) {
    return PaymentMethod.DEBIT_CARD;
  }
  if (text.includes('net') && text.includes('bank')) {
    return PaymentMethod.NET_BANKING;
  }
  if (text.includes('wallet') || text.includes('paytm')) {
    return PaymentMethod.WALLET;
  }
  if (text.includes('credit') || text.includes('card')) {
    return PaymentMethod.CREDIT_CARD;
  }
  return undefined;
};

const normalizeRiders = (value: unknown): string[] | undefined => {
  if (Array.isArray(value)) {
    const riders = value.map(toText).filter((rider): rider is string => rider !== undefined);
    return riders.length > 0 ? riders : undefined;
  }
  const text = toText(value);
  return text ? text.split(',').map((rider) => rider.trim()).filter(Boolean) : undefined;
};

export interface NormalizedExtraction {
  customerData: CustomerData;
  extras: Record<string, unknown>;
}

/**
 * Turns the loosely typed fields a model extracts into typed customer data.
 * Values that cannot be read for their slot are dropped; keys that match no
 * slot are kept aside as extras.
 */
export class CustomerDataNormalizer {
  constructor(private readonly now: () => Date = () => new Date()) {}

  parseDateOfBirth(value: unknown): Date | null {
    const text = toText(value);
    if (!text) {
      return null;
    }
    for (const pattern of DATE_OF_BIRTH_FORMATS) {
      const parsed = parse(text, pattern, this.now());
      if (isValid(parsed)) {
        return parsed;
      }
    }
    return null;
  }

  normalizeExtracted(extracted: Record<string, unknown>): NormalizedExtraction {
    return this.normalize(extracted, true);
  }

  // The store-update mirror only ever carries known slots.
  normalizeStoreUpdate(storeUpdate: StoreUpdate): CustomerData {
    const merged: Record<string, unknown> = {
      ...(isRecord(storeUpdate.personalDetails) ? storeUpdate.personalDetails : {}),
      ...(isRecord(storeUpdate.quoteDetails) ? storeUpdate.quoteDetails : {}),
    };
    return this.normalize(merged, false).customerData;
  }

  private normalize(source: Record<string, unknown>, keepExtras: boolean): NormalizedExtraction {
    const customerData: CustomerData = {};
    const extras: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(source)) {
      if (value === undefined || value === null) {
        continue;
      }
      const field = FIELD_ALIASES.get(compactKey(key));
      if (!field) {
        if (keepExtras) {
          extras[key] = value;
        }
        continue;
      }
      if (!this.assign(customerData, field, value)) {
        logger.debug('Dropping unreadable extracted value', { field, value });
      }
    }

    if (customerData.dateOfBirth && (customerData.age === undefined || customerData.age === null)) {
      const birthDate = this.parseDateOfBirth(customerData.dateOfBirth);
      if (birthDate) {
        customerData.age = differenceInYears(this.now(), birthDate);
      }
    }

    return { customerData, extras };
  }

  private assign(target: CustomerData, field: CustomerField, value: unknown): boolean {
    switch (field) {
      case 'fullName':
      case 'occupation':
      case 'email':
        target[field] = toText(value);
        break;
      case 'mobileNumber':
      case 'pinCode':
        target[field] = toText(value)?.replace(/\s+/g, '');
        break;
      case 'age':
      case 'policyTerm':
      case 'premiumPayingTerm':
        target[field] = toInteger(value);
        break;
      case 'annualIncome':
      case 'coverageAmount':
        target[field] = toNumber(value);
        break;
      case 'familyMedicalHistory':
      case 'existingCustomer':
        target[field] = toBoolean(value);
        break;
      case 'smoker':
        target.smoker = normalizeSmoker(value);
        break;
      case 'gender':
        target.gender = normalizeGender(value);
        break;
      case 'healthCondition':
        target.healthCondition = normalizeHealthCondition(value);
        break;
      case 'premiumFrequency':
        target.premiumFrequency = normalizeFrequency(value);
        break;
      case 'paymentMethod':
        target.paymentMethod = normalizePaymentMethod(value);
        break;
      case 'ridersInterest':
        target.ridersInterest = normalizeRiders(value);
        break;
      case 'dateOfBirth': {
        const parsed = this.parseDateOfBirth(value);
        target.dateOfBirth = parsed ? format(parsed, 'yyyy-MM-dd') : undefined;
        break;
      }
      case 'eligibilityStatus':
      case 'riskProfile':
        return false;
    }
    const assigned = target[field];
    if (assigned === undefined) {
      delete target[field];
      return false;
    }
    return true;
  }
}
