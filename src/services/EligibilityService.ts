import { HealthCondition } from '../types/customer';
import { EligibilityResult } from '../types/operations';

export interface EligibilityInput {
  age?: number;
  annualIncome?: number;
  occupation?: string;
  healthCondition?: HealthCondition;
  familyMedicalHistory?: boolean;
  smoker?: boolean;
}

export interface EligibilityPolicy {
  minEntryAge: number;
  maxEntryAge: number;
  minAnnualIncome: number;
}

const HIGH_RISK_OCCUPATIONS = ['mining', 'miner', 'aviation', 'pilot', 'defense', 'defence', 'stunt'];

const inr = (amount: number) => amount.toLocaleString('en-IN');

/**
 * Entry checks (age band, income floor) followed by a simple additive risk
 * score that sets the status and risk profile.
 */
export class EligibilityService {
  constructor(private readonly policy: EligibilityPolicy) {}

  check(input: EligibilityInput): EligibilityResult {
    const basic = this.checkBasic(input);
    return basic ?? this.assessRisk(input);
  }

  private checkBasic(input: EligibilityInput): EligibilityResult | null {
    const reject = (reason: string): EligibilityResult => ({
      eligible: false,
      status: 'ineligible',
      riskProfile: null,
      riskFactors: [],
      reason,
    });

    if (input.age !== undefined) {
      if (input.age < this.policy.minEntryAge) {
        return reject(`You must be at least ${this.policy.minEntryAge} years old to purchase this insurance.`);
      }
      if (input.age > this.policy.maxEntryAge) {
        return reject(`The maximum entry age for this insurance is ${this.policy.maxEntryAge} years.`);
      }
    }
    if (input.annualIncome !== undefined && input.annualIncome < this.policy.minAnnualIncome) {
      return reject(
        `Minimum annual income requirement is ₹${inr(this.policy.minAnnualIncome)} for this insurance plan.`
      );
    }
    return null;
  }

  private assessRisk(input: EligibilityInput): EligibilityResult {
    const riskFactors: string[] = [];
    let score = 0;

    if (input.healthCondition === 'major') {
      riskFactors.push('major_health_conditions');
      score += 3;
    } else if (input.healthCondition === 'minor') {
      riskFactors.push('minor_health_conditions');
      score += 1;
    }
    if (input.familyMedicalHistory) {
      riskFactors.push('family_medical_history');
      score += 1;
    }
    const occupation = input.occupation?.toLowerCase() ?? '';
    if (HIGH_RISK_OCCUPATIONS.some((keyword) => occupation.includes(keyword))) {
      riskFactors.push('high_risk_occupation');
      score += 2;
    }
    if (input.smoker) {
      riskFactors.push('tobacco_usage');
      score += 2;
    }

    if (score >= 5) {
      return {
        eligible: false,
        status: 'high_risk_ineligible',
        riskProfile: 'high',
        riskFactors,
        reason:
          'Based on your health profile and risk factors you may need special underwriting. Our underwriting team will contact you.',
      };
    }
    if (score >= 3) {
      return {
        eligible: true,
        status: 'eligible_with_conditions',
        riskProfile: 'medium',
        riskFactors,
        reason: null,
        conditions: ['medical_checkup_required', 'higher_premium'],
      };
    }
    if (score >= 1) {
      return { eligible: true, status: 'eligible_standard', riskProfile: 'low_medium', riskFactors, reason: null };
    }
    return {
      eligible: true,
      status: 'eligible_preferred',
      riskProfile: 'low',
      riskFactors,
      reason: null,
      benefits: ['preferential_rates', 'fast_track_processing'],
    };
  }
}
