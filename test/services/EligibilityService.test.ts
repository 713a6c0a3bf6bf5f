import { EligibilityService } from '../../src/services/EligibilityService';

describe('EligibilityService', () => {
  const service = new EligibilityService({ minEntryAge: 18, maxEntryAge: 65, minAnnualIncome: 300000 });

  it('should reject applicants outside the entry age band', () => {
    expect(service.check({ age: 17 })).toEqual({
      eligible: false,
      status: 'ineligible',
      riskProfile: null,
      riskFactors: [],
      reason: 'You must be at least 18 years old to purchase this insurance.',
    });
    expect(service.check({ age: 66 }).reason).toBe('The maximum entry age for this insurance is 65 years.');
    expect(service.check({ age: 65 }).eligible).toBe(true);
  });

  it('should reject incomes below the floor', () => {
    const result = service.check({ age: 30, annualIncome: 299999 });
    expect(result.status).toBe('ineligible');
    expect(result.reason).toBe('Minimum annual income requirement is ₹3,00,000 for this insurance plan.');
  });

  it('should give a clean profile preferred terms', () => {
    expect(service.check({ age: 30, annualIncome: 1200000, healthCondition: 'good', smoker: false })).toEqual({
      eligible: true,
      status: 'eligible_preferred',
      riskProfile: 'low',
      riskFactors: [],
      reason: null,
      benefits: ['preferential_rates', 'fast_track_processing'],
    });
  });

  it('should grade risk by the combined score', () => {
    expect(service.check({ familyMedicalHistory: true }).status).toBe('eligible_standard');

    const conditional = service.check({ smoker: true, healthCondition: 'minor' });
    expect(conditional.status).toBe('eligible_with_conditions');
    expect(conditional.riskFactors).toEqual(['minor_health_conditions', 'tobacco_usage']);
    expect(conditional.conditions).toEqual(['medical_checkup_required', 'higher_premium']);

    const high = service.check({ healthCondition: 'major', occupation: 'Commercial Pilot' });
    expect(high.eligible).toBe(false);
    expect(high.riskProfile).toBe('high');
    expect(high.riskFactors).toEqual(['major_health_conditions', 'high_risk_occupation']);
  });
});
