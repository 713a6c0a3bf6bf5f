import fs from 'fs';
import { z } from 'zod';
import { Gender, HealthCondition, PaymentFrequency } from '../types/customer';
import {
  AppliedDiscount,
  CalculationBreakdown,
  DiscountKey,
  ModalPremiums,
  Quote,
  QuoteBenefits,
  QuoteProfile,
  VARIANTS,
  Variant,
} from '../types/quote';
import { QuoteCalculationError } from '../utils/errors';
import { errorMessage, logger } from '../utils/logger';
import { ProductCatalog } from './ProductCatalog';

const factorSchema = z.number().positive();

const discountSchema = z.object({
  description: z.string(),
  percentage: z.number().min(0).max(100),
});

export const premiumRatesSchema = z.object({
  baseRates: z.record(
    z.nativeEnum(Variant),
    z.object({
      ageBands: z.record(
        z.object({
          male: factorSchema,
          female: factorSchema.optional(),
          other: factorSchema.optional(),
        })
      ),
      policyTermFactors: z.record(factorSchema),
    })
  ),
  adjustments: z.object({
    tobaccoFactor: factorSchema,
    occupationCategories: z.record(
      z.object({ factor: factorSchema, occupations: z.array(z.string()) })
    ),
    healthConditions: z.record(z.object({ factor: factorSchema })),
    sumAssuredBands: z
      .array(z.object({ name: z.string(), upTo: z.number().nullable(), factor: factorSchema }))
      .min(1),
    paymentFrequency: z.record(factorSchema),
    modalFactors: z.record(factorSchema),
    discounts: z.object({
      online_purchase: discountSchema,
      high_sum_assured: discountSchema.extend({ minimumSumAssured: z.number() }),
      non_tobacco: discountSchema,
      loyalty: discountSchema,
    }),
  }),
  limits: z.object({
    minSumAssured: z.number(),
    maxIncomeMultiple: z.number(),
    ropTerminalIllnessCap: z.number(),
  }),
});

export type PremiumRates = z.infer<typeof premiumRatesSchema>;

export const loadPremiumRates = (filePath: string): PremiumRates =>
  premiumRatesSchema.parse(JSON.parse(fs.readFileSync(filePath, 'utf8')));

const AGE_BANDS: ReadonlyArray<readonly [number, number]> = [
  [18, 25],
  [26, 30],
  [31, 35],
  [36, 40],
  [41, 45],
  [46, 50],
  [51, 55],
  [56, 60],
  [61, 65],
];

const DEFAULT_OCCUPATION_CATEGORY = 'class_1';
const PREMIUM_FLOOR_RATIO = 0.5;
const DEFAULT_INCOME = 500_000;

const round2 = (value: number): number => Math.round(value * 100) / 100;

export interface SumAssuredValidation {
  valid: boolean;
  messages: string[];
}

/**
 * Prices the three term variants from static rate tables. Tables are read
 * once and never mutated, so one calculator is shared by every session.
 */
export class QuoteCalculator {
  constructor(
    private readonly rates: PremiumRates,
    private readonly catalog: ProductCatalog
  ) {}

  static fromFiles(ratesPath: string, catalog: ProductCatalog): QuoteCalculator {
    return new QuoteCalculator(loadPremiumRates(ratesPath), catalog);
  }

  /**
   * Quotes every variant, cheapest first. A variant whose calculation
   * fails is logged and left out; the rest are still returned.
   */
  generateQuotes(
    age: number,
    sumAssured: number,
    policyTerm: number,
    premiumPayingTerm: number,
    profile: QuoteProfile = {}
  ): Quote[] {
    const quotes: Quote[] = [];
    for (const variant of VARIANTS) {
      try {
        quotes.push(this.calculateQuote(variant, age, sumAssured, policyTerm, premiumPayingTerm, profile));
      } catch (error) {
        logger.error('Failed to calculate quote for variant', {
          variant,
          error: errorMessage(error),
        });
      }
    }
    // Array.prototype.sort is stable, so equal premiums keep VARIANTS order.
    return quotes.sort((a, b) => a.annualPremium - b.annualPremium);
  }

  calculateQuote(
    variant: Variant,
    age: number,
    sumAssured: number,
    policyTerm: number,
    premiumPayingTerm: number,
    profile: QuoteProfile = {}
  ): Quote {
    const gender: Gender = profile.gender ?? 'male';
    const tobaccoUser = profile.tobaccoUser ?? false;
    const healthCondition: HealthCondition = profile.healthCondition ?? 'good';
    const paymentFrequency = profile.paymentFrequency ?? PaymentFrequency.YEARLY;

    const variantRates = this.rates.baseRates[variant];
    if (!variantRates) {
      throw new QuoteCalculationError(`No premium rates for variant ${variant}`);
    }
    const ageBand = this.getAgeBand(age);
    const bandRates = variantRates.ageBands[ageBand];
    if (!bandRates) {
      throw new QuoteCalculationError(`No ${variant} rates for age band ${ageBand}`);
    }
    const ratePerThousand = bandRates[gender] ?? bandRates.male;

    const termFactor = variantRates.policyTermFactors[String(policyTerm)] ?? 1.0;
    const basePremium = (sumAssured / 1000) * ratePerThousand * termFactor;

    const occupationCategory = this.getOccupationCategory(profile.occupation);
    const sumAssuredBand = this.getSumAssuredBand(sumAssured);
    const factors: CalculationBreakdown['factors'] = {
      policyTerm: termFactor,
      tobacco: tobaccoUser ? this.rates.adjustments.tobaccoFactor : 1.0,
      occupation: this.rates.adjustments.occupationCategories[occupationCategory]?.factor ?? 1.0,
      health: this.rates.adjustments.healthConditions[healthCondition]?.factor ?? 1.0,
      sumAssured: sumAssuredBand.factor,
      paymentFrequency: this.rates.adjustments.paymentFrequency[paymentFrequency] ?? 1.0,
    };
    const adjustedPremium =
      basePremium *
      factors.tobacco *
      factors.occupation *
      factors.health *
      factors.sumAssured *
      factors.paymentFrequency;

    const discountsApplied = this.calculateDiscounts(profile, sumAssured, adjustedPremium);
    const discountAmount = Object.values(discountsApplied).reduce(
      (total, discount) => total + discount.amount,
      0
    );
    const annualPremium = Math.max(
      adjustedPremium - discountAmount,
      adjustedPremium * PREMIUM_FLOOR_RATIO
    );
    const roundedAnnual = round2(annualPremium);
    const totalPremiumPayable = round2(annualPremium * premiumPayingTerm);

    return {
      variant,
      annualPremium: roundedAnnual,
      modalPremiums: this.calculateModalPremiums(annualPremium),
      sumAssured,
      policyTerm,
      premiumPayingTerm,
      totalPremiumPayable,
      features: [...this.catalog.variants[variant].features],
      benefits: this.getBenefits(variant, sumAssured, totalPremiumPayable),
      discountsApplied,
      discountAmount: round2(discountAmount),
      recommended: this.isRecommended(variant, age, profile),
      basePremium: round2(basePremium),
      adjustedPremium: round2(adjustedPremium),
      calculationBreakdown: {
        variant,
        ageBand,
        gender,
        tobaccoUser,
        occupationCategory,
        healthCondition,
        policyTerm,
        sumAssuredBand: sumAssuredBand.name,
        paymentFrequency,
        ratePerThousand,
        factors,
      },
    };
  }

  // Amount due per instalment at the given frequency.
  calculateModalPremium(annualPremium: number, frequency: PaymentFrequency): number {
    const factor = this.rates.adjustments.modalFactors[frequency] ?? 1.0;
    return round2(annualPremium * factor);
  }

  validateSumAssured(sumAssured: number, annualIncome?: number): SumAssuredValidation {
    const { minSumAssured, maxIncomeMultiple } = this.rates.limits;
    const messages: string[] = [];

    if (sumAssured < minSumAssured) {
      messages.push(`Minimum sum assured is ₹${minSumAssured.toLocaleString('en-IN')}`);
    }
    if (annualIncome !== undefined) {
      const maxByIncome = annualIncome * maxIncomeMultiple;
      if (sumAssured > maxByIncome) {
        messages.push(
          `Sum assured cannot exceed ${maxIncomeMultiple}x annual income (₹${maxByIncome.toLocaleString('en-IN')})`
        );
      }
    }
    return { valid: messages.length === 0, messages };
  }

  getAgeBand(age: number): string {
    const band = AGE_BANDS.find(([min, max]) => age >= min && age <= max);
    if (!band) {
      throw new QuoteCalculationError(`Age ${age} is outside the insurable range`);
    }
    return `${band[0]}-${band[1]}`;
  }

  private getOccupationCategory(occupation?: string): string {
    if (occupation) {
      const needle = occupation.trim().toLowerCase();
      for (const [category, details] of Object.entries(this.rates.adjustments.occupationCategories)) {
        if (details.occupations.some((candidate) => candidate.toLowerCase() === needle)) {
          return category;
        }
      }
    }
    return DEFAULT_OCCUPATION_CATEGORY;
  }

  private getSumAssuredBand(sumAssured: number): { name: string; factor: number } {
    const bands = this.rates.adjustments.sumAssuredBands;
    const band = bands.find((candidate) => candidate.upTo === null || sumAssured <= candidate.upTo);
    return band ?? bands[bands.length - 1];
  }

  private calculateDiscounts(
    profile: QuoteProfile,
    sumAssured: number,
    adjustedPremium: number
  ): Partial<Record<DiscountKey, AppliedDiscount>> {
    const config = this.rates.adjustments.discounts;
    const applied: Partial<Record<DiscountKey, AppliedDiscount>> = {};
    const apply = (key: DiscountKey, description: string, percentage: number) => {
      applied[key] = {
        name: description,
        percentage,
        amount: round2((adjustedPremium * percentage) / 100),
      };
    };

    if (profile.purchaseChannel === 'online') {
      apply('online_purchase', config.online_purchase.description, config.online_purchase.percentage);
    }
    if (sumAssured >= config.high_sum_assured.minimumSumAssured) {
      apply('high_sum_assured', config.high_sum_assured.description, config.high_sum_assured.percentage);
    }
    // Only an explicit "no" earns the non-tobacco rate.
    if (profile.tobaccoUser === false) {
      apply('non_tobacco', config.non_tobacco.description, config.non_tobacco.percentage);
    }
    if (profile.existingCustomer) {
      apply('loyalty', config.loyalty.description, config.loyalty.percentage);
    }
    return applied;
  }

  private calculateModalPremiums(annualPremium: number): ModalPremiums {
    return {
      [PaymentFrequency.MONTHLY]: this.calculateModalPremium(annualPremium, PaymentFrequency.MONTHLY),
      [PaymentFrequency.QUARTERLY]: this.calculateModalPremium(annualPremium, PaymentFrequency.QUARTERLY),
      [PaymentFrequency.HALF_YEARLY]: this.calculateModalPremium(annualPremium, PaymentFrequency.HALF_YEARLY),
      [PaymentFrequency.YEARLY]: this.calculateModalPremium(annualPremium, PaymentFrequency.YEARLY),
    };
  }

  private getBenefits(variant: Variant, sumAssured: number, totalPremiumPayable: number): QuoteBenefits {
    switch (variant) {
      case Variant.LIFE_SHIELD_PLUS:
        return { deathBenefit: sumAssured, terminalIllness: sumAssured, accidentalDeath: sumAssured };
      case Variant.LIFE_SHIELD_ROP:
        return {
          deathBenefit: sumAssured,
          terminalIllness: Math.min(sumAssured, this.rates.limits.ropTerminalIllnessCap),
          maturityBenefit: totalPremiumPayable,
        };
      case Variant.LIFE_SHIELD:
        return { deathBenefit: sumAssured, terminalIllness: sumAssured };
    }
  }

  private isRecommended(variant: Variant, age: number, profile: QuoteProfile): boolean {
    const customerAge = profile.age ?? age;
    const income = profile.annualIncome ?? DEFAULT_INCOME;
    const riskProfile = profile.riskProfile ?? 'low';

    if (customerAge < 35 && income > 1_000_000) {
      return variant === Variant.LIFE_SHIELD_PLUS;
    }
    if (customerAge > 50 || income < 500_000) {
      return variant === Variant.LIFE_SHIELD;
    }
    if (riskProfile === 'low' && income > 800_000) {
      return variant === Variant.LIFE_SHIELD_ROP;
    }
    return variant === Variant.LIFE_SHIELD;
  }
}
