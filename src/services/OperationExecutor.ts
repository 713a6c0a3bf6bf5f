import { PaymentFrequency } from '../types/customer';
import { OperationCall } from '../types/decision';
import {
  Operation,
  OperationOutput,
  OperationResult,
  PlanSummary,
  operationSchema,
} from '../types/operations';
import { QuoteInputs, VARIANTS } from '../types/quote';
import { Session, SessionState } from '../types/session';
import { QuoteCalculationError, StateTransitionError, ValidationError } from '../utils/errors';
import { errorMessage, logger } from '../utils/logger';
import {
  normalizeFrequency,
  normalizeGender,
  normalizePaymentMethod,
} from './CustomerDataNormalizer';
import { EligibilityService } from './EligibilityService';
import { MockPaymentService } from './PaymentService';
import { ProductCatalog } from './ProductCatalog';
import { QuoteCalculator } from './QuoteCalculator';
import { SessionStateMachine } from './SessionStateMachine';
import { mergeCustomerData, setPaymentData } from './SessionRecord';

type OperationOf<N extends Operation['name']> = Extract<Operation, { name: N }>;

export interface OperationExecutorDeps {
  quoteCalculator: QuoteCalculator;
  eligibilityService: EligibilityService;
  catalog: ProductCatalog;
  paymentService: MockPaymentService;
  stateMachine: SessionStateMachine;
  defaultReturnUrl: string;
  now?: () => Date;
}

const assertNever = (value: never): never => {
  throw new Error(`Unhandled operation: ${JSON.stringify(value)}`);
};

const describeParamsError = (call: OperationCall, issues: string): string =>
  `Invalid parameters for ${call.name}: ${issues}`;

/**
 * Runs one backend operation against a session. Every outcome, including
 * unknown names and bad parameters, comes back as a result; nothing throws.
 */
export class OperationExecutor {
  private readonly now: () => Date;

  constructor(private readonly deps: OperationExecutorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async execute(session: Session, call: OperationCall): Promise<OperationResult> {
    const base = { name: call.name, params: call.params };
    const parsed = operationSchema.safeParse({ name: call.name, params: call.params });
    if (!parsed.success) {
      const nameIssue = parsed.error.issues.find((issue) => issue.path[0] === 'name');
      const error = nameIssue
        ? `Unknown operation: ${call.name}`
        : describeParamsError(
            call,
            parsed.error.issues.map((issue) => `${issue.path.slice(1).join('.')} ${issue.message}`).join('; ')
          );
      logger.warn('Rejected operation', { sessionId: session.sessionId, operation: call.name, error });
      return { ...base, success: false, error };
    }

    try {
      const output = await this.dispatch(session, parsed.data);
      logger.info('Operation succeeded', { sessionId: session.sessionId, operation: call.name });
      return { ...base, success: true, output };
    } catch (error) {
      const message =
        error instanceof StateTransitionError
          ? `Cannot move from ${error.fromState} to ${error.toState} at this point in the application.`
          : errorMessage(error);
      logger.warn('Operation failed', { sessionId: session.sessionId, operation: call.name, error: message });
      return { ...base, success: false, error: message };
    }
  }

  private async dispatch(session: Session, operation: Operation): Promise<OperationOutput> {
    switch (operation.name) {
      case 'premium_calculation':
        return this.calculatePremium(session, operation);
      case 'eligibility_check':
        return this.checkEligibility(session, operation);
      case 'plan_comparison':
        return { kind: 'plan_comparison', plans: this.comparePlans(session) };
      case 'policy_documents':
        return {
          kind: 'policy_documents',
          documents: [...this.deps.catalog.policyDocuments],
          requiredKycDocuments: [...this.deps.catalog.requiredKycDocuments],
        };
      case 'payment_initiation':
        return this.initiatePayment(session, operation);
      case 'state_transition':
        return this.transitionState(session, operation);
      default:
        return assertNever(operation);
    }
  }

  private calculatePremium(
    session: Session,
    { params }: OperationOf<'premium_calculation'>
  ): OperationOutput {
    const data = session.customerData;
    const age = params.age ?? data.age ?? undefined;
    const coverageAmount = params.coverage_amount ?? data.coverageAmount ?? undefined;
    const policyTerm = params.policy_term ?? data.policyTerm ?? undefined;
    if (age === undefined || coverageAmount === undefined || policyTerm === undefined) {
      throw new ValidationError('Age, coverage amount and policy term are needed for a quote');
    }

    const inputs: QuoteInputs = {
      age,
      gender: normalizeGender(params.gender) ?? data.gender ?? 'male',
      coverageAmount,
      policyTerm,
      premiumPayingTerm: params.premium_paying_term ?? data.premiumPayingTerm ?? policyTerm,
      smoker: params.smoker ?? data.smoker ?? false,
    };
    const smokerKnown = params.smoker !== undefined || (data.smoker !== undefined && data.smoker !== null);

    const quotes = this.deps.quoteCalculator.generateQuotes(
      inputs.age,
      inputs.coverageAmount,
      inputs.policyTerm,
      inputs.premiumPayingTerm,
      {
        age: inputs.age,
        gender: inputs.gender,
        tobaccoUser: smokerKnown ? inputs.smoker : undefined,
        occupation: params.occupation ?? data.occupation ?? undefined,
        healthCondition: data.healthCondition ?? undefined,
        annualIncome: data.annualIncome ?? undefined,
        riskProfile: data.riskProfile ?? undefined,
        paymentFrequency:
          normalizeFrequency(params.payment_frequency) ?? data.premiumFrequency ?? PaymentFrequency.YEARLY,
        purchaseChannel: 'online',
        existingCustomer: data.existingCustomer ?? false,
      }
    );
    const best = quotes[0];
    if (!best) {
      throw new QuoteCalculationError('No quotes could be calculated for these details');
    }
    const { messages: warnings } = this.deps.quoteCalculator.validateSumAssured(
      coverageAmount,
      data.annualIncome ?? undefined
    );
    return { kind: 'premium_calculation', quotes, best, inputs, warnings };
  }

  private checkEligibility(
    session: Session,
    { params }: OperationOf<'eligibility_check'>
  ): OperationOutput {
    const data = session.customerData;
    const health = params.health_condition?.toLowerCase();
    const eligibility = this.deps.eligibilityService.check({
      age: params.age ?? data.age ?? undefined,
      annualIncome: params.annual_income ?? data.annualIncome ?? undefined,
      occupation: params.occupation ?? data.occupation ?? undefined,
      healthCondition:
        health === 'good' || health === 'minor' || health === 'major'
          ? health
          : data.healthCondition ?? undefined,
      familyMedicalHistory: params.family_medical_history ?? data.familyMedicalHistory ?? undefined,
      smoker: params.smoker ?? data.smoker ?? undefined,
    });

    mergeCustomerData(session, {
      eligibilityStatus: eligibility.status,
      riskProfile: eligibility.riskProfile,
    });
    return { kind: 'eligibility_check', eligibility };
  }

  private comparePlans(session: Session): PlanSummary[] {
    const quotes = session.quoteData.quotes ?? [];
    return VARIANTS.map((variant) => {
      const details = this.deps.catalog.variants[variant];
      return {
        variant,
        description: details.description,
        pros: [...details.pros],
        cons: [...details.cons],
        annualPremium: quotes.find((quote) => quote.variant === variant)?.annualPremium ?? null,
      };
    });
  }

  private async initiatePayment(
    session: Session,
    { params }: OperationOf<'payment_initiation'>
  ): Promise<OperationOutput> {
    const data = session.customerData;
    const paymentMethod = normalizePaymentMethod(params.payment_method) ?? data.paymentMethod ?? undefined;
    if (!paymentMethod) {
      throw new ValidationError('A payment method is needed to start the payment');
    }

    const best = session.quoteData.best;
    const frequency = data.premiumFrequency ?? PaymentFrequency.YEARLY;
    const amount = params.amount ?? best?.modalPremiums[frequency];
    if (amount === undefined) {
      throw new ValidationError('A quote is needed before starting the payment');
    }
    if (amount <= 0) {
      throw new ValidationError('Payment amount must be positive');
    }

    const payment = await this.deps.paymentService.initiatePayment({
      sessionId: session.sessionId,
      amount,
      paymentMethod,
      customerDetails: {
        fullName: data.fullName ?? null,
        email: data.email ?? null,
        mobileNumber: data.mobileNumber ?? null,
      },
      policyDetails: {
        variant: session.selectedVariant,
        sumAssured: best?.sumAssured ?? data.coverageAmount ?? null,
        policyTerm: best?.policyTerm ?? data.policyTerm ?? null,
        premiumFrequency: frequency,
      },
      returnUrl: params.return_url ?? this.deps.defaultReturnUrl,
    });

    mergeCustomerData(session, { paymentMethod });
    setPaymentData(session, {
      paymentId: payment.paymentId,
      transactionId: payment.transactionId,
      paymentUrl: payment.paymentUrl,
      amount: payment.amount,
      currency: payment.currency,
      paymentMethod: payment.paymentMethod,
      status: payment.status,
      updatedAt: payment.updatedAt.toISOString(),
    });

    const { stateMachine } = this.deps;
    if (
      session.currentState !== SessionState.PAYMENT_INITIATED &&
      stateMachine.canTransition(session.currentState, SessionState.PAYMENT_INITIATED)
    ) {
      stateMachine.transition(
        session,
        SessionState.PAYMENT_INITIATED,
        { trigger: 'payment_initiation', paymentId: payment.paymentId },
        {},
        this.now()
      );
    }

    return {
      kind: 'payment_initiation',
      paymentId: payment.paymentId,
      transactionId: payment.transactionId,
      paymentUrl: payment.paymentUrl,
      amount: payment.amount,
      status: payment.status,
    };
  }

  private transitionState(
    session: Session,
    { params }: OperationOf<'state_transition'>
  ): OperationOutput {
    const fromState = session.currentState;
    this.deps.stateMachine.transition(
      session,
      params.target_state,
      { trigger: 'operation', ...params.context },
      {},
      this.now()
    );
    return { kind: 'state_transition', fromState, toState: params.target_state };
  }
}
