import path from 'path';
import { SalesPolicy } from '../../src/config';
import { EligibilityService } from '../../src/services/EligibilityService';
import { OperationExecutor } from '../../src/services/OperationExecutor';
import { MockPaymentService } from '../../src/services/PaymentService';
import { loadProductCatalog } from '../../src/services/ProductCatalog';
import { QuoteCalculator } from '../../src/services/QuoteCalculator';
import { SessionStateMachine } from '../../src/services/SessionStateMachine';

export const DATA_DIR = path.resolve(__dirname, '../../data');

export const testPolicy: SalesPolicy = {
  autoAdvanceThreshold: 80,
  minEntryAge: 18,
  maxEntryAge: 65,
  minCoverage: 5_000_000,
  maxCoverage: 200_000_000,
  minPolicyTerm: 5,
  maxPolicyTerm: 40,
  minAnnualIncome: 100_000,
  historyWindow: 5,
};

export interface ExecutorFixture {
  executor: OperationExecutor;
  calculator: QuoteCalculator;
  stateMachine: SessionStateMachine;
  paymentService: MockPaymentService;
}

// Real pricing tables, a payment gateway that never settles on its own.
export const createExecutorFixture = (now: () => Date = () => new Date('2026-03-01T10:00:00.000Z')): ExecutorFixture => {
  const catalog = loadProductCatalog(path.join(DATA_DIR, 'products.json'));
  const calculator = QuoteCalculator.fromFiles(path.join(DATA_DIR, 'premium-rates.json'), catalog);
  const stateMachine = new SessionStateMachine({ autoAdvanceThreshold: testPolicy.autoAdvanceThreshold });
  const paymentService = new MockPaymentService({
    successRate: 1,
    initialDelayMs: 60 * 60 * 1000,
    processingDelayMs: { min: 1000, max: 1000 },
    gatewayBaseUrl: 'https://gateway.test',
    random: () => 0.5,
    now,
  });
  const executor = new OperationExecutor({
    quoteCalculator: calculator,
    eligibilityService: new EligibilityService(testPolicy),
    catalog,
    paymentService,
    stateMachine,
    defaultReturnUrl: 'http://localhost:3000/payment/callback',
    now,
  });
  return { executor, calculator, stateMachine, paymentService };
};
