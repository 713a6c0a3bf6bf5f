import { AIService } from '../../src/services/AIService';
import { ConversationManager, FALLBACK_REPLY, WELCOME_MESSAGE } from '../../src/services/ConversationManager';
import { CustomerDataNormalizer } from '../../src/services/CustomerDataNormalizer';
import { SessionStore } from '../../src/services/SessionStore';
import { AIProvider } from '../../src/types/ai-provider';
import { PaymentMethod } from '../../src/types/customer';
import { PaymentRecord, PaymentStatus } from '../../src/types/payment';
import { SessionState } from '../../src/types/session';
import { StateTransitionError } from '../../src/utils/errors';
import { createExecutorFixture, ExecutorFixture, testPolicy } from '../helpers/fixtures';
import {
  decisionJson,
  deferred,
  InMemoryConversationLog,
  InMemorySessionRepository,
  ScriptedProvider,
} from '../helpers/fakes';

const NOW = new Date('2026-03-01T10:00:00.000Z');

// Replies in order; an Error entry makes that call reject.
class FlakyProvider implements AIProvider {
  calls = 0;

  constructor(private readonly script: Array<string | Error>) {}

  async generateResponse(): Promise<string> {
    this.calls += 1;
    const next = this.script.shift() ?? 'ok';
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }

  async healthCheck(): Promise<boolean> {
    return false;
  }
}

interface GatedReply {
  reply: string;
  gate?: Promise<void>;
}

// Like ScriptedProvider, but a reply can be held back until its gate opens.
class GatedProvider implements AIProvider {
  calls = 0;

  constructor(private readonly steps: GatedReply[]) {}

  async generateResponse(): Promise<string> {
    this.calls += 1;
    const step = this.steps.shift() ?? { reply: 'ok' };
    if (step.gate) {
      await step.gate;
    }
    return step.reply;
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

const flush = () => new Promise((resolve) => setImmediate(resolve));

describe('ConversationManager', () => {
  let fixture: ExecutorFixture;
  let repository: InMemorySessionRepository;
  let conversationLog: InMemoryConversationLog;
  let store: SessionStore;

  const createManager = (provider: AIProvider) =>
    new ConversationManager({
      store,
      aiService: new AIService(provider, testPolicy.historyWindow),
      executor: fixture.executor,
      stateMachine: fixture.stateMachine,
      normalizer: new CustomerDataNormalizer(() => NOW),
      conversationLog,
      paymentService: fixture.paymentService,
      policy: testPolicy,
      now: () => NOW,
    });

  beforeEach(() => {
    fixture = createExecutorFixture(() => NOW);
    repository = new InMemorySessionRepository();
    conversationLog = new InMemoryConversationLog();
    store = new SessionStore(repository, { maxSessions: 100, now: () => NOW });
  });

  afterEach(() => {
    fixture.paymentService.shutdown();
  });

  it('should start sessions with the welcome message', async () => {
    const manager = createManager(new ScriptedProvider());

    const summary = await manager.startSession('customer-1');

    expect(summary).toEqual({
      sessionId: 'customer-1',
      message: WELCOME_MESSAGE,
      currentState: SessionState.ONBOARDING,
      dataCollection: {
        collected: [],
        missing: ['fullName', 'age', 'gender', 'mobileNumber', 'email'],
        completionPercentage: 0,
        nextRequiredField: 'fullName',
      },
    });
  });

  it('should quote automatically once the pricing details are known', async () => {
    const provider = new ScriptedProvider([
      decisionJson({
        mode: 'onboarding',
        reply: 'Thanks, let me work that out.',
        extracted: { age: 30, gender: 'male', smoker: false, coverage_amount: '50 lakh', policy_term: '20 years' },
      }),
      'Your cheapest option is Life Shield.',
    ]);
    const manager = createManager(provider);

    const response = await manager.handleTurn(
      'customer-2',
      "I'm 30, male, non-smoker, want 50 lakh cover for 20 years"
    );

    expect(response.message).toBe('Your cheapest option is Life Shield.');
    expect(response.actions).toEqual(['premium_calculation']);
    expect(response.metadata.operations).toEqual([{ name: 'premium_calculation', success: true }]);
    expect(response.metadata.transition).toBeNull();
    expect(response.metadata.extracted).toEqual({
      age: 30,
      gender: 'male',
      smoker: false,
      coverage_amount: '50 lakh',
      policy_term: '20 years',
    });
    expect(response.dataCollection.missing).toEqual(['fullName', 'mobileNumber', 'email']);
    expect(provider.calls).toHaveLength(2);

    const session = await manager.getSession('customer-2');
    const premiums = (session.quoteData.quotes ?? []).map((quote) => quote.annualPremium);
    expect(premiums).toHaveLength(3);
    expect([...premiums].sort((a, b) => a - b)).toEqual(premiums);
    expect(session.quoteData.generatedAt).toBe(NOW.toISOString());
    expect(session.selectedVariant).toBe(session.quoteData.best?.variant);
    expect(session.conversationHistory).toHaveLength(1);
    expect(session.conversationHistory[0].dataCollected).toEqual({
      age: 30,
      gender: 'male',
      smoker: false,
      coverageAmount: 5_000_000,
      policyTerm: 20,
    });

    expect(conversationLog.records).toHaveLength(1);
    expect(conversationLog.records[0].finalReply).toBe('Your cheapest option is Life Shield.');
    expect(conversationLog.records[0].operationResults[0].success).toBe(true);
  });

  it('should not quote when a detail falls outside the sales policy', async () => {
    const provider = new ScriptedProvider([
      decisionJson({
        reply: 'Cover starts at 50 lakh. How much would you like?',
        extracted: { age: 30, gender: 'female', smoker: false, coverage_amount: 1_000_000, policy_term: 20 },
      }),
    ]);
    const manager = createManager(provider);

    const response = await manager.handleTurn('customer-3', 'I want 10 lakh cover');

    expect(response.actions).toEqual([]);
    expect(response.message).toBe('Cover starts at 50 lakh. How much would you like?');
    expect(provider.calls).toHaveLength(1);
  });

  it('should answer directly from a clean draft and append the next question', async () => {
    const provider = new ScriptedProvider([
      decisionJson({
        mode: 'informational',
        reply: 'Term insurance pays your family if you pass away during the term.',
        next_question: 'Shall I work out a quote?',
      }),
    ]);
    const manager = createManager(provider);

    const response = await manager.handleTurn(undefined, 'What is term insurance?');

    expect(response.message).toBe(
      'Term insurance pays your family if you pass away during the term. Shall I work out a quote?'
    );
    expect(response.mode).toBe('informational');
    expect(response.metadata.extracted).toBeUndefined();
    expect(await manager.getHistory(response.sessionId)).toHaveLength(1);
  });

  it('should use unparseable model output as the reply', async () => {
    const manager = createManager(new ScriptedProvider(['Sure, happy to help.']));

    const response = await manager.handleTurn('customer-4', 'hello');

    expect(response.message).toBe('Sure, happy to help.');
    expect(response.metadata.decisionParsed).toBe(false);
    expect(conversationLog.records[0].decision).toBeNull();
    expect(conversationLog.records[0].rawDecision).toBe('Sure, happy to help.');
  });

  it('should ignore the form mirror outside onboarding', async () => {
    const provider = new ScriptedProvider([
      decisionJson({
        mode: 'conversational',
        reply: 'Noted.',
        store_update: { personalDetails: { fullName: 'Ravi Kumar' } },
      }),
      decisionJson({
        mode: 'onboarding',
        reply: 'Thanks Ravi.',
        store_update: { personalDetails: { fullName: 'Ravi Kumar' } },
      }),
    ]);
    const manager = createManager(provider);

    await manager.handleTurn('customer-5', 'I am Ravi');
    expect((await manager.getSession('customer-5')).customerData.fullName).toBeUndefined();

    await manager.handleTurn('customer-5', 'My name is Ravi Kumar');
    expect((await manager.getSession('customer-5')).customerData.fullName).toBe('Ravi Kumar');
  });

  it('should keep the draft reply when composing fails', async () => {
    const provider = new FlakyProvider([
      decisionJson({
        reply: 'Here are the documents you will need.',
        api_calls: [{ name: 'policy_documents', params: {} }],
      }),
      new Error('upstream closed the connection'),
    ]);
    const manager = createManager(provider);

    const response = await manager.handleTurn('customer-6', 'Which documents do I need?');

    expect(response.message).toBe('Here are the documents you will need.');
    expect(response.actions).toEqual(['policy_documents']);
    expect(provider.calls).toBe(2);
  });

  it('should fall back to a stock reply when the decision call fails', async () => {
    const provider = new FlakyProvider([new Error('down')]);
    const manager = createManager(provider);

    const response = await manager.handleTurn('customer-12', 'hello');

    expect(response.message).toBe(FALLBACK_REPLY);
    expect(response.metadata.decisionParsed).toBe(false);
    expect(response.actions).toEqual([]);
    expect(provider.calls).toBe(1);
    expect(await manager.getHistory('customer-12')).toHaveLength(1);
    expect(conversationLog.records[0].rawDecision).toBe('');
  });

  it('should not quote again while the pricing details are unchanged', async () => {
    const provider = new ScriptedProvider([
      decisionJson({
        mode: 'onboarding',
        reply: 'Thanks, let me work that out.',
        extracted: { age: 30, gender: 'male', smoker: false, coverage_amount: '50 lakh', policy_term: 20 },
      }),
      'Here are your options.',
      decisionJson({ reply: 'Take your time to decide.' }),
    ]);
    const manager = createManager(provider);
    await manager.handleTurn('customer-13', 'Quote me for 50 lakh over 20 years');

    const quoted = await manager.getSession('customer-13');
    const alternative = (quoted.quoteData.quotes ?? []).find(
      (quote) => quote.variant !== quoted.selectedVariant
    );
    expect(alternative).toBeDefined();
    await store.withSession('customer-13', async (session) => {
      session.selectedVariant = alternative?.variant ?? null;
    });

    const response = await manager.handleTurn('customer-13', 'Let me think about it');

    expect(response.actions).toEqual([]);
    expect(response.message).toBe('Take your time to decide.');
    expect(provider.calls).toHaveLength(3);
    const session = await manager.getSession('customer-13');
    expect(session.selectedVariant).toBe(alternative?.variant);
    expect(session.quoteData.generatedAt).toBe(quoted.quoteData.generatedAt);
  });

  it('should not quote automatically once payment has started', async () => {
    const provider = new ScriptedProvider([
      decisionJson({
        reply: 'Noted.',
        extracted: { age: 30, gender: 'male', smoker: false, coverage_amount: 5_000_000, policy_term: 20 },
      }),
    ]);
    const manager = createManager(provider);
    await manager.startSession('customer-14');
    for (const state of [
      SessionState.ELIGIBILITY_CHECK,
      SessionState.PRODUCT_SELECTION,
      SessionState.QUOTE_GENERATION,
      SessionState.ADDON_RIDERS,
      SessionState.PAYMENT_INITIATED,
    ]) {
      await manager.transitionSession('customer-14', state);
    }

    const response = await manager.handleTurn('customer-14', 'I am 30, male, non-smoker');

    expect(response.actions).toEqual([]);
    expect(response.currentState).toBe(SessionState.PAYMENT_INITIATED);
    expect((await manager.getSession('customer-14')).quoteData).toEqual({});
  });

  it('should report failed operations without failing the turn', async () => {
    const provider = new ScriptedProvider([
      decisionJson({ reply: 'Let me check.', api_calls: [{ name: 'teleport', params: {} }] }),
      'Sorry, I cannot do that.',
    ]);
    const manager = createManager(provider);

    const response = await manager.handleTurn('customer-7', 'Teleport me');

    expect(response.metadata.operations).toEqual([
      { name: 'teleport', success: false, error: 'Unknown operation: teleport' },
    ]);
    expect(response.message).toBe('Sorry, I cannot do that.');
  });

  it('should reject invalid manual transitions and keep the state', async () => {
    const manager = createManager(new ScriptedProvider());
    await manager.startSession('customer-8');

    await expect(
      manager.transitionSession('customer-8', SessionState.POLICY_ISSUED)
    ).rejects.toThrow(StateTransitionError);

    const session = await manager.getSession('customer-8');
    expect(session.currentState).toBe(SessionState.ONBOARDING);
    expect(session.stateTransitions).toEqual([]);
  });

  it('should record valid manual transitions', async () => {
    const manager = createManager(new ScriptedProvider());
    await manager.startSession('customer-9');

    const { transition, session } = await manager.transitionSession('customer-9', SessionState.ELIGIBILITY_CHECK, {
      agent: 'ops',
    });

    expect(transition.context).toEqual({ trigger: 'manual', agent: 'ops' });
    expect(session.currentState).toBe(SessionState.ELIGIBILITY_CHECK);
  });

  it('should reset a session back to onboarding', async () => {
    const manager = createManager(new ScriptedProvider([decisionJson({ reply: 'Hi!' })]));
    await manager.handleTurn('customer-10', 'hi');

    const summary = await manager.resetSession('customer-10');

    expect(summary.message).toBe(WELCOME_MESSAGE);
    expect(await manager.getHistory('customer-10')).toEqual([]);
  });

  describe('concurrent turns', () => {
    it('should serve reads and short writes while a turn waits on the model', async () => {
      const gate = deferred();
      const provider = new GatedProvider([{ reply: decisionJson({ reply: 'Hello there.' }), gate: gate.promise }]);
      const manager = createManager(provider);
      await manager.startSession('customer-20');

      const turn = manager.handleTurn('customer-20', 'hello');
      await flush();
      expect(provider.calls).toBe(1);

      expect(await manager.getHistory('customer-20')).toEqual([]);
      await manager.transitionSession('customer-20', SessionState.ELIGIBILITY_CHECK);

      gate.resolve();
      const response = await turn;

      expect(response.message).toBe('Hello there.');
      expect(response.currentState).toBe(SessionState.ELIGIBILITY_CHECK);
      const session = await manager.getSession('customer-20');
      expect(session.currentState).toBe(SessionState.ELIGIBILITY_CHECK);
      expect(session.conversationHistory.map((entry) => entry.userMessage)).toEqual(['hello']);
    });

    it('should let another session finish while one turn is stalled', async () => {
      const gate = deferred();
      const provider = new GatedProvider([
        { reply: decisionJson({ reply: 'Slow answer.' }), gate: gate.promise },
        { reply: decisionJson({ reply: 'Fast answer.' }) },
      ]);
      const manager = createManager(provider);

      const slow = manager.handleTurn('customer-21', 'first');
      await flush();
      const fast = await manager.handleTurn('customer-22', 'second');

      expect(fast.message).toBe('Fast answer.');
      expect(await manager.getHistory('customer-21')).toEqual([]);

      gate.resolve();
      expect((await slow).message).toBe('Slow answer.');
    });

    it('should commit turns on one session in the order received', async () => {
      const gate = deferred();
      const provider = new GatedProvider([
        { reply: decisionJson({ reply: 'Answer one.' }), gate: gate.promise },
        { reply: decisionJson({ reply: 'Answer two.' }) },
      ]);
      const manager = createManager(provider);

      const first = manager.handleTurn('customer-23', 'one');
      const second = manager.handleTurn('customer-23', 'two');
      await flush();
      expect(provider.calls).toBe(1);

      gate.resolve();
      const responses = await Promise.all([first, second]);

      expect(responses.map((response) => response.message)).toEqual(['Answer one.', 'Answer two.']);
      const history = await manager.getHistory('customer-23');
      expect(history.map((entry) => [entry.userMessage, entry.botResponse])).toEqual([
        ['one', 'Answer one.'],
        ['two', 'Answer two.'],
      ]);
      expect(conversationLog.records).toHaveLength(2);
    });
  });

  describe('applyPaymentUpdate', () => {
    const payment = (overrides: Partial<PaymentRecord> = {}): PaymentRecord => ({
      paymentId: 'pay-0001',
      transactionId: 'TXN1',
      sessionId: 'customer-11',
      status: PaymentStatus.SUCCESS,
      amount: 432.18,
      currency: 'INR',
      paymentMethod: PaymentMethod.UPI,
      paymentUrl: 'https://gateway.test/pay/pay-0001',
      returnUrl: 'http://localhost:3000/payment/callback',
      gatewayResponse: {},
      createdAt: NOW,
      updatedAt: NOW,
      ...overrides,
    });

    it('should issue a policy number and move on to documents', async () => {
      const manager = createManager(new ScriptedProvider());
      await manager.startSession('customer-11');
      for (const state of [
        SessionState.ELIGIBILITY_CHECK,
        SessionState.PRODUCT_SELECTION,
        SessionState.QUOTE_GENERATION,
        SessionState.ADDON_RIDERS,
        SessionState.PAYMENT_INITIATED,
      ]) {
        await manager.transitionSession('customer-11', state);
      }

      await manager.applyPaymentUpdate(payment());

      const session = await store.require('customer-11');
      expect(session.currentState).toBe(SessionState.DOCUMENT_COLLECTION);
      expect(session.paymentData).toMatchObject({ paymentId: 'pay-0001', status: 'success', amount: 432.18 });
      expect(session.policyData.policyNumber).toMatch(/^TLP\d{8}CUSTOMERPAY0$/);
      expect(session.stateTransitions[session.stateTransitions.length - 1].context).toEqual({
        trigger: 'payment_success',
        paymentId: 'pay-0001',
      });
    });

    it('should record failures without issuing a policy', async () => {
      const manager = createManager(new ScriptedProvider());
      await manager.startSession('customer-11');

      await manager.applyPaymentUpdate(
        payment({ status: PaymentStatus.FAILED, gatewayResponse: { failureReason: 'Insufficient funds' } })
      );

      const session = await manager.getSession('customer-11');
      expect(session.paymentData).toMatchObject({ status: 'failed', failureReason: 'Insufficient funds' });
      expect(session.policyData).toEqual({});
      expect(session.currentState).toBe(SessionState.ONBOARDING);
    });

    it('should ignore payments for unknown sessions', async () => {
      const manager = createManager(new ScriptedProvider());
      await expect(manager.applyPaymentUpdate(payment({ sessionId: 'gone' }))).resolves.toBeUndefined();
    });
  });
});
