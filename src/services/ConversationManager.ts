import { v4 as uuidv4 } from 'uuid';
import { SalesPolicy } from '../config';
import { ConversationLogRecord, ConversationLogRepository } from '../repositories/types';
import { CustomerData, CustomerField } from '../types/customer';
import {
  ConversationMode,
  Decision,
  DecisionOutcome,
  OperationCall,
  StoreUpdate,
  fallbackDecision,
} from '../types/decision';
import { OperationResult } from '../types/operations';
import { PaymentRecord, PaymentStatus } from '../types/payment';
import {
  ConversationTurn,
  DataCollectionStatus,
  Session,
  SessionState,
  StateTransition,
} from '../types/session';
import { SessionNotFoundError } from '../utils/errors';
import { errorMessage, logger } from '../utils/logger';
import { AIService } from './AIService';
import { CustomerDataNormalizer } from './CustomerDataNormalizer';
import { OperationExecutor } from './OperationExecutor';
import { MockPaymentService } from './PaymentService';
import { SessionStateMachine } from './SessionStateMachine';
import { SessionStore } from './SessionStore';
import { appendTurn, mergeCustomerData, setPaymentData, setPolicyData, setQuoteData } from './SessionRecord';

export const WELCOME_MESSAGE =
  "Hi! I'm your term insurance advisor. I can explain our Life Shield plans, work out a quote in a couple of minutes, or help you buy a policy. What would you like to know?";

export const FALLBACK_REPLY =
  "I'm sorry, I couldn't put together a reply just now. Could you please say that again?";

export interface OperationOutcome {
  name: string;
  success: boolean;
  error?: string;
}

export interface TurnMetadata {
  mode: ConversationMode;
  decisionParsed: boolean;
  operations: OperationOutcome[];
  transition: { fromState: SessionState; toState: SessionState } | null;
  extracted?: Record<string, unknown>;
  storeUpdate?: StoreUpdate;
}

export interface TurnResponse {
  sessionId: string;
  message: string;
  currentState: SessionState;
  mode: ConversationMode;
  actions: string[];
  dataCollection: DataCollectionStatus;
  metadata: TurnMetadata;
}

export interface SessionSummary {
  sessionId: string;
  message: string;
  currentState: SessionState;
  dataCollection: DataCollectionStatus;
}

export interface ConversationManagerDeps {
  store: SessionStore;
  aiService: AIService;
  executor: OperationExecutor;
  stateMachine: SessionStateMachine;
  normalizer: CustomerDataNormalizer;
  conversationLog: ConversationLogRepository;
  paymentService: MockPaymentService;
  policy: SalesPolicy;
  now?: () => Date;
}

const QUOTABLE_STATES: ReadonlySet<SessionState> = new Set([
  SessionState.ONBOARDING,
  SessionState.ELIGIBILITY_CHECK,
  SessionState.PRODUCT_SELECTION,
  SessionState.QUOTE_GENERATION,
  SessionState.ADDON_RIDERS,
]);

const inRange = (value: number | null | undefined, min: number, max: number): value is number =>
  typeof value === 'number' && value >= min && value <= max;

// Replies that still look like a structured payload need a second pass.
const isCleanProse = (text: string): boolean => {
  const trimmed = text.trim();
  return trimmed.length > 0 && !trimmed.startsWith('{') && !trimmed.includes('```') && !/"reply"\s*:/.test(trimmed);
};

const withNextQuestion = (reply: string, nextQuestion: string | null): string => {
  if (!nextQuestion || reply.includes(nextQuestion)) {
    return reply;
  }
  return `${reply.trim()} ${nextQuestion.trim()}`;
};

const collectedValues = (data: CustomerData, fields: CustomerField[]): Record<string, unknown> =>
  Object.fromEntries(fields.map((field) => [field, data[field]]));

export class ConversationManager {
  private readonly now: () => Date;

  constructor(private readonly deps: ConversationManagerDeps) {
    this.now = deps.now ?? (() => new Date());
    logger.info('ConversationManager initialized');
  }

  async startSession(sessionId?: string): Promise<SessionSummary> {
    const session = await this.deps.store.create(sessionId);
    return this.summarize(session, WELCOME_MESSAGE);
  }

  async getSession(sessionId: string): Promise<Session> {
    return this.deps.store.require(sessionId);
  }

  async getHistory(sessionId: string): Promise<ConversationTurn[]> {
    const session = await this.deps.store.require(sessionId);
    return session.conversationHistory;
  }

  async getConversationLog(sessionId: string): Promise<ConversationLogRecord[]> {
    await this.deps.store.require(sessionId);
    return this.deps.conversationLog.listBySession(sessionId);
  }

  async resetSession(sessionId: string): Promise<SessionSummary> {
    const session = await this.deps.store.reset(sessionId);
    return this.summarize(session, WELCOME_MESSAGE);
  }

  /**
   * Manual move requested from outside the conversation. An invalid move
   * rejects with StateTransitionError and nothing is committed.
   */
  async transitionSession(
    sessionId: string,
    targetState: SessionState,
    context: Record<string, unknown> = {}
  ): Promise<{ transition: StateTransition; session: Session }> {
    return this.deps.store.withSession(sessionId, async (session) => {
      const transition = this.deps.stateMachine.transition(
        session,
        targetState,
        { trigger: 'manual', ...context },
        {},
        this.now()
      );
      return { transition, session: structuredClone(session) };
    });
  }

  // Runs a single operation outside a chat turn, e.g. from the payment API.
  async executeOperation(sessionId: string, call: OperationCall): Promise<OperationResult> {
    return this.deps.store.withSession(sessionId, (session) => this.deps.executor.execute(session, call));
  }

  /**
   * One chat turn. Turns on a session are queued and run one at a time; the
   * store lock is taken only for the two short commits, so reads and other
   * writers are not held up by the model calls in between.
   */
  async handleTurn(
    sessionId: string | undefined,
    userMessage: string,
    attachments: string[] = []
  ): Promise<TurnResponse> {
    const id = sessionId ?? uuidv4();

    const { response, record } = await this.deps.store.queue(id, () =>
      this.runTurn(id, userMessage, attachments)
    );

    try {
      await this.deps.conversationLog.append(record);
    } catch (error) {
      logger.error('Failed to append conversation log', { sessionId: id, error: errorMessage(error) });
    }
    return response;
  }

  /**
   * Mirrors a settled payment into its session. A successful payment gets
   * a policy number and moves the session on to document collection.
   */
  async applyPaymentUpdate(payment: PaymentRecord): Promise<void> {
    try {
      await this.deps.store.withSession(payment.sessionId, async (session) => {
        const failureReason = payment.gatewayResponse.failureReason;
        setPaymentData(session, {
          paymentId: payment.paymentId,
          transactionId: payment.transactionId,
          amount: payment.amount,
          currency: payment.currency,
          paymentMethod: payment.paymentMethod,
          status: payment.status,
          updatedAt: payment.updatedAt.toISOString(),
          ...(typeof failureReason === 'string' ? { failureReason } : {}),
        });

        if (payment.status !== PaymentStatus.SUCCESS) {
          return;
        }
        const now = this.now();
        setPolicyData(session, {
          policyNumber: this.deps.paymentService.generatePolicyNumber(session.sessionId, payment.paymentId),
          variant: session.selectedVariant ?? undefined,
          paymentId: payment.paymentId,
          issuedAt: now.toISOString(),
        });

        const { stateMachine } = this.deps;
        if (
          session.currentState !== SessionState.DOCUMENT_COLLECTION &&
          stateMachine.canTransition(session.currentState, SessionState.DOCUMENT_COLLECTION)
        ) {
          stateMachine.transition(
            session,
            SessionState.DOCUMENT_COLLECTION,
            { trigger: 'payment_success', paymentId: payment.paymentId },
            {},
            now
          );
        }
      });
      logger.info('Payment applied to session', {
        sessionId: payment.sessionId,
        paymentId: payment.paymentId,
        status: payment.status,
      });
    } catch (error) {
      if (error instanceof SessionNotFoundError) {
        logger.warn('Payment settled for an unknown session', {
          sessionId: payment.sessionId,
          paymentId: payment.paymentId,
        });
        return;
      }
      throw error;
    }
  }

  private async runTurn(
    sessionId: string,
    userMessage: string,
    attachments: string[]
  ): Promise<{ response: TurnResponse; record: ConversationLogRecord }> {
    const { store, executor, stateMachine } = this.deps;
    const snapshot = (await store.get(sessionId)) ?? (await store.create(sessionId));
    logger.info('Handling turn', { sessionId, currentState: snapshot.currentState });

    const outcome = await this.decide(snapshot, userMessage, attachments);
    const { decision } = outcome;

    const applied = await store.withSession(sessionId, async (session) => {
      const written = this.mergeExtraction(session, decision);

      const fromState = session.currentState;
      const advanced = stateMachine.checkAutoAdvance(session, written, this.now());

      const operations = [...decision.operations];
      const autoQuote = this.autoQuoteCall(session, operations);
      if (autoQuote) {
        operations.push(autoQuote);
        logger.info('Auto-quote added', { sessionId, params: autoQuote.params });
      }

      const results: OperationResult[] = [];
      for (const operation of operations) {
        results.push(await executor.execute(session, operation));
      }

      for (const result of results) {
        if (result.success && result.output.kind === 'premium_calculation') {
          setQuoteData(session, {
            quotes: result.output.quotes,
            best: result.output.best,
            inputs: result.output.inputs,
            generatedAt: this.now().toISOString(),
          });
        }
      }

      return {
        written,
        transition: advanced ? { fromState, toState: advanced.toState } : null,
        actions: operations.map((operation) => operation.name),
        results,
        session: structuredClone(session),
      };
    });
    const { written, transition, actions, results } = applied;

    const reply = await this.composeReply(applied.session, userMessage, decision, results);

    const committed = await store.withSession(sessionId, async (session) => {
      appendTurn(session, {
        timestamp: this.now(),
        userMessage,
        botResponse: reply,
        state: session.currentState,
        actionsTaken: actions,
        dataCollected: collectedValues(session.customerData, written),
      });
      return {
        currentState: session.currentState,
        dataCollection: stateMachine.getDataCollectionStatus(session),
      };
    });

    const onboarding = decision.mode === 'onboarding';
    const metadata: TurnMetadata = {
      mode: decision.mode,
      decisionParsed: outcome.parsed,
      operations: results.map((result) =>
        result.success
          ? { name: result.name, success: true }
          : { name: result.name, success: false, error: result.error }
      ),
      transition,
      ...(onboarding ? { extracted: decision.extracted, storeUpdate: decision.storeUpdate } : {}),
    };

    const response: TurnResponse = {
      sessionId,
      message: reply,
      currentState: committed.currentState,
      mode: decision.mode,
      actions,
      dataCollection: committed.dataCollection,
      metadata,
    };
    const record: ConversationLogRecord = {
      timestamp: this.now().toISOString(),
      sessionId,
      userMessage,
      rawDecision: outcome.raw,
      decision: outcome.parsed ? decision : null,
      operationResults: results,
      finalReply: reply,
      storeUpdate: decision.storeUpdate,
    };
    return { response, record };
  }

  private async decide(session: Session, userMessage: string, attachments: string[]): Promise<DecisionOutcome> {
    try {
      return await this.deps.aiService.decide(session, userMessage, attachments);
    } catch (error) {
      logger.error('Failed to get a decision', { sessionId: session.sessionId, error: errorMessage(error) });
      return { decision: fallbackDecision(FALLBACK_REPLY), raw: '', parsed: false };
    }
  }

  // Extraction is merged in any mode; the form mirror only while onboarding.
  private mergeExtraction(session: Session, decision: Decision): CustomerField[] {
    const { normalizer } = this.deps;
    const written = new Set<CustomerField>();

    if (decision.mode === 'onboarding') {
      const mirrored = normalizer.normalizeStoreUpdate(decision.storeUpdate);
      mergeCustomerData(session, mirrored).forEach((field) => written.add(field));
    }
    const { customerData, extras } = normalizer.normalizeExtracted(decision.extracted);
    mergeCustomerData(session, customerData, extras).forEach((field) => written.add(field));

    if (written.size > 0) {
      logger.info('Customer data merged', { sessionId: session.sessionId, fields: [...written] });
    }
    return [...written];
  }

  /**
   * A quote is added without being asked for while the sale is still before
   * payment, once pricing data is complete and differs from what the stored
   * quote was priced on.
   */
  private autoQuoteCall(session: Session, requested: OperationCall[]): OperationCall | null {
    if (
      !QUOTABLE_STATES.has(session.currentState) ||
      requested.some((operation) => operation.name === 'premium_calculation')
    ) {
      return null;
    }
    const { policy } = this.deps;
    const { age, gender, coverageAmount, policyTerm, premiumPayingTerm, smoker } = session.customerData;
    if (
      !inRange(age, policy.minEntryAge, policy.maxEntryAge) ||
      !gender ||
      !inRange(coverageAmount, policy.minCoverage, policy.maxCoverage) ||
      !inRange(policyTerm, policy.minPolicyTerm, policy.maxPolicyTerm) ||
      typeof smoker !== 'boolean'
    ) {
      return null;
    }
    const quoted = session.quoteData.inputs;
    if (
      quoted &&
      quoted.age === age &&
      quoted.gender === gender &&
      quoted.coverageAmount === coverageAmount &&
      quoted.policyTerm === policyTerm &&
      quoted.premiumPayingTerm === (premiumPayingTerm ?? policyTerm) &&
      quoted.smoker === smoker
    ) {
      return null;
    }
    return {
      name: 'premium_calculation',
      params: { age, gender, coverage_amount: coverageAmount, policy_term: policyTerm, smoker },
    };
  }

  private async composeReply(
    session: Session,
    userMessage: string,
    decision: Decision,
    results: OperationResult[]
  ): Promise<string> {
    if (results.length === 0 && isCleanProse(decision.reply)) {
      return withNextQuestion(decision.reply.trim(), decision.nextQuestion);
    }
    try {
      const composed = await this.deps.aiService.composeReply(session, userMessage, decision, results);
      return composed.trim() || decision.reply.trim() || FALLBACK_REPLY;
    } catch (error) {
      logger.error('Failed to compose reply', { sessionId: session.sessionId, error: errorMessage(error) });
      return isCleanProse(decision.reply) ? decision.reply.trim() : FALLBACK_REPLY;
    }
  }

  private summarize(session: Session, message: string): SessionSummary {
    return {
      sessionId: session.sessionId,
      message,
      currentState: session.currentState,
      dataCollection: this.deps.stateMachine.getDataCollectionStatus(session),
    };
  }
}
