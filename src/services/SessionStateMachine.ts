import { CustomerField } from '../types/customer';
import { DataCollectionStatus, FormGroup, Session, SessionState, StateTransition } from '../types/session';
import { StateTransitionError } from '../utils/errors';
import { logger } from '../utils/logger';
import { touch } from './SessionRecord';

export interface StateNode {
  id: SessionState;
  description: string;
  requiredFields: CustomerField[];
  allowedTransitions: SessionState[];
  nextState: SessionState | null;
  formGroup: FormGroup | null;
}

export interface StateMachineOptions {
  autoAdvanceThreshold?: number;
  requiredFields?: Partial<Record<SessionState, CustomerField[]>>;
}

export interface TransitionOptions {
  force?: boolean;
}

const DEFAULT_AUTO_ADVANCE_THRESHOLD = 80;

export class SessionStateMachine {
  private nodes: Map<SessionState, StateNode> = new Map();
  readonly autoAdvanceThreshold: number;

  constructor(options: StateMachineOptions = {}) {
    this.autoAdvanceThreshold = options.autoAdvanceThreshold ?? DEFAULT_AUTO_ADVANCE_THRESHOLD;
    this.initializeNodes(options.requiredFields ?? {});
  }

  private createNode(
    id: SessionState,
    description: string,
    required: CustomerField[],
    allowed: SessionState[],
    next: SessionState | null,
    formGroup: FormGroup | null
  ): StateNode {
    return {
      id,
      description,
      requiredFields: required,
      allowedTransitions: allowed,
      nextState: next,
      formGroup,
    };
  }

  private initializeNodes(overrides: Partial<Record<SessionState, CustomerField[]>>): void {
    const nodes = new Map<SessionState, StateNode>();
    const required = (state: SessionState, defaults: CustomerField[]) =>
      overrides[state] ?? defaults;

    nodes.set(SessionState.ONBOARDING, this.createNode(
      SessionState.ONBOARDING,
      'Collect basic personal details',
      required(SessionState.ONBOARDING, ['fullName', 'age', 'gender', 'mobileNumber', 'email']),
      [SessionState.ELIGIBILITY_CHECK],
      SessionState.ELIGIBILITY_CHECK,
      'personal_details'
    ));

    nodes.set(SessionState.ELIGIBILITY_CHECK, this.createNode(
      SessionState.ELIGIBILITY_CHECK,
      'Confirm location and tobacco use',
      required(SessionState.ELIGIBILITY_CHECK, ['pinCode', 'smoker']),
      [SessionState.PRODUCT_SELECTION, SessionState.ONBOARDING],
      SessionState.PRODUCT_SELECTION,
      'personal_details'
    ));

    nodes.set(SessionState.PRODUCT_SELECTION, this.createNode(
      SessionState.PRODUCT_SELECTION,
      'Choose cover amount and policy term',
      required(SessionState.PRODUCT_SELECTION, ['coverageAmount', 'policyTerm']),
      [SessionState.QUOTE_GENERATION],
      SessionState.QUOTE_GENERATION,
      'insurance_requirements'
    ));

    nodes.set(SessionState.QUOTE_GENERATION, this.createNode(
      SessionState.QUOTE_GENERATION,
      'Present quotes and pick a payment frequency',
      required(SessionState.QUOTE_GENERATION, ['premiumFrequency']),
      [SessionState.ADDON_RIDERS],
      SessionState.ADDON_RIDERS,
      'insurance_requirements'
    ));

    nodes.set(SessionState.ADDON_RIDERS, this.createNode(
      SessionState.ADDON_RIDERS,
      'Offer optional riders',
      required(SessionState.ADDON_RIDERS, []),
      [SessionState.PAYMENT_INITIATED],
      SessionState.PAYMENT_INITIATED,
      'rider_selection'
    ));

    nodes.set(SessionState.PAYMENT_INITIATED, this.createNode(
      SessionState.PAYMENT_INITIATED,
      'Collect payment',
      required(SessionState.PAYMENT_INITIATED, ['paymentMethod']),
      [SessionState.DOCUMENT_COLLECTION, SessionState.ADDON_RIDERS],
      null,
      'payment_details'
    ));

    nodes.set(SessionState.DOCUMENT_COLLECTION, this.createNode(
      SessionState.DOCUMENT_COLLECTION,
      'Collect KYC documents',
      required(SessionState.DOCUMENT_COLLECTION, []),
      [SessionState.POLICY_ISSUED],
      null,
      null
    ));

    nodes.set(SessionState.POLICY_ISSUED, this.createNode(
      SessionState.POLICY_ISSUED,
      'Policy issued',
      [],
      [],
      null,
      null
    ));

    this.nodes = nodes;
  }

  getNode(state: SessionState): StateNode {
    const node = this.nodes.get(state);
    if (!node) {
      throw new Error(`Unknown session state: ${state}`);
    }
    return node;
  }

  isTerminal(state: SessionState): boolean {
    return this.getNode(state).allowedTransitions.length === 0;
  }

  canTransition(from: SessionState, to: SessionState): boolean {
    return from === to || this.getNode(from).allowedTransitions.includes(to);
  }

  getMissingFields(session: Session, state: SessionState = session.currentState): CustomerField[] {
    return this.getNode(state).requiredFields.filter((field) => {
      const value = session.customerData[field];
      return value === undefined || value === null;
    });
  }

  getCompletionPercentage(session: Session, state: SessionState = session.currentState): number {
    const required = this.getNode(state).requiredFields;
    if (required.length === 0) {
      return 100;
    }
    const present = required.length - this.getMissingFields(session, state).length;
    return Math.floor((present * 100) / required.length);
  }

  /**
   * Moves the session to `to`, appending the audit entry in the same step.
   * Disallowed moves throw and leave the session untouched. `force` skips
   * the adjacency check but never leaves a terminal state.
   */
  transition(
    session: Session,
    to: SessionState,
    context: Record<string, unknown> = {},
    options: TransitionOptions = {},
    now: Date = new Date()
  ): StateTransition {
    const from = session.currentState;
    const leavingTerminal = this.isTerminal(from) && from !== to;
    if (leavingTerminal || (!options.force && !this.canTransition(from, to))) {
      throw new StateTransitionError(from, to);
    }

    const entry: StateTransition = {
      timestamp: now,
      fromState: from,
      toState: to,
      context: options.force ? { ...context, forced: true } : { ...context },
    };
    session.stateTransitions.push(entry);
    session.currentState = to;
    touch(session, now);

    logger.info('Session state transitioned', {
      sessionId: session.sessionId,
      fromState: from,
      toState: to,
      trigger: context.trigger,
    });
    return entry;
  }

  /**
   * Refreshes form progress for the current state and advances to the next
   * state once enough required fields are filled. States without required
   * fields are never advanced here.
   */
  checkAutoAdvance(
    session: Session,
    extractedFields: string[],
    now: Date = new Date()
  ): StateTransition | null {
    const node = this.getNode(session.currentState);
    const percentage = this.getCompletionPercentage(session);

    if (node.formGroup) {
      session.formCompletion[node.formGroup] = {
        completed: percentage >= this.autoAdvanceThreshold,
        completionPercentage: percentage,
      };
    }

    if (node.requiredFields.length === 0 || percentage < this.autoAdvanceThreshold) {
      return null;
    }
    if (!node.nextState || !this.canTransition(node.id, node.nextState)) {
      return null;
    }

    return this.transition(
      session,
      node.nextState,
      {
        trigger: 'auto_transition',
        completionPercentage: percentage,
        extractedFields,
      },
      {},
      now
    );
  }

  getDataCollectionStatus(session: Session): DataCollectionStatus {
    const collected = Object.entries(session.customerData)
      .filter(([, value]) => value !== undefined && value !== null)
      .map(([key]) => key);
    const missing = this.getMissingFields(session);

    return {
      collected,
      missing,
      completionPercentage: this.getCompletionPercentage(session),
      nextRequiredField: missing[0] ?? null,
    };
  }
}
