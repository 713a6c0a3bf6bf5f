export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class StateTransitionError extends AppError {
  constructor(
    public readonly fromState: string,
    public readonly toState: string
  ) {
    super(
      `Invalid state transition from ${fromState} to ${toState}`,
      'INVALID_STATE_TRANSITION',
      409
    );
  }
}

export class SessionNotFoundError extends AppError {
  constructor(public readonly sessionId: string) {
    super(`Session not found: ${sessionId}`, 'SESSION_NOT_FOUND', 404);
  }
}

// Persisted data that no longer decodes is fatal, never silently replaced.
export class SessionDataCorruptError extends AppError {
  constructor(
    public readonly sessionId: string,
    reason: string
  ) {
    super(
      `Stored session ${sessionId} could not be decoded: ${reason}`,
      'SESSION_DATA_CORRUPT',
      500
    );
  }
}

export class PaymentNotFoundError extends AppError {
  constructor(public readonly paymentId: string) {
    super(`Payment not found: ${paymentId}`, 'PAYMENT_NOT_FOUND', 404);
  }
}

export class PaymentStateError extends AppError {
  constructor(message: string) {
    super(message, 'PAYMENT_STATE_CONFLICT', 409);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

export class QuoteCalculationError extends AppError {
  constructor(message: string) {
    super(message, 'QUOTE_CALCULATION_FAILED', 422);
  }
}
