import { format } from 'date-fns';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import {
  PaymentListener,
  PaymentReceipt,
  PaymentRecord,
  PaymentRequest,
  PaymentStatistics,
  PaymentStatus,
  WebhookAck,
} from '../types/payment';
import { PaymentNotFoundError, PaymentStateError } from '../utils/errors';
import { errorMessage, logger } from '../utils/logger';

export interface PaymentServiceOptions {
  successRate: number;
  initialDelayMs: number;
  processingDelayMs: { min: number; max: number };
  gatewayBaseUrl: string;
  merchant?: { name: string; merchantId: string };
  random?: () => number;
  now?: () => Date;
}

const FAILURE_REASONS = [
  'Insufficient funds',
  'Card declined by bank',
  'Transaction timeout',
  'Invalid card details',
  'Bank server unavailable',
];

const CANCELLABLE = new Set<PaymentStatus>([PaymentStatus.INITIATED, PaymentStatus.PROCESSING]);

const webhookSchema = z
  .object({
    payment_id: z.string().min(1),
    status: z.nativeEnum(PaymentStatus),
  })
  .passthrough();

/**
 * In-memory stand-in for a payment gateway. A payment settles on its own
 * timers: initiated, then processing, then success or failure. Nothing
 * here waits for settlement; callers poll or subscribe with onSettled.
 */
export class MockPaymentService {
  private payments = new Map<string, PaymentRecord>();
  private timers = new Map<string, NodeJS.Timeout>();
  private listeners: PaymentListener[] = [];
  private readonly random: () => number;
  private readonly now: () => Date;
  private readonly merchant: { name: string; merchantId: string };

  constructor(private readonly options: PaymentServiceOptions) {
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
    this.merchant = options.merchant ?? { name: 'Term Life Protect Insurance', merchantId: 'TERM_LIFE_PROTECT' };
  }

  async initiatePayment(request: PaymentRequest): Promise<PaymentRecord> {
    const paymentId = uuidv4();
    const createdAt = this.now();
    const currency = request.currency ?? 'INR';
    const record: PaymentRecord = {
      paymentId,
      transactionId: `TXN${format(createdAt, 'yyyyMMddHHmmss')}${paymentId.slice(0, 8)}`,
      sessionId: request.sessionId,
      status: PaymentStatus.INITIATED,
      amount: request.amount,
      currency,
      paymentMethod: request.paymentMethod,
      paymentUrl: `${this.options.gatewayBaseUrl}/pay/${paymentId}`,
      returnUrl: request.returnUrl,
      gatewayResponse: {
        gateway: 'MockPaymentGateway',
        merchantId: this.merchant.merchantId,
        amount: request.amount,
        currency,
        paymentMethod: request.paymentMethod,
        sessionId: request.sessionId,
      },
      createdAt,
      updatedAt: createdAt,
    };
    this.payments.set(paymentId, record);
    this.schedule(paymentId, this.options.initialDelayMs, () => this.startProcessing(paymentId));

    logger.info('Payment initiated', {
      paymentId,
      sessionId: request.sessionId,
      amount: request.amount,
      paymentMethod: request.paymentMethod,
    });
    return structuredClone(record);
  }

  async getPaymentStatus(paymentId: string): Promise<PaymentRecord | null> {
    const record = this.payments.get(paymentId);
    return record ? structuredClone(record) : null;
  }

  async cancelPayment(paymentId: string): Promise<boolean> {
    const record = this.payments.get(paymentId);
    if (!record || !CANCELLABLE.has(record.status)) {
      return false;
    }
    this.clearTimer(paymentId);
    this.update(record, PaymentStatus.CANCELLED, {
      cancelledAt: this.now().toISOString(),
      cancellationReason: 'User initiated cancellation',
    });
    logger.info('Payment cancelled', { paymentId });
    this.notify(record);
    return true;
  }

  async processWebhook(payload: unknown): Promise<WebhookAck> {
    const parsed = webhookSchema.safeParse(payload);
    if (!parsed.success) {
      return { status: 'error', message: 'Invalid webhook data' };
    }
    const record = this.payments.get(parsed.data.payment_id);
    if (!record) {
      return { status: 'error', message: 'Invalid webhook data' };
    }

    if (!CANCELLABLE.has(record.status)) {
      logger.warn('Webhook for a settled payment ignored', {
        paymentId: record.paymentId,
        status: record.status,
        received: parsed.data.status,
      });
      return { status: 'error', message: `Payment already ${record.status}` };
    }

    const { status, ...details } = parsed.data;
    if (!CANCELLABLE.has(status)) {
      this.clearTimer(record.paymentId);
    }
    this.update(record, status, details);
    logger.info('Payment webhook processed', { paymentId: record.paymentId, status });
    this.notify(record);
    return { status: 'success', message: 'Webhook processed' };
  }

  async generatePaymentReceipt(paymentId: string): Promise<PaymentReceipt> {
    const record = this.payments.get(paymentId);
    if (!record) {
      throw new PaymentNotFoundError(paymentId);
    }
    if (record.status !== PaymentStatus.SUCCESS) {
      throw new PaymentStateError(`Payment ${paymentId} is ${record.status}, receipts are only issued for successful payments`);
    }
    const text = (key: string): string | null => {
      const value = record.gatewayResponse[key];
      return typeof value === 'string' ? value : null;
    };

    return {
      receiptId: `RCP${format(this.now(), 'yyyyMMddHHmmss')}${paymentId.slice(0, 6)}`,
      paymentId,
      transactionId: record.transactionId,
      amount: record.amount,
      currency: record.currency,
      paymentMethod: record.paymentMethod,
      paidAt: text('successAt'),
      authorizationCode: text('authorizationCode'),
      bankReference: text('bankReferenceNumber'),
      merchant: { ...this.merchant },
      receiptUrl: `${this.options.gatewayBaseUrl}/receipt/${paymentId}`,
    };
  }

  getPaymentStatistics(): PaymentStatistics {
    const statusBreakdown: Partial<Record<PaymentStatus, number>> = {};
    let totalSuccessfulAmount = 0;
    for (const record of this.payments.values()) {
      statusBreakdown[record.status] = (statusBreakdown[record.status] ?? 0) + 1;
      if (record.status === PaymentStatus.SUCCESS) {
        totalSuccessfulAmount += record.amount;
      }
    }
    const total = this.payments.size;
    return {
      totalPayments: total,
      statusBreakdown,
      totalSuccessfulAmount,
      successRate: total === 0 ? 0 : (statusBreakdown[PaymentStatus.SUCCESS] ?? 0) / total,
      failureRate: total === 0 ? 0 : (statusBreakdown[PaymentStatus.FAILED] ?? 0) / total,
    };
  }

  generatePolicyNumber(sessionId: string, paymentId: string): string {
    const compact = (value: string, length: number) =>
      value.replace(/[^a-zA-Z0-9]/g, '').slice(0, length).toUpperCase();
    return `TLP${format(this.now(), 'yyyyMMdd')}${compact(sessionId, 8)}${compact(paymentId, 4)}`;
  }

  // Listeners get a snapshot each time a payment reaches a final status.
  onSettled(listener: PaymentListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((candidate) => candidate !== listener);
    };
  }

  shutdown(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }

  private startProcessing(paymentId: string): void {
    const record = this.payments.get(paymentId);
    if (!record || record.status !== PaymentStatus.INITIATED) {
      return;
    }
    this.update(record, PaymentStatus.PROCESSING, { processingStartedAt: this.now().toISOString() });

    const { min, max } = this.options.processingDelayMs;
    const delay = min + Math.floor(this.random() * (max - min + 1));
    this.schedule(paymentId, delay, () => this.settle(paymentId));
  }

  private settle(paymentId: string): void {
    const record = this.payments.get(paymentId);
    if (!record || record.status !== PaymentStatus.PROCESSING) {
      return;
    }
    const digits = (low: number, high: number) => low + Math.floor(this.random() * (high - low + 1));

    if (this.random() < this.options.successRate) {
      this.update(record, PaymentStatus.SUCCESS, {
        successAt: this.now().toISOString(),
        authorizationCode: `AUTH${digits(100000, 999999)}`,
        gatewayTransactionId: `GTW${digits(1000000000, 9999999999)}`,
        bankReferenceNumber: `BRN${digits(1000000000, 9999999999)}`,
      });
      logger.info('Payment successful', { paymentId });
    } else {
      const reason = FAILURE_REASONS[Math.floor(this.random() * FAILURE_REASONS.length)] ?? FAILURE_REASONS[0];
      this.update(record, PaymentStatus.FAILED, {
        failedAt: this.now().toISOString(),
        failureReason: reason,
        errorCode: `ERR${digits(1000, 9999)}`,
      });
      logger.info('Payment failed', { paymentId, reason });
    }
    this.notify(record);
  }

  private update(record: PaymentRecord, status: PaymentStatus, details: Record<string, unknown>): void {
    record.status = status;
    record.updatedAt = this.now();
    record.gatewayResponse = { ...record.gatewayResponse, ...details };
  }

  private notify(record: PaymentRecord): void {
    if (CANCELLABLE.has(record.status)) {
      return;
    }
    for (const listener of this.listeners) {
      const snapshot = structuredClone(record);
      Promise.resolve()
        .then(() => listener(snapshot))
        .catch((error: unknown) => {
          logger.error('Payment listener failed', {
            paymentId: record.paymentId,
            error: errorMessage(error),
          });
        });
    }
  }

  private schedule(paymentId: string, delayMs: number, task: () => void): void {
    this.clearTimer(paymentId);
    const timer = setTimeout(() => {
      this.timers.delete(paymentId);
      task();
    }, delayMs);
    timer.unref();
    this.timers.set(paymentId, timer);
  }

  private clearTimer(paymentId: string): void {
    const timer = this.timers.get(paymentId);
    if (timer) {
      clearTimeout(timer);
      this.timers.delete(paymentId);
    }
  }
}
