import { PaymentMethod } from './customer';

export enum PaymentStatus {
  INITIATED = 'initiated',
  PROCESSING = 'processing',
  SUCCESS = 'success',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
  REFUNDED = 'refunded',
}

export interface PaymentRequest {
  sessionId: string;
  amount: number;
  currency?: string;
  paymentMethod: PaymentMethod;
  customerDetails: Record<string, unknown>;
  policyDetails: Record<string, unknown>;
  returnUrl: string;
  webhookUrl?: string;
}

export interface PaymentRecord {
  paymentId: string;
  transactionId: string;
  sessionId: string;
  status: PaymentStatus;
  amount: number;
  currency: string;
  paymentMethod: PaymentMethod;
  paymentUrl: string;
  returnUrl: string;
  gatewayResponse: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
}

export interface WebhookAck {
  status: 'success' | 'error';
  message: string;
}

export interface PaymentReceipt {
  receiptId: string;
  paymentId: string;
  transactionId: string;
  amount: number;
  currency: string;
  paymentMethod: PaymentMethod;
  paidAt: string | null;
  authorizationCode: string | null;
  bankReference: string | null;
  merchant: { name: string; merchantId: string };
  receiptUrl: string;
}

export interface PaymentStatistics {
  totalPayments: number;
  statusBreakdown: Partial<Record<PaymentStatus, number>>;
  totalSuccessfulAmount: number;
  successRate: number;
  failureRate: number;
}

export type PaymentListener = (payment: PaymentRecord) => void | Promise<void>;
