import { Router } from 'express';
import { z } from 'zod';
import { asyncHandler } from '../middleware/errorHandler';
import { ConversationManager } from '../services/ConversationManager';
import { MockPaymentService } from '../services/PaymentService';
import { PaymentNotFoundError, ValidationError } from '../utils/errors';

const initiateBody = z.object({
  sessionId: z.string().trim().min(1),
  paymentMethod: z.string().trim().min(1),
  amount: z.number().positive().optional(),
  returnUrl: z.string().url().optional(),
});

export interface PaymentRouterDeps {
  conversationManager: ConversationManager;
  paymentService: MockPaymentService;
}

export const createPaymentRouter = ({ conversationManager, paymentService }: PaymentRouterDeps): Router => {
  const router = Router();

  // Goes through the same operation as a chat turn so the session is updated too.
  router.post(
    '/initiate',
    asyncHandler(async (req, res) => {
      const body = initiateBody.parse(req.body);
      const result = await conversationManager.executeOperation(body.sessionId, {
        name: 'payment_initiation',
        params: {
          payment_method: body.paymentMethod,
          ...(body.amount !== undefined ? { amount: body.amount } : {}),
          ...(body.returnUrl ? { return_url: body.returnUrl } : {}),
        },
      });
      if (!result.success) {
        throw new ValidationError(result.error);
      }
      res.status(201).json({ success: true, ...result.output, message: 'Payment initiated successfully' });
    })
  );

  router.get(
    '/status/:paymentId',
    asyncHandler(async (req, res) => {
      const payment = await paymentService.getPaymentStatus(req.params.paymentId);
      if (!payment) {
        throw new PaymentNotFoundError(req.params.paymentId);
      }
      res.json({
        paymentId: payment.paymentId,
        status: payment.status,
        transactionId: payment.transactionId,
        paymentUrl: payment.paymentUrl,
        amount: payment.amount,
        currency: payment.currency,
        createdAt: payment.createdAt.toISOString(),
        updatedAt: payment.updatedAt.toISOString(),
      });
    })
  );

  router.post(
    '/webhook',
    asyncHandler(async (req, res) => {
      const ack = await paymentService.processWebhook(req.body);
      res.status(ack.status === 'success' ? 200 : 400).json(ack);
    })
  );

  router.post(
    '/cancel/:paymentId',
    asyncHandler(async (req, res) => {
      const cancelled = await paymentService.cancelPayment(req.params.paymentId);
      if (!cancelled) {
        throw new ValidationError('Payment cannot be cancelled');
      }
      res.json({ success: true, message: 'Payment cancelled successfully' });
    })
  );

  router.get(
    '/receipt/:paymentId',
    asyncHandler(async (req, res) => {
      res.json(await paymentService.generatePaymentReceipt(req.params.paymentId));
    })
  );

  router.get('/statistics', (_req, res) => {
    res.json(paymentService.getPaymentStatistics());
  });

  return router;
};
