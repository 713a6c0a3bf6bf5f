import { Router } from 'express';
import { z } from 'zod';
import { ConversationManager } from '../services/ConversationManager';
import { AIProvider } from '../types/ai-provider';
import { SessionState } from '../types/session';
import { asyncHandler } from '../middleware/errorHandler';

const messageBody = z.object({
  sessionId: z.string().trim().min(1).optional(),
  message: z.string().trim().min(1, 'message is required'),
  attachments: z.array(z.string()).default([]),
});

const startBody = z.object({ sessionId: z.string().trim().min(1).optional() });

const transitionBody = z.object({
  targetState: z.nativeEnum(SessionState),
  context: z.record(z.unknown()).default({}),
});

export interface ChatRouterDeps {
  conversationManager: ConversationManager;
  provider: AIProvider;
}

export const createChatRouter = ({ conversationManager, provider }: ChatRouterDeps): Router => {
  const router = Router();

  router.post(
    '/session/start',
    asyncHandler(async (req, res) => {
      const { sessionId } = startBody.parse(req.body ?? {});
      res.status(201).json(await conversationManager.startSession(sessionId));
    })
  );

  router.post(
    '/message',
    asyncHandler(async (req, res) => {
      const body = messageBody.parse(req.body);
      res.json(await conversationManager.handleTurn(body.sessionId, body.message, body.attachments));
    })
  );

  router.get(
    '/session/:sessionId',
    asyncHandler(async (req, res) => {
      const session = await conversationManager.getSession(req.params.sessionId);
      res.json({
        sessionId: session.sessionId,
        currentState: session.currentState,
        customerData: session.customerData,
        selectedVariant: session.selectedVariant,
        quoteData: session.quoteData,
        paymentData: session.paymentData,
        policyData: session.policyData,
        formCompletion: session.formCompletion,
        createdAt: session.createdAt.toISOString(),
        updatedAt: session.updatedAt.toISOString(),
      });
    })
  );

  router.get(
    '/session/:sessionId/history',
    asyncHandler(async (req, res) => {
      const history = await conversationManager.getHistory(req.params.sessionId);
      res.json({ sessionId: req.params.sessionId, history, totalMessages: history.length });
    })
  );

  router.get(
    '/session/:sessionId/log',
    asyncHandler(async (req, res) => {
      const records = await conversationManager.getConversationLog(req.params.sessionId);
      res.json({ sessionId: req.params.sessionId, records });
    })
  );

  router.post(
    '/session/:sessionId/reset',
    asyncHandler(async (req, res) => {
      const summary = await conversationManager.resetSession(req.params.sessionId);
      res.json({ ...summary, message: 'Session reset successfully' });
    })
  );

  router.post(
    '/session/:sessionId/transition',
    asyncHandler(async (req, res) => {
      const { targetState, context } = transitionBody.parse(req.body);
      const { transition, session } = await conversationManager.transitionSession(
        req.params.sessionId,
        targetState,
        context
      );
      res.json({
        sessionId: session.sessionId,
        fromState: transition.fromState,
        currentState: session.currentState,
      });
    })
  );

  router.get(
    '/health',
    asyncHandler(async (_req, res) => {
      const llmHealthy = await provider.healthCheck();
      res.json({
        status: 'healthy',
        chatService: 'operational',
        llmService: llmHealthy ? 'operational' : 'degraded',
      });
    })
  );

  return router;
};
