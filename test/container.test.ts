import { loadConfig } from '../src/config';
import { createServices, Services } from '../src/container';
import { PaymentMethod } from '../src/types/customer';
import { logger } from '../src/utils/logger';
import { InMemoryConversationLog, InMemorySessionRepository, ScriptedProvider } from './helpers/fakes';

describe('createServices', () => {
  let services: Services | undefined;
  const initialLevel = logger.level;

  afterEach(() => {
    services?.shutdown();
    services = undefined;
    logger.level = initialLevel;
  });

  const build = (env: Record<string, string>) =>
    createServices(loadConfig(env), {
      provider: new ScriptedProvider(),
      sessionRepository: new InMemorySessionRepository(),
      conversationLog: new InMemoryConversationLog(),
    });

  it('should apply the configured log level', () => {
    services = build({ LOG_LEVEL: 'debug' });

    expect(logger.level).toBe('debug');
  });

  it('should feed settled payments back into their session', async () => {
    services = build({ PAYMENT_SUCCESS_RATE: '1' });
    const { conversationManager, paymentService } = services;
    await conversationManager.startSession('wired-1');
    const { paymentId } = await paymentService.initiatePayment({
      sessionId: 'wired-1',
      amount: 900,
      paymentMethod: PaymentMethod.UPI,
      customerDetails: {},
      policyDetails: {},
      returnUrl: 'http://localhost:3000/payment/return',
    });

    await paymentService.processWebhook({ payment_id: paymentId, status: 'failed', failureReason: 'Card declined' });

    let session = await conversationManager.getSession('wired-1');
    for (let attempt = 0; attempt < 20 && !session.paymentData.status; attempt += 1) {
      await new Promise((resolve) => setImmediate(resolve));
      session = await conversationManager.getSession('wired-1');
    }
    expect(session.paymentData).toMatchObject({ paymentId, status: 'failed', failureReason: 'Card declined' });
  });
});
