import http from 'http';
import { z } from 'zod';
import { createApp } from '../../src/app';
import { loadConfig } from '../../src/config';
import { createServices, Services } from '../../src/container';
import { decisionJson, InMemoryConversationLog, InMemorySessionRepository, ScriptedProvider } from '../helpers/fakes';

interface ApiResponse {
  status: number;
  body: unknown;
}

const sessionView = z.object({
  currentState: z.string(),
  paymentData: z.object({ status: z.string().optional() }),
  policyData: z.object({ policyNumber: z.string().optional() }),
});

describe('HTTP API', () => {
  let services: Services;
  let server: http.Server;
  let baseUrl: string;

  const call = async (method: string, path: string, body?: unknown, rawBody?: string): Promise<ApiResponse> => {
    const response = await fetch(`${baseUrl}${path}`, {
      method,
      headers: { 'Content-Type': 'application/json' },
      body: rawBody ?? (body === undefined ? undefined : JSON.stringify(body)),
    });
    return { status: response.status, body: await response.json() };
  };

  beforeEach(async () => {
    const config = loadConfig({ NODE_ENV: 'test', CORS_ORIGINS: '*' });
    services = createServices(config, {
      provider: new ScriptedProvider([decisionJson({ reply: 'We offer three Life Shield plans.' })]),
      sessionRepository: new InMemorySessionRepository(),
      conversationLog: new InMemoryConversationLog(),
    });
    server = http.createServer(createApp(services, config));
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Server did not bind to a port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    services.shutdown();
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('should start a session and answer a message', async () => {
    const started = await call('POST', '/api/chat/session/start', { sessionId: 'api-1' });
    expect(started.status).toBe(201);
    expect(started.body).toMatchObject({ sessionId: 'api-1', currentState: 'onboarding' });

    const answered = await call('POST', '/api/chat/message', { sessionId: 'api-1', message: 'What plans do you have?' });
    expect(answered.status).toBe(200);
    expect(answered.body).toMatchObject({
      sessionId: 'api-1',
      message: 'We offer three Life Shield plans.',
      currentState: 'onboarding',
      actions: [],
    });

    const history = await call('GET', '/api/chat/session/api-1/history');
    expect(history.body).toMatchObject({ sessionId: 'api-1', totalMessages: 1 });

    const log = await call('GET', '/api/chat/session/api-1/log');
    expect(log.body).toMatchObject({
      sessionId: 'api-1',
      records: [{ userMessage: 'What plans do you have?', finalReply: 'We offer three Life Shield plans.' }],
    });

    const health = await call('GET', '/health');
    expect(health.body).toEqual({ status: 'healthy', environment: 'test', sessions: 1 });
  });

  it('should reject empty messages', async () => {
    const response = await call('POST', '/api/chat/message', { message: '   ' });
    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: { code: 'VALIDATION_ERROR', message: 'message: message is required' } });
  });

  it('should reject malformed JSON', async () => {
    const response = await call('POST', '/api/chat/message', undefined, '{"message":');
    expect(response).toEqual({
      status: 400,
      body: { error: { code: 'INVALID_JSON', message: 'Request body is not valid JSON' } },
    });
  });

  it('should report unknown sessions and routes', async () => {
    const missing = await call('GET', '/api/chat/session/nobody');
    expect(missing).toEqual({
      status: 404,
      body: { error: { code: 'SESSION_NOT_FOUND', message: 'Session not found: nobody' } },
    });

    const route = await call('GET', '/api/nothing-here');
    expect(route).toEqual({
      status: 404,
      body: { error: { code: 'NOT_FOUND', message: 'No route for GET /api/nothing-here' } },
    });
  });

  it('should refuse state transitions the flow does not allow', async () => {
    await call('POST', '/api/chat/session/start', { sessionId: 'api-2' });

    const refused = await call('POST', '/api/chat/session/api-2/transition', { targetState: 'policy_issued' });
    expect(refused).toEqual({
      status: 409,
      body: {
        error: {
          code: 'INVALID_STATE_TRANSITION',
          message: 'Invalid state transition from onboarding to policy_issued',
        },
      },
    });

    const moved = await call('POST', '/api/chat/session/api-2/transition', { targetState: 'eligibility_check' });
    expect(moved).toEqual({
      status: 200,
      body: { sessionId: 'api-2', fromState: 'onboarding', currentState: 'eligibility_check' },
    });
  });

  it('should carry a payment through to a policy number', async () => {
    await call('POST', '/api/chat/session/start', { sessionId: 'api-3' });

    const noQuote = await call('POST', '/api/payment/initiate', { sessionId: 'api-3', paymentMethod: 'upi' });
    expect(noQuote).toEqual({
      status: 400,
      body: { error: { code: 'VALIDATION_ERROR', message: 'A quote is needed before starting the payment' } },
    });

    const initiated = await call('POST', '/api/payment/initiate', {
      sessionId: 'api-3',
      paymentMethod: 'upi',
      amount: 1200,
    });
    expect(initiated.status).toBe(201);
    const { paymentId } = z.object({ paymentId: z.string() }).parse(initiated.body);

    const webhook = await call('POST', '/api/payment/webhook', { payment_id: paymentId, status: 'success' });
    expect(webhook).toEqual({ status: 200, body: { status: 'success', message: 'Webhook processed' } });

    let session = sessionView.parse((await call('GET', '/api/chat/session/api-3')).body);
    for (let attempt = 0; attempt < 50 && !session.policyData.policyNumber; attempt += 1) {
      await new Promise((resolve) => setTimeout(resolve, 10));
      session = sessionView.parse((await call('GET', '/api/chat/session/api-3')).body);
    }
    expect(session.paymentData.status).toBe('success');
    expect(session.policyData.policyNumber).toMatch(/^TLP\d{8}API3/);

    const receipt = await call('GET', `/api/payment/receipt/${paymentId}`);
    expect(receipt.status).toBe(200);
    expect(receipt.body).toMatchObject({ paymentId, amount: 1200, currency: 'INR' });

    const statistics = await call('GET', '/api/payment/statistics');
    expect(statistics.body).toMatchObject({ totalPayments: 1, totalSuccessfulAmount: 1200 });
  });

  it('should reject webhooks for unknown payments', async () => {
    const response = await call('POST', '/api/payment/webhook', { payment_id: 'missing', status: 'success' });
    expect(response).toEqual({ status: 400, body: { status: 'error', message: 'Invalid webhook data' } });
  });
});
