import { TogetherAIProvider, TogetherProviderOptions } from '../../src/providers/together';

const mockCreate = jest.fn();
const mockList = jest.fn();

jest.mock('together-ai', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({
    chat: { completions: { create: (...args: unknown[]) => mockCreate(...args) } },
    models: { list: () => mockList() },
  })),
}));

const completion = (content: string | null) => ({ choices: [{ message: { content } }] });

describe('TogetherAIProvider', () => {
  let sleeps: number[];

  const createProvider = (overrides: Partial<TogetherProviderOptions> = {}) =>
    new TogetherAIProvider({
      apiKey: 'test-secret',
      model: 'test-model',
      timeoutMs: 1000,
      maxRetries: 3,
      retryBaseDelayMs: 100,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
      ...overrides,
    });

  beforeEach(() => {
    sleeps = [];
    mockCreate.mockReset();
    mockList.mockReset();
  });

  it('should send the system prompt, history and context before the message', async () => {
    mockCreate.mockResolvedValue(completion('Hello there'));
    const provider = createProvider();

    const reply = await provider.generateResponse('What does it cost?', 'You are an advisor.', {
      history: [{ user: 'hi', assistant: 'hello' }],
      customerData: { age: 30 },
      currentState: 'onboarding',
    });

    expect(reply).toBe('Hello there');
    expect(mockCreate).toHaveBeenCalledTimes(1);
    expect(mockCreate.mock.calls[0][0]).toEqual({
      model: 'test-model',
      temperature: 0.3,
      messages: [
        { role: 'system', content: 'You are an advisor.' },
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'hello' },
        { role: 'system', content: 'Customer Data: {"age":30}\nCurrent State: onboarding' },
        { role: 'user', content: 'What does it cost?' },
      ],
    });
    expect(mockCreate.mock.calls[0][1]).toEqual({ timeout: 1000 });
  });

  it('should retry with exponential backoff', async () => {
    mockCreate
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce(completion('   '))
      .mockResolvedValueOnce(completion('Third time lucky'));

    const reply = await createProvider().generateResponse('hi');

    expect(reply).toBe('Third time lucky');
    expect(mockCreate).toHaveBeenCalledTimes(3);
    expect(sleeps).toEqual([100, 200]);
  });

  it('should fall back to a canned reply after the last attempt', async () => {
    mockCreate.mockRejectedValue(new Error('503 Service Unavailable'));

    const reply = await createProvider().generateResponse('prompt text', undefined, {
      userMessage: 'Can I get a quote?',
    });

    expect(reply).toBe(
      "I'd be happy to help you with a quote. Let me collect some basic information from you first."
    );
    expect(mockCreate).toHaveBeenCalledTimes(3);
    expect(sleeps).toEqual([100, 200]);
  });

  it('should pick fallback replies by keyword', () => {
    const provider = createProvider();

    expect(provider.getFallbackResponse('hello')).toBe(
      "Hello! I'm here to help you find the right term insurance plan. How can I assist you today?"
    );
    expect(provider.getFallbackResponse('How do I upload my KYC?')).toMatch(/^I can help you with document upload/);
    expect(provider.getFallbackResponse('??')).toBe(
      "I apologize, I'm having temporary technical difficulties. Please try again in a moment."
    );
  });

  describe('healthCheck', () => {
    it('should be unhealthy without an API key', async () => {
      expect(await createProvider({ apiKey: '' }).healthCheck()).toBe(false);
      expect(mockList).not.toHaveBeenCalled();
    });

    it('should look for the configured model', async () => {
      mockList.mockResolvedValueOnce([{ id: 'other-model' }, { id: 'test-model' }]);
      expect(await createProvider().healthCheck()).toBe(true);

      mockList.mockResolvedValueOnce([{ id: 'other-model' }]);
      expect(await createProvider().healthCheck()).toBe(false);
    });

    it('should report unreachable APIs as unhealthy', async () => {
      mockList.mockRejectedValueOnce(new Error('ECONNREFUSED'));
      expect(await createProvider().healthCheck()).toBe(false);
    });
  });
});
