import Together from 'together-ai';
import { CompletionCreateParamsNonStreaming } from 'together-ai/resources/chat/completions';
import { AIProvider, ProviderContext } from '../../types/ai-provider';
import { logger } from '../../utils/logger';

type ChatMessages = CompletionCreateParamsNonStreaming['messages'];

export interface TogetherProviderOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  temperature?: number;
  sleep?: (ms: number) => Promise<void>;
}

const FALLBACK_REPLIES = {
  greeting: "Hello! I'm here to help you find the right term insurance plan. How can I assist you today?",
  quote: "I'd be happy to help you with a quote. Let me collect some basic information from you first.",
  documents:
    'I can help you with document upload and verification. Please make sure your documents are clear and in PDF, JPG or PNG format.',
  payment:
    "For payment I'll guide you through our secure payment gateway. Your policy is activated once the payment is confirmed.",
  error:
    "I apologize, I'm having temporary technical difficulties. Please try again in a moment.",
};

const FALLBACK_KEYWORDS: Array<[RegExp, string]> = [
  [/\b(hello|hi|hey|start)\b/, FALLBACK_REPLIES.greeting],
  [/\b(quote|premium|price|cost)\b/, FALLBACK_REPLIES.quote],
  [/\b(document|documents|upload|kyc)\b/, FALLBACK_REPLIES.documents],
  [/\b(payment|pay|buy)\b/, FALLBACK_REPLIES.payment],
];

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class TogetherAIProvider implements AIProvider {
  private together: Together;
  public readonly model: string;
  private readonly options: TogetherProviderOptions;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: TogetherProviderOptions) {
    this.options = options;
    this.model = options.model;
    this.sleep = options.sleep ?? defaultSleep;
    // Retries are handled here so each attempt gets its own backoff and log line.
    this.together = new Together({
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  /**
   * Sends the prompt with recent history and known customer data. After
   * the last failed attempt a canned reply is returned; this never rejects.
   */
  async generateResponse(
    prompt: string,
    systemPrompt?: string,
    context: ProviderContext = {}
  ): Promise<string> {
    const messages = this.buildMessages(prompt, systemPrompt, context);
    const attempts = Math.max(1, this.options.maxRetries);

    for (let attempt = 0; attempt < attempts; attempt += 1) {
      try {
        const data: CompletionCreateParamsNonStreaming = {
          model: this.model,
          messages,
          temperature: this.options.temperature ?? 0.3,
        };
        const response = await this.together.chat.completions.create(data, {
          timeout: this.options.timeoutMs,
        });
        const content = response?.choices?.[0]?.message?.content;
        if (content && content.trim()) {
          return content;
        }
        throw new Error('No response from Together AI');
      } catch (error) {
        logger.warn('Together AI attempt failed', {
          attempt: attempt + 1,
          attempts,
          error: error instanceof Error ? error.message : 'Unknown error',
        });
        if (attempt < attempts - 1) {
          await this.sleep(this.options.retryBaseDelayMs * 2 ** attempt);
        }
      }
    }

    logger.error('All Together AI attempts failed, returning fallback reply', { attempts });
    return this.getFallbackResponse(context.userMessage ?? prompt);
  }

  async healthCheck(): Promise<boolean> {
    if (!this.options.apiKey) {
      return false;
    }
    try {
      const models = await this.together.models.list();
      return Array.isArray(models) && models.some((model) => model.id === this.model);
    } catch (error) {
      logger.warn('Together AI health check failed', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      return false;
    }
  }

  getFallbackResponse(text: string): string {
    const lowered = text.toLowerCase();
    const match = FALLBACK_KEYWORDS.find(([pattern]) => pattern.test(lowered));
    return match ? match[1] : FALLBACK_REPLIES.error;
  }

  private buildMessages(
    prompt: string,
    systemPrompt: string | undefined,
    context: ProviderContext
  ): ChatMessages {
    const messages: ChatMessages = [];
    if (systemPrompt) {
      messages.push({ role: 'system', content: systemPrompt });
    }

    for (const exchange of context.history ?? []) {
      if (exchange.user && exchange.assistant) {
        messages.push({ role: 'user', content: exchange.user });
        messages.push({ role: 'assistant', content: exchange.assistant });
      }
    }

    const contextParts: string[] = [];
    if (context.customerData && Object.keys(context.customerData).length > 0) {
      contextParts.push(`Customer Data: ${JSON.stringify(context.customerData)}`);
    }
    if (context.currentState) {
      contextParts.push(`Current State: ${context.currentState}`);
    }
    if (context.extra && Object.keys(context.extra).length > 0) {
      contextParts.push(`State Context: ${JSON.stringify(context.extra)}`);
    }
    if (contextParts.length > 0) {
      messages.push({ role: 'system', content: contextParts.join('\n') });
    }

    messages.push({ role: 'user', content: prompt });
    return messages;
  }
}
