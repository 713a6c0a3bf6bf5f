export interface ChatExchange {
  user: string;
  assistant: string;
}

export interface ProviderContext {
  history?: ChatExchange[];
  customerData?: Record<string, unknown>;
  currentState?: string;
  extra?: Record<string, unknown>;
  // The customer's own words, used to pick a local reply when the model is unreachable.
  userMessage?: string;
}

export interface AIProvider {
  generateResponse(prompt: string, systemPrompt?: string, context?: ProviderContext): Promise<string>;
  healthCheck(): Promise<boolean>;
}
