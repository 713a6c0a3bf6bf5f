import { AIProvider, ProviderContext } from '../types/ai-provider';
import { Decision, DecisionOutcome } from '../types/decision';
import { OperationResult } from '../types/operations';
import { Quote } from '../types/quote';
import { Session } from '../types/session';
import { logger } from '../utils/logger';
import { extractJsonObject, parseDecision } from './DecisionParser';
import { COMPOSE_SYSTEM_PROMPT, DECISION_SYSTEM_PROMPT } from './prompts';

const rupees = new Intl.NumberFormat('en-IN', {
  style: 'currency',
  currency: 'INR',
  maximumFractionDigits: 2,
});

export const formatRupees = (amount: number): string => rupees.format(amount);

export const summarizeQuotes = (quotes: readonly Quote[]): string =>
  quotes
    .map((quote) => {
      const flag = quote.recommended ? ' (recommended)' : '';
      return `${quote.variant}${flag}: ${formatRupees(quote.annualPremium)}/year or ${formatRupees(
        quote.modalPremiums.monthly
      )}/month for ${formatRupees(quote.sumAssured)} cover over ${quote.policyTerm} years`;
    })
    .join('\n');

const describeResult = (result: OperationResult): string => {
  if (!result.success) {
    return `${result.name} failed: ${result.error}`;
  }
  const { output } = result;
  switch (output.kind) {
    case 'premium_calculation':
      return [
        `premium_calculation succeeded:\n${summarizeQuotes(output.quotes)}`,
        ...output.warnings.map((warning) => `Note: ${warning}`),
      ].join('\n');
    case 'eligibility_check':
      return `eligibility_check: ${JSON.stringify(output.eligibility)}`;
    case 'plan_comparison':
      return `plan_comparison: ${JSON.stringify(output.plans)}`;
    case 'policy_documents':
      return `policy_documents: ${output.documents.join(', ')}`;
    case 'payment_initiation':
      return `payment_initiation: payment ${output.paymentId} of ${formatRupees(output.amount)} is ${output.status}, pay at ${output.paymentUrl}`;
    case 'state_transition':
      return `state_transition: moved from ${output.fromState} to ${output.toState}`;
  }
};

/**
 * Talks to the language model twice per turn: once for a structured
 * decision, once (when needed) for the customer-facing reply.
 */
export class AIService {
  constructor(
    private readonly provider: AIProvider,
    private readonly historyWindow: number
  ) {}

  async decide(session: Session, userMessage: string, attachments: string[] = []): Promise<DecisionOutcome> {
    const attachmentLine =
      attachments.length > 0 ? `ATTACHMENTS: ${attachments.join(', ')}\n\n` : '';
    const prompt =
      `Current user message: "${userMessage}"\n\n` +
      attachmentLine +
      `CONTEXT - ALREADY KNOWN DATA: ${JSON.stringify(session.customerData)}\n\n` +
      `CURRENT STATE: ${session.currentState}\n\n` +
      'INSTRUCTIONS:\n' +
      '1. Detect intent: informational, conversational or onboarding.\n' +
      "2. Don't force data collection for casual questions.\n" +
      '3. Use the known data; never ask for it again.\n' +
      'Return JSON following the schema in your system prompt.';

    const raw = await this.provider.generateResponse(
      prompt,
      DECISION_SYSTEM_PROMPT,
      this.buildContext(session, userMessage)
    );
    const outcome = parseDecision(raw);
    logger.info('Decision received', {
      sessionId: session.sessionId,
      parsed: outcome.parsed,
      mode: outcome.decision.mode,
      operations: outcome.decision.operations.map((operation) => operation.name),
    });
    return outcome;
  }

  async composeReply(
    session: Session,
    userMessage: string,
    decision: Decision,
    results: OperationResult[]
  ): Promise<string> {
    const quotes = session.quoteData.quotes ?? [];
    const prompt = [
      `Customer message: "${userMessage}"`,
      `Draft reply: ${decision.reply || '(none)'}`,
      decision.nextQuestion ? `Next question to ask: ${decision.nextQuestion}` : '',
      results.length > 0
        ? `Operation results:\n${results.map(describeResult).join('\n')}`
        : 'No operations were run.',
      quotes.length > 0 ? `Current quotes:\n${summarizeQuotes(quotes)}` : '',
      'Write the final reply to the customer.',
    ]
      .filter(Boolean)
      .join('\n\n');

    const text = (
      await this.provider.generateResponse(prompt, COMPOSE_SYSTEM_PROMPT, this.buildContext(session, userMessage))
    ).trim();

    // Models sometimes answer in the decision format anyway.
    const structured = extractJsonObject(text);
    if (structured && typeof structured.reply === 'string' && structured.reply.trim()) {
      return structured.reply.trim();
    }
    return text || decision.reply;
  }

  private buildContext(session: Session, userMessage: string): ProviderContext {
    const recent =
      this.historyWindow > 0 ? session.conversationHistory.slice(-this.historyWindow) : [];
    return {
      history: recent.map((turn) => ({ user: turn.userMessage, assistant: turn.botResponse })),
      customerData: { ...session.customerData },
      currentState: session.currentState,
      userMessage,
    };
  }
}
