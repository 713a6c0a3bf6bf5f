import { z } from 'zod';
import {
  CONVERSATION_MODES,
  Decision,
  DecisionOutcome,
  OperationCall,
  fallbackDecision,
} from '../types/decision';
import { isRecord } from '../utils/coerce';
import { logger } from '../utils/logger';

const FENCE_PATTERN = /```(?:json)?\s*([\s\S]*?)```/i;

const looseRecord = z.record(z.unknown());

const decisionSchema = z.object({
  mode: z
    .preprocess(
      (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
      z.enum(CONVERSATION_MODES)
    )
    .catch('conversational'),
  reply: z.string().catch(''),
  next_question: z.string().nullable().catch(null),
  extracted: looseRecord.catch({}),
  store_update: z
    .object({
      personalDetails: looseRecord.optional().catch(undefined),
      quoteDetails: looseRecord.optional().catch(undefined),
    })
    .catch({}),
  api_calls: z.array(z.unknown()).catch([]),
  reasoning: z.string().catch(''),
  done: z.boolean().catch(false),
});

const tryParseObject = (text: string): Record<string, unknown> | null => {
  try {
    const value: unknown = JSON.parse(text);
    return isRecord(value) ? value : null;
  } catch {
    return null;
  }
};

/**
 * Returns the first balanced `{...}` span in `text`. Braces inside JSON
 * strings (including escaped quotes) do not count towards the balance.
 */
export const findBalancedObject = (text: string): string | null => {
  const start = text.indexOf('{');
  if (start === -1) {
    return null;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let index = start; index < text.length; index += 1) {
    const char = text[index];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if (char === '{') {
      depth += 1;
    } else if (char === '}') {
      depth -= 1;
      if (depth === 0) {
        return text.slice(start, index + 1);
      }
    }
  }
  return null;
};

/**
 * Recovers a JSON object from model output: the text as is, then the body
 * of a code fence, then the first balanced object anywhere in the text.
 */
export const extractJsonObject = (raw: string): Record<string, unknown> | null => {
  const text = raw.trim();

  const direct = tryParseObject(text);
  if (direct) {
    return direct;
  }

  const fenced = FENCE_PATTERN.exec(text);
  if (fenced) {
    const fromFence = tryParseObject(fenced[1].trim());
    if (fromFence) {
      return fromFence;
    }
  }

  const span = findBalancedObject(text);
  return span ? tryParseObject(span) : null;
};

const toOperationCalls = (entries: unknown[]): OperationCall[] =>
  entries.flatMap((entry) => {
    if (!isRecord(entry) || typeof entry.name !== 'string' || !entry.name.trim()) {
      return [];
    }
    return [{ name: entry.name.trim(), params: isRecord(entry.params) ? entry.params : {} }];
  });

export const parseDecision = (raw: string): DecisionOutcome => {
  const candidate = extractJsonObject(raw);
  if (!candidate) {
    logger.warn('Decision output was not JSON, using it as a plain reply', {
      preview: raw.slice(0, 120),
    });
    return { decision: fallbackDecision(raw), raw, parsed: false };
  }

  const fields = decisionSchema.parse(candidate);
  const decision: Decision = {
    mode: fields.mode,
    reply: fields.reply,
    nextQuestion: fields.next_question,
    extracted: fields.extracted,
    storeUpdate: {
      ...(fields.store_update.personalDetails ? { personalDetails: fields.store_update.personalDetails } : {}),
      ...(fields.store_update.quoteDetails ? { quoteDetails: fields.store_update.quoteDetails } : {}),
    },
    operations: toOperationCalls(fields.api_calls),
    reasoning: fields.reasoning,
    done: fields.done,
  };
  return { decision, raw, parsed: true };
};
