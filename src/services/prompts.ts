import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { CONVERSATION_MODES } from '../types/decision';
import { OPERATION_NAMES } from '../types/operations';

// The shape the model is asked to answer in. Parsing is done leniently by
// DecisionParser; this schema only documents the contract in the prompt.
const decisionContractSchema = z.object({
  mode: z
    .enum(CONVERSATION_MODES)
    .describe('informational for product questions, conversational for small talk, onboarding once the customer wants to buy'),
  reply: z.string().describe('What to say to the customer next, in plain text'),
  next_question: z
    .string()
    .nullable()
    .describe('The single next question to ask, or null when nothing is needed'),
  extracted: z
    .object({
      full_name: z.string().nullable(),
      date_of_birth: z.string().nullable().describe('As the customer wrote it, e.g. 15/08/1994'),
      age: z.number().nullable(),
      gender: z.enum(['male', 'female', 'other']).nullable(),
      occupation: z.string().nullable(),
      smoker: z.boolean().nullable(),
      mobile_number: z.string().nullable(),
      email: z.string().nullable(),
      pin_code: z.string().nullable(),
      annual_income: z.number().nullable().describe('Rupees per year'),
      coverage_amount: z.number().nullable().describe('Sum assured in rupees, e.g. 5000000 for 50 lakh'),
      policy_term: z.number().nullable().describe('Years'),
      premium_frequency: z.enum(['monthly', 'quarterly', 'half_yearly', 'yearly']).nullable(),
      riders_interest: z.array(z.string()).nullable(),
      payment_method: z.string().nullable(),
    })
    .partial()
    .describe('Only fields the customer stated in this conversation; null when unknown'),
  store_update: z
    .object({
      personalDetails: z.record(z.unknown()).optional(),
      quoteDetails: z.record(z.unknown()).optional(),
    })
    .describe('Mirror of extracted fields for the client form'),
  api_calls: z
    .array(
      z.object({
        name: z.enum(OPERATION_NAMES),
        params: z.record(z.unknown()),
      })
    )
    .describe('Backend operations to run this turn'),
  reasoning: z.string().describe('One sentence on why'),
  done: z.boolean().describe('True when the conversation has reached its goal'),
});

const DECISION_JSON_SCHEMA = JSON.stringify(
  zodToJsonSchema(decisionContractSchema, 'decision'),
  null,
  2
);

export const DECISION_SYSTEM_PROMPT = `You are a friendly, knowledgeable sales advisor for an online term life insurance plan with three variants:
- Life Shield: pure term cover with death and terminal illness benefit.
- Life Shield Plus: adds an accidental death benefit.
- Life Shield ROP: returns the premiums paid if the policy holder survives the term.

Work out what the customer wants. Answer questions directly; only collect details once the customer wants a quote or to buy.
Never ask for something that is already in the known customer data. Ask for one thing at a time.

Available operations for api_calls:
- premium_calculation {age, gender, coverage_amount, policy_term, premium_paying_term, smoker, occupation, payment_frequency}
- eligibility_check {age, smoker, annual_income, occupation, health_condition, family_medical_history}
- plan_comparison {}
- policy_documents {}
- payment_initiation {amount, payment_method, return_url}
- state_transition {target_state, context}

Respond with a single JSON object and nothing else, matching this JSON schema:
${DECISION_JSON_SCHEMA}`;

export const COMPOSE_SYSTEM_PROMPT = `You are a friendly term insurance sales advisor.
Write the reply to the customer in plain natural language. Do not output JSON, code or markdown tables.
Use the operation results you are given, quoting premiums and cover amounts exactly as provided in rupees.
If an operation failed, apologise briefly and say what you need to try again. Keep it under 120 words and end with at most one question.`;
