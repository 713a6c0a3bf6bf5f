import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const DATA_DIR = path.resolve(__dirname, '../../data');

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  CORS_ORIGINS: z.string().default('*'),
  LOG_LEVEL: z.string().default('info'),

  TOGETHER_API_KEY: z.string().default(''),
  TOGETHER_MODEL: z
    .string()
    .default('meta-llama/Meta-Llama-3.1-70B-Instruct-Turbo'),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LLM_MAX_RETRIES: z.coerce.number().int().min(1).default(3),
  LLM_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1_000),
  LLM_HISTORY_WINDOW: z.coerce.number().int().min(0).default(5),

  STORAGE_DRIVER: z.enum(['file', 'mongo']).default('file'),
  MONGODB_URI: z.string().default('mongodb://127.0.0.1:27017/term-sales'),
  SESSIONS_DIR: z.string().default('./sessions'),
  CONVERSATION_LOG_PATH: z.string().default('./data/conversations.jsonl'),
  MAX_SESSIONS: z.coerce.number().int().positive().default(1_000),

  PREMIUM_RATES_PATH: z
    .string()
    .default(path.join(DATA_DIR, 'premium-rates.json')),
  PRODUCT_CATALOG_PATH: z
    .string()
    .default(path.join(DATA_DIR, 'products.json')),

  AUTO_ADVANCE_THRESHOLD: z.coerce.number().min(0).max(100).default(80),
  MIN_ENTRY_AGE: z.coerce.number().int().default(18),
  MAX_ENTRY_AGE: z.coerce.number().int().default(65),
  MIN_COVERAGE: z.coerce.number().default(5_000_000),
  MAX_COVERAGE: z.coerce.number().default(200_000_000),
  MIN_POLICY_TERM: z.coerce.number().int().default(5),
  MAX_POLICY_TERM: z.coerce.number().int().default(40),
  MIN_ANNUAL_INCOME: z.coerce.number().default(100_000),

  PAYMENT_SUCCESS_RATE: z.coerce.number().min(0).max(1).default(0.85),
  PAYMENT_INITIAL_DELAY_MS: z.coerce.number().int().min(0).default(2_000),
  PAYMENT_PROCESSING_MIN_MS: z.coerce.number().int().min(0).default(5_000),
  PAYMENT_PROCESSING_MAX_MS: z.coerce.number().int().min(0).default(15_000),
  PAYMENT_GATEWAY_URL: z
    .string()
    .default('https://mock-gateway.example.com'),
  PAYMENT_RETURN_URL: z
    .string()
    .default('http://localhost:3000/payment/callback'),
});

export interface SalesPolicy {
  autoAdvanceThreshold: number;
  minEntryAge: number;
  maxEntryAge: number;
  minCoverage: number;
  maxCoverage: number;
  minPolicyTerm: number;
  maxPolicyTerm: number;
  minAnnualIncome: number;
  historyWindow: number;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env) => {
  const parsed = envSchema.parse(env);

  const policy: SalesPolicy = {
    autoAdvanceThreshold: parsed.AUTO_ADVANCE_THRESHOLD,
    minEntryAge: parsed.MIN_ENTRY_AGE,
    maxEntryAge: parsed.MAX_ENTRY_AGE,
    minCoverage: parsed.MIN_COVERAGE,
    maxCoverage: parsed.MAX_COVERAGE,
    minPolicyTerm: parsed.MIN_POLICY_TERM,
    maxPolicyTerm: parsed.MAX_POLICY_TERM,
    minAnnualIncome: parsed.MIN_ANNUAL_INCOME,
    historyWindow: parsed.LLM_HISTORY_WINDOW,
  };

  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    corsOrigins: parsed.CORS_ORIGINS.split(',').map((origin) => origin.trim()),
    logLevel: parsed.LOG_LEVEL,
    together: {
      apiKey: parsed.TOGETHER_API_KEY,
      model: parsed.TOGETHER_MODEL,
      timeoutMs: parsed.LLM_TIMEOUT_MS,
      maxRetries: parsed.LLM_MAX_RETRIES,
      retryBaseDelayMs: parsed.LLM_RETRY_BASE_DELAY_MS,
    },
    storage: {
      driver: parsed.STORAGE_DRIVER,
      mongoUri: parsed.MONGODB_URI,
      sessionsDir: parsed.SESSIONS_DIR,
      conversationLogPath: parsed.CONVERSATION_LOG_PATH,
      maxSessions: parsed.MAX_SESSIONS,
    },
    data: {
      premiumRatesPath: parsed.PREMIUM_RATES_PATH,
      productCatalogPath: parsed.PRODUCT_CATALOG_PATH,
    },
    payment: {
      successRate: parsed.PAYMENT_SUCCESS_RATE,
      initialDelayMs: parsed.PAYMENT_INITIAL_DELAY_MS,
      processingDelayMs: {
        min: parsed.PAYMENT_PROCESSING_MIN_MS,
        max: Math.max(parsed.PAYMENT_PROCESSING_MIN_MS, parsed.PAYMENT_PROCESSING_MAX_MS),
      },
      gatewayBaseUrl: parsed.PAYMENT_GATEWAY_URL,
      defaultReturnUrl: parsed.PAYMENT_RETURN_URL,
    },
    policy,
  };
};

export type AppConfig = ReturnType<typeof loadConfig>;

const config = loadConfig();

export default config;
