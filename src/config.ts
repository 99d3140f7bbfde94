import 'dotenv/config';
import { z } from 'zod';

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  ALLOWED_ORIGINS: z.string().default('http://localhost:3000'),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(60),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SESSION_TIMEOUT_MINUTES: z.coerce.number().positive().default(30),
  SESSION_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  HISTORY_CAPACITY: z.coerce.number().int().positive().default(10_000),
  HANDLER_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  MIN_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.3),
  MULTI_INTENT_THRESHOLD: z.coerce.number().min(0).max(1).default(0.6),
  DEFAULT_LANGUAGE: z.string().min(2).default('en'),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
});

export interface AppConfig {
  nodeEnv: string;
  port: number;
  allowedOrigins: string[];
  rateLimitPerMinute: number;
  logLevel: string;
  sessionTimeoutMs: number;
  sessionSweepIntervalMs: number;
  historyCapacity: number;
  handlerTimeoutMs: number;
  minConfidence: number;
  multiIntentThreshold: number;
  defaultLanguage: string;
  openaiApiKey?: string;
  openaiModel: string;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvSchema.parse(env);
  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    allowedOrigins: parsed.ALLOWED_ORIGINS.split(',').map((origin) => origin.trim()).filter(Boolean),
    rateLimitPerMinute: parsed.RATE_LIMIT_PER_MINUTE,
    logLevel: parsed.LOG_LEVEL,
    sessionTimeoutMs: parsed.SESSION_TIMEOUT_MINUTES * 60_000,
    sessionSweepIntervalMs: parsed.SESSION_SWEEP_INTERVAL_MS,
    historyCapacity: parsed.HISTORY_CAPACITY,
    handlerTimeoutMs: parsed.HANDLER_TIMEOUT_MS,
    minConfidence: parsed.MIN_CONFIDENCE,
    multiIntentThreshold: parsed.MULTI_INTENT_THRESHOLD,
    defaultLanguage: parsed.DEFAULT_LANGUAGE,
    openaiApiKey: parsed.OPENAI_API_KEY || undefined,
    openaiModel: parsed.OPENAI_MODEL,
  };
};

export const config = loadConfig();
