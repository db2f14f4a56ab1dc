// services/signal-relay/src/config.ts
import { z } from 'zod';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development','test','production']).default('development'),
  PORT: z.coerce.number().int().positive().default(8000),

  TV_WEBHOOK_SECRET: z.string().min(1),
  SIGNATURE_HEADER: z.string().min(1).default('x-signature'),

  TG_BOT_TOKEN: z.string().min(1),
  TG_CHAT_ID: z.string().regex(/^(@\w+|-?\d+)$/, 'must be numeric or start with @'),
  TG_API_BASE: z.string().url().default('https://api.telegram.org'),
  TG_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  TG_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  TG_RETRY_DELAY_MS: z.coerce.number().nonnegative().default(1000),
  TG_RETRY_BACKOFF: z.coerce.number().min(1).default(2),
  TG_RATE_LIMIT: z.coerce.number().positive().default(30),

  WEBHOOK_BUDGET_MS: z.coerce.number().positive().default(150),

  IDEMPOTENCY_TTL_MS: z.coerce.number().int().positive().default(300_000),
  IDEMPOTENCY_SWEEP_MS: z.coerce.number().int().positive().default(60_000),
  IDEMPOTENCY_STORE: z.enum(['memory', 'redis']).default('memory'),
  REDIS_URL: z.string().default('redis://127.0.0.1:6379'),

  QUEUE_CAPACITY: z.coerce.number().int().positive().default(1000),
  QUEUE_OVERFLOW: z.enum(['reject', 'drop']).default('reject'),
  DISPATCH_WORKERS: z.coerce.number().int().min(1).max(32).default(2),

  CORS_ALLOW_ORIGINS: z.string().optional(),
  LOG_LEVEL: z.enum(['fatal','error','warn','info','debug','trace','silent']).default('info'),
  LOG_PRETTY: z.union([z.literal('1'), z.literal('0')]).default('0'),
});

export type OverflowPolicy = z.infer<typeof EnvSchema>['QUEUE_OVERFLOW'];

export class ConfigError extends Error {
  constructor(readonly issues: Record<string, string[] | undefined>) {
    super(`invalid environment: ${Object.keys(issues).join(', ')}`);
    this.name = 'ConfigError';
  }
}

function parseCorsOrigins(value?: string): '*' | string[] | undefined {
  if (!value) return undefined;
  if (value.trim() === '*') return '*';
  const origins = value
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);
  return origins.length ? origins : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) throw new ConfigError(parsed.error.flatten().fieldErrors);
  const e = parsed.data;

  return {
    env: e.NODE_ENV,
    port: e.PORT,

    webhook: {
      secret: e.TV_WEBHOOK_SECRET,
      signatureHeader: e.SIGNATURE_HEADER.toLowerCase(),
      budgetMs: e.WEBHOOK_BUDGET_MS,
    },

    telegram: {
      apiBase: e.TG_API_BASE.replace(/\/$/, ''),
      botToken: e.TG_BOT_TOKEN,
      chatId: e.TG_CHAT_ID,
      timeoutMs: e.TG_TIMEOUT_MS,
      rateLimitPerSec: e.TG_RATE_LIMIT,
    },

    retry: {
      maxAttempts: e.TG_RETRY_ATTEMPTS,
      initialDelayMs: e.TG_RETRY_DELAY_MS,
      multiplier: e.TG_RETRY_BACKOFF,
    },

    idempotency: {
      store: e.IDEMPOTENCY_STORE,
      ttlMs: e.IDEMPOTENCY_TTL_MS,
      sweepIntervalMs: e.IDEMPOTENCY_SWEEP_MS,
    },
    redisUrl: e.REDIS_URL,

    queue: {
      capacity: e.QUEUE_CAPACITY,
      overflow: e.QUEUE_OVERFLOW,
      workers: e.DISPATCH_WORKERS,
    },

    logLevel: e.LOG_LEVEL,
    logPretty: e.LOG_PRETTY === '1',
    cors: {
      origins: parseCorsOrigins(e.CORS_ALLOW_ORIGINS),
    },
  } as const;
}

export type AppConfig = ReturnType<typeof loadConfig>;
