import type { Redis } from 'ioredis';
import type { AppConfig } from './config.js';
import { buildApp } from './app.js';
import { MemoryIdempotencyCache, RedisIdempotencyCache, type IdempotencyStore } from './cache/idempotency.js';
import { DeliveryQueue } from './queue/delivery-queue.js';
import { TokenBucket } from './services/rate-limiter.js';
import { TelegramClient, type MessagingClient } from './services/telegram.client.js';
import { OutboundDispatcher } from './services/dispatcher.js';
import { createRedis, redisHealth } from './redis/index.js';
import type { DeliveryTask } from './types/domain.js';
import { logger } from './logger.js';

export type RelayOverrides = {
  /** replaces the Telegram client as the delivery target */
  client?: MessagingClient;
  redis?: Redis;
};

/**
 * Builds every component once and passes them explicitly: the cache and the
 * rate limiter are the only shared mutable state, and both are owned here.
 */
export function createRelay(config: AppConfig, overrides: RelayOverrides = {}) {
  const telegram = new TelegramClient({
    apiBase: config.telegram.apiBase,
    botToken: config.telegram.botToken,
    chatId: config.telegram.chatId,
    timeoutMs: config.telegram.timeoutMs,
  });

  let memoryCache: MemoryIdempotencyCache | undefined;
  let redis: Redis | undefined;
  let cache: IdempotencyStore;
  if (config.idempotency.store === 'redis') {
    redis = overrides.redis ?? createRedis(config.redisUrl);
    cache = new RedisIdempotencyCache(redis, { ttlMs: config.idempotency.ttlMs });
  } else {
    memoryCache = new MemoryIdempotencyCache({
      ttlMs: config.idempotency.ttlMs,
      sweepIntervalMs: config.idempotency.sweepIntervalMs,
      logger,
    });
    cache = memoryCache;
  }

  const queue = new DeliveryQueue<DeliveryTask>({ capacity: config.queue.capacity });
  const limiter = new TokenBucket(config.telegram.rateLimitPerSec);
  const dispatcher = new OutboundDispatcher({
    queue,
    client: overrides.client ?? telegram,
    limiter,
    retry: config.retry,
    workers: config.queue.workers,
  });

  const probes: Record<string, () => Promise<boolean>> = {};
  const redisClient = redis;
  if (redisClient) probes.redis = () => redisHealth(redisClient);

  const app = buildApp({
    config,
    webhook: {
      secret: config.webhook.secret,
      signatureHeader: config.webhook.signatureHeader,
      budgetMs: config.webhook.budgetMs,
      overflow: config.queue.overflow,
      cache,
      queue,
    },
    health: { queue, dispatcher, telegram, probes },
  });

  return {
    app,
    cache,
    queue,
    limiter,
    dispatcher,
    telegram,
    start() {
      memoryCache?.start();
      dispatcher.start();
    },
    async stop() {
      memoryCache?.stop();
      await dispatcher.stop();
      if (redisClient && !overrides.redis) await redisClient.quit();
    },
  };
}

export type Relay = ReturnType<typeof createRelay>;
