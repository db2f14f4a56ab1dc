import { Redis } from 'ioredis';
import { logger } from '../logger.js';

function attachLoggers(client: Redis, label: string) {
  client.on('ready',        () => logger.info({ label }, 'redis ready'));
  client.on('reconnecting', (delay: number) => logger.warn({ label, delay }, 'redis reconnecting'));
  client.on('end',          () => logger.warn({ label }, 'redis end'));
  client.on('error',        (err) => logger.error({ label, err }, 'redis error'));
}

/**
 * Client for the shared idempotency store. A short command timeout keeps a
 * stalled Redis from holding webhook requests past their latency budget.
 */
export function createRedis(url: string, label = 'idempotency'): Redis {
  const client = new Redis(url, {
    maxRetriesPerRequest: 1,
    commandTimeout: 100,
  });
  attachLoggers(client, label);
  return client;
}

export async function redisHealth(client: { ping(): Promise<string> }) {
  try {
    const pong = await client.ping();
    return pong === 'PONG';
  } catch {
    return false;
  }
}
