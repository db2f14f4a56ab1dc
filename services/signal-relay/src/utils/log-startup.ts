import { logger } from '../logger.js';
import type { AppConfig } from '../config.js';
import type { Relay } from '../relay.js';
import { errorMessage } from '../errors.js';

const ROUTES: Array<{ method: string; path: string }> = [
  // ops
  { method: 'GET', path: '/health' },
  { method: 'GET', path: '/health/readiness' },
  { method: 'GET', path: '/health/telegram' },
  { method: 'GET', path: '/ops/metrics' },
  // alerts
  { method: 'POST', path: '/webhook' }
];

export async function logStartupBanner(config: AppConfig, relay: Pick<Relay, 'telegram'>) {
  let telegram = 'ok';
  try {
    const bot = await relay.telegram.getMe();
    telegram = `ok (@${bot.username ?? bot.id})`;
  } catch (err) {
    telegram = `fail: ${errorMessage(err)}`;
  }

  logger.info({
    env: config.env,
    port: config.port,
    idempotencyStore: config.idempotency.store,
    workers: config.queue.workers,
    rateLimitPerSec: config.telegram.rateLimitPerSec,
    telegram
  }, 'service startup');

  logger.info('available routes:');
  for (const r of ROUTES) {
    logger.info(`${r.method.padEnd(6)} ${r.path}`);
  }
}
