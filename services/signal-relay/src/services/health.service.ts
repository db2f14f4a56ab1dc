import type { DeliveryQueue } from '../queue/delivery-queue.js';
import type { DeliveryTask } from '../types/domain.js';
import type { OutboundDispatcher } from './dispatcher.js';
import type { TelegramClient } from './telegram.client.js';
import { errorMessage } from '../errors.js';

export type HealthDeps = {
  queue: DeliveryQueue<DeliveryTask>;
  dispatcher: Pick<OutboundDispatcher, 'isRunning' | 'activeTasks'>;
  telegram?: Pick<TelegramClient, 'getMe'>;
  /** extra readiness probes, e.g. the shared redis store */
  probes?: Record<string, () => Promise<boolean>>;
};

export const SERVICE_NAME = 'signal-relay';
export const SERVICE_VERSION = '0.1.0';

export function livenessSvc(deps: HealthDeps) {
  return {
    status: 'healthy' as const,
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    timestamp: new Date().toISOString(),
    dispatcher: deps.dispatcher.isRunning ? 'running' : 'stopped',
    queue: { depth: deps.queue.size, capacity: deps.queue.capacity, inFlight: deps.dispatcher.activeTasks },
  };
}

export async function readinessSvc(deps: HealthDeps) {
  const checks: Record<string, 'ok' | 'fail'> = {
    dispatcher: deps.dispatcher.isRunning ? 'ok' : 'fail',
    queue: deps.queue.isFull ? 'fail' : 'ok',
  };
  const probes = Object.entries(deps.probes ?? {});
  const results = await Promise.allSettled(probes.map(([, probe]) => probe()));
  results.forEach((r, i) => {
    checks[probes[i][0]] = r.status === 'fulfilled' && r.value ? 'ok' : 'fail';
  });
  const status = Object.values(checks).every((v) => v === 'ok') ? 'ready' : 'not_ready';
  return { status, checks };
}

export async function telegramHealthSvc(deps: HealthDeps) {
  const timestamp = new Date().toISOString();
  if (!deps.telegram) return { status: 'unhealthy' as const, telegramConnected: false, error: 'not configured', timestamp };
  try {
    const bot = await deps.telegram.getMe();
    return { status: 'healthy' as const, telegramConnected: true, bot: bot.username ?? String(bot.id), timestamp };
  } catch (err) {
    return { status: 'unhealthy' as const, telegramConnected: false, error: errorMessage(err), timestamp };
  }
}
