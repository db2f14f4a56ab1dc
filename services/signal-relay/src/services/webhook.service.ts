import { performance } from 'node:perf_hooks';
import { verifySignature } from '../crypto/signature.js';
import { parseInboundEvent, idempotencyKey, type FieldIssue } from '../utils/validators.js';
import type { IdempotencyStore } from '../cache/idempotency.js';
import type { DeliveryQueue } from '../queue/delivery-queue.js';
import { newDeliveryTask, type DeliveryTask } from '../types/domain.js';
import type { OverflowPolicy } from '../config.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import { budgetExceeded, queueDepth, webhookDropped, webhookDuplicates, webhookRequests } from '../metrics/metrics.js';

export type WebhookDeps = {
  secret: string;
  cache: IdempotencyStore;
  queue: DeliveryQueue<DeliveryTask>;
  overflow: OverflowPolicy;
  budgetMs: number;
  logger?: Logger;
};

export type WebhookInput = {
  body: Buffer;
  signature: string | string[] | undefined;
  requestId: string;
};

type Decision =
  | { status: 'accepted'; requestId: string; duplicate: boolean }
  | { status: 'unauthorized'; requestId: string }
  | { status: 'invalid'; requestId: string; issues: FieldIssue[] }
  | { status: 'overloaded'; requestId: string };

export type WebhookOutcome = Decision & { elapsedMs: number };

/**
 * Verify -> validate -> admit -> enqueue, then return. Nothing here waits on
 * the messaging API; the dispatcher owns the task after `enqueue`.
 */
export async function handleWebhook(deps: WebhookDeps, input: WebhookInput): Promise<WebhookOutcome> {
  const started = performance.now();
  const { requestId } = input;
  const log = (deps.logger ?? rootLogger).child({ requestId });

  const outcome = await admitAndEnqueue(deps, input, log);

  const elapsedMs = performance.now() - started;
  webhookRequests.inc({ outcome: outcome.status === 'accepted' && outcome.duplicate ? 'duplicate' : outcome.status });
  if (elapsedMs > deps.budgetMs) {
    budgetExceeded.inc();
    log.warn({ elapsedMs, budgetMs: deps.budgetMs }, 'webhook over latency budget');
  }
  return { ...outcome, elapsedMs };
}

async function admitAndEnqueue(deps: WebhookDeps, input: WebhookInput, log: Logger): Promise<Decision> {
  const { requestId } = input;

  if (!verifySignature(input.body, deps.secret, input.signature)) {
    log.warn({ signaturePresent: typeof input.signature === 'string' && input.signature.length > 0, bodySize: input.body.length }, 'invalid webhook signature');
    return { status: 'unauthorized', requestId };
  }

  const parsed = parseInboundEvent(input.body);
  if (!parsed.ok) {
    log.warn({ issues: parsed.issues }, 'webhook payload rejected');
    return { status: 'invalid', requestId, issues: parsed.issues };
  }
  const { event } = parsed;
  const key = idempotencyKey(event);

  if (!(await deps.cache.admit(key))) {
    webhookDuplicates.inc();
    log.info({ key }, 'duplicate alert suppressed');
    return { status: 'accepted', requestId, duplicate: true };
  }

  const task = newDeliveryTask(requestId, event);
  if (!deps.queue.enqueue(task)) {
    if (deps.overflow === 'reject') {
      // let the sender's retry through instead of treating it as a duplicate
      await deps.cache.release(key);
      log.warn({ key, capacity: deps.queue.capacity }, 'delivery queue full, rejecting');
      return { status: 'overloaded', requestId };
    }
    webhookDropped.inc();
    log.error({ key, capacity: deps.queue.capacity, ticker: event.ticker, signal: event.signal }, 'delivery queue full, alert dropped');
    return { status: 'accepted', requestId, duplicate: false };
  }

  queueDepth.set(deps.queue.size);
  log.info({ ticker: event.ticker, signal: event.signal, price: event.price }, 'webhook accepted for delivery');
  return { status: 'accepted', requestId, duplicate: false };
}
