import { EventEmitter } from 'node:events';
import type { DeliveryQueue } from '../queue/delivery-queue.js';
import type { DeliveryTask } from '../types/domain.js';
import type { MessagingClient } from './telegram.client.js';
import type { TokenBucket } from './rate-limiter.js';
import { renderSignalMessage } from './message-format.js';
import { DeliveryError, errorMessage, isRetryable } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import { deliveryAttempts, deliveryTasks, limiterWait, queueDepth } from '../metrics/metrics.js';

export type RetryPolicy = {
  maxAttempts: number;
  initialDelayMs: number;
  multiplier: number;
};

export type DispatcherDeps = {
  queue: DeliveryQueue<DeliveryTask>;
  client: MessagingClient;
  limiter: Pick<TokenBucket, 'acquire'>;
  retry: RetryPolicy;
  workers: number;
  logger?: Logger;
  now?: () => number;
};

/** Backoff before retry number `retries` (1-based): initial * multiplier^(retries-1). */
export function backoffDelay(policy: RetryPolicy, retries: number): number {
  return Math.round(policy.initialDelayMs * policy.multiplier ** Math.max(0, retries - 1));
}

/**
 * Drains the delivery queue with a fixed pool of worker loops.
 *
 * Per task: PENDING -> SENDING -> DELIVERED | RETRYING -> SENDING | FAILED.
 * A retry is a requeue with a visible-after timestamp, so a waiting retry
 * does not hold a worker. Emits `delivered`, `retrying` and `failed` with
 * the task, and `settled` on either terminal state.
 */
export class OutboundDispatcher extends EventEmitter {
  private readonly deps: DispatcherDeps;
  private readonly log: Logger;
  private readonly now: () => number;
  private loops: Promise<void>[] = [];
  private inFlight = 0;
  private running = false;

  constructor(deps: DispatcherDeps) {
    super();
    this.deps = deps;
    this.log = (deps.logger ?? rootLogger).child({ component: 'dispatcher' });
    this.now = deps.now ?? Date.now;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get activeTasks(): number {
    return this.inFlight;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    for (let i = 0; i < this.deps.workers; i++) this.loops.push(this.loop(i));
    this.log.info({ workers: this.deps.workers }, 'dispatcher started');
  }

  /** Closes the queue, lets in-flight sends finish, and reports what was left queued. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    const abandoned = this.deps.queue.close();
    await Promise.all(this.loops);
    this.loops = [];
    queueDepth.set(0);
    if (abandoned.length) {
      this.log.warn({ abandoned: abandoned.length, ids: abandoned.map((t) => t.id) }, 'dispatcher stopped with queued tasks');
    } else {
      this.log.info('dispatcher stopped');
    }
  }

  private async loop(worker: number): Promise<void> {
    for (;;) {
      const task = await this.deps.queue.dequeue();
      if (!task) return;
      queueDepth.set(this.deps.queue.size);
      this.inFlight++;
      try {
        await this.process(task);
      } catch (err) {
        // process() settles every task itself; reaching here is a bug, not a delivery failure
        this.log.error({ err, worker, taskId: task.id }, 'dispatcher worker error');
      } finally {
        this.inFlight--;
      }
    }
  }

  /** Runs one send attempt for the task and moves it to its next state. */
  async process(task: DeliveryTask): Promise<void> {
    const { client, limiter, retry, queue } = this.deps;
    const attempt = task.retries + 1;
    const log = this.log.child({ taskId: task.id, ticker: task.event.ticker, signal: task.event.signal });

    task.state = 'SENDING';
    const waited = await limiter.acquire();
    limiterWait.observe(waited);

    try {
      const { messageId } = await client.sendText(renderSignalMessage(task.event));
      task.state = 'DELIVERED';
      task.messageId = messageId;
      task.lastError = undefined;
      deliveryAttempts.inc({ result: 'ok' });
      deliveryTasks.inc({ state: 'delivered' });
      log.info({ attempt, messageId, latencyMs: this.now() - task.enqueuedAt }, 'message delivered');
      this.emit('delivered', task);
      this.emit('settled', task);
      return;
    } catch (err) {
      task.lastError = errorMessage(err);
      deliveryAttempts.inc({ result: isRetryable(err) ? 'retryable' : 'fatal' });

      if (isRetryable(err) && attempt < retry.maxAttempts && !queue.isClosed) {
        task.retries += 1;
        task.state = 'RETRYING';
        const retryAfter = err instanceof DeliveryError ? (err.retryAfterMs ?? 0) : 0;
        const delay = Math.max(backoffDelay(retry, task.retries), retryAfter);
        queue.requeue(task, this.now() + delay);
        queueDepth.set(queue.size);
        log.warn({ attempt, maxAttempts: retry.maxAttempts, delayMs: delay, err: task.lastError }, 'send failed, retrying');
        this.emit('retrying', task);
        return;
      }

      task.state = 'FAILED';
      deliveryTasks.inc({ state: 'failed' });
      log.error({ attempt, maxAttempts: retry.maxAttempts, err: task.lastError }, 'message delivery failed');
      this.emit('failed', task);
      this.emit('settled', task);
    }
  }
}
