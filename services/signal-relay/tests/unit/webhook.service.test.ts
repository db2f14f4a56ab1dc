import { describe, it, expect, vi } from 'vitest';
import { handleWebhook, type WebhookDeps } from '../../src/services/webhook.service.js';
import { MemoryIdempotencyCache } from '../../src/cache/idempotency.js';
import { DeliveryQueue } from '../../src/queue/delivery-queue.js';
import { signPayload } from '../../src/crypto/signature.js';
import { budgetExceeded, webhookDropped } from '../../src/metrics/metrics.js';
import type { DeliveryTask } from '../../src/types/domain.js';
import type { OverflowPolicy } from '../../src/config.js';

const SECRET = 'test-secret';

function alert(overrides: Record<string, unknown> = {}) {
  return Buffer.from(
    JSON.stringify({ ticker: 'BTCUSDT', signal: 'Buy', price: 45000.0, time: '2025-08-05T18:30:00Z', ...overrides }),
  );
}

function setup(opts: { capacity?: number; overflow?: OverflowPolicy; budgetMs?: number } = {}) {
  const cache = new MemoryIdempotencyCache({ ttlMs: 300_000 });
  const queue = new DeliveryQueue<DeliveryTask>({ capacity: opts.capacity ?? 10 });
  const deps: WebhookDeps = {
    secret: SECRET,
    cache,
    queue,
    overflow: opts.overflow ?? 'reject',
    budgetMs: opts.budgetMs ?? 150,
  };
  let n = 0;
  const send = (body: Buffer, signature: string | undefined = signPayload(body, SECRET)) =>
    handleWebhook(deps, { body, signature, requestId: `req-${++n}` });
  return { cache, queue, deps, send };
}

async function counterValue(counter: { get(): Promise<{ values: { value: number }[] }> }) {
  const metric = await counter.get();
  return metric.values.reduce((sum, v) => sum + v.value, 0);
}

describe('handleWebhook', () => {
  it('accepts a signed valid alert and queues one task', async () => {
    const { queue, send } = setup();
    const out = await send(alert({ ticker: 'btcusdt', interval: '1h' }));

    expect(out).toMatchObject({ status: 'accepted', requestId: 'req-1', duplicate: false });
    expect(out.elapsedMs).toBeGreaterThanOrEqual(0);
    expect(queue.size).toBe(1);

    const task = await queue.dequeue();
    expect(task).toMatchObject({
      id: 'req-1',
      state: 'PENDING',
      retries: 0,
      event: { ticker: 'BTCUSDT', signal: 'Buy', price: 45000, time: '2025-08-05T18:30:00Z', interval: '1h' },
    });
  });

  it('rejects a bad signature before looking at the body', async () => {
    const { cache, queue, send } = setup();
    const out = await send(Buffer.from('not json'), 'deadbeef');

    expect(out.status).toBe('unauthorized');
    expect(queue.size).toBe(0);
    expect(cache.size).toBe(0);
  });

  it('rejects a missing signature', async () => {
    const { deps, queue } = setup();
    const out = await handleWebhook(deps, { body: alert(), signature: undefined, requestId: 'r' });
    expect(out.status).toBe('unauthorized');
    expect(queue.size).toBe(0);
  });

  it('reports every invalid field of a signed body and admits nothing', async () => {
    const { cache, queue, send } = setup();
    const out = await send(alert({ signal: 'Hold', price: -1 }));

    expect(out.status).toBe('invalid');
    if (out.status === 'invalid') expect(out.issues.map((i) => i.field)).toEqual(['signal', 'price']);
    expect(queue.size).toBe(0);
    expect(cache.size).toBe(0);
  });

  it('acknowledges a duplicate without queueing it again', async () => {
    const { queue, send } = setup();
    await send(alert());
    const dup = await send(alert({ price: 45100 }));

    expect(dup).toMatchObject({ status: 'accepted', duplicate: true });
    expect(queue.size).toBe(1);
  });

  it('queues alerts that differ in ticker, signal or time', async () => {
    const { queue, send } = setup();
    await send(alert());
    await send(alert({ ticker: 'ETHUSDT' }));
    await send(alert({ signal: 'Sell' }));
    await send(alert({ time: '2025-08-05T18:31:00Z' }));
    expect(queue.size).toBe(4);
  });

  it('queues a single task for concurrent identical deliveries', async () => {
    const { queue, send } = setup();
    const body = alert();
    const outs = await Promise.all(Array.from({ length: 20 }, () => send(body)));

    expect(outs.every((o) => o.status === 'accepted')).toBe(true);
    expect(outs.filter((o) => o.status === 'accepted' && !o.duplicate)).toHaveLength(1);
    expect(queue.size).toBe(1);
  });

  it('with the reject policy answers overloaded and releases the key', async () => {
    const { queue, send } = setup({ capacity: 1, overflow: 'reject' });
    await send(alert());

    const second = alert({ time: '2025-08-05T18:31:00Z' });
    expect((await send(second)).status).toBe('overloaded');
    expect(queue.size).toBe(1);

    await queue.dequeue();
    expect(await send(second)).toMatchObject({ status: 'accepted', duplicate: false });
    expect(queue.size).toBe(1);
  });

  it('with the drop policy acknowledges, counts and forgets the alert', async () => {
    const { queue, send } = setup({ capacity: 1, overflow: 'drop' });
    const before = await counterValue(webhookDropped);
    await send(alert());

    const second = alert({ time: '2025-08-05T18:31:00Z' });
    expect(await send(second)).toMatchObject({ status: 'accepted', duplicate: false });
    expect(queue.size).toBe(1);
    expect(await counterValue(webhookDropped)).toBe(before + 1);

    // the key stays admitted, so a redelivery is a duplicate
    expect(await send(second)).toMatchObject({ status: 'accepted', duplicate: true });
  });

  it('counts requests that run over the latency budget', async () => {
    const { deps, send } = setup({ budgetMs: 5 });
    vi.spyOn(deps.cache, 'admit').mockImplementationOnce(
      () => new Promise((resolve) => setTimeout(() => resolve(true), 20)),
    );
    const before = await counterValue(budgetExceeded);

    const out = await send(alert());
    expect(out.status).toBe('accepted');
    expect(out.elapsedMs).toBeGreaterThan(5);
    expect(await counterValue(budgetExceeded)).toBe(before + 1);
  });

  it('propagates a failing idempotency store', async () => {
    const { deps, queue, send } = setup();
    vi.spyOn(deps.cache, 'admit').mockRejectedValueOnce(new Error('Command timed out'));
    await expect(send(alert())).rejects.toThrow('Command timed out');
    expect(queue.size).toBe(0);
  });
});
