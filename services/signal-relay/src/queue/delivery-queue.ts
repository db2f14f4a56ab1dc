// services/signal-relay/src/queue/delivery-queue.ts

type Entry<T> = { item: T; visibleAt: number };
type Waiter<T> = (item: T | null) => void;

export type DeliveryQueueOptions = {
  capacity: number;
  now?: () => number;
};

/**
 * In-process FIFO handoff between the request path and the dispatcher workers.
 *
 * Every entry carries a "not before" timestamp: fresh items are visible at
 * once, retries are requeued with a future `visibleAt` and handed out only
 * after it passes. Among visible entries the oldest goes first.
 */
export class DeliveryQueue<T> {
  private entries: Entry<T>[] = [];
  private waiters: Waiter<T>[] = [];
  private timer: NodeJS.Timeout | null = null;
  private timerAt = Infinity;
  private closed = false;

  readonly capacity: number;
  private readonly now: () => number;

  constructor(opts: DeliveryQueueOptions) {
    this.capacity = opts.capacity;
    this.now = opts.now ?? Date.now;
  }

  get size(): number {
    return this.entries.length;
  }

  get pendingConsumers(): number {
    return this.waiters.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get isFull(): boolean {
    return this.entries.length >= this.capacity;
  }

  /** Adds a new item; false when the queue is full or closed. Never waits. */
  enqueue(item: T): boolean {
    if (this.closed || this.isFull) return false;
    this.push(item, this.now());
    return true;
  }

  /** Schedules an already-owned item again; capacity does not apply. */
  requeue(item: T, visibleAt: number): boolean {
    if (this.closed) return false;
    this.push(item, visibleAt);
    return true;
  }

  /** Resolves with the next visible item, or null once the queue is closed. */
  dequeue(): Promise<T | null> {
    if (this.closed) return Promise.resolve(null);
    const entry = this.takeVisible();
    if (entry) return Promise.resolve(entry.item);
    return new Promise<T | null>((resolve) => {
      this.waiters.push(resolve);
      this.arm();
    });
  }

  /** Wakes every waiting consumer with null and returns the items left behind. */
  close(): T[] {
    if (this.closed) return [];
    this.closed = true;
    this.disarm();
    const left = this.entries.map((e) => e.item);
    this.entries = [];
    const waiters = this.waiters;
    this.waiters = [];
    for (const w of waiters) w(null);
    return left;
  }

  private push(item: T, visibleAt: number) {
    this.entries.push({ item, visibleAt });
    this.serve();
  }

  private takeVisible(): Entry<T> | undefined {
    const now = this.now();
    // entries stay in push order, so the first visible one is the oldest
    const idx = this.entries.findIndex((e) => e.visibleAt <= now);
    if (idx === -1) return undefined;
    return this.entries.splice(idx, 1)[0];
  }

  private serve() {
    while (this.waiters.length) {
      const entry = this.takeVisible();
      if (!entry) break;
      const waiter = this.waiters.shift();
      waiter?.(entry.item);
    }
    this.arm();
  }

  // one timer, set for the earliest future visibleAt while consumers wait
  private arm() {
    if (!this.waiters.length || !this.entries.length) {
      this.disarm();
      return;
    }
    let next = Infinity;
    for (const e of this.entries) next = Math.min(next, e.visibleAt);
    if (this.timer && next >= this.timerAt) return;

    this.disarm();
    this.timerAt = next;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.timerAt = Infinity;
      this.serve();
    }, Math.max(0, next - this.now()));
  }

  private disarm() {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.timerAt = Infinity;
  }
}
