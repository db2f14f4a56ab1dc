/**
 * Process-wide token bucket for outbound sends.
 *
 * Capacity and refill rate both equal the ceiling. `reserve` takes a token
 * synchronously and may drive the balance below zero; the debt is the queue
 * of callers that must wait, each for its own slot. Callers sleep outside
 * the accounting, so the sends themselves are never serialized.
 */
export class TokenBucket {
  private tokens: number;
  private lastRefill: number;
  private readonly ratePerMs: number;

  constructor(
    readonly ratePerSec: number,
    private readonly now: () => number = Date.now,
  ) {
    this.tokens = ratePerSec;
    this.lastRefill = now();
    this.ratePerMs = ratePerSec / 1000;
  }

  private refill() {
    const now = this.now();
    const elapsed = now - this.lastRefill;
    if (elapsed > 0) {
      this.tokens = Math.min(this.ratePerSec, this.tokens + elapsed * this.ratePerMs);
      this.lastRefill = now;
    }
  }

  /** Takes one token; returns how many ms the caller must wait before using it. */
  reserve(): number {
    this.refill();
    this.tokens -= 1;
    if (this.tokens >= 0) return 0;
    return Math.ceil(-this.tokens / this.ratePerMs);
  }

  /** Resolves once the caller may send. */
  async acquire(): Promise<number> {
    const waitMs = this.reserve();
    if (waitMs > 0) await new Promise((r) => setTimeout(r, waitMs));
    return waitMs;
  }

  /** Whole tokens currently available. */
  get available(): number {
    this.refill();
    return Math.max(0, Math.floor(this.tokens));
  }
}
