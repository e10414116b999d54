/**
 * RateGate
 *
 * In-process admission control for Guru API calls. A caller is admitted once
 * it holds one of `maxConcurrency` slots AND the token bucket has a token.
 *
 * - Token bucket refills continuously at `qps` tokens/sec, capped at `burst`
 * - Bucket starts full
 * - Slots are handed over in FIFO order
 *
 * One instance is shared by every request of a process.
 */

// =============================================================================
// Configuration
// =============================================================================

export interface RateGateConfig {
  /**
   * Sustained request rate (tokens per second), clamped to >= 0.1
   * @default 3
   */
  qps?: number;

  /**
   * Maximum in-flight requests
   * @default 4
   */
  maxConcurrency?: number;

  /**
   * Bucket capacity
   * @default max(1, floor(2 * qps))
   */
  burst?: number;

  /**
   * Monotonic clock in milliseconds
   * @default performance.now
   */
  now?: () => number;

  /**
   * Sleep used while waiting for tokens
   */
  sleep?: (ms: number) => Promise<void>;
}

export interface RateGateStats {
  inFlight: number;
  waiting: number;
  tokens: number;
  qps: number;
  burst: number;
  maxConcurrency: number;
}

const MIN_QPS = 0.1;

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// RateGate
// =============================================================================

export class RateGate {
  private readonly qps: number;
  private readonly burst: number;
  private readonly maxConcurrency: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  private tokens: number;
  private lastRefill: number;
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(config: RateGateConfig = {}) {
    this.qps = Math.max(MIN_QPS, config.qps ?? 3);
    this.burst = Math.max(1, config.burst ?? Math.floor(this.qps * 2));
    this.maxConcurrency = Math.max(1, Math.floor(config.maxConcurrency ?? 4));
    this.now = config.now ?? (() => performance.now());
    this.sleep = config.sleep ?? defaultSleep;
    this.tokens = this.burst;
    this.lastRefill = this.now();
  }

  /**
   * Wait for a slot and a token. Resolves to the function that frees the slot.
   */
  async acquire(): Promise<() => void> {
    await this.takeSlot();
    try {
      await this.takeToken();
    } catch (error) {
      this.releaseSlot();
      throw error;
    }

    let released = false;
    return () => {
      if (!released) {
        released = true;
        this.releaseSlot();
      }
    };
  }

  /**
   * Run `fn` inside the gate; the slot is freed when it settles
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  getStats(): RateGateStats {
    this.refill();
    return {
      inFlight: this.active,
      waiting: this.waiters.length,
      tokens: this.tokens,
      qps: this.qps,
      burst: this.burst,
      maxConcurrency: this.maxConcurrency,
    };
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private takeSlot(): Promise<void> {
    if (this.active < this.maxConcurrency) {
      this.active++;
      return Promise.resolve();
    }
    // The releasing caller hands its slot over, so `active` is unchanged
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private releaseSlot(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }
    this.active--;
  }

  private refill(): void {
    const current = this.now();
    const elapsedSeconds = Math.max(0, current - this.lastRefill) / 1000;
    this.tokens = Math.min(this.burst, this.tokens + elapsedSeconds * this.qps);
    this.lastRefill = current;
  }

  private async takeToken(): Promise<void> {
    for (;;) {
      this.refill();
      if (this.tokens >= 1) {
        this.tokens -= 1;
        return;
      }
      const waitMs = ((1 - this.tokens) / this.qps) * 1000;
      await this.sleep(waitMs);
    }
  }
}
