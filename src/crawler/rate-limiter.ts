// Per-domain minimum-interval gate shared by all probe workers

export interface RateLimiterOptions {
  /** Minimum gap between two acquisitions for the same domain (ms) */
  minIntervalMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function domainOf(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return url.toLowerCase();
  }
}

export class DomainRateLimiter {
  private minIntervalMs: number;
  private now: () => number;
  private sleep: (ms: number) => Promise<void>;
  private lastAccess = new Map<string, number>();
  private tails = new Map<string, Promise<void>>();

  constructor(options: RateLimiterOptions) {
    this.minIntervalMs = Math.max(0, options.minIntervalMs);
    this.now = options.now ?? (() => Date.now());
    this.sleep = options.sleep ?? sleep;
  }

  /**
   * Resolves once minIntervalMs has passed since the previous acquire for
   * this domain resolved. Callers for one domain queue behind each other;
   * other domains are unaffected.
   */
  async acquire(domain: string): Promise<void> {
    const key = domain.toLowerCase();
    const previous = this.tails.get(key) ?? Promise.resolve();
    const slot = previous.then(() => this.waitForSlot(key));
    this.tails.set(key, slot);

    await slot;

    if (this.tails.get(key) === slot) {
      this.tails.delete(key);
    }
  }

  lastAccessAt(domain: string): number | undefined {
    return this.lastAccess.get(domain.toLowerCase());
  }

  private async waitForSlot(key: string): Promise<void> {
    for (;;) {
      const last = this.lastAccess.get(key);
      if (last === undefined) break;
      const remaining = last + this.minIntervalMs - this.now();
      if (remaining <= 0) break;
      await this.sleep(remaining);
    }
    this.lastAccess.set(key, this.now());
  }
}
