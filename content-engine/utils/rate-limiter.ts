/**
 * Request throttle for image providers.
 *
 * Shared free-tier quotas punish bursts, so successive provider calls are
 * spaced at least `minIntervalMs` apart. This is pacing only; a slow
 * provider never causes an extra wait.
 */

import { delay } from './retry-policies.js';

export interface ThrottleMetrics {
  requests_total: number;
  waits_total: number;
  wait_time_total_ms: number;
}

export class RequestThrottle {
  private lastRequestAt?: number;
  private metrics: ThrottleMetrics = { requests_total: 0, waits_total: 0, wait_time_total_ms: 0 };

  constructor(
    private minIntervalMs: number,
    private sleep: (ms: number) => Promise<void> = delay,
    private now: () => number = Date.now
  ) {}

  /**
   * Resolve once the next request may start, then record it as started.
   */
  async acquire(): Promise<void> {
    if (this.lastRequestAt !== undefined && this.minIntervalMs > 0) {
      const elapsed = this.now() - this.lastRequestAt;
      const remaining = this.minIntervalMs - elapsed;
      if (remaining > 0) {
        this.metrics.waits_total++;
        this.metrics.wait_time_total_ms += remaining;
        await this.sleep(remaining);
      }
    }

    this.lastRequestAt = this.now();
    this.metrics.requests_total++;
  }

  getMetrics(): ThrottleMetrics {
    return { ...this.metrics };
  }
}
