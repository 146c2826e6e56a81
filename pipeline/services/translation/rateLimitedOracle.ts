import pLimit from "p-limit";

import { abortableSleep, throwIfCancelled } from "../pipeline/retry";
import type {
  TranslationOracle,
  TranslationRequest,
  TranslationResult,
} from "./oracle";

export interface RateLimitOptions {
  /** Oracle calls allowed in flight at once, across all documents */
  concurrency: number;
  /** Upper bound on call starts per second */
  requestsPerSecond: number;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Process-wide throttle in front of an oracle. Every call, retries included,
 * goes through the same concurrency gate and start-rate spacing.
 */
export class RateLimitedOracle implements TranslationOracle {
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly intervalMs: number;
  private nextSlotAt = 0;
  private calls = 0;

  constructor(
    private readonly inner: TranslationOracle,
    private readonly options: RateLimitOptions,
  ) {
    this.limit = pLimit(Math.max(1, options.concurrency));
    this.intervalMs = options.requestsPerSecond > 0 ? 1000 / options.requestsPerSecond : 0;
  }

  get callCount(): number {
    return this.calls;
  }

  translate(request: TranslationRequest): Promise<TranslationResult> {
    return this.limit(async () => {
      throwIfCancelled(request.signal);
      await this.waitForSlot(request.signal);
      throwIfCancelled(request.signal);
      this.calls += 1;
      return this.inner.translate(request);
    });
  }

  private async waitForSlot(signal?: AbortSignal): Promise<void> {
    if (!this.intervalMs) return;
    const now = (this.options.now ?? Date.now)();
    const slot = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.intervalMs;
    const waitMs = slot - now;
    if (waitMs > 0) {
      await (this.options.sleep ?? abortableSleep)(waitMs, signal);
    }
  }
}
