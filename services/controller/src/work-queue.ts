import { logger } from '@kustomize-sync/shared';

const log = logger.child({ module: 'work-queue' });

/** Largest delay setTimeout honours; longer delays fire after 1 ms. */
const MAX_TIMER_MS = 2_147_483_647;

export interface WorkQueueOptions {
  /** Keys processed in parallel. A single key is never processed twice at once. */
  concurrency: number;
  /** First rate-limited delay; doubles per consecutive failure of the same key. */
  backoffBaseMs: number;
  backoffMaxMs: number;
}

interface DelayedAdd {
  at: number;
  timer: NodeJS.Timeout;
}

/**
 * Keyed work queue with the semantics controllers expect:
 * - adding a key that is already waiting is a no-op
 * - adding a key while it is being processed queues it again once it finishes
 * - delayed adds keep only the earliest deadline per key
 */
export class WorkQueue {
  private readonly queue: string[] = [];
  private readonly dirty = new Set<string>();
  private readonly processing = new Set<string>();
  private readonly delayed = new Map<string, DelayedAdd>();
  private readonly failures = new Map<string, number>();
  private readonly drainWaiters: Array<() => void> = [];
  private running = 0;
  private stopped = false;

  constructor(
    private readonly handler: (key: string) => Promise<void>,
    private readonly opts: WorkQueueOptions,
  ) {
    if (opts.concurrency < 1) {
      throw new Error(`concurrency must be at least 1, got ${opts.concurrency}`);
    }
  }

  /** Keys waiting to be processed (not counting delayed or in-flight keys). */
  get length(): number {
    return this.queue.length;
  }

  /** Keys currently being processed. */
  get inFlight(): number {
    return this.running;
  }

  add(key: string): void {
    if (this.stopped || this.dirty.has(key)) return;
    this.dirty.add(key);
    if (!this.processing.has(key)) {
      this.queue.push(key);
      this.pump();
    }
  }

  addAfter(key: string, delayMs: number): void {
    if (this.stopped) return;
    if (delayMs <= 0) {
      this.add(key);
      return;
    }

    const at = Date.now() + delayMs;
    const existing = this.delayed.get(key);
    if (existing && existing.at <= at) return;
    if (existing) clearTimeout(existing.timer);

    this.arm(key, at);
  }

  /** Schedule the add for `at`, in steps no longer than the timer limit. */
  private arm(key: string, at: number): void {
    const timer = setTimeout(() => {
      if (at - Date.now() > 0) {
        this.arm(key, at);
        return;
      }
      this.delayed.delete(key);
      this.add(key);
    }, Math.min(at - Date.now(), MAX_TIMER_MS));
    timer.unref();
    this.delayed.set(key, { at, timer });
  }

  /** Requeue after a per-key exponential backoff. Returns the delay used. */
  addRateLimited(key: string): number {
    const failures = this.failures.get(key) ?? 0;
    this.failures.set(key, failures + 1);
    const delay = Math.min(this.opts.backoffBaseMs * 2 ** failures, this.opts.backoffMaxMs);
    this.addAfter(key, delay);
    return delay;
  }

  /** Reset the backoff of a key after it was processed successfully. */
  forget(key: string): void {
    this.failures.delete(key);
  }

  /** Drop any waiting or delayed work for a key. An in-flight run is left to finish. */
  cancel(key: string): void {
    const delayed = this.delayed.get(key);
    if (delayed) {
      clearTimeout(delayed.timer);
      this.delayed.delete(key);
    }
    if (this.dirty.delete(key)) {
      const idx = this.queue.indexOf(key);
      if (idx !== -1) this.queue.splice(idx, 1);
    }
    this.failures.delete(key);
  }

  /** Stop accepting work, drop everything pending and wait for in-flight keys. */
  async shutDown(): Promise<void> {
    this.stopped = true;
    for (const { timer } of this.delayed.values()) clearTimeout(timer);
    this.delayed.clear();
    this.queue.length = 0;
    this.dirty.clear();
    if (this.running === 0) return;
    await new Promise<void>((resolve) => this.drainWaiters.push(resolve));
  }

  /** Resolves once nothing is queued or in flight. Delayed adds are not waited for. */
  async drained(): Promise<void> {
    if (this.running === 0 && this.queue.length === 0) return;
    await new Promise<void>((resolve) => this.drainWaiters.push(resolve));
  }

  private pump(): void {
    while (!this.stopped && this.running < this.opts.concurrency && this.queue.length > 0) {
      const key = this.queue.shift();
      if (key === undefined) break;
      this.dirty.delete(key);
      this.processing.add(key);
      this.running++;
      this.process(key).catch((err) => {
        log.error({ err, key }, 'work queue bookkeeping failed');
      });
    }
  }

  private async process(key: string): Promise<void> {
    try {
      await this.handler(key);
    } catch (err) {
      log.error({ err, key }, 'work item handler threw');
    } finally {
      this.processing.delete(key);
      this.running--;
      if (this.dirty.has(key) && !this.stopped) {
        this.queue.push(key);
      }
      this.pump();
      if (this.running === 0 && this.queue.length === 0) {
        for (const resolve of this.drainWaiters.splice(0)) resolve();
      }
    }
  }
}
