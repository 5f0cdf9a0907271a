/**
 * SessionLimiter: admission control for concurrent sessions.
 *
 * - Concurrency cap: at most `maxConcurrent` sessions run simultaneously
 * - Backpressure: at most `maxQueued` sessions wait; beyond that submit is rejected
 * - Cancellation: a queued job whose signal aborts leaves the queue
 *
 * Jobs are started only once a slot is free, so time spent queued never
 * counts toward an agent's invocation timeout.
 */

import { BatonError, ORCHESTRATOR_DEFAULTS } from '@baton/agent-contracts';

export interface SessionLimiterConfig {
  /** Maximum simultaneously running sessions */
  maxConcurrent: number;
  /** Maximum waiting sessions. Reject beyond this. */
  maxQueued: number;
}

export interface RunHooks {
  signal?: AbortSignal;
  /** Called when the job has to wait, with the queue length including it */
  onQueued?: (queueLength: number) => void;
}

const DEFAULT_CONFIG: SessionLimiterConfig = {
  maxConcurrent: ORCHESTRATOR_DEFAULTS.maxConcurrentSessions,
  maxQueued: ORCHESTRATOR_DEFAULTS.maxQueuedSessions,
};

export class SessionLimiter {
  private readonly config: SessionLimiterConfig;

  /** Currently running slot count */
  private running = 0;
  /** Parked jobs waiting for a slot */
  private readonly queue: Array<() => void> = [];

  constructor(config: Partial<SessionLimiterConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get activeCount(): number {
    return this.running;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  /**
   * Run `job` when a slot is free.
   * Rejects with a `QueueFull` BatonError when the queue is at capacity,
   * and with a `Cancelled` BatonError when the signal aborts while queued.
   */
  run<T>(job: () => Promise<T>, hooks: RunHooks = {}): Promise<T> {
    if (this.running < this.config.maxConcurrent) {
      return this.start(job);
    }

    if (this.queue.length >= this.config.maxQueued) {
      return Promise.reject(
        new BatonError('QueueFull', `Session queue full (maxQueuedSessions: ${this.config.maxQueued})`),
      );
    }

    return new Promise<T>((resolve, reject) => {
      const signal = hooks.signal;

      const onAbort = (): void => {
        const index = this.queue.indexOf(attempt);
        if (index >= 0) {
          this.queue.splice(index, 1);
        }
        reject(new BatonError('Cancelled', 'Session cancelled while queued'));
      };

      const attempt = (): void => {
        signal?.removeEventListener('abort', onAbort);
        this.start(job).then(resolve, reject);
      };

      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });
      this.queue.push(attempt);
      hooks.onQueued?.(this.queue.length);
    });
  }

  // ── Private helpers ─────────────────────────────────────────────────

  private async start<T>(job: () => Promise<T>): Promise<T> {
    this.running++;
    try {
      return await job();
    } finally {
      this.running--;
      this.drainQueue();
    }
  }

  private drainQueue(): void {
    while (this.running < this.config.maxConcurrent) {
      const next = this.queue.shift();
      if (!next) {
        return;
      }
      next();
    }
  }
}
