/**
 * src/shared/messaging/work-queue.ts
 *
 * WHY:
 * - Background work (wallet provisioning) must not be a detached promise nobody
 *   watches. This queue makes it bounded, retried and observable:
 *   - bounded: enqueue rejects with QueueFullError once `capacity` jobs are
 *     waiting (queued or backing off)
 *   - retried: a handler that throws is re-queued up to `maxAttempts` times,
 *     after a backoff of `retryDelayMs * attempt`
 *   - observable: stats() counters + structured logs per retry/drop
 * - One dedicated worker (concurrency 1): third-party calls are serialized.
 *
 * HOW TO USE:
 * - const queue = new WorkQueue({ handlers, capacity: 100, maxAttempts: 3, retryDelayMs: 1000, logger })
 * - await queue.enqueue({ type: 'wallet.provision', userId, requestId })
 * - await queue.onIdle()   // tests: wait until everything settled, backoffs included
 * - await queue.close()    // shutdown: stop accepting, finish the running job
 *
 * RULES:
 * - Backoff happens off the worker: a job waiting for its retry never holds
 *   up the jobs behind it.
 * - A failing job never escapes the worker: after the last attempt it is
 *   logged and dropped.
 * - close() cancels pending backoffs and drops those jobs; failures after
 *   close() are not retried.
 */

import type { Logger } from '../logger/logger';
import {
  QueueClosedError,
  QueueFullError,
  type Queue,
  type QueueHandlers,
  type QueueMessage,
} from './queue';

/** Runs `run` after `delayMs`; returns a function that cancels it. */
export type RetryScheduler = (run: () => void, delayMs: number) => () => void;

export const timerScheduler: RetryScheduler = (run, delayMs) => {
  const timer = setTimeout(run, delayMs);
  return () => clearTimeout(timer);
};

export type WorkQueueOptions = {
  handlers: QueueHandlers;
  capacity: number;
  maxAttempts: number;
  retryDelayMs: number;
  logger: Logger;
  schedule?: RetryScheduler;
};

export type WorkQueueStats = {
  pending: number;
  /** Jobs waiting out a retry backoff. */
  delayed: number;
  running: number;
  processed: number;
  failed: number;
  retried: number;
  dropped: number;
};

type Job = {
  message: QueueMessage;
  attempt: number;
};

type DelayedJob = {
  job: Job;
  cancel: () => void;
};

export class WorkQueue implements Queue {
  private readonly pending: Job[] = [];
  private readonly delayed = new Set<DelayedJob>();
  private readonly idleWaiters: Array<() => void> = [];
  private readonly schedule: RetryScheduler;

  private worker: Promise<void> | null = null;
  private running: Job | null = null;
  private closed = false;

  private processed = 0;
  private failed = 0;
  private retried = 0;
  private dropped = 0;

  constructor(private readonly opts: WorkQueueOptions) {
    if (opts.capacity < 1) throw new Error('WorkQueue: capacity must be at least 1');
    if (opts.maxAttempts < 1) throw new Error('WorkQueue: maxAttempts must be at least 1');
    this.schedule = opts.schedule ?? timerScheduler;
  }

  enqueue(message: QueueMessage): Promise<void> {
    if (this.closed) return Promise.reject(new QueueClosedError());
    if (this.pending.length + this.delayed.size >= this.opts.capacity) {
      return Promise.reject(new QueueFullError(this.opts.capacity));
    }

    this.pending.push({ message, attempt: 1 });
    this.startWorker();
    return Promise.resolve();
  }

  stats(): WorkQueueStats {
    return {
      pending: this.pending.length,
      delayed: this.delayed.size,
      running: this.running ? 1 : 0,
      processed: this.processed,
      failed: this.failed,
      retried: this.retried,
      dropped: this.dropped,
    };
  }

  /** Resolves when no job is pending, backing off or running. */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /** Stops accepting jobs, drops backed-off ones and waits for the worker to finish. */
  async close(): Promise<void> {
    this.closed = true;

    for (const entry of this.delayed) {
      entry.cancel();
      this.dropped++;
      this.opts.logger.error('queue.job.dropped', {
        flow: 'queue.worker',
        type: entry.job.message.type,
        attempt: entry.job.attempt,
        maxAttempts: this.opts.maxAttempts,
        reason: 'shutdown',
      });
    }
    this.delayed.clear();

    if (this.worker) await this.worker;
    this.notifyIfIdle();
  }

  private isIdle(): boolean {
    return !this.worker && this.pending.length === 0 && this.delayed.size === 0;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    for (const resolve of this.idleWaiters.splice(0, this.idleWaiters.length)) resolve();
  }

  private startWorker(): void {
    if (this.worker) return;
    this.worker = this.runWorker();
  }

  private async runWorker(): Promise<void> {
    try {
      let job = this.pending.shift();
      while (job) {
        await this.runJob(job);
        job = this.pending.shift();
      }
    } finally {
      this.worker = null;
      this.notifyIfIdle();
    }
  }

  private async runJob(job: Job): Promise<void> {
    this.running = job;
    try {
      await this.dispatch(job.message);
      this.processed++;
    } catch (err) {
      this.failed++;
      this.handleFailure(job, err);
    } finally {
      this.running = null;
    }
  }

  private handleFailure(job: Job, err: unknown): void {
    const meta = {
      flow: 'queue.worker',
      type: job.message.type,
      attempt: job.attempt,
      maxAttempts: this.opts.maxAttempts,
      message: err instanceof Error ? err.message : String(err),
    };

    if (job.attempt >= this.opts.maxAttempts || this.closed) {
      this.dropped++;
      this.opts.logger.error('queue.job.dropped', meta);
      return;
    }

    const delayMs = this.opts.retryDelayMs * job.attempt;
    this.retried++;
    this.opts.logger.warn('queue.job.retry', { ...meta, delayMs });

    const next: Job = { message: job.message, attempt: job.attempt + 1 };
    const entry: DelayedJob = { job: next, cancel: () => undefined };
    this.delayed.add(entry);
    entry.cancel = this.schedule(() => {
      if (!this.delayed.delete(entry)) return;
      this.pending.push(next);
      this.startWorker();
    }, delayMs);
  }

  private dispatch(message: QueueMessage): Promise<void> {
    switch (message.type) {
      case 'wallet.provision':
        return this.opts.handlers['wallet.provision'](message);
    }
  }
}
