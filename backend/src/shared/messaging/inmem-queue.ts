/**
 * src/shared/messaging/inmem-queue.ts
 *
 * WHY:
 * - Tests need to inspect what messages the service enqueued without running
 *   the worker or any third-party call.
 * - drain() is the test contract: call it after the HTTP request completes
 *   to get all enqueued messages, then assert on their contents.
 * - Production: di.ts wires the WorkQueue instead, without touching service code.
 *
 * RULES:
 * - Implements Queue only; drain() is for test helpers.
 * - failNext() lets a test simulate a rejected enqueue (full/closed queue).
 */

import type { Queue, QueueMessage } from './queue';

export class InMemQueue implements Queue {
  private readonly messages: QueueMessage[] = [];
  private nextFailure: Error | null = null;

  enqueue(message: QueueMessage): Promise<void> {
    if (this.nextFailure) {
      const err = this.nextFailure;
      this.nextFailure = null;
      return Promise.reject(err);
    }

    this.messages.push(message);
    return Promise.resolve();
  }

  /** Returns all enqueued messages and clears the queue. */
  drain(): QueueMessage[] {
    return this.messages.splice(0, this.messages.length);
  }

  failNext(err: Error): void {
    this.nextFailure = err;
  }
}
