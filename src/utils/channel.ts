/**
 * Single-consumer async queue used to stream progress out of a running workflow
 */

import { deferred } from "./async.js";

type Pending<T> = ReturnType<typeof deferred<IteratorResult<T, undefined>>>;

/**
 * Unbounded push/pull channel.
 *
 * The producer calls `push` and finally `close`. The consumer iterates
 * with `for await`. If the consumer stops early (`break` or `return()`), `onCancel`
 * fires so the producer can abort its work.
 */
export class Channel<T extends object> implements AsyncIterableIterator<T> {
  private readonly buffer: T[] = [];
  private waiting: Pending<T> | null = null;
  private closed = false;
  private readonly cancelHandlers: (() => void)[] = [];

  push(value: T): void {
    if (this.closed) return;
    if (this.waiting) {
      const waiter = this.waiting;
      this.waiting = null;
      waiter.resolve({ value, done: false });
      return;
    }
    this.buffer.push(value);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.waiting) {
      const waiter = this.waiting;
      this.waiting = null;
      waiter.resolve({ value: undefined, done: true });
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  onCancel(handler: () => void): void {
    this.cancelHandlers.push(handler);
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const value = this.buffer.shift();
    if (value !== undefined) {
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    this.waiting = deferred<IteratorResult<T, undefined>>();
    return this.waiting.promise;
  }

  return(): Promise<IteratorResult<T, undefined>> {
    const wasOpen = !this.closed;
    this.buffer.length = 0;
    this.close();
    if (wasOpen) {
      for (const handler of this.cancelHandlers) {
        handler();
      }
    }
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }
}
