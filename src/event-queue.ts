/**
 * Bounded FIFO queue feeding an engine's processing loop
 */

import type { Event } from './event';

export interface QueuedEvent {
  event: Event;
  /** Settles the submit() promise once the event is processed or discarded */
  settle?: () => void;
}

export class EventQueue {
  private items: QueuedEvent[] = [];
  private waiter: ((item: QueuedEvent | undefined) => void) | null = null;

  constructor(readonly capacity: number) {}

  get size(): number {
    return this.items.length;
  }

  /**
   * Non-blocking enqueue
   *
   * @returns false when the queue is full
   */
  offer(item: QueuedEvent): boolean {
    if (this.waiter) {
      const wake = this.waiter;
      this.waiter = null;
      wake(item);
      return true;
    }
    if (this.items.length >= this.capacity) {
      return false;
    }
    this.items.push(item);
    return true;
  }

  /**
   * Wait for the next event; resolves undefined once the signal aborts
   */
  take(signal: AbortSignal): Promise<QueuedEvent | undefined> {
    if (signal.aborted) {
      return Promise.resolve(undefined);
    }
    const next = this.items.shift();
    if (next) {
      return Promise.resolve(next);
    }

    return new Promise(resolve => {
      const onAbort = (): void => {
        this.waiter = null;
        resolve(undefined);
      };
      signal.addEventListener('abort', onAbort, { once: true });
      this.waiter = item => {
        signal.removeEventListener('abort', onAbort);
        resolve(item);
      };
    });
  }

  /**
   * Discard pending events, settling their submitters
   */
  clear(): number {
    const dropped = this.items.splice(0, this.items.length);
    for (const item of dropped) {
      item.settle?.();
    }
    return dropped.length;
  }
}
