/**
 * Buffer of deferred events, kept in arrival order
 */

import type { Context } from './context';
import type { Event } from './event';

export interface DeferredEvent {
  event: Event;
  /** Snapshot of the context at the moment of deferral */
  context: Context;
  deferredAt: Date;
}

export class EventDeferrer {
  private events: DeferredEvent[] = [];

  defer(event: Event, ctx: Context): DeferredEvent {
    const deferred: DeferredEvent = { event, context: ctx.clone(), deferredAt: new Date() };
    this.events.push(deferred);
    return deferred;
  }

  push(...deferred: DeferredEvent[]): void {
    this.events.push(...deferred);
  }

  /**
   * Remove and return every buffered event, oldest first
   */
  takeAll(): DeferredEvent[] {
    return this.events.splice(0, this.events.length);
  }

  getDeferredEvents(): DeferredEvent[] {
    return [...this.events];
  }

  get count(): number {
    return this.events.length;
  }

  clear(): void {
    this.events = [];
  }
}
