/**
 * State that postpones selected events until it is left
 */

import type { Context } from './context';
import type { Event } from './event';
import { DeferredEvent, EventDeferrer } from './event-deferrer';
import { LeafState } from './state';

export class DeferState extends LeafState {
  readonly kind = 'defer' as const;
  private deferredEvents = new Set<string>();
  private deferrer = new EventDeferrer();

  constructor(name: string, events: Iterable<string> = []) {
    super(name);
    for (const event of events) {
      this.deferredEvents.add(event);
    }
  }

  addDeferredEvent(eventName: string): this {
    this.deferredEvents.add(eventName);
    return this;
  }

  getDeferredEventNames(): string[] {
    return Array.from(this.deferredEvents);
  }

  defers(eventName: string): boolean {
    return this.deferredEvents.has(eventName);
  }

  /**
   * Buffer an event together with a snapshot of the context
   */
  defer(event: Event, ctx: Context): DeferredEvent {
    return this.deferrer.defer(event, ctx);
  }

  getDeferredEvents(): DeferredEvent[] {
    return this.deferrer.getDeferredEvents();
  }

  getDeferredCount(): number {
    return this.deferrer.count;
  }

  clearDeferred(): void {
    this.deferrer.clear();
  }

  /**
   * Hands the buffer to the engine for re-delivery, then exits
   */
  async exit(ctx: Context): Promise<void> {
    const pending = this.deferrer.takeAll();
    if (pending.length > 0) {
      ctx.engine.requeueDeferred(pending);
    }
    await super.exit(ctx);
  }
}
