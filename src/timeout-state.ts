/**
 * State that fires an event after a fixed delay
 */

import { v4 as uuidv4 } from 'uuid';
import type { Context } from './context';
import { Event } from './event';
import { LeafState, State } from './state';

export const DEFAULT_TIMEOUT_EVENT = 'TIMEOUT';

/** Metadata key tagging a timeout event with the timer that produced it */
export const TIMER_ID_KEY = 'timerId';

export interface TimeoutOptions {
  target?: State;
  /** Name of the event sent when the delay expires (default TIMEOUT) */
  event?: string;
}

interface ArmedTimer {
  id: string;
  ctx: Context;
  onAbort: () => void;
}

/**
 * Schedules a one-shot timer on the engine's timer wheel when entered
 *
 * Each activation gets a fresh timer id; a timeout event carrying another id
 * was produced by an earlier activation and is ignored.
 */
export class TimeoutState extends LeafState {
  readonly kind = 'timeout' as const;
  readonly timeoutMs: number;
  readonly timeoutEvent: string;
  private target?: State;
  private armed?: ArmedTimer;
  private currentTimerId?: string;

  constructor(name: string, timeoutMs: number, options: TimeoutOptions = {}) {
    super(name);
    this.timeoutMs = timeoutMs;
    this.timeoutEvent = options.event ?? DEFAULT_TIMEOUT_EVENT;
    this.target = options.target;
  }

  setTarget(target: State): this {
    this.target = target;
    return this;
  }

  getTarget(): State | undefined {
    return this.target;
  }

  /** Id of the pending timer, if any */
  getTimerId(): string | undefined {
    return this.armed?.id;
  }

  /**
   * True for a timeout event left over from a previous activation
   */
  isStale(event: Event): boolean {
    if (event.name !== this.timeoutEvent) return false;
    const timerId = event.getMetadata(TIMER_ID_KEY);
    return timerId !== undefined && timerId !== this.currentTimerId;
  }

  async enter(ctx: Context): Promise<void> {
    await super.enter(ctx);
    this.arm(ctx);
  }

  async exit(ctx: Context): Promise<void> {
    this.disarm();
    this.currentTimerId = undefined;
    await super.exit(ctx);
  }

  async handleEvent(event: Event, ctx: Context): Promise<State | undefined> {
    if (this.isStale(event)) return undefined;
    if (event.name === this.timeoutEvent && this.target) {
      this.currentTimerId = undefined;
      return this.target;
    }
    return super.handleEvent(event, ctx);
  }

  private arm(ctx: Context): void {
    this.disarm();
    if (ctx.signal.aborted) return;

    const id = `${this.name}:${uuidv4()}`;
    const engine = ctx.engine;
    const onAbort = (): void => this.disarm();
    ctx.signal.addEventListener('abort', onAbort, { once: true });

    this.armed = { id, ctx, onAbort };
    this.currentTimerId = id;
    engine.timers.schedule(id, this.timeoutMs, () => {
      if (this.armed?.id === id) {
        this.armed.ctx.signal.removeEventListener('abort', this.armed.onAbort);
        this.armed = undefined;
      }
      engine.sendEvent(Event.create(this.timeoutEvent).withMetadata(TIMER_ID_KEY, id));
    });
  }

  /**
   * Cancel the pending timer; safe to call repeatedly
   */
  private disarm(): void {
    const armed = this.armed;
    if (!armed) return;
    this.armed = undefined;
    armed.ctx.signal.removeEventListener('abort', armed.onAbort);
    armed.ctx.engine.timers.cancel(armed.id);
  }
}
