/**
 * Execution context shared by the states of one engine
 */

import type { Event } from './event';
import type { StateMachine } from './state-machine';

/**
 * Scratchpad for one engine instance
 *
 * The data map outlives individual events. Regions and sub-machines get their
 * own Context through fork(), starting from a shallow snapshot of this one.
 */
export class Context {
  readonly engine: StateMachine;
  event?: Event;
  private data: Map<string, unknown>;
  private runSignal: AbortSignal;

  constructor(engine: StateMachine, data?: Iterable<readonly [string, unknown]>, signal?: AbortSignal) {
    this.engine = engine;
    this.data = new Map(data ?? []);
    this.runSignal = signal ?? new AbortController().signal;
  }

  /** Cancellation signal of the engine's current run */
  get signal(): AbortSignal {
    return this.runSignal;
  }

  get(key: string): unknown {
    return this.data.get(key);
  }

  set(key: string, value: unknown): this {
    this.data.set(key, value);
    return this;
  }

  has(key: string): boolean {
    return this.data.has(key);
  }

  delete(key: string): boolean {
    return this.data.delete(key);
  }

  keys(): string[] {
    return Array.from(this.data.keys());
  }

  snapshot(): Record<string, unknown> {
    return Object.fromEntries(this.data);
  }

  /**
   * Independent copy bound to the same engine
   */
  clone(): Context {
    const copy = new Context(this.engine, this.data, this.runSignal);
    copy.event = this.event?.clone();
    return copy;
  }

  /**
   * Independent copy bound to another engine (region or sub-machine)
   */
  fork(engine: StateMachine, signal: AbortSignal): Context {
    const copy = new Context(engine, this.data, signal);
    copy.event = this.event?.clone();
    return copy;
  }

  /** @internal */
  bindSignal(signal: AbortSignal): void {
    this.runSignal = signal;
  }
}
