/**
 * Declarative transition record
 */

import type { Context } from './context';
import type { BaseState, State } from './state';
import type { Action, Guard } from './types';

export interface TransitionOptions {
  guard?: Guard;
  action?: Action;
  /** Higher wins when several transitions are enabled (default 0) */
  priority?: number;
}

/**
 * Transition between two states on a named event
 *
 * Stateless: the same record may fire any number of times. The fluent setters
 * are meant for topology construction only.
 */
export class Transition {
  readonly from: BaseState;
  readonly to: State;
  readonly event: string;
  guard?: Guard;
  action?: Action;
  priority: number;

  constructor(from: BaseState, to: State, event: string, options: TransitionOptions = {}) {
    this.from = from;
    this.to = to;
    this.event = event;
    this.guard = options.guard;
    this.action = options.action;
    this.priority = options.priority ?? 0;
  }

  withGuard(guard: Guard): this {
    this.guard = guard;
    return this;
  }

  withAction(action: Action): this {
    this.action = action;
    return this;
  }

  withPriority(priority: number): this {
    this.priority = priority;
    return this;
  }

  canExecute(ctx: Context): boolean {
    return this.guard ? this.guard(ctx) : true;
  }

  async execute(ctx: Context): Promise<void> {
    if (this.action) {
      await this.action(ctx);
    }
  }

  toString(): string {
    return `${this.from.name} --${this.event}--> ${this.to.name}`;
  }
}

/**
 * Order enabled transitions: priority descending, declaration order on ties
 */
export function sortByPriority(transitions: Transition[]): Transition[] {
  return [...transitions].sort((a, b) => b.priority - a.priority);
}
