/**
 * Choice and junction pseudostates
 */

import type { Context } from './context';
import { ChoiceOption, ELSE_PRIORITY, JunctionPath, findJunctionPath, orderChoices, selectChoice } from './resolution';
import { BaseState, State } from './state';
import type { Guard } from './types';

/**
 * Dynamic branch, evaluated when the choice is entered
 */
export class ChoiceState extends BaseState {
  readonly kind = 'choice' as const;
  private options: ChoiceOption[] = [];

  addChoice(guard: Guard, target: State): this {
    return this.addChoiceWithPriority(guard, target, 0);
  }

  addChoiceWithPriority(guard: Guard, target: State, priority: number): this {
    this.options.push({ guard, target, priority });
    return this;
  }

  /**
   * Fallback taken when no other guard holds
   */
  addElseChoice(target: State): this {
    this.options.push({ guard: () => true, target, priority: ELSE_PRIORITY });
    return this;
  }

  getChoices(): ChoiceOption[] {
    return orderChoices(this.options);
  }

  /**
   * @returns undefined when no guard holds
   */
  resolve(ctx: Context): State | undefined {
    return selectChoice(this.options, ctx);
  }
}

/**
 * Static branch: a table of (source, guard) to target, first match wins
 */
export class JunctionState extends BaseState {
  readonly kind = 'junction' as const;
  private paths: JunctionPath[] = [];

  addPath(from: BaseState, to: State, guard?: Guard): this {
    this.paths.push({ from, to, guard });
    return this;
  }

  getPaths(): JunctionPath[] {
    return [...this.paths];
  }

  findPath(from: BaseState, ctx: Context): State | undefined {
    return findJunctionPath(this.paths, from, ctx);
  }
}
