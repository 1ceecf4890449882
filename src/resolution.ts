/**
 * Decision logic for history, choice and junction pseudostates
 *
 * Pure functions: they read the context through guards and never touch the
 * active configuration.
 */

import type { Context } from './context';
import type { BaseState, State } from './state';
import { HistoryType, Guard } from './types';

export interface ChoiceOption {
  guard: Guard;
  target: State;
  priority: number;
}

export interface JunctionPath {
  from: BaseState;
  to: State;
  guard?: Guard;
}

export interface HistoryRecord {
  type: HistoryType;
  /** Active chain recorded at the last exit, outermost child first */
  lastChain: readonly State[];
  defaultState?: State;
}

/** Priority given to an "else" option so it always sorts last */
export const ELSE_PRIORITY = Number.MIN_SAFE_INTEGER;

/**
 * Priority descending, insertion order on ties
 */
export function orderChoices(options: readonly ChoiceOption[]): ChoiceOption[] {
  return [...options].sort((a, b) => (a.priority === b.priority ? 0 : b.priority > a.priority ? 1 : -1));
}

/**
 * First option whose guard holds, after ordering
 */
export function selectChoice(options: readonly ChoiceOption[], ctx: Context): State | undefined {
  return orderChoices(options).find(option => option.guard(ctx))?.target;
}

export function findJunctionPath(paths: readonly JunctionPath[], from: BaseState, ctx: Context): State | undefined {
  return paths.find(path => path.from === from && (!path.guard || path.guard(ctx)))?.to;
}

/**
 * Chain of states to restore, outermost first
 *
 * Shallow history restores only the recorded child; deep history restores the
 * whole recorded chain. Without a record the default state is used.
 *
 * @returns undefined when there is neither a record nor a default
 */
export function resolveHistory(record: HistoryRecord): State[] | undefined {
  if (record.lastChain.length > 0) {
    return record.type === HistoryType.DEEP ? [...record.lastChain] : [record.lastChain[0]];
  }
  return record.defaultState ? [record.defaultState] : undefined;
}
