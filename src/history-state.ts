/**
 * History pseudostate
 */

import type { CompositeState } from './composite-state';
import { NoTargetStateError } from './errors';
import { resolveHistory } from './resolution';
import { BaseState, State } from './state';
import { HistoryType } from './types';

/**
 * Remembers the configuration of its owner composite across exits
 *
 * A transition that targets a history state enters the owner composite, which
 * restores the recorded child (shallow) or the recorded chain (deep).
 */
export class HistoryState extends BaseState {
  readonly kind = 'history' as const;
  readonly historyType: HistoryType;
  private defaultState?: State;
  private lastChain: State[] = [];
  private ownerState?: CompositeState;

  constructor(name: string, historyType: HistoryType = HistoryType.SHALLOW) {
    super(name);
    this.historyType = historyType;
  }

  isHistory(): boolean {
    return true;
  }

  get owner(): CompositeState | undefined {
    return this.ownerState;
  }

  /** @internal maintained by CompositeState.setHistory */
  attach(owner: CompositeState): void {
    this.ownerState = owner;
    this.setParent(owner);
  }

  setDefaultState(state: State): this {
    this.defaultState = state;
    return this;
  }

  getDefaultState(): State | undefined {
    return this.defaultState;
  }

  /**
   * Direct child of the owner that was active at the last exit
   */
  getLastState(): State | undefined {
    return this.lastChain[0];
  }

  getLastChain(): State[] {
    return [...this.lastChain];
  }

  hasRecord(): boolean {
    return this.lastChain.length > 0 || this.defaultState !== undefined;
  }

  /** @internal called by the owner before it exits its children */
  record(chain: readonly State[]): void {
    if (chain.length === 0) return;
    this.lastChain = this.historyType === HistoryType.DEEP ? [...chain] : [chain[0]];
  }

  clear(): void {
    this.lastChain = [];
  }

  /**
   * States to restore below the owner, outermost first
   */
  resolve(): State[] {
    const chain = resolveHistory({
      type: this.historyType,
      lastChain: this.lastChain,
      defaultState: this.defaultState,
    });
    if (!chain) {
      throw new NoTargetStateError(this.name);
    }
    return chain;
  }
}
