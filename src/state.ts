/**
 * State abstraction
 *
 * Every state variant extends BaseState and carries a literal `kind`; the
 * State union below is what the engine dispatches on.
 */

import type { ChoiceState, JunctionState } from './pseudostates';
import type { CompositeState } from './composite-state';
import type { Context } from './context';
import type { DeferState } from './defer-state';
import type { Event } from './event';
import type { HistoryState } from './history-state';
import type { ParallelState } from './parallel-state';
import type { SubmachineState } from './submachine-state';
import type { TimeoutState } from './timeout-state';
import { ActionError, isStateMachineError } from './errors';
import { Transition, TransitionOptions } from './transition';
import type { Action, DoActivity, StateKind } from './types';

export type State =
  | SimpleState
  | FinalState
  | CompositeState
  | ParallelState
  | HistoryState
  | ChoiceState
  | JunctionState
  | DeferState
  | TimeoutState
  | EntryPointState
  | ExitPointState
  | SubmachineState;

/**
 * Run user code, wrapping foreign failures into ActionError
 */
export async function invokeUserCode(
  phase: string,
  fn: () => void | Promise<void>,
  stateName?: string,
  eventName?: string
): Promise<void> {
  try {
    await fn();
  } catch (error) {
    if (isStateMachineError(error)) {
      throw error;
    }
    throw new ActionError(phase, error, { stateName, eventName });
  }
}

interface RunningActivity {
  controller: AbortController;
  done: Promise<void>;
}

/**
 * Behaviour shared by all variants: naming, containment, activation flag,
 * entry/exit actions and the do-activity
 */
export abstract class BaseState {
  abstract readonly kind: StateKind;
  readonly name: string;
  private parentState?: CompositeState;
  private active = false;
  private entryAction?: Action;
  private exitAction?: Action;
  private doActivity?: DoActivity;
  private activity?: RunningActivity;

  constructor(name: string) {
    this.name = name;
  }

  get parent(): CompositeState | undefined {
    return this.parentState;
  }

  /** @internal maintained by CompositeState.addChild */
  setParent(parent: CompositeState | undefined): void {
    this.parentState = parent;
  }

  /**
   * Dotted path from the outermost containing composite
   */
  get path(): string {
    return this.parentState ? `${this.parentState.path}.${this.name}` : this.name;
  }

  isActive(): boolean {
    return this.active;
  }

  isComposite(): boolean {
    return false;
  }

  isParallel(): boolean {
    return false;
  }

  isHistory(): boolean {
    return false;
  }

  isFinal(): boolean {
    return false;
  }

  /**
   * Append an entry action; it runs after the ones already registered
   */
  addEntryAction(action: Action): this {
    this.entryAction = chain(this.entryAction, action);
    return this;
  }

  addExitAction(action: Action): this {
    this.exitAction = chain(this.exitAction, action);
    return this;
  }

  setDoActivity(activity: DoActivity): this {
    this.doActivity = activity;
    return this;
  }

  async enter(ctx: Context): Promise<void> {
    this.active = true;
    const action = this.entryAction;
    if (action) {
      await invokeUserCode('entry action', () => action(ctx), this.name, ctx.event?.name);
    }
    this.startActivity(ctx);
  }

  async exit(ctx: Context): Promise<void> {
    await this.stopActivity();
    this.active = false;
    const action = this.exitAction;
    if (action) {
      await invokeUserCode('exit action', () => action(ctx), this.name, ctx.event?.name);
    }
  }

  /**
   * @returns a state to transition to, or undefined when the event is absorbed
   */
  async handleEvent(_event: Event, _ctx: Context): Promise<State | undefined> {
    return undefined;
  }

  private startActivity(ctx: Context): void {
    const activity = this.doActivity;
    if (!activity) return;

    const controller = new AbortController();
    const done = Promise.resolve()
      .then(() => activity(ctx, controller.signal))
      .catch((error: unknown) => {
        if (!controller.signal.aborted) {
          ctx.engine.fail(new ActionError('do-activity', error, { stateName: this.name }));
        }
      });
    this.activity = { controller, done };
  }

  private async stopActivity(): Promise<void> {
    const running = this.activity;
    if (!running) return;
    this.activity = undefined;
    running.controller.abort();
    await running.done;
  }
}

function chain(first: Action | undefined, next: Action): Action {
  if (!first) return next;
  return async ctx => {
    await first(ctx);
    await next(ctx);
  };
}

/**
 * Leaf state that may carry its own local transitions
 */
export abstract class LeafState extends BaseState {
  private transitions: Transition[] = [];

  addTransition(to: State, event: string, options: TransitionOptions = {}): Transition {
    const transition = new Transition(this, to, event, options);
    this.transitions.push(transition);
    return transition;
  }

  getTransitions(): Transition[] {
    return [...this.transitions];
  }

  async handleEvent(event: Event, ctx: Context): Promise<State | undefined> {
    for (const transition of this.transitions) {
      if (transition.event === event.name && transition.canExecute(ctx)) {
        await invokeUserCode('transition action', () => transition.execute(ctx), this.name, event.name);
        return transition.to;
      }
    }
    return undefined;
  }
}

export class SimpleState extends LeafState {
  readonly kind = 'simple' as const;
}

/**
 * Terminal state; reaching it completes the owning engine
 */
export class FinalState extends LeafState {
  readonly kind = 'final' as const;

  isFinal(): boolean {
    return true;
  }
}

/**
 * Redirects entry to its target
 */
export class EntryPointState extends BaseState {
  readonly kind = 'entryPoint' as const;
  private target?: State;

  setTarget(target: State): this {
    this.target = target;
    return this;
  }

  getTarget(): State | undefined {
    return this.target;
  }
}

/**
 * Reached from inside a composite, makes the composite leave to its target
 */
export class ExitPointState extends BaseState {
  readonly kind = 'exitPoint' as const;
  private target?: State;

  setTarget(target: State): this {
    this.target = target;
    return this;
  }

  getTarget(): State | undefined {
    return this.target;
  }
}
