/**
 * State that embeds an independent state machine
 */

import type { Context } from './context';
import { SubmachineError, describeError } from './errors';
import { Event } from './event';
import { BaseState, State } from './state';
import type { StateMachine } from './state-machine';
import { MachineRunState } from './types';

export interface SubmachineOptions {
  /** Parent-side state entered when the nested machine completes in the named final state */
  exitStates?: Record<string, State>;
  /** Parent-side state entered on completion when no exit state matches */
  defaultExit?: State;
  /** Parent-side state entered when the nested machine fails */
  errorState?: State;
  /** Parent event name to nested event name */
  eventMapping?: Record<string, string>;
  /** Forward events to the nested machine (default true) */
  forwardEvents?: boolean;
  completionEvent?: string;
  errorEvent?: string;
}

interface NestedWatch {
  onCompleted: () => void;
  onError: () => void;
}

export class SubmachineState extends BaseState {
  readonly kind = 'submachine' as const;
  readonly submachine: StateMachine;
  readonly completionEvent: string;
  readonly errorEvent: string;
  private exitStates = new Map<string, State>();
  private defaultExit?: State;
  private errorState?: State;
  private eventMapping = new Map<string, string>();
  private forwardEvents: boolean;
  private watch?: NestedWatch;
  private forwarding = 0;

  constructor(name: string, submachine: StateMachine, options: SubmachineOptions = {}) {
    super(name);
    this.submachine = submachine;
    this.completionEvent = options.completionEvent ?? `submachine.done.${name}`;
    this.errorEvent = options.errorEvent ?? `submachine.error.${name}`;
    this.defaultExit = options.defaultExit;
    this.errorState = options.errorState;
    this.forwardEvents = options.forwardEvents ?? true;
    for (const [finalName, state] of Object.entries(options.exitStates ?? {})) {
      this.exitStates.set(finalName, state);
    }
    for (const [from, to] of Object.entries(options.eventMapping ?? {})) {
      this.eventMapping.set(from, to);
    }
  }

  addExitState(finalStateName: string, target: State): this {
    this.exitStates.set(finalStateName, target);
    return this;
  }

  setDefaultExit(target: State): this {
    this.defaultExit = target;
    return this;
  }

  setErrorState(target: State): this {
    this.errorState = target;
    return this;
  }

  mapEvent(parentEvent: string, nestedEvent: string): this {
    this.eventMapping.set(parentEvent, nestedEvent);
    return this;
  }

  setEventForwarding(enabled: boolean): this {
    this.forwardEvents = enabled;
    return this;
  }

  getCurrentSubmachineState(): State | undefined {
    return this.submachine.getCurrentState();
  }

  async enter(ctx: Context): Promise<void> {
    await super.enter(ctx);
    this.watchNested(ctx);
    try {
      await this.submachine.start({ context: ctx, signal: ctx.signal });
    } catch (error) {
      this.unwatchNested();
      throw new SubmachineError(this.name, error);
    }
  }

  async exit(ctx: Context): Promise<void> {
    this.unwatchNested();
    await this.submachine.reset();
    await super.exit(ctx);
  }

  async handleEvent(event: Event, _ctx: Context): Promise<State | undefined> {
    if (this.forwardEvents && this.submachine.isRunning()) {
      const mapped = this.eventMapping.get(event.name);
      this.forwarding++;
      try {
        await this.submachine.submit(mapped ? event.rename(mapped) : event);
      } finally {
        this.forwarding--;
      }
    }
    return this.outcome();
  }

  /**
   * Parent-side consequence of the nested run-state
   */
  private outcome(): State | undefined {
    switch (this.submachine.getRunState()) {
      case MachineRunState.COMPLETED: {
        const finalName = this.submachine.getCurrentStateName();
        return (finalName === undefined ? undefined : this.exitStates.get(finalName)) ?? this.defaultExit;
      }
      case MachineRunState.ERROR:
        if (this.errorState) return this.errorState;
        throw new SubmachineError(this.name, this.submachine.getLastError());
      default:
        return undefined;
    }
  }

  private watchNested(ctx: Context): void {
    this.unwatchNested();
    const owner = ctx.engine;
    const post = (name: string): void => {
      if (this.forwarding > 0 || !owner.isRunning()) return;
      try {
        owner.sendEvent(Event.create(name));
      } catch (error) {
        owner.logger.warn('Could not post sub-machine notification', {
          machine: owner.getName(),
          state: this.name,
          event: name,
          error: describeError(error),
        });
      }
    };

    const watch: NestedWatch = {
      onCompleted: () => post(this.completionEvent),
      onError: () => post(this.errorEvent),
    };
    this.submachine.on('completed', watch.onCompleted);
    this.submachine.on('machine_error', watch.onError);
    this.watch = watch;
  }

  private unwatchNested(): void {
    const watch = this.watch;
    if (!watch) return;
    this.watch = undefined;
    this.submachine.off('completed', watch.onCompleted);
    this.submachine.off('machine_error', watch.onError);
  }
}
