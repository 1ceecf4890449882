/**
 * Fluent construction of state machines
 *
 * States are created as they are declared; references between them are
 * names resolved when build() runs, so declaration order does not matter.
 * A name is looked up in the enclosing scope first, then in each outer scope
 * (`C.A` addresses child A of composite C from anywhere).
 */

import { CompositeState } from './composite-state';
import { DeferState } from './defer-state';
import { ConfigurationError } from './errors';
import { HistoryState } from './history-state';
import { ParallelState } from './parallel-state';
import { ChoiceState, JunctionState } from './pseudostates';
import { EntryPointState, ExitPointState, FinalState, SimpleState, State } from './state';
import { StateMachine, StateMachineOptions } from './state-machine';
import { SubmachineState } from './submachine-state';
import { TimeoutState } from './timeout-state';
import type { TransitionOptions } from './transition';
import { Action, Guard, HistoryType, StateMachineObserver } from './types';

export interface TimeoutBuildOptions {
  target?: string;
  event?: string;
}

export interface SubmachineBuildOptions {
  /** Final state name of the nested machine to parent-side state name */
  exitStates?: Record<string, string>;
  defaultExit?: string;
  errorState?: string;
  eventMapping?: Record<string, string>;
  forwardEvents?: boolean;
  completionEvent?: string;
  errorEvent?: string;
}

/**
 * State registry and deferred name resolution shared by the builders of one
 * machine
 *
 * @internal
 */
export class BuildSession {
  readonly problems: string[] = [];
  private states = new Map<string, State>();
  private links: Array<() => void> = [];

  constructor(readonly options: StateMachineOptions) {}

  register(path: string, state: State): void {
    if (this.states.has(path)) {
      this.problems.push(`Duplicate state "${path}"`);
      return;
    }
    this.states.set(path, state);
  }

  link(resolveLater: () => void): void {
    this.links.push(resolveLater);
  }

  runLinks(): void {
    for (const resolveLater of this.links) {
      resolveLater();
    }
    this.links = [];
  }

  resolve(ref: string, scope: string, usage: string): State | undefined {
    const segments = scope ? scope.split('.') : [];
    for (let depth = segments.length; depth >= 0; depth--) {
      const prefix = segments.slice(0, depth).join('.');
      const state = this.states.get(prefix ? `${prefix}.${ref}` : ref);
      if (state) return state;
    }
    this.problems.push(`Unknown state "${ref}" referenced by ${usage}`);
    return undefined;
  }
}

/**
 * Declarations available at the top level and inside composites
 */
export abstract class ScopeBuilder {
  protected constructor(protected readonly session: BuildSession, protected readonly scope: string) {}

  protected abstract attach(state: State): void;

  protected pathOf(name: string): string {
    return this.scope ? `${this.scope}.${name}` : name;
  }

  protected add<T extends State>(state: T): T {
    this.attach(state);
    this.session.register(this.pathOf(state.name), state);
    return state;
  }

  state(name: string, configure?: (state: SimpleState) => void): this {
    const state = this.add(new SimpleState(name));
    configure?.(state);
    return this;
  }

  final(name: string, configure?: (state: FinalState) => void): this {
    const state = this.add(new FinalState(name));
    configure?.(state);
    return this;
  }

  composite(name: string, configure: (builder: CompositeBuilder) => void): this {
    const state = this.add(new CompositeState(name));
    configure(new CompositeBuilder(this.session, state, this.pathOf(name)));
    return this;
  }

  parallel(name: string, configure: (builder: ParallelBuilder) => void): this {
    const state = this.add(new ParallelState(name));
    configure(new ParallelBuilder(this.session, state, this.pathOf(name)));
    return this;
  }

  choice(name: string, configure: (builder: ChoiceBuilder) => void): this {
    const state = this.add(new ChoiceState(name));
    configure(new ChoiceBuilder(this.session, state, this.scope));
    return this;
  }

  junction(name: string, configure: (builder: JunctionBuilder) => void): this {
    const state = this.add(new JunctionState(name));
    configure(new JunctionBuilder(this.session, state, this.scope));
    return this;
  }

  timeout(name: string, timeoutMs: number, options: TimeoutBuildOptions = {}): this {
    const state = this.add(new TimeoutState(name, timeoutMs, { event: options.event }));
    const target = options.target;
    if (target !== undefined) {
      this.session.link(() => {
        const resolved = this.session.resolve(target, this.scope, `timeout state ${state.name}`);
        if (resolved) state.setTarget(resolved);
      });
    }
    return this;
  }

  defer(name: string, events: string[], configure?: (state: DeferState) => void): this {
    const state = this.add(new DeferState(name, events));
    configure?.(state);
    return this;
  }

  submachine(name: string, machine: StateMachine, options: SubmachineBuildOptions = {}): this {
    const state = this.add(
      new SubmachineState(name, machine, {
        eventMapping: options.eventMapping,
        forwardEvents: options.forwardEvents,
        completionEvent: options.completionEvent,
        errorEvent: options.errorEvent,
      })
    );
    const usage = `sub-machine state ${name}`;
    this.session.link(() => {
      for (const [finalName, ref] of Object.entries(options.exitStates ?? {})) {
        const target = this.session.resolve(ref, this.scope, usage);
        if (target) state.addExitState(finalName, target);
      }
      if (options.defaultExit !== undefined) {
        const target = this.session.resolve(options.defaultExit, this.scope, usage);
        if (target) state.setDefaultExit(target);
      }
      if (options.errorState !== undefined) {
        const target = this.session.resolve(options.errorState, this.scope, usage);
        if (target) state.setErrorState(target);
      }
    });
    return this;
  }
}

export class MachineBuilder extends ScopeBuilder {
  private machine: StateMachine;
  private initialName?: string;
  private firstState?: State;
  private built = false;

  constructor(name: string, options: StateMachineOptions = {}) {
    super(new BuildSession(options), '');
    this.machine = new StateMachine(name, options);
  }

  protected attach(state: State): void {
    this.machine.addState(state);
    if (!this.firstState) {
      this.firstState = state;
    }
  }

  /**
   * Initial state; defaults to the first declared state
   */
  initial(name: string): this {
    this.initialName = name;
    return this;
  }

  transition(from: string, to: string, event: string, options: TransitionOptions = {}): this {
    this.session.link(() => {
      const usage = `transition ${from} --${event}--> ${to}`;
      const source = this.session.resolve(from, '', usage);
      const target = this.session.resolve(to, '', usage);
      if (source && target) {
        this.machine.addTransition(source, target, event, options);
      }
    });
    return this;
  }

  observer(observer: StateMachineObserver): this {
    this.machine.addObserver(observer);
    return this;
  }

  /**
   * @throws ConfigurationError listing every unresolved or duplicate name
   */
  build(): StateMachine {
    if (this.built) return this.machine;

    this.session.runLinks();
    const initial =
      this.initialName === undefined
        ? this.firstState
        : this.session.resolve(this.initialName, '', 'initial state');
    if (!this.firstState) {
      this.session.problems.push('No states declared');
    }
    if (this.session.problems.length > 0) {
      throw new ConfigurationError(`Invalid state machine ${this.machine.getName()}`, this.session.problems);
    }

    this.machine.setInitialState(initial);
    this.built = true;
    return this.machine;
  }
}

export class CompositeBuilder extends ScopeBuilder {
  constructor(session: BuildSession, private compositeState: CompositeState, scope: string) {
    super(session, scope);
  }

  protected attach(state: State): void {
    this.compositeState.addChild(state);
  }

  onEntry(action: Action): this {
    this.compositeState.addEntryAction(action);
    return this;
  }

  onExit(action: Action): this {
    this.compositeState.addExitAction(action);
    return this;
  }

  /**
   * Initial child; defaults to the first declared child
   */
  initial(name: string): this {
    this.session.link(() => {
      const child = this.session.resolve(name, this.scope, `initial child of ${this.compositeState.name}`);
      if (child) this.compositeState.setInitialChild(child);
    });
    return this;
  }

  /**
   * Transition between two children handled by the composite itself
   */
  internal(from: string, to: string, event: string, options: TransitionOptions = {}): this {
    this.session.link(() => {
      const usage = `internal transition ${from} --${event}--> ${to} of ${this.compositeState.name}`;
      const source = this.session.resolve(from, this.scope, usage);
      const target = this.session.resolve(to, this.scope, usage);
      if (source && target) {
        this.compositeState.addInternalTransition(source, target, event, options);
      }
    });
    return this;
  }

  history(name: string, type: HistoryType = HistoryType.SHALLOW, defaultState?: string): this {
    const history = new HistoryState(name, type);
    this.compositeState.setHistory(history);
    this.session.register(this.pathOf(name), history);
    if (defaultState !== undefined) {
      this.session.link(() => {
        const state = this.session.resolve(defaultState, this.scope, `history state ${name}`);
        if (state) history.setDefaultState(state);
      });
    }
    return this;
  }

  entryPoint(name: string, target: string): this {
    const state = this.add(new EntryPointState(name));
    this.session.link(() => {
      const resolved = this.session.resolve(target, this.scope, `entry point ${name}`);
      if (resolved) state.setTarget(resolved);
    });
    return this;
  }

  exitPoint(name: string, target: string): this {
    const state = this.add(new ExitPointState(name));
    this.session.link(() => {
      const resolved = this.session.resolve(target, this.scope, `exit point ${name}`);
      if (resolved) state.setTarget(resolved);
    });
    return this;
  }
}

export class ParallelBuilder {
  constructor(private session: BuildSession, private parallel: ParallelState, private scope: string) {}

  /**
   * Declare a region; its states live in their own machine and namespace
   */
  region(name: string, configure: (builder: MachineBuilder) => void): this {
    const builder = new MachineBuilder(name, this.session.options);
    configure(builder);
    this.session.link(() => {
      try {
        this.parallel.addRegion(name, builder.build());
      } catch (error) {
        if (!(error instanceof ConfigurationError)) throw error;
        this.session.problems.push(...error.problems.map(problem => `region ${this.scope}.${name}: ${problem}`));
      }
    });
    return this;
  }

  /**
   * State entered once every region has completed
   */
  join(target: string): this {
    this.session.link(() => {
      const resolved = this.session.resolve(target, this.scope, `join of ${this.parallel.name}`);
      if (resolved) this.parallel.setJoinTarget(resolved);
    });
    return this;
  }

  onEntry(action: Action): this {
    this.parallel.addEntryAction(action);
    return this;
  }

  onExit(action: Action): this {
    this.parallel.addExitAction(action);
    return this;
  }
}

export class ChoiceBuilder {
  constructor(private session: BuildSession, private choice: ChoiceState, private scope: string) {}

  when(guard: Guard, target: string, priority: number = 0): this {
    this.session.link(() => {
      const resolved = this.session.resolve(target, this.scope, `choice ${this.choice.name}`);
      if (resolved) this.choice.addChoiceWithPriority(guard, resolved, priority);
    });
    return this;
  }

  otherwise(target: string): this {
    this.session.link(() => {
      const resolved = this.session.resolve(target, this.scope, `choice ${this.choice.name}`);
      if (resolved) this.choice.addElseChoice(resolved);
    });
    return this;
  }
}

export class JunctionBuilder {
  constructor(private session: BuildSession, private junction: JunctionState, private scope: string) {}

  path(from: string, to: string, guard?: Guard): this {
    this.session.link(() => {
      const usage = `junction ${this.junction.name}`;
      const source = this.session.resolve(from, this.scope, usage);
      const target = this.session.resolve(to, this.scope, usage);
      if (source && target) this.junction.addPath(source, target, guard);
    });
    return this;
  }
}
