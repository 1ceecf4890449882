/**
 * Statechart engine
 *
 * One engine owns a bounded event queue and one asynchronous processing loop.
 * Events are processed one at a time; parallel regions and sub-machines run
 * their own engines and interleave with this one on the Node.js event loop.
 */

import { EventEmitter } from 'events';
import type winston from 'winston';
import { loadConfig } from './config';
import { Context } from './context';
import {
  ActionError,
  AlreadyRunningError,
  NoInitialStateError,
  NotRunningError,
  QueueFullError,
  describeError,
  isStateMachineError,
} from './errors';
import { Event } from './event';
import { DeferredEvent, EventDeferrer } from './event-deferrer';
import { EventQueue } from './event-queue';
import type { DeferState } from './defer-state';
import type { CompositeState } from './composite-state';
import type { HistoryState } from './history-state';
import { getDefaultLogger } from './logger';
import type { JunctionState } from './pseudostates';
import { BaseState, State, invokeUserCode } from './state';
import { TIMER_ID_KEY } from './timeout-state';
import { TimerWheel } from './timer-wheel';
import { Transition, TransitionOptions, sortByPriority } from './transition';
import {
  Action,
  Guard,
  MachineRunState,
  StateMachineObserver,
  StateNotice,
  TransitionNotice,
} from './types';

/** Name of the event reported for transitions taken while starting */
export const START_EVENT = 'statechart.start';

export interface StateMachineOptions {
  /** Capacity of the event queue (default from STATECHART_QUEUE_CAPACITY, else 100) */
  queueCapacity?: number;
  /** Tick of the timer wheel used by timeout states */
  timerTickMs?: number;
  logger?: winston.Logger;
}

export interface StartOptions {
  /** Context to fork from; the engine keeps its own otherwise */
  context?: Context;
  /** Aborting this signal ends the engine's loop */
  signal?: AbortSignal;
}

/**
 * Where a transition lands: the state that becomes current at this level and
 * the descendants to activate below it
 */
interface EntryPlan {
  top: State;
  path: State[];
  /** Resolved at entry, after the source has exited and recorded */
  history?: HistoryState;
}

export class StateMachine extends EventEmitter {
  readonly name: string;
  readonly timers: TimerWheel;
  readonly logger: winston.Logger;
  private states = new Map<string, State>();
  private transitions: Transition[] = [];
  private initialState?: State;
  private finalStates = new Set<string>();
  private observers: StateMachineObserver[] = [];

  private currentState?: State;
  private runState: MachineRunState = MachineRunState.STOPPED;
  private lastError?: Error;
  private context: Context;
  private queue: EventQueue;
  private redelivery = new EventDeferrer();
  private controller?: AbortController;
  private loop?: Promise<void>;
  private stopping?: Promise<void>;
  private processing: Promise<void> = Promise.resolve();
  private unlinkSignal?: () => void;

  constructor(name: string, options: StateMachineOptions = {}) {
    super();
    const needsConfig = options.queueCapacity === undefined || options.timerTickMs === undefined;
    const config = needsConfig ? loadConfig() : undefined;

    this.name = name;
    this.logger = options.logger ?? getDefaultLogger();
    this.queue = new EventQueue(options.queueCapacity ?? config?.queueCapacity ?? 100);
    this.timers = new TimerWheel(options.timerTickMs ?? config?.timerTickMs ?? 10, 6000, this.logger);
    this.context = new Context(this);
  }

  // ---------------------------------------------------------------------------
  // Topology
  // ---------------------------------------------------------------------------

  addState(state: State | null | undefined): this {
    if (!state) return this;
    this.states.set(state.name, state);
    if (state.isFinal()) {
      this.finalStates.add(state.name);
    }
    return this;
  }

  /**
   * Register a state as final; reaching it completes the engine
   */
  addFinalState(state: State | null | undefined): this {
    if (!state) return this;
    this.addState(state);
    this.finalStates.add(state.name);
    return this;
  }

  addTransition(from: BaseState, to: State, event: string, options?: TransitionOptions): Transition;
  addTransition(
    from: BaseState | null | undefined,
    to: State | null | undefined,
    event: string,
    options?: TransitionOptions
  ): Transition | undefined;
  addTransition(
    from: BaseState | null | undefined,
    to: State | null | undefined,
    event: string,
    options: TransitionOptions = {}
  ): Transition | undefined {
    if (!from || !to) return undefined;
    const transition = new Transition(from, to, event, options);
    this.transitions.push(transition);
    return transition;
  }

  addTransitionWithGuard(from: BaseState, to: State, event: string, guard: Guard): Transition;
  addTransitionWithGuard(
    from: BaseState | null | undefined,
    to: State | null | undefined,
    event: string,
    guard: Guard
  ): Transition | undefined;
  addTransitionWithGuard(
    from: BaseState | null | undefined,
    to: State | null | undefined,
    event: string,
    guard: Guard
  ): Transition | undefined {
    return this.addTransition(from, to, event, { guard });
  }

  addTransitionWithAction(from: BaseState, to: State, event: string, action: Action): Transition;
  addTransitionWithAction(
    from: BaseState | null | undefined,
    to: State | null | undefined,
    event: string,
    action: Action
  ): Transition | undefined;
  addTransitionWithAction(
    from: BaseState | null | undefined,
    to: State | null | undefined,
    event: string,
    action: Action
  ): Transition | undefined {
    return this.addTransition(from, to, event, { action });
  }

  setInitialState(state: State | null | undefined): this {
    if (!state) return this;
    this.addState(state);
    this.initialState = state;
    return this;
  }

  /**
   * @returns false when no state has that name
   */
  setInitialStateByName(name: string): boolean {
    const state = this.states.get(name);
    if (!state) return false;
    this.initialState = state;
    return true;
  }

  addObserver(observer: StateMachineObserver | null | undefined): this {
    if (observer) {
      this.observers.push(observer);
    }
    return this;
  }

  removeObserver(observer: StateMachineObserver): boolean {
    const index = this.observers.indexOf(observer);
    if (index < 0) return false;
    this.observers.splice(index, 1);
    return true;
  }

  // ---------------------------------------------------------------------------
  // Introspection
  // ---------------------------------------------------------------------------

  getName(): string {
    return this.name;
  }

  getState(name: string): State | undefined {
    return this.states.get(name);
  }

  getStates(): State[] {
    return Array.from(this.states.values());
  }

  getTransitions(): Transition[] {
    return [...this.transitions];
  }

  getInitialState(): State | undefined {
    return this.initialState;
  }

  getFinalStateNames(): string[] {
    return Array.from(this.finalStates);
  }

  getCurrentState(): State | undefined {
    return this.currentState;
  }

  getCurrentStateName(): string | undefined {
    return this.currentState?.name;
  }

  /**
   * Dotted paths of every active leaf, region leaves included
   */
  getActiveConfiguration(): string[] {
    const chain = this.activeChain();
    const leaf = chain[chain.length - 1];
    if (!leaf) return [];
    if (leaf.kind === 'parallel') {
      return leaf
        .getRegions()
        .filter(region => region.isActive())
        .flatMap(region => region.engine.getActiveConfiguration().map(path => `${leaf.path}.${region.name}.${path}`));
    }
    if (leaf.kind === 'submachine') {
      const nested = leaf.submachine.getActiveConfiguration().map(path => `${leaf.path}.${path}`);
      return nested.length > 0 ? nested : [leaf.path];
    }
    return [leaf.path];
  }

  getRunState(): MachineRunState {
    return this.runState;
  }

  /**
   * True while the engine accepts events
   */
  isRunning(): boolean {
    return this.runState === MachineRunState.RUNNING && this.controller !== undefined && !this.controller.signal.aborted;
  }

  isCompleted(): boolean {
    return this.runState === MachineRunState.COMPLETED;
  }

  getLastError(): Error | undefined {
    return this.lastError;
  }

  getContext(): Context {
    return this.context;
  }

  /**
   * Events waiting for re-delivery plus those held by active defer states
   */
  getDeferredEventCount(): number {
    return this.activeChain().reduce(
      (count, state) => (state.kind === 'defer' ? count + state.getDeferredCount() : count),
      this.redelivery.count
    );
  }

  getQueueSize(): number {
    return this.queue.size;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  async start(options: StartOptions = {}): Promise<void> {
    if (this.runState !== MachineRunState.STOPPED) {
      throw new AlreadyRunningError(this.name);
    }
    const initial = this.initialState;
    if (!initial) {
      throw new NoInitialStateError(this.name);
    }

    const controller = new AbortController();
    this.controller = controller;
    this.linkSignal(options.signal, controller);
    if (options.context) {
      this.context = options.context.fork(this, controller.signal);
    } else {
      this.context.bindSignal(controller.signal);
    }
    this.lastError = undefined;
    this.runState = MachineRunState.RUNNING;

    try {
      await this.serialize(() => this.enterInitial(initial));
    } catch (error) {
      const failure = this.toFailure(error);
      this.fail(failure);
      throw failure;
    }

    this.logger.debug('State machine started', { machine: this.name, state: this.currentState?.name });
    this.loop = this.runLoop(controller.signal);
  }

  /**
   * Stop processing and exit the active chain once
   *
   * The event in flight finishes; queued events are discarded.
   */
  stop(): Promise<void> {
    if (this.runState === MachineRunState.STOPPED) return Promise.resolve();
    if (!this.stopping) {
      this.stopping = this.halt().finally(() => {
        this.stopping = undefined;
      });
    }
    return this.stopping;
  }

  /**
   * Stop, then forget the active configuration, queued and deferred events
   * and the last error
   */
  async reset(): Promise<void> {
    const wasInError = this.runState === MachineRunState.ERROR;
    try {
      await this.stop();
      if (wasInError) {
        await this.abandonActiveChain();
      }
    } finally {
      this.currentState = undefined;
      this.lastError = undefined;
      this.queue.clear();
      this.redelivery.clear();
      this.timers.clear();
      this.runState = MachineRunState.STOPPED;
    }
  }

  /**
   * Record a runtime failure and halt the engine
   */
  fail(error: Error): void {
    if (this.runState === MachineRunState.STOPPED) {
      this.logger.warn('Ignoring failure reported to a stopped state machine', {
        machine: this.name,
        error: error.message,
      });
      return;
    }
    if (this.runState === MachineRunState.ERROR) {
      this.logger.debug('Further failure after halting', { machine: this.name, error: error.message });
      return;
    }
    this.lastError = error;
    this.runState = MachineRunState.ERROR;
    this.controller?.abort();
    this.logger.error('State machine failed', { machine: this.name, state: this.currentState?.name, error: error.message });
    this.notify(observer => observer.onError?.(this, error));
    this.publish('machine_error', error);
  }

  // ---------------------------------------------------------------------------
  // Events
  // ---------------------------------------------------------------------------

  /**
   * Queue an event; returns before it is processed
   */
  sendEvent(event: Event): void {
    if (!this.isRunning()) {
      throw new NotRunningError(this.name);
    }
    if (!this.queue.offer({ event })) {
      throw new QueueFullError(this.name, event.name, this.queue.capacity);
    }
  }

  sendEventWithData(name: string, payload?: unknown): void {
    this.sendEvent(Event.create(name, payload));
  }

  /**
   * Queue an event and wait until it has been processed or discarded
   */
  async submit(event: Event): Promise<void> {
    if (!this.isRunning()) {
      throw new NotRunningError(this.name);
    }
    await new Promise<void>((resolve, reject) => {
      if (!this.queue.offer({ event, settle: resolve })) {
        reject(new QueueFullError(this.name, event.name, this.queue.capacity));
      }
    });
  }

  /**
   * Process an event inline, bypassing the queue
   */
  async handleEvent(event: Event): Promise<void> {
    if (!this.isRunning()) {
      throw new NotRunningError(this.name);
    }
    await this.serialize(() => this.dispatch(event));
  }

  /** @internal receives the buffer of a defer state being exited */
  requeueDeferred(events: DeferredEvent[]): void {
    this.redelivery.push(...events);
  }

  // ---------------------------------------------------------------------------
  // Processing
  // ---------------------------------------------------------------------------

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.processing.then(task);
    this.processing = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    try {
      while (this.runState === MachineRunState.RUNNING) {
        const item = await this.queue.take(signal);
        if (!item) break;
        try {
          await this.serialize(() => this.dispatch(item.event));
        } catch (error) {
          this.logger.debug('Processing loop halted', { machine: this.name, error: describeError(error) });
          break;
        } finally {
          item.settle?.();
        }
      }
    } finally {
      this.queue.clear();
    }
  }

  private async dispatch(event: Event): Promise<void> {
    if (this.runState !== MachineRunState.RUNNING) return;
    try {
      const deferred = await this.processEvent(event);
      if (!deferred) {
        await this.drainRedelivery();
      }
    } catch (error) {
      const failure = this.toFailure(error, event);
      this.fail(failure);
      throw failure;
    }
  }

  /**
   * @returns true when the event was deferred
   */
  private async processEvent(event: Event): Promise<boolean> {
    this.context.event = event;
    const current = this.currentState;
    if (!current) return false;

    const deferring = this.findDeferringState(event.name);
    if (deferring) {
      deferring.defer(event, this.context);
      this.logger.debug('Event deferred', { machine: this.name, state: deferring.name, event: event.name });
      return true;
    }

    if (this.isStaleTimeout(event)) {
      this.logger.debug('Stale timeout ignored', { machine: this.name, event: event.name });
      this.notifyEventProcessed(event);
      return false;
    }

    const transition = this.selectTransition(event);
    if (transition) {
      await this.executeTransition(current, transition, event);
      return false;
    }

    const chain = this.activeChain();
    const leaf = chain[chain.length - 1];
    const next = await current.handleEvent(event, this.context);
    if (next && next !== current) {
      const plan = this.planEntry(next, leaf);
      if (plan) {
        await this.transitionTo(current, plan, event);
        return false;
      }
    }
    this.notifyEventProcessed(event);
    return false;
  }

  /**
   * Re-deliver events released by defer states, oldest first
   */
  private async drainRedelivery(): Promise<void> {
    let pending = this.redelivery.takeAll();
    while (pending.length > 0 && this.runState === MachineRunState.RUNNING) {
      const [next, ...rest] = pending;
      const deferredAgain = await this.processEvent(next.event);
      pending = deferredAgain ? rest : [...this.redelivery.takeAll(), ...rest];
    }
    if (pending.length > 0) {
      this.redelivery.push(...pending);
    }
  }

  /**
   * Transitions declared from any state of the active chain
   */
  private selectTransition(event: Event): Transition | undefined {
    const chain = this.activeChain();
    const candidates = this.transitions.filter(
      transition =>
        transition.event === event.name &&
        this.sourceIndex(chain, transition.from) >= 0 &&
        this.evaluateGuard(transition, event)
    );
    return sortByPriority(candidates)[0];
  }

  /**
   * Position of a transition source in the active chain, -1 when inactive
   *
   * A source named `Parent.Child` stands for the active direct child.
   */
  private sourceIndex(chain: readonly State[], from: BaseState): number {
    const index = chain.findIndex(state => state === from);
    if (index >= 0) return index;
    const [top, child] = chain;
    return top && child && from.name === `${top.name}.${child.name}` ? 1 : -1;
  }

  private evaluateGuard(transition: Transition, event: Event): boolean {
    try {
      return transition.canExecute(this.context);
    } catch (error) {
      throw new ActionError('guard', error, { stateName: transition.from.name, eventName: event.name });
    }
  }

  private async executeTransition(current: State, transition: Transition, event: Event): Promise<void> {
    const owner = this.switchingComposite(transition);
    if (owner) {
      const previous = owner.getCurrentChild();
      await owner.switchChild(transition.to, this.context, transition);
      const next = owner.getCurrentChild();
      if (previous) this.notifyExit(previous);
      if (next) {
        this.notifyEnter(next);
        this.notifyTransition(previous, next, event);
      }
      this.logger.debug('Child transition', { machine: this.name, from: previous?.path, to: next?.path, event: event.name });
      this.notifyEventProcessed(event);
      return;
    }

    const plan = this.planEntry(transition.to, transition.from);
    if (!plan) {
      this.logger.debug('Junction left the event unhandled', { machine: this.name, state: current.name, event: event.name });
      this.notifyEventProcessed(event);
      return;
    }
    await this.transitionTo(current, plan, event, transition);
  }

  /**
   * Innermost active composite above the source that owns the target as a
   * direct child; such transitions swap children without leaving it
   */
  private switchingComposite(transition: Transition): CompositeState | undefined {
    if (transition.to.kind === 'junction') return undefined;
    const chain = this.activeChain();
    const fromIndex = this.sourceIndex(chain, transition.from);
    for (let i = fromIndex - 1; i >= 0; i--) {
      const state = chain[i];
      if (state.kind === 'composite' && state.hasChild(transition.to)) {
        return state;
      }
    }
    return undefined;
  }

  private async transitionTo(source: State, plan: EntryPlan, event: Event, transition?: Transition): Promise<void> {
    await source.exit(this.context);
    if (transition) {
      await invokeUserCode('transition action', () => transition.execute(this.context), source.name, event.name);
    }
    await this.enterPlan(plan);

    this.logger.debug('Transition', { machine: this.name, from: source.name, to: plan.top.name, event: event.name });
    this.notifyExit(source);
    this.notifyEnter(plan.top);
    this.notifyTransition(source, plan.top, event);

    await this.settleChoice(event);
    this.notifyEventProcessed(event);
    this.checkCompletion();
  }

  /**
   * Resolve static redirects (junction, history, entry point) of a target
   *
   * @returns undefined when a junction has no matching path
   */
  private planEntry(target: State, source: BaseState): EntryPlan | undefined {
    let state = target;
    const seen = new Set<State>();
    while (!seen.has(state)) {
      seen.add(state);
      if (state.kind === 'junction') {
        const next = this.resolveJunction(state, source);
        if (!next) return undefined;
        state = next;
      } else if (state.kind === 'entryPoint') {
        const next = state.getTarget();
        if (!next) break;
        state = next;
      } else if (state.kind === 'history') {
        return this.planHistoryEntry(state);
      } else {
        break;
      }
    }
    return this.planPath(state, []);
  }

  private resolveJunction(junction: JunctionState, source: BaseState): State | undefined {
    try {
      return junction.findPath(source, this.context);
    } catch (error) {
      throw new ActionError('junction guard', error, { stateName: junction.name, eventName: this.context.event?.name });
    }
  }

  private planHistoryEntry(history: HistoryState): EntryPlan {
    const owner = history.owner;
    if (!owner) {
      return this.planPath(history, []);
    }
    return { ...this.planPath(owner, []), history };
  }

  /**
   * The outermost ancestor becomes current; the rest is activated below it
   */
  private planPath(state: State, below: State[]): EntryPlan {
    const ancestors: State[] = [];
    let parent = state.parent;
    while (parent) {
      ancestors.unshift(parent);
      parent = parent.parent;
    }
    const [top, ...rest] = [...ancestors, state];
    return { top, path: [...rest, ...below] };
  }

  private async enterPlan(plan: EntryPlan): Promise<void> {
    const path = plan.history ? [...plan.path, ...plan.history.resolve()] : plan.path;
    this.currentState = plan.top;
    if (plan.top.kind === 'composite' && path.length > 0) {
      await plan.top.enterVia(this.context, path);
    } else {
      await plan.top.enter(this.context);
    }
  }

  private async enterInitial(initial: State): Promise<void> {
    const plan = this.planEntry(initial, initial) ?? { top: initial, path: [] };
    await this.enterPlan(plan);
    this.notifyEnter(plan.top);
    await this.settleChoice(Event.create(START_EVENT));
    this.checkCompletion();
  }

  /**
   * Hop from an active choice to the option it selects
   *
   * A choice without a matching option stays active.
   */
  private async settleChoice(event: Event): Promise<void> {
    const visited = new Set<State>();
    let state = this.currentState;
    while (state && state.kind === 'choice' && !visited.has(state)) {
      visited.add(state);
      const choice = state;
      let option: State | undefined;
      try {
        option = choice.resolve(this.context);
      } catch (error) {
        throw new ActionError('choice guard', error, { stateName: choice.name, eventName: event.name });
      }
      const plan = option ? this.planEntry(option, choice) : undefined;
      if (!plan) {
        this.logger.warn('No choice option matched; choice stays active', {
          machine: this.name,
          state: choice.name,
          event: event.name,
        });
        return;
      }

      await choice.exit(this.context);
      await this.enterPlan(plan);
      this.notifyExit(choice);
      this.notifyEnter(plan.top);
      this.notifyTransition(choice, plan.top, event);
      state = this.currentState;
    }
  }

  private checkCompletion(): void {
    const state = this.currentState;
    if (!state || !this.finalStates.has(state.name) || this.runState !== MachineRunState.RUNNING) return;
    this.runState = MachineRunState.COMPLETED;
    this.logger.debug('State machine completed', { machine: this.name, state: state.name });
    this.publish('completed', this.stateNotice(state));
  }

  private async halt(): Promise<void> {
    const stateBefore = this.runState;
    this.controller?.abort();
    await this.loop;
    this.loop = undefined;
    this.queue.clear();
    this.unlinkSignal?.();
    this.unlinkSignal = undefined;

    if (stateBefore === MachineRunState.ERROR || this.runState === MachineRunState.ERROR) {
      this.timers.clear();
      return;
    }

    await this.serialize(() => this.exitActiveChain());
    this.timers.clear();
    this.runState = MachineRunState.STOPPED;
    this.logger.debug('State machine stopped', { machine: this.name });
  }

  private async exitActiveChain(): Promise<void> {
    const state = this.currentState;
    if (!state) return;
    try {
      await state.exit(this.context);
    } catch (error) {
      const failure = this.toFailure(error);
      this.fail(failure);
      throw failure;
    }
    this.notifyExit(state);
  }

  /**
   * Release nested engines and buffers of a chain that was never exited
   */
  private async abandonActiveChain(): Promise<void> {
    const releases: Promise<void>[] = [];
    for (const state of this.activeChain()) {
      if (state.kind === 'parallel') {
        releases.push(...state.getRegions().map(region => region.stop()));
      } else if (state.kind === 'submachine') {
        releases.push(state.submachine.reset());
      } else if (state.kind === 'defer') {
        state.clearDeferred();
      }
    }
    const results = await Promise.allSettled(releases);
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.warn('Could not release nested engine', { machine: this.name, error: describeError(result.reason) });
      }
    }
  }

  private activeChain(): State[] {
    const state = this.currentState;
    if (!state) return [];
    return state.kind === 'composite' ? [state, ...state.getActiveChain()] : [state];
  }

  private findDeferringState(eventName: string): DeferState | undefined {
    const chain = this.activeChain();
    for (let i = chain.length - 1; i >= 0; i--) {
      const state = chain[i];
      if (state.kind === 'defer' && state.defers(eventName)) {
        return state;
      }
    }
    return undefined;
  }

  /**
   * A timeout event whose timer no longer belongs to the active leaf
   */
  private isStaleTimeout(event: Event): boolean {
    if (!event.hasMetadata(TIMER_ID_KEY)) return false;
    const chain = this.activeChain();
    const leaf = chain[chain.length - 1];
    return !leaf || leaf.kind !== 'timeout' || leaf.isStale(event);
  }

  private linkSignal(parent: AbortSignal | undefined, controller: AbortController): void {
    this.unlinkSignal?.();
    this.unlinkSignal = undefined;
    if (!parent) return;
    if (parent.aborted) {
      controller.abort();
      return;
    }
    const onAbort = (): void => controller.abort();
    parent.addEventListener('abort', onAbort, { once: true });
    this.unlinkSignal = () => parent.removeEventListener('abort', onAbort);
  }

  private toFailure(error: unknown, event?: Event): Error {
    if (isStateMachineError(error)) return error;
    return new ActionError('event processing', error, {
      stateName: this.currentState?.name,
      eventName: event?.name,
    });
  }

  // ---------------------------------------------------------------------------
  // Notifications
  // ---------------------------------------------------------------------------

  private notify(call: (observer: StateMachineObserver) => void): void {
    for (const observer of [...this.observers]) {
      try {
        call(observer);
      } catch (error) {
        this.logger.error('Observer failed', { machine: this.name, error: describeError(error) });
      }
    }
  }

  private publish(eventName: string, payload: unknown): void {
    try {
      this.emit(eventName, payload);
    } catch (error) {
      this.logger.error('Listener failed', { machine: this.name, event: eventName, error: describeError(error) });
    }
  }

  private stateNotice(state: State): StateNotice {
    return { machine: this.name, state: state.name, timestamp: Date.now() };
  }

  private notifyEnter(state: State): void {
    this.notify(observer => observer.onStateEnter?.(this, state));
    this.publish('state_enter', this.stateNotice(state));
  }

  private notifyExit(state: State): void {
    this.notify(observer => observer.onStateExit?.(this, state));
    this.publish('state_exit', this.stateNotice(state));
  }

  private notifyTransition(from: State | undefined, to: State, event: Event): void {
    this.notify(observer => observer.onTransition?.(this, from, to, event));
    const notice: TransitionNotice = {
      machine: this.name,
      from: from?.name,
      to: to.name,
      event: event.name,
      timestamp: Date.now(),
    };
    this.publish('transition', notice);
  }

  private notifyEventProcessed(event: Event): void {
    this.notify(observer => observer.onEventProcessed?.(this, event));
    this.publish('event_processed', event);
  }
}
