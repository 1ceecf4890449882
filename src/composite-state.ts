/**
 * Composite (nested) state
 */

import type { Context } from './context';
import { InvalidHierarchyError, MissingChildError } from './errors';
import type { Event } from './event';
import type { HistoryState } from './history-state';
import { BaseState, State, invokeUserCode } from './state';
import { Transition, TransitionOptions } from './transition';

/**
 * State with exactly one active child while it is active
 *
 * The first child added becomes the initial child unless another one is set.
 * Choice and entry-point children are settled to their target when reached.
 */
export class CompositeState extends BaseState {
  readonly kind = 'composite' as const;
  private children = new Map<string, State>();
  private currentChild?: State;
  private initialChild?: State;
  private history?: HistoryState;
  private internalTransitions: Transition[] = [];

  isComposite(): boolean {
    return true;
  }

  addChild(child: State): this {
    const existing = this.children.get(child.name);
    if (existing === child) return this;
    if (existing) {
      throw new InvalidHierarchyError(child.name, `${this.name} already has a child with that name`);
    }
    if (child.parent && child.parent !== this) {
      throw new InvalidHierarchyError(child.name, `already a child of ${child.parent.name}`);
    }
    if (this.isContainedIn(child)) {
      throw new InvalidHierarchyError(child.name, `it contains ${this.name}`);
    }

    this.children.set(child.name, child);
    child.setParent(this);
    if (!this.initialChild) {
      this.initialChild = child;
    }
    return this;
  }

  getChild(name: string): State | undefined {
    return this.children.get(name);
  }

  getChildren(): State[] {
    return Array.from(this.children.values());
  }

  hasChild(state: State): boolean {
    return this.children.get(state.name) === state;
  }

  setInitialChild(child: State): this {
    this.addChild(child);
    this.initialChild = child;
    return this;
  }

  getInitialChild(): State | undefined {
    return this.initialChild;
  }

  getCurrentChild(): State | undefined {
    return this.currentChild;
  }

  setHistory(history: HistoryState): this {
    history.attach(this);
    this.history = history;
    return this;
  }

  getHistory(): HistoryState | undefined {
    return this.history;
  }

  /**
   * Transition between two children, consulted before the active child sees
   * the event
   */
  addInternalTransition(from: State, to: State, event: string, options: TransitionOptions = {}): Transition {
    const transition = new Transition(from, to, event, options);
    this.internalTransitions.push(transition);
    return transition;
  }

  getInternalTransitions(): Transition[] {
    return [...this.internalTransitions];
  }

  /**
   * Active chain below this composite, outermost first
   */
  getActiveChain(): State[] {
    const chain: State[] = [];
    let child = this.currentChild;
    while (child) {
      chain.push(child);
      child = child.kind === 'composite' ? child.getCurrentChild() : undefined;
    }
    return chain;
  }

  async enter(ctx: Context): Promise<void> {
    await this.enterVia(ctx);
  }

  /**
   * Enter, then activate the given chain of descendants instead of the
   * initial configuration
   *
   * Without a path the child comes from the attached history when it holds
   * a record, else from the initial child.
   */
  async enterVia(ctx: Context, path: readonly State[] = []): Promise<void> {
    await super.enter(ctx);

    const [head, ...rest] = path.length > 0 ? path : this.defaultPath();
    if (!this.hasChild(head)) {
      throw new MissingChildError(this.name, head.name);
    }
    await this.activateChild(head, ctx, rest);
  }

  /**
   * Enter through the attached history; a history without record or default
   * is fatal
   */
  async enterFromHistory(ctx: Context): Promise<void> {
    if (!this.history) {
      throw new MissingChildError(this.name);
    }
    await this.enterVia(ctx, this.history.resolve());
  }

  async exit(ctx: Context): Promise<void> {
    const child = this.currentChild;
    if (child) {
      this.history?.record(this.getActiveChain());
      await child.exit(ctx);
      this.currentChild = undefined;
    }
    await super.exit(ctx);
  }

  async handleEvent(event: Event, ctx: Context): Promise<State | undefined> {
    const child = this.currentChild;
    if (!child) return undefined;

    for (const transition of this.internalTransitions) {
      if (transition.from === child && transition.event === event.name && transition.canExecute(ctx)) {
        return this.applyChildResult(transition.to, ctx, transition);
      }
    }

    const next = await child.handleEvent(event, ctx);
    if (!next || next === child) return undefined;
    return this.applyChildResult(next, ctx);
  }

  /**
   * Replace the active child, running exit, action and entry in that order
   */
  async switchChild(target: State, ctx: Context, transition?: Transition): Promise<void> {
    if (!this.hasChild(target)) {
      throw new MissingChildError(this.name, target.name);
    }
    const previous = this.currentChild;
    if (previous) {
      await previous.exit(ctx);
      this.currentChild = undefined;
    }
    if (transition) {
      await invokeUserCode('transition action', () => transition.execute(ctx), this.name, ctx.event?.name);
    }
    await this.activateChild(target, ctx, []);
  }

  private async applyChildResult(next: State, ctx: Context, transition?: Transition): Promise<State | undefined> {
    if (next.kind === 'exitPoint' && this.hasChild(next)) {
      const target = next.getTarget();
      if (transition) {
        await invokeUserCode('transition action', () => transition.execute(ctx), this.name, ctx.event?.name);
      }
      return target;
    }
    if (this.hasChild(next)) {
      await this.switchChild(next, ctx, transition);
      return undefined;
    }
    if (transition) {
      await invokeUserCode('transition action', () => transition.execute(ctx), this.name, ctx.event?.name);
    }
    return next;
  }

  private defaultPath(): State[] {
    if (this.history?.hasRecord()) {
      return this.history.resolve();
    }
    if (!this.initialChild) {
      throw new MissingChildError(this.name);
    }
    return [this.initialChild];
  }

  private async activateChild(child: State, ctx: Context, rest: readonly State[]): Promise<void> {
    const target = this.settle(child, ctx);
    this.currentChild = target;
    if (target.kind === 'composite' && target === child && rest.length > 0) {
      await target.enterVia(ctx, rest);
    } else {
      await target.enter(ctx);
    }
  }

  /**
   * Follow entry points and choices among the children
   */
  private settle(child: State, ctx: Context): State {
    let current = child;
    const seen = new Set<State>();
    while (!seen.has(current)) {
      seen.add(current);
      const next =
        current.kind === 'entryPoint' ? current.getTarget() : current.kind === 'choice' ? current.resolve(ctx) : undefined;
      if (!next || !this.hasChild(next)) break;
      current = next;
    }
    return current;
  }

  private isContainedIn(candidate: State): boolean {
    let node: BaseState | undefined = this;
    while (node) {
      if (node === candidate) return true;
      node = node.parent;
    }
    return false;
  }
}
