/**
 * Metrics and validation observers
 */

import type { Event } from './event';
import type { State } from './state';
import type { StateMachine } from './state-machine';
import type { StateMachineObserver } from './types';

/**
 * Counts visits, transitions, events and errors, and accumulates the time
 * spent in each state
 */
export class MetricsObserver implements StateMachineObserver {
  private stateEnterCounts = new Map<string, number>();
  private stateExitCounts = new Map<string, number>();
  private transitionCounts = new Map<string, number>();
  private eventCounts = new Map<string, number>();
  private stateDurations = new Map<string, number>();
  private stateEnterTimes = new Map<string, number>();
  private errorCount = 0;
  private totalTransitions = 0;
  private startedAt?: number;
  private lastTransitionAt?: number;

  constructor(private now: () => number = Date.now) {}

  onStateEnter(_sm: StateMachine, state: State): void {
    const time = this.now();
    increment(this.stateEnterCounts, state.name);
    this.stateEnterTimes.set(state.name, time);
    if (this.startedAt === undefined) {
      this.startedAt = time;
    }
  }

  onStateExit(_sm: StateMachine, state: State): void {
    increment(this.stateExitCounts, state.name);
    const enteredAt = this.stateEnterTimes.get(state.name);
    if (enteredAt !== undefined) {
      increment(this.stateDurations, state.name, this.now() - enteredAt);
      this.stateEnterTimes.delete(state.name);
    }
  }

  onTransition(_sm: StateMachine, from: State | undefined, to: State): void {
    increment(this.transitionCounts, `${from?.name ?? ''}->${to.name}`);
    this.totalTransitions++;
    this.lastTransitionAt = this.now();
  }

  onEventProcessed(_sm: StateMachine, event: Event): void {
    increment(this.eventCounts, event.name);
  }

  onError(): void {
    this.errorCount++;
  }

  getStateEnterCount(stateName: string): number {
    return this.stateEnterCounts.get(stateName) ?? 0;
  }

  getStateExitCount(stateName: string): number {
    return this.stateExitCounts.get(stateName) ?? 0;
  }

  getTransitionCount(from: string, to: string): number {
    return this.transitionCounts.get(`${from}->${to}`) ?? 0;
  }

  getEventCount(eventName: string): number {
    return this.eventCounts.get(eventName) ?? 0;
  }

  getTotalTransitions(): number {
    return this.totalTransitions;
  }

  getErrorCount(): number {
    return this.errorCount;
  }

  /**
   * Milliseconds spent in a state over all completed visits
   */
  getStateDuration(stateName: string): number {
    return this.stateDurations.get(stateName) ?? 0;
  }

  /**
   * Milliseconds from the first entry to the last transition (or now)
   */
  getExecutionDuration(): number {
    if (this.startedAt === undefined) return 0;
    return (this.lastTransitionAt ?? this.now()) - this.startedAt;
  }

  getReport(): string {
    const lines = [
      'State Machine Metrics Report',
      '',
      `Total transitions: ${this.totalTransitions}`,
      `Total errors: ${this.errorCount}`,
      `Execution duration: ${this.getExecutionDuration()}ms`,
      '',
      'States:',
      ...Array.from(this.stateEnterCounts, ([name, count]) =>
        `  ${name}: entered ${count} times, ${this.getStateDuration(name)}ms total`
      ),
      '',
      'Transitions:',
      ...Array.from(this.transitionCounts, ([key, count]) => `  ${key}: ${count} times`),
      '',
      'Events:',
      ...Array.from(this.eventCounts, ([name, count]) => `  ${name}: ${count} times`),
    ];
    return lines.join('\n');
  }

  reset(): void {
    this.stateEnterCounts.clear();
    this.stateExitCounts.clear();
    this.transitionCounts.clear();
    this.eventCounts.clear();
    this.stateDurations.clear();
    this.stateEnterTimes.clear();
    this.errorCount = 0;
    this.totalTransitions = 0;
    this.startedAt = undefined;
    this.lastTransitionAt = undefined;
  }
}

function increment(counts: Map<string, number>, key: string, by: number = 1): void {
  counts.set(key, (counts.get(key) ?? 0) + by);
}

/**
 * Checks a run against expected states and allowed transitions
 *
 * Only sources that have allowed transitions declared are checked.
 */
export class ValidationObserver implements StateMachineObserver {
  private expectedStates = new Map<string, boolean>();
  private allowedTransitions = new Map<string, Set<string>>();
  private violations: string[] = [];

  addExpectedState(stateName: string): this {
    this.expectedStates.set(stateName, false);
    return this;
  }

  addAllowedTransition(from: string, to: string): this {
    const targets = this.allowedTransitions.get(from) ?? new Set<string>();
    targets.add(to);
    this.allowedTransitions.set(from, targets);
    return this;
  }

  onStateEnter(_sm: StateMachine, state: State): void {
    if (this.expectedStates.has(state.name)) {
      this.expectedStates.set(state.name, true);
    }
  }

  onTransition(_sm: StateMachine, from: State | undefined, to: State): void {
    if (!from) return;
    const allowed = this.allowedTransitions.get(from.name);
    if (allowed && !allowed.has(to.name)) {
      this.violations.push(`Invalid transition: ${from.name} -> ${to.name}`);
    }
  }

  getViolations(): string[] {
    return [...this.violations];
  }

  getUnvisitedStates(): string[] {
    return Array.from(this.expectedStates)
      .filter(([, visited]) => !visited)
      .map(([name]) => name);
  }

  isValid(): boolean {
    return this.violations.length === 0 && this.getUnvisitedStates().length === 0;
  }
}
