/**
 * Core type definitions for the statechart runtime
 */

import type { Context } from './context';
import type { Event } from './event';
import type { State } from './state';
import type { StateMachine } from './state-machine';

/**
 * Run-state of an engine
 */
export enum MachineRunState {
  STOPPED = 'stopped',
  RUNNING = 'running',
  /** A final state was reached */
  COMPLETED = 'completed',
  /** A runtime error halted the engine; reset() recovers */
  ERROR = 'error',
}

/**
 * Discriminant of the State union
 */
export type StateKind =
  | 'simple'
  | 'final'
  | 'composite'
  | 'parallel'
  | 'history'
  | 'choice'
  | 'junction'
  | 'defer'
  | 'timeout'
  | 'entryPoint'
  | 'exitPoint'
  | 'submachine';

export enum HistoryType {
  /** Remembers the direct child that was active */
  SHALLOW = 'shallow',
  /** Remembers the whole active chain below the composite */
  DEEP = 'deep',
}

/**
 * Guard predicate evaluated against the engine context
 */
export type Guard = (ctx: Context) => boolean;

/**
 * Entry, exit or transition action
 */
export type Action = (ctx: Context) => void | Promise<void>;

/**
 * Long-running activity started on entry; the signal aborts on exit
 */
export type DoActivity = (ctx: Context, signal: AbortSignal) => void | Promise<void>;

/**
 * Notification contract for logging, metrics and validation collaborators
 *
 * Called synchronously, in registration order, from the processing path of
 * the engine. Observers must not block or mutate the topology.
 */
export interface StateMachineObserver {
  onStateEnter?(sm: StateMachine, state: State): void;
  onStateExit?(sm: StateMachine, state: State): void;
  onTransition?(sm: StateMachine, from: State | undefined, to: State, event: Event): void;
  onEventProcessed?(sm: StateMachine, event: Event): void;
  onError?(sm: StateMachine, error: Error): void;
}

/**
 * Payloads of the engine's EventEmitter events
 */
export interface TransitionNotice {
  machine: string;
  from?: string;
  to: string;
  event: string;
  timestamp: number;
}

export interface StateNotice {
  machine: string;
  state: string;
  timestamp: number;
}

/**
 * Log entry recorded by the LoggingObserver
 */
export interface LogEntry {
  machine: string;
  kind: 'enter' | 'exit' | 'transition' | 'event' | 'error';
  from?: string;
  to?: string;
  state?: string;
  event?: string;
  time: number;
  error?: string;
}
