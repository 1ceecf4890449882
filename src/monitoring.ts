/**
 * Monitoring and Logging Infrastructure
 * Winston-based logging observer with insights generation
 */

import type winston from 'winston';
import type { Event } from './event';
import { createLogger } from './logger';
import type { State } from './state';
import type { StateMachine } from './state-machine';
import { LogEntry, StateMachineObserver } from './types';

export interface LoggingObserverOptions {
  logger?: winston.Logger;
  /** Average dwell time above which a transition counts as slow (default 5000ms) */
  slowTransitionMs?: number;
  /** Clock used to timestamp entries */
  now?: () => number;
}

/**
 * Observer writing every notification through winston and keeping the
 * entries in memory for later analysis
 */
export class LoggingObserver implements StateMachineObserver {
  private logger: winston.Logger;
  private logs: LogEntry[];
  private slowTransitionMs: number;
  private now: () => number;

  constructor(options: LoggingObserverOptions = {}) {
    this.logs = [];
    this.logger = options.logger ?? createLogger();
    this.slowTransitionMs = options.slowTransitionMs ?? 5000;
    this.now = options.now ?? Date.now;
  }

  onStateEnter(sm: StateMachine, state: State): void {
    this.record({ machine: sm.getName(), kind: 'enter', state: state.path, time: this.now() }, 'debug', 'State entered');
  }

  onStateExit(sm: StateMachine, state: State): void {
    this.record({ machine: sm.getName(), kind: 'exit', state: state.path, time: this.now() }, 'debug', 'State exited');
  }

  onTransition(sm: StateMachine, from: State | undefined, to: State, event: Event): void {
    this.record(
      { machine: sm.getName(), kind: 'transition', from: from?.path, to: to.path, event: event.name, time: this.now() },
      'info',
      'State transition'
    );
  }

  onEventProcessed(sm: StateMachine, event: Event): void {
    this.record({ machine: sm.getName(), kind: 'event', event: event.name, time: this.now() }, 'debug', 'Event processed');
  }

  onError(sm: StateMachine, error: Error): void {
    this.record(
      { machine: sm.getName(), kind: 'error', state: sm.getCurrentState()?.path, error: error.message, time: this.now() },
      'error',
      'State machine error'
    );
  }

  /**
   * Get logs for machine
   */
  getLogsForMachine(machine: string): LogEntry[] {
    return this.logs.filter(log => log.machine === machine);
  }

  getAllLogs(): LogEntry[] {
    return [...this.logs];
  }

  /**
   * Get logs in time range (inclusive)
   */
  getLogsInRange(startTime: number, endTime: number): LogEntry[] {
    return this.logs.filter(log => log.time >= startTime && log.time <= endTime);
  }

  clearOldLogs(beforeTimestamp: number): void {
    this.logs = this.logs.filter(log => log.time >= beforeTimestamp);
  }

  /**
   * Analyze logs and generate insights, optionally for one machine only
   */
  analyzeLogs(machine?: string): AnalysisInsights {
    const logs = machine === undefined ? this.logs : this.getLogsForMachine(machine);
    const transitions = logs.filter(log => log.kind === 'transition');
    const errorCount = logs.filter(log => log.kind === 'error').length;

    const insights: AnalysisInsights = {
      totalTransitions: transitions.length,
      errorCount,
      errorRate: transitions.length > 0 ? errorCount / transitions.length : 0,
      slowTransitions: [],
      suggestions: [],
      averageTransitionTime: 0,
      mostCommonStates: [],
    };

    const stateCounts = new Map<string, number>();
    const dwellTimes = new Map<string, number[]>();
    const previousByMachine = new Map<string, LogEntry>();

    for (const log of transitions) {
      const to = log.to ?? '';
      stateCounts.set(to, (stateCounts.get(to) ?? 0) + 1);

      const previous = previousByMachine.get(log.machine);
      if (previous) {
        const key = `${previous.to}->${to}`;
        const times = dwellTimes.get(key) ?? [];
        times.push(log.time - previous.time);
        dwellTimes.set(key, times);
      }
      previousByMachine.set(log.machine, log);
    }

    insights.mostCommonStates = Array.from(stateCounts.entries())
      .sort((a, b) => b[1] - a[1])
      .slice(0, 5)
      .map(([state, count]) => ({ state, count }));

    for (const [transition, times] of dwellTimes.entries()) {
      const avg = times.reduce((sum, t) => sum + t, 0) / times.length;
      if (avg > this.slowTransitionMs) {
        insights.slowTransitions.push({ transition, averageTimeMs: avg, occurrences: times.length });
        insights.suggestions.push(
          `Slow transition: ${transition} takes ${(avg / 1000).toFixed(2)}s on average. Consider a timeout state.`
        );
      }
    }

    const allTimes = Array.from(dwellTimes.values()).flat();
    if (allTimes.length > 0) {
      insights.averageTransitionTime = allTimes.reduce((sum, t) => sum + t, 0) / allTimes.length;
    }

    if (insights.errorRate > 0.1) {
      insights.suggestions.push(
        `High error rate: ${(insights.errorRate * 100).toFixed(1)}%. Review entry, exit and transition actions.`
      );
    }

    return insights;
  }

  /**
   * Generate natural language summary
   */
  generateSummary(machine: string): string {
    const insights = this.analyzeLogs(machine);
    const lines: string[] = [
      `Machine: ${machine}`,
      `Total transitions: ${insights.totalTransitions}`,
      `Errors: ${insights.errorCount} (${(insights.errorRate * 100).toFixed(1)}%)`,
      `Average transition time: ${(insights.averageTransitionTime / 1000).toFixed(2)}s`,
    ];

    if (insights.mostCommonStates.length > 0) {
      lines.push('\nMost common states:');
      insights.mostCommonStates.forEach(({ state, count }) => {
        lines.push(`  - ${state}: ${count} times`);
      });
    }

    if (insights.slowTransitions.length > 0) {
      lines.push('\nSlow transitions:');
      insights.slowTransitions.forEach(t => {
        lines.push(`  - ${t.transition}: ${(t.averageTimeMs / 1000).toFixed(2)}s (${t.occurrences} times)`);
      });
    }

    if (insights.suggestions.length > 0) {
      lines.push('\nSuggestions:');
      insights.suggestions.forEach(s => lines.push(`  - ${s}`));
    }

    return lines.join('\n');
  }

  private record(entry: LogEntry, level: 'debug' | 'info' | 'error', message: string): void {
    this.logs.push(entry);
    this.logger.log(level, message, entry);
  }
}

/**
 * Analysis insights
 */
export interface AnalysisInsights {
  totalTransitions: number;
  errorCount: number;
  /** Errors per transition */
  errorRate: number;
  slowTransitions: Array<{
    transition: string;
    averageTimeMs: number;
    occurrences: number;
  }>;
  suggestions: string[];
  averageTransitionTime: number;
  mostCommonStates: Array<{
    state: string;
    count: number;
  }>;
}
