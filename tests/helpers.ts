/**
 * Shared test helpers
 */

import { createLogger } from '../src/logger';
import { StateMachine, StateMachineOptions } from '../src/state-machine';
import type { State } from '../src/state';
import type { StateMachineObserver } from '../src/types';

export const silentLogger = createLogger({ silent: true });

export function createMachine(name: string, options: StateMachineOptions = {}): StateMachine {
  return new StateMachine(name, { queueCapacity: 100, timerTickMs: 5, logger: silentLogger, ...options });
}

/**
 * Poll until the predicate holds
 */
export async function waitFor(predicate: () => boolean, timeoutMs: number = 1000, intervalMs: number = 5): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise(resolve => setTimeout(resolve, intervalMs));
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Observer recording notifications as short strings
 */
export function recordingObserver(): { observer: StateMachineObserver; log: string[] } {
  const log: string[] = [];
  const name = (state: State | undefined): string => state?.name ?? '-';
  const observer: StateMachineObserver = {
    onStateEnter: (_sm, state) => log.push(`enter:${state.name}`),
    onStateExit: (_sm, state) => log.push(`exit:${state.name}`),
    onTransition: (_sm, from, to, event) => log.push(`transition:${name(from)}->${to.name}:${event.name}`),
    onEventProcessed: (_sm, event) => log.push(`processed:${event.name}`),
    onError: (_sm, error) => log.push(`error:${error.name}`),
  };
  return { observer, log };
}
