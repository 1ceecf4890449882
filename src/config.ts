/**
 * Engine configuration
 * Defaults can be overridden from the environment, then per engine instance
 */

import { ConfigurationError } from './errors';

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface EngineConfig {
  /** Capacity of each engine's bounded event queue */
  queueCapacity: number;
  /** Tick interval of each engine's timer wheel */
  timerTickMs: number;
  /** Level of the default winston logger */
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: Readonly<EngineConfig> = Object.freeze({
  queueCapacity: 100,
  timerTickMs: 10,
  logLevel: 'warn',
});

/**
 * Load configuration from environment variables
 *
 * - STATECHART_QUEUE_CAPACITY
 * - STATECHART_TIMER_TICK_MS
 * - STATECHART_LOG_LEVEL
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const problems: string[] = [];

  const queueCapacity = parsePositiveInt(env.STATECHART_QUEUE_CAPACITY, DEFAULT_CONFIG.queueCapacity, 'STATECHART_QUEUE_CAPACITY', problems);
  const timerTickMs = parsePositiveInt(env.STATECHART_TIMER_TICK_MS, DEFAULT_CONFIG.timerTickMs, 'STATECHART_TIMER_TICK_MS', problems);

  let logLevel: LogLevel = DEFAULT_CONFIG.logLevel;
  const rawLevel = env.STATECHART_LOG_LEVEL;
  if (rawLevel !== undefined && rawLevel !== '') {
    const level = LOG_LEVELS.find(candidate => candidate === rawLevel.toLowerCase());
    if (level) {
      logLevel = level;
    } else {
      problems.push(`STATECHART_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')} (got "${rawLevel}")`);
    }
  }

  if (problems.length > 0) {
    throw new ConfigurationError('Invalid engine configuration', problems);
  }

  return { queueCapacity, timerTickMs, logLevel };
}

function parsePositiveInt(raw: string | undefined, fallback: number, name: string, problems: string[]): number {
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = parseInt(raw, 10);
  if (!Number.isInteger(value) || value <= 0 || String(value) !== raw.trim()) {
    problems.push(`${name} must be a positive integer (got "${raw}")`);
    return fallback;
  }
  return value;
}
