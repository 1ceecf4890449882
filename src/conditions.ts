/**
 * Ready-made guards and actions
 *
 * Each factory returns a plain Guard or Action over the Context it is given,
 * so they combine with hand-written ones anywhere a guard or action is taken.
 */

import type winston from 'winston';
import type { LogLevel } from './config';
import type { Action, Guard } from './types';

/**
 * True when the context holds `key` with a value strictly equal to `value`
 */
export function ifDataEquals(key: string, value: unknown): Guard {
  return ctx => ctx.has(key) && ctx.get(key) === value;
}

export function ifDataExists(key: string): Guard {
  return ctx => ctx.has(key);
}

/**
 * True when the payload of the event being processed equals `value`
 */
export function ifEventDataEquals(value: unknown): Guard {
  return ctx => ctx.event !== undefined && ctx.event.payload === value;
}

/**
 * Every guard holds; an empty list always holds
 */
export function allOf(...guards: Guard[]): Guard {
  return ctx => guards.every(guard => guard(ctx));
}

export function not(guard: Guard): Guard {
  return ctx => !guard(ctx);
}

export function setData(key: string, value: unknown): Action {
  return ctx => {
    ctx.set(key, value);
  };
}

export interface LogMessageOptions {
  level?: LogLevel;
  /** Defaults to the logger of the engine running the action */
  logger?: winston.Logger;
}

/**
 * Log a fixed message tagged with the machine and event names
 */
export function logMessage(message: string, options: LogMessageOptions = {}): Action {
  return ctx => {
    const logger = options.logger ?? ctx.engine.logger;
    logger.log(options.level ?? 'info', message, {
      machine: ctx.engine.getName(),
      event: ctx.event?.name,
    });
  };
}
