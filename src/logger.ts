/**
 * Winston-based logging
 */

import winston from 'winston';
import { loadConfig, LogLevel } from './config';

export interface LoggerOptions {
  level?: LogLevel;
  /** Suppress all output (tests) */
  silent?: boolean;
}

/**
 * Create a JSON logger with a colorized console transport
 */
export function createLogger(options: LoggerOptions = {}): winston.Logger {
  return winston.createLogger({
    level: options.level ?? 'info',
    silent: options.silent ?? false,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.json()
    ),
    transports: [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.simple()
        ),
      }),
    ],
  });
}

let defaultLogger: winston.Logger | null = null;

/**
 * Logger used by engines that were not given one, configured from the environment
 */
export function getDefaultLogger(): winston.Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger({ level: loadConfig().logLevel });
  }
  return defaultLogger;
}
