/**
 * Error taxonomy for the statechart runtime
 *
 * Configuration errors are fatal at start/enter, concurrency errors are
 * returned to the caller and leave the engine untouched, runtime errors move
 * the engine to the Error run-state.
 */

/**
 * Stable error codes
 */
export enum ErrorCode {
  NO_INITIAL_STATE = 'NO_INITIAL_STATE',
  MISSING_CHILD = 'MISSING_CHILD',
  NO_TARGET_STATE = 'NO_TARGET_STATE',
  INVALID_HIERARCHY = 'INVALID_HIERARCHY',
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
  ALREADY_RUNNING = 'ALREADY_RUNNING',
  NOT_RUNNING = 'NOT_RUNNING',
  QUEUE_FULL = 'QUEUE_FULL',
  ACTION_FAILED = 'ACTION_FAILED',
  REGION_FAILED = 'REGION_FAILED',
  SUBMACHINE_FAILED = 'SUBMACHINE_FAILED',
}

export interface StateMachineErrorDetails {
  stateName?: string;
  eventName?: string;
  cause?: unknown;
}

/**
 * Base class of every error raised by the runtime
 */
export class StateMachineError extends Error {
  readonly code: ErrorCode;
  readonly stateName?: string;
  readonly eventName?: string;

  constructor(code: ErrorCode, message: string, details: StateMachineErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = new.target.name;
    this.code = code;
    this.stateName = details.stateName;
    this.eventName = details.eventName;
  }
}

export class NoInitialStateError extends StateMachineError {
  constructor(machineName: string) {
    super(ErrorCode.NO_INITIAL_STATE, `No initial state set for state machine ${machineName}`);
  }
}

export class MissingChildError extends StateMachineError {
  constructor(stateName: string, childName?: string) {
    super(
      ErrorCode.MISSING_CHILD,
      childName
        ? `Child state ${childName} not found in composite state ${stateName}`
        : `Composite state ${stateName} has no initial child state`,
      { stateName }
    );
  }
}

export class NoTargetStateError extends StateMachineError {
  constructor(stateName: string) {
    super(ErrorCode.NO_TARGET_STATE, `History state ${stateName} has neither a recorded nor a default state`, {
      stateName,
    });
  }
}

export class InvalidHierarchyError extends StateMachineError {
  constructor(stateName: string, reason: string) {
    super(ErrorCode.INVALID_HIERARCHY, `Cannot attach ${stateName}: ${reason}`, { stateName });
  }
}

export class ConfigurationError extends StateMachineError {
  readonly problems: string[];

  constructor(message: string, problems: string[] = []) {
    super(ErrorCode.INVALID_CONFIGURATION, problems.length > 0 ? `${message}: ${problems.join('; ')}` : message);
    this.problems = problems;
  }
}

export class AlreadyRunningError extends StateMachineError {
  constructor(machineName: string) {
    super(ErrorCode.ALREADY_RUNNING, `State machine ${machineName} is already running`);
  }
}

export class NotRunningError extends StateMachineError {
  constructor(machineName: string) {
    super(ErrorCode.NOT_RUNNING, `State machine ${machineName} is not running`);
  }
}

export class QueueFullError extends StateMachineError {
  constructor(machineName: string, eventName: string, capacity: number) {
    super(ErrorCode.QUEUE_FULL, `Event queue of ${machineName} is full (capacity ${capacity})`, { eventName });
  }
}

/**
 * Wraps a failure thrown by user code (guard, action, entry, exit, activity)
 */
export class ActionError extends StateMachineError {
  constructor(phase: string, cause: unknown, details: { stateName?: string; eventName?: string } = {}) {
    const where = details.stateName ? ` in ${details.stateName}` : '';
    super(ErrorCode.ACTION_FAILED, `${phase} failed${where}: ${describeError(cause)}`, { ...details, cause });
  }
}

export class RegionError extends StateMachineError {
  readonly regionName: string;

  constructor(stateName: string, regionName: string, cause: unknown) {
    super(ErrorCode.REGION_FAILED, `Region ${regionName} of ${stateName} failed: ${describeError(cause)}`, {
      stateName,
      cause,
    });
    this.regionName = regionName;
  }
}

export class SubmachineError extends StateMachineError {
  constructor(stateName: string, cause: unknown) {
    super(ErrorCode.SUBMACHINE_FAILED, `Sub-machine of ${stateName} failed: ${describeError(cause)}`, {
      stateName,
      cause,
    });
  }
}

export function isStateMachineError(value: unknown): value is StateMachineError {
  return value instanceof StateMachineError;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function describeError(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}
