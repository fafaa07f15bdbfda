/**
 * Custom error hierarchy for switchyard.
 *
 * Provides programmatic error discrimination without parsing message strings.
 * Each subclass carries a `code` string for structured error handling.
 */

/** Base error for all switchyard errors. Carries a `code` and optional `context`. */
export class SwitchyardError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string = 'SWITCHYARD_ERROR', context?: Record<string, unknown>) {
    super(message);
    this.name = 'SwitchyardError';
    this.code = code;
    this.context = context;
  }
}

/** Configuration errors: invalid config values, broken registry file. */
export class ConfigError extends SwitchyardError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

/** Storage errors: lock acquisition, database failures. */
export class StorageError extends SwitchyardError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'STORAGE_ERROR', context);
    this.name = 'StorageError';
  }
}

/** Validation errors: bad input, precondition failures, argument checks. */
export class ValidationError extends SwitchyardError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', context);
    this.name = 'ValidationError';
  }
}

/** Resource not found: messages, context files. */
export class NotFoundError extends SwitchyardError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', context);
    this.name = 'NotFoundError';
  }
}

/** A live process already holds the daemon PID lock. */
export class AlreadyRunningError extends SwitchyardError {
  readonly pid: number;

  constructor(pid: number) {
    super(`Daemon already running (pid=${pid})`, 'ALREADY_RUNNING', { pid });
    this.name = 'AlreadyRunningError';
    this.pid = pid;
  }
}

/** Name not present in the context registry. */
export class UnknownContextError extends SwitchyardError {
  readonly contextId: string;

  constructor(contextId: string, known: readonly string[] = []) {
    const suffix = known.length > 0 ? ` (known: ${known.join(', ')})` : '';
    super(`Unknown context: ${contextId}${suffix}`, 'UNKNOWN_CONTEXT', { context: contextId });
    this.name = 'UnknownContextError';
    this.contextId = contextId;
  }
}

/** Handoff rules do not allow this message type between these contexts. */
export class PolicyViolationError extends SwitchyardError {
  readonly from: string;
  readonly to: string;
  readonly type: string;

  constructor(from: string, to: string, type: string, allowed: readonly string[] = []) {
    super(`Handoff not allowed: ${from} -> ${to} (${type})`, 'POLICY_VIOLATION', {
      from,
      to,
      type,
      allowed: [...allowed],
    });
    this.name = 'PolicyViolationError';
    this.from = from;
    this.to = to;
    this.type = type;
  }
}

/** Persisted state failed to parse or validate. */
export class CorruptStateError extends SwitchyardError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CORRUPT_STATE', context);
    this.name = 'CorruptStateError';
  }
}

/** A watch subscription could not be established. */
export class WatcherSetupError extends SwitchyardError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'WATCHER_SETUP_FAILURE', context);
    this.name = 'WatcherSetupError';
  }
}

/** Type guard: check if an error is a SwitchyardError or subclass. */
export function isSwitchyardError(error: unknown): error is SwitchyardError {
  return error instanceof SwitchyardError;
}

/** Error code of a Node system error, if any. */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/** Message text of anything thrown. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
