/**
 * Error hierarchy for autodiag.
 *
 * Every expected condition that aborts a run is a DiagnosticError subclass;
 * anything else reaching the CLI is a bug and is reported with its stack.
 */

/**
 * Base class for all fatal, expected failures.
 */
export class DiagnosticError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DiagnosticError';
  }
}

/**
 * Invalid command-line usage (argument combinations, malformed dates).
 */
export class UsageError extends DiagnosticError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * The configuration file could not be read, parsed or validated.
 */
export class ConfigError extends DiagnosticError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ConfigError';
  }
}

/**
 * A configured resource does not exist in the account.
 */
export class NotFoundError extends DiagnosticError {
  readonly resource: string;

  constructor(message: string, resource: string) {
    super(message);
    this.name = 'NotFoundError';
    this.resource = resource;
  }
}

/**
 * An AWS response lacked a field the report depends on.
 */
export class MissingFieldError extends DiagnosticError {
  readonly field: string;

  constructor(field: string, operation: string) {
    super(`Missing field '${field}' in ${operation} response`);
    this.name = 'MissingFieldError';
    this.field = field;
  }
}

/**
 * A Logs Insights query reached a status other than Complete.
 */
export class UnexpectedStatusError extends DiagnosticError {
  readonly status: string;

  constructor(status: string) {
    super(`Unexpected status: ${status}`);
    this.name = 'UnexpectedStatusError';
    this.status = status;
  }
}

/**
 * A Logs Insights result field did not line up with the configured columns.
 */
export class ColumnMismatchError extends DiagnosticError {
  readonly expected: string;
  readonly actual: string;

  constructor(expected: string, actual: string) {
    super(`Expected column not matched! Expected: ${expected}, Actual: ${actual}`);
    this.name = 'ColumnMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * No OpenAI API key in the environment or the configuration.
 */
export class MissingApiKeyError extends DiagnosticError {
  constructor(variable: string) {
    super(`${variable} variable is not set`);
    this.name = 'MissingApiKeyError';
  }
}

/**
 * Render an unknown thrown value as a one-line message.
 */
export function errorMessage(e: unknown): string {
  if (e instanceof Error) {
    return `${e.name}: ${e.message}`;
  }
  return String(e);
}

/**
 * Unwrap a response field the report cannot do without.
 */
export function requireField<T>(value: T | null | undefined, field: string, operation: string): T {
  if (value === undefined || value === null) {
    throw new MissingFieldError(field, operation);
  }
  return value;
}
