/**
 * CLI error model.
 * Exit codes: 0=success, 1=validation, 2=runtime
 *
 * @module src/cli/errors
 */

import type { StoreErrorCode } from '../store/types';

// ─────────────────────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────────────────────

export type CliErrorCode = 'VALIDATION' | 'RUNTIME';

export class CliError extends Error {
  readonly code: CliErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: CliErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = 'CliError';
  }
}

/** Failed command result, as returned by every command function */
export type CommandFailure = {
  success: false;
  error: string;
  isValidation?: boolean;
  /** Underlying store error code, when there is one */
  storeCode?: StoreErrorCode;
};

/**
 * Convert a failed command result into a CliError.
 */
export function toCliError(failure: CommandFailure): CliError {
  return new CliError(
    failure.isValidation ? 'VALIDATION' : 'RUNTIME',
    failure.error,
    failure.storeCode ? { storeCode: failure.storeCode } : undefined
  );
}

// ─────────────────────────────────────────────────────────────────────────────
// Exit Codes
// ─────────────────────────────────────────────────────────────────────────────

export function exitCodeFor(err: CliError): 1 | 2 {
  return err.code === 'VALIDATION' ? 1 : 2;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Formatting
// ─────────────────────────────────────────────────────────────────────────────

export type ErrorFormatOptions = {
  json?: boolean;
};

/**
 * Format error for output.
 * JSON mode returns { error: { code, message, details } } envelope.
 */
export function formatErrorForOutput(
  err: CliError,
  options: ErrorFormatOptions = {}
): string {
  if (options.json) {
    return JSON.stringify({
      error: {
        code: err.code,
        message: err.message,
        ...(err.details && { details: err.details }),
      },
    });
  }
  return `Error: ${err.message}`;
}
