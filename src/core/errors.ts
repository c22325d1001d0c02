/**
 * Rainflow Engine - Errors
 * ========================
 * Error class thrown by the service layers when a counting session fails
 */

import { CountingState, RainflowErrorCode } from '../types';

// ============================================================================
// HTTP MAPPING
// ============================================================================

const ERROR_HTTP_STATUS: Record<RainflowErrorCode, number> = {
  invalid_argument: 400,
  data_out_of_range: 400,
  unsupported: 422,
  memory: 500,
  data_inconsistent: 500,
  unexpected: 500,
};

const ERROR_MESSAGES: Record<RainflowErrorCode, string> = {
  invalid_argument: 'Invalid argument',
  unsupported: 'Operation not supported by the session configuration',
  memory: 'Out of memory',
  data_out_of_range: 'Value outside of the configured class range',
  data_inconsistent: 'Internal data inconsistent',
  unexpected: 'Unexpected error',
};

export function describeError(code: RainflowErrorCode): string {
  return ERROR_MESSAGES[code];
}

// ============================================================================
// ERROR CLASSES
// ============================================================================

export class RainflowError extends Error {
  public readonly code: RainflowErrorCode;
  public readonly httpStatus: number;
  public readonly state: CountingState | null;
  public readonly context: Record<string, unknown>;

  constructor(
    code: RainflowErrorCode,
    message?: string,
    state: CountingState | null = null,
    context: Record<string, unknown> = {},
  ) {
    super(message ?? ERROR_MESSAGES[code]);
    this.name = 'RainflowError';
    this.code = code;
    this.httpStatus = ERROR_HTTP_STATUS[code];
    this.state = state;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      state: this.state,
      context: this.context,
    };
  }
}

/** Lookup of a session id that is not registered */
export class SessionNotFoundError extends Error {
  public readonly httpStatus = 404;

  constructor(public readonly sessionId: string) {
    super(`Session '${sessionId}' not found`);
    this.name = 'SessionNotFoundError';
  }
}

export function isRainflowError(error: unknown): error is RainflowError {
  return error instanceof RainflowError;
}

/** Internal invariant broken, always a defect in the engine */
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolation';
  }
}
