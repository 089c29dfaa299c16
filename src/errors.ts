/**
 * Tracing error types
 *
 * Errors only ever leave the configuration surface. Instrumentation calls
 * (starting spans, adding data, ending spans) never throw; faults there are
 * logged and degrade to no-ops.
 */

import type { ZodError } from 'zod';

// =============================================================================
// Error Codes
// =============================================================================

/** Environment configuration failed validation */
export const INVALID_CONFIG = 1001;

/** Trace params (buffer limits or sampler) failed validation */
export const INVALID_TRACE_PARAMS = 1002;

/** Export handler name is already registered */
export const DUPLICATE_HANDLER = 1003;

export const ERROR_DESCRIPTIONS: Record<number, string> = {
  [INVALID_CONFIG]: 'Invalid tracing configuration',
  [INVALID_TRACE_PARAMS]: 'Invalid trace params',
  [DUPLICATE_HANDLER]: 'Export handler already registered',
};

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all tracing errors.
 * Includes error code and optional data for additional context.
 */
export class TraceError extends Error {
  constructor(
    public readonly code: number,
    message: string,
    public readonly data?: unknown
  ) {
    super(message);
    this.name = 'TraceError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to a plain object suitable for JSON serialization.
   */
  toJSON(): { code: number; message: string; data?: unknown } {
    const result: { code: number; message: string; data?: unknown } = {
      code: this.code,
      message: this.message,
    };
    if (this.data !== undefined) {
      result.data = this.data;
    }
    return result;
  }
}

// =============================================================================
// Specific Error Classes
// =============================================================================

/**
 * Thrown when configuration or trace params are rejected.
 */
export class TraceConfigError extends TraceError {
  constructor(code: typeof INVALID_CONFIG | typeof INVALID_TRACE_PARAMS, message: string, data?: unknown) {
    super(code, message, data);
    this.name = 'TraceConfigError';
  }

  /**
   * Wrap a zod validation failure, keeping the path and message of each issue.
   */
  static fromZodError(
    code: typeof INVALID_CONFIG | typeof INVALID_TRACE_PARAMS,
    error: ZodError
  ): TraceConfigError {
    const issues = error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const summary = issues.map((issue) => `${issue.path || '(root)'}: ${issue.message}`).join('; ');
    return new TraceConfigError(code, `${ERROR_DESCRIPTIONS[code]}: ${summary}`, { issues });
  }
}

/**
 * Thrown when an export handler is registered twice under one name.
 */
export class DuplicateHandlerError extends TraceError {
  constructor(handlerName: string) {
    super(DUPLICATE_HANDLER, `Export handler already registered: ${handlerName}`, { handlerName });
    this.name = 'DuplicateHandlerError';
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Formats an unknown thrown value for structured log output.
 */
export function formatError(error: unknown): Record<string, unknown> {
  if (error instanceof TraceError) {
    return { name: error.name, ...error.toJSON() };
  }
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
    };
  }
  return {
    type: typeof error,
    value: String(error),
  };
}
