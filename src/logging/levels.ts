/**
 * Log levels
 *
 * RFC 5424 level names and priorities shared by the structured logger and
 * the configuration loader.
 */

import { z } from 'zod';

// =============================================================================
// Constants - RFC 5424 Log Levels
// =============================================================================

/**
 * RFC 5424 log levels with numeric priorities.
 * Lower number = higher priority (more severe).
 */
export const LOG_LEVEL_PRIORITY = {
  emergency: 0, // System is unusable
  alert: 1, // Action must be taken immediately
  critical: 2, // Critical conditions
  error: 3, // Error conditions
  warning: 4, // Warning conditions
  notice: 5, // Normal but significant condition
  info: 6, // Informational messages
  debug: 7, // Debug-level messages
} as const;

// =============================================================================
// Schemas
// =============================================================================

export const LogLevelSchema = z.enum([
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'critical',
  'alert',
  'emergency',
]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Parse a level name, returning undefined for anything that is not one.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) {
    return undefined;
  }
  const result = LogLevelSchema.safeParse(value.toLowerCase());
  return result.success ? result.data : undefined;
}
