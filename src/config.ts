/**
 * Environment configuration loader with Zod validation
 */

import { z } from 'zod';
import { LogLevelSchema } from './logging/levels.js';
import { INVALID_CONFIG, TraceConfigError } from './errors.js';

/**
 * Configuration schema with validation rules
 */
export const ConfigSchema = z.object({
  maxAttributes: z.number().int().min(0).default(32),
  maxAnnotations: z.number().int().min(0).default(32),
  maxMessageEvents: z.number().int().min(0).default(128),
  maxLinks: z.number().int().min(0).default(128),
  sampler: z.enum(['always', 'never', 'probability']).default('probability'),
  samplingProbability: z.number().min(0).max(1).default(1e-4),
  localStoreSize: z.number().int().min(0).default(100),
  exportBufferSize: z.number().int().min(1).default(1000),
  exportIntervalMs: z.number().int().min(0).default(5000),
  logLevel: LogLevelSchema.default('info'),
});

/**
 * Configuration type inferred from schema
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse an integer from environment variable string
 */
function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Parse a float from environment variable string
 */
function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = parseFloat(value);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): Config {
  const rawConfig: Record<string, unknown> = {
    maxAttributes: parseInteger(process.env['TRACE_MAX_ATTRIBUTES']),
    maxAnnotations: parseInteger(process.env['TRACE_MAX_ANNOTATIONS']),
    maxMessageEvents: parseInteger(process.env['TRACE_MAX_MESSAGE_EVENTS']),
    maxLinks: parseInteger(process.env['TRACE_MAX_LINKS']),
    sampler: process.env['TRACE_SAMPLER']?.toLowerCase() || undefined,
    samplingProbability: parseNumber(process.env['TRACE_SAMPLING_PROBABILITY']),
    localStoreSize: parseInteger(process.env['TRACE_LOCAL_STORE_SIZE']),
    exportBufferSize: parseInteger(process.env['TRACE_EXPORT_BUFFER_SIZE']),
    exportIntervalMs: parseInteger(process.env['TRACE_EXPORT_INTERVAL_MS']),
    logLevel: process.env['TRACE_LOG_LEVEL']?.toLowerCase() || undefined,
  };

  // Remove undefined values so defaults apply
  const configInput = Object.fromEntries(
    Object.entries(rawConfig).filter(([, v]) => v !== undefined)
  );

  const result = ConfigSchema.safeParse(configInput);
  if (!result.success) {
    throw TraceConfigError.fromZodError(INVALID_CONFIG, result.error);
  }
  return result.data;
}

/**
 * Singleton config instance
 */
let config: Config | null = null;

/**
 * Get the current configuration (singleton)
 * Loads from environment on first call
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Force reload configuration from environment
 */
export function reloadConfig(): Config {
  config = loadConfig();
  return config;
}

/**
 * Reset config singleton (for testing)
 */
export function resetConfig(): void {
  config = null;
}
