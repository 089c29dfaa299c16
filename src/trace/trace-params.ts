/**
 * Process-wide trace params
 *
 * Buffer limits and the default sampler. The current table is a frozen
 * object replaced as a whole, so a span starting concurrently with an update
 * sees either the old table or the new one. Spans capture the table when
 * they start.
 */

import { z } from 'zod';
import { getConfig } from '../config.js';
import { INVALID_TRACE_PARAMS, TraceConfigError } from '../errors.js';
import { getLogger } from '../observability/logger.js';
import { createSampler, type Sampler } from './sampler.js';

// =============================================================================
// Schema
// =============================================================================

const limit = z.number().int().min(0);

const SamplerSchema = z.custom<Sampler>(
  (value) =>
    typeof value === 'object' &&
    value !== null &&
    'shouldSample' in value &&
    typeof value.shouldSample === 'function',
  { message: 'sampler must implement shouldSample()' }
);

export const TraceParamsSchema = z.object({
  maxAttributes: limit,
  maxAnnotations: limit,
  maxMessageEvents: limit,
  maxLinks: limit,
  sampler: SamplerSchema,
});

export type TraceParams = Readonly<z.infer<typeof TraceParamsSchema>>;

// =============================================================================
// Current Params
// =============================================================================

let current: TraceParams | null = null;

function validate(input: unknown): TraceParams {
  const result = TraceParamsSchema.safeParse(input);
  if (!result.success) {
    throw TraceConfigError.fromZodError(INVALID_TRACE_PARAMS, result.error);
  }
  return Object.freeze(result.data);
}

/**
 * Builds the default params from environment configuration.
 */
export function defaultTraceParams(): TraceParams {
  const config = getConfig();
  return Object.freeze({
    maxAttributes: config.maxAttributes,
    maxAnnotations: config.maxAnnotations,
    maxMessageEvents: config.maxMessageEvents,
    maxLinks: config.maxLinks,
    sampler: createSampler(config.sampler, config.samplingProbability),
  });
}

export function getCurrentTraceParams(): TraceParams {
  if (!current) {
    current = defaultTraceParams();
  }
  return current;
}

/**
 * Replaces the whole table. Spans already started keep the table they
 * captured.
 *
 * @throws TraceConfigError when a limit is not a non-negative integer or
 * the sampler does not implement `shouldSample`
 */
export function setCurrentTraceParams(params: TraceParams): TraceParams {
  current = validate(params);
  getLogger().child('params').debug('Trace params updated', describe(current));
  return current;
}

/**
 * Replaces the table with the current one merged with `update`.
 */
export function updateCurrentTraceParams(update: Partial<TraceParams>): TraceParams {
  return setCurrentTraceParams({ ...getCurrentTraceParams(), ...update });
}

/**
 * Drop the current table so the next read rebuilds it from configuration
 * (for testing).
 */
export function resetTraceParams(): void {
  current = null;
}

function describe(params: TraceParams): Record<string, unknown> {
  return {
    maxAttributes: params.maxAttributes,
    maxAnnotations: params.maxAnnotations,
    maxMessageEvents: params.maxMessageEvents,
    maxLinks: params.maxLinks,
    sampler: String(params.sampler),
  };
}
