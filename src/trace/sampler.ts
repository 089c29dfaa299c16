/**
 * Sampling decisions
 *
 * A sampler decides whether a new span is sampled (recorded and exported).
 * Samplers are called synchronously while a span starts and must not block
 * or keep state that needs coordination between callers.
 */

import type { SpanContext } from './span-context.js';

// =============================================================================
// Types
// =============================================================================

export interface SamplingParams {
  /** Trace id of the span being started */
  traceId: string;
  /** Span id of the span being started */
  spanId: string;
  /** Name of the span being started */
  name: string;
  /** Parent context, local or remote, when there is one */
  parentContext?: SpanContext;
  /** Whether the parent context is marked sampled */
  parentSampled: boolean;
  /** True when the parent came from another process */
  hasRemoteParent: boolean;
  /** Contexts of spans in other traces that are parents of this span */
  links: readonly SpanContext[];
}

export interface Sampler {
  shouldSample(params: SamplingParams): boolean;
}

export type SamplerKind = 'always' | 'never' | 'probability';

// =============================================================================
// Implementations
// =============================================================================

export class AlwaysSampler implements Sampler {
  shouldSample(): boolean {
    return true;
  }

  toString(): string {
    return 'AlwaysSampler';
  }
}

export class NeverSampler implements Sampler {
  shouldSample(): boolean {
    return false;
  }

  toString(): string {
    return 'NeverSampler';
  }
}

const TWO_POW_64 = 2n ** 64n;
const MAX_UINT64 = TWO_POW_64 - 1n;

/**
 * Samples a fixed fraction of traces.
 *
 * The decision is a function of the trace id alone, so every process that
 * sees the same trace id with the same probability makes the same choice.
 * Spans with a sampled parent are always sampled.
 */
export class ProbabilitySampler implements Sampler {
  readonly probability: number;
  private readonly threshold: bigint;

  constructor(probability: number) {
    this.probability = Number.isNaN(probability) ? 0 : Math.min(1, Math.max(0, probability));
    if (this.probability >= 1) {
      this.threshold = MAX_UINT64;
    } else {
      // probability * 2^64, scaled through 2^53 so the product stays exact.
      this.threshold = (BigInt(Math.round(this.probability * 2 ** 53)) * TWO_POW_64) >> 53n;
    }
  }

  shouldSample(params: SamplingParams): boolean {
    if (params.parentSampled) {
      return true;
    }
    if (this.probability === 0) {
      return false;
    }
    if (this.probability >= 1) {
      return true;
    }
    return traceIdLowBits(params.traceId) < this.threshold;
  }

  toString(): string {
    return `ProbabilitySampler{${this.probability}}`;
  }
}

/**
 * Low 64 bits of a hex trace id as an unsigned integer. Malformed ids map
 * to the maximum so they are never sampled on probability alone.
 */
function traceIdLowBits(traceId: string): bigint {
  const low = traceId.slice(-16);
  if (!/^[0-9a-f]{16}$/i.test(low)) {
    return MAX_UINT64;
  }
  return BigInt(`0x${low}`);
}

// =============================================================================
// Factory
// =============================================================================

export function createSampler(kind: SamplerKind, probability = 1e-4): Sampler {
  switch (kind) {
    case 'always':
      return new AlwaysSampler();
    case 'never':
      return new NeverSampler();
    case 'probability':
      return new ProbabilitySampler(probability);
  }
}
