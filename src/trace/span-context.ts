/**
 * SpanContext - immutable identity of a span within a trace
 */

import {
  TraceFlags,
  createTraceState,
  type SpanContext as OtelSpanContext,
} from '@opentelemetry/api';
import { INVALID_SPAN_ID, INVALID_TRACE_ID, isValidSpanId, isValidTraceId } from './ids.js';

/** Bit 0 of the trace options byte marks the span as sampled */
export const SAMPLED_FLAG = TraceFlags.SAMPLED;

export interface SpanContextInit {
  traceId: string;
  spanId: string;
  /** Trace options byte; bit 0 is the sampled flag */
  traceOptions?: number;
  /** Opaque vendor trace-state, propagated unchanged */
  traceState?: string;
}

/**
 * Identity of a span: trace id, span id, trace options and trace-state.
 *
 * Instances are frozen; pass them freely between callers.
 */
export class SpanContext {
  readonly traceId: string;
  readonly spanId: string;
  readonly traceOptions: number;
  readonly traceState: string;

  constructor(init: SpanContextInit) {
    this.traceId = init.traceId.toLowerCase();
    this.spanId = init.spanId.toLowerCase();
    this.traceOptions = (init.traceOptions ?? 0) & 0xff;
    this.traceState = init.traceState ?? '';
    Object.freeze(this);
  }

  /**
   * The blank context: all-zero ids, not sampled.
   */
  static invalid(): SpanContext {
    return INVALID_CONTEXT;
  }

  /**
   * Convert from an OpenTelemetry span context, e.g. one produced by a
   * W3C propagator on an incoming request.
   */
  static fromOtelSpanContext(otel: OtelSpanContext): SpanContext {
    return new SpanContext({
      traceId: otel.traceId,
      spanId: otel.spanId,
      traceOptions: otel.traceFlags,
      traceState: otel.traceState?.serialize() ?? '',
    });
  }

  isValid(): boolean {
    return isValidTraceId(this.traceId) && isValidSpanId(this.spanId);
  }

  isSampled(): boolean {
    return (this.traceOptions & SAMPLED_FLAG) !== 0;
  }

  /**
   * Returns true when both contexts belong to the same trace.
   */
  sameTrace(other: SpanContext): boolean {
    return this.traceId === other.traceId;
  }

  equals(other: SpanContext): boolean {
    return (
      this.traceId === other.traceId &&
      this.spanId === other.spanId &&
      this.traceOptions === other.traceOptions &&
      this.traceState === other.traceState
    );
  }

  toOtelSpanContext(isRemote = false): OtelSpanContext {
    const otel: OtelSpanContext = {
      traceId: this.traceId,
      spanId: this.spanId,
      traceFlags: this.traceOptions,
      isRemote,
    };
    if (this.traceState !== '') {
      otel.traceState = createTraceState(this.traceState);
    }
    return otel;
  }

  toString(): string {
    return `${this.traceId}-${this.spanId}-${this.traceOptions.toString(16).padStart(2, '0')}`;
  }
}

const INVALID_CONTEXT = new SpanContext({
  traceId: INVALID_TRACE_ID,
  spanId: INVALID_SPAN_ID,
});
