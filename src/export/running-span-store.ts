/**
 * Running span store
 *
 * Tracks recording spans between start and end so in-flight work can be
 * inspected. Holds the live records, not copies; reads take a snapshot.
 */

import type { SpanData } from '../trace/span-data.js';
import type { ReadableSpan } from '../trace/span-impl.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Notified when a recording span starts and ends. Implementations must not
 * block and must tolerate calls in any order across spans.
 */
export interface RunningSpanStore {
  onStart(span: ReadableSpan): void;
  onEnd(span: ReadableSpan): void;
}

export interface SpanFilter {
  /** Only spans with this name */
  name?: string;
  /** At most this many spans */
  maxSpans?: number;
}

/** Span counts keyed by span name */
export type SpanSummary = Record<string, number>;

// =============================================================================
// InMemoryRunningSpanStore
// =============================================================================

export class InMemoryRunningSpanStore implements RunningSpanStore {
  private readonly spans = new Set<ReadableSpan>();

  onStart(span: ReadableSpan): void {
    this.spans.add(span);
  }

  onEnd(span: ReadableSpan): void {
    this.spans.delete(span);
  }

  get size(): number {
    return this.spans.size;
  }

  has(span: ReadableSpan): boolean {
    return this.spans.has(span);
  }

  /**
   * Snapshots of running spans, in start order.
   */
  getRunningSpans(filter: SpanFilter = {}): SpanData[] {
    return selectSpans(Array.from(this.spans, (span) => span.toSpanData()), filter);
  }

  getSummary(): SpanSummary {
    return summarize(Array.from(this.spans, (span) => span.name));
  }

  clear(): void {
    this.spans.clear();
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function selectSpans(spans: SpanData[], filter: SpanFilter): SpanData[] {
  const matching = filter.name === undefined ? spans : spans.filter((span) => span.name === filter.name);
  return filter.maxSpans === undefined ? matching : matching.slice(0, Math.max(0, filter.maxSpans));
}

export function summarize(names: Iterable<string>): SpanSummary {
  const summary: SpanSummary = {};
  for (const name of names) {
    summary[name] = (summary[name] ?? 0) + 1;
  }
  return summary;
}
