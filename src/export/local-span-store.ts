/**
 * Local span store
 *
 * Keeps the most recently ended sampled spans in process, for debugging
 * pages and tests. Older spans are evicted once the store is full.
 */

import { EvictingQueue } from '../trace/evicting-buffer.js';
import type { SpanData } from '../trace/span-data.js';
import { selectSpans, summarize, type SpanFilter, type SpanSummary } from './running-span-store.js';

/**
 * Receives the frozen snapshot of every ended sampled span.
 */
export interface SpanDataSink {
  addSpan(data: SpanData): void;
}

export class LocalSpanStore implements SpanDataSink {
  private readonly spans: EvictingQueue<SpanData>;

  constructor(capacity = 100) {
    this.spans = new EvictingQueue(capacity);
  }

  get size(): number {
    return this.spans.size;
  }

  get droppedCount(): number {
    return this.spans.droppedCount;
  }

  addSpan(data: SpanData): void {
    this.spans.push(data);
  }

  /**
   * Retained spans, oldest first.
   */
  getSpans(filter: SpanFilter = {}): SpanData[] {
    return selectSpans(this.spans.toArray(), filter);
  }

  getSummary(): SpanSummary {
    return summarize(Array.from(this.spans, (span) => span.name));
  }

  clear(): void {
    this.spans.drain();
  }
}
