/**
 * Exported span record
 *
 * `SpanData` is what the running store, the local store and export handlers
 * read. Everything in it is frozen; readers need no coordination with the
 * code that produced it.
 */

import type { AttributeValue } from './attribute.js';
import type { SpanContext } from './span-context.js';
import type { Status } from './status.js';

// =============================================================================
// Timed Events
// =============================================================================

export interface Annotation {
  /** Epoch milliseconds */
  readonly time: number;
  readonly description: string;
  readonly attributes: ReadonlyMap<string, AttributeValue>;
}

export type MessageEventType = 'sent' | 'received';

export interface MessageEvent {
  /** Epoch milliseconds */
  readonly time: number;
  readonly type: MessageEventType;
  readonly id: number;
  readonly compressedSize: number;
  readonly uncompressedSize: number;
}

export type LinkType = 'parent' | 'child';

export interface Link {
  readonly type: LinkType;
  readonly context: SpanContext;
  readonly attributes: ReadonlyMap<string, AttributeValue>;
}

// =============================================================================
// SpanData
// =============================================================================

export interface SpanData {
  readonly name: string;
  readonly context: SpanContext;
  /** Span id of the parent, or the invalid span id for a root span */
  readonly parentSpanId: string;
  readonly hasRemoteParent: boolean;
  /** Epoch milliseconds */
  readonly startTime: number;
  /** Epoch milliseconds; undefined while the span is still running */
  readonly endTime: number | undefined;
  readonly status: Status;
  /** Attributes in eviction order: oldest inserted or updated first */
  readonly attributes: ReadonlyMap<string, AttributeValue>;
  readonly droppedAttributesCount: number;
  readonly annotations: readonly Annotation[];
  readonly droppedAnnotationsCount: number;
  readonly messageEvents: readonly MessageEvent[];
  readonly droppedMessageEventsCount: number;
  readonly parentLinks: readonly Link[];
  readonly childLinks: readonly Link[];
  readonly droppedLinksCount: number;
  readonly hasEnded: boolean;
}

/**
 * Duration in milliseconds, or undefined for a running span.
 */
export function spanDuration(data: SpanData): number | undefined {
  return data.endTime === undefined ? undefined : data.endTime - data.startTime;
}
