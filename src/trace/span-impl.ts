/**
 * SpanImpl - the mutable record behind a recording span
 *
 * Every method runs to completion synchronously, so calls arriving from
 * different async tasks are applied one at a time and a batch is never seen
 * half-applied. Once `end()` has run, every mutator is a no-op and
 * `toSpanData()` returns the same frozen snapshot.
 */

import {
  toAttributeEntries,
  toAttributeMap,
  type AttributeList,
  type AttributeValue,
} from './attribute.js';
import { EvictingMap, EvictingQueue } from './evicting-buffer.js';
import { INVALID_SPAN_ID } from './ids.js';
import type { SpanContext } from './span-context.js';
import type { Annotation, Link, LinkType, MessageEvent, MessageEventType, SpanData } from './span-data.js';
import { OK_STATUS, type Status, type StatusCode } from './status.js';
import type { TraceParams } from './trace-params.js';

export interface SpanImplOptions {
  name: string;
  context: SpanContext;
  parentSpanId?: string;
  hasRemoteParent?: boolean;
  params: TraceParams;
  /** Epoch milliseconds; defaults to now */
  startTime?: number;
}

/**
 * Read access used by span stores. Implemented by SpanImpl.
 */
export interface ReadableSpan {
  readonly name: string;
  readonly context: SpanContext;
  hasEnded(): boolean;
  toSpanData(): SpanData;
}

export class SpanImpl implements ReadableSpan {
  readonly context: SpanContext;
  readonly parentSpanId: string;
  readonly hasRemoteParent: boolean;
  readonly startTime: number;

  private spanName: string;
  private endTime: number | undefined;
  private status: Status = OK_STATUS;
  private ended = false;
  private frozen: SpanData | undefined;

  private readonly attributes: EvictingMap<string, AttributeValue>;
  private readonly annotations: EvictingQueue<Annotation>;
  private readonly messageEvents: EvictingQueue<MessageEvent>;
  private readonly parentLinks: EvictingQueue<Link>;
  private readonly childLinks: EvictingQueue<Link>;

  constructor(options: SpanImplOptions) {
    this.spanName = options.name;
    this.context = options.context;
    this.parentSpanId = options.parentSpanId ?? INVALID_SPAN_ID;
    this.hasRemoteParent = options.hasRemoteParent ?? false;
    this.startTime = options.startTime ?? Date.now();

    const { params } = options;
    this.attributes = new EvictingMap(params.maxAttributes);
    this.annotations = new EvictingQueue(params.maxAnnotations);
    this.messageEvents = new EvictingQueue(params.maxMessageEvents);
    this.parentLinks = new EvictingQueue(params.maxLinks);
    this.childLinks = new EvictingQueue(params.maxLinks);
  }

  get name(): string {
    return this.spanName;
  }

  hasEnded(): boolean {
    return this.ended;
  }

  // ===========================================================================
  // Mutators
  // ===========================================================================

  addAttributes(attributes: AttributeList): void {
    if (this.ended) {
      return;
    }
    for (const [key, value] of toAttributeEntries(attributes)) {
      this.attributes.set(key, value);
    }
  }

  addAnnotation(description: string, attributes?: AttributeList): void {
    if (this.ended) {
      return;
    }
    this.annotations.push(
      Object.freeze({
        time: Date.now(),
        description,
        attributes: toAttributeMap(attributes),
      })
    );
  }

  addMessageEvent(
    type: MessageEventType,
    id: number,
    compressedSize: number,
    uncompressedSize: number
  ): void {
    if (this.ended) {
      return;
    }
    this.messageEvents.push(
      Object.freeze({ time: Date.now(), type, id, compressedSize, uncompressedSize })
    );
  }

  addLink(type: LinkType, context: SpanContext, attributes?: AttributeList): void {
    if (this.ended) {
      return;
    }
    const link: Link = Object.freeze({ type, context, attributes: toAttributeMap(attributes) });
    if (type === 'parent') {
      this.parentLinks.push(link);
    } else {
      this.childLinks.push(link);
    }
  }

  setStatus(code: StatusCode, message = ''): void {
    if (this.ended) {
      return;
    }
    this.status = Object.freeze({ code, message });
  }

  setName(name: string): void {
    if (this.ended) {
      return;
    }
    this.spanName = name;
  }

  /**
   * Stamps the end time and freezes the record. Returns true only for the
   * call that performed the transition.
   */
  end(endTime = Date.now()): boolean {
    if (this.ended) {
      return false;
    }
    this.endTime = endTime;
    this.ended = true;
    this.frozen = this.snapshot();
    return true;
  }

  // ===========================================================================
  // Snapshots
  // ===========================================================================

  toSpanData(): SpanData {
    return this.frozen ?? this.snapshot();
  }

  private snapshot(): SpanData {
    return Object.freeze({
      name: this.spanName,
      context: this.context,
      parentSpanId: this.parentSpanId,
      hasRemoteParent: this.hasRemoteParent,
      startTime: this.startTime,
      endTime: this.endTime,
      status: this.status,
      attributes: this.attributes.toFrozenMap(),
      droppedAttributesCount: this.attributes.droppedCount,
      annotations: Object.freeze(this.annotations.toArray()),
      droppedAnnotationsCount: this.annotations.droppedCount,
      messageEvents: Object.freeze(this.messageEvents.toArray()),
      droppedMessageEventsCount: this.messageEvents.droppedCount,
      parentLinks: Object.freeze(this.parentLinks.toArray()),
      childLinks: Object.freeze(this.childLinks.toArray()),
      droppedLinksCount: this.parentLinks.droppedCount + this.childLinks.droppedCount,
      hasEnded: this.ended,
    });
  }
}
