/**
 * Span - the public handle for a unit of work
 *
 * A Span is a SpanContext plus, for recording spans, a shared SpanImpl.
 * Every reference to the same Span writes to the same record. Spans that are
 * not recording carry only their context so identity and the sampled flag
 * still propagate; calling mutators on them is a no-op.
 */

import { ConfigSchema } from '../config.js';
import { formatError } from '../errors.js';
import { notifySpanEnded, notifySpanStarted } from '../export/lifecycle.js';
import { getLogger } from '../observability/logger.js';
import type { AttributeInput, AttributeList } from './attribute.js';
import { generateSpanId, generateTraceId } from './ids.js';
import { NeverSampler, type Sampler, type SamplingParams } from './sampler.js';
import { SAMPLED_FLAG, SpanContext } from './span-context.js';
import { SpanImpl } from './span-impl.js';
import type { StatusCode } from './status.js';
import { getCurrentTraceParams, type TraceParams } from './trace-params.js';
import { currentSpan } from './with-span.js';

// =============================================================================
// Types
// =============================================================================

export interface StartSpanOptions {
  /** Sampler for this span; defaults to the sampler in the current trace params */
  sampler?: Sampler;
  /**
   * Record events even when the span is not sampled. Such spans appear in
   * the running store but are never exported.
   */
  recordEvents?: boolean;
  /** Spans in other traces that are parents of this span */
  parentLinks?: readonly Span[];
}

// Records are reachable only through getSpanImpl(), which the package entry
// point does not export.
const records = new WeakMap<Span, SpanImpl>();

// =============================================================================
// Span
// =============================================================================

export class Span {
  readonly context: SpanContext;

  private constructor(context: SpanContext, impl?: SpanImpl) {
    this.context = context;
    if (impl) {
      records.set(this, impl);
    }
    Object.freeze(this);
  }

  /**
   * A span with an invalid context and no record. Every call on it is a no-op.
   */
  static blank(): Span {
    return Span.blankSpan;
  }

  /**
   * The span made current by `withSpan`, or a blank span.
   */
  static current(): Span {
    return currentSpan() ?? Span.blankSpan;
  }

  /**
   * Start a root span, or a child of `parent` when it has a valid context.
   *
   * @example
   * ```typescript
   * const root = Span.startSpan('checkout');
   * const child = Span.startSpan('charge-card', root, {
   *   sampler: new ProbabilitySampler(0.1),
   * });
   * child.end();
   * root.end();
   * ```
   */
  static startSpan(name: string, parent?: Span | null, options: StartSpanOptions = {}): Span {
    const parentContext = parent && parent.context.isValid() ? parent.context : undefined;
    return Span.start(name, parentContext, false, options);
  }

  /**
   * Start a span whose parent lives in another process, e.g. a context
   * extracted from an incoming request.
   */
  static startSpanWithRemoteParent(
    name: string,
    parentContext: SpanContext,
    options: StartSpanOptions = {}
  ): Span {
    const remote = parentContext.isValid() ? parentContext : undefined;
    return Span.start(name, remote, remote !== undefined, options);
  }

  private static readonly blankSpan = new Span(SpanContext.invalid());

  private static start(
    name: string,
    parent: SpanContext | undefined,
    hasRemoteParent: boolean,
    options: StartSpanOptions
  ): Span {
    const params = resolveParams();
    const traceId = parent?.traceId ?? generateTraceId();
    const spanId = generateSpanId();
    const links = options.parentLinks ?? [];
    const parentSampled = parent?.isSampled() === true;

    // A sampled parent, local or remote, decides for the child.
    const sampled =
      parentSampled ||
      decide(options.sampler ?? params.sampler, {
        traceId,
        spanId,
        name,
        ...(parent ? { parentContext: parent } : {}),
        parentSampled,
        hasRemoteParent,
        links: links.map((link) => link.context),
      });

    const context = new SpanContext({
      traceId,
      spanId,
      traceOptions: ((parent?.traceOptions ?? 0) & ~SAMPLED_FLAG) | (sampled ? SAMPLED_FLAG : 0),
      traceState: parent?.traceState ?? '',
    });

    if (!sampled && options.recordEvents !== true) {
      return new Span(context);
    }

    const impl = new SpanImpl({
      name,
      context,
      ...(parent ? { parentSpanId: parent.spanId } : {}),
      hasRemoteParent,
      params,
    });
    const span = new Span(context, impl);

    for (const link of links) {
      impl.addLink('parent', link.context);
      link.addChildLink(context);
    }

    notifySpanStarted(impl);
    return span;
  }

  // ===========================================================================
  // State
  // ===========================================================================

  /** True when the span will be exported. Sampled spans always record. */
  isSampled(): boolean {
    return this.context.isSampled();
  }

  /** True when the span has a record and shows up in span stores */
  isRecording(): boolean {
    return records.has(this);
  }

  // ===========================================================================
  // Mutators
  // ===========================================================================

  /**
   * Insert or update one attribute. Past the attribute limit the oldest
   * attribute is evicted.
   */
  addAttribute(key: string, value: AttributeInput): void {
    records.get(this)?.addAttributes([[key, value]]);
  }

  /**
   * Insert or update several attributes in one step.
   */
  addAttributes(attributes: AttributeList): void {
    records.get(this)?.addAttributes(attributes);
  }

  /**
   * @example
   * ```typescript
   * span.addAnnotation('retrying', { attempt: 3 });
   * ```
   */
  addAnnotation(description: string, attributes?: AttributeList): void {
    records.get(this)?.addAnnotation(description, attributes);
  }

  addSentMessageEvent(messageId: number, compressedSize: number, uncompressedSize: number): void {
    records.get(this)?.addMessageEvent('sent', messageId, compressedSize, uncompressedSize);
  }

  addReceivedMessageEvent(messageId: number, compressedSize: number, uncompressedSize: number): void {
    records.get(this)?.addMessageEvent('received', messageId, compressedSize, uncompressedSize);
  }

  addParentLink(parentContext: SpanContext, attributes?: AttributeList): void {
    records.get(this)?.addLink('parent', parentContext, attributes);
  }

  addChildLink(childContext: SpanContext, attributes?: AttributeList): void {
    records.get(this)?.addLink('child', childContext, attributes);
  }

  /** Last write wins. */
  setStatus(code: StatusCode, message = ''): void {
    records.get(this)?.setStatus(code, message);
  }

  setName(name: string): void {
    records.get(this)?.setName(name);
  }

  /**
   * Ends the span. Only the first call has an effect: it freezes the record,
   * removes it from the running store and, when sampled, hands it to the
   * local store and export pipeline.
   */
  end(): void {
    const impl = records.get(this);
    if (impl && impl.end()) {
      notifySpanEnded(impl, this.isSampled());
    }
  }
}

/**
 * The record behind a span, for span stores and tests.
 */
export function getSpanImpl(span: Span): SpanImpl | undefined {
  return records.get(span);
}

// =============================================================================
// Sampling
// =============================================================================

// Used when the configured params cannot be loaded: default limits, and a
// sampler that never samples.
const FALLBACK_PARAMS: TraceParams = (() => {
  const defaults = ConfigSchema.parse({});
  return Object.freeze({
    maxAttributes: defaults.maxAttributes,
    maxAnnotations: defaults.maxAnnotations,
    maxMessageEvents: defaults.maxMessageEvents,
    maxLinks: defaults.maxLinks,
    sampler: new NeverSampler(),
  });
})();

function resolveParams(): TraceParams {
  try {
    return getCurrentTraceParams();
  } catch (error) {
    getLogger().child('span').error('Trace params unavailable, not sampling', {
      error: formatError(error),
    });
    return FALLBACK_PARAMS;
  }
}

function decide(sampler: Sampler | undefined, params: SamplingParams): boolean {
  if (!sampler || typeof sampler.shouldSample !== 'function') {
    getLogger().child('span').warning('No sampler resolved, not sampling', { span: params.name });
    return false;
  }
  try {
    return sampler.shouldSample(params) === true;
  } catch (error) {
    getLogger().child('span').warning('Sampler failed, not sampling', {
      span: params.name,
      error: formatError(error),
    });
    return false;
  }
}
