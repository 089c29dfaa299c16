/**
 * span-recorder - entry point and public exports
 */

// Spans
export { Span, type StartSpanOptions } from './trace/span.js';
export { SpanContext, SAMPLED_FLAG, type SpanContextInit } from './trace/span-context.js';
export { withSpan } from './trace/with-span.js';
export {
  AttributeValue,
  toAttributeValue,
  type AttributeInput,
  type AttributeList,
  type AttributeType,
} from './trace/attribute.js';
export { StatusCode, OK_STATUS, statusCodeName, isOk, type Status } from './trace/status.js';
export {
  generateTraceId,
  generateSpanId,
  isValidTraceId,
  isValidSpanId,
  INVALID_TRACE_ID,
  INVALID_SPAN_ID,
} from './trace/ids.js';
export {
  spanDuration,
  type SpanData,
  type Annotation,
  type MessageEvent,
  type MessageEventType,
  type Link,
  type LinkType,
} from './trace/span-data.js';
export type { ReadableSpan } from './trace/span-impl.js';
export { EvictingMap, EvictingQueue, FrozenMap } from './trace/evicting-buffer.js';

// Sampling and params
export {
  AlwaysSampler,
  NeverSampler,
  ProbabilitySampler,
  createSampler,
  type Sampler,
  type SamplerKind,
  type SamplingParams,
} from './trace/sampler.js';
export {
  TraceParamsSchema,
  defaultTraceParams,
  getCurrentTraceParams,
  setCurrentTraceParams,
  updateCurrentTraceParams,
  type TraceParams,
} from './trace/trace-params.js';

// Span stores
export * from './export/running-span-store.js';
export * from './export/local-span-store.js';
export * from './export/span-exporter.js';
export { getSpanStores, setSpanStores, type SpanStores } from './export/lifecycle.js';

// Configuration
export { loadConfig, getConfig, reloadConfig, type Config } from './config.js';

// Errors
export * from './errors.js';

// Logging
export { StructuredLogger, getLogger, setLogger, type LogEntry, type LogLevel } from './observability/logger.js';
