/**
 * Span lifecycle hooks
 *
 * Spans report here when they start and end. The hooks fan out to the
 * running store, the local store and the export pipeline. A store that
 * throws is logged and skipped; the span operation that triggered it still
 * completes.
 */

import { ConfigSchema, getConfig, type Config } from '../config.js';
import { formatError } from '../errors.js';
import { getLogger } from '../observability/logger.js';
import type { ReadableSpan } from '../trace/span-impl.js';
import { LocalSpanStore, type SpanDataSink } from './local-span-store.js';
import { InMemoryRunningSpanStore, type RunningSpanStore } from './running-span-store.js';
import { SpanExportPipeline } from './span-exporter.js';

export interface SpanStores {
  running: RunningSpanStore;
  local: SpanDataSink;
  exporter: SpanDataSink;
}

let stores: SpanStores | null = null;

function createDefaultStores(config: Config): SpanStores {
  const exporter = new SpanExportPipeline({
    bufferSize: config.exportBufferSize,
    intervalMs: config.exportIntervalMs,
  });
  exporter.start();
  return {
    running: new InMemoryRunningSpanStore(),
    local: new LocalSpanStore(config.localStoreSize),
    exporter,
  };
}

/**
 * @throws TraceConfigError when the stores are built from an invalid
 *   environment
 */
export function getSpanStores(): SpanStores {
  if (!stores) {
    stores = createDefaultStores(getConfig());
  }
  return stores;
}

/**
 * Stores for the span hooks. An invalid environment is logged once and the
 * built-in defaults are installed in its place.
 */
function resolveStores(): SpanStores {
  try {
    return getSpanStores();
  } catch (error) {
    getLogger().child('lifecycle').error('Span stores unavailable, using defaults', {
      error: formatError(error),
    });
    stores = createDefaultStores(ConfigSchema.parse({}));
    return stores;
  }
}

/**
 * Replace some or all of the stores. Spans already running report their end
 * to whatever stores are installed at that time.
 */
export function setSpanStores(update: Partial<SpanStores>): SpanStores {
  const { running, local, exporter } = update;
  const next =
    running && local && exporter ? { running, local, exporter } : { ...getSpanStores(), ...update };
  stores = next;
  return next;
}

/**
 * Discard the installed stores so the next read rebuilds the defaults
 * (for testing).
 */
export function resetSpanStores(): void {
  if (stores?.exporter instanceof SpanExportPipeline) {
    stores.exporter.stop();
  }
  stores = null;
}

// =============================================================================
// Notifications
// =============================================================================

function guarded(hook: string, span: ReadableSpan, fn: () => void): void {
  try {
    fn();
  } catch (error) {
    getLogger().child('lifecycle').error('Span store hook failed', {
      hook,
      span: span.name,
      spanId: span.context.spanId,
      error: formatError(error),
    });
  }
}

export function notifySpanStarted(span: ReadableSpan): void {
  const { running } = resolveStores();
  guarded('running.onStart', span, () => running.onStart(span));
}

/**
 * Removes the span from the running store and, for a sampled span, hands
 * its frozen snapshot to the local store and the export pipeline.
 */
export function notifySpanEnded(span: ReadableSpan, sampled: boolean): void {
  const { running, local, exporter } = resolveStores();
  guarded('running.onEnd', span, () => running.onEnd(span));
  if (!sampled) {
    return;
  }
  const data = span.toSpanData();
  guarded('local.addSpan', span, () => local.addSpan(data));
  guarded('exporter.addSpan', span, () => exporter.addSpan(data));
}
