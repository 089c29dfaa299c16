/**
 * Span export pipeline
 *
 * Buffers ended sampled spans and hands them in batches to registered
 * handlers. Handlers run outside the span's end() call; a failing handler
 * is logged and never affects the others or the instrumented code.
 */

import { DuplicateHandlerError, formatError } from '../errors.js';
import { getLogger, type StructuredLogger } from '../observability/logger.js';
import { EvictingQueue } from '../trace/evicting-buffer.js';
import type { SpanData } from '../trace/span-data.js';
import type { SpanDataSink } from './local-span-store.js';

// =============================================================================
// Types
// =============================================================================

export interface SpanExportHandler {
  export(spans: readonly SpanData[]): void | Promise<void>;
}

export interface SpanExportPipelineOptions {
  /** Spans held between flushes; the oldest is dropped when full (default: 1000) */
  bufferSize?: number;
  /** Flush period used by start() in milliseconds (default: 5000) */
  intervalMs?: number;
  /** Logger for handler failures (default: child of the root logger) */
  logger?: StructuredLogger;
}

export interface FlushResult {
  /** Spans in the batch */
  exported: number;
  /** Names of handlers that threw or rejected */
  failed: string[];
}

// =============================================================================
// SpanExportPipeline
// =============================================================================

/**
 * @example
 * ```typescript
 * const pipeline = new SpanExportPipeline({ intervalMs: 1000 });
 * pipeline.registerHandler('audit', {
 *   export: (spans) => auditLog.write(spans.map((s) => s.name)),
 * });
 * pipeline.start();
 * ```
 */
export class SpanExportPipeline implements SpanDataSink {
  private readonly buffer: EvictingQueue<SpanData>;
  private readonly handlers = new Map<string, SpanExportHandler>();
  private readonly intervalMs: number;
  private readonly logger: StructuredLogger | undefined;
  private timer: NodeJS.Timeout | null = null;

  constructor(options: SpanExportPipelineOptions = {}) {
    this.buffer = new EvictingQueue(options.bufferSize ?? 1000);
    this.intervalMs = options.intervalMs ?? 5000;
    this.logger = options.logger;
  }

  // ===========================================================================
  // Handlers
  // ===========================================================================

  /**
   * @throws DuplicateHandlerError when `name` is already registered
   */
  registerHandler(name: string, handler: SpanExportHandler): void {
    if (this.handlers.has(name)) {
      throw new DuplicateHandlerError(name);
    }
    this.handlers.set(name, handler);
    this.log().debug('Export handler registered', { handler: name });
  }

  unregisterHandler(name: string): boolean {
    return this.handlers.delete(name);
  }

  getHandlerNames(): string[] {
    return Array.from(this.handlers.keys());
  }

  // ===========================================================================
  // Buffering
  // ===========================================================================

  addSpan(data: SpanData): void {
    this.buffer.push(data);
  }

  get pendingCount(): number {
    return this.buffer.size;
  }

  /** Spans dropped because the buffer was full */
  get droppedCount(): number {
    return this.buffer.droppedCount;
  }

  /**
   * Sends every buffered span to every handler as one batch. Spans buffered
   * while no handler is registered are discarded.
   */
  async flush(): Promise<FlushResult> {
    const batch = Object.freeze(this.buffer.drain());
    if (batch.length === 0 || this.handlers.size === 0) {
      return { exported: batch.length, failed: [] };
    }

    const entries = Array.from(this.handlers.entries());
    const results = await Promise.allSettled(
      entries.map(async ([, handler]) => handler.export(batch))
    );

    const failed: string[] = [];
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        const name = entries[index]?.[0] ?? 'unknown';
        failed.push(name);
        this.log().error('Export handler failed', {
          handler: name,
          spans: batch.length,
          error: formatError(result.reason),
        });
      }
    });

    return { exported: batch.length, failed };
  }

  // ===========================================================================
  // Periodic Flushing
  // ===========================================================================

  /**
   * Flush every `intervalMs`. The timer does not keep the process alive.
   */
  start(): void {
    if (this.timer || this.intervalMs <= 0) {
      return;
    }
    this.timer = setInterval(() => {
      this.flush().catch((error: unknown) => {
        this.log().error('Periodic flush failed', { error: formatError(error) });
      });
    }, this.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Stop the timer and export whatever is still buffered.
   */
  async shutdown(): Promise<FlushResult> {
    this.stop();
    return this.flush();
  }

  private log(): StructuredLogger {
    return this.logger ?? getLogger().child('export');
  }
}
