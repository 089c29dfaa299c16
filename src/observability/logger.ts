/**
 * Diagnostics logger
 *
 * The library reports its own faults here: samplers that throw, store hooks
 * that fail, export handlers that reject, rejected configuration. Entries
 * are single-line JSON. Inside `withSpan`, the ids of the current span ride
 * along so a fault can be matched to the trace that triggered it.
 */

import { LOG_LEVEL_PRIORITY, type LogLevel, parseLogLevel } from '../logging/levels.js';
import { currentSpan } from '../trace/with-span.js';

// =============================================================================
// Types
// =============================================================================

export interface LogEntry {
  /** ISO 8601 */
  timestamp: string;
  level: string;
  message: string;
  /** Dotted component path, e.g. `span-recorder.export` */
  logger?: string;
  traceId?: string;
  spanId?: string;
  data?: unknown;
}

export interface StructuredLoggerOptions {
  name?: string;
  /** Defaults to TRACE_LOG_LEVEL, then 'info' */
  minLevel?: LogLevel;
  /** Receives each serialized entry (default: console.log) */
  output?: (json: string) => void;
}

function levelFromEnv(): LogLevel {
  return parseLogLevel(process.env['TRACE_LOG_LEVEL']) ?? 'info';
}

function spanIds(): Pick<LogEntry, 'traceId' | 'spanId'> {
  const span = currentSpan();
  if (!span || !span.context.isValid()) {
    return {};
  }
  return { traceId: span.context.traceId, spanId: span.context.spanId };
}

// =============================================================================
// StructuredLogger
// =============================================================================

/**
 * @example
 * ```typescript
 * const lines: string[] = [];
 * setLogger(new StructuredLogger({ minLevel: 'debug', output: (line) => lines.push(line) }));
 *
 * pipeline.registerHandler('audit', handler);
 * // lines[0]: {"timestamp":"...","level":"debug","message":"Export handler registered",
 * //            "logger":"export","data":{"handler":"audit"}}
 * ```
 */
export class StructuredLogger {
  private readonly name?: string;
  private readonly minLevel: LogLevel;
  private readonly output: (json: string) => void;

  constructor(options: StructuredLoggerOptions = {}) {
    if (options.name !== undefined) {
      this.name = options.name;
    }
    this.minLevel = options.minLevel ?? levelFromEnv();
    this.output = options.output ?? console.log;
  }

  /** True when `level` is at least as severe as the minimum level. */
  shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  getName(): string | undefined {
    return this.name;
  }

  log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };
    if (this.name !== undefined) {
      entry.logger = this.name;
    }
    const { traceId, spanId } = spanIds();
    if (traceId) {
      entry.traceId = traceId;
    }
    if (spanId) {
      entry.spanId = spanId;
    }
    if (data !== undefined) {
      entry.data = data;
    }

    this.output(JSON.stringify(entry));
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  notice(message: string, data?: unknown): void {
    this.log('notice', message, data);
  }

  /** Faults the library recovered from, such as a throwing sampler. */
  warning(message: string, data?: unknown): void {
    this.log('warning', message, data);
  }

  /** Faults that lost data, such as a failed store hook or export handler. */
  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  critical(message: string, data?: unknown): void {
    this.log('critical', message, data);
  }

  alert(message: string, data?: unknown): void {
    this.log('alert', message, data);
  }

  emergency(message: string, data?: unknown): void {
    this.log('emergency', message, data);
  }

  /**
   * Logger for one component: `getLogger().child('export')` is named
   * `span-recorder.export` and shares this logger's level and output.
   */
  child(childName: string): StructuredLogger {
    return new StructuredLogger({
      name: this.name ? `${this.name}.${childName}` : childName,
      minLevel: this.minLevel,
      output: this.output,
    });
  }
}

// =============================================================================
// Root Logger
// =============================================================================

let rootLogger: StructuredLogger | null = null;

/**
 * Root of every component logger in the library.
 */
export function getLogger(): StructuredLogger {
  if (!rootLogger) {
    rootLogger = new StructuredLogger({ name: 'span-recorder' });
  }
  return rootLogger;
}

/**
 * Redirect library diagnostics, e.g. into an application's own log sink.
 * `null` restores the default on next use.
 */
export function setLogger(logger: StructuredLogger | null): void {
  rootLogger = logger;
}

export { type LogLevel } from '../logging/levels.js';
