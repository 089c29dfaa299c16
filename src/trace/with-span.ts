/**
 * Current-span tracking across async continuations.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import type { Span } from './span.js';

const storage = new AsyncLocalStorage<Span>();

/**
 * Runs `fn` with `span` as the current span. The span stays current for
 * every promise, timer and callback created inside `fn`.
 *
 * @example
 * ```typescript
 * const span = Span.startSpan('handle-request');
 * await withSpan(span, async () => {
 *   Span.current().addAnnotation('loaded user');
 * });
 * span.end();
 * ```
 */
export function withSpan<T>(span: Span, fn: () => T): T {
  return storage.run(span, fn);
}

/**
 * Returns the current span, or undefined outside of any `withSpan` scope.
 * Use `Span.current()` for a handle that is always safe to call.
 */
export function currentSpan(): Span | undefined {
  return storage.getStore();
}
