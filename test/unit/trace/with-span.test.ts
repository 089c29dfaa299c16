import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Span } from '../../../src/trace/span.js';
import { AlwaysSampler } from '../../../src/trace/sampler.js';
import { currentSpan, withSpan } from '../../../src/trace/with-span.js';
import { delay, installTestParams, installTestStores, resetTestState } from '../../helpers/index.js';

describe('withSpan', () => {
  beforeEach(() => {
    installTestStores();
    installTestParams(new AlwaysSampler());
  });

  afterEach(() => {
    resetTestState();
  });

  it('should have no current span outside a scope', () => {
    expect(currentSpan()).toBeUndefined();
    expect(Span.current()).toBe(Span.blank());
  });

  it('should make the span current inside the scope', () => {
    const span = Span.startSpan('op');

    const result = withSpan(span, () => {
      expect(Span.current()).toBe(span);
      return 42;
    });

    expect(result).toBe(42);
    expect(currentSpan()).toBeUndefined();
  });

  it('should keep the span current across awaits and timers', async () => {
    const span = Span.startSpan('op');

    const seen = await withSpan(span, async () => {
      await delay(1);
      return Span.current();
    });

    expect(seen).toBe(span);
  });

  it('should restore the outer span after a nested scope', () => {
    const outer = Span.startSpan('outer');
    const inner = Span.startSpan('inner', outer);

    withSpan(outer, () => {
      withSpan(inner, () => {
        expect(Span.current()).toBe(inner);
      });
      expect(Span.current()).toBe(outer);
    });
  });

  it('should keep concurrent scopes apart', async () => {
    const a = Span.startSpan('a');
    const b = Span.startSpan('b');

    const [seenA, seenB] = await Promise.all([
      withSpan(a, async () => {
        await delay(5);
        return Span.current();
      }),
      withSpan(b, async () => {
        await delay(1);
        return Span.current();
      }),
    ]);

    expect(seenA).toBe(a);
    expect(seenB).toBe(b);
  });

  it('should let a child pick up the current span as parent', () => {
    const parent = Span.startSpan('parent');

    const child = withSpan(parent, () => Span.startSpan('child', Span.current()));

    expect(child.context.traceId).toBe(parent.context.traceId);
  });
});
