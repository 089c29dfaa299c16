import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryRunningSpanStore, selectSpans, summarize } from '../../../src/export/running-span-store.js';
import { SpanImpl } from '../../../src/trace/span-impl.js';
import { SpanContext } from '../../../src/trace/span-context.js';
import { AlwaysSampler } from '../../../src/trace/sampler.js';
import { generateSpanId, generateTraceId } from '../../../src/trace/ids.js';
import type { TraceParams } from '../../../src/trace/trace-params.js';

const params: TraceParams = {
  maxAttributes: 4,
  maxAnnotations: 4,
  maxMessageEvents: 4,
  maxLinks: 4,
  sampler: new AlwaysSampler(),
};

function record(name: string): SpanImpl {
  const context = new SpanContext({ traceId: generateTraceId(), spanId: generateSpanId(), traceOptions: 1 });
  return new SpanImpl({ name, context, params });
}

describe('InMemoryRunningSpanStore', () => {
  let store: InMemoryRunningSpanStore;

  beforeEach(() => {
    store = new InMemoryRunningSpanStore();
  });

  it('should track spans between start and end', () => {
    const a = record('a');
    const b = record('b');

    store.onStart(a);
    store.onStart(b);
    expect(store.size).toBe(2);
    expect(store.has(a)).toBe(true);

    store.onEnd(a);
    expect(store.size).toBe(1);
    expect(store.has(a)).toBe(false);
    expect(store.has(b)).toBe(true);
  });

  it('should ignore an end for a span it never saw', () => {
    store.onEnd(record('stranger'));
    expect(store.size).toBe(0);
  });

  it('should return live snapshots in start order', () => {
    const first = record('first');
    const second = record('second');
    store.onStart(first);
    store.onStart(second);

    first.addAttributes({ step: 1 });

    const spans = store.getRunningSpans();
    expect(spans.map((span) => span.name)).toEqual(['first', 'second']);
    expect(spans[0]?.attributes.get('step')).toEqual({ type: 'int', value: 1n });
    expect(spans[0]?.hasEnded).toBe(false);
  });

  it('should filter by name and limit the count', () => {
    store.onStart(record('db'));
    store.onStart(record('http'));
    store.onStart(record('db'));
    store.onStart(record('db'));

    expect(store.getRunningSpans({ name: 'db' })).toHaveLength(3);
    expect(store.getRunningSpans({ name: 'db', maxSpans: 2 })).toHaveLength(2);
    expect(store.getRunningSpans({ name: 'missing' })).toEqual([]);
  });

  it('should count running spans by name', () => {
    store.onStart(record('db'));
    store.onStart(record('http'));
    store.onStart(record('db'));

    expect(store.getSummary()).toEqual({ db: 2, http: 1 });
  });

  it('should forget every span on clear', () => {
    store.onStart(record('a'));
    store.clear();
    expect(store.size).toBe(0);
    expect(store.getSummary()).toEqual({});
  });
});

describe('selectSpans', () => {
  it('should treat a negative limit as zero', () => {
    const spans = [record('a').toSpanData(), record('b').toSpanData()];
    expect(selectSpans(spans, { maxSpans: -1 })).toEqual([]);
    expect(selectSpans(spans, {})).toEqual(spans);
  });
});

describe('summarize', () => {
  it('should count names', () => {
    expect(summarize(['x', 'y', 'x'])).toEqual({ x: 2, y: 1 });
    expect(summarize([])).toEqual({});
  });
});
