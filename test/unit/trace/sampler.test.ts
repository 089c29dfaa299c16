import { describe, it, expect } from 'vitest';
import {
  AlwaysSampler,
  NeverSampler,
  ProbabilitySampler,
  createSampler,
  type SamplingParams,
} from '../../../src/trace/sampler.js';

function params(traceId: string, parentSampled = false): SamplingParams {
  return {
    traceId,
    spanId: '00f067aa0ba902b7',
    name: 'op',
    parentSampled,
    hasRemoteParent: false,
    links: [],
  };
}

// Low 64 bits are the last 16 hex digits of the trace id.
const LOW_TRACE = '0000000000000000' + '0000000000000001';
const MID_TRACE = '0000000000000000' + '7fffffffffffffff';
const HIGH_TRACE = '0000000000000000' + 'ffffffffffffffff';

describe('AlwaysSampler and NeverSampler', () => {
  it('should always and never sample', () => {
    expect(new AlwaysSampler().shouldSample()).toBe(true);
    expect(new NeverSampler().shouldSample()).toBe(false);
  });
});

describe('ProbabilitySampler', () => {
  it('should clamp the probability into [0, 1]', () => {
    expect(new ProbabilitySampler(-1).probability).toBe(0);
    expect(new ProbabilitySampler(2).probability).toBe(1);
    expect(new ProbabilitySampler(Number.NaN).probability).toBe(0);
  });

  it('should never sample at probability 0', () => {
    const sampler = new ProbabilitySampler(0);
    expect(sampler.shouldSample(params(LOW_TRACE))).toBe(false);
  });

  it('should always sample at probability 1', () => {
    const sampler = new ProbabilitySampler(1);
    expect(sampler.shouldSample(params(HIGH_TRACE))).toBe(true);
  });

  it('should compare the low 64 bits of the trace id with the threshold', () => {
    const sampler = new ProbabilitySampler(0.5);

    expect(sampler.shouldSample(params(LOW_TRACE))).toBe(true);
    expect(sampler.shouldSample(params(MID_TRACE))).toBe(true);
    expect(sampler.shouldSample(params('0000000000000000' + '8000000000000000'))).toBe(false);
    expect(sampler.shouldSample(params(HIGH_TRACE))).toBe(false);
  });

  it('should ignore the high 64 bits', () => {
    const sampler = new ProbabilitySampler(0.5);
    expect(sampler.shouldSample(params('ffffffffffffffff' + '0000000000000001'))).toBe(true);
  });

  it('should decide the same way for the same trace id', () => {
    const sampler = new ProbabilitySampler(0.3);
    const traceId = '4bf92f3577b34da6a3ce929d0e0e4736';
    const first = sampler.shouldSample(params(traceId));

    for (let i = 0; i < 10; i++) {
      expect(sampler.shouldSample(params(traceId))).toBe(first);
    }
  });

  it('should sample when the parent is sampled', () => {
    const sampler = new ProbabilitySampler(0);
    expect(sampler.shouldSample(params(HIGH_TRACE, true))).toBe(true);
  });

  it('should not sample malformed trace ids on probability alone', () => {
    const sampler = new ProbabilitySampler(0.99);
    expect(sampler.shouldSample(params('not-a-trace-id'))).toBe(false);
  });

  it('should describe itself', () => {
    expect(String(new ProbabilitySampler(0.25))).toBe('ProbabilitySampler{0.25}');
  });
});

describe('createSampler', () => {
  it('should build each kind', () => {
    expect(createSampler('always')).toBeInstanceOf(AlwaysSampler);
    expect(createSampler('never')).toBeInstanceOf(NeverSampler);

    const sampler = createSampler('probability', 0.5);
    expect(sampler).toBeInstanceOf(ProbabilitySampler);
    expect(String(sampler)).toBe('ProbabilitySampler{0.5}');
  });
});
