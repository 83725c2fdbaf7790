import { describe, it, expect, vi } from 'vitest';
import {
  SampleRush,
  evaluateSample,
  summarizeSamples,
} from '../../src/core/sampling/sampleRush.js';
import type { SampleResult } from '../../src/core/sampling/sampleRush.js';
import { FdGenerator } from '../../src/core/sampling/generator.js';
import { fds } from '../helpers/attributes.js';

/** A clock that advances one millisecond per reading. */
function tickingClock(): () => number {
  let now = 0;
  return () => now++;
}

describe('evaluateSample', () => {
  it('classifies down the ladder', () => {
    expect(evaluateSample(3, fds(3, 'A->B, B->C'))).toEqual({
      bcnf: false,
      thirdNf: false,
      secondNf: true,
    });
  });

  it('implies the weaker forms from BCNF', () => {
    expect(evaluateSample(3, fds(3, 'A->BC'))).toEqual({ bcnf: true, thirdNf: true, secondNf: true });
  });
});

describe('SampleRush', () => {
  it('samples until the budget is spent', () => {
    const rush = new SampleRush(3, { seed: 4, now: tickingClock() });
    const results = rush.run({ budgetMs: 10 });
    expect(results).toHaveLength(3);
    expect(results.map((r) => r.elapsedMs)).toEqual([1, 1, 1]);
  });

  it('stops after the requested number of samples', () => {
    const rush = new SampleRush(4, { seed: 4, now: tickingClock() });
    expect(rush.run({ budgetMs: 1_000_000, maxSamples: 5 })).toHaveLength(5);
  });

  it('numbers samples across runs', () => {
    const rush = new SampleRush(3, { seed: 4, now: tickingClock() });
    rush.run({ budgetMs: 1_000, maxSamples: 2 });
    const second = rush.run({ budgetMs: 1_000, maxSamples: 2 });
    expect(second.map((r) => r.index)).toEqual([3, 4]);
    expect(rush.results).toHaveLength(4);
  });

  it('uses the dependency count distribution', () => {
    const rush = new SampleRush(4, {
      generator: new FdGenerator(4, { seed: 8 }),
      fdCount: { kind: 'fixed', count: 2 },
      now: tickingClock(),
    });
    const results = rush.run({ budgetMs: 1_000, maxSamples: 10 });
    expect(results.every((r) => r.dependencies.length === 2 && r.attributeCount === 4)).toBe(true);
  });

  it('reports each sample to the callback', () => {
    const onSample = vi.fn();
    const rush = new SampleRush(3, { seed: 4, now: tickingClock() });
    rush.run({ budgetMs: 1_000, maxSamples: 3, onSample });
    expect(onSample).toHaveBeenCalledTimes(3);
  });

  it('keeps the normal-form ladder on every sample', () => {
    const rush = new SampleRush(5, { seed: 21, now: tickingClock() });
    for (const r of rush.run({ budgetMs: 1_000_000, maxSamples: 200 })) {
      expect(!r.bcnf || r.thirdNf).toBe(true);
      expect(!r.thirdNf || r.secondNf).toBe(true);
    }
  });

  it('rejects an invalid count range', () => {
    expect(() => new SampleRush(3, { fdCount: { kind: 'uniform', min: 3, max: 1 } })).toThrow(
      RangeError,
    );
  });

  it('rejects a fractional or negative fixed count', () => {
    expect(() => new SampleRush(3, { fdCount: { kind: 'fixed', count: 1.5 } })).toThrow(
      'Invalid dependency count 1.5.',
    );
    expect(() => new SampleRush(3, { fdCount: { kind: 'fixed', count: -1 } })).toThrow(RangeError);
  });
});

describe('summarizeSamples', () => {
  it('counts samples per normal form and sums their time', () => {
    const base = { attributeCount: 2, dependencies: [] };
    const results: SampleResult[] = [
      { ...base, index: 1, bcnf: true, thirdNf: true, secondNf: true, elapsedMs: 1.5 },
      { ...base, index: 2, bcnf: false, thirdNf: true, secondNf: true, elapsedMs: 2 },
      { ...base, index: 3, bcnf: false, thirdNf: false, secondNf: false, elapsedMs: 0.5 },
    ];
    expect(summarizeSamples(results)).toEqual({
      samples: 3,
      bcnf: 1,
      thirdNf: 2,
      secondNf: 2,
      totalTimeMs: 4,
    });
  });
});
