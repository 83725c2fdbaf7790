import { performance } from 'node:perf_hooks';
import type { FunctionalDependency } from '../dependencies/functionalDependency.js';
import { isBcnf, is2nf, is3nf } from '../analysis/normalizeChecks/normalForms.js';
import { FdGenerator } from './generator.js';
import { XorShift32 } from './rng.js';

/** How many dependencies each sample holds. */
export type FdCountDistribution =
  | { readonly kind: 'uniform'; readonly min: number; readonly max: number }
  | { readonly kind: 'fixed'; readonly count: number }
  | { readonly kind: 'custom'; readonly draw: (rng: XorShift32) => number };

export interface SampleRushOptions {
  readonly generator?: FdGenerator;
  readonly fdCount?: FdCountDistribution;
  readonly seed?: number;
  /** Millisecond clock; defaults to `performance.now`. */
  readonly now?: () => number;
}

export interface SampleRunOptions {
  readonly budgetMs: number;
  readonly maxSamples?: number;
  readonly onSample?: (result: SampleResult) => void;
}

/** Classification of one random dependency set. */
export interface SampleResult {
  readonly index: number;
  readonly attributeCount: number;
  readonly dependencies: readonly FunctionalDependency[];
  readonly bcnf: boolean;
  readonly thirdNf: boolean;
  readonly secondNf: boolean;
  readonly elapsedMs: number;
}

export interface SampleSummary {
  readonly samples: number;
  readonly bcnf: number;
  readonly thirdNf: number;
  readonly secondNf: number;
  readonly totalTimeMs: number;
}

/**
 * Classify a dependency set down the normal-form ladder. A weaker form is
 * only checked when the stronger one fails.
 */
export function evaluateSample(
  length: number,
  fds: readonly FunctionalDependency[],
): { bcnf: boolean; thirdNf: boolean; secondNf: boolean } {
  const bcnf = isBcnf(length, fds);
  const thirdNf = bcnf || is3nf(length, fds);
  const secondNf = thirdNf || is2nf(length, fds);
  return { bcnf, thirdNf, secondNf };
}

/**
 * Repeatedly generates random dependency sets over `length` attributes and
 * classifies each one, until a wall-clock budget is spent.
 */
export class SampleRush {
  readonly length: number;
  private readonly generator: FdGenerator;
  private readonly drawCount: (rng: XorShift32) => number;
  private readonly rng: XorShift32;
  private readonly now: () => number;
  private readonly collected: SampleResult[] = [];

  constructor(length: number, options: SampleRushOptions = {}) {
    this.length = length;
    this.generator = options.generator ?? new FdGenerator(length, seedOption(options.seed));
    this.drawCount = resolveCount(options.fdCount ?? { kind: 'uniform', min: 0, max: length });
    // Offset so counts do not replay the generator's own stream.
    this.rng = new XorShift32((options.seed ?? Math.floor(Math.random() * 0x100000000)) + 1);
    this.now = options.now ?? (() => performance.now());
  }

  get results(): readonly SampleResult[] {
    return this.collected;
  }

  /** Run samples until `budgetMs` has elapsed or `maxSamples` were taken. Returns this run's samples. */
  run(options: SampleRunOptions): readonly SampleResult[] {
    const start = this.now();
    const produced: SampleResult[] = [];

    while (this.now() - start < options.budgetMs) {
      if (options.maxSamples !== undefined && produced.length >= options.maxSamples) {
        break;
      }

      const count = this.drawCount(this.rng);
      const fds = this.generator.generateDependencies(count);

      const sampleStart = this.now();
      const classification = evaluateSample(this.length, fds);
      const result: SampleResult = {
        index: this.collected.length + 1,
        attributeCount: this.length,
        dependencies: fds,
        ...classification,
        elapsedMs: this.now() - sampleStart,
      };

      this.collected.push(result);
      produced.push(result);
      options.onSample?.(result);
    }

    return produced;
  }
}

export function summarizeSamples(results: readonly SampleResult[]): SampleSummary {
  return {
    samples: results.length,
    bcnf: results.filter((r) => r.bcnf).length,
    thirdNf: results.filter((r) => r.thirdNf).length,
    secondNf: results.filter((r) => r.secondNf).length,
    totalTimeMs: results.reduce((total, r) => total + r.elapsedMs, 0),
  };
}

function seedOption(seed: number | undefined): { seed?: number } {
  return seed === undefined ? {} : { seed };
}

function resolveCount(distribution: FdCountDistribution): (rng: XorShift32) => number {
  switch (distribution.kind) {
    case 'uniform': {
      const { min, max } = distribution;
      if (!Number.isInteger(min) || !Number.isInteger(max) || min < 0 || max < min) {
        throw new RangeError(`Invalid dependency count range [${String(min)}, ${String(max)}].`);
      }
      return (rng) => rng.nextInt(min, max);
    }
    case 'fixed': {
      const { count } = distribution;
      if (!Number.isInteger(count) || count < 0) {
        throw new RangeError(`Invalid dependency count ${String(count)}.`);
      }
      return () => count;
    }
    case 'custom':
      return distribution.draw;
  }
}
