import { AttributeSet } from '../attributes/attributeSet.js';
import type { FunctionalDependency } from '../dependencies/functionalDependency.js';
import { dependency, dependencyKey } from '../dependencies/functionalDependency.js';
import { GenerationLimitError, InvalidLengthError } from '../errors.js';
import { XorShift32 } from './rng.js';

/**
 * How the attribute sets of a random dependency are drawn.
 *
 * - `uniform`: every subset equally likely.
 * - `binomial`: each attribute included independently with probability `p`.
 * - `realistic`: a small set; its size is uniform in `[1, maxSize]`
 *   (default: half the attributes, rounded up) and its members are uniform.
 * - `custom`: caller-supplied; the returned value is masked to the universe.
 */
export type Distribution =
  | { readonly kind: 'uniform' }
  | { readonly kind: 'binomial'; readonly p: number }
  | { readonly kind: 'realistic'; readonly maxSize?: number }
  | { readonly kind: 'custom'; readonly draw: (length: number, rng: XorShift32) => bigint };

type Sampler = (rng: XorShift32) => AttributeSet;

export interface FdGeneratorOptions {
  readonly lhs?: Distribution;
  readonly rhs?: Distribution;
  readonly seed?: number;
}

/** Attempts allowed per requested dependency before giving up on distinctness. */
const ATTEMPTS_PER_DEPENDENCY = 100;

/**
 * Generates random functional dependencies over `length` attributes.
 * Distributions are resolved once, when the generator is built.
 */
export class FdGenerator {
  readonly length: number;
  private readonly rng: XorShift32;
  private readonly drawLhs: Sampler;
  private readonly drawRhs: Sampler;

  constructor(length: number, options: FdGeneratorOptions = {}) {
    if (!Number.isInteger(length) || length < 0) {
      throw new InvalidLengthError(length);
    }
    this.length = length;
    this.rng = new XorShift32(options.seed ?? Math.floor(Math.random() * 0x100000000));
    this.drawLhs = resolveDistribution(length, options.lhs ?? { kind: 'uniform' });
    this.drawRhs = resolveDistribution(length, options.rhs ?? { kind: 'uniform' });
  }

  generateDependency(): FunctionalDependency {
    const lhs = this.drawLhs(this.rng);
    const rhs = this.drawRhs(this.rng);
    return dependency(lhs, rhs);
  }

  /** `count` structurally distinct dependencies. */
  generateDependencies(count: number): FunctionalDependency[] {
    const available = 1n << BigInt(2 * this.length);
    if (BigInt(count) > available) {
      throw new GenerationLimitError(count, Number(available));
    }

    const byKey = new Map<string, FunctionalDependency>();
    const maxAttempts = (count + 1) * ATTEMPTS_PER_DEPENDENCY;
    for (let attempt = 0; byKey.size < count; attempt++) {
      if (attempt >= maxAttempts) {
        throw new GenerationLimitError(count, byKey.size);
      }
      const fd = this.generateDependency();
      byKey.set(dependencyKey(fd), fd);
    }
    return [...byKey.values()];
  }
}

function resolveDistribution(length: number, distribution: Distribution): Sampler {
  switch (distribution.kind) {
    case 'uniform':
      return (rng) => new AttributeSet(length, rng.nextBits(length));
    case 'binomial': {
      const { p } = distribution;
      if (!(p >= 0 && p <= 1)) {
        throw new RangeError(`Binomial probability must be within [0, 1], got ${String(p)}.`);
      }
      return (rng) => {
        const positions: number[] = [];
        for (let i = 0; i < length; i++) {
          if (rng.nextFloat01() < p) positions.push(i);
        }
        return AttributeSet.of(length, positions);
      };
    }
    case 'realistic': {
      const maxSize = Math.min(length, distribution.maxSize ?? Math.ceil(length / 2));
      if (maxSize < 1) {
        return () => AttributeSet.empty(length);
      }
      return (rng) => AttributeSet.of(length, pickPositions(rng, length, rng.nextInt(1, maxSize)));
    }
    case 'custom': {
      const { draw } = distribution;
      return (rng) => new AttributeSet(length, draw(length, rng));
    }
  }
}

/** `size` distinct positions out of `length`, by a partial Fisher-Yates shuffle. */
function pickPositions(rng: XorShift32, length: number, size: number): number[] {
  const pool = Array.from({ length }, (_, i) => i);
  for (let i = 0; i < size; i++) {
    const j = rng.nextInt(i, length - 1);
    const picked = pool[j];
    const current = pool[i];
    if (picked !== undefined && current !== undefined) {
      pool[i] = picked;
      pool[j] = current;
    }
  }
  return pool.slice(0, size);
}
