import type { AttributeSet } from '../../attributes/attributeSet.js';
import type { FunctionalDependency } from '../../dependencies/functionalDependency.js';
import { assertUniverse, isTrivial } from '../../dependencies/functionalDependency.js';
import type { NormalFormLevel } from '../../report/reportTypes.js';
import { isSuperkey } from '../closure.js';
import { candidateKeys, primeAttributes } from '../computeKeys.js';

/**
 * BCNF: the determinant of every non-trivial dependency is a superkey.
 */
export function isBcnf(length: number, fds: readonly FunctionalDependency[]): boolean {
  assertUniverse(length, fds);
  return fds.every((fd) => isTrivial(fd) || isSuperkey(fd.lhs, fds));
}

/**
 * 3NF: for every non-trivial `X → Y`, either X contains a candidate key or
 * every attribute of `Y \ X` is prime.
 */
export function is3nf(
  length: number,
  fds: readonly FunctionalDependency[],
  keys: readonly AttributeSet[] = candidateKeys(length, fds),
): boolean {
  const prime = primeAttributes(length, keys);
  return fds.every(
    (fd) =>
      isTrivial(fd) ||
      fd.rhs.difference(fd.lhs).isSubsetOf(prime) ||
      containsKey(fd.lhs, keys),
  );
}

/**
 * 2NF: no non-prime attribute depends on a proper subset of a candidate key.
 */
export function is2nf(
  length: number,
  fds: readonly FunctionalDependency[],
  keys: readonly AttributeSet[] = candidateKeys(length, fds),
): boolean {
  const prime = primeAttributes(length, keys);
  return fds.every(
    (fd) =>
      isTrivial(fd) ||
      fd.rhs.difference(fd.lhs).isSubsetOf(prime) ||
      !isPartialOfKey(fd.lhs, keys),
  );
}

/** Whether `attributes` contains some candidate key, i.e. is a superkey. */
export function containsKey(attributes: AttributeSet, keys: readonly AttributeSet[]): boolean {
  return keys.some((key) => key.isSubsetOf(attributes));
}

/** Whether `attributes` is a proper subset of some candidate key. */
export function isPartialOfKey(attributes: AttributeSet, keys: readonly AttributeSet[]): boolean {
  return keys.some((key) => attributes.isProperSubsetOf(key));
}

/**
 * Normal-form classification of one relation. Candidate keys are computed
 * once, on first use, and shared by the 3NF and 2NF checks.
 */
export class NormalFormClassifier {
  readonly length: number;
  readonly dependencies: readonly FunctionalDependency[];
  private keys: readonly AttributeSet[] | undefined;

  constructor(length: number, fds: readonly FunctionalDependency[]) {
    assertUniverse(length, fds);
    this.length = length;
    this.dependencies = fds;
  }

  candidateKeys(): readonly AttributeSet[] {
    this.keys ??= candidateKeys(this.length, this.dependencies);
    return this.keys;
  }

  primeAttributes(): AttributeSet {
    return primeAttributes(this.length, this.candidateKeys());
  }

  isBcnf(): boolean {
    return isBcnf(this.length, this.dependencies);
  }

  is3nf(): boolean {
    return is3nf(this.length, this.dependencies, this.candidateKeys());
  }

  is2nf(): boolean {
    return is2nf(this.length, this.dependencies, this.candidateKeys());
  }

  /** The strongest normal form that holds, checked from BCNF downwards. */
  highestNormalForm(): NormalFormLevel {
    if (this.isBcnf()) return 'BCNF';
    if (this.is3nf()) return '3NF';
    if (this.is2nf()) return '2NF';
    return '1NF';
  }
}
