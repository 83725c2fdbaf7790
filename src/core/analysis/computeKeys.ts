import { AttributeSet } from '../attributes/attributeSet.js';
import type { FunctionalDependency } from '../dependencies/functionalDependency.js';
import { assertUniverse, isTrivial } from '../dependencies/functionalDependency.js';
import { isSuperkey } from './closure.js';

/**
 * All `size`-element subsets of an `length`-attribute universe, in ascending
 * lexicographic order of their bit positions. Subsets that contain any set
 * of `exclude` are left out.
 */
export function attributeCombinations(
  length: number,
  size: number,
  exclude: readonly AttributeSet[] = [],
): AttributeSet[] {
  const result: AttributeSet[] = [];
  if (size < 0 || size > length) {
    return result;
  }

  const positions = Array.from({ length: size }, (_, i) => i);
  for (;;) {
    const subset = AttributeSet.of(length, positions);
    if (!exclude.some((known) => known.isSubsetOf(subset))) {
      result.push(subset);
    }

    // Advance to the next combination: bump the rightmost position that
    // still has room, then reset everything after it.
    let i = size - 1;
    while (i >= 0 && positions[i] === length - size + i) {
      i--;
    }
    if (i < 0) {
      return result;
    }
    positions[i] = (positions[i] ?? 0) + 1;
    for (let j = i + 1; j < size; j++) {
      positions[j] = (positions[j - 1] ?? 0) + 1;
    }
  }
}

/**
 * Compute every candidate key (minimal superkey) of a relation over `length`
 * attributes.
 *
 * Subsets are tried by increasing size, and supersets of keys already found
 * are never tested, so each recorded superkey is minimal. Keys are returned
 * in discovery order: by size, then lexicographically.
 */
export function candidateKeys(
  length: number,
  fds: readonly FunctionalDependency[],
): readonly AttributeSet[] {
  assertUniverse(length, fds);

  const nonTrivial = fds.filter((fd) => !isTrivial(fd));
  if (nonTrivial.length === 0) {
    return [AttributeSet.full(length)];
  }

  const keys: AttributeSet[] = [];
  for (let size = 0; size <= length; size++) {
    for (const subset of attributeCombinations(length, size, keys)) {
      if (isSuperkey(subset, nonTrivial)) {
        keys.push(subset);
      }
    }
  }
  return keys;
}

/** Attributes belonging to at least one candidate key. */
export function primeAttributes(
  length: number,
  keys: readonly AttributeSet[],
): AttributeSet {
  return keys.reduce((prime, key) => prime.or(key), AttributeSet.empty(length));
}
