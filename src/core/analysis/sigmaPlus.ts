import type { AttributeSet } from '../attributes/attributeSet.js';
import type { FunctionalDependency } from '../dependencies/functionalDependency.js';
import { assertUniverse, dependency, isTrivial } from '../dependencies/functionalDependency.js';
import { attributeClosure } from './closure.js';
import { attributeCombinations } from './computeKeys.js';

/**
 * The reduced generating set of the implication closure: one dependency
 * `X → X+` per attribute subset `X`, in order of increasing size.
 *
 * Subsets containing an already discovered key are not visited, since every
 * dependency they carry follows from the key's own `K → all`.
 */
export function sigmaPlusLimited(
  length: number,
  fds: readonly FunctionalDependency[],
): FunctionalDependency[] {
  assertUniverse(length, fds);

  const nonTrivial = fds.filter((fd) => !isTrivial(fd));
  const keys: AttributeSet[] = [];
  const result: FunctionalDependency[] = [];

  for (let size = 0; size <= length; size++) {
    for (const subset of attributeCombinations(length, size, keys)) {
      const closure = attributeClosure(subset, nonTrivial);
      if (closure.isFull()) {
        keys.push(subset);
      }
      result.push(dependency(subset, closure));
    }
  }

  return result;
}
