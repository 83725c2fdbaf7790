import { AttributeSet } from '../attributes/attributeSet.js';
import type { DependencySlot, FunctionalDependency } from '../dependencies/functionalDependency.js';
import {
  canonicalDependencies,
  compareDependencies,
  dedupeDependencies,
  dependency,
  dependencyKey,
  dependencySetKey,
  isDependencySubset,
  isTrivial,
  presentDependencies,
  presentSlot,
} from '../dependencies/functionalDependency.js';
import { attributeClosure } from './closure.js';
import { attributeCombinations } from './computeKeys.js';
import { sigmaPlusLimited } from './sigmaPlus.js';

const REMOVED: DependencySlot = { kind: 'removed' };

/**
 * Split every dependency into one dependency per right-hand-side attribute.
 * `A → BC` becomes `A → B`, `A → C`.
 */
export function decompose(fds: readonly FunctionalDependency[]): FunctionalDependency[] {
  const result: FunctionalDependency[] = [];
  for (const fd of fds) {
    for (const position of fd.rhs.indices()) {
      result.push(dependency(fd.lhs, AttributeSet.of(fd.rhs.length, [position])));
    }
  }
  return result;
}

export function dropTrivial(fds: readonly FunctionalDependency[]): FunctionalDependency[] {
  return fds.filter((fd) => !isTrivial(fd));
}

/**
 * Remove extraneous left-hand-side attributes, one dependency at a time.
 *
 * Reductions are written back into the working list immediately, so later
 * tests run against the already reduced dependencies.
 */
export function minimizeLeft(fds: readonly FunctionalDependency[]): FunctionalDependency[] {
  const working = [...fds];

  for (let index = 0; index < working.length; index++) {
    const current = working[index];
    if (current === undefined || current.lhs.popCount() <= 1) {
      continue;
    }

    let lhs = current.lhs;
    for (const position of current.lhs.indices()) {
      const reduced = lhs.set(position, false);
      if (current.rhs.isSubsetOf(attributeClosure(reduced, working))) {
        lhs = reduced;
        working[index] = dependency(lhs, current.rhs);
      }
    }
  }

  return dedupeDependencies(working);
}

/**
 * Every left-reduced variant of the dependency set.
 *
 * Each variant is processed position by position. When a left-hand side has
 * several incomparable minimal replacements, the whole variant is copied
 * once per replacement, because later positions are tested against the
 * reductions already made in that variant.
 */
export function minimizeLeftAll(
  fds: readonly FunctionalDependency[],
): FunctionalDependency[][] {
  const base = dropTrivial(fds);
  let variants: (readonly FunctionalDependency[])[] = [base];

  for (let index = 0; index < base.length; index++) {
    const next: (readonly FunctionalDependency[])[] = [];
    const seen = new Set<string>();

    for (const variant of variants) {
      const current = variant[index];
      if (current === undefined) {
        next.push(variant);
        continue;
      }

      const replacements =
        current.lhs.popCount() <= 1 ? [current.lhs] : minimalDeterminants(current, variant);

      for (const lhs of replacements) {
        const forked = lhs.equals(current.lhs)
          ? variant
          : replaceAt(variant, index, dependency(lhs, current.rhs));
        // Identical sequences have identical futures; keep one.
        const key = forked.map(dependencyKey).join(',');
        if (!seen.has(key)) {
          seen.add(key);
          next.push(forked);
        }
      }
    }

    variants = next;
  }

  return uniqueDependencySets(variants.map(canonicalDependencies));
}

/**
 * Drop dependencies implied by the remaining ones.
 * Trivial and duplicate dependencies are removed first.
 */
export function minimizeRight(fds: readonly FunctionalDependency[]): FunctionalDependency[] {
  const slots = dedupeDependencies(dropTrivial(fds)).map(presentSlot);

  for (let index = 0; index < slots.length; index++) {
    const slot = slots[index];
    if (slot === undefined || slot.kind === 'removed') {
      continue;
    }
    if (isRedundant(slot.dependency, presentDependencies(slots))) {
      slots[index] = REMOVED;
    }
  }

  return presentDependencies(slots);
}

/**
 * Every non-redundant subset of the dependency set that is equivalent to it.
 *
 * Each droppable position branches into a "drop" and a "keep" variant. A
 * "keep" branch can leave a dependency that becomes redundant once later
 * ones are dropped, and branches overlap as sets, so the raw variants are
 * reduced to those that are subset-minimal and free of redundant members.
 * Results are ordered by size.
 */
export function minimizeRightAll(
  fds: readonly FunctionalDependency[],
): FunctionalDependency[][] {
  const base = dedupeDependencies(dropTrivial(fds));
  let variants: (readonly DependencySlot[])[] = [base.map(presentSlot)];

  base.forEach((fd, index) => {
    const next: (readonly DependencySlot[])[] = [];
    for (const variant of variants) {
      if (isRedundant(fd, presentDependencies(variant))) {
        next.push(replaceAt(variant, index, REMOVED));
      }
      next.push(variant);
    }
    variants = next;
  });

  const covers = uniqueDependencySets(
    variants.map((variant) => canonicalDependencies(presentDependencies(variant))),
  ).sort((a, b) => a.length - b.length);

  const minimal: FunctionalDependency[][] = [];
  for (const cover of covers) {
    if (minimal.some((kept) => isDependencySubset(kept, cover))) {
      continue;
    }
    if (cover.some((fd) => isRedundant(fd, cover))) {
      continue;
    }
    minimal.push(cover);
  }
  return minimal;
}

/** A single minimal cover, in canonical order. */
export function minimalCover(fds: readonly FunctionalDependency[]): FunctionalDependency[] {
  const prepared = dropTrivial(decompose(fds));
  return canonicalDependencies(minimizeRight(minimizeLeft(prepared)));
}

/**
 * Every minimal cover of the given dependency set.
 * Each cover is in canonical order; covers are ordered by size, then
 * dependency by dependency.
 */
export function allMinimalCovers(
  fds: readonly FunctionalDependency[],
): FunctionalDependency[][] {
  const prepared = dropTrivial(decompose(fds));
  const covers = minimizeLeftAll(prepared).flatMap((variant) => minimizeRightAll(variant));
  return uniqueDependencySets(covers).sort(compareDependencyLists);
}

/**
 * Every minimal cover of the implication closure of the dependency set,
 * rather than of the literal input.
 */
export function allMinimalCoversOfClosure(
  length: number,
  fds: readonly FunctionalDependency[],
): FunctionalDependency[][] {
  const prepared = dropTrivial(decompose(fds));
  return allMinimalCovers(sigmaPlusLimited(length, prepared));
}

/** Merge dependencies sharing a left-hand side: `A → B`, `A → C` becomes `A → BC`. */
export function compact(fds: readonly FunctionalDependency[]): FunctionalDependency[] {
  const merged = new Map<string, FunctionalDependency>();
  for (const fd of fds) {
    const key = fd.lhs.key();
    const existing = merged.get(key);
    merged.set(key, existing === undefined ? fd : dependency(fd.lhs, existing.rhs.or(fd.rhs)));
  }
  return [...merged.values()];
}

/** Compare canonical dependency lists by size, then element by element. */
export function compareDependencyLists(
  a: readonly FunctionalDependency[],
  b: readonly FunctionalDependency[],
): number {
  if (a.length !== b.length) {
    return a.length - b.length;
  }
  for (let i = 0; i < a.length; i++) {
    const left = a[i];
    const right = b[i];
    if (left !== undefined && right !== undefined) {
      const order = compareDependencies(left, right);
      if (order !== 0) return order;
    }
  }
  return 0;
}

function isRedundant(fd: FunctionalDependency, fds: readonly FunctionalDependency[]): boolean {
  return fd.rhs.isSubsetOf(attributeClosure(fd.lhs, fds, [fd]));
}

/**
 * All minimal subsets of `target.lhs` that still determine `target.rhs`
 * under `fds`. Subsets are tried by increasing size; a subset containing a
 * replacement already found cannot be minimal and is skipped.
 */
function minimalDeterminants(
  target: FunctionalDependency,
  fds: readonly FunctionalDependency[],
): AttributeSet[] {
  const positions = target.lhs.indices();
  const foundLocal: AttributeSet[] = [];
  const found: AttributeSet[] = [];

  for (let size = 0; size <= positions.length; size++) {
    for (const local of attributeCombinations(positions.length, size, foundLocal)) {
      const candidate = liftSubset(local, positions, target.lhs.length);
      if (target.rhs.isSubsetOf(attributeClosure(candidate, fds))) {
        foundLocal.push(local);
        found.push(candidate);
      }
    }
  }

  return found;
}

/** Map a subset over `positions.length` local bits back onto the full universe. */
function liftSubset(
  local: AttributeSet,
  positions: readonly number[],
  length: number,
): AttributeSet {
  const picked: number[] = [];
  for (const i of local.indices()) {
    const position = positions[i];
    if (position !== undefined) {
      picked.push(position);
    }
  }
  return AttributeSet.of(length, picked);
}

function replaceAt<T>(items: readonly T[], index: number, item: T): T[] {
  const copy = [...items];
  copy[index] = item;
  return copy;
}

function uniqueDependencySets(sets: readonly FunctionalDependency[][]): FunctionalDependency[][] {
  const seen = new Set<string>();
  const result: FunctionalDependency[][] = [];
  for (const set of sets) {
    const key = dependencySetKey(set);
    if (!seen.has(key)) {
      seen.add(key);
      result.push(set);
    }
  }
  return result;
}
