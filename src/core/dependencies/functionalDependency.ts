import { AttributeSet } from '../attributes/attributeSet.js';
import { LengthMismatchError } from '../errors.js';

/** A functional dependency `lhs → rhs` over a fixed attribute universe. */
export interface FunctionalDependency {
  readonly lhs: AttributeSet;
  readonly rhs: AttributeSet;
}

/**
 * An entry of a working dependency list. Removing a dependency marks its slot
 * instead of shifting later entries, so positions stay stable for the rest of
 * a pass.
 */
export type DependencySlot =
  | { readonly kind: 'present'; readonly dependency: FunctionalDependency }
  | { readonly kind: 'removed' };

export function dependency(lhs: AttributeSet, rhs: AttributeSet): FunctionalDependency {
  if (lhs.length !== rhs.length) {
    throw new LengthMismatchError(lhs.length, rhs.length);
  }
  return { lhs, rhs };
}

/** Shorthand for building a dependency from raw bit values. */
export function dependencyOf(
  length: number,
  lhs: bigint | number,
  rhs: bigint | number,
): FunctionalDependency {
  return dependency(new AttributeSet(length, lhs), new AttributeSet(length, rhs));
}

/** A dependency is trivial when its right-hand side is contained in its left-hand side. */
export function isTrivial(fd: FunctionalDependency): boolean {
  return fd.rhs.isSubsetOf(fd.lhs);
}

export function dependencyKey(fd: FunctionalDependency): string {
  return `${fd.lhs.key()}:${fd.rhs.key()}`;
}

export function dependencyEquals(a: FunctionalDependency, b: FunctionalDependency): boolean {
  return a.lhs.equals(b.lhs) && a.rhs.equals(b.rhs);
}

/** Canonical order: left-hand side value, then right-hand side value. */
export function compareDependencies(a: FunctionalDependency, b: FunctionalDependency): number {
  return a.lhs.compare(b.lhs) || a.rhs.compare(b.rhs);
}

/** Remove structural duplicates, keeping the first occurrence of each. */
export function dedupeDependencies(
  fds: readonly FunctionalDependency[],
): FunctionalDependency[] {
  const seen = new Set<string>();
  const result: FunctionalDependency[] = [];
  for (const fd of fds) {
    const key = dependencyKey(fd);
    if (!seen.has(key)) {
      seen.add(key);
      result.push(fd);
    }
  }
  return result;
}

export function sortDependencies(fds: readonly FunctionalDependency[]): FunctionalDependency[] {
  return [...fds].sort(compareDependencies);
}

/** De-duplicated and in canonical order. */
export function canonicalDependencies(
  fds: readonly FunctionalDependency[],
): FunctionalDependency[] {
  return sortDependencies(dedupeDependencies(fds));
}

/** Key identifying a dependency set regardless of order or repetition. */
export function dependencySetKey(fds: readonly FunctionalDependency[]): string {
  return canonicalDependencies(fds).map(dependencyKey).join(',');
}

/** Whether every dependency of `a` also appears in `b`, compared as sets. */
export function isDependencySubset(
  a: readonly FunctionalDependency[],
  b: readonly FunctionalDependency[],
): boolean {
  const keys = new Set(b.map(dependencyKey));
  return a.every((fd) => keys.has(dependencyKey(fd)));
}

export function sameDependencySet(
  a: readonly FunctionalDependency[],
  b: readonly FunctionalDependency[],
): boolean {
  return isDependencySubset(a, b) && isDependencySubset(b, a);
}

/** Throw unless every dependency is over exactly `length` attributes. */
export function assertUniverse(length: number, fds: readonly FunctionalDependency[]): void {
  for (const fd of fds) {
    if (fd.lhs.length !== length) {
      throw new LengthMismatchError(length, fd.lhs.length);
    }
    if (fd.rhs.length !== length) {
      throw new LengthMismatchError(length, fd.rhs.length);
    }
  }
}

export function presentSlot(fd: FunctionalDependency): DependencySlot {
  return { kind: 'present', dependency: fd };
}

/** Dependencies of the slots that have not been removed, in slot order. */
export function presentDependencies(slots: readonly DependencySlot[]): FunctionalDependency[] {
  const result: FunctionalDependency[] = [];
  for (const slot of slots) {
    if (slot.kind === 'present') {
      result.push(slot.dependency);
    }
  }
  return result;
}
