import type { AttributeSet } from '../attributes/attributeSet.js';
import type { FunctionalDependency } from '../dependencies/functionalDependency.js';
import { dependencyKey } from '../dependencies/functionalDependency.js';

/**
 * Compute the attribute closure X+ of a set of attributes under given FDs.
 *
 * Repeatedly scans the dependencies and adds the right-hand side of every
 * dependency whose left-hand side is already contained in the closure, until
 * a full scan adds nothing. Dependencies structurally equal to one in
 * `exclude` are skipped, which answers "what would X+ be without this FD"
 * without building a new list.
 */
export function attributeClosure(
  attributes: AttributeSet,
  fds: readonly FunctionalDependency[],
  exclude: readonly FunctionalDependency[] = [],
): AttributeSet {
  const excluded = new Set(exclude.map(dependencyKey));
  const active = excluded.size > 0 ? fds.filter((fd) => !excluded.has(dependencyKey(fd))) : fds;

  let closure = attributes;
  let changed = true;
  while (changed) {
    changed = false;
    for (const fd of active) {
      if (fd.lhs.isSubsetOf(closure) && !fd.rhs.isSubsetOf(closure)) {
        closure = closure.or(fd.rhs);
        changed = true;
      }
    }
  }

  return closure;
}

/**
 * Check if a set of attributes is a superkey.
 * A superkey determines all attributes of the relation.
 */
export function isSuperkey(
  attributes: AttributeSet,
  fds: readonly FunctionalDependency[],
): boolean {
  return attributeClosure(attributes, fds).isFull();
}

/** Whether `fd` follows from `fds` by Armstrong's axioms. */
export function implies(
  fds: readonly FunctionalDependency[],
  fd: FunctionalDependency,
): boolean {
  return fd.rhs.isSubsetOf(attributeClosure(fd.lhs, fds));
}

/** Two dependency sets are equivalent when each implies every dependency of the other. */
export function areEquivalent(
  a: readonly FunctionalDependency[],
  b: readonly FunctionalDependency[],
): boolean {
  return b.every((fd) => implies(a, fd)) && a.every((fd) => implies(b, fd));
}
