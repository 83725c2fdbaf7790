import type { Finding } from '../../report/reportTypes.js';
import { isTrivial } from '../../dependencies/functionalDependency.js';
import { primeAttributes } from '../computeKeys.js';
import { formatAttributes } from './format.js';
import type { RelationContext } from './types.js';

/**
 * Check for 2NF violations.
 *
 * NF2_PARTIAL_DEPENDENCY: a non-prime attribute depends on a proper subset
 * of a candidate key. Reported once per dependent attribute.
 */
export function check2nf(context: RelationContext): readonly Finding[] {
  const { adapter, keys } = context;
  const findings: Finding[] = [];
  const prime = primeAttributes(adapter.size, keys);

  for (const fd of context.dependencies) {
    if (isTrivial(fd)) {
      continue;
    }

    const key = keys.find((k) => fd.lhs.isProperSubsetOf(k));
    if (key === undefined) {
      continue;
    }

    const determinant = adapter.fromAttributeSet(fd.lhs);
    const nonPrime = fd.rhs.difference(fd.lhs).difference(prime);
    for (const attribute of adapter.fromAttributeSet(nonPrime)) {
      findings.push({
        rule: 'NF2_PARTIAL_DEPENDENCY',
        severity: 'error',
        normalForm: '2NF',
        relation: context.name,
        attribute,
        dependency: { determinant, dependent: [attribute] },
        message: `FD ${formatAttributes(determinant)} → {${attribute}}: partial dependency. "${attribute}" depends on ${formatAttributes(determinant)}, a proper subset of candidate key ${formatAttributes(adapter.fromAttributeSet(key))}.`,
        fix: `Move "${attribute}" into a separate relation keyed by ${formatAttributes(determinant)}.`,
      });
    }
  }

  return findings;
}
