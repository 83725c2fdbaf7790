import type { Finding } from '../../report/reportTypes.js';
import { isTrivial } from '../../dependencies/functionalDependency.js';
import { primeAttributes } from '../computeKeys.js';
import { formatAttributes } from './format.js';
import { containsKey, isPartialOfKey } from './normalForms.js';
import type { RelationContext } from './types.js';

/**
 * Check for 3NF and BCNF violations.
 *
 * 3NF violation: X → A where X is not a superkey AND A is not part of
 *   any candidate key (transitive dependency).
 *
 * BCNF violation: X → A where X is not a superkey (regardless of whether
 *   A is in a candidate key).
 *
 * A non-prime attribute depending on part of a key is a 2NF violation and is
 * left to check2nf, so each attribute is reported at the lowest normal form
 * it breaks.
 */
export function check3nf(context: RelationContext): readonly Finding[] {
  const { adapter, keys } = context;
  const findings: Finding[] = [];
  const prime = primeAttributes(adapter.size, keys);

  for (const fd of context.dependencies) {
    // Skip trivial FDs and those whose determinant is already a superkey
    if (isTrivial(fd) || containsKey(fd.lhs, keys)) {
      continue;
    }

    const determinant = adapter.fromAttributeSet(fd.lhs);
    const det = formatAttributes(determinant);
    const partial = isPartialOfKey(fd.lhs, keys);

    for (const position of fd.rhs.difference(fd.lhs).indices()) {
      const attribute = adapter.attributes[position];
      if (attribute === undefined) {
        continue;
      }

      if (prime.get(position)) {
        // Dependent is in a candidate key - BCNF violation only (3NF is satisfied)
        findings.push({
          rule: 'BCNF_VIOLATION',
          severity: 'info',
          normalForm: 'BCNF',
          relation: context.name,
          attribute,
          dependency: { determinant, dependent: [attribute] },
          message: `FD ${det} → {${attribute}}: determinant is not a superkey. BCNF violation (${attribute} is part of a candidate key, so 3NF is satisfied).`,
          fix: `Decompose on ${det} → {${attribute}} to reach BCNF.`,
        });
      } else if (!partial) {
        findings.push({
          rule: 'NF3_TRANSITIVE_DEPENDENCY',
          severity: 'error',
          normalForm: '3NF',
          relation: context.name,
          attribute,
          dependency: { determinant, dependent: [attribute] },
          message: `FD ${det} → {${attribute}}: transitive dependency detected. "${attribute}" depends on non-key attributes ${det} rather than a candidate key.`,
          fix: `Move "${attribute}" into a separate relation keyed by ${det}.`,
        });
      }
    }
  }

  return findings;
}
