import type { Finding, RelationDefinition } from '../../report/reportTypes.js';
import type { AttributeSet } from '../../fd/attributeSet.js';
import {
  difference,
  formatAttributeSet,
  intersection,
  sortedAttributes,
} from '../../fd/attributeSet.js';
import { isApplicable, isSuperkeyFor } from '../closure.js';
import { primeAttributes } from '../computeKeys.js';

/**
 * Check for 3NF and BCNF violations in the declared FDs of a relation.
 *
 * 3NF violation: X → A where X is not a superkey AND A is not part of
 *   any candidate key (transitive dependency).
 *
 * BCNF violation: X → A where X is not a superkey (regardless of whether
 *   A is in a candidate key).
 *
 * Each offending dependent attribute gets one finding, classified by the
 * weakest form it breaks.
 */
export function checkBcnf(
  relation: RelationDefinition,
  candidateKeys: readonly AttributeSet[],
): readonly Finding[] {
  const findings: Finding[] = [];
  const prime = primeAttributes(candidateKeys);

  for (const fd of relation.fds) {
    if (!isApplicable(fd, relation.attributes)) {
      continue;
    }

    if (isSuperkeyFor(relation.attributes, fd.determinant, relation.fds)) {
      continue;
    }

    const det = formatAttributeSet(fd.determinant);
    const dependents = difference(intersection(fd.dependent, relation.attributes), fd.determinant);

    for (const attr of sortedAttributes(dependents)) {
      if (prime.has(attr)) {
        // Dependent is in a candidate key - BCNF violation only (3NF is satisfied)
        findings.push({
          rule: 'BCNF_VIOLATION',
          severity: 'info',
          normalForm: 'BCNF',
          relation: relation.name,
          attribute: attr,
          message: `FD ${det} → {${attr}}: determinant is not a superkey. BCNF violation (${attr} is part of a candidate key, so 3NF is satisfied).`,
          fix: `Decompose '${relation.name}' on ${det}.`,
        });
      } else {
        findings.push({
          rule: 'NF3_VIOLATION',
          severity: 'error',
          normalForm: '3NF',
          relation: relation.name,
          attribute: attr,
          message: `FD ${det} → {${attr}}: "${attr}" depends on non-key attributes ${det} rather than a candidate key.`,
          fix: `Decompose '${relation.name}' on ${det}.`,
        });
      }
    }
  }

  return findings;
}
