import type { Finding, RelationDefinition } from '../../report/reportTypes.js';
import type { AttributeSet } from '../../fd/attributeSet.js';
import {
  difference,
  formatAttributeSet,
  intersection,
  isSubset,
  sortedAttributes,
} from '../../fd/attributeSet.js';
import { isApplicable } from '../closure.js';
import { primeAttributes } from '../computeKeys.js';

/**
 * Check for 2NF violations: a non-prime attribute determined by a proper
 * subset of some candidate key (partial dependency).
 */
export function check2nf(
  relation: RelationDefinition,
  candidateKeys: readonly AttributeSet[],
): readonly Finding[] {
  const findings: Finding[] = [];
  const prime = primeAttributes(candidateKeys);

  for (const fd of relation.fds) {
    if (!isApplicable(fd, relation.attributes)) {
      continue;
    }

    const partOf = candidateKeys.find(
      (key) => key.size > fd.determinant.size && isSubset(fd.determinant, key),
    );
    if (partOf === undefined) {
      continue;
    }

    const dependents = difference(intersection(fd.dependent, relation.attributes), fd.determinant);
    for (const attr of sortedAttributes(dependents)) {
      if (prime.has(attr)) {
        continue;
      }
      const det = formatAttributeSet(fd.determinant);
      findings.push({
        rule: 'NF2_PARTIAL_DEPENDENCY',
        severity: 'error',
        normalForm: '2NF',
        relation: relation.name,
        attribute: attr,
        message: `Attribute "${attr}" depends on ${det}, a proper subset of candidate key ${formatAttributeSet(partOf)}.`,
        fix: `Move '${attr}' into a relation keyed by ${det}.`,
      });
    }
  }

  return findings;
}
