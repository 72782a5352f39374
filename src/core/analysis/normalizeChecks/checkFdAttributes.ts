import type { Finding, RelationDefinition } from '../../report/reportTypes.js';
import { sortedAttributes } from '../../fd/attributeSet.js';

/**
 * Report attributes that FDs mention but the relation does not declare.
 * Such FDs still take part in closures, but never apply inside the relation
 * unless their determinant is fully declared. Each unknown attribute is
 * reported once.
 */
export function checkFdAttributes(relation: RelationDefinition): readonly Finding[] {
  const findings: Finding[] = [];
  const reported = new Set<string>();

  for (const fd of relation.fds) {
    const mentioned = [...sortedAttributes(fd.determinant), ...sortedAttributes(fd.dependent)];
    for (const attr of mentioned) {
      if (relation.attributes.has(attr) || reported.has(attr)) {
        continue;
      }
      reported.add(attr);
      findings.push({
        rule: 'FD_UNKNOWN_ATTRIBUTE',
        severity: 'warning',
        normalForm: 'SCHEMA',
        relation: relation.name,
        attribute: attr,
        message: `Functional dependency references attribute "${attr}" which is not declared on relation "${relation.name}".`,
        fix: `Add '${attr}' to the attributes of '${relation.name}' or remove it from the dependency.`,
      });
    }
  }

  return findings;
}
