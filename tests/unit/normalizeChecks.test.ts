import { describe, it, expect } from 'vitest';
import { checkBcnf } from '../../src/core/analysis/normalizeChecks/checkBcnf.js';
import { check2nf } from '../../src/core/analysis/normalizeChecks/check2nf.js';
import { checkFdAttributes } from '../../src/core/analysis/normalizeChecks/checkFdAttributes.js';
import { findCandidateKeys } from '../../src/core/analysis/computeKeys.js';
import { toFdSet } from '../../src/core/fd/dependency.js';
import type { FdInput } from '../../src/core/fd/dependency.js';
import type { RelationDefinition } from '../../src/core/report/reportTypes.js';

function relation(name: string, attributes: string[], fds: FdInput[]): RelationDefinition {
  return { name, attributes: new Set(attributes), fds: toFdSet(fds) };
}

const person = relation(
  'Person',
  ['name', 'ssn', 'phone', 'city', 'zipcode'],
  ['city -> zipcode', 'ssn -> name, city'],
);
const address = relation('Address', ['street', 'city', 'zip'], ['street, city -> zip', 'zip -> city']);
const account = relation('Account', ['id', 'owner', 'balance'], ['id -> owner, balance']);

describe('checkBcnf', () => {
  it('reports transitive dependencies on non-prime attributes as 3NF violations', () => {
    const findings = checkBcnf(person, findCandidateKeys(person.attributes, person.fds));
    expect(findings.map((f) => [f.rule, f.attribute])).toEqual([
      ['NF3_VIOLATION', 'zipcode'],
      ['NF3_VIOLATION', 'city'],
      ['NF3_VIOLATION', 'name'],
    ]);
    expect(findings.every((f) => f.severity === 'error' && f.normalForm === '3NF')).toBe(true);
    expect(findings[0]?.message).toBe(
      'FD {city} → {zipcode}: "zipcode" depends on non-key attributes {city} rather than a candidate key.',
    );
    expect(findings[0]?.fix).toBe("Decompose 'Person' on {city}.");
  });

  it('reports a prime dependent as a BCNF-only violation', () => {
    const findings = checkBcnf(address, findCandidateKeys(address.attributes, address.fds));
    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({
      rule: 'BCNF_VIOLATION',
      severity: 'info',
      normalForm: 'BCNF',
      relation: 'Address',
      attribute: 'city',
    });
  });

  it('produces no findings when every determinant is a superkey', () => {
    expect(checkBcnf(account, findCandidateKeys(account.attributes, account.fds))).toHaveLength(0);
  });

  it('skips dependents outside the relation and inside the determinant', () => {
    const r = relation('R', ['a', 'b', 'c'], ['a -> a, b, z']);
    const findings = checkBcnf(r, findCandidateKeys(r.attributes, r.fds));
    expect(findings.map((f) => f.attribute)).toEqual(['b']);
  });
});

describe('check2nf', () => {
  it('reports non-prime attributes depending on part of a key', () => {
    const findings = check2nf(person, findCandidateKeys(person.attributes, person.fds));
    expect(findings.map((f) => [f.rule, f.attribute])).toEqual([
      ['NF2_PARTIAL_DEPENDENCY', 'city'],
      ['NF2_PARTIAL_DEPENDENCY', 'name'],
    ]);
    expect(findings[0]?.message).toBe(
      'Attribute "city" depends on {ssn}, a proper subset of candidate key {phone, ssn}.',
    );
  });

  it('ignores partial dependencies on prime attributes', () => {
    expect(check2nf(address, findCandidateKeys(address.attributes, address.fds))).toHaveLength(0);
  });

  it('ignores determinants that are not part of a key', () => {
    const r = relation('R', ['a', 'b', 'c'], ['a -> b', 'b -> c']);
    expect(check2nf(r, findCandidateKeys(r.attributes, r.fds))).toHaveLength(0);
  });
});

describe('checkFdAttributes', () => {
  it('reports each undeclared attribute once', () => {
    const r = relation('Order', ['id', 'total'], ['id -> total, customer', 'customer -> email']);
    const findings = checkFdAttributes(r);
    expect(findings.map((f) => f.attribute)).toEqual(['customer', 'email']);
    expect(findings[0]).toMatchObject({
      rule: 'FD_UNKNOWN_ATTRIBUTE',
      severity: 'warning',
      normalForm: 'SCHEMA',
      relation: 'Order',
    });
  });

  it('returns nothing when all attributes are declared', () => {
    expect(checkFdAttributes(person)).toHaveLength(0);
  });
});
