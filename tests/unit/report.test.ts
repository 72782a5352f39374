import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { analyze } from '../../src/index.js';
import { toJson } from '../../src/core/report/toJson.js';
import { toText } from '../../src/core/report/toText.js';

const FIXTURES_DIR = resolve(import.meta.dirname, '../fixtures/relations');
const BCNF_PATH = resolve(FIXTURES_DIR, 'bcnf.json');

describe('toJson', () => {
  it('writes attribute sets as sorted arrays', () => {
    const result = analyze({ relationPath: BCNF_PATH, noTimestamp: true });
    const parsed: unknown = JSON.parse(toJson(result, false));

    expect(parsed).toMatchObject({
      relations: [
        { relation: { name: 'Account', attributes: ['balance', 'id', 'owner'] } },
        {
          relation: { name: 'Address' },
          candidateKeys: [['city', 'street'], ['street', 'zip']],
          bcnfSchemas: [['city', 'zip'], ['street', 'zip']],
          decomposition: {
            schema: ['city', 'street', 'zip'],
            split: {
              fd: { determinant: ['zip'], dependent: ['city'] },
              left: { schema: ['city', 'zip'], split: null },
              right: { schema: ['street', 'zip'], split: null },
            },
          },
        },
      ],
    });
  });

  it('sorts object keys', () => {
    const result = analyze({ relationPath: BCNF_PATH, noTimestamp: true });
    const json = toJson(result, false, { findingsOnly: true });
    expect(json.startsWith('{"findings":[{"attribute":"city","fix":')).toBe(true);
    expect(json.endsWith(
      '"metadata":{"findingCount":1,"relationCount":2,"relationPath":"' + BCNF_PATH + '","timestamp":null}}',
    )).toBe(true);
  });

  it('writes null candidate keys for a relation too wide to search', () => {
    const result = analyze({ relationPath: resolve(FIXTURES_DIR, 'wide.json'), noTimestamp: true });
    const parsed: unknown = JSON.parse(toJson(result, false));
    expect(parsed).toMatchObject({ relations: [{ candidateKeys: null }] });
  });

  it('is deterministic across runs', () => {
    const first = toJson(analyze({ relationPath: BCNF_PATH, noTimestamp: true }), true);
    const second = toJson(analyze({ relationPath: BCNF_PATH, noTimestamp: true }), true);
    expect(first).toBe(second);
  });
});

describe('toText', () => {
  it('renders keys, the split tree and findings', () => {
    const result = analyze({ relationPath: BCNF_PATH, noTimestamp: true, closures: [['zip']] });
    const lines = toText(result).split('\n');

    expect(lines[0]).toBe('=== Functional Dependency Analysis ===');
    expect(lines).toContain('Count:     2');
    expect(lines).toContain('Findings:  1');
    expect(lines).toContain('--- Relation: Address ---');
    expect(lines).toContain('  Key: {city, street}');
    expect(lines).toContain('  Key: {street, zip}');
    expect(lines).toContain('  Closure: {zip}+ = {city, zip}');
    expect(lines).toContain('    {city, street, zip} split on {zip} → {city}');
    expect(lines).toContain('      {city, zip}');
    expect(lines).toContain('      {street, zip}');
    expect(lines).toContain('  [INFO] BCNF_VIOLATION @ Address.city');
    expect(lines.some((l) => l.startsWith('Timestamp:'))).toBe(false);
  });

  it('notes when candidate keys were not searched', () => {
    const result = analyze({ relationPath: resolve(FIXTURES_DIR, 'wide.json'), noTimestamp: true });
    const lines = toText(result).split('\n');
    expect(lines).toContain('  Keys: not searched');
    expect(lines).toContain('  [WARNING] KEY_SEARCH_SKIPPED @ Wide');
    expect(lines.some((l) => l.startsWith('  Key: '))).toBe(false);
  });

  it('labels keys and superkeys among requested closures', () => {
    const result = analyze({
      relationPath: BCNF_PATH,
      noTimestamp: true,
      closures: [['id'], ['id', 'owner']],
    });
    const lines = toText(result).split('\n');
    expect(lines).toContain('  Closure: {id}+ = {balance, id, owner} [key]');
    expect(lines).toContain('  Closure: {id, owner}+ = {balance, id, owner} [superkey]');
  });

  it('omits relation detail with findingsOnly', () => {
    const result = analyze({ relationPath: BCNF_PATH, noTimestamp: true });
    const text = toText(result, { findingsOnly: true });
    expect(text).not.toContain('--- Relation:');
    expect(text).toContain('--- Findings ---');
  });

  it('says so when there are no findings', () => {
    const result = analyze({ relationPath: resolve(FIXTURES_DIR, 'with-suppress.json'), noTimestamp: true });
    expect(result.findings).toHaveLength(2);
    const clean = { ...result, findings: [] };
    expect(toText(clean)).toContain('No normalization findings.');
  });
});
