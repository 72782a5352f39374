import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { parseRelationFile, relationsToDefinitions } from '../../src/core/relation/parse.js';
import { suppressArraySchema } from '../../src/core/relation/schema.js';
import { formatFd } from '../../src/core/fd/dependency.js';

const FIXTURES_DIR = resolve(import.meta.dirname, '../fixtures/relations');

describe('parseRelationFile', () => {
  it('parses a valid relations file', () => {
    const { relations } = parseRelationFile(resolve(FIXTURES_DIR, 'person.json'));

    expect(relations).toHaveProperty('Person');
    expect(relations.Person?.attributes).toEqual(['name', 'ssn', 'phone', 'city', 'zipcode']);
    expect(relations.Person?.functionalDependencies).toHaveLength(2);
    expect(relations.Person?.functionalDependencies?.[0]?.determinant).toBe('city');
    expect(relations.Person?.functionalDependencies?.[1]?.note).toBe(
      'A social security number identifies one person',
    );
  });

  it('returns empty suppress array for files without suppress key', () => {
    const { suppress } = parseRelationFile(resolve(FIXTURES_DIR, 'person.json'));
    expect(suppress).toEqual([]);
  });

  it('parses suppress array from relations file', () => {
    const { relations, suppress } = parseRelationFile(resolve(FIXTURES_DIR, 'with-suppress.json'));
    expect(suppress).toEqual(['NF2_PARTIAL_DEPENDENCY:Person', 'NF3_VIOLATION:Person.zipcode']);
    expect(relations).toHaveProperty('Person');
    expect(relations).not.toHaveProperty('suppress');
  });

  it('throws on malformed JSON', () => {
    expect(() => {
      parseRelationFile(resolve(FIXTURES_DIR, 'malformed.json'));
    }).toThrow();
  });

  it('throws on invalid structure (empty determinant)', () => {
    expect(() => {
      parseRelationFile(resolve(FIXTURES_DIR, 'invalid-structure.json'));
    }).toThrow();
  });

  it('throws on invalid suppress entry format', () => {
    expect(() => {
      suppressArraySchema.parse(['invalid-format']);
    }).toThrow();
  });

  it('validates correct suppress entry formats', () => {
    expect(() => {
      suppressArraySchema.parse(['NF3_VIOLATION:Person', 'BCNF_VIOLATION:Address.city']);
    }).not.toThrow();
  });

  it('accepts suppress entries for any relation name the file accepts', () => {
    expect(() => {
      suppressArraySchema.parse([
        'NF3_VIOLATION:order-items',
        'NF3_VIOLATION:order-items.sku name',
        'BCNF_VIOLATION:_staging.zip-code',
      ]);
    }).not.toThrow();
  });

  it('parses a relation name with a hyphen', () => {
    const { relations, suppress } = parseRelationFile(resolve(FIXTURES_DIR, 'order-items.json'));
    expect(Object.keys(relations)).toEqual(['order-items']);
    expect(suppress).toEqual(['NF3_VIOLATION:order-items.sku name']);
  });

  it('rejects relation names that a suppress entry could not address', () => {
    expect(() => {
      parseRelationFile(resolve(FIXTURES_DIR, 'dotted-name.json'));
    }).toThrow();
  });
});

describe('relationsToDefinitions', () => {
  it('sorts relations by name and keeps FD order', () => {
    const { relations } = parseRelationFile(resolve(FIXTURES_DIR, 'bcnf.json'));
    const definitions = relationsToDefinitions(relations);

    expect(definitions.map((d) => d.name)).toEqual(['Account', 'Address']);
    expect(definitions[1]?.attributes).toEqual(new Set(['street', 'city', 'zip']));
    expect(definitions[1]?.fds.map(formatFd)).toEqual(['{city, street} → {zip}', '{zip} → {city}']);
  });

  it('treats a relation without FDs as having none', () => {
    const definitions = relationsToDefinitions({ Tag: { attributes: ['label'] } });
    expect(definitions[0]?.fds).toEqual([]);
  });
});
