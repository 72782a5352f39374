import { readFileSync } from 'node:fs';
import { relationsFileSchema, suppressArraySchema } from './schema.js';
import type { RelationsFile } from './schema.js';
import { toAttributeSet } from '../fd/attributeSet.js';
import type { RelationDefinition } from '../report/reportTypes.js';
import { sortBy } from '../../util/index.js';

/** Result of parsing a relations file. */
export interface ParsedRelations {
  readonly relations: RelationsFile;
  readonly suppress: readonly string[];
}

/**
 * Parse and validate a relations JSON file.
 * Returns the validated relations and suppress list, or throws on invalid input.
 */
export function parseRelationFile(filePath: string): ParsedRelations {
  const content = readFileSync(filePath, 'utf-8');
  const raw: unknown = JSON.parse(content);

  // Extract suppress array before validating the rest as relation record
  let suppress: readonly string[] = [];
  let relationData: unknown = raw;
  if (raw !== null && typeof raw === 'object' && !Array.isArray(raw)) {
    const obj = raw as Record<string, unknown>;
    if ('suppress' in obj) {
      suppress = suppressArraySchema.parse(obj['suppress']);
      const { suppress: _suppress, ...rest } = obj;
      relationData = rest;
    }
  }

  const relations = relationsFileSchema.parse(relationData);
  return { relations, suppress };
}

/**
 * Convert parsed relations into canonical definitions, sorted by name.
 * FD order within a relation is preserved.
 */
export function relationsToDefinitions(relations: RelationsFile): readonly RelationDefinition[] {
  const definitions = Object.entries(relations).map(([name, relation]) => ({
    name,
    attributes: toAttributeSet(relation.attributes),
    fds: (relation.functionalDependencies ?? []).map((fd) => ({
      determinant: toAttributeSet(fd.determinant),
      dependent: toAttributeSet(fd.dependent),
    })),
  }));
  return sortBy(definitions, (def) => def.name);
}
