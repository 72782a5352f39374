import { z } from 'zod/v4';
import { InvalidInputTypeError } from '../errors.js';
import { sortBy } from '../../util/index.js';

/** An attribute identifier, such as a column name. */
export type Attribute = string;

/** A deduplicated, unordered set of attributes. */
export type AttributeSet = ReadonlySet<Attribute>;

/** Accepted shapes for an attribute-set argument: one attribute or a collection. */
export type AttributeInput = Attribute | readonly Attribute[] | ReadonlySet<Attribute>;

const attributeSchema = z.string().min(1);

/**
 * Zod schema for an attribute-set argument. A bare string is shorthand for a
 * singleton set.
 */
export const attributeInputSchema = z.union([
  attributeSchema,
  z.array(attributeSchema),
  z.set(attributeSchema),
]);

/**
 * Normalize any accepted attribute-set shape into an AttributeSet.
 * Throws InvalidInputTypeError for anything else.
 */
export function toAttributeSet(input: AttributeInput): AttributeSet {
  const parsed = attributeInputSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues[0]?.message ?? 'unrecognized value';
    throw new InvalidInputTypeError(
      `Expected an attribute name or a collection of attribute names (${detail}).`,
    );
  }
  const value = parsed.data;
  return typeof value === 'string' ? new Set([value]) : new Set(value);
}

export function isSubset(subset: AttributeSet, superset: AttributeSet): boolean {
  for (const attr of subset) {
    if (!superset.has(attr)) {
      return false;
    }
  }
  return true;
}

export function union(a: AttributeSet, b: AttributeSet): AttributeSet {
  return new Set([...a, ...b]);
}

export function intersection(a: AttributeSet, b: AttributeSet): AttributeSet {
  return new Set([...a].filter((attr) => b.has(attr)));
}

export function difference(a: AttributeSet, b: AttributeSet): AttributeSet {
  return new Set([...a].filter((attr) => !b.has(attr)));
}

export function setEquals(a: AttributeSet, b: AttributeSet): boolean {
  return a.size === b.size && isSubset(a, b);
}

/** Attributes in lexicographic order, for stable output. */
export function sortedAttributes(set: AttributeSet): Attribute[] {
  return sortBy([...set], (attr) => attr);
}

/** Render a set as `{a, b, c}`. */
export function formatAttributeSet(set: AttributeSet): string {
  return `{${sortedAttributes(set).join(', ')}}`;
}
