import {
  difference,
  formatAttributeSet,
  intersection,
  isSubset,
  sortedAttributes,
  union,
} from '../fd/attributeSet.js';
import type { AttributeSet } from '../fd/attributeSet.js';
import { formatFd } from '../fd/dependency.js';
import type { FdSet, FunctionalDependency } from '../fd/dependency.js';
import { ConsistencyViolationError } from '../errors.js';
import { computeClosure, isApplicable } from './closure.js';
import type { ClosureOptions } from './closure.js';
import { combinations } from '../../util/index.js';

/** Largest schema searched for implied violations unless overridden. */
export const DEFAULT_MAX_IMPLIED_SEARCH_ATTRIBUTES = 16;

/** Options for BCNF violation search and decomposition. */
export interface DecomposeOptions extends ClosureOptions {
  /**
   * Schemas with more attributes are checked against the listed FDs only.
   */
  readonly maxImpliedSearchAttributes?: number | undefined;
}

/** One split of a schema on a violating FD. */
export interface DecompositionSplit {
  readonly fd: FunctionalDependency;
  /** Closure of the determinant, restricted to the parent schema. */
  readonly left: DecompositionNode;
  /** Determinant plus every attribute outside its closure. */
  readonly right: DecompositionNode;
}

/** A node of the decomposition call tree. Leaves have no split. */
export interface DecompositionNode {
  readonly schema: AttributeSet;
  readonly split: DecompositionSplit | null;
}

/**
 * Find the FD that drives the next BCNF split of `schema`.
 *
 * Listed FDs come first, in list order. An FD violates BCNF when its
 * determinant lies inside the schema, it determines some schema attribute
 * outside the determinant, and the determinant is not a superkey of the
 * schema.
 *
 * When no listed FD violates, FDs implied on the schema are searched: proper
 * subsets X of the schema, smallest first and then in sorted attribute order,
 * such that X+ adds schema attributes to X without covering the schema. The
 * returned FD is X → (X+ ∩ schema) − X. Schemas above
 * `maxImpliedSearchAttributes` skip this search.
 */
export function findBcnfViolation(
  schema: AttributeSet,
  fds: FdSet,
  options: DecomposeOptions = {},
): FunctionalDependency | null {
  for (const fd of fds) {
    if (!isApplicable(fd, schema)) {
      continue;
    }
    const localDependent = intersection(fd.dependent, schema);
    if (isSubset(localDependent, fd.determinant)) {
      continue;
    }
    const closure = computeClosure(fd.determinant, fds, options);
    if (!isSubset(schema, closure)) {
      return fd;
    }
  }

  const maxAttributes = options.maxImpliedSearchAttributes ?? DEFAULT_MAX_IMPLIED_SEARCH_ATTRIBUTES;
  if (schema.size > maxAttributes) {
    return null;
  }
  return findImpliedViolation(schema, fds, options);
}

function findImpliedViolation(
  schema: AttributeSet,
  fds: FdSet,
  options: ClosureOptions,
): FunctionalDependency | null {
  const attributes = sortedAttributes(schema);
  for (let size = 1; size < attributes.length; size++) {
    for (const combo of combinations(attributes, size)) {
      const determinant: AttributeSet = new Set(combo);
      const closure = computeClosure(determinant, fds, options);
      if (isSubset(schema, closure)) {
        continue;
      }
      const dependent = difference(intersection(closure, schema), determinant);
      if (dependent.size > 0) {
        return { determinant, dependent };
      }
    }
  }
  return null;
}

/**
 * Decompose `schema` into BCNF, recording every split.
 *
 * The violating FD (L, R) chosen by `findBcnfViolation` splits the schema
 * into L+ ∩ schema and L ∪ (schema − L+). Both halves share exactly L, and L
 * is a superkey of the first, so the split is a lossless join. Each half is decomposed again
 * against the full FD list.
 */
export function decompose(
  schema: AttributeSet,
  fds: FdSet,
  options: DecomposeOptions = {},
): DecompositionNode {
  const fd = findBcnfViolation(schema, fds, options);
  if (fd === null) {
    return { schema, split: null };
  }

  const closure = intersection(computeClosure(fd.determinant, fds, options), schema);
  const leftSchema = closure;
  const rightSchema = union(fd.determinant, difference(schema, closure));

  if (leftSchema.size >= schema.size || rightSchema.size >= schema.size) {
    throw new ConsistencyViolationError(
      `Splitting ${formatAttributeSet(schema)} on ${formatFd(fd)} did not shrink both halves.`,
    );
  }

  return {
    schema,
    split: {
      fd,
      left: decompose(leftSchema, fds, options),
      right: decompose(rightSchema, fds, options),
    },
  };
}

/** Leaf schemas of a decomposition tree, left to right. */
export function leafSchemas(node: DecompositionNode): AttributeSet[] {
  if (node.split === null) {
    return [node.schema];
  }
  return [...leafSchemas(node.split.left), ...leafSchemas(node.split.right)];
}

/**
 * Decompose `schema` into a sequence of BCNF schemas. The result depends on
 * the order of `fds`.
 */
export function decomposeBcnf(
  schema: AttributeSet,
  fds: FdSet,
  options: DecomposeOptions = {},
): AttributeSet[] {
  return leafSchemas(decompose(schema, fds, options));
}
