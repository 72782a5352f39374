import { difference, isSubset, sortedAttributes, union } from '../fd/attributeSet.js';
import type { AttributeSet } from '../fd/attributeSet.js';
import type { FdSet } from '../fd/dependency.js';
import { SearchLimitExceededError } from '../errors.js';
import { combinations, compareLists } from '../../util/index.js';
import { isSuperkeyFor } from './closure.js';

/** Largest universe searched for candidate keys unless overridden. */
export const DEFAULT_MAX_KEY_SEARCH_ATTRIBUTES = 20;

/** Options for candidate key search. */
export interface KeySearchOptions {
  readonly maxAttributes?: number | undefined;
}

/**
 * Find every candidate key (minimal superkey) of `universe`.
 *
 * Attributes that no FD determines must belong to every key, so the search
 * starts from them and adds the remaining attributes in subsets of increasing
 * size. Supersets of keys already found are skipped.
 *
 * Keys are returned smallest first, ties broken by their sorted attributes.
 */
export function findCandidateKeys(
  universe: AttributeSet,
  fds: FdSet,
  options: KeySearchOptions = {},
): AttributeSet[] {
  const maxAttributes = options.maxAttributes ?? DEFAULT_MAX_KEY_SEARCH_ATTRIBUTES;
  if (universe.size > maxAttributes) {
    throw new SearchLimitExceededError(
      `Candidate key search is limited to ${String(maxAttributes)} attributes (got ${String(universe.size)}).`,
      maxAttributes,
      universe.size,
    );
  }

  const determined = new Set(fds.flatMap((fd) => [...fd.dependent]));
  const core: AttributeSet = new Set([...universe].filter((attr) => !determined.has(attr)));
  const rest = sortedAttributes(difference(universe, core));

  const keys: AttributeSet[] = [];
  for (let size = 0; size <= rest.length; size++) {
    for (const combo of combinations(rest, size)) {
      const candidate = union(core, new Set(combo));
      if (keys.some((key) => isSubset(key, candidate))) {
        continue;
      }
      if (isSuperkeyFor(universe, candidate, fds)) {
        keys.push(candidate);
      }
    }
  }

  return keys
    .map((key) => ({ key, sorted: sortedAttributes(key) }))
    .sort((a, b) => compareLists(a.sorted, b.sorted))
    .map(({ key }) => key);
}

/** Attributes that belong to at least one candidate key. */
export function primeAttributes(keys: readonly AttributeSet[]): AttributeSet {
  return new Set(keys.flatMap((key) => [...key]));
}
