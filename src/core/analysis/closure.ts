import { formatAttributeSet, isSubset } from '../fd/attributeSet.js';
import type { AttributeSet } from '../fd/attributeSet.js';
import { formatFd } from '../fd/dependency.js';
import type { FdSet, FunctionalDependency } from '../fd/dependency.js';

/** Options for closure computation. */
export interface ClosureOptions {
  /** Receives one line per FD application. */
  readonly onTrace?: ((line: string) => void) | undefined;
}

/**
 * An FD fires only when its determinant is non-empty and contained in the
 * working set. Empty determinants never apply.
 */
export function isApplicable(fd: FunctionalDependency, attributes: AttributeSet): boolean {
  return fd.determinant.size > 0 && isSubset(fd.determinant, attributes);
}

/**
 * Compute the attribute closure X+ of `attributes` under `fds`.
 *
 * Fixpoint iteration: each pass applies every FD whose determinant is
 * contained in the working set and whose dependent is not yet. The loop ends
 * after a pass in which no FD fires. The input set is not mutated.
 */
export function computeClosure(
  attributes: AttributeSet,
  fds: FdSet,
  options: ClosureOptions = {},
): AttributeSet {
  const closure = new Set(attributes);
  const trace = options.onTrace;

  let fired = true;
  while (fired) {
    fired = false;
    for (const fd of fds) {
      if (!isApplicable(fd, closure) || isSubset(fd.dependent, closure)) {
        continue;
      }
      for (const attr of fd.dependent) {
        closure.add(attr);
      }
      fired = true;
      trace?.(`apply ${formatFd(fd)}: ${formatAttributeSet(closure)}`);
    }
  }

  return closure;
}

/**
 * Check if `candidate` is a superkey of `universe`: its closure covers every
 * attribute.
 */
export function isSuperkeyFor(
  universe: AttributeSet,
  candidate: AttributeSet,
  fds: FdSet,
  options: ClosureOptions = {},
): boolean {
  return isSubset(universe, computeClosure(candidate, fds, options));
}

/**
 * Check if `candidate` is a key of `universe`: a superkey from which no
 * single attribute can be dropped while staying a superkey.
 *
 * Only one-attribute removals are tried. Superkeys are closed under
 * supersets, so no smaller subset can be a superkey when none of these is.
 */
export function isKeyFor(
  universe: AttributeSet,
  candidate: AttributeSet,
  fds: FdSet,
  options: ClosureOptions = {},
): boolean {
  if (!isSuperkeyFor(universe, candidate, fds, options)) {
    return false;
  }
  for (const attr of candidate) {
    const reduced = new Set([...candidate].filter((a) => a !== attr));
    if (isSuperkeyFor(universe, reduced, fds, options)) {
      return false;
    }
  }
  return true;
}
