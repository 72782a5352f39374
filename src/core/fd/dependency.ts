import { z } from 'zod/v4';
import { InvalidInputTypeError } from '../errors.js';
import { attributeInputSchema, formatAttributeSet, toAttributeSet } from './attributeSet.js';
import type { AttributeInput, AttributeSet } from './attributeSet.js';

/** A functional dependency: determinant → dependent. */
export interface FunctionalDependency {
  readonly determinant: AttributeSet;
  readonly dependent: AttributeSet;
}

/** An ordered sequence of FDs. Order drives BCNF violation selection. */
export type FdSet = readonly FunctionalDependency[];

/**
 * Accepted shapes for one FD:
 * - `{ determinant, dependent }`
 * - a `[determinant, dependent]` pair
 * - a compact string such as `"a, b -> c"`
 */
export type FdInput =
  | { readonly determinant: AttributeInput; readonly dependent: AttributeInput }
  | readonly [AttributeInput, AttributeInput]
  | string;

const fdInputSchema = z.union([
  z.string(),
  z.tuple([attributeInputSchema, attributeInputSchema]),
  z.object({
    determinant: attributeInputSchema,
    dependent: attributeInputSchema,
  }),
]);

const FD_ARROW = '->';

/**
 * Normalize one FD input. Throws InvalidInputTypeError when the shape is not
 * recognized or a compact string lacks exactly one arrow.
 */
export function toFunctionalDependency(input: FdInput): FunctionalDependency {
  const parsed = fdInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidInputTypeError(
      'Expected a functional dependency as { determinant, dependent }, a [lhs, rhs] pair, or "lhs -> rhs".',
    );
  }

  const value = parsed.data;
  if (typeof value === 'string') {
    return parseCompactFd(value);
  }
  if (Array.isArray(value)) {
    const [determinant, dependent] = value;
    return { determinant: toAttributeSet(determinant), dependent: toAttributeSet(dependent) };
  }
  return {
    determinant: toAttributeSet(value.determinant),
    dependent: toAttributeSet(value.dependent),
  };
}

/** Normalize a list of FD inputs, keeping their order. */
export function toFdSet(inputs: readonly FdInput[]): FdSet {
  return inputs.map(toFunctionalDependency);
}

function parseCompactFd(text: string): FunctionalDependency {
  const sides = text.split(FD_ARROW);
  if (sides.length !== 2) {
    throw new InvalidInputTypeError(`Malformed functional dependency "${text}": expected "lhs -> rhs".`);
  }
  const [lhs = '', rhs = ''] = sides;
  return { determinant: splitAttributeList(lhs), dependent: splitAttributeList(rhs) };
}

function splitAttributeList(text: string): AttributeSet {
  return new Set(
    text
      .split(',')
      .map((attr) => attr.trim())
      .filter((attr) => attr.length > 0),
  );
}

/** Render an FD as `{a, b} → {c}`. */
export function formatFd(fd: FunctionalDependency): string {
  return `${formatAttributeSet(fd.determinant)} → ${formatAttributeSet(fd.dependent)}`;
}
