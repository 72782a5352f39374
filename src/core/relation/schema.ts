import { z } from 'zod/v4';

/**
 * An FD side: one attribute name or a non-empty list of them.
 */
const fdSideSchema = z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]);

/**
 * Zod schema for a single functional dependency declaration.
 */
const functionalDependencySchema = z.object({
  determinant: fdSideSchema,
  dependent: fdSideSchema,
  note: z.string().optional(),
});

/**
 * Zod schema for one relation: its attributes and declared FDs.
 */
const relationSchema = z.object({
  attributes: z.array(z.string().min(1)).min(1),
  functionalDependencies: z.array(functionalDependencySchema).optional(),
});

/** Relation names: no '.' or ':', which separate the parts of a suppress entry. */
const RELATION_NAME = '[A-Za-z_][A-Za-z0-9_-]*';

/**
 * Zod schema for the full relations file.
 * Top-level keys are relation names, values are relation declarations.
 */
export const relationsFileSchema = z.record(
  z.string().regex(new RegExp(`^${RELATION_NAME}$`)),
  relationSchema,
);

/**
 * Zod schema for the suppress array.
 * Format: RULE_CODE:RelationName or RULE_CODE:RelationName.attribute,
 * where the attribute is any declared attribute name.
 */
export const suppressArraySchema = z.array(
  z.string().regex(new RegExp(`^[A-Z][A-Z0-9_]*:${RELATION_NAME}(\\..+)?$`)),
);

/** Parsed type for a functional dependency declaration. */
export type DeclaredFd = z.infer<typeof functionalDependencySchema>;

/** Parsed type for the full relations file. */
export type RelationsFile = z.infer<typeof relationsFileSchema>;
