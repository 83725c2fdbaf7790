import { z } from 'zod/v4';

/**
 * Zod schema for a single functional dependency declaration.
 */
const functionalDependencySchema = z.object({
  determinant: z.array(z.string().min(1)).min(1),
  dependent: z.array(z.string().min(1)).min(1),
  note: z.string().optional(),
});

/**
 * Zod schema for one relation: its attribute universe (optional, defaults
 * to the names its dependencies use) and its declared dependencies.
 */
const relationSchema = z.object({
  attributes: z
    .array(z.string().min(1))
    .refine((names) => new Set(names).size === names.length, {
      message: 'Attribute names must be distinct',
    })
    .optional(),
  functionalDependencies: z.array(functionalDependencySchema).optional(),
});

/**
 * Zod schema for the full relations file.
 * Top-level keys are relation names, values are relation declarations.
 */
export const relationsFileSchema = z.record(z.string(), relationSchema);

/**
 * Zod schema for the suppress array.
 * Format: RULE_CODE:RelationName or RULE_CODE:RelationName.attribute
 */
export const suppressArraySchema = z.array(
  z.string().regex(/^[A-Z][A-Z0-9_]*:[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/),
);

/** Parsed type for a declared functional dependency. */
export type DeclaredDependency = z.infer<typeof functionalDependencySchema>;

/** Parsed type for one relation declaration. */
export type RelationDeclaration = z.infer<typeof relationSchema>;

/** Parsed type for the full relations file. */
export type RelationsFile = z.infer<typeof relationsFileSchema>;
