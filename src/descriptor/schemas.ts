/**
 * @file Descriptor Schemas
 *
 * Zod runtime schemas for the YAML parameter descriptor: application
 * metadata at the top level and one entry per parameter under
 * `parameters`.
 *
 * Scalars that YAML may type as numbers (`version: 1.0`, `default: 3`)
 * are accepted and kept as text.
 *
 * @module descriptor/schemas
 */

import { z } from 'zod';
import { kind_isKnown } from '../params/kinds.js';

const TextSchema = z.union([z.string(), z.number()]).transform((value: string | number): string => String(value));

const KindSchema = z.string().refine(kind_isKnown, (value: string) => ({
    message: `unknown parameter kind '${value}'`
}));

/**
 * `default` may be written as YAML scalar or list; lists are comma-joined.
 */
const DefaultSchema = z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.array(z.union([z.string(), z.number()]))
]);

// ─── Parameter ───────────────────────────────────────────────────────────────

export const ParameterSchema = z.object({
    section:     z.string().min(1, 'section is required'),
    key:         z.string().min(1, 'key is required'),
    kind:        KindSchema,
    default:     DefaultSchema.optional(),
    description: z.string().default(''),
    label:       z.string().optional(),
    flag:        z.string().regex(/^[^-]/, 'flag is given without leading dashes').optional(),
    index:       z.number().int().nonnegative().optional(),
    channel:     z.enum(['input', 'output']).optional(),
    enumeration: z.array(TextSchema).optional(),
    attributes:  z.record(z.string(), TextSchema).default({}),
    constraints: z.record(z.string(), TextSchema).default({}),
    tags:        z.record(z.string(), TextSchema).default({})
}).superRefine((param, ctx): void => {
    if (param.flag !== undefined && param.index !== undefined) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['index'],
            message: 'a parameter is either flagged or positional, not both'
        });
    }
    if (param.enumeration !== undefined && !param.kind.endsWith('-enumeration')) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['enumeration'],
            message: `enumeration items need an enumeration kind, got '${param.kind}'`
        });
    }
});

// ─── Descriptor (full document) ──────────────────────────────────────────────

export const DescriptorSchema = z.object({
    title:               z.string().min(1, 'descriptor title is required'),
    description:         z.string().default(''),
    category:            TextSchema.optional(),
    version:             TextSchema.optional(),
    'documentation-url': z.string().optional(),
    license:             z.string().optional(),
    contributor:         z.string().optional(),
    acknowledgements:    z.string().optional(),
    parameters:          z.array(ParameterSchema).default([])
});

export type Descriptor = z.infer<typeof DescriptorSchema>;
export type DescriptorParameter = z.infer<typeof ParameterSchema>;
