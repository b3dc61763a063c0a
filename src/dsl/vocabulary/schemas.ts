/**
 * @file Vocabulary Manifest Schemas
 *
 * Zod runtime schemas for YAML vocabulary manifests. Structural rules
 * (field types, enum values present, patterns compile) live here;
 * cross-references between sections are checked by the loader.
 *
 * @module dsl/vocabulary/schemas
 */

import { z } from 'zod';

// ─── Arguments ────────────────────────────────────────────────────────────────

const ArgumentTypeSchema = z.enum(['string', 'enum', 'uuid', 'date', 'number', 'boolean', 'array', 'object']);

function pattern_compiles(pattern: string): boolean {
    try {
        new RegExp(pattern);
        return true;
    } catch {
        return false;
    }
}

export const ArgumentSchema = z
    .object({
        type:        ArgumentTypeSchema,
        required:    z.boolean().default(false),
        description: z.string().default(''),
        pattern:     z.string().refine(pattern_compiles, 'pattern is not a valid regular expression').optional(),
        values:      z.array(z.string().min(1)).optional(),
    })
    .refine(
        (arg) => arg.type !== 'enum' || (arg.values !== undefined && arg.values.length > 0),
        { message: 'enum argument requires a non-empty values list', path: ['values'] },
    );

// ─── Verbs ────────────────────────────────────────────────────────────────────

/** Dotted verb shape: lowercase segment, then one or more `.segment` parts. */
export const VERB_NAME_PATTERN: RegExp = /^[a-z]+(\.[a-z-]+)+$/;

const VerbNameSchema = z.string().regex(VERB_NAME_PATTERN, 'verb name must look like domain.action');

export const TransitionSchema = z.object({
    to:     z.string().min(1),
    from:   z.array(z.string()).default([]),
    marker: z.string().min(1).optional(),
});

export const VerbSchema = z.object({
    category:    z.string().min(1, 'verb category is required'),
    description: z.string().default(''),
    version:     z.string().default('1.0.0'),
    idempotent:  z.boolean().default(false),
    examples:    z.array(z.string()).default([]),
    transition:  TransitionSchema.optional(),
    arguments:   z.record(z.string(), ArgumentSchema).default({}),
    forms:       z.array(VerbNameSchema).default([]),
});

// ─── Categories, captures, intents ────────────────────────────────────────────

export const CategorySchema = z.object({
    description: z.string().default(''),
    verbs:       z.array(z.string()).default([]),
    color:       z.string().default('#9E9E9E'),
    icon:        z.string().default(''),
});

export const CaptureSchema = z.object({
    key:  z.string().min(1),
    form: z.string().min(1),
});

export const IntentSchema = z.object({
    phrase:   z.string().min(1).transform((s: string): string => s.toLowerCase()),
    verb:     VerbNameSchema,
    pattern:  z.string().default('basic'),
    template: z.string().min(1),
    defaults: z.record(z.string(), z.string()).default({}),
});

// ─── Manifest ─────────────────────────────────────────────────────────────────

export const VocabularyManifestSchema = z.object({
    domain:      z.string().regex(/^[a-z][a-z0-9_-]*$/, 'domain must be a lowercase identifier'),
    version:     z.string().min(1),
    description: z.string().default(''),
    states:      z.array(z.string().min(1)).min(1, 'at least one state is required'),
    anchor:      z.string().nullable().default(null),
    captures:    z.array(CaptureSchema).default([]),
    keywords:    z.array(z.string().min(1)).default([]),
    categories:  z.record(z.string(), CategorySchema),
    verbs:       z.record(VerbNameSchema, VerbSchema),
    intents:     z.array(IntentSchema).default([]),
    created_at:  z.coerce.date().optional(),
    updated_at:  z.coerce.date().optional(),
});

export type RawVocabularyManifest = z.infer<typeof VocabularyManifestSchema>;
export type RawVerb = z.infer<typeof VerbSchema>;
export type RawArgument = z.infer<typeof ArgumentSchema>;
