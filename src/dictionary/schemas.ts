/**
 * @file Attribute Schemas
 *
 * Zod schemas for dictionary entries loaded from seed files or created
 * through a repository.
 *
 * @module dictionary/schemas
 */

import { z } from 'zod';

const ProvenanceSchema = z.object({
    primary:   z.string().min(1),
    secondary: z.string().min(1).optional(),
});

export const ATTRIBUTE_ID_PATTERN: RegExp = /^[a-fA-F0-9-]{8,36}$/;

export const AttributeInputSchema = z.object({
    id:              z.string().regex(ATTRIBUTE_ID_PATTERN, 'id must be 8-36 hex digits or hyphens').optional(),
    name:            z.string().regex(/^[a-z][a-z0-9_]*(\.[a-z0-9_]+)+$/, 'name must be a dotted lowercase identifier'),
    longDescription: z.string().default(''),
    groupId:         z.string().min(1),
    mask:            z.string().default('string'),
    domain:          z.string().min(1),
    tags:            z.array(z.string()).default([]),
    sensitivity:     z.enum(['PUBLIC', 'INTERNAL', 'CONFIDENTIAL', 'RESTRICTED']).default('INTERNAL'),
    constraints:     z.array(z.string()).default([]),
    source:          ProvenanceSchema,
    sink:            ProvenanceSchema,
});

export const AttributeSeedSchema = z.array(AttributeInputSchema.extend({ id: z.string().regex(ATTRIBUTE_ID_PATTERN) }));
