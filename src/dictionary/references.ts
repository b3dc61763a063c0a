/**
 * @file Attribute Reference Syntax
 *
 * `@attr{<id>}` or `@attr{<id>:<semantic-name>}`. The id is 8 to 36 hex
 * digits or hyphens. An embedded name is an annotation: it is carried
 * as-is and never checked against the dictionary again.
 *
 * @module dictionary/references
 */

import { ATTRIBUTE_ID_PATTERN } from './schemas.js';

const REFERENCE_SOURCE = '@attr\\{([a-fA-F0-9-]{8,36})(?::([^}]+))?\\}' as const;
const UNNAMED_REFERENCE_SOURCE = '@attr\\{([a-fA-F0-9-]{8,36})\\}' as const;

export interface AttributeReference {
    id: string;
    name: string | null;
    /** Matched source text. */
    text: string;
    offset: number;
}

export function attributeId_isValid(id: string): boolean {
    return ATTRIBUTE_ID_PATTERN.test(id);
}

/**
 * Render a reference, annotated when a name is given.
 */
export function reference_format(id: string, name?: string | null): string {
    return name ? `@attr{${id}:${name}}` : `@attr{${id}}`;
}

/**
 * All references in document order.
 */
export function references_extract(text: string): AttributeReference[] {
    const pattern: RegExp = new RegExp(REFERENCE_SOURCE, 'g');
    return [...text.matchAll(pattern)].map((m: RegExpMatchArray): AttributeReference => ({
        id: m[1],
        name: m[2] ?? null,
        text: m[0],
        offset: m.index ?? 0,
    }));
}

/**
 * Distinct ids of references that carry no name, in first-seen order.
 */
export function unnamedIds_collect(text: string): string[] {
    const pattern: RegExp = new RegExp(UNNAMED_REFERENCE_SOURCE, 'g');
    const ids: string[] = [...text.matchAll(pattern)].map((m: RegExpMatchArray): string => m[1]);
    return [...new Set(ids)];
}

/**
 * Replace each unnamed reference whose id has an entry in `names`.
 * Named references are left untouched.
 */
export function unnamedReferences_replace(text: string, names: ReadonlyMap<string, string>): string {
    const pattern: RegExp = new RegExp(UNNAMED_REFERENCE_SOURCE, 'g');
    return text.replace(pattern, (match: string, id: string): string => {
        const name: string | undefined = names.get(id);
        return name === undefined ? match : reference_format(id, name);
    });
}
