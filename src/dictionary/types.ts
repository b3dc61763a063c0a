/**
 * @file Attribute Dictionary Types
 *
 * Attributes are the typed data points a DSL document refers to through
 * `@attr{<id>}`. The dictionary that stores them is an external
 * collaborator reached through `DictionaryRepository`.
 *
 * @module dictionary/types
 */

export type Sensitivity = 'PUBLIC' | 'INTERNAL' | 'CONFIDENTIAL' | 'RESTRICTED';

export interface Provenance {
    primary: string;
    secondary?: string;
}

/**
 * One dictionary entry.
 *
 * @property id - UUID used in `@attr{…}` references.
 * @property name - Dotted semantic name, e.g. `custody.account_number`.
 * @property mask - Value type tag such as `string` or `decimal`.
 * @property constraints - Free-form validation rules for bound values.
 */
export interface Attribute {
    id: string;
    name: string;
    longDescription: string;
    groupId: string;
    mask: string;
    domain: string;
    tags: string[];
    sensitivity: Sensitivity;
    constraints: string[];
    source: Provenance;
    sink: Provenance;
}

export type AttributeInput = Omit<Attribute, 'id'> & { id?: string };

export type AttributePatch = Partial<Omit<Attribute, 'id'>>;

/**
 * Search filter; all given fields must match.
 *
 * @property namePrefix - Prefix of the dotted name.
 */
export interface AttributeQuery {
    namePrefix?: string;
    domain?: string;
    groupId?: string;
    tag?: string;
}

export interface LookupOptions {
    signal?: AbortSignal;
}

/**
 * Backend-agnostic attribute dictionary. Every call honours an optional
 * abort signal; an aborted call rejects.
 */
export interface DictionaryRepository {
    /** @throws DslError ATTRIBUTE_NOT_FOUND when the id has no entry. */
    attribute_get(id: string, options?: LookupOptions): Promise<Attribute>;
    attributes_list(options?: LookupOptions): Promise<Attribute[]>;
    attributes_search(query: AttributeQuery, options?: LookupOptions): Promise<Attribute[]>;
    attribute_create(input: AttributeInput, options?: LookupOptions): Promise<Attribute>;
    attribute_update(id: string, patch: AttributePatch, options?: LookupOptions): Promise<Attribute>;
    attribute_delete(id: string, options?: LookupOptions): Promise<void>;
}
