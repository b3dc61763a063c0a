/**
 * @file DSL Verb Validator
 *
 * Checks a document against a domain vocabulary. Every form at every
 * depth whose head looks like a dotted verb is classified as a
 * vocabulary verb, a keyword (argument name or declared sub-form) or an
 * unknown verb. String contents are never scanned.
 *
 * `verbs_validate` is the fail-fast contract used by domains and the
 * generator; `document_validate` reports every problem at once.
 *
 * @module dsl/validator
 */

import { DslError, dslError_is } from '../../errors/DslError.js';
import { dsl_read, forms_collect, form_args, type DslDocument, type DslNode, type FormNode, type FormVisit, type ReaderIssue } from '../parser/reader.js';
import { keywords_collect, verb_get } from '../vocabulary/loader.js';
import { VERB_NAME_PATTERN } from '../vocabulary/schemas.js';
import type { ArgumentSpec, Verb, Vocabulary } from '../vocabulary/types.js';

export interface ValidationResult {
    valid: boolean;
    errors: string[];
    /** Vocabulary verbs found, in document order. */
    verbs: string[];
}

type HeadClass = 'verb' | 'keyword' | 'unknown' | 'other';

const keywordCache: WeakMap<Vocabulary, Set<string>> = new WeakMap();

function keywords_get(vocabulary: Vocabulary): Set<string> {
    let keywords: Set<string> | undefined = keywordCache.get(vocabulary);
    if (!keywords) {
        keywords = keywords_collect(vocabulary);
        keywordCache.set(vocabulary, keywords);
    }
    return keywords;
}

function head_classify(vocabulary: Vocabulary, head: string | null): HeadClass {
    if (head === null || !VERB_NAME_PATTERN.test(head)) return 'other';
    if (verb_get(vocabulary, head)) return 'verb';
    if (keywords_get(vocabulary).has(head)) return 'keyword';
    return 'unknown';
}

export function verbNotFound_message(vocabulary: Vocabulary, verb: string): string {
    return `invalid ${vocabulary.domain} verb: ${verb}`;
}

/**
 * Validate that a document uses only vocabulary verbs.
 *
 * @returns The vocabulary verbs found, in document order.
 * @throws DslError VERB_NOT_FOUND on the first unknown verb-shaped head.
 * @throws DslError EMPTY_DOCUMENT when no vocabulary verb is present.
 * @throws DslError MALFORMED_DOCUMENT on an unterminated string literal.
 */
export function verbs_validate(vocabulary: Vocabulary, text: string): string[] {
    const verbs: string[] = [];
    for (const visit of forms_collect(dsl_read(text))) {
        const head: string | null = visit.form.head;
        const kind: HeadClass = head_classify(vocabulary, head);
        if (kind === 'unknown' && head !== null) {
            throw new DslError('VERB_NOT_FOUND', verbNotFound_message(vocabulary, head), {
                details: { domain: vocabulary.domain, verb: head, line: visit.form.line, column: visit.form.column },
            });
        }
        if (kind === 'verb' && head !== null) verbs.push(head);
    }
    if (verbs.length === 0) {
        throw new DslError('EMPTY_DOCUMENT', `empty DSL: no ${vocabulary.domain} verb found`, {
            details: { domain: vocabulary.domain },
        });
    }
    return verbs;
}

// ─── Full report ───────────────────────────────────────────────

function at(pos: { line: number; column: number }): string {
    return `${pos.line}:${pos.column}`;
}

function argumentValue_get(form: FormNode): string | undefined {
    const value: DslNode | undefined = form_args(form)[0];
    if (value === undefined) return undefined;
    if (value.kind === 'string' || value.kind === 'symbol' || value.kind === 'number') return value.value;
    return undefined;
}

function arguments_check(verb: Verb, form: FormNode, errors: string[]): void {
    for (const child of form_args(form)) {
        if (child.kind !== 'form' || child.head === null) continue;
        const spec: ArgumentSpec | undefined = Object.prototype.hasOwnProperty.call(verb.arguments, child.head)
            ? verb.arguments[child.head]
            : undefined;
        if (!spec) continue;
        const value: string | undefined = argumentValue_get(child);
        if (value === undefined) continue;

        if (spec.type === 'enum' && spec.values && !spec.values.includes(value)) {
            errors.push(`${at(child)} argument ${spec.name} of ${verb.name}: "${value}" is not one of ${spec.values.join(', ')}`);
        }
        if (spec.pattern !== undefined && !new RegExp(spec.pattern).test(value)) {
            errors.push(`${at(child)} argument ${spec.name} of ${verb.name}: "${value}" does not match ${spec.pattern}`);
        }
    }
}

/**
 * Validate a document and report every problem found: structural issues,
 * unknown verbs, enum and pattern violations of verb arguments, and the
 * absence of any vocabulary verb.
 */
export function document_validate(vocabulary: Vocabulary, text: string): ValidationResult {
    let document: DslDocument;
    try {
        document = dsl_read(text);
    } catch (e: unknown) {
        if (dslError_is(e, 'MALFORMED_DOCUMENT')) {
            return { valid: false, errors: [e.message], verbs: [] };
        }
        throw e;
    }

    const errors: string[] = document.issues.map((issue: ReaderIssue): string => `${at(issue)} ${issue.message}`);
    const verbs: string[] = [];

    for (const visit of forms_collect(document)) {
        const head: string | null = visit.form.head;
        if (head === null) continue;
        switch (head_classify(vocabulary, head)) {
            case 'unknown':
                errors.push(`${at(visit.form)} ${verbNotFound_message(vocabulary, head)}`);
                break;
            case 'verb': {
                verbs.push(head);
                const verb: Verb | undefined = verb_get(vocabulary, head);
                if (verb) arguments_check(verb, visit.form, errors);
                break;
            }
            default:
                break;
        }
    }

    if (verbs.length === 0) {
        errors.push(`empty DSL: no ${vocabulary.domain} verb found`);
    }

    return { valid: errors.length === 0, errors, verbs };
}

/**
 * Vocabulary verbs present in a document, in document order, without
 * rejecting unknown ones. Used by context extraction and routing.
 */
export function verbs_present(vocabulary: Vocabulary, document: DslDocument): FormVisit[] {
    return forms_collect(document).filter(
        (visit: FormVisit): boolean => head_classify(vocabulary, visit.form.head) === 'verb',
    );
}
