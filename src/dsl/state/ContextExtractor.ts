/**
 * @file Context Extractor
 *
 * Derives a workflow context from accumulated DSL: captured values from
 * well-known argument forms, a boolean marker per transitioning verb
 * present, and the most advanced state reached.
 *
 * @module dsl/state/ContextExtractor
 */

import { dsl_read, form_firstString, forms_collect, type DslDocument, type FormVisit } from '../parser/reader.js';
import { verb_get } from '../vocabulary/loader.js';
import type { Verb, Vocabulary } from '../vocabulary/types.js';
import { verbs_present } from '../validator/validator.js';
import { CURRENT_STATE_KEY, StateMachine } from './StateMachine.js';

export type ExtractedContext = Record<string, string | boolean>;

export class ContextExtractor {
    private readonly vocabulary: Vocabulary;
    private readonly machine: StateMachine;

    constructor(vocabulary: Vocabulary, machine?: StateMachine) {
        this.vocabulary = vocabulary;
        this.machine = machine ?? new StateMachine(vocabulary);
    }

    /**
     * Extract context from DSL text. Blank text yields `{}`; unbalanced
     * brackets are tolerated.
     *
     * @throws DslError MALFORMED_DOCUMENT on an unterminated string literal.
     */
    context_extract(text: string): ExtractedContext {
        if (text.trim() === '') return {};

        const document: DslDocument = dsl_read(text);
        const context: ExtractedContext = {};
        this.captures_apply(document, context);

        const verbs: Verb[] = verbs_present(this.vocabulary, document)
            .map((visit: FormVisit): Verb | undefined => visit.form.head === null ? undefined : verb_get(this.vocabulary, visit.form.head))
            .filter((v: Verb | undefined): v is Verb => v !== undefined);

        for (const verb of verbs) {
            const marker: string | undefined = verb.transition?.marker;
            if (marker !== undefined) context[marker] = true;
        }

        const reached: string | null = this.machine.stateReached_resolve(verbs);
        if (reached !== null) {
            context[CURRENT_STATE_KEY] = reached;
        } else if (this.vocabulary.anchor !== null && context[this.vocabulary.anchor] !== undefined) {
            context[CURRENT_STATE_KEY] = this.machine.state_initial();
        }

        return context;
    }

    private captures_apply(document: DslDocument, context: ExtractedContext): void {
        const visits: FormVisit[] = forms_collect(document);
        for (const capture of this.vocabulary.captures) {
            for (const visit of visits) {
                if (visit.form.head !== capture.form) continue;
                const value: string | undefined = form_firstString(visit.form);
                if (value === undefined) continue;
                context[capture.key] = value;
                break;
            }
        }
    }
}
