/**
 * @file Vocabulary Types
 *
 * Declarative model of a domain's DSL: verbs, argument schemas,
 * categories, the ordered state list, context captures and generator
 * intents. Instances are built once from a manifest and frozen.
 *
 * @module dsl/vocabulary/types
 */

export type ArgumentType = 'string' | 'enum' | 'uuid' | 'date' | 'number' | 'boolean' | 'array' | 'object';

/**
 * Schema of one verb argument.
 *
 * @property pattern - Regular expression string values must match.
 * @property values - Accepted values when `type` is `enum`.
 */
export interface ArgumentSpec {
    name: string;
    type: ArgumentType;
    required: boolean;
    description: string;
    pattern?: string;
    values?: readonly string[];
}

/**
 * State effect of a verb appearing in a document.
 *
 * @property to - State reached once the verb is present.
 * @property from - States the verb is expected to follow (informational).
 * @property marker - Boolean context key set when the verb is present.
 */
export interface StateTransition {
    to: string;
    from: readonly string[];
    marker?: string;
}

export interface Verb {
    name: string;
    category: string;
    description: string;
    version: string;
    idempotent: boolean;
    examples: readonly string[];
    transition?: StateTransition;
    arguments: Readonly<Record<string, ArgumentSpec>>;
    /** Dotted sub-form keywords accepted inside this verb, e.g. `resource.create`. */
    forms: readonly string[];
}

export interface Category {
    name: string;
    description: string;
    verbs: readonly string[];
    color: string;
    icon: string;
}

/**
 * Context key populated from the first string argument of a form.
 */
export interface ContextCapture {
    key: string;
    form: string;
}

/**
 * Instruction-to-template binding used by the generator.
 *
 * @property phrase - Lower-case trigger phrase matched as a substring.
 * @property template - DSL text with `{{slot}}` and `{{attr:<id>}}` placeholders.
 * @property defaults - Slot values used when no extractor supplies one.
 */
export interface Intent {
    phrase: string;
    verb: string;
    pattern: string;
    template: string;
    defaults: Readonly<Record<string, string>>;
}

export interface Vocabulary {
    domain: string;
    version: string;
    description: string;
    verbs: Readonly<Record<string, Verb>>;
    categories: Readonly<Record<string, Category>>;
    states: readonly string[];
    /** Context key whose presence alone implies the initial state. */
    anchor: string | null;
    captures: readonly ContextCapture[];
    intents: readonly Intent[];
    /** Keywords mapping free text to this domain when routing. */
    keywords: readonly string[];
    createdAt: Date;
    updatedAt: Date;
}

/**
 * Compact view of a vocabulary for listings and metrics.
 */
export interface VocabularySummary {
    domain: string;
    version: string;
    verbCount: number;
    categoryCount: number;
    stateCount: number;
    intentCount: number;
}
