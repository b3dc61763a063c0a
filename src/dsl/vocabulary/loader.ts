/**
 * @file Vocabulary Loader
 *
 * Parses YAML vocabulary manifests into frozen `Vocabulary` objects.
 * Structural validation goes through zod; cross-section rules (category
 * membership, transition targets, intent verbs) are checked here and
 * reported together.
 *
 * @module dsl/vocabulary/loader
 */

import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import yaml from 'js-yaml';
import type { ZodIssue } from 'zod';
import { DslError, errorMessage_get } from '../../errors/DslError.js';
import { VocabularyManifestSchema, type RawArgument, type RawVerb, type RawVocabularyManifest } from './schemas.js';
import type { ArgumentSpec, Category, Verb, Vocabulary, VocabularySummary } from './types.js';

// ─── Manifest Registry ─────────────────────────────────────────

/** Resolve path relative to this module's directory. */
function modulePath_resolve(relativePath: string): string {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = dirname(__filename);
    return resolve(__dirname, relativePath);
}

/** Bundled vocabulary manifests keyed by domain name. */
const MANIFEST_REGISTRY: Record<string, string> = {
    onboarding: modulePath_resolve('../../../manifests/onboarding.vocabulary.yaml'),
    ubo: modulePath_resolve('../../../manifests/ubo.vocabulary.yaml'),
};

/**
 * Names of the bundled vocabularies.
 */
export function vocabularies_available(): string[] {
    return Object.keys(MANIFEST_REGISTRY).sort();
}

/**
 * Load and parse a bundled vocabulary by domain name.
 *
 * @throws DslError VOCABULARY_INVALID when the name is unknown or the manifest is invalid.
 */
export function vocabulary_load(domain: string): Vocabulary {
    const manifestPath: string | undefined = MANIFEST_REGISTRY[domain];
    if (!manifestPath) {
        const available: string = vocabularies_available().join(', ');
        throw new DslError('VOCABULARY_INVALID', `Vocabulary '${domain}' not found. Available: ${available}`, {
            details: { domain },
        });
    }
    return vocabulary_parse(readFileSync(manifestPath, 'utf-8'));
}

// ─── Parsing ───────────────────────────────────────────────────

/**
 * Parse a YAML manifest string into a frozen Vocabulary.
 *
 * @throws DslError VOCABULARY_INVALID listing every violation found.
 */
export function vocabulary_parse(yamlStr: string): Vocabulary {
    let raw: unknown;
    try {
        raw = yaml.load(yamlStr);
    } catch (e: unknown) {
        throw new DslError('VOCABULARY_INVALID', `Invalid vocabulary: ${errorMessage_get(e)}`, { cause: e });
    }

    const result = VocabularyManifestSchema.safeParse(raw);
    if (!result.success) {
        const issues: string = result.error.issues
            .map((i: ZodIssue): string => `[${i.path.join('.')}] ${i.message}`)
            .join('; ');
        throw new DslError('VOCABULARY_INVALID', `Invalid vocabulary: ${issues}`, {
            details: { issues: result.error.issues.length },
        });
    }

    const manifest: RawVocabularyManifest = result.data;
    const problems: string[] = crossReferences_check(manifest);
    if (problems.length > 0) {
        throw new DslError('VOCABULARY_INVALID', `Invalid vocabulary '${manifest.domain}': ${problems.join('; ')}`, {
            details: { domain: manifest.domain, problems },
        });
    }

    return deep_freeze(vocabulary_build(manifest));
}

function crossReferences_check(manifest: RawVocabularyManifest): string[] {
    const problems: string[] = [];
    const states: Set<string> = new Set(manifest.states);

    if (states.size !== manifest.states.length) {
        problems.push('states must be unique');
    }

    for (const [verbName, verb] of Object.entries(manifest.verbs)) {
        const category: RawVocabularyManifest['categories'][string] | undefined = manifest.categories[verb.category];
        if (!category) {
            problems.push(`verb ${verbName} references unknown category ${verb.category}`);
        } else if (!category.verbs.includes(verbName)) {
            problems.push(`verb ${verbName} is not listed in category ${verb.category}`);
        }
        if (verb.transition) {
            if (!states.has(verb.transition.to)) {
                problems.push(`verb ${verbName} transitions to unknown state ${verb.transition.to}`);
            }
            for (const from of verb.transition.from) {
                if (!states.has(from)) problems.push(`verb ${verbName} transitions from unknown state ${from}`);
            }
        }
    }

    for (const [categoryName, category] of Object.entries(manifest.categories)) {
        for (const verbName of category.verbs) {
            const verb: RawVerb | undefined = manifest.verbs[verbName];
            if (!verb) {
                problems.push(`category ${categoryName} lists unknown verb ${verbName}`);
            } else if (verb.category !== categoryName) {
                problems.push(`category ${categoryName} lists verb ${verbName} owned by ${verb.category}`);
            }
        }
    }

    manifest.intents.forEach((intent, index: number): void => {
        if (!manifest.verbs[intent.verb]) {
            problems.push(`intent ${index} (${intent.phrase}) references unknown verb ${intent.verb}`);
        }
    });

    if (manifest.anchor !== null && !manifest.captures.some((c) => c.key === manifest.anchor)) {
        problems.push(`anchor ${manifest.anchor} has no capture`);
    }

    return problems;
}

function argument_build(name: string, raw: RawArgument): ArgumentSpec {
    const spec: ArgumentSpec = {
        name,
        type: raw.type,
        required: raw.required,
        description: raw.description,
    };
    if (raw.pattern !== undefined) spec.pattern = raw.pattern;
    if (raw.values !== undefined) spec.values = [...raw.values];
    return spec;
}

function verb_build(name: string, raw: RawVerb): Verb {
    const args: Record<string, ArgumentSpec> = {};
    for (const [argName, argRaw] of Object.entries(raw.arguments)) {
        args[argName] = argument_build(argName, argRaw);
    }
    const verb: Verb = {
        name,
        category: raw.category,
        description: raw.description,
        version: raw.version,
        idempotent: raw.idempotent,
        examples: [...raw.examples],
        arguments: args,
        forms: [...raw.forms],
    };
    if (raw.transition) {
        verb.transition = { to: raw.transition.to, from: [...raw.transition.from] };
        if (raw.transition.marker !== undefined) verb.transition.marker = raw.transition.marker;
    }
    return verb;
}

function vocabulary_build(manifest: RawVocabularyManifest): Vocabulary {
    const verbs: Record<string, Verb> = {};
    for (const [name, raw] of Object.entries(manifest.verbs)) {
        verbs[name] = verb_build(name, raw);
    }

    const categories: Record<string, Category> = {};
    for (const [name, raw] of Object.entries(manifest.categories)) {
        categories[name] = { name, description: raw.description, verbs: [...raw.verbs], color: raw.color, icon: raw.icon };
    }

    const now: Date = new Date();
    return {
        domain: manifest.domain,
        version: manifest.version,
        description: manifest.description,
        verbs,
        categories,
        states: [...manifest.states],
        anchor: manifest.anchor,
        captures: manifest.captures.map((c) => ({ ...c })),
        intents: manifest.intents.map((i) => ({ ...i, defaults: { ...i.defaults } })),
        keywords: [...manifest.keywords],
        createdAt: manifest.created_at ?? now,
        updatedAt: manifest.updated_at ?? now,
    };
}

/** Recursively freeze objects and arrays. */
function deep_freeze<T>(value: T): T {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deep_freeze(child);
        }
    }
    return value;
}

// ─── Queries ───────────────────────────────────────────────────

export function verb_get(vocabulary: Vocabulary, name: string): Verb | undefined {
    return Object.prototype.hasOwnProperty.call(vocabulary.verbs, name) ? vocabulary.verbs[name] : undefined;
}

/**
 * Verbs belonging to one category, in category order.
 */
export function verbs_inCategory(vocabulary: Vocabulary, category: string): Verb[] {
    const entry: Category | undefined = vocabulary.categories[category];
    if (!entry) return [];
    return entry.verbs
        .map((name: string): Verb | undefined => verb_get(vocabulary, name))
        .filter((v: Verb | undefined): v is Verb => v !== undefined);
}

/**
 * Dotted keywords that may head a nested form without being verbs:
 * every argument name and every declared sub-form.
 */
export function keywords_collect(vocabulary: Vocabulary): Set<string> {
    const keywords: Set<string> = new Set();
    for (const verb of Object.values(vocabulary.verbs)) {
        for (const argName of Object.keys(verb.arguments)) keywords.add(argName);
        for (const form of verb.forms) keywords.add(form);
    }
    return keywords;
}

export function vocabulary_summarize(vocabulary: Vocabulary): VocabularySummary {
    return {
        domain: vocabulary.domain,
        version: vocabulary.version,
        verbCount: Object.keys(vocabulary.verbs).length,
        categoryCount: Object.keys(vocabulary.categories).length,
        stateCount: vocabulary.states.length,
        intentCount: vocabulary.intents.length,
    };
}
