/**
 * @file DSL Generator
 *
 * Template-driven generation of DSL fragments from free-text
 * instructions. A domain's vocabulary declares ordered intents (trigger
 * phrase, template, slot defaults); the domain contributes slot
 * extractors that read values out of the instruction or its context.
 *
 * Placeholders:
 *   - `{{slot}}`: extractor value, else a string in the request
 *     context under the same key, else the intent default.
 *   - `{{attr:<id>}}`: an attribute reference built by the resolver,
 *     annotated when the dictionary knows the id.
 *
 * Output is checked with the owning domain's verb validator before it
 * is returned.
 *
 * @module generator/DslGenerator
 */

import { DslError, errorMessage_get } from '../errors/DslError.js';
import type { AttributeResolver, ResolveOptions } from '../dictionary/AttributeResolver.js';
import { dsl_read, forms_collect, type FormVisit } from '../dsl/parser/reader.js';
import type { Intent, Vocabulary } from '../dsl/vocabulary/types.js';
import type { TelemetryBus } from '../telemetry/TelemetryBus.js';

export interface GenerationRequest {
    instruction: string;
    context?: Record<string, unknown>;
}

export interface GenerationParameters {
    pattern: string;
    intent: string;
    generatedAt: string;
    slots: Record<string, string>;
}

export interface GenerationResponse {
    dsl: string;
    verb: string;
    parameters: GenerationParameters;
}

/** Lists render as space-separated string literals. */
export type SlotValue = string | readonly string[];

export type SlotExtractor = (request: GenerationRequest, now: Date) => SlotValue | undefined;

export interface DslGeneratorOptions {
    resolver: AttributeResolver;
    /** Throws when generated text is not valid for the domain. */
    validate: (dsl: string) => void;
    extractors?: Readonly<Record<string, SlotExtractor>>;
    bus?: TelemetryBus;
    now?: () => Date;
}

const SLOT_PATTERN: RegExp = /\{\{([a-z_][a-z0-9_]*)\}\}/g;
const ATTR_SLOT_PATTERN: RegExp = /\{\{attr:([a-fA-F0-9-]{8,36})\}\}/g;

/**
 * Escape a value for use inside a DSL string literal.
 */
export function dslString_escape(value: string): string {
    return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

function slotValue_render(value: SlotValue): string {
    if (typeof value === 'string') return dslString_escape(value);
    return value.map((v: string): string => `"${dslString_escape(v)}"`).join(' ');
}

export class DslGenerator {
    private readonly vocabulary: Vocabulary;
    private readonly resolver: AttributeResolver;
    private readonly validate: (dsl: string) => void;
    private readonly extractors: Readonly<Record<string, SlotExtractor>>;
    private readonly bus: TelemetryBus | null;
    private readonly now: () => Date;

    constructor(vocabulary: Vocabulary, options: DslGeneratorOptions) {
        this.vocabulary = vocabulary;
        this.resolver = options.resolver;
        this.validate = options.validate;
        this.extractors = options.extractors ?? {};
        this.bus = options.bus ?? null;
        this.now = options.now ?? ((): Date => new Date());
    }

    intents_list(): readonly Intent[] {
        return this.vocabulary.intents;
    }

    /**
     * First intent whose phrase occurs in the instruction, case-insensitively.
     */
    intent_match(instruction: string): Intent | undefined {
        const lowered: string = instruction.toLowerCase();
        return this.vocabulary.intents.find((intent: Intent): boolean => lowered.includes(intent.phrase));
    }

    /**
     * Generate a DSL fragment for an instruction.
     *
     * @throws DslError INVALID_REQUEST for a missing or blank instruction.
     * @throws DslError UNSUPPORTED_INSTRUCTION when no intent matches.
     * @throws DslError GENERATION_FAILED when the rendered text does not validate.
     */
    async dsl_generate(request: GenerationRequest | null | undefined, options: ResolveOptions = {}): Promise<GenerationResponse> {
        if (!request || request.instruction.trim() === '') {
            throw new DslError('INVALID_REQUEST', 'empty generation request');
        }

        const intent: Intent | undefined = this.intent_match(request.instruction);
        if (!intent) {
            throw new DslError(
                'UNSUPPORTED_INSTRUCTION',
                `unsupported ${this.vocabulary.domain} instruction: ${request.instruction}`,
                { details: { domain: this.vocabulary.domain } },
            );
        }

        const now: Date = this.now();
        const slots: Record<string, string> = {};
        const withSlots: string = this.slots_fill(intent, request, now, slots);
        const dsl: string = await this.attributeSlots_fill(withSlots, options);

        try {
            this.validate(dsl);
        } catch (e: unknown) {
            throw new DslError('GENERATION_FAILED', `generated invalid DSL: ${errorMessage_get(e)}`, {
                details: { intent: intent.phrase },
                cause: e,
            });
        }

        const verb: string = this.verb_extract(dsl) ?? intent.verb;
        this.bus?.emit({ type: 'dsl_generated', domain: this.vocabulary.domain, verb, intent: intent.phrase });

        return {
            dsl,
            verb,
            parameters: {
                pattern: intent.pattern,
                intent: intent.phrase,
                generatedAt: now.toISOString(),
                slots,
            },
        };
    }

    private slot_resolve(name: string, intent: Intent, request: GenerationRequest, now: Date): SlotValue {
        const extractor: SlotExtractor | undefined = this.extractors[name];
        const extracted: SlotValue | undefined = extractor ? extractor(request, now) : undefined;
        if (extracted !== undefined) return extracted;

        const fromContext: unknown = request.context?.[name];
        if (typeof fromContext === 'string' && fromContext !== '') return fromContext;

        const fallback: string | undefined = intent.defaults[name];
        if (fallback !== undefined) return fallback;

        throw new DslError('GENERATION_FAILED', `no value for template slot ${name}`, {
            details: { intent: intent.phrase, slot: name },
        });
    }

    private slots_fill(intent: Intent, request: GenerationRequest, now: Date, slots: Record<string, string>): string {
        return intent.template.replace(SLOT_PATTERN, (_match: string, name: string): string => {
            const rendered: string = slotValue_render(this.slot_resolve(name, intent, request, now));
            slots[name] = rendered;
            return rendered;
        });
    }

    private async attributeSlots_fill(template: string, options: ResolveOptions): Promise<string> {
        const ids: string[] = [...new Set([...template.matchAll(ATTR_SLOT_PATTERN)].map((m: RegExpMatchArray): string => m[1]))];
        const references: Map<string, string> = new Map();
        for (const id of ids) {
            references.set(id, await this.resolver.reference_generate(id, options));
        }
        return template.replace(ATTR_SLOT_PATTERN, (match: string, id: string): string => references.get(id) ?? match);
    }

    private verb_extract(dsl: string): string | undefined {
        const first: FormVisit | undefined = forms_collect(dsl_read(dsl)).find(
            (visit: FormVisit): boolean => visit.form.head !== null,
        );
        return first?.form.head ?? undefined;
    }
}
