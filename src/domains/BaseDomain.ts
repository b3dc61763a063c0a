/**
 * @file Vocabulary-Driven Domain
 *
 * Shared implementation of the Domain contract. A concrete domain
 * supplies its vocabulary and slot extractors; validation, state
 * handling, context extraction, generation, attribute resolution and
 * metrics all derive from those.
 *
 * @module domains/BaseDomain
 */

import type { SettingsService } from '../config/settings.js';
import { AttributeResolver, type ResolveOptions } from '../dictionary/AttributeResolver.js';
import type { DictionaryRepository } from '../dictionary/types.js';
import { ContextExtractor, type ExtractedContext } from '../dsl/state/ContextExtractor.js';
import { CURRENT_STATE_KEY, StateMachine, type DslContext } from '../dsl/state/StateMachine.js';
import { document_validate, verbs_validate, type ValidationResult } from '../dsl/validator/validator.js';
import type { Vocabulary } from '../dsl/vocabulary/types.js';
import { DslGenerator, type GenerationRequest, type GenerationResponse, type SlotExtractor } from '../generator/DslGenerator.js';
import { dslError_is, errorMessage_get } from '../errors/DslError.js';
import { NULL_LOGGER, type TelemetryBus } from '../telemetry/TelemetryBus.js';
import type { Logger } from '../telemetry/types.js';
import type { Domain, DomainMetrics } from './types.js';

export interface DomainOptions {
    /** Replaces the bundled vocabulary. */
    vocabulary?: Vocabulary;
    repository?: DictionaryRepository | null;
    /** Shared resolver; when given, `repository` is ignored. */
    resolver?: AttributeResolver;
    settings?: SettingsService;
    bus?: TelemetryBus;
    now?: () => Date;
}

export interface BaseDomainConfig extends DomainOptions {
    vocabulary: Vocabulary;
    extractors?: Readonly<Record<string, SlotExtractor>>;
}

function counter_increment(counters: Record<string, number>, key: string): void {
    counters[key] = (counters[key] ?? 0) + 1;
}

function errorCode_of(error: unknown): string {
    return dslError_is(error) ? error.code : 'UNKNOWN';
}

export abstract class BaseDomain implements Domain {
    readonly name: string;
    readonly version: string;
    readonly description: string;

    protected readonly vocabulary: Vocabulary;
    protected readonly machine: StateMachine;
    protected readonly extractor: ContextExtractor;
    protected readonly resolver: AttributeResolver;
    protected readonly generator: DslGenerator;
    protected readonly bus: TelemetryBus | null;
    protected readonly log: Logger;

    private readonly now: () => Date;
    private readonly startedAt: Date;
    private lastHealthCheck: Date;
    private healthy: boolean = true;

    private totalRequests: number = 0;
    private successfulRequests: number = 0;
    private failedRequests: number = 0;
    private readonly seenVerbs: Set<string> = new Set();
    private readonly stateTransitions: Record<string, number> = {};
    private readonly currentStates: Record<string, number> = {};
    private readonly validationErrors: Record<string, number> = {};
    private readonly generationErrors: Record<string, number> = {};

    protected constructor(config: BaseDomainConfig) {
        this.vocabulary = config.vocabulary;
        this.name = config.vocabulary.domain;
        this.version = config.vocabulary.version;
        this.description = config.vocabulary.description;
        this.bus = config.bus ?? null;
        this.log = this.bus ? this.bus.logger_create(`domain:${this.name}`) : NULL_LOGGER;
        this.now = config.now ?? ((): Date => new Date());
        this.startedAt = this.now();
        this.lastHealthCheck = this.startedAt;

        this.machine = new StateMachine(this.vocabulary);
        this.extractor = new ContextExtractor(this.vocabulary, this.machine);
        this.resolver = config.resolver ?? new AttributeResolver({
            repository: config.repository ?? null,
            settings: config.settings,
            bus: config.bus,
        });
        this.generator = new DslGenerator(this.vocabulary, {
            resolver: this.resolver,
            validate: (dsl: string): void => {
                verbs_validate(this.vocabulary, dsl);
            },
            extractors: config.extractors,
            bus: config.bus,
            now: this.now,
        });
    }

    // ─── Description ───────────────────────────────────────────

    health_get(): boolean {
        this.lastHealthCheck = this.now();
        return this.healthy;
    }

    /** Mark the domain unhealthy, e.g. after its dictionary becomes unreachable. */
    health_set(healthy: boolean): void {
        this.healthy = healthy;
        this.lastHealthCheck = this.now();
    }

    vocabulary_get(): Vocabulary {
        return this.vocabulary;
    }

    states_list(): readonly string[] {
        return this.machine.states_list();
    }

    state_initial(): string {
        return this.machine.state_initial();
    }

    resolver_get(): AttributeResolver {
        return this.resolver;
    }

    // ─── Validation & state ────────────────────────────────────

    verbs_validate(text: string): string[] {
        this.totalRequests++;
        try {
            const verbs: string[] = verbs_validate(this.vocabulary, text);
            this.successfulRequests++;
            for (const verb of verbs) this.seenVerbs.add(verb);
            return verbs;
        } catch (e: unknown) {
            this.failedRequests++;
            counter_increment(this.validationErrors, errorCode_of(e));
            this.bus?.emit({ type: 'validation_failed', domain: this.name, code: errorCode_of(e), message: errorMessage_get(e) });
            throw e;
        }
    }

    document_validate(text: string): ValidationResult {
        const result: ValidationResult = document_validate(this.vocabulary, text);
        if (!result.valid) {
            this.log.debug('document has validation errors', { count: result.errors.length });
        }
        return result;
    }

    transition_validate(from: string, to: string): void {
        this.machine.transition_validate(from, to);
        counter_increment(this.stateTransitions, `${from}->${to}`);
    }

    path_resolve(from: string, to: string): string[] {
        return this.machine.path_resolve(from, to);
    }

    state_current(context: DslContext | null | undefined): string {
        const state: string = this.machine.state_current(context);
        counter_increment(this.currentStates, state);
        return state;
    }

    context_extract(text: string): ExtractedContext {
        const context: ExtractedContext = this.extractor.context_extract(text);
        const state: string | boolean | undefined = context[CURRENT_STATE_KEY];
        if (typeof state === 'string') counter_increment(this.currentStates, state);
        return context;
    }

    // ─── Generation ────────────────────────────────────────────

    async dsl_generate(request: GenerationRequest | null | undefined, options: ResolveOptions = {}): Promise<GenerationResponse> {
        this.totalRequests++;
        try {
            const response: GenerationResponse = await this.generator.dsl_generate(request, options);
            this.successfulRequests++;
            return response;
        } catch (e: unknown) {
            this.failedRequests++;
            counter_increment(this.generationErrors, errorCode_of(e));
            throw e;
        }
    }

    // ─── Attributes ────────────────────────────────────────────

    attributeName_resolve(id: string, options?: ResolveOptions): Promise<string> {
        return this.resolver.attributeName_resolve(id, options);
    }

    attributes_resolveByIds(ids: readonly string[], options?: ResolveOptions): Promise<Map<string, string>> {
        return this.resolver.attributes_resolveByIds(ids, options);
    }

    dsl_enhance(text: string, options?: ResolveOptions): Promise<string> {
        return this.resolver.dsl_enhance(text, options);
    }

    reference_generate(id: string, options?: ResolveOptions): Promise<string> {
        return this.resolver.reference_generate(id, options);
    }

    references_validate(text: string, options?: ResolveOptions): Promise<void> {
        return this.resolver.references_validate(text, options);
    }

    // ─── Metrics ───────────────────────────────────────────────

    metrics_get(): DomainMetrics {
        const now: Date = this.now();
        const totalVerbs: number = Object.keys(this.vocabulary.verbs).length;
        return {
            domain: this.name,
            version: this.version,
            totalRequests: this.totalRequests,
            successfulRequests: this.successfulRequests,
            failedRequests: this.failedRequests,
            totalVerbs,
            activeVerbs: this.seenVerbs.size,
            unusedVerbs: totalVerbs - this.seenVerbs.size,
            stateTransitions: { ...this.stateTransitions },
            currentStates: { ...this.currentStates },
            validationErrors: { ...this.validationErrors },
            generationErrors: { ...this.generationErrors },
            isHealthy: this.healthy,
            lastHealthCheck: this.lastHealthCheck.toISOString(),
            uptimeSeconds: Math.max(0, Math.floor((now.getTime() - this.startedAt.getTime()) / 1000)),
            memoryUsageBytes: JSON.stringify(this.vocabulary).length * 2,
            collectedAt: now.toISOString(),
        };
    }
}
