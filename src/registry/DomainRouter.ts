/**
 * @file Domain Router
 *
 * Deterministic routing of a free-text message (optionally with DSL and
 * session context) to one registered domain. Strategies are tried in
 * priority order:
 *
 *   1. explicit   `switch to <name> domain`
 *   2. dsl_verb   the domain owning most verbs in the DSL
 *   3. context    anchor/capture keys and a known `current_state`
 *   4. keyword    the domain's routing keywords found in the message
 *   5. default    the configured default domain
 *   6. fallback   the alphabetically first registered domain
 *
 * @module registry/DomainRouter
 */

import { dsl_read, type DslDocument, type FormVisit } from '../dsl/parser/reader.js';
import { CURRENT_STATE_KEY, type DslContext } from '../dsl/state/StateMachine.js';
import { verbs_present } from '../dsl/validator/validator.js';
import type { ContextCapture, Vocabulary } from '../dsl/vocabulary/types.js';
import { DslError, dslError_is } from '../errors/DslError.js';
import { NULL_LOGGER, type TelemetryBus } from '../telemetry/TelemetryBus.js';
import type { Logger } from '../telemetry/types.js';
import type { DomainRegistry } from './DomainRegistry.js';

export const ROUTING_STRATEGIES = ['explicit', 'dsl_verb', 'context', 'keyword', 'default', 'fallback'] as const;

export type RoutingStrategy = (typeof ROUTING_STRATEGIES)[number];

export interface RoutingRequest {
    message: string;
    /** Accumulated or proposed DSL; the message itself is scanned when absent. */
    dsl?: string;
    context?: DslContext;
}

export interface RoutingResult {
    domainName: string;
    strategy: RoutingStrategy;
    confidence: number;
    matchedKeywords: string[];
}

export interface RoutingMetrics {
    totalRoutes: number;
    byStrategy: Record<RoutingStrategy, number>;
    byDomain: Record<string, number>;
    averageConfidence: number;
}

export interface DomainRouterOptions {
    defaultDomain?: string;
    bus?: TelemetryBus;
}

const CONFIDENCE: Record<RoutingStrategy, number> = {
    explicit: 1.0,
    dsl_verb: 0.95,
    context: 0.8,
    keyword: 0.7,
    default: 0.5,
    fallback: 0.1,
};

const EXPLICIT_SWITCH: RegExp = /\bswitch\s+to\s+([a-z][a-z0-9_-]*)\s+domain\b/i;

interface Candidate {
    domainName: string;
    score: number;
    /** Tie-breaker; higher wins. */
    weight: number;
    matched: string[];
}

/**
 * Highest score, then highest weight, then name order.
 */
function candidate_best(candidates: readonly Candidate[]): Candidate | null {
    let best: Candidate | null = null;
    for (const candidate of candidates) {
        if (candidate.score <= 0) continue;
        if (
            !best ||
            candidate.score > best.score ||
            (candidate.score === best.score && candidate.weight > best.weight)
        ) {
            best = candidate;
        }
    }
    return best;
}

function strategyCounters_create(): Record<RoutingStrategy, number> {
    return { explicit: 0, dsl_verb: 0, context: 0, keyword: 0, default: 0, fallback: 0 };
}

export class DomainRouter {
    private readonly registry: DomainRegistry;
    private readonly defaultDomain: string | null;
    private readonly log: Logger;
    private byStrategy: Record<RoutingStrategy, number> = strategyCounters_create();
    private byDomain: Record<string, number> = {};
    private totalRoutes: number = 0;
    private confidenceSum: number = 0;

    constructor(registry: DomainRegistry, options: DomainRouterOptions = {}) {
        this.registry = registry;
        this.defaultDomain = options.defaultDomain ?? null;
        this.log = options.bus ? options.bus.logger_create('router') : NULL_LOGGER;
    }

    /**
     * Pick a domain for a message.
     *
     * @throws DslError INVALID_REQUEST for a blank message.
     * @throws DslError DOMAIN_NOT_FOUND when no domain is registered.
     */
    route(request: RoutingRequest): RoutingResult {
        if (request.message.trim() === '') {
            throw new DslError('INVALID_REQUEST', 'message cannot be empty');
        }
        const names: string[] = this.registry.domains_list();
        if (names.length === 0) {
            throw new DslError('DOMAIN_NOT_FOUND', 'no domains registered');
        }

        const result: RoutingResult =
            this.explicit_route(request.message) ??
            this.dslVerb_route(request.dsl ?? request.message, names) ??
            this.context_route(request.context, names) ??
            this.keyword_route(request.message, names) ??
            this.default_route() ??
            this.result_build(names[0], 'fallback', []);

        this.metrics_record(result);
        this.log.debug('message routed', { domain: result.domainName, strategy: result.strategy });
        return result;
    }

    metrics_get(): RoutingMetrics {
        return {
            totalRoutes: this.totalRoutes,
            byStrategy: { ...this.byStrategy },
            byDomain: { ...this.byDomain },
            averageConfidence: this.totalRoutes === 0 ? 0 : this.confidenceSum / this.totalRoutes,
        };
    }

    metrics_reset(): void {
        this.byStrategy = strategyCounters_create();
        this.byDomain = {};
        this.totalRoutes = 0;
        this.confidenceSum = 0;
    }

    // ─── Strategies ────────────────────────────────────────────

    private explicit_route(message: string): RoutingResult | null {
        const match: RegExpMatchArray | null = message.match(EXPLICIT_SWITCH);
        if (!match) return null;
        const name: string = match[1].toLowerCase();
        if (!this.registry.domain_has(name)) return null;
        return this.result_build(name, 'explicit', [match[0]]);
    }

    private dslVerb_route(text: string, names: readonly string[]): RoutingResult | null {
        const document: DslDocument | null = document_tryRead(text);
        if (!document) return null;

        const candidates: Candidate[] = names.map((name: string): Candidate => {
            const verbs: string[] = verbs_present(this.registry.vocabulary_get(name), document).map(
                (visit: FormVisit): string => visit.form.head ?? '',
            );
            const distinct: string[] = [...new Set(verbs)];
            return { domainName: name, score: verbs.length, weight: distinct.length, matched: distinct };
        });
        return this.candidate_result(candidate_best(candidates), 'dsl_verb');
    }

    private context_route(context: DslContext | undefined, names: readonly string[]): RoutingResult | null {
        if (!context) return null;

        const candidates: Candidate[] = names.map((name: string): Candidate => {
            const vocabulary: Vocabulary = this.registry.vocabulary_get(name);
            const keys: Set<string> = new Set(vocabulary.captures.map((capture: ContextCapture): string => capture.key));
            if (vocabulary.anchor) keys.add(vocabulary.anchor);

            const matched: string[] = [...keys].filter((key: string): boolean => context[key] !== undefined);
            const state: unknown = context[CURRENT_STATE_KEY];
            const stateKnown: boolean = typeof state === 'string' && vocabulary.states.includes(state);
            if (stateKnown) matched.push(CURRENT_STATE_KEY);
            return { domainName: name, score: matched.length, weight: stateKnown ? 1 : 0, matched };
        });
        return this.candidate_result(candidate_best(candidates), 'context');
    }

    /**
     * Count keyword hits per domain; ties go to the domain with the
     * longest matching keyword.
     */
    private keyword_route(message: string, names: readonly string[]): RoutingResult | null {
        const lowered: string = message.toLowerCase();
        const candidates: Candidate[] = names.map((name: string): Candidate => {
            const matched: string[] = this.registry
                .vocabulary_get(name)
                .keywords.filter((keyword: string): boolean => lowered.includes(keyword.toLowerCase()));
            const weight: number = matched.reduce((max: number, keyword: string): number => Math.max(max, keyword.length), 0);
            return { domainName: name, score: matched.length, weight, matched };
        });
        return this.candidate_result(candidate_best(candidates), 'keyword');
    }

    private default_route(): RoutingResult | null {
        if (this.defaultDomain === null || !this.registry.domain_has(this.defaultDomain)) return null;
        return this.result_build(this.defaultDomain, 'default', []);
    }

    // ─── Helpers ───────────────────────────────────────────────

    private candidate_result(candidate: Candidate | null, strategy: RoutingStrategy): RoutingResult | null {
        return candidate ? this.result_build(candidate.domainName, strategy, candidate.matched) : null;
    }

    private result_build(domainName: string, strategy: RoutingStrategy, matchedKeywords: string[]): RoutingResult {
        return { domainName, strategy, confidence: CONFIDENCE[strategy], matchedKeywords };
    }

    private metrics_record(result: RoutingResult): void {
        this.totalRoutes++;
        this.confidenceSum += result.confidence;
        this.byStrategy[result.strategy]++;
        this.byDomain[result.domainName] = (this.byDomain[result.domainName] ?? 0) + 1;
    }
}

/**
 * Read text as DSL; plain prose with an unbalanced quote is not DSL.
 */
function document_tryRead(text: string): DslDocument | null {
    try {
        return dsl_read(text);
    } catch (e: unknown) {
        if (dslError_is(e, 'MALFORMED_DOCUMENT')) return null;
        throw e;
    }
}
