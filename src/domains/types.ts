/**
 * @file Domain Contract
 *
 * Interface every DSL domain implements and the registry consumes.
 *
 * @module domains/types
 */

import type { ResolveOptions } from '../dictionary/AttributeResolver.js';
import type { ExtractedContext } from '../dsl/state/ContextExtractor.js';
import type { DslContext } from '../dsl/state/StateMachine.js';
import type { ValidationResult } from '../dsl/validator/validator.js';
import type { Vocabulary } from '../dsl/vocabulary/types.js';
import type { GenerationRequest, GenerationResponse } from '../generator/DslGenerator.js';

/**
 * Operational counters for one domain.
 *
 * @property activeVerbs - Distinct verbs seen in successfully validated documents.
 * @property stateTransitions - Accepted transitions keyed `FROM->TO`.
 * @property currentStates - States reported by context extraction and inference.
 * @property validationErrors - Validation failures keyed by error code.
 * @property generationErrors - Generation failures keyed by error code.
 * @property memoryUsageBytes - Rough size of the domain's vocabulary.
 */
export interface DomainMetrics {
    domain: string;
    version: string;
    totalRequests: number;
    successfulRequests: number;
    failedRequests: number;
    totalVerbs: number;
    activeVerbs: number;
    unusedVerbs: number;
    stateTransitions: Record<string, number>;
    currentStates: Record<string, number>;
    validationErrors: Record<string, number>;
    generationErrors: Record<string, number>;
    isHealthy: boolean;
    lastHealthCheck: string;
    uptimeSeconds: number;
    memoryUsageBytes: number;
    collectedAt: string;
}

export interface Domain {
    readonly name: string;
    readonly version: string;
    readonly description: string;

    health_get(): boolean;
    vocabulary_get(): Vocabulary;
    states_list(): readonly string[];
    state_initial(): string;

    verbs_validate(text: string): string[];
    document_validate(text: string): ValidationResult;
    transition_validate(from: string, to: string): void;
    path_resolve(from: string, to: string): string[];
    state_current(context: DslContext | null | undefined): string;
    context_extract(text: string): ExtractedContext;
    dsl_generate(request: GenerationRequest | null | undefined, options?: ResolveOptions): Promise<GenerationResponse>;
    metrics_get(): DomainMetrics;

    attributeName_resolve(id: string, options?: ResolveOptions): Promise<string>;
    attributes_resolveByIds(ids: readonly string[], options?: ResolveOptions): Promise<Map<string, string>>;
    dsl_enhance(text: string, options?: ResolveOptions): Promise<string>;
    reference_generate(id: string, options?: ResolveOptions): Promise<string>;
    references_validate(text: string, options?: ResolveOptions): Promise<void>;
}
