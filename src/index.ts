/**
 * @file Public API
 *
 * @module onboarding-dsl
 */

export { DslError, DSL_ERROR_CODES, dslError_is, errorMessage_get } from './errors/DslError.js';
export type { DslErrorCode, DslErrorOptions } from './errors/DslError.js';

export { SettingsService, LOG_LEVELS, logLevel_isValid } from './config/settings.js';
export type { DslSettings, LogLevel, ResolvedDslSettings, SettingsKey, SettingSource } from './config/settings.js';

export { TelemetryBus, NULL_LOGGER } from './telemetry/TelemetryBus.js';
export type { TelemetryObserver } from './telemetry/TelemetryBus.js';
export { consoleSink_attach, logLine_format, level_passes, MARKERS } from './telemetry/console.js';
export type { LineWriter } from './telemetry/console.js';
export type { LogEvent, Logger, TelemetryEvent } from './telemetry/types.js';

export {
    vocabulary_load,
    vocabulary_parse,
    vocabularies_available,
    verb_get,
    verbs_inCategory,
    keywords_collect,
    vocabulary_summarize,
} from './dsl/vocabulary/loader.js';
export type {
    ArgumentSpec,
    ArgumentType,
    Category,
    ContextCapture,
    Intent,
    StateTransition,
    Verb,
    Vocabulary,
    VocabularySummary,
} from './dsl/vocabulary/types.js';

export { dsl_tokenize } from './dsl/parser/tokenizer.js';
export type { Token, TokenKind } from './dsl/parser/tokenizer.js';
export { dsl_read, forms_collect, form_args, form_firstString } from './dsl/parser/reader.js';
export type { DslDocument, DslNode, AtomNode, FormNode, ListNode, FormVisit, ReaderIssue } from './dsl/parser/reader.js';

export { verbs_validate, document_validate, verbs_present } from './dsl/validator/validator.js';
export type { ValidationResult } from './dsl/validator/validator.js';

export { StateMachine, CURRENT_STATE_KEY } from './dsl/state/StateMachine.js';
export type { DslContext } from './dsl/state/StateMachine.js';
export { ContextExtractor } from './dsl/state/ContextExtractor.js';
export type { ExtractedContext } from './dsl/state/ContextExtractor.js';

export type {
    Attribute,
    AttributeInput,
    AttributePatch,
    AttributeQuery,
    DictionaryRepository,
    LookupOptions,
    Provenance,
    Sensitivity,
} from './dictionary/types.js';
export { MemoryDictionaryRepository } from './dictionary/MemoryDictionaryRepository.js';
export type { MemoryRepositoryOptions } from './dictionary/MemoryDictionaryRepository.js';
export { AttributeResolver } from './dictionary/AttributeResolver.js';
export type { AttributeResolverOptions, ResolveOptions } from './dictionary/AttributeResolver.js';
export {
    attributeId_isValid,
    reference_format,
    references_extract,
    unnamedIds_collect,
    unnamedReferences_replace,
} from './dictionary/references.js';
export type { AttributeReference } from './dictionary/references.js';

export { DslGenerator, dslString_escape } from './generator/DslGenerator.js';
export type {
    DslGeneratorOptions,
    GenerationParameters,
    GenerationRequest,
    GenerationResponse,
    SlotExtractor,
    SlotValue,
} from './generator/DslGenerator.js';

export type { Domain, DomainMetrics } from './domains/types.js';
export { BaseDomain } from './domains/BaseDomain.js';
export type { BaseDomainConfig, DomainOptions } from './domains/BaseDomain.js';
export { OnboardingDomain, ONBOARDING_DOMAIN } from './domains/onboarding/OnboardingDomain.js';
export { UboDomain, UBO_DOMAIN } from './domains/ubo/UboDomain.js';

export { DomainRegistry } from './registry/DomainRegistry.js';
export type { DomainRegistryOptions, DomainSummary, RegistryMetrics } from './registry/DomainRegistry.js';
export { DomainRouter, ROUTING_STRATEGIES } from './registry/DomainRouter.js';
export type { DomainRouterOptions, RoutingMetrics, RoutingRequest, RoutingResult, RoutingStrategy } from './registry/DomainRouter.js';
export { dslLayer_assemble } from './registry/factory.js';
export type { DslLayer, DslLayerConfig } from './registry/factory.js';

export { SessionAccumulator, FRAGMENT_BOUNDARY } from './session/SessionAccumulator.js';
export type { AccumulateOptions, SessionAccumulatorOptions, SessionInfo } from './session/SessionAccumulator.js';
