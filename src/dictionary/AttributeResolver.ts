/**
 * @file Attribute Resolver
 *
 * Turns attribute ids into semantic names through an optional
 * dictionary repository. Single-id resolution is strict; bulk resolution
 * and enhancement fall back to the bare id. Without a repository the
 * lenient operations pass input through and reference validation is a
 * no-op.
 *
 * Every call is bounded: the caller's abort signal is combined with a
 * timeout (settings `lookup_timeout_ms` unless given) and an aborted
 * lookup counts as a failed resolution.
 *
 * @module dictionary/AttributeResolver
 */

import { SettingsService } from '../config/settings.js';
import { DslError, dslError_is, errorMessage_get } from '../errors/DslError.js';
import { NULL_LOGGER, type TelemetryBus } from '../telemetry/TelemetryBus.js';
import type { Logger } from '../telemetry/types.js';
import {
    reference_format,
    references_extract,
    unnamedIds_collect,
    unnamedReferences_replace,
    type AttributeReference,
} from './references.js';
import type { Attribute, DictionaryRepository } from './types.js';

export interface ResolveOptions {
    signal?: AbortSignal;
    timeoutMs?: number;
}

export interface AttributeResolverOptions {
    repository?: DictionaryRepository | null;
    settings?: SettingsService;
    bus?: TelemetryBus;
}

/**
 * Race `work` against `signal`, so a repository that ignores the signal
 * still cannot hold the caller past the deadline.
 */
function signal_race<T>(signal: AbortSignal, work: Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject): void => {
        const onAbort = (): void => {
            reject(new DslError('LOOKUP_ABORTED', 'dictionary lookup aborted', { cause: signal.reason }));
        };
        void work.then(
            (value: T): void => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (error: unknown): void => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            },
        );
        if (signal.aborted) {
            onAbort();
            return;
        }
        signal.addEventListener('abort', onAbort, { once: true });
    });
}

export class AttributeResolver {
    private repository: DictionaryRepository | null;
    private readonly settings: SettingsService;
    private readonly bus: TelemetryBus | null;
    private readonly log: Logger;

    constructor(options: AttributeResolverOptions = {}) {
        this.repository = options.repository ?? null;
        this.settings = options.settings ?? SettingsService.instance_get();
        this.bus = options.bus ?? null;
        this.log = this.bus ? this.bus.logger_create('attributes') : NULL_LOGGER;
    }

    repository_set(repository: DictionaryRepository | null): void {
        this.repository = repository;
    }

    dictionary_isConfigured(): boolean {
        return this.repository !== null;
    }

    /**
     * Resolve one id to its semantic name.
     *
     * @throws DslError NO_DICTIONARY when no repository is configured.
     * @throws DslError ATTRIBUTE_NOT_FOUND when the lookup fails, is aborted or times out.
     */
    async attributeName_resolve(id: string, options: ResolveOptions = {}): Promise<string> {
        const repository: DictionaryRepository | null = this.repository;
        if (!repository) {
            throw new DslError('NO_DICTIONARY', 'dictionary repository not configured');
        }
        const signal: AbortSignal = this.signal_compose(options);
        try {
            const attribute: Attribute = await signal_race(signal, repository.attribute_get(id, { signal }));
            return attribute.name;
        } catch (e: unknown) {
            throw new DslError('ATTRIBUTE_NOT_FOUND', `failed to resolve attribute ${id}: ${errorMessage_get(e)}`, {
                details: { attributeId: id, aborted: dslError_is(e, 'LOOKUP_ABORTED') },
                cause: e,
            });
        }
    }

    /**
     * Resolve many ids. Never fails: an id that cannot be resolved maps to itself.
     */
    async attributes_resolveByIds(ids: readonly string[], options: ResolveOptions = {}): Promise<Map<string, string>> {
        const unique: string[] = [...new Set(ids)];
        const names: Map<string, string> = new Map();
        if (!this.repository) {
            for (const id of unique) names.set(id, id);
            return names;
        }
        const resolved: string[] = await Promise.all(
            unique.map((id: string): Promise<string> => this.name_resolveOrFallback(id, options)),
        );
        unique.forEach((id: string, i: number): void => {
            names.set(id, resolved[i]);
        });
        return names;
    }

    /**
     * Annotate every unnamed reference with its semantic name. Named
     * references are untouched and unresolvable ids stay bare, so the
     * operation is idempotent.
     */
    async dsl_enhance(text: string, options: ResolveOptions = {}): Promise<string> {
        if (!this.repository) return text;

        const ids: string[] = unnamedIds_collect(text);
        if (ids.length === 0) return text;

        const resolved: Map<string, string> = await this.attributes_resolveByIds(ids, options);
        const names: Map<string, string> = new Map();
        for (const [id, name] of resolved) {
            if (name !== id) names.set(id, name);
        }
        return unnamedReferences_replace(text, names);
    }

    /**
     * Build a reference for an id, annotated when the name resolves.
     *
     * @throws DslError INVALID_ATTRIBUTE_REFERENCE for an empty id.
     */
    async reference_generate(id: string, options: ResolveOptions = {}): Promise<string> {
        if (id.trim() === '') {
            throw new DslError('INVALID_ATTRIBUTE_REFERENCE', 'attribute ID cannot be empty');
        }
        if (!this.repository) return reference_format(id);

        const name: string = await this.name_resolveOrFallback(id, options);
        return name === id ? reference_format(id) : reference_format(id, name);
    }

    /**
     * Check that every referenced id resolves. Without a dictionary this
     * is a no-op.
     *
     * @throws DslError ATTRIBUTE_NOT_FOUND naming the first reference that fails.
     */
    async references_validate(text: string, options: ResolveOptions = {}): Promise<void> {
        if (!this.repository) return;

        const seen: Set<string> = new Set();
        for (const reference of references_extract(text)) {
            if (seen.has(reference.id)) continue;
            seen.add(reference.id);
            await this.reference_check(reference, options);
        }
    }

    private async reference_check(reference: AttributeReference, options: ResolveOptions): Promise<void> {
        try {
            await this.attributeName_resolve(reference.id, options);
        } catch (e: unknown) {
            throw new DslError('ATTRIBUTE_NOT_FOUND', `invalid attribute reference ${reference_format(reference.id)}`, {
                details: { attributeId: reference.id, offset: reference.offset },
                cause: e,
            });
        }
    }

    private async name_resolveOrFallback(id: string, options: ResolveOptions): Promise<string> {
        try {
            return await this.attributeName_resolve(id, options);
        } catch (e: unknown) {
            const reason: string = errorMessage_get(e);
            this.log.warn(`attribute ${id} unresolved, keeping id`, { reason });
            this.bus?.emit({ type: 'attribute_fallback', attributeId: id, reason });
            return id;
        }
    }

    private signal_compose(options: ResolveOptions): AbortSignal {
        const timeoutMs: number = options.timeoutMs ?? this.settings.lookupTimeout_resolve();
        const timeout: AbortSignal = AbortSignal.timeout(timeoutMs);
        return options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;
    }
}
