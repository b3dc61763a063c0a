/**
 * @file In-Memory Dictionary Repository
 *
 * DictionaryRepository backed by a Map. Used as the default dictionary
 * for bundled domains and as the in-process stand-in for tests. An
 * optional per-call latency makes cancellation behaviour observable.
 *
 * @module dictionary/MemoryDictionaryRepository
 */

import { randomUUID } from 'crypto';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import type { ZodIssue } from 'zod';
import { DslError, errorMessage_get } from '../errors/DslError.js';
import { AttributeInputSchema, AttributeSeedSchema } from './schemas.js';
import type {
    Attribute,
    AttributeInput,
    AttributePatch,
    AttributeQuery,
    DictionaryRepository,
    LookupOptions,
} from './types.js';

/** Resolve path relative to this module's directory. */
function modulePath_resolve(relativePath: string): string {
    const __filename = fileURLToPath(import.meta.url);
    return resolve(dirname(__filename), relativePath);
}

export const SEED_PATH: string = modulePath_resolve('../../data/attributes.json');

export interface MemoryRepositoryOptions {
    /** Delay applied to every call, in milliseconds. */
    latencyMs?: number;
}

function issues_format(issues: readonly ZodIssue[]): string {
    return issues.map((i: ZodIssue): string => `[${i.path.join('.')}] ${i.message}`).join('; ');
}

function aborted_error(signal: AbortSignal): DslError {
    return new DslError('LOOKUP_ABORTED', 'dictionary lookup aborted', { cause: signal.reason });
}

function attribute_copy(attribute: Attribute): Attribute {
    const copy: Attribute = {
        ...attribute,
        tags: [...attribute.tags],
        constraints: [...attribute.constraints],
        source: { ...attribute.source },
        sink: { ...attribute.sink },
    };
    return copy;
}

/**
 * Parse seed JSON text into attributes.
 *
 * @throws DslError INVALID_REQUEST when the seed is not JSON or does not match the schema.
 */
export function attributes_parse(json: string): Attribute[] {
    let raw: unknown;
    try {
        raw = JSON.parse(json);
    } catch (e: unknown) {
        throw new DslError('INVALID_REQUEST', `Invalid attribute seed: ${errorMessage_get(e)}`, { cause: e });
    }
    const result = AttributeSeedSchema.safeParse(raw);
    if (!result.success) {
        throw new DslError('INVALID_REQUEST', `Invalid attribute seed: ${issues_format(result.error.issues)}`);
    }
    return result.data;
}

export class MemoryDictionaryRepository implements DictionaryRepository {
    private readonly byId: Map<string, Attribute> = new Map();
    private readonly latencyMs: number;

    constructor(attributes: readonly Attribute[] = [], options: MemoryRepositoryOptions = {}) {
        this.latencyMs = options.latencyMs ?? 0;
        for (const attribute of attributes) {
            this.byId.set(attribute.id.toLowerCase(), attribute_copy(attribute));
        }
    }

    /**
     * Repository pre-loaded with the bundled attribute seed.
     */
    static seeded(options: MemoryRepositoryOptions = {}): MemoryDictionaryRepository {
        return new MemoryDictionaryRepository(attributes_parse(readFileSync(SEED_PATH, 'utf-8')), options);
    }

    get size(): number {
        return this.byId.size;
    }

    async attribute_get(id: string, options: LookupOptions = {}): Promise<Attribute> {
        await this.call_settle(options.signal);
        const attribute: Attribute | undefined = this.byId.get(id.toLowerCase());
        if (!attribute) {
            throw new DslError('ATTRIBUTE_NOT_FOUND', `attribute not found: ${id}`, { details: { attributeId: id } });
        }
        return attribute_copy(attribute);
    }

    async attributes_list(options: LookupOptions = {}): Promise<Attribute[]> {
        await this.call_settle(options.signal);
        return [...this.byId.values()]
            .sort((a: Attribute, b: Attribute): number => a.name.localeCompare(b.name))
            .map(attribute_copy);
    }

    async attributes_search(query: AttributeQuery, options: LookupOptions = {}): Promise<Attribute[]> {
        const all: Attribute[] = await this.attributes_list(options);
        return all.filter((a: Attribute): boolean =>
            (query.namePrefix === undefined || a.name.startsWith(query.namePrefix)) &&
            (query.domain === undefined || a.domain === query.domain) &&
            (query.groupId === undefined || a.groupId === query.groupId) &&
            (query.tag === undefined || a.tags.includes(query.tag)),
        );
    }

    async attribute_create(input: AttributeInput, options: LookupOptions = {}): Promise<Attribute> {
        await this.call_settle(options.signal);
        const result = AttributeInputSchema.safeParse(input);
        if (!result.success) {
            throw new DslError('INVALID_REQUEST', `Invalid attribute: ${issues_format(result.error.issues)}`);
        }
        const id: string = result.data.id ?? randomUUID();
        if (this.byId.has(id.toLowerCase())) {
            throw new DslError('INVALID_REQUEST', `attribute already exists: ${id}`, { details: { attributeId: id } });
        }
        const name: string = result.data.name;
        if ([...this.byId.values()].some((a: Attribute): boolean => a.name === name)) {
            throw new DslError('INVALID_REQUEST', `attribute name already in use: ${name}`);
        }
        const attribute: Attribute = { ...result.data, id };
        this.byId.set(id.toLowerCase(), attribute);
        return attribute_copy(attribute);
    }

    async attribute_update(id: string, patch: AttributePatch, options: LookupOptions = {}): Promise<Attribute> {
        const current: Attribute = await this.attribute_get(id, options);
        const result = AttributeInputSchema.safeParse({ ...current, ...patch });
        if (!result.success) {
            throw new DslError('INVALID_REQUEST', `Invalid attribute: ${issues_format(result.error.issues)}`);
        }
        const next: Attribute = { ...result.data, id: current.id };
        this.byId.set(current.id.toLowerCase(), next);
        return attribute_copy(next);
    }

    async attribute_delete(id: string, options: LookupOptions = {}): Promise<void> {
        await this.call_settle(options.signal);
        if (!this.byId.delete(id.toLowerCase())) {
            throw new DslError('ATTRIBUTE_NOT_FOUND', `attribute not found: ${id}`, { details: { attributeId: id } });
        }
    }

    /**
     * Apply configured latency and reject if the signal aborts first.
     */
    private call_settle(signal: AbortSignal | undefined): Promise<void> {
        if (signal?.aborted) return Promise.reject(aborted_error(signal));
        if (this.latencyMs <= 0) return Promise.resolve();

        return new Promise<void>((resolvePromise, rejectPromise): void => {
            const onAbort = (): void => {
                clearTimeout(timer);
                if (signal) rejectPromise(aborted_error(signal));
            };
            const timer: ReturnType<typeof setTimeout> = setTimeout((): void => {
                signal?.removeEventListener('abort', onAbort);
                resolvePromise();
            }, this.latencyMs);
            signal?.addEventListener('abort', onAbort, { once: true });
        });
    }
}
