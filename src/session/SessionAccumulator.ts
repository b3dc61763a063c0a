/**
 * @file Session Accumulator
 *
 * Running DSL document per (session id, domain). Fragments are trimmed
 * and joined with a newline. Appends to one key run one at a time
 * through a promise chain; distinct keys never wait on each other.
 *
 * With a registry attached, an append can first annotate attribute
 * references (`enhance`) and check the prospective whole document
 * against the domain's verb validator (`validate`). A rejected append
 * leaves the session untouched.
 *
 * @module session/SessionAccumulator
 */

import { SettingsService } from '../config/settings.js';
import type { ResolveOptions } from '../dictionary/AttributeResolver.js';
import type { Domain } from '../domains/types.js';
import type { ExtractedContext } from '../dsl/state/ContextExtractor.js';
import { DslError } from '../errors/DslError.js';
import type { DomainRegistry } from '../registry/DomainRegistry.js';
import { NULL_LOGGER, type TelemetryBus } from '../telemetry/TelemetryBus.js';
import type { Logger } from '../telemetry/types.js';

/** Separator placed between accumulated fragments. */
export const FRAGMENT_BOUNDARY = '\n' as const;

export interface AccumulateOptions extends ResolveOptions {
    /** Check the whole prospective document with the domain's verb validator. */
    validate?: boolean;
    /** Annotate unnamed `@attr{id}` references before appending. */
    enhance?: boolean;
}

/**
 * Session metadata.
 *
 * @property fragments - Number of fragments appended so far.
 * @property length - Character length of the accumulated text.
 */
export interface SessionInfo {
    sessionId: string;
    domain: string;
    fragments: number;
    length: number;
    createdAt: string;
    updatedAt: string;
}

export interface SessionAccumulatorOptions {
    registry?: DomainRegistry;
    settings?: SettingsService;
    bus?: TelemetryBus;
    now?: () => Date;
}

interface SessionEntry {
    sessionId: string;
    domain: string;
    fragments: string[];
    createdAt: Date;
    updatedAt: Date;
}

/**
 * Map key for a (session, domain) pair; no two distinct pairs share one.
 */
function sessionKey_build(sessionId: string, domain: string): string {
    return JSON.stringify([sessionId, domain]);
}

function entry_text(entry: SessionEntry): string {
    return entry.fragments.join(FRAGMENT_BOUNDARY);
}

export class SessionAccumulator {
    private readonly sessions: Map<string, SessionEntry> = new Map();
    private readonly locks: Map<string, Promise<void>> = new Map();
    private readonly registry: DomainRegistry | null;
    private readonly settings: SettingsService;
    private readonly bus: TelemetryBus | null;
    private readonly log: Logger;
    private readonly now: () => Date;

    constructor(options: SessionAccumulatorOptions = {}) {
        this.registry = options.registry ?? null;
        this.settings = options.settings ?? SettingsService.instance_get();
        this.bus = options.bus ?? null;
        this.log = this.bus ? this.bus.logger_create('session') : NULL_LOGGER;
        this.now = options.now ?? ((): Date => new Date());
    }

    /**
     * Append a fragment to a session's document.
     *
     * @returns The accumulated text after the append.
     * @throws DslError INVALID_REQUEST for a blank fragment, session id or domain,
     *   or when `validate`/`enhance` is asked for without a registry.
     * @throws DslError SESSION_CONFLICT when the session is full.
     */
    async dsl_accumulate(sessionId: string, domain: string, fragment: string, options: AccumulateOptions = {}): Promise<string> {
        if (sessionId.trim() === '' || domain.trim() === '') {
            throw new DslError('INVALID_REQUEST', 'session id and domain are required');
        }
        const trimmed: string = fragment.trim();
        if (trimmed === '') {
            throw new DslError('INVALID_REQUEST', 'DSL fragment cannot be empty', { details: { sessionId, domain } });
        }

        const key: string = sessionKey_build(sessionId, domain);
        return this.lock_run(key, async (): Promise<string> => {
            let text: string = trimmed;
            const owner: Domain | null = options.enhance || options.validate ? this.domain_require(domain) : null;
            if (owner && options.enhance) {
                text = await owner.dsl_enhance(text, options);
            }

            // Read after the await: a reset may have dropped the entry meanwhile.
            const existing: SessionEntry | undefined = this.sessions.get(key);
            const fragments: string[] = existing ? existing.fragments : [];

            const max: number = this.settings.sessionMaxFragments_resolve();
            if (fragments.length >= max) {
                throw new DslError('SESSION_CONFLICT', `session ${sessionId} reached the limit of ${max} fragments`, {
                    details: { sessionId, domain, max },
                });
            }
            if (owner && options.validate) {
                owner.verbs_validate([...fragments, text].join(FRAGMENT_BOUNDARY));
            }

            const now: Date = this.now();
            const entry: SessionEntry = existing ?? { sessionId, domain, fragments: [], createdAt: now, updatedAt: now };
            entry.fragments.push(text);
            entry.updatedAt = now;
            this.sessions.set(key, entry);

            this.log.debug('fragment accumulated', { sessionId, domain, fragments: entry.fragments.length });
            this.bus?.emit({ type: 'dsl_accumulated', sessionId, domain, fragments: entry.fragments.length });
            return entry_text(entry);
        });
    }

    /**
     * Accumulated text; empty for an unknown session.
     */
    dsl_get(sessionId: string, domain: string): string {
        const entry: SessionEntry | undefined = this.sessions.get(sessionKey_build(sessionId, domain));
        return entry ? entry_text(entry) : '';
    }

    /**
     * Context extracted from the accumulated text by the owning domain.
     *
     * @throws DslError INVALID_REQUEST without a registry.
     * @throws DslError DOMAIN_NOT_FOUND for an unregistered domain.
     */
    context_get(sessionId: string, domain: string): ExtractedContext {
        return this.domain_require(domain).context_extract(this.dsl_get(sessionId, domain));
    }

    session_get(sessionId: string, domain: string): SessionInfo | null {
        const entry: SessionEntry | undefined = this.sessions.get(sessionKey_build(sessionId, domain));
        return entry ? this.info_build(entry) : null;
    }

    sessions_list(): SessionInfo[] {
        return [...this.sessions.values()]
            .map((entry: SessionEntry): SessionInfo => this.info_build(entry))
            .sort((a: SessionInfo, b: SessionInfo): number =>
                a.sessionId === b.sessionId ? a.domain.localeCompare(b.domain) : a.sessionId.localeCompare(b.sessionId),
            );
    }

    /**
     * Drop sessions: one key, every domain of one session, or everything.
     *
     * @returns Number of sessions removed.
     */
    session_reset(sessionId?: string, domain?: string): number {
        if (sessionId === undefined) {
            const count: number = this.sessions.size;
            this.sessions.clear();
            return count;
        }
        if (domain !== undefined) {
            return this.sessions.delete(sessionKey_build(sessionId, domain)) ? 1 : 0;
        }
        let removed: number = 0;
        for (const [key, entry] of this.sessions) {
            if (entry.sessionId === sessionId) {
                this.sessions.delete(key);
                removed++;
            }
        }
        return removed;
    }

    // ─── Internals ─────────────────────────────────────────────

    private domain_require(domain: string): Domain {
        if (!this.registry) {
            throw new DslError('INVALID_REQUEST', 'no domain registry attached to the accumulator');
        }
        return this.registry.domain_get(domain);
    }

    /**
     * Run `work` after every earlier task for `key` has settled. The
     * caller sees the task's own outcome; the chain only tracks order.
     */
    private lock_run<T>(key: string, work: () => Promise<T>): Promise<T> {
        const previous: Promise<void> = this.locks.get(key) ?? Promise.resolve();
        const run: Promise<T> = previous.then(work);
        const settled: Promise<void> = run.then(
            (): void => undefined,
            (): void => undefined,
        );
        this.locks.set(key, settled);
        void settled.then((): void => {
            if (this.locks.get(key) === settled) this.locks.delete(key);
        });
        return run;
    }

    private info_build(entry: SessionEntry): SessionInfo {
        return {
            sessionId: entry.sessionId,
            domain: entry.domain,
            fragments: entry.fragments.length,
            length: entry_text(entry).length,
            createdAt: entry.createdAt.toISOString(),
            updatedAt: entry.updatedAt.toISOString(),
        };
    }
}
