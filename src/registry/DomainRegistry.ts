/**
 * @file Domain Registry
 *
 * Explicitly constructed registry of DSL domains. Callers build one at
 * startup, register every domain, then read from it; tests build their
 * own and tear it down with `shutdown()`.
 *
 * @module registry/DomainRegistry
 */

import type { Domain, DomainMetrics } from '../domains/types.js';
import type { Vocabulary } from '../dsl/vocabulary/types.js';
import { DslError } from '../errors/DslError.js';
import { NULL_LOGGER, type TelemetryBus } from '../telemetry/TelemetryBus.js';
import type { Logger } from '../telemetry/types.js';

/**
 * Registry-wide metrics.
 *
 * @property healthyDomains - Domains whose `health_get()` returned true.
 * @property memoryUsageBytes - Sum of the per-domain estimates.
 */
export interface RegistryMetrics {
    totalDomains: number;
    healthyDomains: number;
    totalVerbs: number;
    totalRequests: number;
    memoryUsageBytes: number;
    domains: Record<string, DomainMetrics>;
    collectedAt: string;
}

export interface DomainSummary {
    name: string;
    version: string;
    description: string;
    isHealthy: boolean;
}

export interface DomainRegistryOptions {
    bus?: TelemetryBus;
    now?: () => Date;
}

export class DomainRegistry {
    private readonly domains: Map<string, Domain> = new Map();
    private readonly bus: TelemetryBus | null;
    private readonly log: Logger;
    private readonly now: () => Date;
    private closed: boolean = false;

    constructor(options: DomainRegistryOptions = {}) {
        this.bus = options.bus ?? null;
        this.log = this.bus ? this.bus.logger_create('registry') : NULL_LOGGER;
        this.now = options.now ?? ((): Date => new Date());
    }

    /**
     * @throws DslError DOMAIN_ALREADY_REGISTERED on a duplicate name.
     * @throws DslError INVALID_REQUEST after `shutdown()`.
     */
    domain_register(domain: Domain): void {
        if (this.closed) {
            throw new DslError('INVALID_REQUEST', 'registry is shut down');
        }
        if (this.domains.has(domain.name)) {
            throw new DslError('DOMAIN_ALREADY_REGISTERED', `domain ${domain.name} already registered`, {
                details: { domain: domain.name },
            });
        }
        this.domains.set(domain.name, domain);
        this.log.info('domain registered', { domain: domain.name, version: domain.version });
        this.bus?.emit({ type: 'domain_registered', domain: domain.name, version: domain.version });
    }

    /**
     * @returns Whether a domain was removed.
     */
    domain_unregister(name: string): boolean {
        const removed: boolean = this.domains.delete(name);
        if (removed) this.log.info('domain unregistered', { domain: name });
        return removed;
    }

    domain_has(name: string): boolean {
        return this.domains.has(name);
    }

    /**
     * @throws DslError DOMAIN_NOT_FOUND for an unknown name.
     */
    domain_get(name: string): Domain {
        const domain: Domain | undefined = this.domains.get(name);
        if (!domain) {
            throw new DslError('DOMAIN_NOT_FOUND', `domain ${name} not found`, {
                details: { domain: name, available: this.domains_list() },
            });
        }
        return domain;
    }

    /** Registered domain names, sorted. */
    domains_list(): string[] {
        return [...this.domains.keys()].sort();
    }

    domains_describe(): DomainSummary[] {
        return this.domains_list().map((name: string): DomainSummary => {
            const domain: Domain = this.domain_get(name);
            return {
                name: domain.name,
                version: domain.version,
                description: domain.description,
                isHealthy: domain.health_get(),
            };
        });
    }

    vocabulary_get(name: string): Vocabulary {
        return this.domain_get(name).vocabulary_get();
    }

    metrics_get(): RegistryMetrics {
        const domains: Record<string, DomainMetrics> = {};
        let healthyDomains: number = 0;
        let totalVerbs: number = 0;
        let totalRequests: number = 0;
        let memoryUsageBytes: number = 0;

        for (const name of this.domains_list()) {
            const domain: Domain = this.domain_get(name);
            const metrics: DomainMetrics = domain.metrics_get();
            domains[name] = metrics;
            if (domain.health_get()) healthyDomains++;
            totalVerbs += metrics.totalVerbs;
            totalRequests += metrics.totalRequests;
            memoryUsageBytes += metrics.memoryUsageBytes;
        }

        return {
            totalDomains: this.domains.size,
            healthyDomains,
            totalVerbs,
            totalRequests,
            memoryUsageBytes,
            domains,
            collectedAt: this.now().toISOString(),
        };
    }

    /**
     * Drop every domain and refuse further registration.
     */
    shutdown(): void {
        this.domains.clear();
        this.closed = true;
        this.log.info('registry shut down');
    }

    registry_isClosed(): boolean {
        return this.closed;
    }
}
