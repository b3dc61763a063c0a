/**
 * @file Domain Registry Tests
 *
 * @module registry
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { DomainRegistry, type DomainSummary, type RegistryMetrics } from './DomainRegistry.js';
import { OnboardingDomain } from '../domains/onboarding/OnboardingDomain.js';
import { UboDomain } from '../domains/ubo/UboDomain.js';
import { TelemetryBus } from '../telemetry/TelemetryBus.js';
import type { TelemetryEvent } from '../telemetry/types.js';

const NOW: Date = new Date('2024-01-01T00:00:00Z');
const clock = (): Date => NOW;

describe('DomainRegistry', (): void => {
    let registry: DomainRegistry;
    let events: TelemetryEvent[];

    beforeEach((): void => {
        const bus: TelemetryBus = new TelemetryBus();
        events = [];
        bus.subscribe((event: TelemetryEvent): void => {
            if (event.type === 'domain_registered') events.push(event);
        });
        registry = new DomainRegistry({ bus, now: clock });
        registry.domain_register(new UboDomain({ now: clock }));
        registry.domain_register(new OnboardingDomain({ now: clock }));
    });

    it('lists registered domains in name order', (): void => {
        expect(registry.domains_list()).toEqual(['onboarding', 'ubo']);
        expect(registry.domain_has('ubo')).toBe(true);
        expect(events).toEqual([
            { type: 'domain_registered', domain: 'ubo', version: '2.1.0' },
            { type: 'domain_registered', domain: 'onboarding', version: '1.0.0' },
        ]);
    });

    it('refuses a duplicate name', (): void => {
        expect((): void => registry.domain_register(new UboDomain())).toThrow('domain ubo already registered');
    });

    it('reports unknown domains', (): void => {
        expect((): unknown => registry.domain_get('payments')).toThrow('domain payments not found');
        expect((): unknown => registry.vocabulary_get('payments')).toThrow('domain payments not found');
    });

    it('describes each domain', (): void => {
        expect(registry.domains_describe().map((d: DomainSummary): unknown[] => [d.name, d.version, d.isHealthy])).toEqual([
            ['onboarding', '1.0.0', true],
            ['ubo', '2.1.0', true],
        ]);
    });

    it('aggregates domain metrics', (): void => {
        const onboarding: OnboardingDomain = new OnboardingDomain({ now: clock });
        registry.domain_unregister('onboarding');
        registry.domain_register(onboarding);
        onboarding.verbs_validate('(case.create (cbu.id "CBU-1"))');
        onboarding.health_set(false);

        const metrics: RegistryMetrics = registry.metrics_get();
        expect(metrics.totalDomains).toBe(2);
        expect(metrics.healthyDomains).toBe(1);
        expect(metrics.totalVerbs).toBe(73);
        expect(metrics.totalRequests).toBe(1);
        expect(metrics.memoryUsageBytes).toBe(
            metrics.domains['onboarding'].memoryUsageBytes + metrics.domains['ubo'].memoryUsageBytes,
        );
        expect(metrics.collectedAt).toBe('2024-01-01T00:00:00.000Z');
    });

    it('unregisters domains', (): void => {
        expect(registry.domain_unregister('ubo')).toBe(true);
        expect(registry.domain_unregister('ubo')).toBe(false);
        expect(registry.domains_list()).toEqual(['onboarding']);
    });

    it('refuses registration after shutdown', (): void => {
        registry.shutdown();
        expect(registry.registry_isClosed()).toBe(true);
        expect(registry.domains_list()).toEqual([]);
        expect((): void => registry.domain_register(new UboDomain())).toThrow('registry is shut down');
    });
});
