/**
 * @file Domain Router Tests
 *
 * @module registry
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { DomainRouter, type RoutingMetrics, type RoutingResult } from './DomainRouter.js';
import { DomainRegistry } from './DomainRegistry.js';
import { OnboardingDomain } from '../domains/onboarding/OnboardingDomain.js';
import { UboDomain } from '../domains/ubo/UboDomain.js';

function registry_create(): DomainRegistry {
    const registry: DomainRegistry = new DomainRegistry();
    registry.domain_register(new OnboardingDomain());
    registry.domain_register(new UboDomain());
    return registry;
}

describe('DomainRouter strategies', (): void => {
    let router: DomainRouter;

    beforeEach((): void => {
        router = new DomainRouter(registry_create(), { defaultDomain: 'onboarding' });
    });

    it('honours an explicit switch to a registered domain', (): void => {
        expect(router.route({ message: 'Please switch to UBO domain' })).toEqual({
            domainName: 'ubo',
            strategy: 'explicit',
            confidence: 1.0,
            matchedKeywords: ['switch to UBO domain'],
        });
    });

    it('ignores a switch to an unknown domain', (): void => {
        expect(router.route({ message: 'switch to payments domain' }).strategy).toBe('default');
    });

    it('routes by the verbs in the DSL', (): void => {
        const result: RoutingResult = router.route({
            message: 'continue',
            dsl: '(ubo.resolve-ubos (entity_id "e1"))\n(ubo.assess-risk (entity_id "e1"))\n(ubo.assess-risk (entity_id "e2"))',
        });
        expect(result).toEqual({
            domainName: 'ubo',
            strategy: 'dsl_verb',
            confidence: 0.95,
            matchedKeywords: ['ubo.resolve-ubos', 'ubo.assess-risk'],
        });
    });

    it('scans the message for DSL when none is given', (): void => {
        expect(router.route({ message: '(case.create (cbu.id "CBU-1"))' }).strategy).toBe('dsl_verb');
    });

    it('routes by context keys', (): void => {
        expect(router.route({ message: 'next step', context: { cbu_id: 'CBU-1' } })).toEqual({
            domainName: 'onboarding',
            strategy: 'context',
            confidence: 0.8,
            matchedKeywords: ['cbu_id'],
        });
    });

    it('routes by a known current state', (): void => {
        const result: RoutingResult = router.route({ message: 'next step', context: { current_state: 'SCREENING_COMPLETE' } });
        expect(result.domainName).toBe('ubo');
        expect(result.matchedKeywords).toEqual(['current_state']);
    });

    it('routes by keywords', (): void => {
        expect(router.route({ message: 'review the beneficial ownership of the trust' })).toEqual({
            domainName: 'ubo',
            strategy: 'keyword',
            confidence: 0.7,
            matchedKeywords: ['beneficial owner', 'beneficial ownership', 'trust'],
        });
        expect(router.route({ message: 'onboard a new client' }).matchedKeywords).toEqual(['onboard', 'client']);
    });

    it('breaks keyword ties by the longest match', (): void => {
        const result: RoutingResult = router.route({ message: 'kyc for the trust' });
        expect(result.domainName).toBe('ubo');
        expect(result.matchedKeywords).toEqual(['trust']);
    });

    it('treats prose with an unbalanced quote as plain text', (): void => {
        const result: RoutingResult = router.route({ message: 'the "client' });
        expect(result.strategy).toBe('keyword');
        expect(result.domainName).toBe('onboarding');
    });

    it('falls back to the default domain', (): void => {
        expect(router.route({ message: 'hello there' })).toEqual({
            domainName: 'onboarding',
            strategy: 'default',
            confidence: 0.5,
            matchedKeywords: [],
        });
    });

    it('falls back to the first domain without a default', (): void => {
        const result: RoutingResult = new DomainRouter(registry_create()).route({ message: 'hello there' });
        expect(result).toEqual({ domainName: 'onboarding', strategy: 'fallback', confidence: 0.1, matchedKeywords: [] });
    });

    it('rejects a blank message', (): void => {
        expect((): RoutingResult => router.route({ message: '  ' })).toThrow('message cannot be empty');
    });

    it('needs at least one domain', (): void => {
        expect((): RoutingResult => new DomainRouter(new DomainRegistry()).route({ message: 'hello' })).toThrow(
            'no domains registered',
        );
    });
});

describe('DomainRouter metrics', (): void => {
    it('counts routes by strategy and domain', (): void => {
        const router: DomainRouter = new DomainRouter(registry_create(), { defaultDomain: 'onboarding' });
        router.route({ message: 'switch to ubo domain' });
        router.route({ message: 'hello there' });

        const metrics: RoutingMetrics = router.metrics_get();
        expect(metrics.totalRoutes).toBe(2);
        expect(metrics.byStrategy).toEqual({ explicit: 1, dsl_verb: 0, context: 0, keyword: 0, default: 1, fallback: 0 });
        expect(metrics.byDomain).toEqual({ ubo: 1, onboarding: 1 });
        expect(metrics.averageConfidence).toBeCloseTo(0.75);

        router.metrics_reset();
        expect(router.metrics_get()).toEqual({
            totalRoutes: 0,
            byStrategy: { explicit: 0, dsl_verb: 0, context: 0, keyword: 0, default: 0, fallback: 0 },
            byDomain: {},
            averageConfidence: 0,
        });
    });
});
