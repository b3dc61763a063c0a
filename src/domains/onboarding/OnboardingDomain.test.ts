/**
 * @file Onboarding Domain Tests
 *
 * @module domains/onboarding
 */

import { describe, it, expect } from 'vitest';
import { OnboardingDomain, cbuId_extract, naturePurpose_extract, products_extract } from './OnboardingDomain.js';
import type { DomainMetrics } from '../types.js';
import type { GenerationResponse } from '../../generator/DslGenerator.js';
import { TelemetryBus } from '../../telemetry/TelemetryBus.js';
import type { TelemetryEvent } from '../../telemetry/types.js';

const NOW: Date = new Date('2024-01-01T00:00:00Z');

function domain_create(bus?: TelemetryBus): OnboardingDomain {
    return new OnboardingDomain({ now: (): Date => NOW, bus });
}

describe('onboarding slot extractors', (): void => {
    it('takes the CBU id from the instruction, the context or the clock', (): void => {
        expect(cbuId_extract({ instruction: 'create case for CBU-77' }, NOW)).toBe('CBU-77');
        expect(cbuId_extract({ instruction: 'create case', context: { cbu_id: 'CBU-CTX' } }, NOW)).toBe('CBU-CTX');
        expect(cbuId_extract({ instruction: 'create case' }, NOW)).toBe('CBU-7200');
    });

    it('reads the nature and purpose', (): void => {
        expect(naturePurpose_extract({ instruction: 'create case "Pension mandate"' })).toBe('Pension mandate');
        expect(naturePurpose_extract({ instruction: 'create case for a fund' })).toBe('Investment fund setup');
        expect(naturePurpose_extract({ instruction: 'create case' })).toBeUndefined();
    });

    it('maps product phrases to codes', (): void => {
        expect(products_extract({ instruction: 'add transfer agent and fund accounting' })).toEqual(['FUND_ACCOUNTING', 'TRANSFER_AGENT']);
        expect(products_extract({ instruction: 'add products' })).toEqual(['CUSTODY', 'FUND_ACCOUNTING']);
    });
});

describe('OnboardingDomain generation', (): void => {
    it('creates a case', async (): Promise<void> => {
        const response: GenerationResponse = await domain_create().dsl_generate({
            instruction: 'create case for CBU-77 "Global equity fund"',
        });
        expect(response.dsl).toBe('(case.create (cbu.id "CBU-77") (nature-purpose "Global equity fund"))');
        expect(response.verb).toBe('case.create');
        expect(response.parameters).toEqual({
            pattern: 'onboarding_basic',
            intent: 'create case',
            generatedAt: '2024-01-01T00:00:00.000Z',
            slots: { cbu_id: 'CBU-77', nature_purpose: 'Global equity fund' },
        });
    });

    it('uses the default nature and purpose', async (): Promise<void> => {
        const response: GenerationResponse = await domain_create().dsl_generate({ instruction: 'create case' });
        expect(response.dsl).toBe('(case.create (cbu.id "CBU-7200") (nature-purpose "Standard client onboarding"))');
    });

    it('adds products', async (): Promise<void> => {
        const response: GenerationResponse = await domain_create().dsl_generate({
            instruction: 'add products custody and transfer agent',
        });
        expect(response.dsl).toBe('(products.add "CUSTODY" "TRANSFER_AGENT")');
        expect(response.parameters.slots).toEqual({ products: '"CUSTODY" "TRANSFER_AGENT"' });
    });

    it('starts KYC with default requirements', async (): Promise<void> => {
        const response: GenerationResponse = await domain_create().dsl_generate({ instruction: 'start KYC' });
        expect(response.dsl).toBe('(kyc.start (requirements (document "CertificateOfIncorporation") (jurisdiction "US")))');
    });

    it('rejects instructions outside the domain', async (): Promise<void> => {
        await expect(domain_create().dsl_generate({ instruction: 'make coffee' })).rejects.toThrow(
            'unsupported onboarding instruction: make coffee',
        );
    });
});

describe('OnboardingDomain metrics', (): void => {
    it('counts requests, verbs, transitions and errors', async (): Promise<void> => {
        const bus: TelemetryBus = new TelemetryBus();
        const failures: TelemetryEvent[] = [];
        bus.subscribe((event: TelemetryEvent): void => {
            if (event.type === 'validation_failed') failures.push(event);
        });
        const domain: OnboardingDomain = domain_create(bus);

        expect(domain.verbs_validate('(case.create (cbu.id "CBU-1"))')).toEqual(['case.create']);
        expect((): string[] => domain.verbs_validate('(bogus.verb)')).toThrow('invalid onboarding verb: bogus.verb');
        domain.transition_validate('CREATE', 'PRODUCTS_ADDED');
        expect((): void => domain.transition_validate('CREATE', 'COMPLETE')).toThrow(
            'invalid state transition from CREATE to COMPLETE',
        );
        await expect(domain.dsl_generate({ instruction: 'make coffee' })).rejects.toThrow();

        const metrics: DomainMetrics = domain.metrics_get();
        expect(metrics).toMatchObject({
            domain: 'onboarding',
            version: '1.0.0',
            totalRequests: 3,
            successfulRequests: 1,
            failedRequests: 2,
            totalVerbs: 54,
            activeVerbs: 1,
            unusedVerbs: 53,
            stateTransitions: { 'CREATE->PRODUCTS_ADDED': 1 },
            validationErrors: { VERB_NOT_FOUND: 1 },
            generationErrors: { UNSUPPORTED_INSTRUCTION: 1 },
            isHealthy: true,
            uptimeSeconds: 0,
            collectedAt: '2024-01-01T00:00:00.000Z',
        });
        expect(failures).toEqual([
            { type: 'validation_failed', domain: 'onboarding', code: 'VERB_NOT_FOUND', message: 'invalid onboarding verb: bogus.verb' },
        ]);
    });

    it('tracks health', (): void => {
        const domain: OnboardingDomain = domain_create();
        expect(domain.health_get()).toBe(true);
        domain.health_set(false);
        expect(domain.health_get()).toBe(false);
        expect(domain.metrics_get().isHealthy).toBe(false);
    });

    it('counts inferred states', (): void => {
        const domain: OnboardingDomain = domain_create();
        expect(domain.state_current({ cbu_id: 'CBU-1' })).toBe('CREATE');
        expect(domain.state_current(null)).toBe('CREATE');
        expect(domain.metrics_get().currentStates).toEqual({ CREATE: 2 });
    });
});
