/**
 * @file Beneficial Ownership Domain Tests
 *
 * @module domains/ubo
 */

import { describe, it, expect } from 'vitest';
import { UboDomain, entityName_extract, jurisdiction_extract } from './UboDomain.js';
import type { GenerationResponse } from '../../generator/DslGenerator.js';
import type { ExtractedContext } from '../../dsl/state/ContextExtractor.js';

const NOW: Date = new Date('2024-01-01T00:00:00Z');

function domain_create(): UboDomain {
    return new UboDomain({ now: (): Date => NOW });
}

describe('ubo slot extractors', (): void => {
    it('reads the entity name', (): void => {
        expect(entityName_extract({ instruction: 'collect entity data for "Acme Holdings"' })).toBe('Acme Holdings');
        expect(entityName_extract({ instruction: 'collect entity data', context: { entity_name: 'Beta SA' } })).toBe('Beta SA');
        expect(entityName_extract({ instruction: 'collect entity data' })).toBe('Unnamed Entity');
    });

    it('reads a two-letter jurisdiction', (): void => {
        expect(jurisdiction_extract({ instruction: 'collect entity data in GB' })).toBe('GB');
        expect(jurisdiction_extract({ instruction: 'collect entity data', context: { jurisdiction: 'LU' } })).toBe('LU');
        expect(jurisdiction_extract({ instruction: 'collect entity data' })).toBe('US');
        expect(jurisdiction_extract({ instruction: 'collect entity data for jurisdiction DE' })).toBe('DE');
    });

    it('ignores uppercase pairs that are not introduced as a jurisdiction', (): void => {
        expect(jurisdiction_extract({ instruction: 'screen person ID if OK' })).toBe('US');
        expect(jurisdiction_extract({ instruction: 'screen person ID', context: { jurisdiction: 'FR' } })).toBe('FR');
    });
});

describe('UboDomain', (): void => {
    it('describes itself from its vocabulary', (): void => {
        const domain: UboDomain = domain_create();
        expect(domain.name).toBe('ubo');
        expect(domain.version).toBe('2.1.0');
        expect(domain.state_initial()).toBe('INITIAL');
        expect(domain.states_list()).toHaveLength(11);
    });

    it('generates a single step', async (): Promise<void> => {
        const response: GenerationResponse = await domain_create().dsl_generate({
            instruction: 'collect entity data for "Acme" in GB',
        });
        expect(response.dsl).toBe(
            '(ubo.collect-entity-data (entity_name "Acme") (jurisdiction "GB") (entity_type "CORPORATION"))',
        );
        expect(response.parameters.pattern).toBe('ubo_step');
        expect(response.parameters.slots).toEqual({ entity_name: 'Acme', jurisdiction: 'GB', entity_type: 'CORPORATION' });
    });

    it('uses slot defaults for later steps', async (): Promise<void> => {
        const response: GenerationResponse = await domain_create().dsl_generate({ instruction: 'screen person' });
        expect(response.dsl).toBe(
            '(ubo.screen-person (ubo_id "ubo-001") (screening_lists ["OFAC", "EU_SANCTIONS", "PEP_DATABASE"]) (screening_intensity "COMPREHENSIVE"))',
        );
    });

    it('prefers the more specific workflow phrase', async (): Promise<void> => {
        const response: GenerationResponse = await domain_create().dsl_generate({
            instruction: 'run the trust ubo workflow',
            context: { entity_name: 'Family Trust' },
        });
        expect(response.parameters.pattern).toBe('ubo_trust');
        expect(response.dsl.split('\n')[1]).toBe('; Trust: Family Trust (Jurisdiction: US)');
    });

    it('generates the complete discovery workflow', async (): Promise<void> => {
        const domain: UboDomain = domain_create();
        const response: GenerationResponse = await domain.workflow_sample('Acme Holdings', 'LU');

        expect(response.verb).toBe('ubo.collect-entity-data');
        expect(response.parameters.pattern).toBe('ubo_standard');
        expect(response.parameters.slots).toEqual({ entity_name: 'Acme Holdings', jurisdiction: 'LU' });
        expect(response.dsl.split('\n').slice(0, 5)).toEqual([
            '; Beneficial ownership discovery',
            '; Entity: Acme Holdings (Jurisdiction: LU)',
            '',
            '(ubo.collect-entity-data',
            '  (entity_name "Acme Holdings")',
        ]);
        expect(domain.verbs_validate(response.dsl)).toHaveLength(11);

        const context: ExtractedContext = domain.context_extract(response.dsl);
        expect(context.entity_name).toBe('Acme Holdings');
        expect(context.jurisdiction).toBe('LU');
    });
});
