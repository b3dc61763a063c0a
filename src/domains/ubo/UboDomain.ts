/**
 * @file Beneficial Ownership Domain
 *
 * Ultimate beneficial ownership discovery: entity data, ownership
 * structure, owner resolution, control prong, verification, screening,
 * risk and monitoring.
 *
 * @module domains/ubo
 */

import { vocabulary_load } from '../../dsl/vocabulary/loader.js';
import type { GenerationRequest, GenerationResponse, SlotExtractor } from '../../generator/DslGenerator.js';
import { BaseDomain, type DomainOptions } from '../BaseDomain.js';
import { contextString_get, quoted_extract } from '../extractors.js';

export const UBO_DOMAIN = 'ubo' as const;

export function entityName_extract(request: GenerationRequest): string {
    return quoted_extract(request.instruction) ?? contextString_get(request, 'entity_name') ?? 'Unnamed Entity';
}

/**
 * Two-letter code introduced by `in` or `jurisdiction`; a bare uppercase
 * pair such as `ID` elsewhere in the text is not a jurisdiction.
 */
export function jurisdiction_extract(request: GenerationRequest): string {
    const match: RegExpMatchArray | null = request.instruction.match(/\b(?:in|jurisdiction)\s+([A-Z]{2})\b/);
    if (match) return match[1];
    return contextString_get(request, 'jurisdiction') ?? 'US';
}

const UBO_EXTRACTORS: Readonly<Record<string, SlotExtractor>> = {
    entity_name: entityName_extract,
    jurisdiction: jurisdiction_extract,
};

export class UboDomain extends BaseDomain {
    constructor(options: DomainOptions = {}) {
        super({
            ...options,
            vocabulary: options.vocabulary ?? vocabulary_load(UBO_DOMAIN),
            extractors: UBO_EXTRACTORS,
        });
    }

    /**
     * Complete discovery workflow for one entity.
     */
    workflow_sample(entityName: string, jurisdiction: string): Promise<GenerationResponse> {
        return this.dsl_generate({
            instruction: 'ubo workflow',
            context: { entity_name: entityName, jurisdiction },
        });
    }
}
