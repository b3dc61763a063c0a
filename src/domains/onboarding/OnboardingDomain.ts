/**
 * @file Onboarding Domain
 *
 * Client onboarding: case creation, products, KYC, service discovery,
 * resource planning, attribute binding and workflow activation.
 *
 * @module domains/onboarding
 */

import { vocabulary_load } from '../../dsl/vocabulary/loader.js';
import type { GenerationRequest, SlotExtractor, SlotValue } from '../../generator/DslGenerator.js';
import { BaseDomain, type DomainOptions } from '../BaseDomain.js';
import { contextString_get, quoted_extract } from '../extractors.js';

export const ONBOARDING_DOMAIN = 'onboarding' as const;

/** Product keywords recognised in instructions, in output order. */
const PRODUCT_PHRASES: ReadonlyArray<[string, string]> = [
    ['custody', 'CUSTODY'],
    ['fund accounting', 'FUND_ACCOUNTING'],
    ['transfer agent', 'TRANSFER_AGENT'],
];

const DEFAULT_PRODUCTS: readonly string[] = ['CUSTODY', 'FUND_ACCOUNTING'];

/**
 * Client business unit id: from the instruction, the context, or derived
 * from the clock.
 */
export function cbuId_extract(request: GenerationRequest, now: Date): string {
    const match: RegExpMatchArray | null = request.instruction.match(/CBU-[A-Z0-9]+/);
    if (match) return match[0];
    return contextString_get(request, 'cbu_id') ?? `CBU-${Math.floor(now.getTime() / 1000) % 10000}`;
}

export function naturePurpose_extract(request: GenerationRequest): string | undefined {
    const quoted: string | undefined = quoted_extract(request.instruction);
    if (quoted !== undefined) return quoted;
    if (request.instruction.toLowerCase().includes('fund')) return 'Investment fund setup';
    return undefined;
}

export function products_extract(request: GenerationRequest): SlotValue {
    const lowered: string = request.instruction.toLowerCase();
    const products: string[] = PRODUCT_PHRASES
        .filter(([phrase]: [string, string]): boolean => lowered.includes(phrase))
        .map(([, code]: [string, string]): string => code);
    return products.length > 0 ? products : DEFAULT_PRODUCTS;
}

const ONBOARDING_EXTRACTORS: Readonly<Record<string, SlotExtractor>> = {
    cbu_id: cbuId_extract,
    nature_purpose: naturePurpose_extract,
    products: products_extract,
};

export class OnboardingDomain extends BaseDomain {
    constructor(options: DomainOptions = {}) {
        super({
            ...options,
            vocabulary: options.vocabulary ?? vocabulary_load(ONBOARDING_DOMAIN),
            extractors: ONBOARDING_EXTRACTORS,
        });
    }
}
