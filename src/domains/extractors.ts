/**
 * @file Slot Extractor Helpers
 *
 * Small building blocks for the per-domain slot extractors used by the
 * generator.
 *
 * @module domains/extractors
 */

import type { GenerationRequest } from '../generator/DslGenerator.js';

/**
 * First double-quoted string in the instruction.
 */
export function quoted_extract(instruction: string): string | undefined {
    const match: RegExpMatchArray | null = instruction.match(/"([^"]+)"/);
    return match ? match[1] : undefined;
}

/**
 * Non-empty string value of a request context key.
 */
export function contextString_get(request: GenerationRequest, key: string): string | undefined {
    const value: unknown = request.context?.[key];
    return typeof value === 'string' && value !== '' ? value : undefined;
}
