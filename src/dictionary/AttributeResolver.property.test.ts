/**
 * @file Attribute Resolver Property Tests
 *
 * Invariants under test:
 *   1. dsl_enhance is idempotent.
 *   2. dsl_enhance never alters a reference that already carries a name.
 *   3. Every reference extracted after enhancement keeps its id.
 *   4. A generated reference validates for a known id and fails for an unknown one.
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { AttributeResolver } from './AttributeResolver.js';
import { MemoryDictionaryRepository } from './MemoryDictionaryRepository.js';
import { references_extract, type AttributeReference } from './references.js';
import { SettingsService } from '../config/settings.js';

const KNOWN_IDS: readonly string[] = [
    '456789ab-cdef-1234-5678-9abcdef01301',
    '456789ab-cdef-1234-5678-9abcdef01303',
];

const hexId: fc.Arbitrary<string> = fc.stringOf(fc.constantFrom(...'0123456789abcdef'.split('')), {
    minLength: 8,
    maxLength: 12,
});

const piece: fc.Arbitrary<string> = fc.oneof(
    fc.constantFrom(...KNOWN_IDS).map((id: string): string => `@attr{${id}}`),
    hexId.map((id: string): string => `@attr{${id}}`),
    fc.constantFrom(...KNOWN_IDS).map((id: string): string => `@attr{${id}:custom.label}`),
    fc.constantFrom('(values.bind', ')', ' ', '"text"', '\n', 'case.create'),
);

const documentText: fc.Arbitrary<string> = fc.array(piece, { maxLength: 12 }).map((parts: string[]): string => parts.join(' '));

describe('AttributeResolver properties', (): void => {
    const resolver: AttributeResolver = new AttributeResolver({
        repository: MemoryDictionaryRepository.seeded(),
        settings: new SettingsService({}),
    });

    it('enhances idempotently', async (): Promise<void> => {
        await fc.assert(
            fc.asyncProperty(documentText, async (text: string): Promise<void> => {
                const once: string = await resolver.dsl_enhance(text);
                expect(await resolver.dsl_enhance(once)).toBe(once);
            }),
            { numRuns: 50 },
        );
    });

    it('keeps ids and existing names', async (): Promise<void> => {
        await fc.assert(
            fc.asyncProperty(documentText, async (text: string): Promise<void> => {
                const before: AttributeReference[] = references_extract(text);
                const after: AttributeReference[] = references_extract(await resolver.dsl_enhance(text));
                expect(after.map((r: AttributeReference): string => r.id)).toEqual(before.map((r: AttributeReference): string => r.id));
                before.forEach((reference: AttributeReference, i: number): void => {
                    if (reference.name !== null) expect(after[i].name).toBe(reference.name);
                });
            }),
            { numRuns: 50 },
        );
    });

    it('round-trips generated references through validation', async (): Promise<void> => {
        const known: Set<string> = new Set(KNOWN_IDS);
        await fc.assert(
            fc.asyncProperty(fc.oneof(fc.constantFrom(...KNOWN_IDS), hexId), async (id: string): Promise<void> => {
                const reference: string = await resolver.reference_generate(id);
                if (known.has(id)) {
                    await expect(resolver.references_validate(reference)).resolves.toBeUndefined();
                } else {
                    expect(reference).toBe(`@attr{${id}}`);
                    await expect(resolver.references_validate(reference)).rejects.toThrow(`invalid attribute reference @attr{${id}}`);
                }
            }),
            { numRuns: 30 },
        );
    });
});
