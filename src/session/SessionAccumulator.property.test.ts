/**
 * @file Session Accumulator Property Tests
 *
 * Concurrent appends to one session land in call order, whatever mix of
 * sessions the calls are spread across.
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { FRAGMENT_BOUNDARY, SessionAccumulator } from './SessionAccumulator.js';
import { SettingsService } from '../config/settings.js';

interface Append {
    session: string;
    fragment: string;
}

const append: fc.Arbitrary<Append> = fc.record({
    session: fc.constantFrom('s1', 's2', 's3'),
    fragment: fc.stringOf(fc.constantFrom('a', 'b', '(', ')', ' ', 'x.y'), { minLength: 1, maxLength: 8 }),
});

describe('SessionAccumulator properties', (): void => {
    it('keeps call order per session under concurrency', async (): Promise<void> => {
        await fc.assert(
            fc.asyncProperty(fc.array(append, { maxLength: 20 }), async (appends: Append[]): Promise<void> => {
                const sessions: SessionAccumulator = new SessionAccumulator({ settings: new SettingsService({}) });
                const kept: Append[] = appends.filter((a: Append): boolean => a.fragment.trim() !== '');

                await Promise.all(kept.map((a: Append): Promise<string> => sessions.dsl_accumulate(a.session, 'onboarding', a.fragment)));

                for (const session of ['s1', 's2', 's3']) {
                    const expected: string = kept
                        .filter((a: Append): boolean => a.session === session)
                        .map((a: Append): string => a.fragment.trim())
                        .join(FRAGMENT_BOUNDARY);
                    expect(sessions.dsl_get(session, 'onboarding')).toBe(expected);
                }
            }),
            { numRuns: 50 },
        );
    });
});
