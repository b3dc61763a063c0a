/**
 * @file State Machine Property Tests
 *
 * Invariants under test, for every bundled vocabulary:
 *   1. S[i] -> S[i+1] is always accepted.
 *   2. S[i] -> S[j] is rejected whenever j != i + 1.
 *   3. path_resolve(S[i], S[j]) for i < j walks exactly S[i..j].
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { StateMachine } from './StateMachine.js';
import { vocabularies_available, vocabulary_load } from '../vocabulary/loader.js';

describe.each(vocabularies_available())('StateMachine properties (%s)', (domain: string): void => {
    const machine: StateMachine = new StateMachine(vocabulary_load(domain));
    const states: readonly string[] = machine.states_list();
    const index: fc.Arbitrary<number> = fc.integer({ min: 0, max: states.length - 1 });

    it('accepts exactly the immediate successor', (): void => {
        fc.assert(
            fc.property(index, index, (i: number, j: number): void => {
                const attempt = (): void => machine.transition_validate(states[i], states[j]);
                if (j === i + 1) {
                    expect(attempt).not.toThrow();
                } else {
                    expect(attempt).toThrow(`invalid state transition from ${states[i]} to ${states[j]}`);
                }
            }),
        );
    });

    it('walks every state between two ordered states', (): void => {
        fc.assert(
            fc.property(index, index, (a: number, b: number): void => {
                fc.pre(a !== b);
                const [i, j] = a < b ? [a, b] : [b, a];
                expect(machine.path_resolve(states[i], states[j])).toEqual(states.slice(i, j + 1));
            }),
        );
    });
});
