/**
 * @file Domain State Machine
 *
 * Ordered, strictly linear state list derived from a vocabulary. The
 * only legal transition is to the immediate successor; there is no
 * skipping, repeating or moving backward.
 *
 * State inference from a context map inspects the boolean markers that
 * vocabulary verbs declare, most advanced state first. The first marker
 * set wins even when earlier markers are missing; inconsistent marker
 * sets can therefore report a later state than the document supports.
 *
 * @module dsl/state/StateMachine
 */

import { DslError } from '../../errors/DslError.js';
import type { Verb, Vocabulary } from '../vocabulary/types.js';

export type DslContext = Record<string, unknown>;

/** Context key holding an explicit state. */
export const CURRENT_STATE_KEY = 'current_state' as const;

interface MarkerRule {
    marker: string;
    state: string;
    index: number;
}

export class StateMachine {
    private readonly states: readonly string[];
    private readonly indexByState: ReadonlyMap<string, number>;
    /** Marker rules, most advanced state first. */
    private readonly markerRules: readonly MarkerRule[];

    constructor(vocabulary: Vocabulary) {
        this.states = vocabulary.states;
        this.indexByState = new Map(vocabulary.states.map((s: string, i: number): [string, number] => [s, i]));

        const rules: Map<string, MarkerRule> = new Map();
        for (const verb of Object.values(vocabulary.verbs)) {
            const marker: string | undefined = verb.transition?.marker;
            if (!verb.transition || marker === undefined || rules.has(marker)) continue;
            rules.set(marker, { marker, state: verb.transition.to, index: this.index_of(verb.transition.to) });
        }
        this.markerRules = [...rules.values()].sort((a: MarkerRule, b: MarkerRule): number => b.index - a.index);
    }

    states_list(): readonly string[] {
        return this.states;
    }

    state_initial(): string {
        return this.states[0];
    }

    state_terminal(): string {
        return this.states[this.states.length - 1];
    }

    state_isKnown(state: string): boolean {
        return this.indexByState.has(state);
    }

    /**
     * Position of a state in the ordered list, or -1 when unknown.
     */
    index_of(state: string): number {
        return this.indexByState.get(state) ?? -1;
    }

    /**
     * Successor of a state, or null at the terminal state.
     *
     * @throws DslError ILLEGAL_TRANSITION for an unknown state.
     */
    state_next(state: string): string | null {
        const index: number = this.known_require(state, 'state');
        return index + 1 < this.states.length ? this.states[index + 1] : null;
    }

    /**
     * Validate a single-step transition.
     *
     * @throws DslError ILLEGAL_TRANSITION for unknown states or any move
     *   other than to the immediate successor.
     */
    transition_validate(from: string, to: string): void {
        const fromIndex: number = this.known_require(from, 'from state');
        const toIndex: number = this.known_require(to, 'to state');
        if (fromIndex + 1 !== toIndex) {
            throw new DslError('ILLEGAL_TRANSITION', `invalid state transition from ${from} to ${to}`, {
                details: { from, to },
            });
        }
    }

    /**
     * States traversed from `from` to `to`, both included.
     *
     * @throws DslError ILLEGAL_TRANSITION when either state is unknown or
     *   `to` does not come after `from`.
     */
    path_resolve(from: string, to: string): string[] {
        const fromIndex: number = this.known_require(from, 'from state');
        const toIndex: number = this.known_require(to, 'to state');
        if (toIndex <= fromIndex) {
            throw new DslError('ILLEGAL_TRANSITION', `target state ${to} must come after ${from}`, {
                details: { from, to },
            });
        }
        return this.states.slice(fromIndex, toIndex + 1);
    }

    /**
     * Current state of a context map: the explicit `current_state` when
     * present, otherwise the state of the highest-priority set marker,
     * otherwise the initial state.
     *
     * @throws DslError ILLEGAL_TRANSITION when `current_state` is not a known state.
     */
    state_current(context: DslContext | null | undefined): string {
        if (!context) return this.state_initial();

        const explicit: unknown = context[CURRENT_STATE_KEY];
        if (typeof explicit === 'string') {
            if (!this.state_isKnown(explicit)) {
                throw new DslError('ILLEGAL_TRANSITION', `invalid state in context: ${explicit}`, {
                    details: { state: explicit },
                });
            }
            return explicit;
        }

        for (const rule of this.markerRules) {
            if (context[rule.marker]) return rule.state;
        }
        return this.state_initial();
    }

    /**
     * Marker keys in inspection order.
     */
    markers_list(): string[] {
        return this.markerRules.map((r: MarkerRule): string => r.marker);
    }

    /**
     * Most advanced state reached by a set of verbs, or null if none transitions.
     */
    stateReached_resolve(verbs: readonly Verb[]): string | null {
        let best: number = -1;
        for (const verb of verbs) {
            if (!verb.transition) continue;
            best = Math.max(best, this.index_of(verb.transition.to));
        }
        return best >= 0 ? this.states[best] : null;
    }

    private known_require(state: string, role: string): number {
        const index: number = this.index_of(state);
        if (index === -1) {
            throw new DslError('ILLEGAL_TRANSITION', `invalid ${role}: ${state}`, { details: { state } });
        }
        return index;
    }
}
