/**
 * Contraction and Revision
 *
 * Contraction is greedy: while the remaining beliefs still entail the
 * target, the belief that is minimal under the removal comparator is
 * dropped. This is not a search for a minimal retraction set; it can
 * remove beliefs that take no part in any proof of the target.
 *
 * The loop runs on a working copy and commits once, so an error thrown
 * part-way (a resolution limit) leaves the base as it was.
 */

import type { Formula } from '../types/formula.js';
import type { BeliefBase } from './base.js';
import { createBelief, type Belief } from './belief.js';
import { VacuousTargetError } from '../types/errors.js';
import {
    DEFAULTS,
    type ContractionOptions,
    type ContractionPhase,
    type RemovalComparator,
} from '../types/options.js';
import { dedupeClauses } from '../logic/clause.js';
import { assertFormula, negate } from '../logic/normalizer.js';
import { formulaToString } from '../logic/printer.js';
import { entails, isValid } from '../logic/resolution.js';

/**
 * Lowest entrenchment first; ties go to the earlier position.
 */
export const byEntrenchment: RemovalComparator = (a, b) =>
    a.belief.entrenchment - b.belief.entrenchment || a.index - b.index;

/**
 * Remove beliefs until `formula` is no longer entailed.
 * Returns the removed beliefs in removal order.
 */
export function contract(base: BeliefBase, formula: Formula, options: ContractionOptions = {}): Belief[] {
    const target = assertFormula(formula);
    const comparator = options.comparator ?? byEntrenchment;
    let phase: ContractionPhase = 'idle';
    const enter = (next: ContractionPhase): void => {
        options.onTransition?.(phase, next);
        phase = next;
    };

    const remaining = base.beliefs().map((belief, index) => ({ belief, index }));
    const holds = (): boolean => entails(dedupeClauses(remaining.flatMap(r => r.belief.cnf)), target, options);

    enter('checking');
    if (!holds()) {
        enter('idle');
        return [];
    }

    if (isValid(target, options)) {
        enter('idle');
        throw new VacuousTargetError(formulaToString(target));
    }

    const removed: Belief[] = [];
    do {
        enter('selecting');
        let victim = 0;
        for (let i = 1; i < remaining.length; i++) {
            if (comparator(remaining[i], remaining[victim]) < 0) {
                victim = i;
            }
        }

        enter('removing');
        const [{ belief }] = remaining.splice(victim, 1);
        removed.push(belief);

        enter('checking');
    } while (holds());

    base.retract(removed);
    enter('idle');
    return removed;
}

/**
 * AGM revision: contract ¬φ, then expand with φ.
 *
 * When φ is self-contradictory, ¬φ is a tautology and cannot be contracted;
 * the contraction is skipped and φ is still added, which leaves the base
 * inconsistent.
 */
export function revise(
    base: BeliefBase,
    formula: Formula,
    entrenchment: number = DEFAULTS.entrenchment,
    options: ContractionOptions = {}
): Belief[] {
    const incoming = createBelief(assertFormula(formula), entrenchment, { maxClauses: options.maxClauses });
    const negated = negate(incoming.formula);

    const removed = isValid(negated, options) ? [] : contract(base, negated, options);
    base.insert(incoming);
    return removed;
}
