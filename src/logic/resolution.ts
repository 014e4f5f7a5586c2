/**
 * Resolution Engine
 *
 * Decides propositional entailment by refutation: the goal is negated,
 * added to the premises, and the clause set is saturated under binary
 * resolution until the empty clause appears (entailed) or a pass adds
 * nothing new (not entailed). The atom vocabulary is fixed by the input,
 * so the clause space is finite and saturation terminates.
 */

import type { Formula } from '../types/formula.js';
import type { Clause } from '../types/clause.js';
import { ResolutionLimitError } from '../types/errors.js';
import { DEFAULTS, type ResolutionOptions } from '../types/options.js';
import {
    clauseKey,
    clauseToString,
    createClause,
    isEmptyClause,
    isTautology,
} from './clause.js';
import { negate, toCNF } from './normalizer.js';

export interface ProofResult {
    /** Whether the empty clause was derived */
    refuted: boolean;
    /** Number of novel resolvents added to the working set */
    clausesGenerated: number;
    /** Number of saturation passes completed */
    passes: number;
    /** Number of resolvents computed, novel or not */
    resolutions: number;
    /** Readable derivation, when requested */
    steps?: string[];
}

/**
 * Compute every resolvent of two clauses, one per complementary atom.
 */
export function resolve(c1: Clause, c2: Clause): Clause[] {
    const resolvents: Clause[] = [];
    for (const lit of c1.literals) {
        const clash = c2.literals.find(other => other.atom === lit.atom && other.negated !== lit.negated);
        if (!clash) continue;
        resolvents.push(createClause([
            ...c1.literals.filter(l => l !== lit),
            ...c2.literals.filter(l => l !== clash),
        ]));
    }
    return resolvents;
}

/**
 * Saturate a clause set under resolution, looking for the empty clause.
 */
export function refute(clauses: Iterable<Clause>, options: ResolutionOptions = {}): ProofResult {
    const maxResolutions = options.maxResolutions ?? DEFAULTS.maxResolutions;
    const steps: string[] | undefined = options.includeTrace ? [] : undefined;

    const seen = new Set<string>();
    const working: Clause[] = [];
    const result: ProofResult = { refuted: false, clausesGenerated: 0, passes: 0, resolutions: 0, steps };

    for (const clause of clauses) {
        const key = clauseKey(clause);
        if (seen.has(key)) continue;
        seen.add(key);
        if (isEmptyClause(clause)) {
            steps?.push(`□ is a premise`);
            result.refuted = true;
            return result;
        }
        // Tautologies never contribute to a refutation
        if (isTautology(clause)) continue;
        working.push(clause);
    }

    // Pairs among clauses below `frontier` were resolved in an earlier pass
    let frontier = 0;

    while (true) {
        const added: Clause[] = [];

        for (let j = frontier; j < working.length; j++) {
            for (let i = 0; i < j; i++) {
                for (const resolvent of resolve(working[i], working[j])) {
                    result.resolutions++;
                    if (result.resolutions > maxResolutions) {
                        throw new ResolutionLimitError(maxResolutions, working.length + added.length);
                    }
                    if (isTautology(resolvent)) continue;

                    const key = clauseKey(resolvent);
                    if (seen.has(key)) continue;
                    seen.add(key);
                    added.push(resolvent);
                    result.clausesGenerated++;
                    steps?.push(`${clauseToString(working[i])}, ${clauseToString(working[j])} ⊢ ${clauseToString(resolvent)}`);

                    if (isEmptyClause(resolvent)) {
                        result.refuted = true;
                        result.passes++;
                        options.onProgress?.(result.passes, working.length + added.length);
                        return result;
                    }
                }
            }
        }

        result.passes++;
        frontier = working.length;
        working.push(...added);
        options.onProgress?.(result.passes, working.length);

        if (added.length === 0) {
            return result;
        }
    }
}

/**
 * Refute `clauses ∧ ¬goal`, returning the proof details.
 */
export function prove(clauses: Iterable<Clause>, goal: Formula, options: ResolutionOptions = {}): ProofResult {
    const negatedGoal = toCNF(negate(goal), { maxClauses: options.maxClauses });
    return refute([...clauses, ...negatedGoal], options);
}

/**
 * Check whether a clause set entails a formula.
 */
export function entails(clauses: Iterable<Clause>, goal: Formula, options: ResolutionOptions = {}): boolean {
    return prove(clauses, goal, options).refuted;
}

/**
 * Check whether a clause set has a model.
 */
export function isSatisfiable(clauses: Iterable<Clause>, options: ResolutionOptions = {}): boolean {
    return !refute(clauses, options).refuted;
}

/**
 * A formula is valid when the empty clause set entails it.
 */
export function isValid(formula: Formula, options: ResolutionOptions = {}): boolean {
    return entails([], formula, options);
}

/**
 * Check whether two formulas entail each other.
 */
export function areEquivalent(a: Formula, b: Formula, options: ResolutionOptions = {}): boolean {
    return entails(toCNF(a, options), b, options) && entails(toCNF(b, options), a, options);
}
