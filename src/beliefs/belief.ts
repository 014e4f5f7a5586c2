import type { Formula } from '../types/formula.js';
import type { CNFFormula, ClausifyOptions } from '../types/clause.js';
import { InvalidEntrenchmentError } from '../types/errors.js';
import { toCNF } from '../logic/normalizer.js';
import { DEFAULTS } from '../types/options.js';

/**
 * A stored belief. The formula as given is kept for display,
 * the clausal form for reasoning.
 */
export interface Belief {
    readonly formula: Formula;
    readonly cnf: CNFFormula;
    readonly entrenchment: number;
}

export function createBelief(
    formula: Formula,
    entrenchment: number = DEFAULTS.entrenchment,
    options: ClausifyOptions = {}
): Belief {
    if (!Number.isInteger(entrenchment)) {
        throw new InvalidEntrenchmentError(entrenchment);
    }
    return Object.freeze({ formula, cnf: toCNF(formula, options), entrenchment });
}
