/// <reference path="../types/logic-solver.d.ts" />
/**
 * SAT Engine
 *
 * Model finding for clause sets through the logic-solver package
 * (MiniSat compiled to JS). Resolution decides entailment; this engine
 * produces a witness assignment when a clause set is satisfiable.
 */

import Logic from 'logic-solver';
import type { Clause } from '../types/clause.js';
import { atomsOf } from '../logic/clause.js';

export interface SatResult {
    sat: boolean;
    /** Truth value per atom, when satisfiable */
    model?: Map<string, boolean>;
    statistics: {
        variables: number;
        clauses: number;
        timeMs: number;
    };
}

/**
 * Check satisfiability of clauses using the SAT solver.
 */
export function checkSat(clauses: readonly Clause[]): SatResult {
    const startTime = Date.now();
    const atoms = atomsOf(clauses);
    const statistics = () => ({
        variables: atoms.length,
        clauses: clauses.length,
        timeMs: Date.now() - startTime,
    });

    if (clauses.some(c => c.literals.length === 0)) {
        // Empty clause = unsatisfiable
        return { sat: false, statistics: statistics() };
    }

    // The solver rejects digit-only variable names, so atoms are renamed by index
    const variable = (atom: string): string => `v${atoms.indexOf(atom)}`;

    const solver = new Logic.Solver();
    for (const clause of clauses) {
        const disjuncts = clause.literals.map(lit => lit.negated ? Logic.not(variable(lit.atom)) : variable(lit.atom));
        solver.require(Logic.or(...disjuncts));
    }

    const solution = solver.solve();
    if (!solution) {
        return { sat: false, statistics: statistics() };
    }

    const trueVars = new Set(solution.getTrueVars());
    const model = new Map<string, boolean>();
    for (const atom of atoms) {
        model.set(atom, trueVars.has(variable(atom)));
    }
    return { sat: true, model, statistics: statistics() };
}
