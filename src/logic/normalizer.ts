/**
 * Normalizer - CNF Transformation
 *
 * Converts arbitrary propositional formulas to Conjunctive Normal Form.
 * 1. Eliminate biconditionals (↔)
 * 2. Eliminate implications (→)
 * 3. Push negations inward (NNF)
 * 4. Distribute OR over AND
 * 5. Extract clauses (duplicate literals and clauses collapse)
 */

import { z } from 'zod';
import type { Formula } from '../types/formula.js';
import type { CNFFormula, ClausifyOptions } from '../types/clause.js';
import { MalformedFormulaError } from '../types/errors.js';
import { DEFAULTS } from '../types/options.js';
import { createClause, dedupeClauses, isTautology } from './clause.js';
import { toNNF, distribute } from './transform/index.js';

const ATOM_NAME = /^[A-Za-z0-9_]+$/;

const formulaSchema: z.ZodType<Formula> = z.lazy(() =>
    z.union([
        z.object({
            type: z.literal('atom'),
            name: z.string().regex(ATOM_NAME, 'atom names are alphanumeric identifiers'),
        }),
        z.object({
            type: z.literal('not'),
            operand: formulaSchema,
        }),
        z.object({
            type: z.enum(['and', 'or', 'implies', 'iff']),
            left: formulaSchema,
            right: formulaSchema,
        }),
    ])
);

/**
 * Validate a formula tree, rejecting missing or malformed input.
 */
export function assertFormula(formula: unknown): Formula {
    if (formula === null || formula === undefined) {
        throw new MalformedFormulaError('Formula is empty or missing');
    }
    const result = formulaSchema.safeParse(formula);
    if (!result.success) {
        const issue = result.error.issues[0];
        const path = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
        throw new MalformedFormulaError(`Malformed formula tree${path}: ${issue.message}`);
    }
    return result.data;
}

/**
 * Convert a formula to a set of clauses.
 *
 * Tautological clauses are kept unless `simplify` is set; resolution does
 * not need them removed.
 */
export function toCNF(formula: Formula | null | undefined, options: ClausifyOptions = {}): CNFFormula {
    const tree = assertFormula(formula);
    const maxClauses = options.maxClauses ?? DEFAULTS.maxClauses;

    const nnf = toNNF(tree);
    const clauses = distribute(nnf, maxClauses).map(createClause);
    const kept = options.simplify ? clauses.filter(c => !isTautology(c)) : clauses;

    return dedupeClauses(kept);
}

/**
 * Negate a formula. Double negations are left for the normalizer to remove.
 */
export function negate(formula: Formula): Formula {
    return { type: 'not', operand: formula };
}
