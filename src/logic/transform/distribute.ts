import type { Literal } from '../../types/clause.js';
import { ClausificationLimitError } from '../../types/errors.js';
import { createLiteral } from '../clause.js';
import type { NNFFormula } from './nnf.js';

/**
 * Distribute OR over AND to achieve CNF.
 * (A ∨ (B ∧ C)) → (A ∨ B) ∧ (A ∨ C)
 *
 * Works on lists of literal lists: a conjunction concatenates its sides'
 * clauses, a disjunction pairs every left clause with every right clause.
 */
export function distribute(node: NNFFormula, maxClauses: number): Literal[][] {
    switch (node.type) {
        case 'atom':
            return [[createLiteral(node.name)]];

        case 'not':
            return [[createLiteral(node.operand.name, true)]];

        case 'and': {
            const clauses = [
                ...distribute(node.left, maxClauses),
                ...distribute(node.right, maxClauses),
            ];
            if (clauses.length > maxClauses) {
                throw new ClausificationLimitError(maxClauses);
            }
            return clauses;
        }

        case 'or': {
            const left = distribute(node.left, maxClauses);
            const right = distribute(node.right, maxClauses);

            if (left.length * right.length > maxClauses) {
                throw new ClausificationLimitError(maxClauses);
            }

            // (A ∧ B) ∨ (C ∧ D) → (A ∨ C) ∧ (A ∨ D) ∧ (B ∨ C) ∧ (B ∨ D)
            const clauses: Literal[][] = [];
            for (const l of left) {
                for (const r of right) {
                    clauses.push([...l, ...r]);
                }
            }
            return clauses;
        }
    }
}
