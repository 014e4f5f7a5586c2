import type { Atom, Formula } from '../../types/formula.js';

export interface NegatedAtom {
    readonly type: 'not';
    readonly operand: Atom;
}

export type NNFLiteral = Atom | NegatedAtom;

export interface NNFJunction {
    readonly type: 'and' | 'or';
    readonly left: NNFFormula;
    readonly right: NNFFormula;
}

export type NNFFormula = NNFLiteral | NNFJunction;

/**
 * Convert a formula to Negation Normal Form (NNF).
 *
 * In NNF:
 * - Negations only appear on atoms
 * - Only AND and OR remain
 * - Implications and biconditionals are eliminated
 */
export function toNNF(node: Formula): NNFFormula {
    switch (node.type) {
        case 'iff':
            // A ↔ B → (A → B) ∧ (B → A)
            return toNNF({
                type: 'and',
                left: { type: 'implies', left: node.left, right: node.right },
                right: { type: 'implies', left: node.right, right: node.left },
            });

        case 'implies':
            // A → B → ¬A ∨ B
            return {
                type: 'or',
                left: pushNegation(node.left),
                right: toNNF(node.right),
            };

        case 'not':
            return pushNegation(node.operand);

        case 'and':
        case 'or':
            return {
                type: node.type,
                left: toNNF(node.left),
                right: toNNF(node.right),
            };

        case 'atom':
            return node;
    }
}

/**
 * Push a negation inward (De Morgan's laws, double negation).
 * Used when we encounter `not(node)` and want to push the `not` down.
 */
function pushNegation(node: Formula): NNFFormula {
    switch (node.type) {
        case 'not':
            // Double negation elimination: ¬¬A → A
            return toNNF(node.operand);

        case 'and':
            // De Morgan: ¬(A ∧ B) → ¬A ∨ ¬B
            return {
                type: 'or',
                left: pushNegation(node.left),
                right: pushNegation(node.right),
            };

        case 'or':
            // De Morgan: ¬(A ∨ B) → ¬A ∧ ¬B
            return {
                type: 'and',
                left: pushNegation(node.left),
                right: pushNegation(node.right),
            };

        case 'implies':
            // ¬(A → B) → A ∧ ¬B
            return {
                type: 'and',
                left: toNNF(node.left),
                right: pushNegation(node.right),
            };

        case 'iff':
            // ¬((A → B) ∧ (B → A)) → (A ∧ ¬B) ∨ (B ∧ ¬A)
            return {
                type: 'or',
                left: pushNegation({ type: 'implies', left: node.left, right: node.right }),
                right: pushNegation({ type: 'implies', left: node.right, right: node.left }),
            };

        case 'atom':
            return { type: 'not', operand: node };
    }
}
