/**
 * Formula Tree Types
 *
 * Propositional formulas are a closed set of node kinds, so every
 * transformation can switch over `type` exhaustively.
 */

export type BinaryConnective = 'and' | 'or' | 'implies' | 'iff';

export type FormulaType = 'atom' | 'not' | BinaryConnective;

export interface Atom {
    readonly type: 'atom';
    readonly name: string;
}

export interface Negation {
    readonly type: 'not';
    readonly operand: Formula;
}

export interface BinaryFormula {
    readonly type: BinaryConnective;
    readonly left: Formula;
    readonly right: Formula;
}

export type Formula = Atom | Negation | BinaryFormula;
