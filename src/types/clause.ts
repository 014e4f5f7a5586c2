/**
 * CNF Clause Types
 *
 * Types for representing formulas in Conjunctive Normal Form (CNF).
 * All values are immutable and carry no references outside themselves,
 * so they may be shared between belief bases freely.
 */

/**
 * A literal is an atom or its negation.
 */
export interface Literal {
    /** Atom name */
    readonly atom: string;
    /** Whether this literal is negated */
    readonly negated: boolean;
}

/**
 * A clause is a disjunction of literals.
 * Literals are distinct and sorted by key; no literals means contradiction.
 */
export interface Clause {
    readonly literals: readonly Literal[];
}

/**
 * A CNF formula is a conjunction of distinct clauses.
 * No clauses means tautology.
 */
export type CNFFormula = readonly Clause[];

/**
 * Options for the clausification process.
 */
export interface ClausifyOptions {
    /** Drop clauses containing complementary literals (default: false) */
    simplify?: boolean;
    /** Maximum number of clauses before aborting (default: 10000) */
    maxClauses?: number;
}
