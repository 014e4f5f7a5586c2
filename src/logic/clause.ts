/**
 * CNF Clause Utilities
 *
 * Constructors and helpers for literals, clauses and CNF formulas.
 * Clauses are built through `createClause` so that their literal order,
 * and therefore their key, is canonical.
 */

import type { Clause, CNFFormula, Literal } from '../types/clause.js';

export type { Clause, CNFFormula, Literal };

export function createLiteral(atom: string, negated: boolean = false): Literal {
    return Object.freeze({ atom, negated });
}

/**
 * Check if two literals are complementary (same atom, opposite sign).
 */
export function areComplementary(l1: Literal, l2: Literal): boolean {
    return l1.atom === l2.atom && l1.negated !== l2.negated;
}

function compareLiterals(a: Literal, b: Literal): number {
    if (a.atom !== b.atom) return a.atom < b.atom ? -1 : 1;
    return Number(a.negated) - Number(b.negated);
}

/**
 * Unique key of a literal: the atom, prefixed with '~' when negated.
 */
export function literalKey(lit: Literal): string {
    return lit.negated ? `~${lit.atom}` : lit.atom;
}

/**
 * Build a clause, collapsing duplicate literals and sorting the rest.
 */
export function createClause(literals: Iterable<Literal>): Clause {
    const unique = new Map<string, Literal>();
    for (const lit of literals) {
        unique.set(literalKey(lit), lit);
    }
    const sorted = [...unique.values()].sort(compareLiterals);
    return Object.freeze({ literals: Object.freeze(sorted) });
}

export const EMPTY_CLAUSE: Clause = createClause([]);

/**
 * Canonical key of a clause. Equal keys mean equal literal sets.
 */
export function clauseKey(clause: Clause): string {
    return clause.literals.map(literalKey).join(',');
}

export function isEmptyClause(clause: Clause): boolean {
    return clause.literals.length === 0;
}

/**
 * Check if a clause is a tautology (contains complementary literals).
 * Literals are sorted by atom, so complements are adjacent.
 */
export function isTautology(clause: Clause): boolean {
    for (let i = 1; i < clause.literals.length; i++) {
        if (areComplementary(clause.literals[i - 1], clause.literals[i])) {
            return true;
        }
    }
    return false;
}

/**
 * Collapse clauses with the same literal set, keeping first occurrences.
 */
export function dedupeClauses(clauses: Iterable<Clause>): CNFFormula {
    const seen = new Map<string, Clause>();
    for (const clause of clauses) {
        const key = clauseKey(clause);
        if (!seen.has(key)) {
            seen.set(key, clause);
        }
    }
    return Object.freeze([...seen.values()]);
}

/**
 * Collect every atom named in a clause set, sorted.
 */
export function atomsOf(clauses: Iterable<Clause>): string[] {
    const atoms = new Set<string>();
    for (const clause of clauses) {
        for (const lit of clause.literals) {
            atoms.add(lit.atom);
        }
    }
    return [...atoms].sort();
}

/**
 * Format a literal as a string.
 */
export function literalToString(lit: Literal): string {
    return lit.negated ? `¬${lit.atom}` : lit.atom;
}

/**
 * Format a clause as a string (disjunction of literals).
 */
export function clauseToString(clause: Clause): string {
    if (clause.literals.length === 0) return '□'; // Empty clause = false
    return clause.literals.map(literalToString).join(' ∨ ');
}

/**
 * Format CNF as a string (conjunction of clauses).
 */
export function cnfToString(clauses: CNFFormula): string {
    if (clauses.length === 0) return '⊤'; // No clauses = true
    return clauses.map(c => `(${clauseToString(c)})`).join(' ∧ ');
}
