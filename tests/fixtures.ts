/**
 * Shared test fixtures: truth-table oracles and a seeded formula generator.
 */
import type { Formula } from '../src/types/formula.js';
import type { Clause } from '../src/types/clause.js';
import { evaluate, atomsOfFormula } from '../src/logic/formula.js';
import { parse } from '../src/parser/index.js';

export const ATOMS = ['p', 'q', 'r', 's'];

/**
 * Every assignment of the given atoms.
 */
export function assignments(atoms: string[]): Map<string, boolean>[] {
    const result: Map<string, boolean>[] = [];
    for (let mask = 0; mask < 1 << atoms.length; mask++) {
        result.push(new Map(atoms.map((atom, i) => [atom, (mask & (1 << i)) !== 0])));
    }
    return result;
}

export function clauseHolds(clause: Clause, assignment: ReadonlyMap<string, boolean>): boolean {
    return clause.literals.some(lit => (assignment.get(lit.atom) ?? false) !== lit.negated);
}

export function clausesHold(clauses: readonly Clause[], assignment: ReadonlyMap<string, boolean>): boolean {
    return clauses.every(c => clauseHolds(c, assignment));
}

/**
 * Brute-force entailment: the goal holds in every model of the clauses.
 */
export function tableEntails(clauses: readonly Clause[], goal: Formula): boolean {
    const atoms = new Set(atomsOfFormula(goal));
    for (const clause of clauses) {
        for (const lit of clause.literals) atoms.add(lit.atom);
    }
    return assignments([...atoms]).every(a => !clausesHold(clauses, a) || evaluate(goal, a));
}

export function tableSatisfiable(formula: Formula): boolean {
    return assignments(atomsOfFormula(formula)).some(a => evaluate(formula, a));
}

/**
 * Deterministic pseudo-random generator (LCG) so failures reproduce.
 */
export function createRandom(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
        return state / 2 ** 32;
    };
}

const CONNECTIVES = ['and', 'or', 'implies', 'iff'] as const;

export function randomFormula(random: () => number, depth: number, atoms: string[] = ATOMS): Formula {
    const roll = random();
    if (depth === 0 || roll < 0.2) {
        return { type: 'atom', name: atoms[Math.floor(random() * atoms.length)] };
    }
    if (roll < 0.4) {
        return { type: 'not', operand: randomFormula(random, depth - 1, atoms) };
    }
    const type = CONNECTIVES[Math.floor(random() * CONNECTIVES.length)];
    return {
        type,
        left: randomFormula(random, depth - 1, atoms),
        right: randomFormula(random, depth - 1, atoms),
    };
}

/**
 * Parse shorthand for test formulas.
 */
export const f = (text: string): Formula => parse(text);

/**
 * Run a function that must throw and return what it threw.
 */
export function thrown(fn: () => unknown): unknown {
    try {
        fn();
    } catch (e) {
        return e;
    }
    throw new Error('expected the function to throw');
}
