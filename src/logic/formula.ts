/**
 * Formula construction and inspection helpers.
 */

import type { Atom, Formula } from '../types/formula.js';

export function createAtom(name: string): Atom {
    return { type: 'atom', name };
}

export function createNot(operand: Formula): Formula {
    return { type: 'not', operand };
}

export function createAnd(left: Formula, right: Formula): Formula {
    return { type: 'and', left, right };
}

export function createOr(left: Formula, right: Formula): Formula {
    return { type: 'or', left, right };
}

export function createImplies(left: Formula, right: Formula): Formula {
    return { type: 'implies', left, right };
}

export function createIff(left: Formula, right: Formula): Formula {
    return { type: 'iff', left, right };
}

/**
 * Structural equality of two formula trees.
 */
export function formulasEqual(a: Formula, b: Formula): boolean {
    switch (a.type) {
        case 'atom':
            return b.type === 'atom' && a.name === b.name;
        case 'not':
            return b.type === 'not' && formulasEqual(a.operand, b.operand);
        case 'and':
        case 'or':
        case 'implies':
        case 'iff':
            return b.type === a.type
                && formulasEqual(a.left, b.left)
                && formulasEqual(a.right, b.right);
    }
}

/**
 * Collect the atom names of a formula, sorted.
 */
export function atomsOfFormula(node: Formula): string[] {
    const atoms = new Set<string>();
    const visit = (n: Formula): void => {
        switch (n.type) {
            case 'atom':
                atoms.add(n.name);
                return;
            case 'not':
                visit(n.operand);
                return;
            default:
                visit(n.left);
                visit(n.right);
        }
    };
    visit(node);
    return [...atoms].sort();
}

/**
 * Evaluate a formula under a truth assignment; unassigned atoms are false.
 */
export function evaluate(node: Formula, assignment: ReadonlyMap<string, boolean>): boolean {
    switch (node.type) {
        case 'atom':
            return assignment.get(node.name) ?? false;
        case 'not':
            return !evaluate(node.operand, assignment);
        case 'and':
            return evaluate(node.left, assignment) && evaluate(node.right, assignment);
        case 'or':
            return evaluate(node.left, assignment) || evaluate(node.right, assignment);
        case 'implies':
            return !evaluate(node.left, assignment) || evaluate(node.right, assignment);
        case 'iff':
            return evaluate(node.left, assignment) === evaluate(node.right, assignment);
    }
}
