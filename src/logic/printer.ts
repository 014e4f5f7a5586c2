import type { Formula } from '../types/formula.js';

const OPERATORS = {
    iff: '<<>>',
    implies: '>>',
    or: '|',
    and: '&',
} as const;

const PRECEDENCE: Record<Formula['type'], number> = {
    iff: 1,
    implies: 2,
    or: 3,
    and: 4,
    not: 5,
    atom: 6,
};

/**
 * Print a formula in the infix syntax the parser reads, with only the
 * parentheses needed to parse back to the same tree.
 * Binary operators associate to the left.
 */
export function formulaToString(node: Formula): string {
    switch (node.type) {
        case 'atom':
            return node.name;
        case 'not': {
            const inner = formulaToString(node.operand);
            return PRECEDENCE[node.operand.type] < PRECEDENCE.not ? `~(${inner})` : `~${inner}`;
        }
        default: {
            const prec = PRECEDENCE[node.type];
            let left = formulaToString(node.left);
            let right = formulaToString(node.right);
            if (PRECEDENCE[node.left.type] < prec) left = `(${left})`;
            if (PRECEDENCE[node.right.type] <= prec) right = `(${right})`;
            return `${left} ${OPERATORS[node.type]} ${right}`;
        }
    }
}
