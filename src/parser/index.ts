import type { Formula } from '../types/formula.js';
import { MalformedFormulaError } from '../types/errors.js';
import { Tokenizer } from './tokenizer.js';
import { Parser } from './parser.js';

export { Tokenizer } from './tokenizer.js';
export { Parser } from './parser.js';

/**
 * Parse a propositional formula string into a formula tree
 */
export function parse(input: string): Formula {
    if (input.trim() === '') {
        throw new MalformedFormulaError('Formula is empty', input);
    }
    const tokenizer = new Tokenizer(input);
    const tokens = tokenizer.tokenize();
    const parser = new Parser(tokens, input);
    return parser.parse();
}
