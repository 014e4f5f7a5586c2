/**
 * Tests for the formula parser and printer
 */

import { parse, Tokenizer } from '../src/parser/index.js';
import { formulaToString } from '../src/logic/printer.js';
import { formulasEqual } from '../src/logic/formula.js';
import { MalformedFormulaError, ParseError } from '../src/types/errors.js';
import { createRandom, randomFormula, thrown } from './fixtures.js';

describe('Tokenizer', () => {
    test('recognises every operator', () => {
        const types = new Tokenizer('~(a & b) | c >> d <<>> e').tokenize().map(t => t.type);
        expect(types).toEqual([
            'NOT', 'LPAREN', 'ATOM', 'AND', 'ATOM', 'RPAREN', 'OR', 'ATOM',
            'IMPLIES', 'ATOM', 'IFF', 'ATOM', 'EOF',
        ]);
    });

    test('records token positions', () => {
        const tokens = new Tokenizer('p <<>> q').tokenize();
        expect(tokens.map(t => t.position)).toEqual([0, 2, 7, 8]);
    });

    test('reads alphanumeric atoms', () => {
        const tokens = new Tokenizer('rain_1 & 42').tokenize();
        expect(tokens[0].value).toBe('rain_1');
        expect(tokens[2].value).toBe('42');
    });
});

describe('Parser', () => {
    test('parses a single atom', () => {
        expect(parse('p')).toEqual({ type: 'atom', name: 'p' });
    });

    test('negation binds tightest', () => {
        expect(parse('~p & q')).toEqual({
            type: 'and',
            left: { type: 'not', operand: { type: 'atom', name: 'p' } },
            right: { type: 'atom', name: 'q' },
        });
    });

    test('conjunction binds tighter than disjunction', () => {
        const ast = parse('p | q & r');
        expect(ast.type).toBe('or');
        expect(formulaToString(ast)).toBe('p | q & r');
        expect(parse('p | q & r')).toEqual(parse('p | (q & r)'));
    });

    test('implication binds looser than disjunction', () => {
        expect(parse('p | q >> r')).toEqual(parse('(p | q) >> r'));
    });

    test('equivalence binds loosest', () => {
        expect(parse('p >> q <<>> r')).toEqual(parse('(p >> q) <<>> r'));
    });

    test('implication associates to the left', () => {
        expect(parse('p >> q >> r')).toEqual(parse('(p >> q) >> r'));
    });

    test('parentheses override precedence', () => {
        const ast = parse('p >> (q >> r)');
        expect(ast.type).toBe('implies');
        expect(formulaToString(ast)).toBe('p >> (q >> r)');
    });

    test('double negation is kept in the tree', () => {
        expect(parse('~~p')).toEqual({
            type: 'not',
            operand: { type: 'not', operand: { type: 'atom', name: 'p' } },
        });
    });

    test('rejects empty input as malformed', () => {
        expect(() => parse('')).toThrow(MalformedFormulaError);
        expect(() => parse('   ')).toThrow(MalformedFormulaError);
    });

    test('rejects a dangling operator with a suggestion', () => {
        const e = thrown(() => parse('p >>'));
        expect(e).toBeInstanceOf(ParseError);
        expect(e).toMatchObject({
            error: {
                code: 'PARSE_ERROR',
                message: 'Unexpected end of formula',
                suggestion: "Incomplete implication - missing consequent after '>>'",
            },
        });
    });

    test('rejects unbalanced parentheses', () => {
        expect(() => parse('(p & q')).toThrow('Expected RPAREN but got EOF');
        expect(() => parse('p & q)')).toThrow("Unexpected token ')'");
    });

    test('rejects unknown characters at their position', () => {
        expect(thrown(() => parse('p -> q'))).toMatchObject({
            error: {
                message: "Unexpected character '-'",
                span: { start: 2, end: 3, line: 1, col: 3 },
                suggestion: "Use '>>' for implication",
            },
        });
    });
});

describe('formulaToString', () => {
    test('prints with minimal parentheses', () => {
        expect(formulaToString(parse('(p & q) | r'))).toBe('p & q | r');
        expect(formulaToString(parse('~(p | q)'))).toBe('~(p | q)');
        expect(formulaToString(parse('(p <<>> q) <<>> r'))).toBe('p <<>> q <<>> r');
        expect(formulaToString(parse('p <<>> (q <<>> r)'))).toBe('p <<>> (q <<>> r)');
    });

    test('printed formulas parse back to the same tree', () => {
        const random = createRandom(7);
        for (let i = 0; i < 50; i++) {
            const formula = randomFormula(random, 4);
            expect(formulasEqual(parse(formulaToString(formula)), formula)).toBe(true);
        }
    });
});
