import type { BinaryConnective, Formula } from '../types/formula.js';
import type { Token, TokenType } from '../types/parser.js';
import { createParseError } from '../types/errors.js';

/**
 * Parser for propositional formulas
 *
 * Grammar (EBNF-ish), loosest binding first:
 *   formula     = equivalence
 *   equivalence = implication (('<<>>' implication)*)
 *   implication = disjunction (('>>' disjunction)*)
 *   disjunction = conjunction (('|' conjunction)*)
 *   conjunction = unary (('&' unary)*)
 *   unary       = '~' unary | '(' formula ')' | ATOM
 *
 * Every binary operator associates to the left.
 */
export class Parser {
    private tokens: Token[];
    private originalInput: string;
    private pos: number = 0;

    constructor(tokens: Token[], originalInput: string) {
        this.tokens = tokens;
        this.originalInput = originalInput;
    }

    parse(): Formula {
        const result = this.parseFormula();
        if (this.current().type !== 'EOF') {
            throw createParseError(
                `Unexpected token '${this.current().value}'`,
                this.originalInput,
                this.current().position
            );
        }
        return result;
    }

    private current(): Token {
        return this.tokens[this.pos] || { type: 'EOF', value: '', position: this.originalInput.length };
    }

    private advance(): Token {
        const token = this.current();
        this.pos++;
        return token;
    }

    private expect(type: TokenType): Token {
        if (this.current().type !== type) {
            throw createParseError(
                `Expected ${type} but got ${this.current().type}`,
                this.originalInput,
                this.current().position
            );
        }
        return this.advance();
    }

    private parseFormula(): Formula {
        return this.parseLeftAssociative('IFF', 'iff', () =>
            this.parseLeftAssociative('IMPLIES', 'implies', () =>
                this.parseLeftAssociative('OR', 'or', () =>
                    this.parseLeftAssociative('AND', 'and', () => this.parseUnary()))));
    }

    private parseLeftAssociative(
        operator: TokenType,
        type: BinaryConnective,
        operand: () => Formula
    ): Formula {
        let left = operand();

        while (this.current().type === operator) {
            this.advance();
            const right = operand();
            left = { type, left, right };
        }

        return left;
    }

    private parseUnary(): Formula {
        if (this.current().type === 'NOT') {
            this.advance();
            const operand = this.parseUnary();
            return { type: 'not', operand };
        }

        return this.parseAtom();
    }

    private parseAtom(): Formula {
        // Parenthesized formula
        if (this.current().type === 'LPAREN') {
            this.advance();
            const formula = this.parseFormula();
            this.expect('RPAREN');
            return formula;
        }

        if (this.current().type === 'ATOM') {
            return { type: 'atom', name: this.advance().value };
        }

        const token = this.current();
        throw createParseError(
            token.type === 'EOF' ? 'Unexpected end of formula' : `Unexpected token '${token.value}'`,
            this.originalInput,
            token.position
        );
    }
}
