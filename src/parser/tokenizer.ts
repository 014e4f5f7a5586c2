import type { Token, TokenType } from '../types/parser.js';
import { createParseError } from '../types/errors.js';

/**
 * Tokenizer for propositional formulas
 */
export class Tokenizer {
    private input: string;
    private pos: number = 0;
    private tokens: Token[] = [];

    constructor(input: string) {
        this.input = input;
    }

    tokenize(): Token[] {
        while (this.pos < this.input.length) {
            this.skipWhitespace();
            if (this.pos >= this.input.length) break;

            const char = this.input[this.pos];

            // Multi-character operators
            if (this.match('<<>>')) {
                this.addToken('IFF', '<<>>');
                continue;
            }
            if (this.match('>>')) {
                this.addToken('IMPLIES', '>>');
                continue;
            }

            // Single character tokens
            switch (char) {
                case '(': this.addToken('LPAREN', '('); this.pos++; continue;
                case ')': this.addToken('RPAREN', ')'); this.pos++; continue;
                case '&': this.addToken('AND', '&'); this.pos++; continue;
                case '|': this.addToken('OR', '|'); this.pos++; continue;
                case '~': this.addToken('NOT', '~'); this.pos++; continue;
            }

            // Atoms
            if (/[A-Za-z0-9_]/.test(char)) {
                const start = this.pos;
                while (this.pos < this.input.length && /[A-Za-z0-9_]/.test(this.input[this.pos])) {
                    this.pos++;
                }
                this.tokens.push({ type: 'ATOM', value: this.input.slice(start, this.pos), position: start });
                continue;
            }

            throw createParseError(`Unexpected character '${char}'`, this.input, this.pos);
        }

        this.tokens.push({ type: 'EOF', value: '', position: this.pos });
        return this.tokens;
    }

    private skipWhitespace(): void {
        while (this.pos < this.input.length && /\s/.test(this.input[this.pos])) {
            this.pos++;
        }
    }

    private match(str: string): boolean {
        if (this.input.slice(this.pos, this.pos + str.length) === str) {
            this.pos += str.length;
            return true;
        }
        return false;
    }

    private addToken(type: TokenType, value: string): void {
        // Multi-character operators have already advanced past themselves
        const position = value.length > 1 ? this.pos - value.length : this.pos;
        this.tokens.push({ type, value, position });
    }
}
