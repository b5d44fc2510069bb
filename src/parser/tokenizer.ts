import type { Token, TokenType } from '../types/parser.js';
import { createParseError } from '../types/errors.js';

const KEYWORDS: Record<string, TokenType> = {
    AND: 'AND',
    OR: 'OR',
    NOT: 'NOT',
    XOR: 'XOR',
    NAND: 'NAND',
    NOR: 'NOR',
    IMPLIES: 'IMPLIES',
    EQUIV: 'EQUIV',
    TRUE: 'CONSTANT',
    FALSE: 'CONSTANT',
};

const SYMBOLS: Record<string, TokenType> = {
    '(': 'LPAREN',
    ')': 'RPAREN',
    ',': 'COMMA',
    '&': 'AND',
    '|': 'OR',
    '~': 'NOT',
    '!': 'NOT',
    '^': 'XOR',
};

/**
 * Tokenizer for propositional formulas.
 * Input is uppercased, so `a and b` and `A AND B` produce the same tokens.
 */
export class Tokenizer {
    private input: string;
    // Keep original input for error reporting
    private originalInput: string;
    private pos: number = 0;
    private tokens: Token[] = [];

    constructor(input: string) {
        this.originalInput = input;
        this.input = input.toUpperCase();
    }

    tokenize(): Token[] {
        while (this.pos < this.input.length) {
            this.skipWhitespace();
            if (this.pos >= this.input.length) break;

            const char = this.input[this.pos];

            // Arrow operators
            if (this.match('<->')) {
                this.addToken('EQUIV', '<->');
                continue;
            }
            if (this.match('->')) {
                this.addToken('IMPLIES', '->');
                continue;
            }

            const symbol = SYMBOLS[char];
            if (symbol) {
                this.tokens.push({ type: symbol, value: char, position: this.pos });
                this.pos++;
                continue;
            }

            // Words: variables, keywords and constants
            if (/[A-Z0-9_]/.test(char)) {
                const start = this.pos;
                while (this.pos < this.input.length && /[A-Z0-9_]/.test(this.input[this.pos])) {
                    this.pos++;
                }
                const value = this.input.slice(start, this.pos);
                this.tokens.push({ type: this.classifyWord(value, start), value, position: start });
                continue;
            }

            throw createParseError(`Unexpected character '${char}'`, this.originalInput, this.pos);
        }

        this.tokens.push({ type: 'EOF', value: '', position: this.input.length });
        return this.tokens;
    }

    private classifyWord(value: string, start: number): TokenType {
        if (/^[A-Z]$/.test(value)) {
            return 'VARIABLE';
        }
        if (value === '0' || value === '1') {
            return 'CONSTANT';
        }
        const keyword = KEYWORDS[value];
        if (keyword) {
            return keyword;
        }
        throw createParseError(`Unknown token '${this.originalInput.slice(start, start + value.length)}'`,
            this.originalInput, start, value.length);
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
        this.tokens.push({ type, value, position: this.pos - value.length });
    }
}
