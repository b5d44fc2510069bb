import type { BinaryNodeType, FormulaNode } from '../types/ast.js';
import type { Token, TokenType } from '../types/parser.js';
import { createParseError } from '../types/errors.js';

/** Parenthesized groups and calls open at once; each re-enters the whole grammar */
const MAX_NESTING = 128;
/** Upper bound on the depth of the AST handed to recursive consumers */
const MAX_DEPTH = 2048;

/**
 * Parser for propositional formulas
 *
 * Grammar (EBNF-ish), loosest binding first:
 *   formula  = equiv EOF
 *   equiv    = implies (('<->' implies)*)
 *   implies  = xor (('->' xor)*)
 *   xor      = or (('XOR' or)*)
 *   or       = and (('OR' and)*)
 *   and      = unary (('AND' unary)*)
 *   unary    = 'NOT' unary | atom
 *   atom     = VARIABLE | CONSTANT | '(' equiv ')' | call
 *   call     = ('NAND' | 'NOR' | 'XOR') '(' equiv ',' equiv ')'
 *
 * Every binary operator is left associative.
 */
export class Parser {
    private tokens: Token[];
    private originalInput: string;
    private pos: number = 0;
    private nesting: number = 0;
    private depth: number = 0;

    constructor(tokens: Token[], originalInput: string) {
        this.tokens = tokens;
        this.originalInput = originalInput;
    }

    parse(): FormulaNode {
        if (this.current().type === 'EOF') {
            throw createParseError('Empty formula', this.originalInput, 0);
        }

        const result = this.parseEquiv();
        const trailing = this.current();
        if (trailing.type !== 'EOF') {
            const message = trailing.type === 'RPAREN'
                ? "Unmatched ')'"
                : `Unexpected token '${trailing.value}'`;
            throw createParseError(message, this.originalInput, trailing.position, trailing.value.length);
        }
        return result;
    }

    private current(): Token {
        return this.tokens[this.pos] ?? { type: 'EOF', value: '', position: this.originalInput.length };
    }

    private advance(): Token {
        const token = this.current();
        this.pos++;
        return token;
    }

    private expect(type: TokenType, description: string): Token {
        const token = this.current();
        if (token.type !== type) {
            const found = token.type === 'EOF' ? 'end of formula' : `'${token.value}'`;
            throw createParseError(
                `Expected ${description} but found ${found}`,
                this.originalInput,
                token.position,
                token.value.length
            );
        }
        return this.advance();
    }

    private checkDepth(token: Token): void {
        if (this.nesting > MAX_NESTING || this.depth > MAX_DEPTH) {
            throw createParseError(
                'Formula nested too deeply',
                this.originalInput,
                token.position,
                token.value.length
            );
        }
    }

    /**
     * Parse one left-associative precedence level. Each link of the chain
     * deepens the tree on its left, so it counts towards MAX_DEPTH.
     */
    private parseLevel(
        operator: TokenType,
        nodeType: BinaryNodeType,
        next: () => FormulaNode
    ): FormulaNode {
        let left = next();
        let links = 0;

        while (this.current().type === operator) {
            const token = this.advance();
            links++;
            this.depth++;
            this.checkDepth(token);
            const right = next();
            left = { type: nodeType, left, right };
        }

        this.depth -= links;
        return left;
    }

    private parseEquiv(): FormulaNode {
        return this.parseLevel('EQUIV', 'equiv', () => this.parseImplies());
    }

    private parseImplies(): FormulaNode {
        return this.parseLevel('IMPLIES', 'implies', () => this.parseXor());
    }

    private parseXor(): FormulaNode {
        return this.parseLevel('XOR', 'xor', () => this.parseDisjunction());
    }

    private parseDisjunction(): FormulaNode {
        return this.parseLevel('OR', 'or', () => this.parseConjunction());
    }

    private parseConjunction(): FormulaNode {
        return this.parseLevel('AND', 'and', () => this.parseUnary());
    }

    private parseUnary(): FormulaNode {
        if (this.current().type === 'NOT') {
            const token = this.advance();
            this.depth++;
            this.checkDepth(token);
            const operand = this.parseUnary();
            this.depth--;
            return { type: 'not', operand };
        }

        return this.parseAtom();
    }

    private parseAtom(): FormulaNode {
        const token = this.current();

        switch (token.type) {
            case 'VARIABLE':
                this.advance();
                return { type: 'variable', name: token.value };

            case 'CONSTANT':
                this.advance();
                return { type: 'constant', value: token.value === 'TRUE' || token.value === '1' };

            case 'LPAREN': {
                this.advance();
                this.nesting++;
                this.checkDepth(token);
                const inner = this.parseEquiv();
                const close = this.current();
                if (close.type === 'EOF') {
                    throw createParseError("Unmatched '('", this.originalInput, token.position);
                }
                if (close.type === 'COMMA') {
                    throw createParseError("Unexpected ','", this.originalInput, close.position);
                }
                if (close.type !== 'RPAREN') {
                    throw createParseError(
                        `Unexpected token '${close.value}'`,
                        this.originalInput,
                        close.position,
                        close.value.length
                    );
                }
                this.advance();
                this.nesting--;
                return inner;
            }

            case 'NAND':
                return this.parseCall('nand');
            case 'NOR':
                return this.parseCall('nor');
            case 'XOR':
                return this.parseCall('xor');

            case 'EOF':
                throw createParseError('Unexpected end of formula', this.originalInput, token.position);

            default:
                throw createParseError(
                    `Unexpected token '${token.value}'`,
                    this.originalInput,
                    token.position,
                    token.value.length
                );
        }
    }

    /**
     * NAND(a, b), NOR(a, b), XOR(a, b): exactly two full subexpressions.
     */
    private parseCall(nodeType: 'nand' | 'nor' | 'xor'): FormulaNode {
        const name = this.advance();
        this.nesting++;
        this.depth++;
        this.checkDepth(name);
        const open = this.expect('LPAREN', `'(' after ${name.value}`);

        const args: FormulaNode[] = [];
        if (this.current().type !== 'RPAREN') {
            args.push(this.parseEquiv());
            while (this.current().type === 'COMMA') {
                this.advance();
                args.push(this.parseEquiv());
            }
        }

        if (this.current().type !== 'RPAREN') {
            if (this.current().type === 'EOF') {
                throw createParseError("Unmatched '('", this.originalInput, open.position);
            }
            this.expect('RPAREN', `',' or ')' in ${name.value}(...)`);
        }
        this.advance();
        this.nesting--;
        this.depth--;

        const [left, right] = args;
        if (args.length !== 2 || left === undefined || right === undefined) {
            const end = this.tokens[this.pos - 1]?.position ?? name.position;
            throw createParseError(
                `${name.value} expects exactly 2 arguments, got ${args.length}`,
                this.originalInput,
                name.position,
                end - name.position + 1
            );
        }

        return { type: nodeType, left, right };
    }
}
