/**
 * AST printer and visitor tests
 */

import { astToString } from '../src/utils/ast/printer.js';
import { traverse, collectVariables } from '../src/ast/visitor.js';
import { parse } from '../src/parser/index.js';
import type { FormulaNodeType } from '../src/types/index.js';

describe('astToString', () => {
    test('fully parenthesizes binary operators', () => {
        expect(astToString(parse('NOT A AND B -> NAND(C, 1)'))).toBe('((NOT A AND B) -> NAND(C, TRUE))');
        expect(astToString(parse('a <-> b xor nor(c, false)'))).toBe('(A <-> (B XOR NOR(C, FALSE)))');
    });

    test.each([
        'A -> B -> C',
        'NOT (A OR B) AND C',
        'XOR(A, B) <-> NAND(NOT A, B OR C)',
        'TRUE AND NOT FALSE',
    ])('%s prints back to the same tree', (formula) => {
        const ast = parse(formula);
        expect(parse(astToString(ast))).toEqual(ast);
    });
});

describe('traverse', () => {
    test('visits nodes in pre-order', () => {
        const seen: FormulaNodeType[] = [];
        traverse(parse('NOT (A OR B) AND TRUE'), node => seen.push(node.type));
        expect(seen).toEqual(['and', 'not', 'or', 'variable', 'variable', 'constant']);
    });
});

describe('collectVariables', () => {
    test('sorted and unique', () => {
        expect(collectVariables(parse('C OR A AND C'))).toEqual(['A', 'C']);
        expect(collectVariables(parse('TRUE'))).toEqual([]);
    });
});
