import type { BinaryNodeType, FormulaNode } from '../../types/index.js';

const INFIX: Record<Exclude<BinaryNodeType, 'nand' | 'nor'>, string> = {
    and: 'AND',
    or: 'OR',
    xor: 'XOR',
    implies: '->',
    equiv: '<->',
};

/**
 * Pretty-print an AST back to formula text.
 * Binary operators are fully parenthesized, so the output parses back to the same tree.
 */
export function astToString(node: FormulaNode): string {
    switch (node.type) {
        case 'variable':
            return node.name;
        case 'constant':
            return node.value ? 'TRUE' : 'FALSE';
        case 'not':
            return `NOT ${astToString(node.operand)}`;
        case 'nand':
            return `NAND(${astToString(node.left)}, ${astToString(node.right)})`;
        case 'nor':
            return `NOR(${astToString(node.left)}, ${astToString(node.right)})`;
        default:
            return `(${astToString(node.left)} ${INFIX[node.type]} ${astToString(node.right)})`;
    }
}
