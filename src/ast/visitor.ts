import type { FormulaNode, Variable } from '../types/index.js';

/**
 * Generic AST Visitor (pre-order)
 */
export function traverse(node: FormulaNode, visitor: (node: FormulaNode) => void): void {
    visitor(node);

    switch (node.type) {
        case 'variable':
        case 'constant':
            return;
        case 'not':
            traverse(node.operand, visitor);
            return;
        default:
            traverse(node.left, visitor);
            traverse(node.right, visitor);
    }
}

/**
 * Sorted set of variables the AST references
 */
export function collectVariables(node: FormulaNode): Variable[] {
    const found = new Set<Variable>();
    traverse(node, n => {
        if (n.type === 'variable') found.add(n.name);
    });
    return [...found].sort();
}
