/**
 * Formula Evaluation
 *
 * Evaluates a propositional AST under a single variable assignment.
 */

import type { Assignment, BinaryNodeType, FormulaNode } from '../types/index.js';
import { createEvaluationError } from '../types/errors.js';

const BINARY_OPERATORS: Record<BinaryNodeType, (left: boolean, right: boolean) => boolean> = {
    and: (a, b) => a && b,
    or: (a, b) => a || b,
    xor: (a, b) => a !== b,
    implies: (a, b) => !a || b,
    equiv: (a, b) => a === b,
    nand: (a, b) => !(a && b),
    nor: (a, b) => !(a || b),
};

/**
 * Evaluate a formula under an assignment.
 *
 * Both operands of every binary node are evaluated, so a variable missing
 * from the assignment always raises EvaluationError regardless of the
 * values of the others.
 */
export function evaluate(node: FormulaNode, assignment: Assignment): boolean {
    switch (node.type) {
        case 'variable': {
            const value = assignment.get(node.name);
            if (value === undefined) {
                throw createEvaluationError(node.name, assignment.keys());
            }
            return value;
        }

        case 'constant':
            return node.value;

        case 'not':
            return !evaluate(node.operand, assignment);

        default: {
            const left = evaluate(node.left, assignment);
            const right = evaluate(node.right, assignment);
            return BINARY_OPERATORS[node.type](left, right);
        }
    }
}
