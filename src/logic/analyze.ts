/**
 * Formula Analysis
 *
 * One generation cycle: formula text -> variables -> AST -> truth table.
 * The result is an immutable value; callers keep the latest one themselves
 * and replace it on the next generation.
 */

import type { FormulaNode, TableOptions, TruthTable, Variable } from '../types/index.js';
import { extractVariables, parse } from '../parser/index.js';
import { generateTable } from './truthTable.js';

export interface FormulaAnalysis {
    readonly formula: string;
    readonly variables: readonly Variable[];
    readonly ast: FormulaNode;
    readonly table: TruthTable;
}

/**
 * Parse and tabulate a formula. Throws ParseError, EvaluationError or an
 * INVALID_ARGUMENT LogicException; never returns a partial result.
 */
export function analyzeFormula(formula: string, options: TableOptions = {}): FormulaAnalysis {
    const variables = extractVariables(formula);
    const ast = parse(formula);
    const table = generateTable(variables, ast, options);
    return Object.freeze({ formula, variables, ast, table });
}
