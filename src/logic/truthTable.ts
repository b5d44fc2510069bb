/**
 * Truth Table Generation
 *
 * Enumerates every assignment of the variables in binary counting order
 * (first variable most significant, False before True) and evaluates the
 * formula once per row.
 */

import type {
    FormulaNode,
    TableClassification,
    TableOptions,
    TruthTable,
    TruthTableRow,
    Variable,
} from '../types/index.js';
import { DEFAULTS } from '../types/options.js';
import { createGenericError } from '../types/errors.js';
import { isVariable } from '../parser/variables.js';
import { allAssignments } from '../utils/enumerate.js';
import { evaluate } from './evaluator.js';

/**
 * Generate the truth table of a formula over the given variables.
 *
 * Zero variables yields a single row holding only the constant result.
 * Evaluation errors propagate; no partial table is ever returned.
 */
export function generateTable(
    variables: readonly Variable[],
    ast: FormulaNode,
    options: TableOptions = {}
): TruthTable {
    validateVariables(variables, options.maxVariables ?? DEFAULTS.maxVariables);

    const rows: TruthTableRow[] = [];
    for (const assignment of allAssignments(variables)) {
        rows.push({
            values: variables.map(v => assignment.get(v) === true),
            result: evaluate(ast, assignment),
        });
    }

    return { variables: [...variables], rows };
}

function validateVariables(variables: readonly Variable[], maxVariables: number): void {
    if (variables.length > maxVariables) {
        throw createGenericError(
            'INVALID_ARGUMENT',
            `Too many variables: ${variables.length} (limit ${maxVariables}, ${2 ** variables.length} rows)`,
            { variableCount: variables.length, maxVariables }
        );
    }

    const seen = new Set<Variable>();
    for (const v of variables) {
        if (!isVariable(v)) {
            throw createGenericError('INVALID_ARGUMENT', `Invalid variable name '${v}'`, { variable: v });
        }
        if (seen.has(v)) {
            throw createGenericError('INVALID_ARGUMENT', `Duplicate variable '${v}'`, { variable: v });
        }
        seen.add(v);
    }
}

/**
 * Throw INVALID_ARGUMENT unless `variables` names the table's variables in
 * table order. Builders that read rows by position rely on this.
 */
export function assertTableVariables(variables: readonly Variable[], table: TruthTable): void {
    if (variables.length !== table.variables.length || variables.some((v, i) => v !== table.variables[i])) {
        throw createGenericError(
            'INVALID_ARGUMENT',
            `Variables (${variables.join(', ')}) do not match table variables (${table.variables.join(', ')})`,
            { variables: [...variables], tableVariables: [...table.variables] }
        );
    }
}

/**
 * True iff every row's result is true
 */
export function isTautology(table: TruthTable): boolean {
    return table.rows.every(row => row.result);
}

/**
 * True iff every row's result is false
 */
export function isContradiction(table: TruthTable): boolean {
    return table.rows.every(row => !row.result);
}

export function isSatisfiable(table: TruthTable): boolean {
    return !isContradiction(table);
}

export function classifyTable(table: TruthTable): TableClassification {
    if (isTautology(table)) return 'tautology';
    if (isContradiction(table)) return 'contradiction';
    return 'contingent';
}
