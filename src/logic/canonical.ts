/**
 * Canonical Normal Forms
 *
 * DNF is read off the true rows of a generated table, CNF off the false
 * rows. Neither re-evaluates the formula.
 */

import type { TruthTable, TruthTableRow, Variable } from '../types/index.js';
import { tupleToIndex } from '../utils/enumerate.js';
import { assertTableVariables } from './truthTable.js';

function literal(variable: Variable, negated: boolean): string {
    return negated ? `not ${variable}` : variable;
}

function clause(
    variables: readonly Variable[],
    row: TruthTableRow,
    joiner: 'and' | 'or',
    negate: (value: boolean) => boolean,
    empty: string
): string {
    const literals = variables.map((v, i) => literal(v, negate(row.values[i])));
    return `(${literals.length > 0 ? literals.join(` ${joiner} `) : empty})`;
}

/**
 * Disjunction of one conjunctive clause per true row; `False` when no row is true.
 * `variables` must match the table's variables.
 */
export function buildDnf(variables: readonly Variable[], table: TruthTable): string {
    assertTableVariables(variables, table);
    const clauses = table.rows
        .filter(row => row.result)
        .map(row => clause(variables, row, 'and', value => !value, 'True'));
    return clauses.length > 0 ? clauses.join(' or ') : 'False';
}

/**
 * Conjunction of one disjunctive clause per false row, each excluding exactly
 * that assignment; `True` when no row is false.
 */
export function buildCnf(variables: readonly Variable[], table: TruthTable): string {
    assertTableVariables(variables, table);
    const clauses = table.rows
        .filter(row => !row.result)
        .map(row => clause(variables, row, 'or', value => value, 'False'));
    return clauses.length > 0 ? clauses.join(' and ') : 'True';
}

/**
 * Indices of the true rows
 */
export function minterms(table: TruthTable): number[] {
    return table.rows.filter(row => row.result).map(row => tupleToIndex(row.values));
}

/**
 * Indices of the false rows
 */
export function maxterms(table: TruthTable): number[] {
    return table.rows.filter(row => !row.result).map(row => tupleToIndex(row.values));
}

export function formatSigma(indices: readonly number[]): string {
    return `Σm(${indices.join(', ')})`;
}

export function formatPi(indices: readonly number[]): string {
    return `ΠM(${indices.join(', ')})`;
}
