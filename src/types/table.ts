/**
 * Truth Table Types
 */

import type { Variable } from './ast.js';

/**
 * One boolean value per variable
 */
export type Assignment = ReadonlyMap<Variable, boolean>;

export interface TruthTableRow {
    /** Variable values, in table variable order */
    readonly values: readonly boolean[];
    /** Formula result under this row's assignment */
    readonly result: boolean;
}

/**
 * Exactly 2^n rows, in binary counting order with the first variable as
 * the most significant bit.
 */
export interface TruthTable {
    readonly variables: readonly Variable[];
    readonly rows: readonly TruthTableRow[];
}

export type TableClassification = 'tautology' | 'contradiction' | 'contingent';
