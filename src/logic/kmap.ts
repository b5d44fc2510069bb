/**
 * Karnaugh Maps
 *
 * Indexes table rows by assignment tuple for 2-4 variable functions.
 */

import type { TruthTable, Variable } from '../types/index.js';
import { createGenericError } from '../types/errors.js';
import { grayCode } from '../utils/enumerate.js';
import { assertTableVariables } from './truthTable.js';

export const KMAP_MIN_VARIABLES = 2;
export const KMAP_MAX_VARIABLES = 4;

function tupleKey(values: readonly boolean[]): string {
    return values.map(v => (v ? '1' : '0')).join('');
}

/**
 * Lookup from assignment tuple (in table variable order) to result
 */
export class KarnaughMap {
    readonly variables: readonly Variable[];
    private readonly cells = new Map<string, boolean>();

    constructor(table: TruthTable) {
        this.variables = table.variables;
        for (const row of table.rows) {
            this.cells.set(tupleKey(row.values), row.result);
        }
    }

    get size(): number {
        return this.cells.size;
    }

    has(values: readonly boolean[]): boolean {
        return this.cells.has(tupleKey(values));
    }

    get(values: readonly boolean[]): boolean {
        const result = this.cells.get(tupleKey(values));
        if (result === undefined) {
            throw createGenericError(
                'INVALID_ARGUMENT',
                `No cell for assignment (${tupleKey(values)}) over ${this.variables.join(', ')}`
            );
        }
        return result;
    }

    *entries(): Generator<[boolean[], boolean]> {
        for (const [key, result] of this.cells) {
            yield [[...key].map(c => c === '1'), result];
        }
    }
}

export type KarnaughMapResult =
    | { supported: true; map: KarnaughMap }
    | { supported: false; variableCount: number; reason: string };

/**
 * Build a Karnaugh map when the table has 2, 3 or 4 variables.
 * Any other count is reported as unsupported, not thrown; a variable list
 * that does not match the table is.
 */
export function buildKmap(variables: readonly Variable[], table: TruthTable): KarnaughMapResult {
    assertTableVariables(variables, table);
    const n = variables.length;
    if (n < KMAP_MIN_VARIABLES || n > KMAP_MAX_VARIABLES) {
        return {
            supported: false,
            variableCount: n,
            reason: `Karnaugh maps need ${KMAP_MIN_VARIABLES}-${KMAP_MAX_VARIABLES} variables, got ${n}`,
        };
    }
    return { supported: true, map: new KarnaughMap(table) };
}

export interface KarnaughGrid {
    rowVariables: Variable[];
    columnVariables: Variable[];
    /** Gray-code ordered labels, e.g. ['00', '01', '11', '10'] */
    rowLabels: string[];
    columnLabels: string[];
    cells: boolean[][];
}

/**
 * Lay a map out on a grid: the first half of the variables (rounded down)
 * index rows, the rest index columns, each axis in Gray-code order.
 */
export function layoutKmap(map: KarnaughMap): KarnaughGrid {
    const split = Math.floor(map.variables.length / 2);
    const rowVariables = map.variables.slice(0, split);
    const columnVariables = map.variables.slice(split);
    const rowCodes = grayCode(rowVariables.length);
    const columnCodes = grayCode(columnVariables.length);

    return {
        rowVariables,
        columnVariables,
        rowLabels: rowCodes.map(tupleKey),
        columnLabels: columnCodes.map(tupleKey),
        cells: rowCodes.map(r => columnCodes.map(c => map.get([...r, ...c]))),
    };
}
