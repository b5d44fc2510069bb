/**
 * Flat row export
 *
 * Header line of variable names followed by `Result`, then one line of 0/1
 * values per row. Comma-delimited for files, tab-delimited for clipboard copies.
 */

import type { ExportOptions, TruthTable, TruthTableRow, Variable } from '../types/index.js';
import { DEFAULTS } from '../types/options.js';
import { createInvalidTableError } from '../types/errors.js';
import { isVariable } from '../parser/variables.js';
import { tupleToIndex } from '../utils/enumerate.js';

export const RESULT_COLUMN = 'Result';

const bit = (value: boolean): string => (value ? '1' : '0');

export function exportTable(table: TruthTable, options: ExportOptions = {}): string {
    const delimiter = options.delimiter ?? DEFAULTS.delimiter;
    const lines = [
        [...table.variables, RESULT_COLUMN].join(delimiter),
        ...table.rows.map(row => [...row.values, row.result].map(bit).join(delimiter)),
    ];
    return lines.join('\n') + '\n';
}

/**
 * Read an exported table back. Rejects anything that is not a complete table
 * in binary counting order.
 */
export function importTable(text: string, options: ExportOptions = {}): TruthTable {
    const delimiter = options.delimiter ?? DEFAULTS.delimiter;
    const lines = text.split(/\r?\n/).filter(line => line.trim() !== '');
    const [header, ...body] = lines;
    if (header === undefined) {
        throw createInvalidTableError('Table is empty');
    }

    const columns = header.split(delimiter).map(c => c.trim());
    if (columns[columns.length - 1] !== RESULT_COLUMN) {
        throw createInvalidTableError(`Last header column must be '${RESULT_COLUMN}'`, 1);
    }
    const variables: Variable[] = columns.slice(0, -1);
    variables.forEach(v => {
        if (!isVariable(v)) {
            throw createInvalidTableError(`Invalid variable name '${v}' in header`, 1);
        }
    });
    if (new Set(variables).size !== variables.length) {
        throw createInvalidTableError('Duplicate variable in header', 1);
    }

    const expectedRows = 2 ** variables.length;
    if (body.length !== expectedRows) {
        throw createInvalidTableError(
            `Expected ${expectedRows} rows for ${variables.length} variables, got ${body.length}`
        );
    }

    const rows = body.map((line, i): TruthTableRow => {
        const lineNumber = i + 2;
        const cells = line.split(delimiter).map(c => c.trim());
        if (cells.length !== columns.length) {
            throw createInvalidTableError(`Expected ${columns.length} cells, got ${cells.length}`, lineNumber);
        }
        const bits = cells.map(cell => {
            if (cell !== '0' && cell !== '1') {
                throw createInvalidTableError(`Cell '${cell}' is not 0 or 1`, lineNumber);
            }
            return cell === '1';
        });
        const values = bits.slice(0, -1);
        if (tupleToIndex(values) !== i) {
            throw createInvalidTableError(`Row out of order, expected assignment #${i}`, lineNumber);
        }
        return { values, result: bits[bits.length - 1] };
    });

    return { variables, rows };
}
