/**
 * Export / Import Tests
 */

import { exportTable, importTable } from '../src/io/export.js';
import { generateTable } from '../src/logic/truthTable.js';
import { parse } from '../src/parser/index.js';
import { LogicException } from '../src/types/index.js';
import { FORMULAS, tableOf } from './fixtures.js';

describe('exportTable', () => {
    test('comma-delimited by default', () => {
        expect(exportTable(tableOf(FORMULAS.and))).toBe('A,B,Result\n0,0,0\n0,1,0\n1,0,0\n1,1,1\n');
    });

    test('tab-delimited', () => {
        expect(exportTable(tableOf('NOT A'), { delimiter: '\t' })).toBe('A\tResult\n0\t1\n1\t0\n');
    });

    test('zero variables', () => {
        expect(exportTable(generateTable([], parse('TRUE')))).toBe('Result\n1\n');
    });
});

describe('importTable', () => {
    test('reads back an exported table', () => {
        const table = tableOf(FORMULAS.threeVar);
        expect(importTable(exportTable(table))).toEqual(table);
        expect(importTable(exportTable(table, { delimiter: '\t' }), { delimiter: '\t' })).toEqual(table);
    });

    test('tolerates CRLF line endings and blank lines', () => {
        const table = importTable('A,Result\r\n0,1\r\n\r\n1,0\r\n');
        expect(table.variables).toEqual(['A']);
        expect(table.rows).toEqual([
            { values: [false], result: true },
            { values: [true], result: false },
        ]);
    });

    test.each([
        ['', 'Table is empty'],
        ['A,B\n0,0\n', "Line 1: Last header column must be 'Result'"],
        ['A,ab,Result\n', "Line 1: Invalid variable name 'ab' in header"],
        ['A,A,Result\n', 'Line 1: Duplicate variable in header'],
        ['A,Result\n0,1\n', 'Expected 2 rows for 1 variables, got 1'],
        ['A,Result\n0,1\n1\n', 'Line 3: Expected 2 cells, got 1'],
        ['A,Result\n0,1\n1,x\n', "Line 3: Cell 'x' is not 0 or 1"],
        ['A,Result\n1,1\n0,0\n', 'Line 2: Row out of order, expected assignment #0'],
    ])('rejects %j', (text, message) => {
        expect(() => importTable(text)).toThrow(message);
    });

    test('errors carry the INVALID_TABLE code', () => {
        try {
            importTable('');
            throw new Error('expected import to fail');
        } catch (error) {
            expect(error).toBeInstanceOf(LogicException);
            if (error instanceof LogicException) {
                expect(error.code).toBe('INVALID_TABLE');
            }
        }
    });
});
