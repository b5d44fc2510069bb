/**
 * Library entry point: the full pipeline through the public exports
 */

import {
    analyzeFormula,
    buildDnf,
    buildCnf,
    buildKmap,
    exportTable,
    importTable,
    classifyTable,
    LogicException,
} from '../src/lib.js';

describe('lib', () => {
    test('formula to table, forms, map and export', () => {
        const { variables, table } = analyzeFormula('NAND(A, B)');

        expect(classifyTable(table)).toBe('contingent');
        expect(buildDnf(variables, table)).toBe('(not A and not B) or (not A and B) or (A and not B)');
        expect(buildCnf(variables, table)).toBe('(not A or not B)');
        expect(buildKmap(variables, table).supported).toBe(true);
        expect(importTable(exportTable(table))).toEqual(table);
    });

    test('errors are LogicExceptions', () => {
        expect(() => analyzeFormula('A ->')).toThrow(LogicException);
    });
});
