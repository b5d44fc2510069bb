/**
 * Karnaugh Map Tests
 */

import { buildKmap, layoutKmap, KarnaughMap } from '../src/logic/kmap.js';
import { generateTable } from '../src/logic/truthTable.js';
import { parse } from '../src/parser/index.js';
import { LogicException } from '../src/types/index.js';
import { FORMULAS, tableOf, T, F } from './fixtures.js';

function supportedMap(formula: string): KarnaughMap {
    const table = tableOf(formula);
    const result = buildKmap(table.variables, table);
    if (!result.supported) {
        throw new Error(result.reason);
    }
    return result.map;
}

describe('buildKmap', () => {
    test('indexes every row by its assignment', () => {
        const map = supportedMap(FORMULAS.and);
        expect(map.size).toBe(4);
        expect(map.get([T, T])).toBe(true);
        expect(map.get([T, F])).toBe(false);
        expect(map.has([F, F])).toBe(true);
        expect(map.has([F, F, F])).toBe(false);
    });

    test('entries yield assignment tuples', () => {
        const map = supportedMap(FORMULAS.and);
        expect([...map.entries()]).toEqual([
            [[F, F], false],
            [[F, T], false],
            [[T, F], false],
            [[T, T], true],
        ]);
    });

    test('get throws for an unknown assignment', () => {
        const map = supportedMap(FORMULAS.and);
        expect(() => map.get([T])).toThrow(LogicException);
    });

    test.each([
        ['TRUE', 0],
        ['NOT A', 1],
        ['A AND B AND C AND D AND E', 5],
    ])('%s is unsupported', (formula, count) => {
        const table = tableOf(formula);
        expect(buildKmap(table.variables, table)).toEqual({
            supported: false,
            variableCount: count,
            reason: `Karnaugh maps need 2-4 variables, got ${count}`,
        });
    });

    test('rejects variables that do not match the table', () => {
        const table = generateTable(['A', 'B'], parse('A AND B'));
        expect(() => buildKmap(['B', 'A'], table)).toThrow(LogicException);
        expect(() => buildKmap(['A'], table)).toThrow('Variables (A) do not match table variables (A, B)');
    });
});

describe('layoutKmap', () => {
    test('two variables', () => {
        const grid = layoutKmap(supportedMap(FORMULAS.and));
        expect(grid.rowVariables).toEqual(['A']);
        expect(grid.columnVariables).toEqual(['B']);
        expect(grid.rowLabels).toEqual(['0', '1']);
        expect(grid.columnLabels).toEqual(['0', '1']);
        expect(grid.cells).toEqual([
            [F, F],
            [F, T],
        ]);
    });

    test('three variables put two on the columns in Gray order', () => {
        const grid = layoutKmap(supportedMap(FORMULAS.threeVar));
        expect(grid.rowVariables).toEqual(['A']);
        expect(grid.columnVariables).toEqual(['B', 'C']);
        expect(grid.columnLabels).toEqual(['00', '01', '11', '10']);
        expect(grid.cells).toEqual([
            [F, F, F, F],
            [F, T, T, T],
        ]);
    });

    test('four variables', () => {
        const grid = layoutKmap(supportedMap(FORMULAS.fourVar));
        expect(grid.rowVariables).toEqual(['A', 'B']);
        expect(grid.columnVariables).toEqual(['C', 'D']);
        expect(grid.rowLabels).toEqual(['00', '01', '11', '10']);
        expect(grid.cells).toEqual([
            [F, T, T, T],
            [T, F, F, F],
            [F, T, T, T],
            [T, F, F, F],
        ]);
    });
});
