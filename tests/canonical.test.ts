/**
 * Canonical Normal Form Tests
 */

import {
    buildDnf,
    buildCnf,
    minterms,
    maxterms,
    formatSigma,
    formatPi,
} from '../src/logic/canonical.js';
import { generateTable } from '../src/logic/truthTable.js';
import { parse } from '../src/parser/index.js';
import { LogicException } from '../src/types/index.js';
import { FORMULAS, tableOf } from './fixtures.js';

describe('buildDnf / buildCnf', () => {
    test('A AND B', () => {
        const table = tableOf(FORMULAS.and);
        expect(buildDnf(table.variables, table)).toBe('(A and B)');
        expect(buildCnf(table.variables, table)).toBe('(A or B) and (A or not B) and (not A or B)');
    });

    test('tautology', () => {
        const table = tableOf(FORMULAS.excludedMiddle);
        expect(buildDnf(table.variables, table)).toBe('(not A) or (A)');
        expect(buildCnf(table.variables, table)).toBe('True');
    });

    test('contradiction', () => {
        const table = tableOf(FORMULAS.contradiction);
        expect(buildDnf(table.variables, table)).toBe('False');
        expect(buildCnf(table.variables, table)).toBe('(A) and (not A)');
    });

    test('implication', () => {
        const table = tableOf(FORMULAS.implication);
        expect(buildDnf(table.variables, table)).toBe('(not A and not B) or (not A and B) or (A and B)');
        expect(buildCnf(table.variables, table)).toBe('(not A or B)');
    });

    test('zero variables', () => {
        const yes = generateTable([], parse('TRUE'));
        const no = generateTable([], parse('FALSE'));
        expect(buildDnf([], yes)).toBe('(True)');
        expect(buildCnf([], yes)).toBe('True');
        expect(buildDnf([], no)).toBe('False');
        expect(buildCnf([], no)).toBe('(False)');
    });

    test.each([
        FORMULAS.and,
        FORMULAS.implication,
        FORMULAS.nand,
        FORMULAS.threeVar,
        FORMULAS.fourVar,
        FORMULAS.excludedMiddle,
        FORMULAS.contradiction,
    ])('forms of %s parse back to the same function', (formula) => {
        const table = tableOf(formula);
        const results = table.rows.map(r => r.result);
        const dnf = generateTable(table.variables, parse(buildDnf(table.variables, table)));
        const cnf = generateTable(table.variables, parse(buildCnf(table.variables, table)));
        expect(dnf.rows.map(r => r.result)).toEqual(results);
        expect(cnf.rows.map(r => r.result)).toEqual(results);
    });
});

describe('variable list checks', () => {
    test.each([
        [['A', 'B', 'C']],
        [['A']],
        [['B', 'A']],
    ])('rejects %j for a table over A, B', (variables) => {
        const table = tableOf(FORMULAS.and);
        for (const build of [buildDnf, buildCnf]) {
            try {
                build(variables, table);
                throw new Error('expected the builder to fail');
            } catch (error) {
                expect(error).toBeInstanceOf(LogicException);
                if (error instanceof LogicException) {
                    expect(error.code).toBe('INVALID_ARGUMENT');
                    expect(error.message).toBe(`Variables (${variables.join(', ')}) do not match table variables (A, B)`);
                }
            }
        }
    });
});

describe('minterms / maxterms', () => {
    test('index rows with the first variable most significant', () => {
        const table = tableOf(FORMULAS.and);
        expect(minterms(table)).toEqual([3]);
        expect(maxterms(table)).toEqual([0, 1, 2]);
    });

    test('three variables', () => {
        const table = tableOf(FORMULAS.threeVar);
        expect(minterms(table)).toEqual([5, 6, 7]);
        expect(maxterms(table)).toEqual([0, 1, 2, 3, 4]);
    });

    test('formatting', () => {
        expect(formatSigma([1, 3])).toBe('Σm(1, 3)');
        expect(formatPi([0, 2])).toBe('ΠM(0, 2)');
        expect(formatSigma([])).toBe('Σm()');
    });
});
