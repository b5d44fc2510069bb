/**
 * Shared test fixtures for consistent, DRY testing.
 */
import type { AppConfig, TruthTable } from '../src/types/index.js';
import { extractVariables, parse } from '../src/parser/index.js';
import { generateTable } from '../src/logic/truthTable.js';

export const TEST_CONFIG: AppConfig = {
    maxVariables: 16,
    delimiter: ',',
    verbosity: 'standard',
};

// === Common Formulas ===
export const FORMULAS = {
    and: 'A AND B',
    excludedMiddle: 'A OR NOT A',
    contradiction: 'A AND NOT A',
    implication: 'A -> B',
    nand: 'NAND(A,B)',
    threeVar: 'A AND (B OR C)',
    fourVar: '(A XOR B) <-> NOR(C, D)',
} as const;

/**
 * Build the truth table of a formula over its extracted variables
 */
export function tableOf(formula: string): TruthTable {
    return generateTable(extractVariables(formula), parse(formula));
}

/**
 * Rows as [v1, ..., vn, result] boolean tuples
 */
export function rowsOf(table: TruthTable): boolean[][] {
    return table.rows.map(row => [...row.values, row.result]);
}

export const T = true;
export const F = false;
