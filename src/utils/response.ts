import type {
    BitRow,
    DetailedTableResponse,
    MinimalTableResponse,
    StandardTableResponse,
    TableResponse,
    TruthTable,
    TruthTableRow,
    Verbosity,
} from '../types/index.js';
import type { FormulaAnalysis } from '../logic/analyze.js';
import { classifyTable } from '../logic/truthTable.js';
import { maxterms, minterms } from '../logic/canonical.js';
import { astToString } from './ast/printer.js';

export function toBitRow(values: readonly boolean[]): BitRow {
    return values.map(v => (v ? 1 : 0));
}

export function rowToBits(row: TruthTableRow): BitRow {
    return toBitRow([...row.values, row.result]);
}

export function tableToBits(table: TruthTable): BitRow[] {
    return table.rows.map(rowToBits);
}

/**
 * Build table response based on verbosity level
 */
export function buildTableResponse(analysis: FormulaAnalysis, verbosity: Verbosity = 'standard'): TableResponse {
    const { table } = analysis;
    const minimal: MinimalTableResponse = {
        variables: [...table.variables],
        rows: tableToBits(table),
    };
    if (verbosity === 'minimal') {
        return minimal;
    }

    const standard: StandardTableResponse = {
        ...minimal,
        rowCount: table.rows.length,
        classification: classifyTable(table),
    };
    if (verbosity === 'standard') {
        return standard;
    }

    // detailed
    const detailed: DetailedTableResponse = {
        ...standard,
        normalized: astToString(analysis.ast),
        minterms: minterms(table),
        maxterms: maxterms(table),
    };
    return detailed;
}
