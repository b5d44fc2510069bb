import { z } from 'zod';
import type {
    AppConfig,
    CanonicalFormsResponse,
    CheckFormulaResponse,
    ExportResponse,
    KarnaughMapResponse,
    TableResponse,
    Verbosity,
} from '../types/index.js';
import { LogicException, serializeLogicError } from '../types/index.js';
import { analyzeFormula } from '../logic/analyze.js';
import type { FormulaAnalysis } from '../logic/analyze.js';
import { classifyTable, isContradiction, isSatisfiable, isTautology } from '../logic/truthTable.js';
import { buildCnf, buildDnf, formatPi, formatSigma, maxterms, minterms } from '../logic/canonical.js';
import { buildKmap, layoutKmap } from '../logic/kmap.js';
import { exportTable } from '../io/export.js';
import { astToString } from '../utils/ast/printer.js';
import { buildTableResponse, toBitRow } from '../utils/response.js';
import { parseArgs } from './utils.js';

const verbositySchema = z.enum(['minimal', 'standard', 'detailed']).optional();

const formulaSchema = z.string().min(1, 'formula must not be empty');

export const TruthTableArgs = z.object({
    formula: formulaSchema,
    verbosity: verbositySchema,
});

export const CheckFormulaArgs = z.object({
    formula: z.string(),
    verbosity: verbositySchema,
});

export const CanonicalFormsArgs = z.object({
    formula: formulaSchema,
    form: z.enum(['dnf', 'cnf', 'both']).default('both'),
    verbosity: verbositySchema,
});

export const KarnaughMapArgs = z.object({
    formula: formulaSchema,
    verbosity: verbositySchema,
});

export const ExportTableArgs = z.object({
    formula: formulaSchema,
    delimiter: z.enum(['comma', 'tab']).optional(),
});

function verbosityOf(requested: Verbosity | undefined, config: AppConfig): Verbosity {
    return requested ?? config.verbosity;
}

export function truthTableHandler(rawArgs: unknown, config: AppConfig): TableResponse {
    const args = parseArgs(TruthTableArgs, rawArgs);
    const analysis = analyzeFormula(args.formula, config);
    return buildTableResponse(analysis, verbosityOf(args.verbosity, config));
}

/**
 * Syntax and classification check. Parse failures are reported in the
 * response rather than thrown, like a validation report.
 */
export function checkFormulaHandler(rawArgs: unknown, config: AppConfig): CheckFormulaResponse {
    const args = parseArgs(CheckFormulaArgs, rawArgs);
    const verbosity = verbosityOf(args.verbosity, config);

    let analysis: FormulaAnalysis;
    try {
        analysis = analyzeFormula(args.formula, config);
    } catch (error) {
        if (error instanceof LogicException && error.code === 'PARSE_ERROR') {
            return { valid: false, error: serializeLogicError(error.error) };
        }
        throw error;
    }

    const { table } = analysis;
    const classification = classifyTable(table);
    if (verbosity === 'minimal') {
        return { valid: true, classification };
    }

    return {
        valid: true,
        classification,
        tautology: isTautology(table),
        contradiction: isContradiction(table),
        satisfiable: isSatisfiable(table),
        variables: [...analysis.variables],
        ...(verbosity === 'detailed' && { normalized: astToString(analysis.ast) }),
    };
}

export function canonicalFormsHandler(rawArgs: unknown, config: AppConfig): CanonicalFormsResponse {
    const args = parseArgs(CanonicalFormsArgs, rawArgs);
    const verbosity = verbosityOf(args.verbosity, config);
    const { variables, table } = analyzeFormula(args.formula, config);

    const wantDnf = args.form !== 'cnf';
    const wantCnf = args.form !== 'dnf';
    return {
        variables: [...variables],
        ...(wantDnf && { dnf: buildDnf(variables, table) }),
        ...(wantCnf && { cnf: buildCnf(variables, table) }),
        ...(verbosity !== 'minimal' && wantDnf && { minterms: formatSigma(minterms(table)) }),
        ...(verbosity !== 'minimal' && wantCnf && { maxterms: formatPi(maxterms(table)) }),
    };
}

export function karnaughMapHandler(rawArgs: unknown, config: AppConfig): KarnaughMapResponse {
    const args = parseArgs(KarnaughMapArgs, rawArgs);
    const verbosity = verbosityOf(args.verbosity, config);
    const { variables, table } = analyzeFormula(args.formula, config);

    const result = buildKmap(variables, table);
    if (!result.supported) {
        return { supported: false, variableCount: result.variableCount, reason: result.reason };
    }

    const grid = layoutKmap(result.map);
    return {
        supported: true,
        variables: [...variables],
        rowVariables: grid.rowVariables,
        columnVariables: grid.columnVariables,
        rowLabels: grid.rowLabels,
        columnLabels: grid.columnLabels,
        grid: grid.cells.map(toBitRow),
        ...(verbosity === 'detailed' && {
            cells: [...result.map.entries()].map(([assignment, value]) => ({
                assignment: toBitRow(assignment),
                result: value ? 1 : 0,
            })),
        }),
    };
}

export function exportTableHandler(rawArgs: unknown, config: AppConfig): ExportResponse {
    const args = parseArgs(ExportTableArgs, rawArgs);
    const { table } = analyzeFormula(args.formula, config);
    const delimiter = args.delimiter === undefined
        ? config.delimiter
        : args.delimiter === 'tab' ? '\t' : ',';
    return {
        text: exportTable(table, { delimiter }),
        rowCount: table.rows.length,
    };
}
