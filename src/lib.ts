/**
 * Truth Table - Library Entry Point
 *
 * Exports the propositional logic core for use in other projects.
 * This file should NOT import @modelcontextprotocol/sdk or any other
 * server-specific dependencies.
 */

// Parser
export { parse, extractVariables, Tokenizer, Parser } from './parser/index.js';

// Evaluation and tables
export { evaluate } from './logic/evaluator.js';
export {
    generateTable,
    isTautology,
    isContradiction,
    isSatisfiable,
    classifyTable,
    assertTableVariables,
} from './logic/truthTable.js';
export { analyzeFormula } from './logic/analyze.js';
export type { FormulaAnalysis } from './logic/analyze.js';

// Canonical forms
export {
    buildDnf,
    buildCnf,
    minterms,
    maxterms,
    formatSigma,
    formatPi,
} from './logic/canonical.js';

// Karnaugh maps
export { buildKmap, layoutKmap, KarnaughMap } from './logic/kmap.js';
export type { KarnaughMapResult, KarnaughGrid } from './logic/kmap.js';

// Export format
export { exportTable, importTable, RESULT_COLUMN } from './io/export.js';

// AST utilities
export { astToString } from './utils/ast/printer.js';
export { traverse, collectVariables } from './ast/visitor.js';

// Configuration
export { loadConfig } from './config.js';

// Types and Interfaces
export * from './types/index.js';
