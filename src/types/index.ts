/**
 * Shared type definitions
 */

// Re-export error types
export {
    LogicException,
    ParseError,
    EvaluationError,
    getSuggestion,
    createParseError,
    createEvaluationError,
    createInvalidTableError,
    serializeLogicError,
    createGenericError,
} from './errors.js';

export type {
    LogicErrorCode,
    ErrorSpan,
    LogicError,
} from './errors.js';

// Re-export AST types
export type {
    Variable,
    BinaryNodeType,
    FormulaNodeType,
    VariableNode,
    ConstantNode,
    NotNode,
    BinaryNode,
    FormulaNode,
} from './ast.js';

// Re-export parser types
export type {
    TokenType,
    Token,
} from './parser.js';

// Re-export table types
export type {
    Assignment,
    TruthTableRow,
    TruthTable,
    TableClassification,
} from './table.js';

// Re-export response types
export type {
    Verbosity,
    BitRow,
    MinimalTableResponse,
    StandardTableResponse,
    DetailedTableResponse,
    TableResponse,
    CheckFormulaResponse,
    CanonicalFormsResponse,
    KarnaughMapResponse,
    ExportResponse,
} from './responses.js';

// Re-export options
export {
    DEFAULTS
} from './options.js';

export type {
    Delimiter,
    TableOptions,
    ExportOptions,
    AppConfig,
} from './options.js';
