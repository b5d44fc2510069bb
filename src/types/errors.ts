/**
 * Structured Error System
 *
 * Provides machine-readable errors with codes, spans, and suggestions.
 */

/**
 * Error codes for formula and table operations
 */
export type LogicErrorCode =
  | 'PARSE_ERROR'           // Syntax errors in formula
  | 'EVALUATION_ERROR'      // Assignment does not cover the formula
  | 'INVALID_ARGUMENT'      // Bad variable list, limits exceeded
  | 'INVALID_TABLE';        // Malformed exported table

/**
 * Source location span for error reporting
 */
export interface ErrorSpan {
  start: number;
  end: number;
  line?: number;
  col?: number;
}

/**
 * Structured error with code, message, span, and suggestions
 */
export interface LogicError {
  code: LogicErrorCode;
  message: string;
  span?: ErrorSpan;
  suggestion?: string;
  context?: string;          // The problematic formula/fragment
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping LogicError for throw/catch patterns
 */
export class LogicException extends Error {
  public readonly error: LogicError;

  constructor(error: LogicError) {
    super(error.message);
    this.name = 'LogicException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  get code(): LogicErrorCode {
    return this.error.code;
  }

  /**
   * Serialize error for MCP response
   */
  toJSON(): LogicError {
    return this.error;
  }
}

/**
 * Malformed formula text
 */
export class ParseError extends LogicException {
  constructor(error: Omit<LogicError, 'code'>) {
    super({ ...error, code: 'PARSE_ERROR' });
    this.name = 'ParseError';
  }
}

/**
 * An assignment that is missing a variable the formula references
 */
export class EvaluationError extends LogicException {
  constructor(error: Omit<LogicError, 'code'>) {
    super({ ...error, code: 'EVALUATION_ERROR' });
    this.name = 'EvaluationError';
  }
}

/**
 * Common syntax error patterns and their suggestions
 */
const SYNTAX_SUGGESTIONS: Array<{
  pattern: RegExp;
  suggestion: string;
}> = [
    {
      pattern: /^\s*$/,
      suggestion: 'Enter a formula, e.g. A AND B -> C'
    },
    {
      pattern: /\b(NAND|NOR|XOR)\s*\(\s*[^,()]*\)/i,
      suggestion: 'NAND, NOR and XOR calls take exactly two arguments: NAND(A, B)'
    },
    {
      pattern: /\b(?!(?:AND|OR|NOT|XOR|NAND|NOR|IMPLIES|EQUIV|TRUE|FALSE)\b)[A-Z]{2,}\b/i,
      suggestion: 'Variables are single letters A-Z; operators are AND, OR, NOT, XOR, NAND, NOR, IMPLIES, EQUIV'
    },
    {
      pattern: /\b[A-Z]\d+\b/i,
      suggestion: 'Variables are single letters without indices (use A, B, C instead of A1, A2)'
    },
    {
      pattern: /<=>|==/,
      suggestion: "Use '<->' for equivalence"
    },
    {
      pattern: /=>/,
      suggestion: "Use '->' for implication"
    },
    {
      pattern: /<->\s*$/,
      suggestion: "Incomplete equivalence - missing right side after '<->'"
    },
    {
      pattern: /->\s*$/,
      suggestion: "Incomplete implication - missing consequent after '->'"
    },
    {
      pattern: /\b(AND|OR|XOR|IMPLIES|EQUIV)\s*$/i,
      suggestion: 'Incomplete expression - missing right operand'
    },
    {
      pattern: /\bNOT\s*$/i,
      suggestion: 'Incomplete negation - missing operand after NOT'
    },
  ];

/**
 * Get a suggestion for a syntax error based on the input
 */
export function getSuggestion(input: string): string | undefined {
  for (const { pattern, suggestion } of SYNTAX_SUGGESTIONS) {
    if (pattern.test(input)) {
      return suggestion;
    }
  }
  const open = (input.match(/\(/g) ?? []).length;
  const close = (input.match(/\)/g) ?? []).length;
  if (open > close) {
    return "Unbalanced parentheses - missing closing ')'";
  }
  if (close > open) {
    return "Unbalanced parentheses - missing opening '('";
  }
  return undefined;
}

/**
 * Create a parse error with optional span and suggestion
 */
export function createParseError(
  message: string,
  input: string,
  position?: number,
  length: number = 1
): ParseError {
  const span = position !== undefined ? {
    start: position,
    end: position + Math.max(length, 1),
    line: getLineNumber(input, position),
    col: getColumnNumber(input, position),
  } : undefined;

  return new ParseError({
    message,
    span,
    suggestion: getSuggestion(input),
    context: input,
  });
}

/**
 * Create an evaluation error for a variable with no assigned value
 */
export function createEvaluationError(
  variable: string,
  assigned: Iterable<string>
): EvaluationError {
  const known = [...assigned];
  return new EvaluationError({
    message: `No value assigned to variable '${variable}'`,
    suggestion: 'Generate the table from the variables extracted from the same formula',
    details: { variable, assigned: known },
  });
}

/**
 * Create an invalid table error
 */
export function createInvalidTableError(
  message: string,
  line?: number
): LogicException {
  return new LogicException({
    code: 'INVALID_TABLE',
    message: line !== undefined ? `Line ${line}: ${message}` : message,
    ...(line !== undefined && { details: { line } }),
  });
}

/**
 * Get line number from position in string
 */
function getLineNumber(input: string, position: number): number {
  const lines = input.substring(0, position).split('\n');
  return lines.length;
}

/**
 * Get column number from position in string
 */
function getColumnNumber(input: string, position: number): number {
  const lastNewline = input.lastIndexOf('\n', position - 1);
  return position - lastNewline;
}

/**
 * Serialize a LogicError for JSON output
 */
export function serializeLogicError(error: LogicError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.span && { span: error.span }),
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}

/**
 * Create a generic logic error exception.
 * Use this when no specific factory is available.
 */
export function createGenericError(
  code: LogicErrorCode,
  message: string,
  details?: Record<string, unknown>
): LogicException {
  return new LogicException({
    code,
    message,
    details,
  });
}
