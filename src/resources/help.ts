/**
 * MCP Resources - Reference Sheets
 *
 * Operator and export-format reference, served over the MCP resources
 * protocol and printed by the CLI help.
 */

/**
 * Resource definition
 */
export interface Resource {
    uri: string;
    name: string;
    description: string;
    mimeType: string;
}

export const OPERATORS_HELP = `Supported operators (case-insensitive):

  NOT A        ~A  !A      negation
  A AND B      A & B       conjunction
  A OR B       A | B       disjunction
  A XOR B      A ^ B       exclusive or, also XOR(A, B)
  A -> B       A IMPLIES B implication: (NOT A) OR B
  A <-> B      A EQUIV B   equivalence: A and B have the same value
  NAND(A, B)               NOT (A AND B)
  NOR(A, B)                NOT (A OR B)
  TRUE  FALSE  1  0        constants

Binding, loosest first: <->, ->, XOR, OR, AND, NOT.
Binary operators associate left to right. Use parentheses to group subexpressions.
Variables are single letters A-Z.`;

export const EXPORT_FORMAT_HELP = `Flat row export:

  A,B,Result
  0,0,0
  0,1,0
  1,0,0
  1,1,1

Header: variable names in table order, then "Result".
One line per row in binary counting order, first variable most significant.
Comma-delimited by default; tab-delimited for clipboard copies.`;

/**
 * All available resources
 */
export const RESOURCES: Resource[] = [
    {
        uri: 'truthtable://help/operators',
        name: 'Formula Operators',
        description: 'Operators, spellings and precedence accepted by the formula parser',
        mimeType: 'text/plain',
    },
    {
        uri: 'truthtable://help/export-format',
        name: 'Export Format',
        description: 'Layout of the flat truth table export',
        mimeType: 'text/plain',
    },
];

const CONTENT: Record<string, string> = {
    'truthtable://help/operators': OPERATORS_HELP,
    'truthtable://help/export-format': EXPORT_FORMAT_HELP,
};

/**
 * List all resources
 */
export function listResources(): Resource[] {
    return RESOURCES;
}

/**
 * Get resource content by URI, or null if unknown
 */
export function getResourceContent(uri: string): string | null {
    return CONTENT[uri] ?? null;
}
