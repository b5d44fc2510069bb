import { Tool } from '@modelcontextprotocol/sdk/types.js';

/**
 * Verbosity parameter schema for tools
 */
const verbositySchema = {
    type: 'string',
    enum: ['minimal', 'standard', 'detailed'],
    description: "Response verbosity: 'minimal' (token-efficient), 'standard' (default), 'detailed' (adds normalized formula and term indices)",
};

const formulaSchema = {
    type: 'string',
    description: 'Propositional formula over single-letter variables A-Z, e.g. "A AND NOT B -> C" or "NAND(A, B)"',
};

const SYNTAX = `**Syntax:** AND (&), OR (|), NOT (~, !), XOR (^), -> (IMPLIES), <-> (EQUIV),
NAND(a, b), NOR(a, b), XOR(a, b), TRUE/FALSE (1/0), parentheses. Case-insensitive.
Precedence, loosest first: <->, ->, XOR, OR, AND, NOT.`;

export const TOOLS: Tool[] = [
    {
        name: 'truth-table',
        description: `Generate the full truth table of a propositional formula.

**When to use:** You want every row of a formula's truth table.
**Row order:** binary counting, first variable (alphabetically) most significant, 0 before 1.

**Example:**
  formula: "A AND B"
  → Returns: { variables: ["A","B"], rows: [[0,0,0],[0,1,0],[1,0,0],[1,1,1]] }

${SYNTAX}`,
        inputSchema: {
            type: 'object',
            properties: {
                formula: formulaSchema,
                verbosity: verbositySchema,
            },
            required: ['formula'],
        },
    },
    {
        name: 'check-formula',
        description: `Check a formula's syntax and classify it as tautology, contradiction or contingent.

**When to use:** Before other tools to catch syntax errors early, or to test validity/satisfiability.

**Example:**
  formula: "A OR NOT A"
  → Returns: { valid: true, classification: "tautology", ... }

${SYNTAX}`,
        inputSchema: {
            type: 'object',
            properties: {
                formula: formulaSchema,
                verbosity: verbositySchema,
            },
            required: ['formula'],
        },
    },
    {
        name: 'canonical-forms',
        description: `Derive the canonical DNF (from true rows) and CNF (from false rows) of a formula.

No minimization is performed: every true row becomes one DNF clause, every false row one CNF clause.

**Example:**
  formula: "A -> B"
  → Returns: { dnf: "(not A and not B) or (not A and B) or (A and B)", cnf: "(not A or B)" }`,
        inputSchema: {
            type: 'object',
            properties: {
                formula: formulaSchema,
                form: {
                    type: 'string',
                    enum: ['dnf', 'cnf', 'both'],
                    description: "Which form to return. Default: 'both'.",
                },
                verbosity: verbositySchema,
            },
            required: ['formula'],
        },
    },
    {
        name: 'karnaugh-map',
        description: `Lay out the Karnaugh map of a 2-4 variable formula.

Rows are indexed by the first half of the variables, columns by the rest, both in Gray-code order.
Formulas with fewer than 2 or more than 4 variables return { supported: false }.`,
        inputSchema: {
            type: 'object',
            properties: {
                formula: formulaSchema,
                verbosity: verbositySchema,
            },
            required: ['formula'],
        },
    },
    {
        name: 'export-table',
        description: `Export a formula's truth table as flat rows: a header of variable names plus "Result", then one line of 0/1 values per row.`,
        inputSchema: {
            type: 'object',
            properties: {
                formula: formulaSchema,
                delimiter: {
                    type: 'string',
                    enum: ['comma', 'tab'],
                    description: "Cell delimiter. Default: 'comma'.",
                },
            },
            required: ['formula'],
        },
    },
];
