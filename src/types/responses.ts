/**
 * Response types for the MCP tools
 */

import type { TableClassification } from './table.js';

/**
 * Verbosity level for responses
 */
export type Verbosity = 'minimal' | 'standard' | 'detailed';

/**
 * A table row as 0/1 cells: variable values followed by the result
 */
export type BitRow = number[];

export interface MinimalTableResponse {
    variables: string[];
    rows: BitRow[];
}

export interface StandardTableResponse extends MinimalTableResponse {
    rowCount: number;
    classification: TableClassification;
}

export interface DetailedTableResponse extends StandardTableResponse {
    /** Fully parenthesized form of the parsed formula */
    normalized: string;
    minterms: number[];
    maxterms: number[];
}

export type TableResponse = MinimalTableResponse | StandardTableResponse | DetailedTableResponse;

export type CheckFormulaResponse =
    | {
        valid: true;
        classification: TableClassification;
        tautology?: boolean;
        contradiction?: boolean;
        satisfiable?: boolean;
        variables?: string[];
        normalized?: string;
    }
    | {
        valid: false;
        error: object;
    };

export interface CanonicalFormsResponse {
    variables: string[];
    dnf?: string;
    cnf?: string;
    minterms?: string;
    maxterms?: string;
}

export type KarnaughMapResponse =
    | {
        supported: true;
        variables: string[];
        rowVariables: string[];
        columnVariables: string[];
        rowLabels: string[];
        columnLabels: string[];
        grid: BitRow[];
        cells?: Array<{ assignment: BitRow; result: number }>;
    }
    | {
        supported: false;
        variableCount: number;
        reason: string;
    };

export interface ExportResponse {
    text: string;
    rowCount: number;
}
