import type { Verbosity } from './responses.js';

export type Delimiter = ',' | '\t';

export interface TableOptions {
    /** Upper bound on the number of variables a table may enumerate */
    maxVariables?: number;
}

export interface ExportOptions {
    delimiter?: Delimiter;
}

export interface AppConfig {
    maxVariables: number;
    delimiter: Delimiter;
    verbosity: Verbosity;
}

export const DEFAULTS = {
    maxVariables: 16,
    delimiter: ',',
    verbosity: 'standard',
} as const satisfies AppConfig;
