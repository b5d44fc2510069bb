import type { AppConfig, Delimiter } from '../../types/index.js';
import type { FormulaAnalysis } from '../../logic/analyze.js';
import { classifyTable } from '../../logic/truthTable.js';
import { buildCnf, buildDnf, formatPi, formatSigma, maxterms, minterms } from '../../logic/canonical.js';
import { buildKmap, layoutKmap } from '../../logic/kmap.js';
import { exportTable } from '../../io/export.js';
import { formatKmap, formatTable } from '../../utils/formatting.js';
import type { FormatOptions } from '../../utils/formatting.js';

export const TABLE_COMMANDS = ['table', 'check', 'dnf', 'cnf', 'kmap', 'export'] as const;

export type TableCommand = typeof TABLE_COMMANDS[number];

export function isTableCommand(name: string): name is TableCommand {
    return TABLE_COMMANDS.some(command => command === name);
}

export interface CommandOptions extends FormatOptions {
    delimiter?: Delimiter;
}

const CLASSIFICATION_TEXT = {
    tautology: 'is a tautology (true under every assignment)',
    contradiction: 'is a contradiction (false under every assignment)',
    contingent: 'is contingent (neither a tautology nor a contradiction)',
} as const;

/**
 * Render one command against an already generated table
 */
export function renderCommand(
    command: TableCommand,
    analysis: FormulaAnalysis,
    options: CommandOptions = {}
): string {
    const { variables, table } = analysis;

    switch (command) {
        case 'table':
            return [
                `Variables: ${variables.length > 0 ? variables.join(', ') : '(none)'}`,
                formatTable(table, options),
                `Generated ${table.rows.length} rows.`,
            ].join('\n');

        case 'check':
            return `Formula ${CLASSIFICATION_TEXT[classifyTable(table)]}.`;

        case 'dnf':
            return `DNF: ${buildDnf(variables, table)}\n${formatSigma(minterms(table))}`;

        case 'cnf':
            return `CNF: ${buildCnf(variables, table)}\n${formatPi(maxterms(table))}`;

        case 'kmap': {
            const result = buildKmap(variables, table);
            if (!result.supported) {
                return `K-Map unavailable: ${result.reason}.`;
            }
            return formatKmap(layoutKmap(result.map), options);
        }

        case 'export':
            return exportTable(table, { delimiter: options.delimiter }).trimEnd();
    }
}

export function commandOptionsFrom(config: AppConfig, color: boolean): CommandOptions {
    return { color, delimiter: config.delimiter };
}
