/**
 * Formatting utilities for terminal output
 */
import chalk from 'chalk';
import type { TruthTable } from '../types/index.js';
import { LogicException } from '../types/index.js';
import type { KarnaughGrid } from '../logic/kmap.js';

export interface FormatOptions {
    color?: boolean;
}

function palette(options: FormatOptions): chalk.Chalk {
    return options.color === false ? new chalk.Instance({ level: 0 }) : chalk;
}

/**
 * Format a truth table as aligned text: `A B | Result`, then one row per line
 */
export function formatTable(table: TruthTable, options: FormatOptions = {}): string {
    const c = palette(options);
    const bit = (value: boolean): string => (value ? c.green('1') : c.dim('0'));
    const line = (left: string[], result: string): string =>
        left.length > 0 ? `${left.join(' ')} | ${result}` : result;

    const lines = [c.bold(line([...table.variables], 'Result'))];
    for (const row of table.rows) {
        lines.push(line(row.values.map(bit), bit(row.result)));
    }
    return lines.join('\n');
}

/**
 * Format a Karnaugh grid with the row variables in the corner, e.g.
 *
 *   A\B  0  1
 *   0    0  0
 *   1    0  1
 */
export function formatKmap(grid: KarnaughGrid, options: FormatOptions = {}): string {
    const c = palette(options);
    const corner = `${grid.rowVariables.join('')}\\${grid.columnVariables.join('')}`;
    const firstWidth = Math.max(corner.length, ...grid.rowLabels.map(l => l.length));
    const cellWidth = Math.max(...grid.columnLabels.map(l => l.length));

    const header = [corner.padEnd(firstWidth), ...grid.columnLabels.map(l => l.padStart(cellWidth))];
    const lines = [c.bold(header.join('  '))];
    grid.cells.forEach((cells, r) => {
        const label = grid.rowLabels[r].padEnd(firstWidth);
        const values = cells.map(v => {
            const text = (v ? '1' : '0').padStart(cellWidth);
            return v ? c.green(text) : c.dim(text);
        });
        lines.push([c.bold(label), ...values].join('  '));
    });
    return lines.join('\n');
}

/**
 * Format an error for the terminal: message, caret under the failing
 * fragment, and suggestion when there is one.
 */
export function formatError(error: unknown, options: FormatOptions = {}): string {
    const c = palette(options);
    if (!(error instanceof LogicException)) {
        const message = error instanceof Error ? error.message : String(error);
        return c.red(`Error: ${message}`);
    }

    const { message, span, context, suggestion } = error.error;
    const lines = [c.red(`Error: ${message}`)];
    if (span && context !== undefined && !context.includes('\n')) {
        lines.push(`  ${context}`);
        lines.push(`  ${' '.repeat(span.start)}${c.red('^'.repeat(Math.max(span.end - span.start, 1)))}`);
    }
    if (suggestion) {
        lines.push(c.yellow(`Suggestion: ${suggestion}`));
    }
    return lines.join('\n');
}
