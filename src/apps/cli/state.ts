import type { AppConfig } from '../../types/index.js';
import { analyzeFormula } from '../../logic/analyze.js';
import type { FormulaAnalysis } from '../../logic/analyze.js';
import { OPERATORS_HELP } from '../../resources/index.js';
import { formatError } from '../../utils/formatting.js';
import { isTableCommand, renderCommand } from './commands.js';
import type { CommandOptions } from './commands.js';

export const REPL_HELP = `Commands:
  <formula>          Generate the truth table of a formula
  .table             Show the current table again
  .check             Tautology / contradiction check
  .dnf               Disjunctive normal form
  .cnf               Conjunctive normal form
  .kmap              Karnaugh map (2-4 variables)
  .export [tsv]      Flat rows, comma or tab delimited
  .ops               Operator reference
  .clear             Forget the current table
  .quit, .exit, .q   Exit REPL
  .help              Show this help`;

export interface ReplReply {
    output: string;
    quit?: boolean;
}

/**
 * REPL session. Holds the last generated analysis; a new formula replaces it.
 */
export class ReplSession {
    private current: FormulaAnalysis | undefined;

    constructor(
        private readonly config: AppConfig,
        private readonly options: CommandOptions = {}
    ) { }

    get analysis(): FormulaAnalysis | undefined {
        return this.current;
    }

    handleLine(line: string): ReplReply {
        const trimmed = line.trim();
        if (!trimmed) {
            return { output: '' };
        }

        if (!trimmed.startsWith('.')) {
            return this.generate(trimmed);
        }

        const [command, ...args] = trimmed.slice(1).split(/\s+/);
        switch (command) {
            case 'quit':
            case 'exit':
            case 'q':
                return { output: '', quit: true };
            case 'help':
                return { output: REPL_HELP };
            case 'ops':
                return { output: OPERATORS_HELP };
            case 'clear':
                this.current = undefined;
                return { output: 'Cleared.' };
        }

        if (!isTableCommand(command)) {
            return { output: `Unknown command '.${command}'. Type .help for commands.` };
        }
        if (!this.current) {
            return { output: 'No table yet. Enter a formula first.' };
        }

        const options = command === 'export' && args[0] === 'tsv'
            ? { ...this.options, delimiter: '\t' as const }
            : this.options;
        return { output: renderCommand(command, this.current, options) };
    }

    private generate(formula: string): ReplReply {
        try {
            this.current = analyzeFormula(formula, this.config);
        } catch (error) {
            this.current = undefined;
            return { output: formatError(error, this.options) };
        }
        return { output: renderCommand('table', this.current, this.options) };
    }
}
