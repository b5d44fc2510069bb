#!/usr/bin/env node
import { writeFileSync } from 'fs';
import * as readline from 'readline';
import { loadConfig } from './config.js';
import { analyzeFormula } from './logic/analyze.js';
import { OPERATORS_HELP } from './resources/index.js';
import { formatError } from './utils/formatting.js';
import { isTableCommand, renderCommand, commandOptionsFrom } from './apps/cli/commands.js';
import { ReplSession, REPL_HELP } from './apps/cli/state.js';
import { parseCliArgs, topLevelAction } from './apps/cli/args.js';
import { VERSION } from './version.js';

const HELP = `
Truth Table CLI v${VERSION}

Usage:
  truthtable table  "<formula>"   Print the truth table
  truthtable check  "<formula>"   Tautology / contradiction check
  truthtable dnf    "<formula>"   Canonical disjunctive normal form
  truthtable cnf    "<formula>"   Canonical conjunctive normal form
  truthtable kmap   "<formula>"   Karnaugh map (2-4 variables)
  truthtable export "<formula>"   Flat 0/1 rows (CSV)
  truthtable ops                  Operator reference
  truthtable repl                 Interactive mode

Options:
  --tsv              Tab-delimited export (clipboard friendly)
  --out <file>       Write export output to a file
  --no-color         Disable colors
  --help, -h         Show this help
  --version, -v      Show version

Examples:
  truthtable table "A AND B -> C"
  truthtable dnf "NAND(A, B)"
  truthtable export --out table.csv "A XOR B"
`;

const args = parseCliArgs(process.argv.slice(2));
const color = !args.noColor && process.stdout.isTTY === true;

function main(): number {
    const action = topLevelAction(args);
    if (action === 'version') {
        console.log(VERSION);
        return 0;
    }
    const { command: commandName, formula, outFile, tsv } = args;
    if (action === 'help' || commandName === undefined) {
        console.log(HELP);
        return 0;
    }

    const config = loadConfig();
    const options = commandOptionsFrom(config, color);

    if (commandName === 'repl') {
        runRepl(new ReplSession(config, options));
        return 0;
    }

    if (commandName === 'ops') {
        console.log(OPERATORS_HELP);
        return 0;
    }

    if (!isTableCommand(commandName)) {
        console.error(`Error: Unknown command '${commandName}'. Run with --help for usage.`);
        return 1;
    }

    if (!formula.trim()) {
        console.error('Error: formula argument required');
        return 1;
    }

    try {
        const analysis = analyzeFormula(formula, config);
        const output = renderCommand(commandName, analysis, tsv ? { ...options, delimiter: '\t' } : options);

        if (commandName === 'export' && outFile) {
            writeFileSync(outFile, output + '\n', 'utf-8');
            console.log(`Saved ${analysis.table.rows.length} rows to ${outFile}`);
        } else {
            console.log(output);
        }
        return 0;
    } catch (error) {
        console.error(formatError(error, { color }));
        return 1;
    }
}

function runRepl(session: ReplSession): void {
    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
        prompt: 'truthtable> '
    });

    console.log(`Truth Table REPL v${VERSION}`);
    console.log(REPL_HELP + '\n');
    rl.prompt();

    rl.on('line', (line) => {
        const reply = session.handleLine(line);
        if (reply.quit) {
            rl.close();
            return;
        }
        if (reply.output) {
            console.log(reply.output);
        }
        rl.prompt();
    });

    rl.on('close', () => process.exit(0));
}

const exitCode = main();
if (exitCode !== 0) {
    process.exit(exitCode);
}
