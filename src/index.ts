#!/usr/bin/env node
/**
 * Truth Table MCP - Entry Point
 *
 * CLI entry point for the MCP server.
 */

import { runServer } from './server.js';
import { VERSION } from './version.js';

async function main(): Promise<void> {
    const args = process.argv.slice(2);

    if (args.includes('--help') || args.includes('-h')) {
        console.log(`
Truth Table MCP Server - Propositional logic truth tables

Usage: truthtable-mcp [options]

Options:
  --help, -h     Show this help message
  --version, -v  Show version information

Tools:
  - truth-table      Generate the full truth table of a formula
  - check-formula    Validate syntax; tautology / contradiction / contingent
  - canonical-forms  Canonical DNF and CNF
  - karnaugh-map     Gray-code Karnaugh map for 2-4 variables
  - export-table     Flat 0/1 row export (comma or tab delimited)

Resources:
  - truthtable://help/operators      Operator reference
  - truthtable://help/export-format  Export layout

Environment:
  TRUTHTABLE_MAX_VARIABLES  Largest variable count to tabulate (default 16)
  TRUTHTABLE_DELIMITER      comma | tab (default comma)
  TRUTHTABLE_VERBOSITY      minimal | standard | detailed (default standard)

The server communicates via stdio using the Model Context Protocol.
`);
        process.exit(0);
    }

    if (args.includes('--version') || args.includes('-v')) {
        console.log(`truthtable-mcp version ${VERSION}`);
        process.exit(0);
    }

    try {
        await runServer();
    } catch (error) {
        console.error('Failed to start server:', error);
        process.exit(1);
    }
}

void main();
