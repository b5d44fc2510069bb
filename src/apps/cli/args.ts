/**
 * Command line arguments for the truthtable bin
 */

export interface CliArgs {
    command?: string;
    formula: string;
    outFile?: string;
    tsv: boolean;
    noColor: boolean;
    help: boolean;
    version: boolean;
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
    let outFile: string | undefined;
    const positional: string[] = [];

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg.startsWith('--out=')) {
            outFile = arg.slice('--out='.length);
        } else if (arg === '--out') {
            if (i + 1 < argv.length) {
                outFile = argv[i + 1];
                i++;
            }
        } else if (!arg.startsWith('-')) {
            positional.push(arg);
        }
    }

    const [command, ...formulaParts] = positional;
    return {
        command,
        formula: formulaParts.join(' '),
        outFile,
        tsv: argv.includes('--tsv'),
        noColor: argv.includes('--no-color'),
        help: argv.includes('--help') || argv.includes('-h'),
        version: argv.includes('--version') || argv.includes('-v'),
    };
}

/**
 * What to do before any command runs. Version wins over help, and a
 * missing command shows help.
 */
export function topLevelAction(args: CliArgs): 'version' | 'help' | 'run' {
    if (args.version) return 'version';
    if (args.help || !args.command) return 'help';
    return 'run';
}
