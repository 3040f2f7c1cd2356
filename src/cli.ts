#!/usr/bin/env node
import chalk from 'chalk';
import { loadGrammarFile, formatGrammar } from './grammar/loader.js';
import { createParser } from './llParser.js';
import { formatSets, formatTable, formatTokens, formatTrace, formatTree } from './utils/formatting.js';
import { DEFAULTS, isGrammarException, serializeGrammarError } from './types/index.js';
import type { ParserOptions } from './types/index.js';
import type { TableConflict } from './analysis/table.js';
import { formatProduction } from './analysis/table.js';

const VERSION = '0.3.0';
const HELP = `
LLKit CLI v${VERSION}

Usage:
  llkit grammar <grammar-file>          Print the grammar
  llkit sets <grammar-file>             Print FIRST and FOLLOW sets
  llkit table <grammar-file>            Print the LL(1) parse table
  llkit tokens <grammar-file> <text>    Tokenize text with the grammar's patterns
  llkit parse <grammar-file> <text>     Parse text and print the tree

Options:
  --strict            Fail when the grammar has table conflicts
  --symbols           Treat <text> as space-separated terminal names
  --literal           Match terminals without a pattern by their name
  --trace             Print every automaton step
  --json              Print results as JSON
  --max-steps=<n>     Automaton step budget (default ${DEFAULTS.maxSteps})
  --help, -h          Show this help
  --version, -v       Show version

Grammar files ending in .json hold a JSON definition; any other file uses
the text format ('E -> T E\\'', '%token id [a-z]+', ...).
`;

interface CliArgs {
    command?: string;
    file?: string;
    input?: string;
    flags: Set<string>;
    maxSteps?: number;
}

function parseArgs(args: string[]): CliArgs {
    const flags = new Set<string>();
    const positional: string[] = [];
    let maxSteps: number | undefined;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg.startsWith('--max-steps=')) {
            maxSteps = Number(arg.split('=')[1]);
        } else if (arg === '--max-steps') {
            if (i + 1 < args.length) {
                maxSteps = Number(args[i + 1]);
                i++;
            }
        } else if (arg.startsWith('-') && arg.length > 1) {
            flags.add(arg);
        } else {
            positional.push(arg);
        }
    }

    return { command: positional[0], file: positional[1], input: positional[2], flags, maxSteps };
}

function printConflict(conflict: TableConflict): void {
    const kept = conflict.productions[conflict.productions.length - 1];
    console.warn(chalk.yellow(
        `warning: conflict at [${conflict.nonTerminal}, ${conflict.terminal}]: ` +
        `${conflict.productions.map(formatProduction).join(' / ')}; keeping ${formatProduction(kept)}`
    ));
}

/**
 * Run one CLI command and return the process exit code
 */
export function runCli(args: string[]): number {
    const { command, file, input, flags, maxSteps } = parseArgs(args);

    if (flags.has('--version') || flags.has('-v')) {
        console.log(VERSION);
        return 0;
    }
    if (flags.has('--help') || flags.has('-h') || !command) {
        console.log(HELP);
        return 0;
    }
    if (!file) {
        console.error('Error: grammar file argument required');
        return 1;
    }
    if (maxSteps !== undefined && (!Number.isInteger(maxSteps) || maxSteps <= 0)) {
        console.error('Error: --max-steps must be a positive integer');
        return 1;
    }

    const json = flags.has('--json');
    const options: ParserOptions = {
        strict: flags.has('--strict'),
        literalTerminals: flags.has('--literal'),
        includeTrace: flags.has('--trace'),
        maxSteps,
        onConflict: flags.has('--strict') || json ? undefined : printConflict,
    };

    try {
        const grammar = loadGrammarFile(file);

        if (command === 'grammar') {
            console.log(formatGrammar(grammar));
            return 0;
        }

        const parser = createParser(grammar, options);
        const { first, follow, table } = parser.analysis;

        switch (command) {
            case 'sets': {
                const nonTerminals = grammar.getNonTerminals();
                if (json) {
                    const toRecord = (sets: typeof first) => Object.fromEntries(
                        nonTerminals.map(nt => [nt, [...(sets.get(nt) ?? [])].sort()])
                    );
                    console.log(JSON.stringify({ first: toRecord(first), follow: toRecord(follow) }, null, 2));
                } else {
                    console.log(formatSets('FIRST', first, nonTerminals));
                    console.log(formatSets('FOLLOW', follow, nonTerminals));
                }
                return 0;
            }
            case 'table': {
                console.log(json ? JSON.stringify(table.toRecord(), null, 2) : formatTable(table));
                return 0;
            }
            case 'tokens':
            case 'parse': {
                if (input === undefined) {
                    console.error('Error: input text argument required');
                    return 1;
                }
                if (command === 'tokens') {
                    const lexed = parser.tokenize(input);
                    if (!lexed.success) {
                        console.error(chalk.red(`✗ ${lexed.error.message}`));
                        return 1;
                    }
                    console.log(json ? JSON.stringify(lexed.tokens, null, 2) : formatTokens(lexed.tokens));
                    return 0;
                }

                const result = flags.has('--symbols')
                    ? parser.parseSymbols(input.split(/\s+/).filter(s => s.length > 0))
                    : parser.parse(input);
                if (result.trace && !json) {
                    console.log(formatTrace(result.trace));
                }
                if (!result.success) {
                    if (json) {
                        console.log(JSON.stringify({ success: false, error: serializeGrammarError(result.error) }, null, 2));
                    } else {
                        console.error(chalk.red(`✗ ${result.error.message}`));
                    }
                    return 1;
                }
                if (json) {
                    console.log(JSON.stringify({ success: true, tree: result.tree }, null, 2));
                } else {
                    console.log(chalk.green(`✓ Parsed in ${result.steps} steps`));
                    console.log(formatTree(result.tree));
                }
                return 0;
            }
            default:
                console.error(`Error: unknown command '${command}'`);
                console.log(HELP);
                return 1;
        }
    } catch (e) {
        if (isGrammarException(e)) {
            console.error(chalk.red(`✗ ${e.message}`));
            return 1;
        }
        throw e;
    }
}

if (require.main === module) {
    process.exit(runCli(process.argv.slice(2)));
}
