/**
 * LL(1) Parser: grammar analysis, tokenizer and automaton behind one object
 *
 * Runs FIRST → FOLLOW → table once at construction; the resulting tables
 * are read-only and may be shared by any number of parse runs.
 */

import { Grammar, createGrammar } from './grammar/grammar.js';
import { computeFirst, computeFollow, SymbolSets } from './analysis/sets.js';
import { ParseTable, TableConflict, buildParseTable } from './analysis/table.js';
import { Lexer, tokensFromSymbols } from './parser/tokenizer.js';
import { Automaton } from './parser/automaton.js';
import type { GrammarDefinition } from './types/grammar.js';
import type { LexResult, ParseResult, ParseTreeNode, Token } from './types/parser.js';
import { AnalysisOptions, DEFAULTS, ParseOptions, ParserOptions } from './types/options.js';
import { GrammarException } from './types/errors.js';

export interface GrammarAnalysis {
    first: SymbolSets;
    follow: SymbolSets;
    table: ParseTable;
    conflicts: TableConflict[];
}

/**
 * Compute FIRST, FOLLOW and the parse table for a grammar
 */
export function analyzeGrammar(grammar: Grammar, options: AnalysisOptions = {}): GrammarAnalysis {
    const first = computeFirst(grammar);
    const follow = computeFollow(grammar, first);
    const conflicts: TableConflict[] = [];
    const table = buildParseTable(grammar, first, follow, {
        ...options,
        onConflict: conflict => {
            conflicts.push(conflict);
            options.onConflict?.(conflict);
        },
    });
    return { first, follow, table, conflicts };
}

export class LLParser {
    readonly grammar: Grammar;
    readonly analysis: GrammarAnalysis;
    readonly lexer: Lexer;
    private readonly automaton: Automaton;
    private readonly parseOptions: ParseOptions;

    constructor(grammar: Grammar, options: ParserOptions = {}) {
        this.grammar = grammar;
        this.analysis = analyzeGrammar(grammar, options);
        this.lexer = new Lexer(grammar, { literalTerminals: options.literalTerminals });
        this.automaton = new Automaton(this.analysis.table, grammar.requireStartSymbol());
        this.parseOptions = {
            maxSteps: options.maxSteps ?? DEFAULTS.maxSteps,
            includeTrace: options.includeTrace,
            onStep: options.onStep,
        };
    }

    get table(): ParseTable {
        return this.analysis.table;
    }

    tokenize(input: string): LexResult {
        return this.lexer.tokenize(input);
    }

    parseTokens(tokens: readonly Token[], options?: ParseOptions): ParseResult {
        return this.automaton.parse(tokens, { ...this.parseOptions, ...options });
    }

    /**
     * Tokenize and parse. A lexical failure is returned as-is, with no
     * parse attempted.
     */
    parse(input: string, options?: ParseOptions): ParseResult {
        const lexed = this.tokenize(input);
        if (!lexed.success) {
            return { success: false, error: lexed.error, steps: 0 };
        }
        return this.parseTokens(lexed.tokens, options);
    }

    /** Parse a pre-tokenized list of terminal kinds */
    parseSymbols(kinds: readonly string[], options?: ParseOptions): ParseResult {
        return this.parseTokens(tokensFromSymbols(kinds), options);
    }

    parseOrThrow(input: string, options?: ParseOptions): ParseTreeNode {
        const result = this.parse(input, options);
        if (!result.success) {
            throw new GrammarException(result.error);
        }
        return result.tree;
    }
}

/**
 * Create a parser from a Grammar or a plain definition
 */
export function createParser(grammar: Grammar | GrammarDefinition, options?: ParserOptions): LLParser {
    const built = grammar instanceof Grammar ? grammar : createGrammar(grammar);
    return new LLParser(built, options);
}
