/**
 * Grammar loading
 *
 * Text format, one declaration per line, in any order:
 *
 *   # comment
 *   %start E
 *   %nonterminals E E' T
 *   %terminals id +
 *   %token id [a-z]+
 *   E  -> T E'
 *   E' -> + T E' | eps
 *
 * Lines sharing a left-hand side append their alternatives in order. An
 * empty alternative (`A -> a |`) derives the empty string, like `eps`.
 * Without %start the first left-hand side is the start symbol. The pattern
 * of a %token line is the rest of the line after the terminal name.
 */

import { readFileSync } from 'fs';
import { extname } from 'path';
import { Grammar, createGrammar } from './grammar.js';
import { parseGrammarDefinition } from './schema.js';
import type { GrammarDefinition } from '../types/grammar.js';
import { createGrammarError } from '../types/errors.js';

export interface LoadOptions {
    /** Use the first left-hand side when no start symbol is declared (default: true) */
    inferStart?: boolean;
}

function splitSymbols(text: string): string[] {
    return text.trim().split(/\s+/).filter(s => s.length > 0);
}

/**
 * Parse grammar text into a definition without building the Grammar
 */
export function parseGrammarSource(text: string, options: LoadOptions = {}): GrammarDefinition {
    const def: GrammarDefinition = { productions: [] };
    const productions: Array<{ lhs: string; rhs: string[] }> = [];
    const patterns: Array<[string, string]> = [];

    const lines = text.split(/\r?\n/);
    for (let i = 0; i < lines.length; i++) {
        const lineNo = i + 1;
        const line = lines[i].trim();
        if (!line || line.startsWith('#')) continue;

        if (line.startsWith('%')) {
            const match = /^%(\w+)\s*(.*)$/.exec(line);
            const directive = match?.[1] ?? '';
            const rest = match?.[2] ?? '';
            switch (directive) {
                case 'start': {
                    const symbols = splitSymbols(rest);
                    if (symbols.length !== 1) {
                        throw createGrammarError('%start takes exactly one symbol', lineNo);
                    }
                    def.start = symbols[0];
                    break;
                }
                case 'nonterminals':
                    def.nonTerminals = [...(def.nonTerminals ?? []), ...splitSymbols(rest)];
                    break;
                case 'terminals':
                    def.terminals = [...(def.terminals ?? []), ...splitSymbols(rest)];
                    break;
                case 'token': {
                    const tokenMatch = /^(\S+)\s+(.+)$/.exec(rest);
                    if (!tokenMatch) {
                        throw createGrammarError('%token needs a terminal name and a pattern', lineNo);
                    }
                    patterns.push([tokenMatch[1], tokenMatch[2].trim()]);
                    break;
                }
                default:
                    throw createGrammarError(`Unknown directive '%${directive}'`, lineNo);
            }
            continue;
        }

        const arrow = line.indexOf('->');
        if (arrow < 0) {
            throw createGrammarError(`Expected 'LHS -> alternatives' but got '${line}'`, lineNo);
        }
        const lhsSymbols = splitSymbols(line.slice(0, arrow));
        if (lhsSymbols.length !== 1) {
            throw createGrammarError('A production needs exactly one left-hand symbol', lineNo);
        }
        const lhs = lhsSymbols[0];
        for (const alternative of line.slice(arrow + 2).split('|')) {
            productions.push({ lhs, rhs: splitSymbols(alternative) });
        }
    }

    if (productions.length === 0) {
        throw createGrammarError('Grammar has no productions');
    }
    def.productions = productions;
    if (patterns.length > 0) def.patterns = patterns;
    if (def.start === undefined && (options.inferStart ?? true)) {
        def.start = productions[0].lhs;
    }
    return def;
}

export function parseGrammarText(text: string, options?: LoadOptions): Grammar {
    return createGrammar(parseGrammarSource(text, options));
}

/**
 * Validate a JSON grammar definition and build the Grammar
 */
export function loadGrammarDefinition(input: unknown): Grammar {
    return createGrammar(parseGrammarDefinition(input));
}

/**
 * Load a grammar file: `.json` files hold a definition, anything else the
 * text format.
 */
export function loadGrammarFile(path: string, options?: LoadOptions): Grammar {
    const content = readFileSync(path, 'utf-8');
    if (extname(path).toLowerCase() === '.json') {
        let data: unknown;
        try {
            data = JSON.parse(content);
        } catch (e) {
            throw createGrammarError(`Invalid JSON in ${path}: ${e instanceof Error ? e.message : String(e)}`);
        }
        return loadGrammarDefinition(data);
    }
    return parseGrammarText(content, options);
}

/**
 * One line per non-terminal, `lhs -> a b | c`, in declaration order
 */
export function formatGrammar(grammar: Grammar): string {
    const lines: string[] = [];
    const seen = new Set<string>();
    for (const { lhs } of grammar.getAllProductions()) {
        if (seen.has(lhs)) continue;
        seen.add(lhs);
        const alternatives = grammar.getProductions(lhs).map(p => p.rhs.join(' '));
        lines.push(`${lhs} -> ${alternatives.join(' | ')}`);
    }
    return lines.join('\n');
}
