/**
 * Grammar Model
 *
 * Holds the vocabularies, ordered productions and lexical patterns of a
 * context-free grammar. Symbols are classified once, when the grammar is
 * built; the instance is read-only afterwards.
 */

import {
    EPSILON,
    END_MARKER,
    GrammarDefinition,
    Production,
    SymbolKind,
} from '../types/grammar.js';
import { createConfigurationError, createGrammarError } from '../types/errors.js';
import { DEFAULTS } from '../types/options.js';

export class Grammar {
    readonly startSymbol: string | undefined;
    private readonly nonTerminals: ReadonlySet<string>;
    private readonly terminals: ReadonlySet<string>;
    private readonly productions: ReadonlyMap<string, Production[]>;
    private readonly patterns: ReadonlyMap<string, string>;

    constructor(
        startSymbol: string | undefined,
        nonTerminals: Set<string>,
        terminals: Set<string>,
        productions: Map<string, Production[]>,
        patterns: Map<string, string>
    ) {
        this.startSymbol = startSymbol;
        this.nonTerminals = nonTerminals;
        this.terminals = terminals;
        this.productions = productions;
        this.patterns = patterns;
    }

    classify(symbol: string): SymbolKind | undefined {
        if (symbol === EPSILON) return 'epsilon';
        if (symbol === END_MARKER) return 'end';
        if (this.nonTerminals.has(symbol)) return 'nonterminal';
        if (this.terminals.has(symbol)) return 'terminal';
        return undefined;
    }

    isTerminal(symbol: string): boolean {
        return this.terminals.has(symbol);
    }

    isNonTerminal(symbol: string): boolean {
        return this.nonTerminals.has(symbol);
    }

    getNonTerminals(): string[] {
        return [...this.nonTerminals];
    }

    getTerminals(): string[] {
        return [...this.terminals];
    }

    /** Alternatives of `nonTerminal`, in declaration order */
    getProductions(nonTerminal: string): Production[] {
        return [...(this.productions.get(nonTerminal) ?? [])];
    }

    /** All productions in declaration order */
    getAllProductions(): Production[] {
        const all: Production[] = [];
        for (const list of this.productions.values()) {
            all.push(...list);
        }
        return all.sort((a, b) => a.index - b.index);
    }

    /** Terminal → pattern bindings in declaration order */
    getPatterns(): ReadonlyMap<string, string> {
        return this.patterns;
    }

    requireStartSymbol(): string {
        if (this.startSymbol === undefined) {
            throw createConfigurationError('Grammar has no start symbol');
        }
        return this.startSymbol;
    }
}

function isEpsilon(symbol: string, aliases: readonly string[]): boolean {
    return symbol === EPSILON || aliases.includes(symbol);
}

function entriesOf<T>(value: Array<[string, T]> | Record<string, T> | undefined): Array<[string, T]> {
    if (value === undefined) return [];
    return Array.isArray(value) ? value : Object.entries(value);
}

function productionList(def: GrammarDefinition): Array<{ lhs: string; rhs: string[] }> {
    if (Array.isArray(def.productions)) {
        return def.productions;
    }
    const list: Array<{ lhs: string; rhs: string[] }> = [];
    for (const [lhs, alternatives] of Object.entries(def.productions)) {
        for (const rhs of alternatives) {
            list.push({ lhs, rhs });
        }
    }
    return list;
}

/**
 * Build a Grammar from a plain definition.
 *
 * Undeclared right-hand-side symbols become terminals; an undeclared LHS
 * becomes a non-terminal. `epsilonAliases` are rewritten to ε.
 */
export function createGrammar(
    def: GrammarDefinition,
    epsilonAliases: readonly string[] = DEFAULTS.epsilonAliases
): Grammar {
    const nonTerminals = new Set(def.nonTerminals ?? []);
    const terminals = new Set(def.terminals ?? []);

    for (const symbol of [...nonTerminals, ...terminals]) {
        if (symbol === END_MARKER || isEpsilon(symbol, epsilonAliases)) {
            throw createGrammarError(`Reserved symbol '${symbol}' cannot be declared in a vocabulary`);
        }
    }
    for (const symbol of nonTerminals) {
        if (terminals.has(symbol)) {
            throw createGrammarError(`Symbol '${symbol}' is declared both terminal and non-terminal`);
        }
    }

    const productions = new Map<string, Production[]>();
    let index = 0;
    for (const { lhs, rhs } of productionList(def)) {
        if (terminals.has(lhs)) {
            throw createGrammarError(`Terminal '${lhs}' cannot appear on the left of a production`);
        }
        if (lhs === END_MARKER || isEpsilon(lhs, epsilonAliases)) {
            throw createGrammarError(`Reserved symbol '${lhs}' cannot appear on the left of a production`);
        }
        nonTerminals.add(lhs);

        const normalized = rhs.map(s => (isEpsilon(s, epsilonAliases) ? EPSILON : s));
        if (normalized.length === 0) {
            normalized.push(EPSILON);
        } else if (normalized.length > 1 && normalized.includes(EPSILON)) {
            throw createGrammarError(`Empty alternative '${EPSILON}' must stand alone in '${lhs} -> ${rhs.join(' ')}'`);
        }
        if (normalized.includes(END_MARKER)) {
            throw createGrammarError(`End marker '${END_MARKER}' cannot appear in a production of '${lhs}'`);
        }

        const list = productions.get(lhs) ?? [];
        list.push({ lhs, rhs: normalized, index: index++ });
        productions.set(lhs, list);
    }

    // Second pass: the LHS set is final only after every production is read
    for (const production of productions.values()) {
        for (const { rhs } of production) {
            for (const symbol of rhs) {
                if (symbol !== EPSILON && !nonTerminals.has(symbol)) {
                    terminals.add(symbol);
                }
            }
        }
    }

    const patterns = new Map<string, string>();
    for (const [terminal, pattern] of entriesOf(def.patterns)) {
        if (nonTerminals.has(terminal)) {
            throw createGrammarError(`Pattern bound to non-terminal '${terminal}'`);
        }
        terminals.add(terminal);
        patterns.set(terminal, pattern);
    }

    if (def.start !== undefined && !nonTerminals.has(def.start)) {
        throw createGrammarError(`Start symbol '${def.start}' is not a non-terminal`);
    }

    return new Grammar(def.start, nonTerminals, terminals, productions, patterns);
}
