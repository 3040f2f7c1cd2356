/**
 * FIRST / FOLLOW set solver
 *
 * Both tables are computed by full passes over every production until a
 * pass adds nothing. Mutually recursive non-terminals converge without
 * recursion.
 */

import { Grammar } from '../grammar/grammar.js';
import { EPSILON, END_MARKER } from '../types/grammar.js';

export type SymbolSets = Map<string, Set<string>>;

/**
 * FIRST of a symbol sequence. Symbols missing from `first` are treated as
 * terminals. The empty sequence yields {ε}.
 */
export function firstOfSequence(symbols: readonly string[], first: SymbolSets): Set<string> {
    const result = new Set<string>();
    for (const symbol of symbols) {
        const symbolFirst = first.get(symbol) ?? new Set([symbol]);
        for (const t of symbolFirst) {
            if (t !== EPSILON) result.add(t);
        }
        if (!symbolFirst.has(EPSILON)) {
            return result;
        }
    }
    result.add(EPSILON);
    return result;
}

function addAll(target: Set<string>, source: Iterable<string>, skip?: string): boolean {
    const before = target.size;
    for (const s of source) {
        if (s !== skip) target.add(s);
    }
    return target.size > before;
}

export function computeFirst(grammar: Grammar): SymbolSets {
    const first: SymbolSets = new Map();

    first.set(EPSILON, new Set([EPSILON]));
    first.set(END_MARKER, new Set([END_MARKER]));
    for (const terminal of grammar.getTerminals()) {
        first.set(terminal, new Set([terminal]));
    }
    for (const nonTerminal of grammar.getNonTerminals()) {
        first.set(nonTerminal, new Set());
    }

    const productions = grammar.getAllProductions();
    let changed = true;
    while (changed) {
        changed = false;
        for (const { lhs, rhs } of productions) {
            const target = first.get(lhs) ?? new Set<string>();
            first.set(lhs, target);
            if (addAll(target, firstOfSequence(rhs, first))) {
                changed = true;
            }
        }
    }

    return first;
}

/**
 * FOLLOW for every non-terminal.
 * @throws GrammarException CONFIGURATION_ERROR when no start symbol is set
 */
export function computeFollow(grammar: Grammar, first: SymbolSets): SymbolSets {
    const start = grammar.requireStartSymbol();
    const follow: SymbolSets = new Map();

    for (const nonTerminal of grammar.getNonTerminals()) {
        follow.set(nonTerminal, new Set());
    }
    follow.get(start)?.add(END_MARKER);

    const productions = grammar.getAllProductions();
    let changed = true;
    while (changed) {
        changed = false;
        for (const { lhs, rhs } of productions) {
            const lhsFollow = follow.get(lhs) ?? new Set<string>();
            for (let i = 0; i < rhs.length; i++) {
                const target = follow.get(rhs[i]);
                if (!target) continue; // terminal or ε

                const rest = firstOfSequence(rhs.slice(i + 1), first);
                if (addAll(target, rest, EPSILON)) {
                    changed = true;
                }
                if (rest.has(EPSILON) && addAll(target, lhsFollow)) {
                    changed = true;
                }
            }
        }
    }

    return follow;
}
