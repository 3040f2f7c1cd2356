/**
 * LL(1) parse table construction
 *
 * Cells are filled production by production in declaration order. A later
 * production assigned to an occupied cell replaces the earlier one; strict
 * mode turns every such overwrite into a single TABLE_CONFLICT error.
 */

import { Grammar } from '../grammar/grammar.js';
import { EPSILON, Production } from '../types/grammar.js';
import type { AnalysisOptions } from '../types/options.js';
import { createTableConflictError } from '../types/errors.js';
import { SymbolSets, firstOfSequence } from './sets.js';

/**
 * Two or more productions competing for one cell. `productions` lists them
 * in assignment order; the last one is the one the table keeps.
 */
export interface TableConflict {
    nonTerminal: string;
    terminal: string;
    productions: Production[];
}

export function formatProduction(production: Production): string {
    return `${production.lhs} -> ${production.rhs.join(' ')}`;
}

export class ParseTable {
    private readonly cells = new Map<string, Map<string, Production>>();
    readonly terminals: ReadonlySet<string>;
    readonly nonTerminals: ReadonlySet<string>;

    constructor(terminals: Iterable<string>, nonTerminals: Iterable<string>) {
        this.terminals = new Set(terminals);
        this.nonTerminals = new Set(nonTerminals);
    }

    /**
     * Assign a cell, returning the production it replaced, if any
     */
    set(nonTerminal: string, terminal: string, production: Production): Production | undefined {
        let row = this.cells.get(nonTerminal);
        if (!row) {
            row = new Map();
            this.cells.set(nonTerminal, row);
        }
        const previous = row.get(terminal);
        row.set(terminal, production);
        return previous;
    }

    get(nonTerminal: string, terminal: string): Production | undefined {
        return this.cells.get(nonTerminal)?.get(terminal);
    }

    has(nonTerminal: string, terminal: string): boolean {
        return this.get(nonTerminal, terminal) !== undefined;
    }

    /** Terminals with an entry in the row of `nonTerminal` */
    expectedFor(nonTerminal: string): string[] {
        return [...(this.cells.get(nonTerminal)?.keys() ?? [])];
    }

    *entries(): Generator<[string, string, Production]> {
        for (const [nonTerminal, row] of this.cells) {
            for (const [terminal, production] of row) {
                yield [nonTerminal, terminal, production];
            }
        }
    }

    get size(): number {
        let count = 0;
        for (const row of this.cells.values()) count += row.size;
        return count;
    }

    /** Non-terminal → terminal → right-hand side, for display and JSON */
    toRecord(): Record<string, Record<string, string[]>> {
        // Own data keys only: a `__proto__` symbol must not reach Object.prototype
        return Object.fromEntries([...this.cells].map(([nonTerminal, row]) => [
            nonTerminal,
            Object.fromEntries([...row].map(([terminal, production]) => [terminal, [...production.rhs]])),
        ]));
    }
}

function fillTable(
    grammar: Grammar,
    first: SymbolSets,
    follow: SymbolSets
): { table: ParseTable; conflicts: TableConflict[] } {
    const table = new ParseTable(grammar.getTerminals(), grammar.getNonTerminals());
    const conflicts = new Map<string, TableConflict>();

    const assign = (production: Production, terminal: string) => {
        const previous = table.set(production.lhs, terminal, production);
        if (!previous || previous === production) return;

        const key = `${production.lhs}\u0000${terminal}`;
        const existing = conflicts.get(key);
        if (existing) {
            existing.productions.push(production);
        } else {
            conflicts.set(key, {
                nonTerminal: production.lhs,
                terminal,
                productions: [previous, production],
            });
        }
    };

    for (const production of grammar.getAllProductions()) {
        const f = firstOfSequence(production.rhs, first);
        for (const terminal of f) {
            if (terminal !== EPSILON) assign(production, terminal);
        }
        if (f.has(EPSILON)) {
            for (const terminal of follow.get(production.lhs) ?? []) {
                assign(production, terminal);
            }
        }
    }

    return { table, conflicts: [...conflicts.values()] };
}

/**
 * Build the predictive parse table.
 * @throws GrammarException TABLE_CONFLICT in strict mode
 */
export function buildParseTable(
    grammar: Grammar,
    first: SymbolSets,
    follow: SymbolSets,
    options: AnalysisOptions = {}
): ParseTable {
    const { table, conflicts } = fillTable(grammar, first, follow);

    if (options.onConflict) {
        for (const conflict of conflicts) options.onConflict(conflict);
    }
    if (options.strict && conflicts.length > 0) {
        throw createTableConflictError(conflicts.map(c => ({
            nonTerminal: c.nonTerminal,
            terminal: c.terminal,
            productions: c.productions.map(formatProduction),
        })));
    }
    return table;
}

/**
 * Validation pass: every cell more than one production competes for
 */
export function findConflicts(grammar: Grammar, first: SymbolSets, follow: SymbolSets): TableConflict[] {
    return fillTable(grammar, first, follow).conflicts;
}
