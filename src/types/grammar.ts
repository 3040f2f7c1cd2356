/**
 * Grammar Types
 */

/** Reserved empty-alternative marker */
export const EPSILON = 'ε';

/** Reserved end-of-input marker */
export const END_MARKER = '$';

export type SymbolKind =
    | 'terminal'
    | 'nonterminal'
    | 'epsilon'      // ε
    | 'end';         // $

/**
 * One alternative of a non-terminal. `index` is the declaration order
 * across the whole grammar.
 */
export interface Production {
    lhs: string;
    rhs: string[];
    index: number;
}

/**
 * Plain-data description of a grammar, as produced by a loader.
 * Productions and patterns keep their declaration order.
 */
export interface GrammarDefinition {
    start?: string;
    nonTerminals?: string[];
    terminals?: string[];
    productions: Array<{ lhs: string; rhs: string[] }> | Record<string, string[][]>;
    patterns?: Array<[string, string]> | Record<string, string>;
}
