/**
 * Parser Types
 */

import type { GrammarError } from './errors.js';

/**
 * A lexical token: the terminal kind it matched and the literal text
 */
export interface Token {
    kind: string;
    text: string;
    position: number;
}

/**
 * Parse tree node. Terminals carry the matched text in `value`.
 */
export interface ParseTreeNode {
    symbol: string;
    value?: string;
    children: ParseTreeNode[];
}

export type ParseAction = 'expand' | 'match' | 'accept' | 'error';

/**
 * One automaton transition, recorded when tracing is enabled
 */
export interface ParseStep {
    step: number;
    stack: string[];        // bottom first
    lookahead: string;
    action: ParseAction;
    production?: string;    // "A -> x y" for expansions
}

export type LexResult =
    | { success: true; tokens: Token[] }
    | { success: false; error: GrammarError };

export type ParseResult =
    | { success: true; tree: ParseTreeNode; steps: number; trace?: ParseStep[] }
    | { success: false; error: GrammarError; steps: number; trace?: ParseStep[]; stackDepth?: number };
