import type { ParseStep } from './parser.js';
import type { TableConflict } from '../analysis/table.js';

export interface AnalysisOptions {
    /** Reject non-LL(1) grammars with a single TABLE_CONFLICT error */
    strict?: boolean;
    /** Called once per cell that more than one production was assigned to */
    onConflict?: (conflict: TableConflict) => void;
}

export interface LexerOptions {
    /** Match terminals without a pattern by their literal name */
    literalTerminals?: boolean;
}

export interface ParseOptions {
    maxSteps?: number;
    includeTrace?: boolean;
    /**
     * Callback for every automaton transition.
     * @param step The transition about to be applied.
     */
    onStep?: (step: ParseStep) => void;
}

export interface ParserOptions extends AnalysisOptions, LexerOptions, ParseOptions {}

export const DEFAULTS = {
    maxSteps: 100000,
    epsilonAliases: ['ε', 'eps', 'epsilon'],
} as const;
