/**
 * Structured Error System for LLKit
 *
 * Provides machine-readable errors with codes, spans, and the symbols
 * involved in a failed match.
 */

/**
 * Error codes for grammar analysis and parsing
 */
export type GrammarErrorCode =
    | 'CONFIGURATION_ERROR'   // Missing start symbol, bad option values
    | 'GRAMMAR_ERROR'         // Malformed grammar definition or text
    | 'LEXICAL_ERROR'         // Input character matches no rule
    | 'SYNTAX_ERROR'          // Token does not fit the parse table
    | 'STRUCTURAL_ERROR'      // Stack symbol outside both vocabularies
    | 'TABLE_CONFLICT'        // Strict table construction found conflicts
    | 'STEP_LIMIT';           // Automaton exceeded its step budget

/**
 * Source location span for error reporting
 */
export interface ErrorSpan {
    start: number;
    end: number;
    line?: number;
    col?: number;
}

/**
 * Structured error with code, message, span and symbol context
 */
export interface GrammarError {
    code: GrammarErrorCode;
    message: string;
    span?: ErrorSpan;
    expected?: string[];
    found?: string;
    details?: Record<string, unknown>;
}

/**
 * Exception class wrapping GrammarError for throw/catch patterns
 */
export class GrammarException extends Error {
    public readonly error: GrammarError;

    constructor(error: GrammarError) {
        super(error.message);
        this.name = 'GrammarException';
        this.error = error;

        // Maintain proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, GrammarException);
        }
    }

    get code(): GrammarErrorCode {
        return this.error.code;
    }

    toJSON(): GrammarError {
        return this.error;
    }
}

/**
 * Build a one-character span with line/column for a position in the input
 */
export function spanAt(input: string, position: number, length: number = 1): ErrorSpan {
    return {
        start: position,
        end: position + length,
        line: getLineNumber(input, position),
        col: getColumnNumber(input, position),
    };
}

export function createConfigurationError(
    message: string,
    details?: Record<string, unknown>
): GrammarException {
    return new GrammarException({
        code: 'CONFIGURATION_ERROR',
        message,
        details,
    });
}

/**
 * Create a grammar definition error, optionally tied to a 1-based line
 */
export function createGrammarError(
    message: string,
    line?: number,
    details?: Record<string, unknown>
): GrammarException {
    return new GrammarException({
        code: 'GRAMMAR_ERROR',
        message: line !== undefined ? `Line ${line}: ${message}` : message,
        details: line !== undefined ? { ...details, line } : details,
    });
}

/**
 * Create a lexical error for the character at `position`
 */
export function createLexicalError(input: string, position: number): GrammarException {
    const codePoint = input.codePointAt(position);
    const char = codePoint === undefined ? '' : String.fromCodePoint(codePoint);
    const span = spanAt(input, position, Math.max(char.length, 1));
    return new GrammarException({
        code: 'LEXICAL_ERROR',
        message: `Unexpected character '${char}' at line ${span.line}, column ${span.col}`,
        span,
        found: char,
    });
}

/**
 * Create a syntax error. `position` is the offset of the offending token
 * in the source text when one is known.
 */
export function createSyntaxError(
    message: string,
    expected: string[],
    found: string,
    position?: number,
    details?: Record<string, unknown>
): GrammarException {
    return new GrammarException({
        code: 'SYNTAX_ERROR',
        message,
        span: position !== undefined ? { start: position, end: position + 1 } : undefined,
        expected,
        found,
        details,
    });
}

export function createStructuralError(
    symbol: string,
    details?: Record<string, unknown>
): GrammarException {
    return new GrammarException({
        code: 'STRUCTURAL_ERROR',
        message: `Unknown symbol '${symbol}' on the parse stack: it is neither a terminal nor a non-terminal`,
        found: symbol,
        details,
    });
}

/**
 * Create the single error raised by strict table construction
 */
export function createTableConflictError(
    conflicts: Array<{ nonTerminal: string; terminal: string; productions: string[] }>
): GrammarException {
    const cells = conflicts.map(c => `(${c.nonTerminal}, ${c.terminal})`).join(', ');
    return new GrammarException({
        code: 'TABLE_CONFLICT',
        message: `Grammar is not LL(1): ${conflicts.length} conflicting cell(s) ${cells}`,
        details: { conflicts },
    });
}

export function createStepLimitError(limit: number): GrammarException {
    return new GrammarException({
        code: 'STEP_LIMIT',
        message: `Parse exceeded the limit of ${limit} steps`,
        details: { limit },
    });
}

/**
 * Get line number from position in string
 */
function getLineNumber(input: string, position: number): number {
    const lines = input.substring(0, position).split('\n');
    return lines.length;
}

/**
 * Get column number from position in string
 */
function getColumnNumber(input: string, position: number): number {
    const lastNewline = input.lastIndexOf('\n', position - 1);
    return position - lastNewline;
}

/**
 * Serialize a GrammarError for JSON output
 */
export function serializeGrammarError(error: GrammarError): object {
    return {
        code: error.code,
        message: error.message,
        ...(error.span && { span: error.span }),
        ...(error.expected && { expected: error.expected }),
        ...(error.found !== undefined && { found: error.found }),
        ...(error.details && { details: error.details }),
    };
}

/**
 * Narrow an unknown thrown value to a GrammarException
 */
export function isGrammarException(e: unknown): e is GrammarException {
    return e instanceof GrammarException;
}
