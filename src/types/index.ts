/**
 * Shared type definitions for LLKit
 */

// Re-export error types
export {
    GrammarException,
    spanAt,
    createConfigurationError,
    createGrammarError,
    createLexicalError,
    createSyntaxError,
    createStructuralError,
    createTableConflictError,
    createStepLimitError,
    serializeGrammarError,
    isGrammarException,
} from './errors.js';

export type {
    GrammarErrorCode,
    ErrorSpan,
    GrammarError,
} from './errors.js';

// Re-export grammar types
export { EPSILON, END_MARKER } from './grammar.js';

export type {
    SymbolKind,
    Production,
    GrammarDefinition,
} from './grammar.js';

// Re-export parser types
export type {
    Token,
    ParseTreeNode,
    ParseAction,
    ParseStep,
    LexResult,
    ParseResult,
} from './parser.js';

// Re-export options
export {
    DEFAULTS
} from './options.js';

export type {
    AnalysisOptions,
    LexerOptions,
    ParseOptions,
    ParserOptions,
} from './options.js';
