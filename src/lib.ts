/**
 * LLKit - Library Entry Point
 *
 * Exports the grammar model, analysis, tokenizer, automaton and tree
 * operations. Nothing here touches the console or the process.
 */

// Pipeline
export { createParser, analyzeGrammar, LLParser } from './llParser.js';
export type { GrammarAnalysis } from './llParser.js';

// Grammar model and loading
export * from './grammar/index.js';

// FIRST / FOLLOW / table
export * from './analysis/index.js';

// Tokenizer, automaton, tree
export * from './parser/index.js';

// Display helpers
export { formatTree, formatSets, formatTable, formatTokens, formatTrace } from './utils/formatting.js';

// Types and Interfaces
export * from './types/index.js';
