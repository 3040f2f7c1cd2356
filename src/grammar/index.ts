export { Grammar, createGrammar } from './grammar.js';
export {
    parseGrammarSource,
    parseGrammarText,
    loadGrammarDefinition,
    loadGrammarFile,
    formatGrammar,
} from './loader.js';
export type { LoadOptions } from './loader.js';
export { GrammarDefinitionSchema, parseGrammarDefinition } from './schema.js';
