export { Lexer, compileLexer, tokenize, tokensFromSymbols } from './tokenizer.js';
export type { LexicalRules } from './tokenizer.js';
export { Automaton, parse } from './automaton.js';
export {
    createNode,
    rename,
    traverse,
    toEdges,
    findNodes,
    leaves,
    frontier,
    countNodes,
} from './tree.js';
export type { TraversalEntry, TreeEdge } from './tree.js';
