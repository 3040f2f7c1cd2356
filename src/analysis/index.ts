export { computeFirst, computeFollow, firstOfSequence } from './sets.js';
export type { SymbolSets } from './sets.js';
export { ParseTable, buildParseTable, findConflicts, formatProduction } from './table.js';
export type { TableConflict } from './table.js';
