/**
 * Shared grammars for the test suites.
 */
import * as path from 'path';
import type { GrammarDefinition } from '../src/types/index.js';

export const DATA_DIR = path.join(__dirname, 'data');
export const ARITH_GRAMMAR_PATH = path.join(DATA_DIR, 'arith.grammar');
export const EXPR_JSON_PATH = path.join(DATA_DIR, 'expr.json');
export const CONFLICT_GRAMMAR_PATH = path.join(DATA_DIR, 'conflict.grammar');

// E -> T E' ; E' -> + T E' | eps ; T -> id
export const EXPR: GrammarDefinition = {
    start: 'E',
    productions: [
        { lhs: 'E', rhs: ['T', "E'"] },
        { lhs: "E'", rhs: ['+', 'T', "E'"] },
        { lhs: "E'", rhs: ['eps'] },
        { lhs: 'T', rhs: ['id'] },
    ],
};

// Classic expression grammar with two nullable tails
export const ARITH: GrammarDefinition = {
    start: 'E',
    productions: {
        E: [['T', "E'"]],
        "E'": [['+', 'T', "E'"], ['eps']],
        T: [['F', "T'"]],
        "T'": [['*', 'F', "T'"], ['eps']],
        F: [['(', 'E', ')'], ['id']],
    },
    patterns: [
        ['id', '[a-z]+'],
        ['+', '\\+'],
        ['*', '\\*'],
        ['(', '\\('],
        [')', '\\)'],
    ],
};

// Two alternatives of A both start with x
export const CONFLICT: GrammarDefinition = {
    start: 'S',
    productions: {
        S: [['A']],
        A: [['x'], ['x', 'y']],
    },
};

// Mutual left recursion, no empty alternatives
export const MUTUAL: GrammarDefinition = {
    start: 'S',
    productions: {
        S: [['A', 'b'], ['c']],
        A: [['S', 'd'], ['e']],
    },
};
