/**
 * End-to-end pipeline through createParser
 */

import { createParser, analyzeGrammar, LLParser, parseGrammarText, frontier, formatTree } from '../src/lib.js';
import { createGrammar } from '../src/grammar/index.js';
import { GrammarException } from '../src/types/errors.js';
import type { TableConflict } from '../src/analysis/index.js';
import { ARITH, CONFLICT, EXPR } from './fixtures.js';

describe('createParser', () => {
    const parser = createParser(ARITH);

    test('accepts a Grammar or a definition', () => {
        expect(parser).toBeInstanceOf(LLParser);
        expect(createParser(createGrammar(ARITH)).table.toRecord()).toEqual(parser.table.toRecord());
    });

    test('tokenizes and parses text', () => {
        const result = parser.parse('a + b * c');
        expect(result.success).toBe(true);
        if (!result.success) return;

        expect(frontier(result.tree)).toEqual(['a', '+', 'b', '*', 'c']);
        expect(formatTree(result.tree)).toBe([
            'E',
            '  T',
            '    F',
            "      id 'a'",
            "    T'",
            "  E'",
            "    + '+'",
            '    T',
            '      F',
            "        id 'b'",
            "      T'",
            "        * '*'",
            '        F',
            "          id 'c'",
            "        T'",
            "    E'",
        ].join('\n'));
    });

    test('a lexical error short-circuits parsing', () => {
        const result = parser.parse('a # b');
        expect(result.success).toBe(false);
        if (result.success) return;

        expect(result.error.code).toBe('LEXICAL_ERROR');
        expect(result.error.found).toBe('#');
        expect(result.steps).toBe(0);
    });

    test('reports unbalanced parentheses with the expected terminal', () => {
        const result = parser.parse('(a + b');
        expect(result.success).toBe(false);
        if (result.success) return;

        expect(result.error.code).toBe('SYNTAX_ERROR');
        expect(result.error.expected).toEqual([')']);
        expect(result.error.found).toBe('$');
        expect(result.error.span).toEqual({ start: 6, end: 7 });
    });

    test('re-parsing the frontier of a tree gives the same tree', () => {
        for (const input of ['a', 'a * (b + c)', '((x)) + y * z + w']) {
            const first = parser.parseOrThrow(input);
            const second = parser.parseOrThrow(frontier(first).join(' '));
            expect(second).toEqual(first);
        }
    });

    test('parses pre-tokenized symbols', () => {
        const result = createParser(EXPR).parseSymbols(['id', '+', 'id']);
        expect(result.success).toBe(true);
    });

    test('pre-tokenized symbols after an end marker are not dropped', () => {
        const result = createParser(EXPR).parseSymbols(['id', '$', 'id', '+']);
        expect(result.success).toBe(false);
    });

    test('parse runs share one table without interfering', () => {
        const a = parser.parse('a');
        const b = parser.parse('b * c');
        const c = parser.parse('a');
        expect(a.success && c.success && b.success).toBe(true);
        if (a.success && c.success) {
            expect(c.tree).toEqual(a.tree);
            expect(c.tree).not.toBe(a.tree);
        }
    });

    test('per-call options override constructor options', () => {
        const traced = createParser(ARITH, { includeTrace: true });
        expect(traced.parse('a').trace).toHaveLength(7);
        expect(traced.parse('a', { includeTrace: false }).trace).toBeUndefined();

        const limited = createParser(ARITH, { maxSteps: 3 });
        const result = limited.parse('a');
        expect(!result.success && result.error.code).toBe('STEP_LIMIT');
    });

    test('matches unpatterned terminals literally when asked', () => {
        const text = parseGrammarText("%token id [a-z]+\nE -> T E'\nE' -> + T E' | eps\nT -> id");
        expect(createParser(text).parse('a+b').success).toBe(false);
        expect(createParser(text, { literalTerminals: true }).parse('a+b').success).toBe(true);
    });

    test('parseOrThrow raises GrammarException', () => {
        expect(() => parser.parseOrThrow('a +')).toThrow(GrammarException);
    });
});

describe('analyzeGrammar', () => {
    test('an LL(1) grammar has no conflicts', () => {
        expect(analyzeGrammar(createGrammar(ARITH)).conflicts).toEqual([]);
    });

    test('collects conflicts and still forwards them', () => {
        const forwarded: TableConflict[] = [];
        const analysis = analyzeGrammar(createGrammar(CONFLICT), { onConflict: c => forwarded.push(c) });
        expect(analysis.conflicts).toHaveLength(1);
        expect(forwarded).toEqual(analysis.conflicts);
        expect(analysis.table.get('A', 'x')?.rhs).toEqual(['x', 'y']);
    });

    test('the later alternative decides how conflicting input parses', () => {
        const parser = createParser(CONFLICT);
        expect(parser.parseSymbols(['x', 'y']).success).toBe(true);
        const result = parser.parseSymbols(['x']);
        expect(!result.success && result.error.message).toBe("Expected 'y' but found '$' at position 1");
    });

    test('strict mode rejects the grammar', () => {
        let error: unknown;
        try {
            createParser(CONFLICT, { strict: true });
        } catch (e) {
            error = e;
        }
        expect(error instanceof GrammarException && error.code).toBe('TABLE_CONFLICT');
    });

    test('a grammar without a start symbol cannot be analyzed', () => {
        let error: unknown;
        try {
            createParser({ productions: { S: [['a']] } });
        } catch (e) {
            error = e;
        }
        expect(error instanceof GrammarException && error.code).toBe('CONFIGURATION_ERROR');
    });
});
