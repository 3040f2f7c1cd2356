import type { LexResult, Token } from '../types/parser.js';
import type { LexerOptions } from '../types/options.js';
import { Grammar } from '../grammar/grammar.js';
import { GrammarException, createGrammarError, createLexicalError } from '../types/errors.js';

export type LexicalRules = Grammar | ReadonlyMap<string, string> | Array<[string, string]> | Record<string, string>;

interface CompiledRule {
    kind: string;
    regex: RegExp;
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function ruleEntries(rules: LexicalRules, literalTerminals: boolean): Array<[string, string]> {
    if (rules instanceof Grammar) {
        const entries = [...rules.getPatterns()];
        if (literalTerminals) {
            for (const terminal of rules.getTerminals()) {
                if (!rules.getPatterns().has(terminal)) {
                    entries.push([terminal, escapeRegExp(terminal)]);
                }
            }
        }
        return entries;
    }
    if (rules instanceof Map || Array.isArray(rules)) {
        return [...rules];
    }
    return Object.entries(rules);
}

/**
 * Ordered matcher over the lexical rules of a grammar.
 *
 * At each position the first rule, in declaration order, that matches a
 * non-empty prefix wins. There is no longest-match arbitration: keyword
 * rules must be declared before a general identifier rule.
 */
export class Lexer {
    private readonly rules: CompiledRule[];

    constructor(rules: LexicalRules, options: LexerOptions = {}) {
        this.rules = ruleEntries(rules, options.literalTerminals ?? false).map(([kind, pattern]) => {
            try {
                return { kind, regex: new RegExp(pattern, 'y') };
            } catch (e) {
                throw createGrammarError(`Invalid pattern for '${kind}': ${e instanceof Error ? e.message : String(e)}`, undefined, { pattern });
            }
        });
    }

    /** Terminal kinds in match order */
    get kinds(): string[] {
        return this.rules.map(r => r.kind);
    }

    /**
     * The equivalent single alternation, one group per rule
     */
    get source(): string {
        return this.rules.map(r => `(${r.regex.source})`).join('|');
    }

    tokenize(input: string): LexResult {
        const tokens: Token[] = [];
        let pos = 0;

        while (pos < input.length) {
            const token = this.matchAt(input, pos);
            if (token) {
                tokens.push(token);
                pos += token.text.length;
                continue;
            }
            if (/\s/.test(input[pos])) {
                pos++;
                continue;
            }
            return { success: false, error: createLexicalError(input, pos).error };
        }

        return { success: true, tokens };
    }

    tokenizeOrThrow(input: string): Token[] {
        const result = this.tokenize(input);
        if (!result.success) {
            throw new GrammarException(result.error);
        }
        return result.tokens;
    }

    private matchAt(input: string, pos: number): Token | undefined {
        for (const { kind, regex } of this.rules) {
            regex.lastIndex = pos;
            const match = regex.exec(input);
            if (match && match[0].length > 0) {
                return { kind, text: match[0], position: pos };
            }
        }
        return undefined;
    }
}

export function compileLexer(rules: LexicalRules, options?: LexerOptions): Lexer {
    return new Lexer(rules, options);
}

export function tokenize(lexer: Lexer, input: string): LexResult {
    return lexer.tokenize(input);
}

/**
 * Pre-tokenized input: each kind becomes a token whose text is the kind
 */
export function tokensFromSymbols(kinds: readonly string[]): Token[] {
    let position = 0;
    return kinds.map(kind => {
        const token = { kind, text: kind, position };
        position += kind.length + 1;
        return token;
    });
}
