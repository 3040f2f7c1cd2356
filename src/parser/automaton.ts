import type { ParseResult, ParseStep, ParseTreeNode, Token, ParseAction } from '../types/parser.js';
import type { ParseOptions } from '../types/options.js';
import { DEFAULTS } from '../types/options.js';
import { EPSILON, END_MARKER, Production } from '../types/grammar.js';
import {
    GrammarError,
    GrammarException,
    createStepLimitError,
    createStructuralError,
    createSyntaxError,
} from '../types/errors.js';
import { ParseTable, formatProduction } from '../analysis/table.js';
import { createNode } from './tree.js';

interface StackEntry {
    symbol: string;
    node?: ParseTreeNode;
}

/**
 * Table-driven predictive parser (deterministic pushdown automaton).
 *
 * The stack starts as [$, start]. A non-terminal on top is replaced by the
 * right-hand side of table[top, lookahead], pushed in reverse so the
 * leftmost symbol is processed next; each pushed entry owns a fresh child
 * node of the expanded entry's node, so the tree grows as the stack does.
 */
export class Automaton {
    private readonly table: ParseTable;
    private readonly startSymbol: string;

    constructor(table: ParseTable, startSymbol: string) {
        this.table = table;
        this.startSymbol = startSymbol;
    }

    parse(tokens: readonly Token[], options: ParseOptions = {}): ParseResult {
        const maxSteps = options.maxSteps ?? DEFAULTS.maxSteps;
        const trace: ParseStep[] | undefined = options.includeTrace ? [] : undefined;

        const root = createNode(this.startSymbol);
        const stack: StackEntry[] = [{ symbol: END_MARKER }, { symbol: this.startSymbol, node: root }];
        const endPosition = tokens.length > 0
            ? tokens[tokens.length - 1].position + tokens[tokens.length - 1].text.length
            : 0;
        let cursor = 0;
        let steps = 0;

        const lookahead = (): Token => tokens[cursor] ?? { kind: END_MARKER, text: '', position: endPosition };

        const record = (action: ParseAction, production?: Production) => {
            if (!trace && !options.onStep) return;
            const step: ParseStep = {
                step: steps,
                stack: stack.map(e => e.symbol),
                lookahead: lookahead().kind,
                action,
                ...(production && { production: formatProduction(production) }),
            };
            trace?.push(step);
            options.onStep?.(step);
        };

        const fail = (error: GrammarError): ParseResult => {
            record('error');
            return {
                success: false,
                error,
                steps,
                stackDepth: stack.length,
                ...(trace && { trace }),
            };
        };

        while (stack.length > 0) {
            if (steps >= maxSteps) {
                return fail(createStepLimitError(maxSteps).error);
            }

            const top = stack[stack.length - 1];
            const token = lookahead();

            if (top.symbol === END_MARKER) {
                if (cursor >= tokens.length) {
                    record('accept');
                    stack.pop();
                    steps++;
                    return { success: true, tree: root, steps, ...(trace && { trace }) };
                }
                return fail(createSyntaxError(
                    `Input not fully consumed: unexpected '${token.text}' (${token.kind}) at position ${token.position}`,
                    [END_MARKER],
                    token.kind,
                    token.position,
                    { stackDepth: stack.length }
                ).error);
            }

            if (this.table.terminals.has(top.symbol)) {
                if (top.symbol !== token.kind) {
                    return fail(createSyntaxError(
                        `Expected '${top.symbol}' but found '${token.kind}' at position ${token.position}`,
                        [top.symbol],
                        token.kind,
                        token.position,
                        { stackDepth: stack.length }
                    ).error);
                }
                if (top.node) top.node.value = token.text;
                record('match');
                stack.pop();
                cursor++;
                steps++;
                continue;
            }

            if (this.table.nonTerminals.has(top.symbol)) {
                const production = this.table.get(top.symbol, token.kind);
                if (!production) {
                    return fail(createSyntaxError(
                        `No production for '${top.symbol}' on '${token.kind}' at position ${token.position}`,
                        this.table.expectedFor(top.symbol),
                        token.kind,
                        token.position,
                        { nonTerminal: top.symbol, stackDepth: stack.length }
                    ).error);
                }
                record('expand', production);
                stack.pop();
                steps++;
                if (production.rhs.length === 1 && production.rhs[0] === EPSILON) {
                    continue;
                }

                const entries: StackEntry[] = production.rhs.map(symbol => {
                    const child = createNode(symbol);
                    top.node?.children.push(child);
                    return { symbol, node: child };
                });
                for (let i = entries.length - 1; i >= 0; i--) {
                    stack.push(entries[i]);
                }
                continue;
            }

            return fail(createStructuralError(top.symbol, { stackDepth: stack.length }).error);
        }

        // Unreachable while the stack keeps its $ sentinel
        return fail(createSyntaxError('Parse stack emptied before the end of input', [END_MARKER], lookahead().kind).error);
    }

    parseOrThrow(tokens: readonly Token[], options?: ParseOptions): ParseTreeNode {
        const result = this.parse(tokens, options);
        if (!result.success) {
            throw new GrammarException(result.error);
        }
        return result.tree;
    }
}

export function parse(
    table: ParseTable,
    startSymbol: string,
    tokens: readonly Token[],
    options?: ParseOptions
): ParseResult {
    return new Automaton(table, startSymbol).parse(tokens, options);
}
