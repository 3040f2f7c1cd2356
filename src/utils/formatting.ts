/**
 * Formatting utilities
 */
import type { ParseStep, ParseTreeNode, Token } from '../types/index.js';
import type { SymbolSets } from '../analysis/sets.js';
import type { ParseTable } from '../analysis/table.js';
import { traverse } from '../parser/tree.js';

/**
 * Indented tree, two spaces per level. Terminals show their text.
 */
export function formatTree(tree: ParseTreeNode): string {
    const lines: string[] = [];
    for (const { depth, label, value } of traverse(tree)) {
        const text = value === undefined ? label : `${label} '${value}'`;
        lines.push(`${'  '.repeat(depth)}${text}`);
    }
    return lines.join('\n');
}

/**
 * `NAME(X) = { a, b }` per symbol, symbols and members sorted
 */
export function formatSets(name: string, sets: SymbolSets, symbols?: Iterable<string>): string {
    const keys = symbols ? [...symbols] : [...sets.keys()];
    return keys
        .sort()
        .map(symbol => `${name}(${symbol}) = { ${[...(sets.get(symbol) ?? [])].sort().join(', ')} }`)
        .join('\n');
}

/**
 * One line per filled cell: `[A, t] A -> α`
 */
export function formatTable(table: ParseTable): string {
    const lines: string[] = [];
    for (const [nonTerminal, terminal, production] of table.entries()) {
        lines.push(`[${nonTerminal}, ${terminal}] ${production.lhs} -> ${production.rhs.join(' ')}`);
    }
    return lines.join('\n');
}

export function formatTokens(tokens: Token[]): string {
    return tokens.map(t => `${t.kind} '${t.text}' @${t.position}`).join('\n');
}

export function formatTrace(trace: ParseStep[]): string {
    return trace
        .map(s => {
            const production = s.production ? ` ${s.production}` : '';
            return `${s.step}: [${s.stack.join(' ')}] <${s.lookahead}> ${s.action}${production}`;
        })
        .join('\n');
}
