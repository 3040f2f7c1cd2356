/**
 * Parse tree operations
 *
 * Every walk here is depth-first pre-order: parent before children,
 * siblings left to right.
 */

import type { ParseTreeNode } from '../types/parser.js';

export interface TraversalEntry {
    depth: number;
    label: string;
    value?: string;
}

export interface TreeEdge {
    parentId: number;
    childId: number;
    label: string;
}

export function createNode(symbol: string, value?: string): ParseTreeNode {
    return value === undefined ? { symbol, children: [] } : { symbol, value, children: [] };
}

function* preOrder(root: ParseTreeNode): Generator<[ParseTreeNode, number]> {
    const stack: Array<[ParseTreeNode, number]> = [[root, 0]];
    while (stack.length > 0) {
        const top = stack.pop();
        if (!top) break;
        yield top;
        const [node, depth] = top;
        for (let i = node.children.length - 1; i >= 0; i--) {
            stack.push([node.children[i], depth + 1]);
        }
    }
}

/**
 * Rename symbol labels and literal values equal to `oldLabel`. Each field
 * replaced counts once against `limit`; no limit means every occurrence.
 * Mutates the tree and returns the number of replacements made.
 */
export function rename(tree: ParseTreeNode, oldLabel: string, newLabel: string, limit?: number): number {
    const max = limit ?? Number.POSITIVE_INFINITY;
    let count = 0;
    if (max <= 0) return count;

    for (const [node] of preOrder(tree)) {
        if (node.symbol === oldLabel) {
            node.symbol = newLabel;
            if (++count >= max) break;
        }
        if (node.value === oldLabel) {
            node.value = newLabel;
            if (++count >= max) break;
        }
    }
    return count;
}

/**
 * Lazy (depth, label) view of the tree. Each iteration restarts the walk.
 */
export function traverse(tree: ParseTreeNode): Iterable<TraversalEntry> {
    return {
        *[Symbol.iterator]() {
            for (const [node, depth] of preOrder(tree)) {
                yield node.value === undefined
                    ? { depth, label: node.symbol }
                    : { depth, label: node.symbol, value: node.value };
            }
        },
    };
}

/**
 * Parent/child edges for graph renderers. Node ids are pre-order positions,
 * the root being 0.
 */
export function toEdges(tree: ParseTreeNode): Iterable<TreeEdge> {
    return {
        *[Symbol.iterator]() {
            const ids = new Map<ParseTreeNode, number>();
            let next = 0;
            for (const [node] of preOrder(tree)) {
                ids.set(node, next++);
            }
            for (const [node, id] of ids) {
                for (const child of node.children) {
                    yield { parentId: id, childId: ids.get(child) ?? -1, label: child.symbol };
                }
            }
        },
    };
}

export function findNodes(tree: ParseTreeNode, label: string): ParseTreeNode[] {
    const found: ParseTreeNode[] = [];
    for (const [node] of preOrder(tree)) {
        if (node.symbol === label) found.push(node);
    }
    return found;
}

/** Nodes carrying a matched token, left to right */
export function leaves(tree: ParseTreeNode): ParseTreeNode[] {
    const result: ParseTreeNode[] = [];
    for (const [node] of preOrder(tree)) {
        if (node.value !== undefined) result.push(node);
    }
    return result;
}

/** Literal text of the matched tokens, left to right */
export function frontier(tree: ParseTreeNode): string[] {
    return leaves(tree).map(node => node.value ?? '');
}

export function countNodes(tree: ParseTreeNode): number {
    let count = 0;
    for (const _ of preOrder(tree)) count++;
    return count;
}
