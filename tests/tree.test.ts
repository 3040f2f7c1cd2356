/**
 * Parse tree traversal and rename
 */

import {
    rename,
    traverse,
    toEdges,
    findNodes,
    leaves,
    frontier,
    countNodes,
    createNode,
} from '../src/parser/index.js';
import type { ParseTreeNode } from '../src/types/index.js';

function sampleTree(): ParseTreeNode {
    return {
        symbol: 'S',
        children: [
            { symbol: 'A', children: [{ symbol: 'x', value: 'A', children: [] }] },
            { symbol: 'A', children: [] },
            { symbol: 'y', value: 'x', children: [] },
        ],
    };
}

describe('rename', () => {
    test('replaces every symbol and value without a limit', () => {
        const tree = sampleTree();
        expect(rename(tree, 'A', 'B')).toBe(3);
        expect(findNodes(tree, 'A')).toEqual([]);
        expect(tree.children[0].symbol).toBe('B');
        expect(tree.children[0].children[0].value).toBe('B');
        expect(tree.children[1].symbol).toBe('B');
    });

    test('a limit of 0 leaves the tree unchanged', () => {
        const tree = sampleTree();
        expect(rename(tree, 'A', 'B', 0)).toBe(0);
        expect(tree).toEqual(sampleTree());
    });

    test('a negative limit renames nothing', () => {
        const tree = sampleTree();
        expect(rename(tree, 'A', 'B', -1)).toBe(0);
        expect(tree).toEqual(sampleTree());
    });

    test('renames in pre-order up to the limit', () => {
        const tree = sampleTree();
        expect(rename(tree, 'A', 'B', 2)).toBe(2);
        expect(tree.children[0].symbol).toBe('B');
        expect(tree.children[0].children[0].value).toBe('B');
        expect(tree.children[1].symbol).toBe('A');
    });

    test('symbol and value of one node count separately', () => {
        const tree: ParseTreeNode = { symbol: 'n', value: 'n', children: [] };
        expect(rename(tree, 'n', 'm', 1)).toBe(1);
        expect(tree).toEqual({ symbol: 'm', value: 'n', children: [] });
    });

    test('renaming an absent label changes nothing', () => {
        const tree = sampleTree();
        expect(rename(tree, 'Z', 'B')).toBe(0);
        expect(tree).toEqual(sampleTree());
    });
});

describe('traverse', () => {
    test('yields depth and label in pre-order', () => {
        expect([...traverse(sampleTree())]).toEqual([
            { depth: 0, label: 'S' },
            { depth: 1, label: 'A' },
            { depth: 2, label: 'x', value: 'A' },
            { depth: 1, label: 'A' },
            { depth: 1, label: 'y', value: 'x' },
        ]);
    });

    test('is restartable', () => {
        const view = traverse(sampleTree());
        expect([...view]).toEqual([...view]);
    });

    test('is lazy', () => {
        const tree = sampleTree();
        const iterator = traverse(tree)[Symbol.iterator]();
        expect(iterator.next().value).toEqual({ depth: 0, label: 'S' });
        // Mutations made mid-walk are visible to the rest of the walk
        tree.children[0].symbol = 'changed';
        expect(iterator.next().value).toEqual({ depth: 1, label: 'changed' });
    });
});

describe('toEdges', () => {
    test('numbers nodes in pre-order from the root', () => {
        expect([...toEdges(sampleTree())]).toEqual([
            { parentId: 0, childId: 1, label: 'A' },
            { parentId: 0, childId: 3, label: 'A' },
            { parentId: 0, childId: 4, label: 'y' },
            { parentId: 1, childId: 2, label: 'x' },
        ]);
    });

    test('a single node has no edges', () => {
        expect([...toEdges(createNode('S'))]).toEqual([]);
    });
});

describe('lookup helpers', () => {
    test('findNodes returns matches in pre-order', () => {
        const tree = sampleTree();
        const found = findNodes(tree, 'A');
        expect(found).toHaveLength(2);
        expect(found[0]).toBe(tree.children[0]);
        expect(found[1]).toBe(tree.children[1]);
    });

    test('leaves and frontier follow token order', () => {
        const tree = sampleTree();
        expect(leaves(tree).map(n => n.symbol)).toEqual(['x', 'y']);
        expect(frontier(tree)).toEqual(['A', 'x']);
        expect(countNodes(tree)).toBe(5);
    });

    test('createNode only sets a value when given one', () => {
        expect(createNode('E')).toEqual({ symbol: 'E', children: [] });
        expect(createNode('id', 'a')).toEqual({ symbol: 'id', value: 'a', children: [] });
    });
});
