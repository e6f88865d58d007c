/**
 * Tests for union-find and congruence classes
 */

import { extractContexts } from '../src/extraction/contextExtractor.js';
import { classIndex, resolveCongruenceClasses } from '../src/graph/congruence.js';
import { areAdjacent, buildSubstitutionGraph } from '../src/graph/substitutionGraph.js';
import { DisjointSet } from '../src/graph/unionFind.js';
import type { ExtractionOptions } from '../src/types/index.js';
import { CORPORA, corpus, key } from './fixtures.js';

function graphOf(words: string[], options: ExtractionOptions = { minLength: 1 }) {
    return buildSubstitutionGraph(extractContexts(corpus('t', words).sentences, options));
}

describe('DisjointSet', () => {
    test('starts with singletons', () => {
        const sets = new DisjointSet(3);
        expect(sets.size).toBe(3);
        expect(sets.connected(0, 1)).toBe(false);
        expect(sets.groups().size).toBe(3);
    });

    test('union is transitive', () => {
        const sets = new DisjointSet(5);
        expect(sets.union(0, 1)).toBe(true);
        expect(sets.union(1, 2)).toBe(true);
        expect(sets.union(0, 2)).toBe(false);
        expect(sets.connected(0, 2)).toBe(true);
        expect(sets.connected(0, 3)).toBe(false);
    });

    test('groups list members in ascending order', () => {
        const sets = new DisjointSet(4);
        sets.union(3, 1);
        sets.union(1, 0);
        const groups = [...sets.groups().values()].sort((a, b) => a[0] - b[0]);
        expect(groups).toEqual([[0, 1, 3], [2]]);
    });

    test('handles a long chain without recursion', () => {
        const n = 100000;
        const sets = new DisjointSet(n);
        for (let i = 1; i < n; i++) sets.union(i - 1, i);
        expect(sets.connected(0, n - 1)).toBe(true);
        expect(sets.groups().size).toBe(1);
    });
});

describe('resolveCongruenceClasses', () => {
    test('puts cat and dog in one class', () => {
        const classes = resolveCongruenceClasses(graphOf(CORPORA.animals));
        const index = classIndex(classes);
        expect(index.get(key('cat'))).toBe(index.get(key('dog')));
        expect(index.get(key('cat'))).not.toBe(index.get(key('sat')));
    });

    test('names classes by their smallest member', () => {
        const classes = resolveCongruenceClasses(graphOf(CORPORA.animals));
        expect(classes.map(c => [c.id, c.representative])).toEqual([
            ['X0', key('cat')],
            ['X1', key('cat sat')],
            ['X2', key('sat')],
            ['X3', key('the')],
            ['X4', key('the cat')],
        ]);
        expect(classes[0].members.map(m => m.tokens.join(' '))).toEqual(['cat', 'dog']);
    });

    test('is transitive across different contexts', () => {
        const graph = graphOf(CORPORA.chain, { minLength: 1, maxLength: 1 });
        expect(areAdjacent(graph, key('x'), key('y'))).toBe(true);
        expect(areAdjacent(graph, key('y'), key('z'))).toBe(true);
        expect(areAdjacent(graph, key('x'), key('z'))).toBe(false);

        const index = classIndex(resolveCongruenceClasses(graph));
        expect(index.get(key('x'))).toBe(index.get(key('z')));
    });

    test('gives three singletons when no context is shared', () => {
        const classes = resolveCongruenceClasses(graphOf(CORPORA.abc, { minLength: 1, maxLength: 1 }));
        expect(classes.map(c => c.members.map(m => m.key))).toEqual([['a'], ['b'], ['c']]);
    });

    test('partitions the node set', () => {
        for (const words of Object.values(CORPORA)) {
            const graph = graphOf(words);
            const members = resolveCongruenceClasses(graph).flatMap(c => c.members.map(m => m.key));
            expect(new Set(members).size).toBe(members.length);
            expect([...members].sort()).toEqual([...graph.nodes].sort());
        }
    });

    test('every directly adjacent pair shares a class', () => {
        const graph = graphOf(CORPORA.chain);
        const index = classIndex(resolveCongruenceClasses(graph));
        for (const edge of graph.edges) {
            expect(index.get(edge.source)).toBe(index.get(edge.target));
        }
    });

    test('does not depend on edge order', () => {
        const graph = graphOf(CORPORA.chain);
        const forward = resolveCongruenceClasses(graph);
        const reversed = resolveCongruenceClasses(graph, [...graph.edges].reverse());
        const rotated = resolveCongruenceClasses(graph, [...graph.edges.slice(2), ...graph.edges.slice(0, 2)]);
        expect(reversed).toEqual(forward);
        expect(rotated).toEqual(forward);
    });

    test('is empty for an empty graph', () => {
        expect(resolveCongruenceClasses(graphOf(CORPORA.single))).toEqual([]);
    });
});
