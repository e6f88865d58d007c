/**
 * Substitution Graph Builder
 *
 * Nodes are substrings; an edge joins two substrings that occur in at least
 * one identical context. Edges come from a context -> substrings inverted
 * index, so the cost is the sum of k^2 over contexts shared by k substrings
 * rather than a comparison of every pair of substrings.
 */

import type {
    Context,
    ContextBucket,
    ContextSet,
    Edge,
    Substring,
    SubstitutionGraph,
} from '../types/index.js';
import { compareKeys } from '../utils/substring.js';

/**
 * Context key -> bucket of substring keys, members sorted
 */
export function buildInvertedIndex(contextSet: ContextSet): Map<string, ContextBucket> {
    const index = new Map<string, ContextBucket>();
    for (const [key, entry] of contextSet) {
        for (const context of entry.contexts.values()) {
            const bucket = index.get(context.key);
            if (bucket) {
                bucket.members.push(key);
            } else {
                index.set(context.key, { context, members: [key] });
            }
        }
    }
    for (const bucket of index.values()) {
        bucket.members.sort(compareKeys);
    }
    return index;
}

export function buildSubstitutionGraph(contextSet: ContextSet): SubstitutionGraph {
    const substrings = new Map<string, Substring>();
    const adjacency = new Map<string, Set<string>>();

    for (const [key, entry] of contextSet) {
        if (entry.contexts.size === 0) continue;
        substrings.set(key, entry.substring);
        adjacency.set(key, new Set());
    }

    const index = buildInvertedIndex(contextSet);
    const sharedContexts = new Map<string, ContextBucket>();
    const witnesses = new Map<string, Context>();

    const contextKeys = [...index.keys()].sort(compareKeys);
    for (const contextKey of contextKeys) {
        const bucket = index.get(contextKey);
        if (!bucket || bucket.members.length < 2) continue;
        sharedContexts.set(contextKey, bucket);

        const { members } = bucket;
        for (let i = 0; i < members.length; i++) {
            for (let j = i + 1; j < members.length; j++) {
                const source = members[i];
                const target = members[j];
                adjacency.get(source)?.add(target);
                adjacency.get(target)?.add(source);

                // Contexts are visited in key order, so the first one seen is the smallest
                const edgeKey = `${source}\u001d${target}`;
                if (!witnesses.has(edgeKey)) {
                    witnesses.set(edgeKey, bucket.context);
                }
            }
        }
    }

    const nodes = [...substrings.keys()].sort(compareKeys);
    const edges: Edge[] = [];
    for (const source of nodes) {
        const neighbours = [...(adjacency.get(source) ?? [])]
            .filter(target => compareKeys(source, target) < 0)
            .sort(compareKeys);
        for (const target of neighbours) {
            const witness = witnesses.get(`${source}\u001d${target}`);
            if (witness) {
                edges.push({ source, target, witness });
            }
        }
    }

    return { nodes, substrings, adjacency, edges, sharedContexts };
}

/**
 * Whether two substrings directly share a context
 */
export function areAdjacent(graph: SubstitutionGraph, a: string, b: string): boolean {
    return graph.adjacency.get(a)?.has(b) ?? false;
}
