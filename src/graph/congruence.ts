/**
 * Congruence Class Resolver
 *
 * Connected components of the substitution graph via union-find. Each
 * component is labelled by its smallest member, and ids are handed out in
 * the order of those representatives, so the partition and its names depend
 * only on the node and edge sets, never on edge order.
 */

import type { CongruenceClass, Edge, Substring, SubstitutionGraph } from '../types/index.js';
import { compareKeys } from '../utils/substring.js';
import { DisjointSet } from './unionFind.js';

export const CLASS_PREFIX = 'X';

export function resolveCongruenceClasses(graph: SubstitutionGraph, edges: readonly Edge[] = graph.edges): CongruenceClass[] {
    const nodes = [...graph.nodes].sort(compareKeys);
    const indexOf = new Map<string, number>();
    nodes.forEach((key, i) => indexOf.set(key, i));

    const sets = new DisjointSet(nodes.length);
    for (const edge of edges) {
        const a = indexOf.get(edge.source);
        const b = indexOf.get(edge.target);
        if (a === undefined || b === undefined) continue;
        sets.union(a, b);
    }

    // Node indices are sorted, so each group's first entry is its smallest member
    const components = [...sets.groups().values()]
        .map(group => group.map(i => nodes[i]))
        .sort((a, b) => compareKeys(a[0], b[0]));

    return components.map((keys, i) => ({
        id: `${CLASS_PREFIX}${i}`,
        representative: keys[0],
        members: keys.map(key => substringOf(graph, key)),
    }));
}

function substringOf(graph: SubstitutionGraph, key: string): Substring {
    const substring = graph.substrings.get(key);
    if (!substring) {
        throw new Error(`Node '${key}' has no substring record`);
    }
    return substring;
}

/**
 * Member key -> class id
 */
export function classIndex(classes: readonly CongruenceClass[]): Map<string, string> {
    const index = new Map<string, string>();
    for (const cls of classes) {
        for (const member of cls.members) {
            index.set(member.key, cls.id);
        }
    }
    return index;
}
