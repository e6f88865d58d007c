/**
 * Context, Substitution Graph and Congruence Types
 */

import type { Token } from './corpus.js';

/**
 * A substring, identified by its literal content
 */
export interface Substring {
    /** Tokens joined with the unit separator (U+001F) */
    key: string;
    tokens: readonly Token[];
}

/**
 * Tokens around one substring occurrence, boundary markers included
 */
export interface Context {
    key: string;
    left: readonly Token[];
    right: readonly Token[];
}

export interface ContextEntry {
    substring: Substring;
    /** Distinct contexts, by context key */
    contexts: Map<string, Context>;
    /** Number of occurrences across the corpus (duplicates counted) */
    occurrences: number;
}

/**
 * Substring key -> every context it occurs in
 */
export type ContextSet = Map<string, ContextEntry>;

export interface ContextBucket {
    context: Context;
    /** Substring keys exhibiting the context, sorted */
    members: string[];
}

export interface Edge {
    /** source < target */
    source: string;
    target: string;
    /** Smallest shared context; a label, not a multiplicity */
    witness: Context;
}

export interface SubstitutionGraph {
    /** Sorted node keys */
    nodes: string[];
    substrings: Map<string, Substring>;
    adjacency: Map<string, Set<string>>;
    edges: Edge[];
    /** Context key -> bucket, for every context shared by two or more substrings */
    sharedContexts: Map<string, ContextBucket>;
}

export interface CongruenceClass {
    /** Nonterminal name, e.g. X0 */
    id: string;
    /** Smallest member key */
    representative: string;
    /** Sorted by key */
    members: Substring[];
}
