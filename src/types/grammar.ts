/**
 * Grammar Types
 */

import type { Token } from './corpus.js';
import type { Context } from './graph.js';

/**
 * One observed (left, class, right) pattern
 */
export interface ContextPattern {
    context: Context;
    /** Occurrences of class members seen in this context */
    count: number;
    /** e.g. `<s> the X3 sat </s>` */
    body: string;
}

export interface GrammarFragment {
    classId: string;
    patterns: ContextPattern[];
    /** Distinct (member, context) pairs seen in the corpus */
    observations: number;
    /** At least two distinct context observations */
    productive: boolean;
}

/**
 * A -> a, or A -> B C
 */
export type ProductionRule =
    | { kind: 'lexical'; lhs: string; terminal: readonly Token[] }
    | { kind: 'binary'; lhs: string; rhs: [string, string] };

export interface Grammar {
    /** Every graph node, as display text */
    alphabet: string[];
    nonterminals: string[];
    /** Distinct corpus sentences, as display text */
    starts: string[];
    /** Every class, productive or not */
    fragments: Map<string, GrammarFragment>;
    /** Productive fragments only */
    productive: Map<string, GrammarFragment>;
    rules: ProductionRule[];
}
