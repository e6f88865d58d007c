/**
 * Corpus Types
 */

export type Token = string;

/**
 * Token granularity of a corpus
 */
export type Granularity =
    | 'word'    // "the cat sat" -> the, cat, sat
    | 'char';   // "abba" -> a, b, b, a

/**
 * How raw text is cut into sentences (word granularity only)
 */
export type Segmentation =
    | 'sentence'  // split on periods
    | 'line';     // one sentence per line

export interface Sentence {
    readonly index: number;
    readonly tokens: readonly Token[];
}

export interface Corpus {
    name: string;
    granularity: Granularity;
    sentences: readonly Sentence[];
}
