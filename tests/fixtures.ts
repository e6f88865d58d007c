/**
 * Shared test fixtures for consistent, DRY testing.
 */
import { toSentences } from '../src/corpus/tokenizer.js';
import { substringKey } from '../src/utils/substring.js';
import type { Corpus, Granularity } from '../src/types/index.js';

// === Common Corpora ===
export const CORPORA = {
    // One slot filled by two words
    animals: ['the cat sat', 'the dog sat'],
    // Every unigram in its own context
    abc: ['a b c'],
    // x ~ y and y ~ z, but x and z never share a context
    chain: ['a x b', 'a y b', 'c y d', 'c z d'],
    // Substitutable only when contexts are cut to one token
    distant: ['the big cat sat', 'a big dog sat'],
    // One word, hence no proper substring
    single: ['hello'],
};

export function corpus(name: string, sentences: readonly string[], granularity: Granularity = 'word'): Corpus {
    return { name, granularity, sentences: toSentences(sentences, granularity) };
}

/** Key of a space-separated word sequence */
export function key(words: string): string {
    return substringKey(words.split(' '));
}
