/**
 * Built-in sample corpora, run with --demo
 */
import type { Corpus } from './types/index.js';
import { toSentences } from './corpus/tokenizer.js';

export const TOY_STRINGS = ['abbcbba', 'abcba', 'aacaa', 'aaacaaa', 'bbbcbbb'];

export const ANIMAL_SENTENCES = [
    'the dog ran',
    'the cat ran',
    'the cat quickly walked',
    'the cat slowly walked',
];

export function sampleCorpora(): Corpus[] {
    return [
        { name: 'SG_1', granularity: 'char', sentences: toSentences(TOY_STRINGS, 'char') },
        { name: 'SG_2', granularity: 'word', sentences: toSentences(ANIMAL_SENTENCES, 'word') },
    ];
}
