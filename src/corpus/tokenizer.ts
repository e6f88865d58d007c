/**
 * Sentence segmentation and tokenization
 */

import type { Sentence, Token, TokenizeOptions } from '../types/index.js';

// Word mode keeps letters, digits, whitespace and (when segmenting) periods
const STRIP_KEEP_PERIODS = /[^\p{L}\p{N}.\s]/gu;
const STRIP_ALL = /[^\p{L}\p{N}\s]/gu;

function splitLines(text: string): string[] {
    return text.split(/\r?\n/);
}

function words(text: string): Token[] {
    return text.split(/\s+/).filter(w => w.length > 0);
}

/**
 * Raw sentences as token lists, before indexing
 */
export function segment(text: string, options: TokenizeOptions): Token[][] {
    const source = options.lowercase ? text.toLowerCase() : text;

    if (options.granularity === 'char') {
        // One sentence per non-blank line, one token per code point
        return splitLines(source)
            .filter(line => line.trim().length > 0)
            .map(line => Array.from(line));
    }

    if (options.segmentation === 'line') {
        return splitLines(source)
            .map(line => words(line.replace(STRIP_ALL, '')))
            .filter(tokens => tokens.length > 0);
    }

    return source
        .replace(STRIP_KEEP_PERIODS, '')
        .split('.')
        .map(words)
        .filter(tokens => tokens.length > 0);
}

export function tokenize(text: string, options: TokenizeOptions, firstIndex: number = 0): Sentence[] {
    return segment(text, options).map((tokens, i) => ({ index: firstIndex + i, tokens }));
}

/**
 * Sentences from token lists already in memory
 */
export function toSentences(raw: readonly (readonly Token[] | string)[], granularity: TokenizeOptions['granularity']): Sentence[] {
    return raw.map((item, index) => ({
        index,
        tokens: typeof item === 'string'
            ? (granularity === 'char' ? Array.from(item) : words(item))
            : [...item],
    }));
}
