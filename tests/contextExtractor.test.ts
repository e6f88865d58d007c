/**
 * Tests for context extraction
 */

import {
    ContextExtractor,
    contextAt,
    enumerateSpans,
    extractContexts,
    validateExtractionOptions,
} from '../src/extraction/contextExtractor.js';
import { LearnerException } from '../src/types/errors.js';
import { CORPORA, corpus, key } from './fixtures.js';

function contextsOf(words: string[], minLength = 1, maxLength?: number) {
    return extractContexts(corpus('t', words).sentences, { minLength, maxLength });
}

describe('enumerateSpans', () => {
    test('yields every proper span, shortest first', () => {
        expect([...enumerateSpans(3, { minLength: 1 })]).toEqual([
            { start: 0, end: 1 },
            { start: 1, end: 2 },
            { start: 2, end: 3 },
            { start: 0, end: 2 },
            { start: 1, end: 3 },
        ]);
    });

    test('respects the maximum length', () => {
        expect([...enumerateSpans(4, { minLength: 2, maxLength: 2 })]).toEqual([
            { start: 0, end: 2 },
            { start: 1, end: 3 },
            { start: 2, end: 4 },
        ]);
    });

    test('yields nothing for a one-token sentence', () => {
        expect([...enumerateSpans(1, { minLength: 1 })]).toEqual([]);
    });
});

describe('contextAt', () => {
    const tokens = ['the', 'big', 'cat', 'sat'];

    test('runs to the sentence edges by default', () => {
        const context = contextAt(tokens, { start: 2, end: 3 });
        expect(context.left).toEqual(['<s>', 'the', 'big']);
        expect(context.right).toEqual(['sat', '</s>']);
    });

    test('keeps the boundary marker only when the edge is within the width', () => {
        const inner = contextAt(tokens, { start: 2, end: 3 }, 1);
        expect(inner.left).toEqual(['big']);
        expect(inner.right).toEqual(['sat', '</s>']);

        const edge = contextAt(tokens, { start: 0, end: 1 }, 1);
        expect(edge.left).toEqual(['<s>']);
        expect(edge.right).toEqual(['big']);
    });

    test('edge contexts differ from internal ones', () => {
        const atStart = contextAt(['a', 'b', 'a'], { start: 0, end: 1 }, 1);
        const inside = contextAt(['b', 'a', 'b'], { start: 1, end: 2 }, 1);
        expect(atStart.key).not.toBe(inside.key);
    });
});

describe('ContextExtractor', () => {
    test('records the shared context of two substitutable words', () => {
        const set = contextsOf(CORPORA.animals);
        const cat = set.get(key('cat'));
        const dog = set.get(key('dog'));
        expect(cat?.contexts.size).toBe(1);
        expect(dog?.contexts.size).toBe(1);
        expect([...(cat?.contexts.keys() ?? [])]).toEqual([...(dog?.contexts.keys() ?? [])]);
    });

    test('extracts eight distinct substrings from the animal corpus', () => {
        const set = contextsOf(CORPORA.animals);
        expect(set.size).toBe(8);
        expect(set.has(key('the cat sat'))).toBe(false);
    });

    test('excludes the whole sentence', () => {
        const set = contextsOf(CORPORA.abc);
        expect([...set.keys()].sort()).toEqual([key('a'), key('a b'), key('b'), key('b c'), key('c')].sort());
    });

    test('sentences shorter than the minimum contribute nothing', () => {
        expect(contextsOf(['a b'], 2).size).toBe(0);
    });

    test('a one-token sentence contributes nothing', () => {
        expect(contextsOf(CORPORA.single).size).toBe(0);
    });

    test('counts every occurrence but deduplicates contexts by value', () => {
        const repeated = contextsOf(['x y', 'x y']).get(key('x'));
        expect(repeated?.occurrences).toBe(2);
        expect(repeated?.contexts.size).toBe(1);

        const twiceInOne = contextsOf(['a b a b c']).get(key('a'));
        expect(twiceInOne?.occurrences).toBe(2);
        expect(twiceInOne?.contexts.size).toBe(2);
    });

    test('maximum length bounds the substrings', () => {
        expect(contextsOf(['a b c d'], 1, 2).size).toBe(7);
    });

    test('character granularity treats each character as a token', () => {
        const set = extractContexts(corpus('toy', ['abba'], 'char').sentences, { minLength: 1 });
        const b = set.get('b');
        expect(b?.occurrences).toBe(2);
        expect(b?.contexts.size).toBe(2);
    });
});

describe('validateExtractionOptions', () => {
    test.each([
        [{ minLength: 0 }],
        [{ minLength: -1 }],
        [{ minLength: 1.5 }],
        [{ minLength: 3, maxLength: 2 }],
        [{ minLength: 1, maxLength: 0 }],
        [{ minLength: 1, contextWidth: 0 }],
    ])('rejects %j', (options) => {
        expect(() => validateExtractionOptions(options)).toThrow(LearnerException);
        expect(() => validateExtractionOptions(options))
            .toThrow(expect.objectContaining({ code: 'CONFIGURATION_ERROR' }));
    });

    test('accepts equal bounds', () => {
        expect(() => validateExtractionOptions({ minLength: 2, maxLength: 2 })).not.toThrow();
    });

    test('constructor validates', () => {
        expect(() => new ContextExtractor({ minLength: 2, maxLength: 1 })).toThrow(
            'Minimum substring length 2 exceeds maximum 1'
        );
    });
});
