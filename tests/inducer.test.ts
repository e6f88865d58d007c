/**
 * Tests for grammar induction
 */

import { extractContexts } from '../src/extraction/contextExtractor.js';
import { resolveCongruenceClasses } from '../src/graph/congruence.js';
import { buildSubstitutionGraph } from '../src/graph/substitutionGraph.js';
import { deriveRules, formatRule, induceGrammar } from '../src/grammar/inducer.js';
import type { InduceOptions } from '../src/grammar/inducer.js';
import { CORPORA, corpus } from './fixtures.js';

function grammarOf(words: string[], options: InduceOptions = { minLength: 1, granularity: 'word' }) {
    const { sentences } = corpus('t', words, options.granularity);
    const classes = resolveCongruenceClasses(buildSubstitutionGraph(extractContexts(sentences, options)));
    return { classes, grammar: induceGrammar(sentences, classes, options) };
}

describe('induceGrammar', () => {
    test('writes the class into the hole of each context', () => {
        const { grammar } = grammarOf(CORPORA.animals);
        const x0 = grammar.fragments.get('X0');
        expect(x0?.patterns.map(p => p.body)).toEqual(['<s> the X0 sat </s>']);
        expect(x0?.patterns[0].count).toBe(2);
        expect(x0?.observations).toBe(2);
        expect(x0?.productive).toBe(true);
    });

    test('lists several alternatives for a word seen in several contexts', () => {
        const { grammar } = grammarOf(CORPORA.animals);
        expect(grammar.fragments.get('X2')?.patterns.map(p => p.body)).toEqual([
            '<s> the cat X2 </s>',
            '<s> the dog X2 </s>',
        ]);
    });

    test('keeps every class productive in the animal corpus', () => {
        const { grammar } = grammarOf(CORPORA.animals);
        expect([...grammar.productive.keys()]).toEqual(['X0', 'X1', 'X2', 'X3', 'X4']);
    });

    test('flags classes seen in a single context as unproductive', () => {
        const { grammar } = grammarOf(CORPORA.abc, { minLength: 1, maxLength: 1, granularity: 'word' });
        expect(grammar.productive.size).toBe(0);
        expect([...grammar.fragments.values()].map(f => f.productive)).toEqual([false, false, false]);
    });

    test('repeated sentences do not make a class productive', () => {
        const { grammar } = grammarOf(['x y', 'x y']);
        const x = grammar.fragments.get('X0');
        expect(x?.patterns[0].count).toBe(2);
        expect(x?.observations).toBe(1);
        expect(x?.productive).toBe(false);
    });

    test('collects alphabet, nonterminals and starts', () => {
        const { grammar } = grammarOf([...CORPORA.animals, 'the cat sat']);
        expect(grammar.alphabet).toEqual(['cat', 'cat sat', 'dog', 'dog sat', 'sat', 'the', 'the cat', 'the dog']);
        expect(grammar.nonterminals).toEqual(['X0', 'X1', 'X2', 'X3', 'X4']);
        expect(grammar.starts).toEqual(['the cat sat', 'the dog sat']);
    });

    test('uses the configured context width', () => {
        const options: InduceOptions = { minLength: 1, maxLength: 1, contextWidth: 1, granularity: 'word' };
        const { classes, grammar } = grammarOf(CORPORA.distant, options);
        const catClass = classes.find(c => c.members.some(m => m.key === 'cat'));
        expect(catClass?.members.map(m => m.key)).toEqual(['cat', 'dog']);
        const bodies = grammar.fragments.get(catClass?.id ?? '')?.patterns.map(p => p.body);
        expect(bodies).toEqual([`big ${catClass?.id} sat </s>`]);
    });
});

describe('deriveRules', () => {
    test('reads lexical and binary rules off the classes', () => {
        const { classes } = grammarOf(CORPORA.animals);
        expect(deriveRules(classes).map(r => formatRule(r, 'word'))).toEqual([
            "X0 -> 'cat'",
            "X0 -> 'dog'",
            'X1 -> X0 X2',
            "X2 -> 'sat'",
            "X3 -> 'the'",
            'X4 -> X3 X0',
        ]);
    });

    test('joins character terminals without spaces', () => {
        const { classes } = grammarOf(['ab', 'cb'], { minLength: 1, granularity: 'char' });
        const rules = deriveRules(classes).map(r => formatRule(r, 'char'));
        expect(rules).toContain("X0 -> 'a'");
        expect(rules).toContain("X0 -> 'c'");
    });

    test('skips splits whose halves are not substrings of the graph', () => {
        const { classes } = grammarOf(['a b c d'], { minLength: 2, maxLength: 2, granularity: 'word' });
        expect(deriveRules(classes)).toEqual([]);
    });
});
