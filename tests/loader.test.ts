/**
 * Tests for corpus loading
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { loadCorpus } from '../src/corpus/loader.js';
import type { TokenizeOptions } from '../src/types/index.js';

const WORDS: TokenizeOptions = { granularity: 'word', segmentation: 'sentence', lowercase: false };

describe('loadCorpus', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'slg-loader-'));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    test('reads a single file', async () => {
        const file = path.join(dir, 'corpus.txt');
        await fs.writeFile(file, 'the cat sat. the dog sat.');
        const corpus = await loadCorpus(file, WORDS);
        expect(corpus.name).toBe('corpus.txt');
        expect(corpus.granularity).toBe('word');
        expect(corpus.sentences.map(s => s.tokens)).toEqual([['the', 'cat', 'sat'], ['the', 'dog', 'sat']]);
    });

    test('reads every file of a directory in name order', async () => {
        await fs.writeFile(path.join(dir, 'b.txt'), 'second one.');
        await fs.writeFile(path.join(dir, 'a.txt'), 'first one. first two.');
        await fs.mkdir(path.join(dir, 'nested'));
        await fs.writeFile(path.join(dir, 'nested', 'c.txt'), 'ignored.');

        const corpus = await loadCorpus(dir, WORDS);
        expect(corpus.sentences).toEqual([
            { index: 0, tokens: ['first', 'one'] },
            { index: 1, tokens: ['first', 'two'] },
            { index: 2, tokens: ['second', 'one'] },
        ]);
    });

    test('reads toy strings line by line', async () => {
        const file = path.join(dir, 'toy.txt');
        await fs.writeFile(file, 'abba\nab\n');
        const corpus = await loadCorpus(file, { ...WORDS, granularity: 'char' });
        expect(corpus.sentences.map(s => s.tokens.join(''))).toEqual(['abba', 'ab']);
    });

    test('fails on a missing path', async () => {
        await expect(loadCorpus(path.join(dir, 'missing.txt'), WORDS)).rejects.toMatchObject({
            error: { code: 'INPUT_ERROR', context: path.join(dir, 'missing.txt') },
        });
    });

    test('fails on a corpus without sentences', async () => {
        const file = path.join(dir, 'empty.txt');
        await fs.writeFile(file, ' . \n');
        await expect(loadCorpus(file, WORDS)).rejects.toMatchObject({
            error: { code: 'INPUT_ERROR' },
            message: `Corpus at '${file}' contains no sentences`,
        });
    });

    test('fails on an empty directory', async () => {
        await expect(loadCorpus(dir, WORDS)).rejects.toMatchObject({ error: { code: 'INPUT_ERROR' } });
    });
});
