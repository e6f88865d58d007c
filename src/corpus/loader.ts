/**
 * Corpus Loader
 *
 * Reads a corpus file, or every regular file directly inside a directory
 * (sorted by name), and tokenizes it into sentences.
 */

import type { Stats } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { createInputError } from '../types/index.js';
import type { Corpus, Sentence, TokenizeOptions } from '../types/index.js';
import { tokenize } from './tokenizer.js';

async function corpusFiles(inputPath: string): Promise<string[]> {
    let stats: Stats;
    try {
        stats = await fs.stat(inputPath);
    } catch (e) {
        throw createInputError(
            `Cannot read corpus at '${inputPath}': ${(e as Error).message}`,
            inputPath
        );
    }

    if (stats.isFile()) {
        return [inputPath];
    }
    if (!stats.isDirectory()) {
        throw createInputError(`Corpus path '${inputPath}' is neither a file nor a directory`, inputPath);
    }

    const entries = await fs.readdir(inputPath, { withFileTypes: true });
    return entries
        .filter(entry => entry.isFile())
        .map(entry => entry.name)
        .sort()
        .map(name => path.join(inputPath, name));
}

export async function loadCorpus(inputPath: string, options: TokenizeOptions): Promise<Corpus> {
    const files = await corpusFiles(inputPath);
    const sentences: Sentence[] = [];

    for (const file of files) {
        let text: string;
        try {
            text = await fs.readFile(file, 'utf-8');
        } catch (e) {
            throw createInputError(`Cannot read corpus file '${file}': ${(e as Error).message}`, file);
        }
        sentences.push(...tokenize(text, options, sentences.length));
    }

    if (sentences.length === 0) {
        throw createInputError(`Corpus at '${inputPath}' contains no sentences`, inputPath, {
            files: files.length,
        });
    }

    return {
        name: path.basename(inputPath),
        granularity: options.granularity,
        sentences,
    };
}
