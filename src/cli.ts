#!/usr/bin/env node
import 'dotenv/config';
import path from 'path';
import boxen from 'boxen';
import chalk from 'chalk';
import ora from 'ora';
import { infoRequest, resolveConfig } from './config.js';
import type { LearnerConfig } from './config.js';
import { loadCorpus } from './corpus/loader.js';
import { LearnerPipeline } from './pipeline.js';
import type { LearnerResult } from './pipeline.js';
import { createRenderer, renderToFile } from './render/index.js';
import { formatReports, writeReport } from './report/writer.js';
import { sampleCorpora } from './samples.js';
import { createInputError, isLearnerException } from './types/index.js';
import type { Corpus } from './types/index.js';
import { createLogger } from './utils/logger.js';
import type { Logger } from './utils/logger.js';

export const VERSION = '0.3.0';
export const HELP = `
SLG Learner v${VERSION}

Given a corpus of sentences, build the substitution graph of its substrings,
group them into congruence classes and induce a context-free grammar fragment.

Usage:
  slg-learner [options] <file|directory>
  slg-learner --demo

Input:
  -i, --input <path>         Corpus file, or directory of corpus files
  -g, --granularity <g>      word (default) or char
  -t, --toy                  Same as --granularity char: one string per line
  --segment <s>              sentence (split on periods, default) or line
  --lowercase                Lower-case the corpus before tokenizing
  --demo                     Run the built-in sample corpora

Learning:
  --min-length <n>           Shortest substring considered (default 1)
  --max-length <n>           Longest substring considered (default: sentence length - 1)
  --context-width <n>        Tokens kept on each side of a substring (default: to the sentence edge)

Output:
  -o, --output <path>        Report file (default ./SLG_Learner_<time>.txt)
  -p, --print                Print the report to stdout instead of a file
  --format <f>               text (default) or json
  --verbosity <v>            minimal, standard (default) or detailed
  -v, --visualize            Render the substitution graph
  --graph-format <f>         svg (default) or dot
  --graph-output <path>      Graph file (default "<input> - Graph.<ext>")
  --lite                     Never load a graph renderer
  --log-level <l>            silent, error, warn, info (default) or debug

  -h, --help                 Show this help
  --version                  Show version

Environment:
  SLG_INPUT, SLG_OUTPUT, SLG_MIN_LENGTH, SLG_MAX_LENGTH, SLG_CONTEXT_WIDTH,
  SLG_GRANULARITY, SLG_SEGMENT, SLG_GRAPH_FORMAT, SLG_REPORT_FORMAT,
  SLG_VERBOSITY, SLG_LOG_LEVEL (flags take precedence; .env is read)

Examples:
  slg-learner -p corpus.txt
  slg-learner --toy --max-length 3 -v strings.txt
  slg-learner --format json -o grammar.json texts/
`;

export interface CliIO {
    stdout: (text: string) => void;
    stderr: (line: string) => void;
    env: NodeJS.ProcessEnv;
    /** Show a spinner and coloured output */
    interactive: boolean;
    now: () => Date;
}

const defaultIO: CliIO = {
    stdout: text => process.stdout.write(text),
    stderr: line => console.error(line),
    env: process.env,
    interactive: Boolean(process.stderr.isTTY),
    now: () => new Date(),
};

function timestamp(date: Date): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    return `${pad(date.getHours())}_${pad(date.getMinutes())}_${pad(date.getSeconds())}`;
}

export function defaultReportPath(config: LearnerConfig, date: Date): string {
    const ext = config.format === 'json' ? 'json' : 'txt';
    return `./SLG_Learner_${timestamp(date)}.${ext}`;
}

/**
 * One corpus: --graph-output, else beside the input. Several: one file per
 * corpus, in the directory of --graph-output when given.
 */
export function defaultGraphPath(config: LearnerConfig, corpus: Corpus, extension: string, single: boolean): string {
    if (config.graphOutput) {
        return single
            ? config.graphOutput
            : path.join(path.dirname(config.graphOutput), `${corpus.name} - Graph.${extension}`);
    }
    if (single && config.input) {
        // Resolved, so `dir/` yields a sibling of dir rather than a file inside it
        const resolved = path.resolve(config.input);
        return path.join(path.dirname(resolved), `${path.basename(resolved)} - Graph.${extension}`);
    }
    return `${corpus.name} - Graph.${extension}`;
}

async function loadCorpora(config: LearnerConfig): Promise<Corpus[]> {
    if (config.demo) {
        return sampleCorpora();
    }
    if (!config.input) {
        throw createInputError('No corpus given');
    }
    return [await loadCorpus(config.input, {
        granularity: config.granularity,
        segmentation: config.segmentation,
        lowercase: config.lowercase,
    })];
}

async function visualize(config: LearnerConfig, results: readonly LearnerResult[], logger: Logger): Promise<void> {
    if (config.lite) {
        logger.warn('Graph visualization is not available in lite mode; skipping');
        return;
    }
    const renderer = createRenderer(config.graphFormat);
    if (config.graphOutput && results.length > 1) {
        logger.warn(`--graph-output names one file but ${results.length} corpora were learned; writing '<corpus> - Graph.${renderer.extension}' beside it for each`);
    }
    for (const result of results) {
        const file = defaultGraphPath(config, result.corpus, renderer.extension, results.length === 1);
        logger.info(`Rendering graph to ${file}`);
        await renderToFile(renderer, {
            title: result.corpus.name,
            graph: result.graph,
            classes: result.classes,
            granularity: result.corpus.granularity,
        }, file);
    }
}

function summary(results: readonly LearnerResult[], paint: chalk.Chalk): string {
    return results.map(({ corpus, statistics: s }) => [
        paint.bold(corpus.name),
        `${s.sentences} sentences, ${s.substrings} substrings`,
        `${s.edges} edges over ${s.sharedContexts} shared contexts`,
        `${s.classes} classes, ${paint.green(`${s.productiveClasses} productive`)}`,
    ].join('\n')).join('\n\n');
}

/**
 * Run the learner for the given arguments and return the exit status
 */
export async function runCli(argv: readonly string[], io: CliIO = defaultIO): Promise<number> {
    const paint = new chalk.Instance({ level: io.interactive ? chalk.level : 0 });
    let logger: Logger = createLogger({ sink: io.stderr, color: io.interactive });

    const info = infoRequest(argv);
    if (info === 'help') {
        io.stdout(HELP);
        return 0;
    }
    if (info === 'version') {
        io.stdout(`${VERSION}\n`);
        return 0;
    }

    try {
        const config = resolveConfig(argv, io.env);

        logger = createLogger({ level: config.logLevel, sink: io.stderr, color: io.interactive });
        const corpora = await loadCorpora(config);

        const spinner = ora({
            text: 'Learning',
            stream: process.stderr,
            isEnabled: io.interactive && config.logLevel !== 'silent',
            isSilent: !io.interactive,
        }).start();

        const pipeline = new LearnerPipeline(logger);
        const results: LearnerResult[] = [];
        try {
            for (const corpus of corpora) {
                logger.debug(`Corpus ${corpus.name}`, { sentences: corpus.sentences.length });
                results.push(pipeline.run(corpus, {
                    minLength: config.minLength,
                    maxLength: config.maxLength,
                    contextWidth: config.contextWidth,
                    onProgress: (_progress, message) => {
                        spinner.text = `${corpus.name}: ${message}`;
                    },
                }));
            }
        } finally {
            spinner.stop();
        }

        const empty = results.filter(r => r.statistics.substrings === 0);
        if (empty.length > 0) {
            logger.error(`Corpus ${empty.map(r => `'${r.corpus.name}'`).join(', ')} produced no substrings`);
            return 1;
        }

        const report = formatReports(results, { verbosity: config.verbosity, format: config.format });
        if (config.print) {
            io.stdout(report);
        } else {
            const file = config.output ?? defaultReportPath(config, io.now());
            await writeReport(file, report);
            logger.info(`Report written to ${file}`);
        }

        if (config.visualize) {
            await visualize(config, results, logger);
        }

        if (config.logLevel !== 'silent' && config.logLevel !== 'error') {
            io.stderr(boxen(summary(results, paint), {
                title: 'SLG Learner',
                padding: { top: 0, bottom: 0, left: 1, right: 1 },
                borderColor: io.interactive ? 'green' : undefined,
            }));
        }
        return 0;
    } catch (e) {
        if (isLearnerException(e)) {
            logger.error(e.message);
            if (e.error.suggestion) {
                logger.error(e.error.suggestion);
            }
            return 1;
        }
        logger.error(`Unexpected failure: ${(e as Error).message}`);
        return 1;
    }
}

if (require.main === module) {
    runCli(process.argv.slice(2)).then(code => {
        process.exitCode = code;
    }, (e: unknown) => {
        console.error(e);
        process.exitCode = 1;
    });
}
