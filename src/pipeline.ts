/**
 * Learner Pipeline
 *
 * Runs the stages in order, each consuming the whole output of the one
 * before: extract contexts, build the substitution graph, resolve
 * congruence classes, induce the grammar. State lives in a PipelineContext
 * created per run.
 */

import {
    createDegenerateResultWarning,
    createInputError,
} from './types/index.js';
import type {
    CongruenceClass,
    ContextSet,
    Corpus,
    Grammar,
    LearnerOptions,
    LearnerWarning,
    SubstitutionGraph,
} from './types/index.js';
import { extractContexts, validateExtractionOptions } from './extraction/contextExtractor.js';
import { buildSubstitutionGraph } from './graph/substitutionGraph.js';
import { resolveCongruenceClasses } from './graph/congruence.js';
import { induceGrammar } from './grammar/inducer.js';
import { silentLogger } from './utils/logger.js';
import type { Logger } from './utils/logger.js';

export type Stage = 'extract' | 'graph' | 'classes' | 'grammar';

export interface LearnerStatistics {
    sentences: number;
    substrings: number;
    /** Distinct contexts over all substrings */
    contexts: number;
    sharedContexts: number;
    edges: number;
    classes: number;
    productiveClasses: number;
    stageMs: Record<Stage, number>;
    timeMs: number;
}

export interface LearnerResult {
    corpus: Corpus;
    contextSet: ContextSet;
    graph: SubstitutionGraph;
    classes: CongruenceClass[];
    grammar: Grammar;
    warnings: LearnerWarning[];
    statistics: LearnerStatistics;
}

interface PipelineContext {
    corpus: Corpus;
    options: LearnerOptions;
    contextSet?: ContextSet;
    graph?: SubstitutionGraph;
    classes?: CongruenceClass[];
    grammar?: Grammar;
    warnings: LearnerWarning[];
    stageMs: Record<Stage, number>;
}

const STAGE_MESSAGES: Record<Stage, string> = {
    extract: 'Extracting contexts',
    graph: 'Building substitution graph',
    classes: 'Resolving congruence classes',
    grammar: 'Inducing grammar',
};

const STAGES: Stage[] = ['extract', 'graph', 'classes', 'grammar'];

function stageOutput<T>(value: T | undefined, stage: Stage): T {
    if (value === undefined) {
        throw new Error(`Pipeline stage '${stage}' did not produce its output`);
    }
    return value;
}

function countDistinctContexts(contextSet: ContextSet): number {
    const keys = new Set<string>();
    for (const entry of contextSet.values()) {
        for (const key of entry.contexts.keys()) {
            keys.add(key);
        }
    }
    return keys.size;
}

export class LearnerPipeline {
    private readonly logger: Logger;

    constructor(logger: Logger = silentLogger) {
        this.logger = logger;
    }

    /**
     * @throws LearnerException CONFIGURATION_ERROR for bad bounds,
     *         INPUT_ERROR for a corpus without sentences
     */
    run(corpus: Corpus, options: LearnerOptions): LearnerResult {
        validateExtractionOptions(options);
        if (corpus.sentences.length === 0) {
            throw createInputError(`Corpus '${corpus.name}' contains no sentences`, corpus.name);
        }

        const ctx: PipelineContext = {
            corpus,
            options,
            warnings: [],
            stageMs: { extract: 0, graph: 0, classes: 0, grammar: 0 },
        };

        const started = Date.now();
        STAGES.forEach((stage, i) => {
            options.onProgress?.(i / STAGES.length, STAGE_MESSAGES[stage]);
            const stageStart = Date.now();
            this.runStage(stage, ctx);
            ctx.stageMs[stage] = Date.now() - stageStart;
            this.logger.debug(`${STAGE_MESSAGES[stage]} done`, { ms: ctx.stageMs[stage] });
        });
        options.onProgress?.(1, 'Done');

        const contextSet = stageOutput(ctx.contextSet, 'extract');
        const graph = stageOutput(ctx.graph, 'graph');
        const classes = stageOutput(ctx.classes, 'classes');
        const grammar = stageOutput(ctx.grammar, 'grammar');

        const contexts = countDistinctContexts(contextSet);
        if (graph.edges.length === 0) {
            const warning = createDegenerateResultWarning(graph.nodes.length, contexts);
            ctx.warnings.push(warning);
            this.logger.warn(warning.message);
        }

        return {
            corpus,
            contextSet,
            graph,
            classes,
            grammar,
            warnings: ctx.warnings,
            statistics: {
                sentences: corpus.sentences.length,
                substrings: graph.nodes.length,
                contexts,
                sharedContexts: graph.sharedContexts.size,
                edges: graph.edges.length,
                classes: classes.length,
                productiveClasses: grammar.productive.size,
                stageMs: ctx.stageMs,
                timeMs: Date.now() - started,
            },
        };
    }

    private runStage(stage: Stage, ctx: PipelineContext): void {
        switch (stage) {
            case 'extract':
                ctx.contextSet = extractContexts(ctx.corpus.sentences, ctx.options);
                this.logger.debug('Contexts extracted', { substrings: ctx.contextSet.size });
                break;
            case 'graph':
                ctx.graph = buildSubstitutionGraph(stageOutput(ctx.contextSet, 'extract'));
                this.logger.debug('Graph built', { nodes: ctx.graph.nodes.length, edges: ctx.graph.edges.length });
                break;
            case 'classes':
                ctx.classes = resolveCongruenceClasses(stageOutput(ctx.graph, 'graph'));
                break;
            case 'grammar':
                ctx.grammar = induceGrammar(ctx.corpus.sentences, stageOutput(ctx.classes, 'classes'), {
                    minLength: ctx.options.minLength,
                    maxLength: ctx.options.maxLength,
                    contextWidth: ctx.options.contextWidth,
                    granularity: ctx.corpus.granularity,
                });
                break;
        }
    }
}

export function learn(corpus: Corpus, options: LearnerOptions, logger?: Logger): LearnerResult {
    return new LearnerPipeline(logger).run(corpus, options);
}
