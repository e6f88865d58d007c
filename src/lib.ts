/**
 * SLG Learner - Library Entry Point
 *
 * Exports the learner for use in other projects. This file should NOT
 * import the CLI, its spinner or its argument parsing.
 */

// Pipeline
export { LearnerPipeline, learn } from './pipeline.js';
export type { LearnerResult, LearnerStatistics, Stage } from './pipeline.js';

// Stages
export {
    ContextExtractor,
    extractContexts,
    enumerateSpans,
    contextAt,
    validateExtractionOptions,
} from './extraction/contextExtractor.js';
export { buildSubstitutionGraph, buildInvertedIndex, areAdjacent } from './graph/substitutionGraph.js';
export { resolveCongruenceClasses, classIndex } from './graph/congruence.js';
export { DisjointSet } from './graph/unionFind.js';
export { induceGrammar, deriveRules, formatRule, PRODUCTIVE_THRESHOLD } from './grammar/inducer.js';

// Corpus
export { loadCorpus } from './corpus/loader.js';
export { tokenize, segment, toSentences } from './corpus/tokenizer.js';

// Output
export { formatReport, formatReports, reportData } from './report/writer.js';
export { createRenderer, renderToFile, DotRenderer, SvgRenderer } from './render/index.js';
export type { GraphRenderer, RenderInput } from './render/index.js';

// Types and Interfaces
export * from './types/index.js';
