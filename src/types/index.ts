/**
 * Shared type definitions for the SLG Learner
 */

// Re-export error types
export {
    LearnerException,
    createInputError,
    createConfigurationError,
    createRenderError,
    createDegenerateResultWarning,
    serializeLearnerError,
    isLearnerException,
} from './errors.js';

export type {
    LearnerErrorCode,
    LearnerError,
    LearnerWarning,
} from './errors.js';

export type {
    Token,
    Granularity,
    Segmentation,
    Sentence,
    Corpus,
} from './corpus.js';

export type {
    Substring,
    Context,
    ContextEntry,
    ContextSet,
    ContextBucket,
    Edge,
    SubstitutionGraph,
    CongruenceClass,
} from './graph.js';

export type {
    ContextPattern,
    GrammarFragment,
    ProductionRule,
    Grammar,
} from './grammar.js';

export type {
    Verbosity,
    ReportFormat,
    GraphFormat,
    LogLevel,
    LengthPolicy,
    ExtractionOptions,
    TokenizeOptions,
    LearnerOptions,
} from './options.js';

export { DEFAULTS, BOUNDARY } from './options.js';
