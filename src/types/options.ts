import type { Granularity, Segmentation } from './corpus.js';

export type Verbosity = 'minimal' | 'standard' | 'detailed';

export type ReportFormat = 'text' | 'json';

export type GraphFormat = 'svg' | 'dot';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

/**
 * Inclusive substring length bounds
 */
export interface LengthPolicy {
    minLength: number;
    /** Undefined: up to sentence length minus one */
    maxLength?: number;
}

export interface ExtractionOptions extends LengthPolicy {
    /** Tokens kept on each side of a span; undefined keeps everything up to the sentence edge */
    contextWidth?: number;
}

export interface TokenizeOptions {
    granularity: Granularity;
    segmentation: Segmentation;
    lowercase: boolean;
}

export interface LearnerOptions extends ExtractionOptions {
    /**
     * Callback for progress updates.
     * @param progress A number between 0 and 1 (if known) or undefined.
     * @param message A descriptive message about the current step.
     */
    onProgress?: (progress: number | undefined, message: string) => void;
}

export const DEFAULTS = {
    minLength: 1,
    granularity: 'word',
    segmentation: 'sentence',
    verbosity: 'standard',
    reportFormat: 'text',
    graphFormat: 'svg',
    logLevel: 'info',
} as const;

export const BOUNDARY = {
    start: '<s>',
    end: '</s>',
} as const;
