/**
 * Context Extractor
 *
 * Enumerates every contiguous span of every sentence within the length
 * policy and records the (left, right) context around it, keyed by the
 * span's literal content.
 */

import {
    BOUNDARY,
    createConfigurationError,
} from '../types/index.js';
import type {
    Context,
    ContextSet,
    ExtractionOptions,
    LengthPolicy,
    Sentence,
    Token,
} from '../types/index.js';
import { makeContext, makeSubstring, substringKey } from '../utils/substring.js';

export interface Span {
    start: number;
    /** Exclusive */
    end: number;
}

function isPositiveInteger(value: number): boolean {
    return Number.isInteger(value) && value > 0;
}

/**
 * Reject bounds that cannot describe a substring length.
 * @throws LearnerException with code CONFIGURATION_ERROR
 */
export function validateExtractionOptions(options: ExtractionOptions): void {
    const { minLength, maxLength, contextWidth } = options;
    if (!isPositiveInteger(minLength)) {
        throw createConfigurationError(
            `Minimum substring length must be a positive integer, got ${minLength}`,
            'minLength',
            { minLength }
        );
    }
    if (maxLength !== undefined) {
        if (!isPositiveInteger(maxLength)) {
            throw createConfigurationError(
                `Maximum substring length must be a positive integer, got ${maxLength}`,
                'maxLength',
                { maxLength }
            );
        }
        if (minLength > maxLength) {
            throw createConfigurationError(
                `Minimum substring length ${minLength} exceeds maximum ${maxLength}`,
                'minLength',
                { minLength, maxLength }
            );
        }
    }
    if (contextWidth !== undefined && !isPositiveInteger(contextWidth)) {
        throw createConfigurationError(
            `Context width must be a positive integer, got ${contextWidth}`,
            'contextWidth',
            { contextWidth }
        );
    }
}

/**
 * Spans of a sentence allowed by the policy, shortest first.
 * The whole sentence is never yielded.
 */
export function* enumerateSpans(length: number, policy: LengthPolicy): Generator<Span> {
    const longest = Math.min(policy.maxLength ?? Infinity, length - 1);
    for (let size = policy.minLength; size <= longest; size++) {
        for (let start = 0; start + size <= length; start++) {
            yield { start, end: start + size };
        }
    }
}

/**
 * Context of tokens[start, end). Without a width each side runs to the
 * sentence edge; with one, the boundary marker appears only if the edge
 * is within reach.
 */
export function contextAt(tokens: readonly Token[], span: Span, contextWidth?: number): Context {
    const prefix = tokens.slice(0, span.start);
    const suffix = tokens.slice(span.end);

    const left = contextWidth === undefined || prefix.length <= contextWidth
        ? [BOUNDARY.start, ...prefix]
        : prefix.slice(prefix.length - contextWidth);
    const right = contextWidth === undefined || suffix.length <= contextWidth
        ? [...suffix, BOUNDARY.end]
        : suffix.slice(0, contextWidth);

    return makeContext(left, right);
}

export class ContextExtractor {
    constructor(private readonly options: ExtractionOptions) {
        validateExtractionOptions(options);
    }

    extract(sentences: readonly Sentence[]): ContextSet {
        const contextSet: ContextSet = new Map();

        for (const sentence of sentences) {
            const { tokens } = sentence;
            for (const span of enumerateSpans(tokens.length, this.options)) {
                const literal = tokens.slice(span.start, span.end);
                const key = substringKey(literal);
                const context = contextAt(tokens, span, this.options.contextWidth);

                let entry = contextSet.get(key);
                if (!entry) {
                    entry = { substring: makeSubstring(literal), contexts: new Map(), occurrences: 0 };
                    contextSet.set(key, entry);
                }
                entry.occurrences++;
                if (!entry.contexts.has(context.key)) {
                    entry.contexts.set(context.key, context);
                }
            }
        }

        return contextSet;
    }
}

export function extractContexts(sentences: readonly Sentence[], options: ExtractionOptions): ContextSet {
    return new ContextExtractor(options).extract(sentences);
}
