/**
 * Grammar Inducer
 *
 * Turns congruence classes into grammar fragments. Every class becomes a
 * nonterminal; every context in which one of its members occurs becomes an
 * alternative rule body with the nonterminal in the hole. Alongside, the
 * Clark & Eyraud production rules are read off the class members:
 *
 *   A -> a      for a single-token member a of A
 *   A -> B C    for each split u = v w of a member u of A, v in B, w in C
 */

import type {
    CongruenceClass,
    ContextPattern,
    Grammar,
    GrammarFragment,
    Granularity,
    ExtractionOptions,
    ProductionRule,
    Sentence,
} from '../types/index.js';
import { contextAt, enumerateSpans } from '../extraction/contextExtractor.js';
import { classIndex } from '../graph/congruence.js';
import { compareKeys, formatContext, joinTokens, substringKey } from '../utils/substring.js';

export interface InduceOptions extends ExtractionOptions {
    granularity: Granularity;
}

/** Distinct (member, context) observations a class needs to be productive */
export const PRODUCTIVE_THRESHOLD = 2;

interface FragmentBuilder {
    patterns: Map<string, ContextPattern>;
    observations: Set<string>;
}

export function induceGrammar(
    sentences: readonly Sentence[],
    classes: readonly CongruenceClass[],
    options: InduceOptions
): Grammar {
    const memberClass = classIndex(classes);
    const builders = new Map<string, FragmentBuilder>();
    for (const cls of classes) {
        builders.set(cls.id, { patterns: new Map(), observations: new Set() });
    }

    for (const sentence of sentences) {
        const { tokens } = sentence;
        for (const span of enumerateSpans(tokens.length, options)) {
            const key = substringKey(tokens.slice(span.start, span.end));
            const classId = memberClass.get(key);
            if (classId === undefined) continue;
            const builder = builders.get(classId);
            if (!builder) continue;

            const context = contextAt(tokens, span, options.contextWidth);
            const pattern = builder.patterns.get(context.key);
            if (pattern) {
                pattern.count++;
            } else {
                builder.patterns.set(context.key, {
                    context,
                    count: 1,
                    body: formatContext(context, options.granularity, classId),
                });
            }
            builder.observations.add(`${key}\u001d${context.key}`);
        }
    }

    const fragments = new Map<string, GrammarFragment>();
    const productive = new Map<string, GrammarFragment>();
    for (const cls of classes) {
        const builder = builders.get(cls.id);
        if (!builder) continue;
        const patterns = [...builder.patterns.entries()]
            .sort(([a], [b]) => compareKeys(a, b))
            .map(([, pattern]) => pattern);
        const fragment: GrammarFragment = {
            classId: cls.id,
            patterns,
            observations: builder.observations.size,
            productive: builder.observations.size >= PRODUCTIVE_THRESHOLD,
        };
        fragments.set(cls.id, fragment);
        if (fragment.productive) {
            productive.set(cls.id, fragment);
        }
    }

    const alphabet = classes
        .flatMap(cls => cls.members)
        .sort((a, b) => compareKeys(a.key, b.key))
        .map(member => joinTokens(member.tokens, options.granularity));

    const starts: string[] = [];
    const seen = new Set<string>();
    for (const sentence of sentences) {
        const text = joinTokens(sentence.tokens, options.granularity);
        if (seen.has(text)) continue;
        seen.add(text);
        starts.push(text);
    }

    return {
        alphabet,
        nonterminals: classes.map(cls => cls.id),
        starts,
        fragments,
        productive,
        rules: deriveRules(classes, memberClass),
    };
}

/**
 * Lexical and binary rules, deduplicated, in class order
 */
export function deriveRules(
    classes: readonly CongruenceClass[],
    memberClass: Map<string, string> = classIndex(classes)
): ProductionRule[] {
    const rules: ProductionRule[] = [];
    const seen = new Set<string>();

    for (const cls of classes) {
        for (const member of cls.members) {
            const { tokens } = member;
            if (tokens.length === 1) {
                const id = `${cls.id}\u001d${member.key}`;
                if (!seen.has(id)) {
                    seen.add(id);
                    rules.push({ kind: 'lexical', lhs: cls.id, terminal: tokens });
                }
                continue;
            }
            for (let i = 1; i < tokens.length; i++) {
                const left = memberClass.get(substringKey(tokens.slice(0, i)));
                const right = memberClass.get(substringKey(tokens.slice(i)));
                if (left === undefined || right === undefined) continue;
                const id = `${cls.id}\u001d${left}\u001d${right}`;
                if (seen.has(id)) continue;
                seen.add(id);
                rules.push({ kind: 'binary', lhs: cls.id, rhs: [left, right] });
            }
        }
    }

    return rules;
}

export function formatRule(rule: ProductionRule, granularity: Granularity): string {
    return rule.kind === 'lexical'
        ? `${rule.lhs} -> '${joinTokens(rule.terminal, granularity)}'`
        : `${rule.lhs} -> ${rule.rhs[0]} ${rule.rhs[1]}`;
}
