/**
 * Report Writer
 *
 * Formats a learner result as a text or JSON report. Verbosity selects
 * how much is included:
 *   minimal   summary, warnings, congruence classes
 *   standard  + vertices, edges, shared contexts, grammar
 *   detailed  + pattern counts, stage timings, the full inverted index
 */

import fs from 'fs/promises';
import path from 'path';
import type { LearnerResult } from '../pipeline.js';
import type { Granularity, ReportFormat, Substring, Verbosity } from '../types/index.js';
import { serializeLearnerError } from '../types/index.js';
import { formatRule } from '../grammar/inducer.js';
import { buildInvertedIndex } from '../graph/substitutionGraph.js';
import { compareKeys, formatContext, joinTokens, tokensOf } from '../utils/substring.js';

export interface ReportOptions {
    verbosity: Verbosity;
    format: ReportFormat;
}

function text(key: string, granularity: Granularity): string {
    return joinTokens(tokensOf(key), granularity);
}

function memberList(members: readonly Substring[], granularity: Granularity): string {
    return `{${members.map(m => joinTokens(m.tokens, granularity)).join(', ')}}`;
}

/** Every context with the substrings seen in it, in key order */
function invertedIndex(result: LearnerResult): Array<{ context: string; members: string[] }> {
    const g = result.corpus.granularity;
    const index = buildInvertedIndex(result.contextSet);
    return [...index.keys()].sort(compareKeys).flatMap(key => {
        const bucket = index.get(key);
        return bucket
            ? [{ context: formatContext(bucket.context, g), members: bucket.members.map(k => text(k, g)) }]
            : [];
    });
}

function section(lines: string[], title: string): void {
    lines.push('', `== ${title} ==`);
}

export function formatTextReport(result: LearnerResult, verbosity: Verbosity): string {
    const { corpus, graph, classes, grammar, statistics, warnings } = result;
    const g = corpus.granularity;
    const lines: string[] = [];

    lines.push(`# ${corpus.name} #`);

    section(lines, 'Summary');
    lines.push(`Granularity: ${g}`);
    lines.push(`Sentences: ${statistics.sentences}`);
    lines.push(`Substrings: ${statistics.substrings}`);
    lines.push(`Distinct contexts: ${statistics.contexts}`);
    lines.push(`Shared contexts: ${statistics.sharedContexts}`);
    lines.push(`Edges: ${statistics.edges}`);
    lines.push(`Congruence classes: ${statistics.classes} (${statistics.productiveClasses} productive)`);
    if (verbosity === 'detailed') {
        const { stageMs } = statistics;
        lines.push(`Time: ${statistics.timeMs}ms (extract ${stageMs.extract}ms, graph ${stageMs.graph}ms, classes ${stageMs.classes}ms, grammar ${stageMs.grammar}ms)`);
    }

    if (warnings.length > 0) {
        section(lines, 'Warnings');
        for (const warning of warnings) {
            lines.push(`! ${warning.message}`);
        }
    }

    if (verbosity !== 'minimal') {
        section(lines, 'Vertices');
        for (const key of graph.nodes) {
            lines.push(text(key, g));
        }

        section(lines, 'Edges');
        for (const edge of graph.edges) {
            lines.push(`${text(edge.source, g)} -- ${text(edge.target, g)}  [${formatContext(edge.witness, g)}]`);
        }

        section(lines, 'Shared Contexts');
        for (const bucket of graph.sharedContexts.values()) {
            lines.push(`${formatContext(bucket.context, g)} : {${bucket.members.map(k => text(k, g)).join(', ')}}`);
        }
    }

    if (verbosity === 'detailed') {
        section(lines, 'Inverted Index');
        for (const entry of invertedIndex(result)) {
            lines.push(`${entry.context} : {${entry.members.join(', ')}}`);
        }
    }

    section(lines, 'Congruence Classes');
    for (const cls of classes) {
        const fragment = grammar.fragments.get(cls.id);
        const flag = fragment?.productive ? 'productive' : 'unproductive (insufficiently attested)';
        lines.push(`${cls.id} ${memberList(cls.members, g)}  ${flag}`);
    }

    if (verbosity !== 'minimal') {
        section(lines, 'Grammar');
        lines.push(`Alphabet: {${grammar.alphabet.join(', ')}}`);
        lines.push(`Nonterminals: ${grammar.nonterminals.join(', ')}`);
        lines.push('Starts:');
        for (const start of grammar.starts) {
            lines.push(`  ${start}`);
        }
        lines.push('Rules:');
        for (const rule of grammar.rules) {
            lines.push(`  ${formatRule(rule, g)}`);
        }
        lines.push('Fragments:');
        for (const fragment of grammar.productive.values()) {
            lines.push(`  ${fragment.classId} (${fragment.observations} observations)`);
            for (const pattern of fragment.patterns) {
                const count = verbosity === 'detailed' ? `  x${pattern.count}` : '';
                lines.push(`    | ${pattern.body}${count}`);
            }
        }
        const unproductive = [...grammar.fragments.values()].filter(f => !f.productive).map(f => f.classId);
        if (unproductive.length > 0) {
            lines.push(`Unproductive: ${unproductive.join(', ')}`);
        }
    }

    return lines.join('\n') + '\n';
}

export function reportData(result: LearnerResult, verbosity: Verbosity): Record<string, unknown> {
    const { corpus, graph, classes, grammar, statistics, warnings } = result;
    const g = corpus.granularity;

    const data: Record<string, unknown> = {
        name: corpus.name,
        granularity: g,
        statistics: verbosity === 'detailed'
            ? statistics
            : { ...statistics, stageMs: undefined, timeMs: undefined },
        warnings: warnings.map(serializeLearnerError),
        classes: classes.map(cls => ({
            id: cls.id,
            members: cls.members.map(m => joinTokens(m.tokens, g)),
            productive: grammar.fragments.get(cls.id)?.productive ?? false,
        })),
    };

    if (verbosity === 'minimal') return data;

    data.graph = {
        nodes: graph.nodes.map(key => text(key, g)),
        edges: graph.edges.map(edge => ({
            source: text(edge.source, g),
            target: text(edge.target, g),
            context: formatContext(edge.witness, g),
        })),
        sharedContexts: [...graph.sharedContexts.values()].map(bucket => ({
            context: formatContext(bucket.context, g),
            members: bucket.members.map(k => text(k, g)),
        })),
    };
    data.grammar = {
        alphabet: grammar.alphabet,
        nonterminals: grammar.nonterminals,
        starts: grammar.starts,
        rules: grammar.rules.map(rule => formatRule(rule, g)),
        fragments: [...grammar.fragments.values()].map(fragment => ({
            classId: fragment.classId,
            productive: fragment.productive,
            observations: fragment.observations,
            patterns: fragment.patterns.map(p => (verbosity === 'detailed' ? { body: p.body, count: p.count } : p.body)),
        })),
    };
    if (verbosity === 'detailed') {
        data.invertedIndex = invertedIndex(result);
    }
    return data;
}

export function formatReport(result: LearnerResult, options: ReportOptions): string {
    return options.format === 'json'
        ? JSON.stringify(reportData(result, options.verbosity), null, 2) + '\n'
        : formatTextReport(result, options.verbosity);
}

export const SECTION_RULE = '='.repeat(79);

/**
 * Several results in one report: text sections separated by a rule, or a
 * JSON array (a single result stays a plain object)
 */
export function formatReports(results: readonly LearnerResult[], options: ReportOptions): string {
    if (results.length === 1) {
        return formatReport(results[0], options);
    }
    if (options.format === 'json') {
        return JSON.stringify(results.map(r => reportData(r, options.verbosity)), null, 2) + '\n';
    }
    return results.map(r => formatTextReport(r, options.verbosity)).join(`\n${SECTION_RULE}\n\n`);
}

/**
 * Write the report, creating the parent directory if needed
 */
export async function writeReport(filePath: string, content: string): Promise<void> {
    await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
}
