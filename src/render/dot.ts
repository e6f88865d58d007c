/**
 * Graphviz DOT renderer
 */

import type { GraphRenderer, RenderInput } from './interface.js';
import { classColors } from './palette.js';
import { formatContext, joinTokens } from '../utils/substring.js';

export function escapeDot(text: string): string {
    return text.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

export class DotRenderer implements GraphRenderer {
    readonly format = 'dot' as const;
    readonly extension = 'dot';

    render({ title, graph, classes, granularity }: RenderInput): string {
        const colors = classColors(classes);
        const ids = new Map<string, string>();
        graph.nodes.forEach((key, i) => ids.set(key, `n${i}`));

        const lines: string[] = [];
        lines.push(`graph "${escapeDot(title)}" {`);
        lines.push('    node [shape=ellipse, style=filled, fontname="Helvetica"];');
        lines.push('    edge [fontname="Helvetica", fontsize=9];');

        for (const cls of classes) {
            lines.push(`    // ${cls.id}`);
            for (const member of cls.members) {
                const label = escapeDot(joinTokens(member.tokens, granularity));
                lines.push(`    ${ids.get(member.key)} [label="${label}", fillcolor="${colors.get(member.key)}"];`);
            }
        }

        for (const edge of graph.edges) {
            const label = escapeDot(formatContext(edge.witness, granularity));
            lines.push(`    ${ids.get(edge.source)} -- ${ids.get(edge.target)} [label="${label}"];`);
        }

        lines.push('}');
        return lines.join('\n') + '\n';
    }
}
