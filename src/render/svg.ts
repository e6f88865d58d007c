/**
 * SVG renderer with a circular layout
 *
 * Nodes are placed on a circle in class order, so the members of a class
 * sit next to each other; edges are straight chords labelled at their
 * midpoint with the shared context.
 */

import type { GraphRenderer, RenderInput } from './interface.js';
import { classColors } from './palette.js';
import { formatContext, joinTokens } from '../utils/substring.js';

const MIN_SIZE = 480;
const NODE_SPACING = 36;
const MARGIN = 80;
const NODE_RADIUS = 14;

export function escapeXml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

interface Point {
    x: number;
    y: number;
}

function fixed(n: number): string {
    return n.toFixed(1);
}

export function circularLayout(count: number, size: number): Point[] {
    const center = size / 2;
    if (count === 1) return [{ x: center, y: center }];
    const radius = size / 2 - MARGIN;
    return Array.from({ length: count }, (_, i) => {
        const angle = (2 * Math.PI * i) / count - Math.PI / 2;
        return { x: center + radius * Math.cos(angle), y: center + radius * Math.sin(angle) };
    });
}

export class SvgRenderer implements GraphRenderer {
    readonly format = 'svg' as const;
    readonly extension = 'svg';

    render({ title, graph, classes, granularity }: RenderInput): string {
        const ordered = classes.flatMap(cls => cls.members);
        const size = Math.max(MIN_SIZE, Math.ceil((ordered.length * NODE_SPACING) / Math.PI) + 2 * MARGIN);
        const layout = circularLayout(ordered.length, size);
        const position = new Map<string, Point>();
        ordered.forEach((member, i) => position.set(member.key, layout[i]));
        const colors = classColors(classes);

        const out: string[] = [];
        out.push(`<svg xmlns="http://www.w3.org/2000/svg" width="${size}" height="${size}" viewBox="0 0 ${size} ${size}">`);
        out.push(`  <title>${escapeXml(title)}</title>`);
        out.push(`  <rect width="${size}" height="${size}" fill="#ffffff"/>`);

        out.push('  <g stroke="#999999" stroke-width="1">');
        for (const edge of graph.edges) {
            const a = position.get(edge.source);
            const b = position.get(edge.target);
            if (!a || !b) continue;
            const label = escapeXml(formatContext(edge.witness, granularity));
            out.push(`    <line x1="${fixed(a.x)}" y1="${fixed(a.y)}" x2="${fixed(b.x)}" y2="${fixed(b.y)}"><title>${label}</title></line>`);
        }
        out.push('  </g>');

        out.push('  <g font-family="Helvetica, Arial, sans-serif" font-size="8" fill="#555555" text-anchor="middle">');
        for (const edge of graph.edges) {
            const a = position.get(edge.source);
            const b = position.get(edge.target);
            if (!a || !b) continue;
            const label = escapeXml(formatContext(edge.witness, granularity));
            out.push(`    <text x="${fixed((a.x + b.x) / 2)}" y="${fixed((a.y + b.y) / 2)}">${label}</text>`);
        }
        out.push('  </g>');

        out.push('  <g font-family="Helvetica, Arial, sans-serif" font-size="11" text-anchor="middle">');
        for (const member of ordered) {
            const p = position.get(member.key);
            if (!p) continue;
            const label = escapeXml(joinTokens(member.tokens, granularity));
            out.push(`    <circle cx="${fixed(p.x)}" cy="${fixed(p.y)}" r="${NODE_RADIUS}" fill="${colors.get(member.key)}" stroke="#333333"/>`);
            out.push(`    <text x="${fixed(p.x)}" y="${fixed(p.y - NODE_RADIUS - 4)}">${label}</text>`);
        }
        out.push('  </g>');

        out.push('</svg>');
        return out.join('\n') + '\n';
    }
}
