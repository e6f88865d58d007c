/**
 * Graph Renderer Interface
 *
 * Renderers are side-effect-free consumers of a finished graph: they turn
 * the graph and its classes into file contents and never touch the
 * learner's data.
 */

import type { CongruenceClass, Granularity, GraphFormat, SubstitutionGraph } from '../types/index.js';

export interface RenderInput {
    title: string;
    graph: SubstitutionGraph;
    classes: readonly CongruenceClass[];
    granularity: Granularity;
}

export interface GraphRenderer {
    readonly format: GraphFormat;
    /** File extension, without the dot */
    readonly extension: string;
    render(input: RenderInput): string;
}
