import fs from 'fs/promises';
import path from 'path';
import { createRenderError } from '../types/index.js';
import type { GraphFormat } from '../types/index.js';
import type { GraphRenderer, RenderInput } from './interface.js';
import { DotRenderer } from './dot.js';
import { SvgRenderer } from './svg.js';

export type { GraphRenderer, RenderInput } from './interface.js';
export { DotRenderer } from './dot.js';
export { SvgRenderer } from './svg.js';

const RENDERERS: Record<GraphFormat, () => GraphRenderer> = {
    svg: () => new SvgRenderer(),
    dot: () => new DotRenderer(),
};

export function createRenderer(format: GraphFormat): GraphRenderer {
    return RENDERERS[format]();
}

/**
 * Render the graph and write it to disk
 * @throws LearnerException with code RENDER_ERROR
 */
export async function renderToFile(renderer: GraphRenderer, input: RenderInput, filePath: string): Promise<void> {
    let content: string;
    try {
        content = renderer.render(input);
    } catch (e) {
        throw createRenderError((e as Error).message, { format: renderer.format });
    }
    try {
        await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
        await fs.writeFile(filePath, content, 'utf-8');
    } catch (e) {
        throw createRenderError(`cannot write '${filePath}': ${(e as Error).message}`, { path: filePath });
    }
}
