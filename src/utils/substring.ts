/**
 * Substring and context keys
 *
 * Keys join tokens with control characters so that equality by key is
 * equality by literal content, even when a character token is a space.
 */
import { BOUNDARY } from '../types/index.js';
import type { Context, Granularity, Substring, Token } from '../types/index.js';

export const TOKEN_SEPARATOR = '\u001f';
const SIDE_SEPARATOR = '\u001e';

export function substringKey(tokens: readonly Token[]): string {
    return tokens.join(TOKEN_SEPARATOR);
}

export function makeSubstring(tokens: readonly Token[]): Substring {
    return { key: substringKey(tokens), tokens: [...tokens] };
}

export function tokensOf(key: string): Token[] {
    return key.split(TOKEN_SEPARATOR);
}

export function makeContext(left: readonly Token[], right: readonly Token[]): Context {
    return {
        key: `${substringKey(left)}${SIDE_SEPARATOR}${substringKey(right)}`,
        left: [...left],
        right: [...right],
    };
}

/**
 * Code-unit order, the same on every platform and locale
 */
export function compareKeys(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

export function joinTokens(tokens: readonly Token[], granularity: Granularity): string {
    return granularity === 'char' ? tokens.join('') : tokens.join(' ');
}

export function isBoundary(token: Token): boolean {
    return token === BOUNDARY.start || token === BOUNDARY.end;
}

function renderSide(tokens: readonly Token[], granularity: Granularity): string {
    const parts: string[] = [];
    let run: Token[] = [];
    const flush = () => {
        if (run.length > 0) {
            parts.push(joinTokens(run, granularity));
            run = [];
        }
    };
    for (const token of tokens) {
        if (isBoundary(token)) {
            flush();
            parts.push(token);
        } else {
            run.push(token);
        }
    }
    flush();
    return parts.join(' ');
}

/**
 * Context as `left _ right`, or with `hole` in place of the underscore.
 * Boundary markers stay space-separated in char mode.
 */
export function formatContext(context: Context, granularity: Granularity, hole: string = '_'): string {
    return [renderSide(context.left, granularity), hole, renderSide(context.right, granularity)]
        .filter(s => s.length > 0)
        .join(' ');
}
