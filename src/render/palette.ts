import type { CongruenceClass } from '../types/index.js';

// Tableau 10
export const CLASS_COLORS = [
    '#4e79a7', '#f28e2b', '#e15759', '#76b7b2', '#59a14f',
    '#edc948', '#b07aa1', '#ff9da7', '#9c755f', '#bab0ac',
] as const;

export const SINGLETON_COLOR = '#d9d9d9';

/**
 * Node key -> fill colour; singleton classes share a neutral grey
 */
export function classColors(classes: readonly CongruenceClass[]): Map<string, string> {
    const colors = new Map<string, string>();
    let next = 0;
    for (const cls of classes) {
        let color: string = SINGLETON_COLOR;
        if (cls.members.length > 1) {
            color = CLASS_COLORS[next % CLASS_COLORS.length];
            next++;
        }
        for (const member of cls.members) {
            colors.set(member.key, color);
        }
    }
    return colors;
}
