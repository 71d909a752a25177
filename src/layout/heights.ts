import { DisplayItem } from '../models/types';

export type SizedItem = Pick<DisplayItem, 'kind' | 'size'>;

export interface HeightAllocation {
    heights: number[];
    total: number;
}

function sum(values: readonly number[]): number {
    return values.reduce((a, b) => a + b, 0);
}

/**
 * Proportional extents under a fixed budget.
 *
 * Gaps take `gapExtent` each, off the top of the budget. The rest is split by
 * byte size, floored, clamped to [minExtent, maxExtent], then nudged toward the
 * budget a step at a time, earlier items first. Gives up after `passLimit`
 * passes or once no item can move.
 */
export function computeHeightsToFit(
    items: readonly SizedItem[],
    minExtent: number,
    maxExtent: number,
    budget: number,
    gapExtent: number,
    passLimit: number = 2000,
): HeightAllocation {
    if (items.length === 0) { return { heights: [], total: 0 }; }

    const gap = items.map(it => it.kind === 'gap');
    const gapCount = gap.filter(Boolean).length;
    const nonGapBudget = Math.max(0, budget - gapCount * gapExtent);

    const sizes = items.map(it => (it.kind === 'gap' ? 0 : Math.max(it.size, 1)));
    const sumSize = sum(sizes) || 1;

    const heights = items.map((it, i) => {
        if (gap[i]) { return gapExtent; }
        const share = Math.floor((sizes[i] / sumSize) * nonGapBudget);
        return Math.max(minExtent, Math.min(maxExtent, share));
    });

    const growable = (): number[] => heights.flatMap((h, i) => (!gap[i] && h < maxExtent ? [i] : []));
    const shrinkable = (): number[] => heights.flatMap((h, i) => (!gap[i] && h > minExtent ? [i] : []));

    let delta = budget - sum(heights);
    let passes = 0;
    while (delta !== 0 && passes < passLimit) {
        passes++;
        if (delta > 0) {
            const eligible = growable();
            if (!eligible.length) { break; }
            const step = Math.max(1, Math.floor(delta / eligible.length));
            for (const i of eligible) {
                const add = Math.min(step, maxExtent - heights[i], delta);
                heights[i] += add;
                delta -= add;
                if (delta === 0) { break; }
            }
        } else {
            const eligible = shrinkable();
            if (!eligible.length) { break; }
            const need = -delta;
            const step = Math.max(1, Math.floor(need / eligible.length));
            let remaining = need;
            for (const i of eligible) {
                const sub = Math.min(step, heights[i] - minExtent, remaining);
                heights[i] -= sub;
                remaining -= sub;
                if (remaining === 0) { break; }
            }
            delta = -remaining;
        }
    }

    return { heights, total: sum(heights) };
}

export function computeCompactHeights(
    items: readonly SizedItem[],
    minExtent: number,
    gapExtent: number,
): HeightAllocation {
    const heights = items.map(it => (it.kind === 'gap' ? gapExtent : minExtent));
    return { heights, total: sum(heights) };
}

/** Extent needed to show every item at its minimum. */
export function minimumExtent(items: readonly SizedItem[], minExtent: number, gapExtent: number): number {
    return computeCompactHeights(items, minExtent, gapExtent).total;
}

/**
 * Budget for the top level: the viewport (never below `minViewport`), raised
 * when the items cannot fit at their minimum extents.
 */
export function topLevelBudget(
    items: readonly SizedItem[],
    minExtent: number,
    gapExtent: number,
    viewport: number,
    minViewport: number,
): number {
    return Math.max(minimumExtent(items, minExtent, gapExtent), Math.max(minViewport, viewport));
}
