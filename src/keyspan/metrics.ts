import type { Group } from './groups.js';

export interface GroupMetrics {
    groupCount: number;
    keyCount: number;
    /** Integers absent from the keys but lying between two members of one group. */
    gapSum: number;
    /** gapSum / (keyCount + gapSum) */
    wastedRatio: number;
    singletonCount: number;
    largestGroupSize: number;
    meanGroupSize: number;
    /** Largest last - first over all groups. */
    maxGroupSpan: number;
}

const EMPTY_METRICS: GroupMetrics = {
    groupCount: 0,
    keyCount: 0,
    gapSum: 0,
    wastedRatio: 0,
    singletonCount: 0,
    largestGroupSize: 0,
    meanGroupSize: 0,
    maxGroupSpan: 0,
};

/**
 * Sum of (y - x - 1) over consecutive pairs inside each group.
 * Equal neighbours contribute -1.
 */
export function internalGapSum(groups: readonly Group[]): number {
    let gaps = 0;
    for (const g of groups) {
        for (let i = 1; i < g.length; i++) {
            gaps += g[i] - g[i - 1] - 1;
        }
    }
    return gaps;
}

export function wastedRatio(keyCount: number, gaps: number): number {
    const total = keyCount + gaps;
    return total === 0 ? 0 : gaps / total;
}

export function calculateGroupMetrics(groups: readonly Group[]): GroupMetrics {
    if (groups.length === 0) return { ...EMPTY_METRICS };

    let keyCount = 0;
    let singletonCount = 0;
    let largestGroupSize = 0;
    let maxGroupSpan = 0;

    for (const g of groups) {
        keyCount += g.length;
        if (g.length === 1) singletonCount++;
        largestGroupSize = Math.max(largestGroupSize, g.length);
        maxGroupSpan = Math.max(maxGroupSpan, g[g.length - 1] - g[0]);
    }

    const gapSum = internalGapSum(groups);

    return {
        groupCount: groups.length,
        keyCount,
        gapSum,
        wastedRatio: wastedRatio(keyCount, gapSum),
        singletonCount,
        largestGroupSize,
        meanGroupSize: keyCount / groups.length,
        maxGroupSpan,
    };
}
