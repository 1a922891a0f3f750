import { EmptyInputError, UnsortedInputError } from './errors.js';
import { requireKey, requireNonNegativeInt } from './validate.js';

/** A maximal run of ascending keys whose consecutive gaps stay within the tolerance. */
export type Group = number[];

/**
 * Partitions an ascending key sequence into maximal groups.
 *
 * Each key is compared only to the last key of the current group: a gap
 * larger than `gap` closes the group. Drift across a group is unbounded,
 * only consecutive gaps are limited.
 */
export function buildGroups(sorted: readonly number[], gap: number): Group[] {
    requireNonNegativeInt('gap', gap);
    if (sorted.length === 0) throw new EmptyInputError();

    let current: Group = [requireKey(sorted[0], 0)];
    const groups: Group[] = [current];

    for (let i = 1; i < sorted.length; i++) {
        const x = requireKey(sorted[i], i);
        const last = current[current.length - 1];
        if (x < last) throw new UnsortedInputError(i, last, x);

        if (x - last > gap) {
            current = [x];
            groups.push(current);
        } else {
            current.push(x);
        }
    }

    return groups;
}

/** First element of every group, in group order. */
export function groupStarts(groups: readonly Group[]): number[] {
    return groups.map(g => g[0]);
}
