import { DEFAULT_PAGE_SIZE, NOT_FOUND } from './format.js';
import { UnsortedInputError } from './errors.js';
import { requireKey, requirePositiveInt } from './validate.js';
import { groupStarts, type Group } from './groups.js';
import type { LocatorOptions } from './types.js';

/**
 * Nearest-group lookup over a finalized group list.
 *
 * Holds the start table (first key of each group) and answers which group a
 * value belongs to within a page window. Read-only after construction.
 */
export class GroupLocator {
    private readonly table: readonly number[];
    public readonly pageSize: number;

    constructor(starts: readonly number[], options: LocatorOptions = {}) {
        this.pageSize = requirePositiveInt('pageSize', options.pageSize ?? DEFAULT_PAGE_SIZE);
        for (let i = 0; i < starts.length; i++) {
            requireKey(starts[i], i);
            if (i > 0 && starts[i] < starts[i - 1]) throw new UnsortedInputError(i, starts[i - 1], starts[i]);
        }
        this.table = [...starts];
    }

    /**
     * Groups built by {@link buildGroups} are already in ascending start
     * order, so only extraction is needed.
     */
    static fromGroups(groups: readonly Group[], options: LocatorOptions = {}): GroupLocator {
        return new GroupLocator(groupStarts(groups), options);
    }

    get size(): number {
        return this.table.length;
    }

    get starts(): readonly number[] {
        return this.table;
    }

    startOf(index: number): number | undefined {
        return this.table[index];
    }

    /**
     * Index of the group whose start lies strictly within `pageSize` of `x`,
     * or {@link NOT_FOUND}. When both neighbours of the insertion point
     * qualify the earlier group wins.
     */
    locate(x: number): number {
        const starts = this.table;
        if (starts.length === 0) return NOT_FOUND;

        const pos = this.lowerBound(x);

        // pos - 1 is checked first: it is the smaller index
        if (pos > 0 && Math.abs(starts[pos - 1] - x) < this.pageSize) return pos - 1;
        if (pos < starts.length && Math.abs(starts[pos] - x) < this.pageSize) return pos;
        return NOT_FOUND;
    }

    /** Leftmost position whose start is >= x. */
    private lowerBound(x: number): number {
        let low = 0;
        let high = this.table.length;
        while (low < high) {
            const mid = (low + high) >>> 1;
            if (this.table[mid] < x) low = mid + 1;
            else high = mid;
        }
        return low;
    }
}

/** One-shot lookup; builds the start table on every call. */
export function findGroupIndex(groups: readonly Group[], x: number, pageSize: number = DEFAULT_PAGE_SIZE): number {
    return GroupLocator.fromGroups(groups, { pageSize }).locate(x);
}
