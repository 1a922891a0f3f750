/** Keys below this value are "low" and pass through unchanged. */
export const CUTOFF = 0x10000;

/** High keys are stored at this stride above the cutoff. */
export const DIVISOR = 4;

/** Default locator window: a query matches a group start closer than this. */
export const DEFAULT_PAGE_SIZE = 1024;

export const DEFAULT_TOLERANCES: readonly number[] = [1, 2, 4, 8, 16, 32, 64];

/** Returned by the locator when no group start lies inside the window. */
export const NOT_FOUND = -1;
