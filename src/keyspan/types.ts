import { DEFAULT_TOLERANCES } from './format.js';

export type KeySpanLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

export type ClassifierOptions = {
    /** First key treated as high. Default 0x10000. */
    cutoff?: number;
    /** Stride of high keys above the cutoff. Default 4. */
    divisor?: number;
};

export type LocatorOptions = {
    /** Exclusive distance window between a query and a group start. Default 1024. */
    pageSize?: number;
};

/**
 * Named tolerance sweeps.
 *
 * - `standard`: powers of two up to 64, the sweep the report has always printed
 * - `fine`: every tolerance from 1 to 8
 * - `coarse`: wide windows for sparse key spaces
 */
export type TolerancePreset = 'standard' | 'fine' | 'coarse';

export const TOLERANCE_PRESETS: Record<TolerancePreset, readonly number[]> = {
    standard: DEFAULT_TOLERANCES,
    fine:     [1, 2, 3, 4, 5, 6, 7, 8],
    coarse:   [64, 128, 256, 512, 1024],
};

export type AnalyzerOptions = ClassifierOptions & {
    /** Gap tolerances to sweep, in report order. Overrides `preset` if both are set. */
    tolerances?: readonly number[];
    /** Tolerance preset. Default: `standard`. */
    preset?: TolerancePreset;
    /** Optional logger hook; the library itself never writes to the console. */
    logger?: KeySpanLogger | null;
};
