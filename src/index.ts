/**
 * keyspan Public API
 *
 * @module keyspan
 */

import { classifyKeys } from './keyspan/classifier.js';
import { buildGroups } from './keyspan/groups.js';
import { GroupLocator, findGroupIndex } from './keyspan/locator.js';
import { calculateGroupMetrics } from './keyspan/metrics.js';
import { analyzeKeys } from './keyspan/analyzer.js';
import { formatReport } from './keyspan/report.js';

export type { KeySpanLogger as Logger, ClassifierOptions, LocatorOptions, AnalyzerOptions, TolerancePreset } from './keyspan/types.js';
export { TOLERANCE_PRESETS } from './keyspan/types.js';
export { CUTOFF, DIVISOR, DEFAULT_PAGE_SIZE, DEFAULT_TOLERANCES, NOT_FOUND } from './keyspan/format.js';
export {
    KeySpanError,
    InvalidHighKeyError,
    InvalidKeyError,
    EmptyInputError,
    UnsortedInputError,
    InvalidOptionError,
} from './keyspan/errors.js';
export { classifyKeys } from './keyspan/classifier.js';
export type { ClassifiedKeys } from './keyspan/classifier.js';
export { buildGroups, groupStarts } from './keyspan/groups.js';
export type { Group } from './keyspan/groups.js';
export { GroupLocator, findGroupIndex } from './keyspan/locator.js';
export { internalGapSum, wastedRatio, calculateGroupMetrics } from './keyspan/metrics.js';
export type { GroupMetrics } from './keyspan/metrics.js';
export { analyzeKeys, resolveTolerances } from './keyspan/analyzer.js';
export type { SweepRow, SweepResult } from './keyspan/analyzer.js';
export { formatPercent, formatSweepRow, formatReport } from './keyspan/report.js';
export { SeededRNG, generateClusteredKeys, generateDenseKeys, generateSparseKeys, DATASET_GENERATORS } from './keyspan/datasets.js';
export type { DatasetName, KeyDataset } from './keyspan/datasets.js';

// The keyspan Namespace Object
export const KeySpan = {
    /**
     * Splits raw keys into the low range and the rescaled high range.
     */
    classify: classifyKeys,

    /**
     * Partitions ascending keys into maximal groups under a gap tolerance.
     */
    group: buildGroups,

    /**
     * One-shot nearest-group lookup.
     */
    locate: findGroupIndex,

    /**
     * Derived statistics over a finalized group list.
     */
    metrics: calculateGroupMetrics,

    /**
     * Runs the tolerance sweep over raw keys.
     */
    analyze: analyzeKeys,

    /**
     * Renders a sweep result as report lines.
     */
    report: formatReport,

    /**
     * Reusable locator over a fixed start table.
     */
    Locator: GroupLocator,
};

export default KeySpan;
