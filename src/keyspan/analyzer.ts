/**
 * Tolerance sweep: classify the keys, then group the high range once per gap
 * tolerance and report how much of each grouping is padding.
 */

import { classifyKeys } from './classifier.js';
import { buildGroups } from './groups.js';
import { calculateGroupMetrics, type GroupMetrics } from './metrics.js';
import { EmptyInputError, InvalidOptionError } from './errors.js';
import { requireNonNegativeInt } from './validate.js';
import { formatSweepRow } from './report.js';
import { TOLERANCE_PRESETS, type AnalyzerOptions } from './types.js';

export interface SweepRow {
    tolerance: number;
    groupCount: number;
    gapSum: number;
    wastedRatio: number;
    metrics: GroupMetrics;
}

export interface SweepResult {
    lowCount: number;
    highCount: number;
    rows: SweepRow[];
}

export function resolveTolerances(options: Pick<AnalyzerOptions, 'tolerances' | 'preset'> = {}): number[] {
    const tolerances = options.tolerances ?? TOLERANCE_PRESETS[options.preset ?? 'standard'];
    if (tolerances.length === 0) {
        throw new InvalidOptionError('tolerances must not be empty');
    }
    return tolerances.map(t => requireNonNegativeInt('tolerance', t));
}

export function analyzeKeys(keys: readonly number[], options: AnalyzerOptions = {}): SweepResult {
    const tolerances = resolveTolerances(options);
    const logger = options.logger ?? null;

    const { low, high } = classifyKeys(keys, { cutoff: options.cutoff, divisor: options.divisor });
    if (high.length === 0) {
        throw new EmptyInputError('No high-range keys to analyze');
    }
    logger?.info?.(`[keyspan] ${low.length} low keys, ${high.length} high keys`);

    const sorted = [...high].sort((a, b) => a - b);
    const rows: SweepRow[] = [];

    for (const tolerance of tolerances) {
        const metrics = calculateGroupMetrics(buildGroups(sorted, tolerance));
        const row: SweepRow = {
            tolerance,
            groupCount: metrics.groupCount,
            gapSum: metrics.gapSum,
            wastedRatio: metrics.wastedRatio,
            metrics,
        };
        rows.push(row);
        logger?.info?.(`[keyspan] ${formatSweepRow(row)}`);
    }

    return { lowCount: low.length, highCount: high.length, rows };
}
