import type { SweepResult, SweepRow } from './analyzer.js';

export function formatPercent(ratio: number): string {
    return `${(ratio * 100).toFixed(2)}%`;
}

/** `<tolerance>: <groups> (<gaps> - <pct>)` */
export function formatSweepRow(row: SweepRow): string {
    return `${row.tolerance}: ${row.groupCount} (${row.gapSum} - ${formatPercent(row.wastedRatio)})`;
}

export function formatReport(result: SweepResult): string[] {
    return [
        `low: ${result.lowCount} | high: ${result.highCount}`,
        ...result.rows.map(formatSweepRow),
    ];
}
