/**
 * CLI: Key range analyzer
 *
 * Usage:  tsx tools/analyze.ts [--dataset clustered|dense|sparse|all] [--count N] [--seed N]
 *                              [--tolerances 1,2,4] [--preset standard|fine|coarse] [--keys 1,2,65536]
 *
 * Runs the tolerance sweep over synthetic key sets (or the keys given with
 * --keys) and prints group counts and wasted gap coverage per tolerance.
 */

import {
    analyzeKeys,
    formatReport,
    DATASET_GENERATORS,
    TOLERANCE_PRESETS,
    type AnalyzerOptions,
    type DatasetName,
    type TolerancePreset,
} from '../src/index.js';
import { getArg as readArg, parseInteger, parseIntList } from './cli-args.js';

// --- CLI args ---
const args = process.argv.slice(2);

function getArg(name: string): string | undefined {
    return readArg(args, name);
}

function isDatasetName(name: string): name is DatasetName {
    return Object.keys(DATASET_GENERATORS).includes(name);
}

function isPreset(name: string): name is TolerancePreset {
    return Object.keys(TOLERANCE_PRESETS).includes(name);
}

function buildOptions(): AnalyzerOptions {
    const options: AnalyzerOptions = {};
    const tolerances = getArg('tolerances');
    if (tolerances) options.tolerances = parseIntList('tolerances', tolerances);
    const preset = getArg('preset');
    if (preset) {
        if (!isPreset(preset)) throw new Error(`Unknown preset: ${preset}`);
        options.preset = preset;
    }
    return options;
}

function printReport(label: string, keys: readonly number[], options: AnalyzerOptions) {
    console.log(`\n${'='.repeat(60)}`);
    console.log(`  ${label}`);
    console.log(`${'='.repeat(60)}`);
    for (const line of formatReport(analyzeKeys(keys, options))) {
        console.log(`  ${line}`);
    }
}

// --- Main ---
function main() {
    const options = buildOptions();
    const explicitKeys = getArg('keys');
    if (explicitKeys) {
        printReport('KEYS (command line)', parseIntList('keys', explicitKeys), options);
        return;
    }

    const dataset = getArg('dataset') ?? 'all';
    const count = parseInteger('count', getArg('count') ?? '10000');
    const seed = parseInteger('seed', getArg('seed') ?? '42');
    if (count <= 0) throw new Error(`--count: must be positive, got ${count}`);

    let names: DatasetName[];
    if (dataset === 'all') {
        names = ['clustered', 'dense', 'sparse'];
    } else if (isDatasetName(dataset)) {
        names = [dataset];
    } else {
        throw new Error(`Unknown dataset: ${dataset}`);
    }

    console.log(`keyspan analyzer`);
    console.log(`Datasets: ${names.join(', ')} | Keys: ${count} | Seed: ${seed}`);

    for (const name of names) {
        const { keys } = DATASET_GENERATORS[name](count, seed);
        printReport(`${name.toUpperCase()} (${keys.length} keys)`, keys, options);
    }

    console.log(`\nDone.`);
}

try {
    main();
} catch (err: unknown) {
    console.error(err instanceof Error ? err.stack ?? err.message : String(err));
    process.exit(1);
}
