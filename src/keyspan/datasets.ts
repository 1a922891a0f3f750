import { CUTOFF, DIVISOR } from './format.js';

const MODULUS = 2147483647; // 2^31 - 1
const MULTIPLIER = 16807;

/**
 * Deterministic source for synthetic key sets: the same seed always yields
 * the same keys, so generated datasets are reproducible across runs.
 */
export class SeededRNG {
    private state: number;

    constructor(seed: number) {
        this.state = seed % MODULUS;
        if (this.state <= 0) this.state += MODULUS - 1;
    }

    /** Uniform in [0, 1). */
    next(): number {
        this.state = (this.state * MULTIPLIER) % MODULUS;
        return (this.state - 1) / (MODULUS - 1);
    }

    /** Uniform integer in [min, max). */
    nextInt(min: number, max: number): number {
        return Math.floor(this.next() * (max - min)) + min;
    }
}

export type DatasetName = 'clustered' | 'dense' | 'sparse';

export interface KeyDataset {
    name: DatasetName;
    seed: number;
    /** Raw ascending keys: low keys first, then divisor-aligned high keys. */
    keys: number[];
}

/**
 * Up to `count` ascending keys below the cutoff. Steps average 4, so the
 * walk reaches the cutoff after about 16k keys and stops there; beyond that
 * the low share of a dataset falls below the requested tenth.
 */
function lowKeys(rng: SeededRNG, count: number): number[] {
    const out: number[] = [];
    let current = rng.nextInt(0, 16);
    for (let i = 0; i < count && current < CUTOFF; i++) {
        out.push(current);
        current += rng.nextInt(1, 8);
    }
    return out;
}

/** Converts scaled high-range offsets back into raw keys. */
function rawHighKeys(offsets: number[]): number[] {
    return offsets.map(o => CUTOFF + o * DIVISOR);
}

/**
 * Tight clusters of 8-63 keys with 1-3 unit inner gaps, separated by
 * 100-2000 unit holes.
 */
export function generateClusteredKeys(count: number, seed: number): KeyDataset {
    const rng = new SeededRNG(seed);
    const low = lowKeys(rng, Math.floor(count / 10));
    const offsets: number[] = [];
    let current = 0;

    while (low.length + offsets.length < count) {
        const clusterSize = rng.nextInt(8, 64);
        for (let i = 0; i < clusterSize && low.length + offsets.length < count; i++) {
            offsets.push(current);
            current += rng.nextInt(1, 4);
        }
        current += rng.nextInt(100, 2000);
    }

    return { name: 'clustered', seed, keys: [...low, ...rawHighKeys(offsets)] };
}

/** Nearly contiguous high range with rare small holes. */
export function generateDenseKeys(count: number, seed: number): KeyDataset {
    const rng = new SeededRNG(seed);
    const low = lowKeys(rng, Math.floor(count / 10));
    const offsets: number[] = [];
    let current = 0;

    while (low.length + offsets.length < count) {
        offsets.push(current);
        current += rng.next() < 0.05 ? rng.nextInt(2, 10) : 1;
    }

    return { name: 'dense', seed, keys: [...low, ...rawHighKeys(offsets)] };
}

/** Uniformly scattered high keys with gaps of 1-255 units. */
export function generateSparseKeys(count: number, seed: number): KeyDataset {
    const rng = new SeededRNG(seed);
    const low = lowKeys(rng, Math.floor(count / 10));
    const offsets: number[] = [];
    let current = 0;

    while (low.length + offsets.length < count) {
        offsets.push(current);
        current += rng.nextInt(1, 256);
    }

    return { name: 'sparse', seed, keys: [...low, ...rawHighKeys(offsets)] };
}

export const DATASET_GENERATORS: Record<DatasetName, (count: number, seed: number) => KeyDataset> = {
    clustered: generateClusteredKeys,
    dense: generateDenseKeys,
    sparse: generateSparseKeys,
};
