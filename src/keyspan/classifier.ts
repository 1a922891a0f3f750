import { CUTOFF, DIVISOR } from './format.js';
import { InvalidHighKeyError } from './errors.js';
import { requireKey, requirePositiveInt } from './validate.js';
import type { ClassifierOptions } from './types.js';

export interface ClassifiedKeys {
    /** Keys below the cutoff, unchanged, in input order. */
    low: number[];
    /** Keys at or above the cutoff, rescaled, in input order. */
    high: number[];
}

/**
 * Splits raw keys into the low range and the rescaled high range.
 *
 * High keys map to `cutoff + (key - cutoff) / divisor`. A high key whose
 * offset is not a multiple of the divisor fails the whole call with
 * {@link InvalidHighKeyError}.
 */
export function classifyKeys(keys: readonly number[], options: ClassifierOptions = {}): ClassifiedKeys {
    const cutoff = requirePositiveInt('cutoff', options.cutoff ?? CUTOFF);
    const divisor = requirePositiveInt('divisor', options.divisor ?? DIVISOR);

    const low: number[] = [];
    const high: number[] = [];

    for (let i = 0; i < keys.length; i++) {
        const key = requireKey(keys[i], i);

        if (key < cutoff) {
            low.push(key);
            continue;
        }

        const offset = key - cutoff;
        if (offset % divisor !== 0) throw new InvalidHighKeyError(key, i, divisor);
        high.push(cutoff + offset / divisor);
    }

    return { low, high };
}
