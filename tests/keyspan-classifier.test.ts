/**
 * Range Classifier Tests
 *
 * 1. Low/high split with rescaling
 * 2. Misaligned high keys fail the whole call
 * 3. Key and option validation
 */
// NOTE: Vitest globals are enabled (see vitest.config.ts).
import { classifyKeys } from '../src/keyspan/classifier.js';
import { InvalidHighKeyError, InvalidKeyError, InvalidOptionError, KeySpanError } from '../src/keyspan/errors.js';
import { CUTOFF } from '../src/keyspan/format.js';

describe('classifyKeys', () => {

    describe('split and rescale', () => {
        it('keeps low keys and rescales high keys by the divisor', () => {
            const { low, high } = classifyKeys([100, 0x10000, 0x10008]);
            expect(low).toEqual([100]);
            expect(high).toEqual([0x10000, 0x10002]);
        });

        it('preserves input order within each range', () => {
            const { low, high } = classifyKeys([CUTOFF + 16, 5, CUTOFF + 4, 3]);
            expect(low).toEqual([5, 3]);
            expect(high).toEqual([CUTOFF + 4, CUTOFF + 1]);
        });

        it('routes the cutoff itself to the high range', () => {
            expect(classifyKeys([CUTOFF - 1, CUTOFF])).toEqual({ low: [CUTOFF - 1], high: [CUTOFF] });
        });

        it('returns empty ranges for empty input', () => {
            expect(classifyKeys([])).toEqual({ low: [], high: [] });
        });

        it('honours a custom cutoff and divisor', () => {
            const { low, high } = classifyKeys([99, 100, 130], { cutoff: 100, divisor: 10 });
            expect(low).toEqual([99]);
            expect(high).toEqual([100, 103]);
        });
    });

    describe('misaligned high keys', () => {
        it('rejects a high key not divisible by 4', () => {
            expect(() => classifyKeys([0x10001])).toThrow(InvalidHighKeyError);
        });

        it('reports the offending key, its index and the divisor', () => {
            let caught: unknown;
            try {
                classifyKeys([1, 0x10004, 0x10006, 0x10008]);
            } catch (err) {
                caught = err;
            }
            expect(caught).toBeInstanceOf(InvalidHighKeyError);
            expect(caught).toBeInstanceOf(KeySpanError);
            if (!(caught instanceof InvalidHighKeyError)) return;
            expect(caught.key).toBe(0x10006);
            expect(caught.index).toBe(2);
            expect(caught.divisor).toBe(4);
            expect(caught.name).toBe('InvalidHighKeyError');
        });

        it('checks alignment relative to a custom cutoff', () => {
            expect(() => classifyKeys([105], { cutoff: 100, divisor: 10 })).toThrow(InvalidHighKeyError);
        });
    });

    describe('validation', () => {
        it('rejects negative keys', () => {
            expect(() => classifyKeys([1, -4])).toThrow(InvalidKeyError);
        });

        it('rejects fractional keys', () => {
            expect(() => classifyKeys([1.5])).toThrow(InvalidKeyError);
        });

        it('rejects a zero divisor', () => {
            expect(() => classifyKeys([1], { divisor: 0 })).toThrow(InvalidOptionError);
        });

        it('rejects a negative cutoff', () => {
            expect(() => classifyKeys([1], { cutoff: -1 })).toThrow(InvalidOptionError);
        });
    });
});
