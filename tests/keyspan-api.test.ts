import KeySpan, { GroupLocator, NOT_FOUND } from '../src/index.js';

describe('KeySpan namespace', () => {
    it('exposes the pipeline end to end', () => {
        const { high } = KeySpan.classify([100, 0x10000, 0x10004, 0x10008, 0x10400]);
        expect(high).toEqual([0x10000, 0x10001, 0x10002, 0x10100]);

        const groups = KeySpan.group(high, 1);
        expect(groups).toEqual([[0x10000, 0x10001, 0x10002], [0x10100]]);
        expect(KeySpan.metrics(groups).gapSum).toBe(0);

        expect(KeySpan.locate(groups, 0x10100 + 10, 64)).toBe(1);
        expect(KeySpan.locate(groups, 0x10080, 64)).toBe(NOT_FOUND);
    });

    it('exports the locator class', () => {
        expect(KeySpan.Locator).toBe(GroupLocator);
    });

    it('renders a report', () => {
        const lines = KeySpan.report(KeySpan.analyze([0x10000, 0x10004, 0x10010], { tolerances: [1, 4] }));
        expect(lines).toEqual([
            'low: 0 | high: 3',
            '1: 2 (0 - 0.00%)',
            '4: 1 (2 - 40.00%)',
        ]);
    });
});
