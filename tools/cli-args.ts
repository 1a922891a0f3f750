/**
 * Argument parsing for tools/analyze.ts. Every token must be a complete
 * decimal integer; empty or partial tokens are errors, never zero.
 */

const INTEGER_TOKEN = /^-?\d+$/;

export function parseInteger(name: string, raw: string): number {
    const token = raw.trim();
    const n = Number(token);
    if (!INTEGER_TOKEN.test(token) || !Number.isSafeInteger(n)) {
        throw new Error(`--${name}: not an integer: "${raw}"`);
    }
    return n;
}

export function parseIntList(name: string, raw: string): number[] {
    return raw.split(',').map(s => parseInteger(name, s));
}

export function getArg(args: readonly string[], name: string): string | undefined {
    const idx = args.indexOf(`--${name}`);
    return idx !== -1 && args[idx + 1] ? args[idx + 1] : undefined;
}
