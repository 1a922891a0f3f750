import { InvalidKeyError, InvalidOptionError } from './errors.js';

export function requireNonNegativeInt(name: string, value: number): number {
    if (!Number.isSafeInteger(value) || value < 0) {
        throw new InvalidOptionError(`${name} must be a non-negative integer, got ${value}`);
    }
    return value;
}

export function requirePositiveInt(name: string, value: number): number {
    if (!Number.isSafeInteger(value) || value <= 0) {
        throw new InvalidOptionError(`${name} must be a positive integer, got ${value}`);
    }
    return value;
}

/** Keys are non-negative safe integers; anything else breaks gap arithmetic. */
export function requireKey(key: number, index: number): number {
    if (!Number.isSafeInteger(key) || key < 0) throw new InvalidKeyError(key, index);
    return key;
}
