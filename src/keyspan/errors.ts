export class KeySpanError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'KeySpanError';
    }
}

/**
 * A high key whose offset from the cutoff is not a multiple of the divisor.
 * Scaling it would silently lose precision.
 */
export class InvalidHighKeyError extends KeySpanError {
    constructor(
        public readonly key: number,
        public readonly index: number,
        public readonly divisor: number
    ) {
        super(`High key ${key} at index ${index} is not aligned to divisor ${divisor}`);
        this.name = 'InvalidHighKeyError';
    }
}

export class InvalidKeyError extends KeySpanError {
    constructor(public readonly key: number, public readonly index: number) {
        super(`Key at index ${index} is not a non-negative safe integer: ${key}`);
        this.name = 'InvalidKeyError';
    }
}

export class EmptyInputError extends KeySpanError {
    constructor(message: string = 'Cannot group an empty key sequence') {
        super(message);
        this.name = 'EmptyInputError';
    }
}

export class UnsortedInputError extends KeySpanError {
    constructor(
        public readonly index: number,
        public readonly previous: number,
        public readonly value: number
    ) {
        super(`Sequence is not ascending at index ${index} (${value} < ${previous})`);
        this.name = 'UnsortedInputError';
    }
}

export class InvalidOptionError extends KeySpanError {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidOptionError';
    }
}
