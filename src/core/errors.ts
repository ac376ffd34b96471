// src/core/errors.ts

export type PrintCoreErrorCode = 'InvalidGeometry' | 'UnsupportedAlgorithm' | 'BufferSizeMismatch';

/**
 * Base class for configuration and programming errors raised by the image pipeline.
 * These are reported synchronously and never retried.
 */
export class PrintCoreError extends Error {
    constructor(
        readonly code: PrintCoreErrorCode,
        message: string,
    ) {
        super(message);
        this.name = new.target.name;
    }
}

export class InvalidGeometryError extends PrintCoreError {
    constructor(message: string) {
        super('InvalidGeometry', message);
    }
}

export class UnsupportedAlgorithmError extends PrintCoreError {
    constructor(message: string) {
        super('UnsupportedAlgorithm', message);
    }
}

export class BufferSizeMismatchError extends PrintCoreError {
    constructor(message: string) {
        super('BufferSizeMismatch', message);
    }
}
