/**
 * @module errors
 * Contract-violation errors.
 *
 * Reads, writes and erases on a matrix are total and never throw. The errors below
 * cover the cases the type system rules out for typed callers but that plain
 * JavaScript (or a matrix built with a non-literal dimension count) can still reach.
 */

export enum MATRIX_ERROR {
    INVALID_DIMENSIONS = 'INVALID_DIMENSIONS',
    ARITY_MISMATCH = 'ARITY_MISMATCH',
    INVALID_COORDINATE = 'INVALID_COORDINATE',
    OUT_OF_RANGE = 'OUT_OF_RANGE',
    INVALID_CAPACITY = 'INVALID_CAPACITY',
}

export class MatrixError extends Error {
    constructor(
        public readonly category: MATRIX_ERROR,
        message?: string,
        public readonly context?: Record<string, unknown>,
    ) {
        super(message ?? category);
        this.name = 'MatrixError';
        Error.captureStackTrace(this, MatrixError);
    }
}

export function isMatrixError(error: unknown): error is MatrixError {
    return error instanceof MatrixError;
}
