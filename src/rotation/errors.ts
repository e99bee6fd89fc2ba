/**
 * Error types raised by the rotating writer and its maintenance worker
 */
export enum RotationErrorType {
    OVERSIZED_WRITE = 'OVERSIZED_WRITE',
    OPEN_FAILURE = 'OPEN_FAILURE',
    ROTATION_FAILURE = 'ROTATION_FAILURE',
    MAINTENANCE_FAILURE = 'MAINTENANCE_FAILURE',
    COMPRESSION_FAILURE = 'COMPRESSION_FAILURE',
}

export class RotationError extends Error {
    constructor(
        message: string,
        public readonly type: RotationErrorType,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'RotationError';
    }
}

/**
 * A single write that can never fit in the file, even right after a rotation
 */
export class OversizedWriteError extends RotationError {
    constructor(public readonly length: number, public readonly maxSize: number) {
        super(
            `write length ${length} exceeds maximum file size ${maxSize}`,
            RotationErrorType.OVERSIZED_WRITE,
        );
        this.name = 'OversizedWriteError';
    }
}

export class OpenFailureError extends RotationError {
    constructor(public readonly path: string, cause: unknown) {
        super(`can't open log file ${path}: ${messageOf(cause)}`, RotationErrorType.OPEN_FAILURE, { cause });
        this.name = 'OpenFailureError';
    }
}

/**
 * Rename or recreate failed mid-rotation. The writer is left without an
 * active file; the next write goes through open-existing-or-new again.
 */
export class RotationFailureError extends RotationError {
    constructor(public readonly path: string, cause: unknown) {
        super(`can't rotate log file ${path}: ${messageOf(cause)}`, RotationErrorType.ROTATION_FAILURE, { cause });
        this.name = 'RotationFailureError';
    }
}

export class CompressionError extends RotationError {
    constructor(public readonly path: string, cause: unknown) {
        super(`failed to compress log file ${path}: ${messageOf(cause)}`, RotationErrorType.COMPRESSION_FAILURE, {
            cause,
        });
        this.name = 'CompressionError';
    }
}

/**
 * Everything that went wrong during one maintenance pass. `cause` is the
 * last error encountered.
 */
export class MaintenanceError extends RotationError {
    constructor(public readonly errors: Error[]) {
        const last = errors[errors.length - 1];
        super(
            `maintenance pass finished with ${errors.length} error(s), last: ${messageOf(last)}`,
            RotationErrorType.MAINTENANCE_FAILURE,
            { cause: last },
        );
        this.name = 'MaintenanceError';
    }
}

export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

function messageOf(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
