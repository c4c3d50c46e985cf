// src/utils/errors/errors.ts

export type BitloomErrorKind =
    | 'CapacityExceeded'
    | 'InvalidChannel'
    | 'InvalidImage'
    | 'InvalidUtf8'
    | 'InvalidRules'
    | 'UnsupportedFormat';

/**
 * Base error for every failure raised by the engines, the codecs and the file pipelines.
 * `kind` tells the failures apart without relying on class identity.
 */
export class BitloomError extends Error {
    constructor(
        readonly kind: BitloomErrorKind,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'BitloomError';
    }
}

export class CapacityExceededError extends BitloomError {
    constructor(
        readonly requiredVisits: number,
        readonly availableVisits: number,
    ) {
        super(
            'CapacityExceeded',
            `Payload needs ${requiredVisits} pixel visits but only ${availableVisits} are available.`,
        );
        this.name = 'CapacityExceededError';
    }
}

export class InvalidImageError extends BitloomError {
    constructor(message: string, cause?: unknown) {
        super('InvalidImage', message, { cause });
        this.name = 'InvalidImageError';
    }
}

export function isBitloomError(error: unknown, kind?: BitloomErrorKind): error is BitloomError {
    return error instanceof BitloomError && (kind === undefined || error.kind === kind);
}
