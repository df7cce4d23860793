/**
 * Decode error taxonomy and the tagged result returned by every
 * decode-family operation.
 *
 * @packageDocumentation
 */

export const CodecErrorCode = {
    /** Decode input has a non-alphabet, non-whitespace character. */
    InvalidCharacter: 'InvalidCharacter',
    /** Fewer than 4 bytes decoded, so there is no checksum to split off. */
    TooShort: 'TooShort',
    /** Recomputed checksum differs from the trailing 4 bytes. */
    ChecksumMismatch: 'ChecksumMismatch',
    /** Address payload is empty once the checksum is removed. */
    EmptyPayload: 'EmptyPayload',
    /** Address payload is not version byte + 20-byte hash. */
    InvalidLength: 'InvalidLength',
    /** Version byte is above the accepted maximum. */
    InvalidVersion: 'InvalidVersion',
} as const;

export type CodecErrorCode = (typeof CodecErrorCode)[keyof typeof CodecErrorCode];

/**
 * Structured context attached to a {@link CodecError}. Which fields are set
 * depends on the code.
 */
export interface CodecErrorDetails {
    /** Offending character (InvalidCharacter). */
    readonly character?: string;
    /** Index of the offending character in the original text (InvalidCharacter). */
    readonly index?: number;
    /** Expected byte length (TooShort, InvalidLength). */
    readonly expectedLength?: number;
    /** Actual byte length (TooShort, InvalidLength). */
    readonly actualLength?: number;
    /** Decoded version byte (InvalidVersion). */
    readonly version?: number;
    /** Highest accepted version byte (InvalidVersion). */
    readonly maxVersion?: number;
}

export class CodecError extends Error {
    readonly code: CodecErrorCode;
    readonly details: CodecErrorDetails;

    constructor(code: CodecErrorCode, message: string, details: CodecErrorDetails = {}) {
        super(message);
        this.name = 'CodecError';
        this.code = code;
        this.details = details;
    }
}

export interface CodecSuccess<T> {
    readonly success: true;
    readonly value: T;
}

export interface CodecFailure {
    readonly success: false;
    readonly error: CodecError;
}

/**
 * Result of a decode operation: the decoded value, or the reason decoding
 * stopped.
 *
 * @example
 * ```typescript
 * const result = base58.decode(text);
 * if (result.success) {
 *     use(result.value);
 * } else if (result.error.code === CodecErrorCode.InvalidCharacter) {
 *     highlight(result.error.details.index);
 * }
 * ```
 */
export type CodecResult<T> = CodecSuccess<T> | CodecFailure;

export function ok<T>(value: T): CodecSuccess<T> {
    return { success: true, value };
}

export function fail(
    code: CodecErrorCode,
    message: string,
    details?: CodecErrorDetails,
): CodecFailure {
    return { success: false, error: new CodecError(code, message, details) };
}

/**
 * Returns the decoded value or throws the result's {@link CodecError}.
 */
export function unwrap<T>(result: CodecResult<T>): T {
    if (!result.success) throw result.error;
    return result.value;
}

export function isCodecError(value: unknown): value is CodecError {
    return value instanceof CodecError;
}
