/**
 * Base58Check encoding/decoding.
 *
 * Base58Check is Base58 over `payload || checksum`, where the checksum is
 * the first 4 bytes of the payload hashed twice. Bitcoin addresses and WIF
 * keys use it with SHA-256.
 *
 * @packageDocumentation
 */
import { sha256 } from '../crypto.js';
import { CodecErrorCode, fail, ok, unwrap, type CodecResult } from '../errors.js';
import type { HashFunction } from '../types.js';
import { concat, equals, toHex } from '../uint8array-utils.js';
import * as base58 from './base58.js';

export const CHECKSUM_LENGTH = 4;

export interface Base58CheckCodec {
    /** First {@link CHECKSUM_LENGTH} bytes of `hash(hash(payload))`. */
    checksum(payload: Uint8Array): Uint8Array;
    encode(payload: Uint8Array): string;
    /**
     * Decodes and verifies. Fails with InvalidCharacter, TooShort or
     * ChecksumMismatch; on success the value is the payload without checksum.
     */
    decode(text: string): CodecResult<Uint8Array>;
    /** @throws CodecError */
    decodeOrThrow(text: string): Uint8Array;
}

/**
 * Creates a Base58Check codec whose checksum is built from `hash` applied
 * twice.
 *
 * @example
 * ```typescript
 * import { sha256 } from '@noble/hashes/sha2.js';
 *
 * const codec = createBase58Check(sha256);
 * const text = codec.encode(payload);
 * const result = codec.decode(text); // { success: true, value: payload }
 * ```
 */
export function createBase58Check(hash: HashFunction): Base58CheckCodec {
    const checksum = (payload: Uint8Array): Uint8Array => {
        const digest = hash(hash(payload));
        if (digest.length < CHECKSUM_LENGTH) {
            throw new Error(`Checksum hash returned ${digest.length} bytes`);
        }
        return digest.slice(0, CHECKSUM_LENGTH);
    };

    const decode = (text: string): CodecResult<Uint8Array> => {
        const decoded = base58.decode(text);
        if (!decoded.success) return decoded;

        const bytes = decoded.value;
        if (bytes.length < CHECKSUM_LENGTH) {
            return fail(
                CodecErrorCode.TooShort,
                `Decoded data is ${bytes.length} bytes, shorter than the ${CHECKSUM_LENGTH}-byte checksum`,
                { expectedLength: CHECKSUM_LENGTH, actualLength: bytes.length },
            );
        }

        const payload = bytes.slice(0, bytes.length - CHECKSUM_LENGTH);
        const actual = bytes.subarray(bytes.length - CHECKSUM_LENGTH);
        const expected = checksum(payload);
        if (!equals(expected, actual)) {
            return fail(
                CodecErrorCode.ChecksumMismatch,
                `Checksum mismatch: expected ${toHex(expected)}, got ${toHex(actual)}`,
            );
        }
        return ok(payload);
    };

    return {
        checksum,
        encode: (payload: Uint8Array): string =>
            base58.encode(concat([payload, checksum(payload)])),
        decode,
        decodeOrThrow: (text: string): Uint8Array => unwrap(decode(text)),
    };
}

/**
 * Base58Check codec instance using double SHA-256 for the checksum.
 */
export const base58check: Base58CheckCodec = createBase58Check(sha256);

/**
 * Encode a Uint8Array to a Base58Check string.
 */
export function encode(payload: Uint8Array): string {
    return base58check.encode(payload);
}

/**
 * Decode a Base58Check string, verifying its checksum.
 */
export function decode(text: string): CodecResult<Uint8Array> {
    return base58check.decode(text);
}

/**
 * Decode a Base58Check string to a Uint8Array.
 * @throws CodecError if the checksum is invalid or the string is malformed
 */
export function decodeOrThrow(text: string): Uint8Array {
    return base58check.decodeOrThrow(text);
}
