/**
 * Hash functions used by the checksum and address codecs.
 *
 * @packageDocumentation
 */
import { ripemd160 as nobleRipemd160 } from '@noble/hashes/legacy.js';
import { sha256 as nobleSha256 } from '@noble/hashes/sha2.js';
import type { Bytes20, Bytes32 } from './branded.js';
import { isBytes20, isBytes32 } from './types.js';

function toBytes32(digest: Uint8Array): Bytes32 {
    if (!isBytes32(digest)) throw new Error(`Expected 32-byte digest, got ${digest.length}`);
    return digest;
}

function toBytes20(digest: Uint8Array): Bytes20 {
    if (!isBytes20(digest)) throw new Error(`Expected 20-byte digest, got ${digest.length}`);
    return digest;
}

export function sha256(data: Uint8Array): Bytes32 {
    return toBytes32(nobleSha256(data));
}

export function ripemd160(data: Uint8Array): Bytes20 {
    return toBytes20(nobleRipemd160(data));
}

/**
 * SHA-256 applied twice. Used for Base58Check checksums.
 */
export function hash256(data: Uint8Array): Bytes32 {
    return toBytes32(nobleSha256(nobleSha256(data)));
}

/**
 * RIPEMD-160(SHA-256(data)), the 20-byte identity of a public key.
 */
export function hash160(data: Uint8Array): Bytes20 {
    return toBytes20(nobleRipemd160(nobleSha256(data)));
}
