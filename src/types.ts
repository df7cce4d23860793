/**
 * Branded types and the type guards that narrow raw values to them.
 *
 * @packageDocumentation
 */
import type { Bytes20, Bytes32 } from './branded.js';

export type { Bytes20, Bytes32 } from './branded.js';

/**
 * A digest function over bytes, e.g. SHA-256. Must be deterministic and
 * return a fresh array of a fixed length.
 */
export type HashFunction = (data: Uint8Array) => Uint8Array;

// ============================================================================
// Type Guards
// ============================================================================

export function isUInt8(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 0xff;
}

export function isBytes20(value: unknown): value is Bytes20 {
    return value instanceof Uint8Array && value.length === 20;
}

export function isBytes32(value: unknown): value is Bytes32 {
    return value instanceof Uint8Array && value.length === 32;
}
