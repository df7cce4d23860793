/**
 * Arbitrary-precision conversion between big-endian bytes and base-58 digit
 * values. Leading zero bytes carry no magnitude, so they produce no digits
 * here; the Base58 codec accounts for them separately.
 *
 * @packageDocumentation
 */
import { fromHex, toHex } from '../uint8array-utils.js';

export const RADIX = 58;

const BIG_RADIX = BigInt(RADIX);

/**
 * Interprets `bytes` as a big-endian unsigned integer and returns its base-58
 * digits, least significant first.
 *
 * @example
 * ```typescript
 * bytesToDigits(Uint8Array.of(0x61)); // [39, 1]  (97 = 1 * 58 + 39)
 * bytesToDigits(Uint8Array.of(0, 0)); // []
 * ```
 */
export function bytesToDigits(bytes: Uint8Array): number[] {
    const digits: number[] = [];
    if (bytes.length === 0) return digits;

    let value = BigInt('0x' + toHex(bytes));
    while (value > 0n) {
        digits.push(Number(value % BIG_RADIX));
        value /= BIG_RADIX;
    }
    return digits;
}

/**
 * Accumulates base-58 digits, most significant first, into the minimal
 * big-endian byte representation of their value. Zero yields an empty array.
 *
 * @throws RangeError if a digit is not an integer in [0, 57]
 */
export function digitsToBytes(digits: readonly number[]): Uint8Array {
    let value = 0n;
    for (let i = 0; i < digits.length; i++) {
        const digit = digits[i];
        if (!Number.isInteger(digit) || digit < 0 || digit >= RADIX) {
            throw new RangeError(`Invalid base-58 digit ${digit} at index ${i}`);
        }
        value = value * BIG_RADIX + BigInt(digit);
    }
    if (value === 0n) return new Uint8Array(0);

    const hex = value.toString(16);
    return fromHex(hex.length % 2 === 0 ? hex : '0' + hex);
}
