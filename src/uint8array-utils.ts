/**
 * Uint8Array helpers shared by the codecs.
 * None of them mutate their arguments; every result is a new array.
 *
 * @packageDocumentation
 */

/**
 * Concatenates multiple Uint8Arrays into a single Uint8Array.
 *
 * @example
 * ```typescript
 * const payload = concat([Uint8Array.of(0x00), hash]);
 * // payload.length === 1 + hash.length
 * ```
 */
export function concat(arrays: readonly Uint8Array[]): Uint8Array {
    const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
    const result = new Uint8Array(totalLength);
    let offset = 0;
    for (const arr of arrays) {
        result.set(arr, offset);
        offset += arr.length;
    }
    return result;
}

/**
 * Checks if two Uint8Arrays have the same length and contents.
 */
export function equals(a: Uint8Array, b: Uint8Array): boolean {
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
        if (a[i] !== b[i]) return false;
    }
    return true;
}

/**
 * Converts a hex string (with or without 0x prefix) to a Uint8Array.
 *
 * @throws Error if the string has odd length or a non-hex character
 *
 * @example
 * ```typescript
 * fromHex('0x00ff'); // Uint8Array [0, 255]
 * ```
 */
export function fromHex(hex: string): Uint8Array {
    if (hex.startsWith('0x') || hex.startsWith('0X')) {
        hex = hex.slice(2);
    }
    if (hex.length % 2 !== 0) {
        throw new Error('Invalid hex string: odd length');
    }
    if (!/^[0-9a-fA-F]*$/.test(hex)) {
        throw new Error('Invalid hex string: non-hex character');
    }
    const length = hex.length / 2;
    const result = new Uint8Array(length);
    for (let i = 0; i < length; i++) {
        result[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
    }
    return result;
}

const HEX_CHARS = '0123456789abcdef';

/**
 * Converts a Uint8Array to a lowercase hex string.
 */
export function toHex(bytes: Uint8Array): string {
    let result = '';
    for (let i = 0; i < bytes.length; i++) {
        result += HEX_CHARS[bytes[i] >> 4] + HEX_CHARS[bytes[i] & 0x0f];
    }
    return result;
}

/**
 * Number of zero bytes before the first non-zero byte.
 * An all-zero array returns its length.
 *
 * @example
 * ```typescript
 * countLeadingZeros(fromHex('000001')); // 2
 * countLeadingZeros(new Uint8Array(4)); // 4
 * ```
 */
export function countLeadingZeros(bytes: Uint8Array): number {
    let count = 0;
    while (count < bytes.length && bytes[count] === 0) count++;
    return count;
}
