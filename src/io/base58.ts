/**
 * Base58 encoding/decoding over the Bitcoin alphabet, which omits
 * `0`, `O`, `I` and `l`.
 *
 * @packageDocumentation
 */
import { CodecErrorCode, fail, ok, unwrap, type CodecResult } from '../errors.js';
import { concat, countLeadingZeros } from '../uint8array-utils.js';
import { bytesToDigits, digitsToBytes } from './radix.js';

/** Digit value of a character is its index in this string. */
export const ALPHABET = '123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz';

const ZERO_SYMBOL = ALPHABET[0];

const ALPHABET_MAP: ReadonlyMap<string, number> = new Map(
    Array.from(ALPHABET, (char, index) => [char, index] as const),
);

const WHITESPACE = ' \t\n\v\f\r';

function isWhitespace(char: string): boolean {
    return WHITESPACE.includes(char);
}

function isBlankFrom(text: string, start: number): boolean {
    for (let i = start; i < text.length; i++) {
        if (!isWhitespace(text[i])) return false;
    }
    return true;
}

/**
 * Encodes bytes as Base58 text. Each leading zero byte becomes one `'1'`.
 *
 * @example
 * ```typescript
 * encode(Uint8Array.of(0x61));       // '2g'
 * encode(Uint8Array.of(0, 0, 0x01)); // '112'
 * encode(new Uint8Array(0));         // ''
 * ```
 */
export function encode(bytes: Uint8Array): string {
    if (bytes.length === 0) return '';

    const digits = bytesToDigits(bytes);
    let result = ZERO_SYMBOL.repeat(countLeadingZeros(bytes));
    for (let i = digits.length - 1; i >= 0; i--) {
        result += ALPHABET[digits[i]];
    }
    return result;
}

/**
 * Decodes Base58 text.
 *
 * Leading whitespace is skipped and trailing whitespace ends the scan. Any
 * other character outside the alphabet fails with
 * {@link CodecErrorCode.InvalidCharacter}; `details.character` is the whole
 * code point and `details.index` its UTF-16 offset in the original `text`.
 * Empty or blank text decodes to an empty array.
 */
export function decode(text: string): CodecResult<Uint8Array> {
    let start = 0;
    while (start < text.length && isWhitespace(text[start])) start++;

    const digits: number[] = [];
    for (let i = start; i < text.length; ) {
        const codePoint = text.codePointAt(i) ?? 0;
        const char = String.fromCodePoint(codePoint);
        const digit = ALPHABET_MAP.get(char);
        if (digit === undefined) {
            if (isBlankFrom(text, i)) break;
            return fail(
                CodecErrorCode.InvalidCharacter,
                `Invalid base58 character ${JSON.stringify(char)} at index ${i}`,
                { character: char, index: i },
            );
        }
        digits.push(digit);
        i += char.length;
    }

    let leadingZeros = 0;
    while (leadingZeros < digits.length && digits[leadingZeros] === 0) leadingZeros++;

    return ok(concat([new Uint8Array(leadingZeros), digitsToBytes(digits)]));
}

/**
 * Decodes Base58 text, throwing instead of returning a failed result.
 *
 * @throws CodecError with code InvalidCharacter
 */
export function decodeOrThrow(text: string): Uint8Array {
    return unwrap(decode(text));
}

/**
 * True if `text` decodes as Base58.
 */
export function isBase58(text: string): boolean {
    return decode(text).success;
}
