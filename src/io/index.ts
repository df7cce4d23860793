/**
 * Binary-to-text codecs.
 *
 * @packageDocumentation
 */

export * as base58 from './base58.js';
export { ALPHABET } from './base58.js';
export {
    base58check,
    createBase58Check,
    CHECKSUM_LENGTH,
    type Base58CheckCodec,
} from './base58check.js';
export { bytesToDigits, digitsToBytes, RADIX } from './radix.js';
