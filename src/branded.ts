/**
 * Branded type definitions for fixed-width byte values.
 *
 * @packageDocumentation
 */

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** 32-byte digest, e.g. a double SHA-256. */
export type Bytes32 = Brand<Uint8Array, 'Bytes32'>;
/** 20-byte digest identifying a key or script (Hash160). */
export type Bytes20 = Brand<Uint8Array, 'Bytes20'>;
