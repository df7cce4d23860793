import * as address from './address.js';
import * as crypto from './crypto.js';
import * as base58 from './io/base58.js';
import * as base58checkModule from './io/base58check.js';
import * as networks from './networks.js';

export * as address from './address.js';
export * as crypto from './crypto.js';
export * as networks from './networks.js';
export * from './io/index.js';

export * from './address.js';
export * from './errors.js';
export { hash160, hash256, ripemd160, sha256 } from './crypto.js';
export type { Network } from './networks.js';

export type { Bytes20, Bytes32, HashFunction } from './types.js';
export { isBytes20, isBytes32, isUInt8 } from './types.js';
export { concat, equals, fromHex, toHex, countLeadingZeros } from './uint8array-utils.js';

const codec = {
    address,
    base58,
    base58check: base58checkModule,
    crypto,
    networks,
};

export default codec;
