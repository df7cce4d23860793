/**
 * Version-byte address encoding on top of Base58Check.
 *
 * An address is `Base58Check(version || hash160)`: a 1-byte version followed
 * by a 20-byte hash, 21 bytes before the checksum.
 *
 * @packageDocumentation
 */
import type { Bytes20 } from './branded.js';
import { hash160 } from './crypto.js';
import { CodecErrorCode, fail, ok, unwrap, type CodecResult } from './errors.js';
import { base58check, type Base58CheckCodec } from './io/base58check.js';
import { bitcoin, type Network } from './networks.js';
import { isBytes20, isUInt8, type HashFunction } from './types.js';

export const HASH160_LENGTH = 20;
export const ADDRESS_PAYLOAD_LENGTH = 1 + HASH160_LENGTH;

/** base58check address decode result */
export interface AddressHash {
    /** address version byte */
    readonly version: number;
    /** 20-byte hash the address commits to */
    readonly hash: Bytes20;
}

function assertMaxVersion(maxVersion: number): void {
    if (!isUInt8(maxVersion)) throw new TypeError('Expected UInt8 maxVersion');
}

/**
 * Encode a 20-byte hash to a Base58Check address with the given version.
 *
 * @throws TypeError if `version` is not a byte or `hash` is not 20 bytes
 *
 * @example
 * ```typescript
 * hashToAddress(0x00, new Uint8Array(20)); // '1111111111111111111114oLvT2'
 * ```
 */
export function hashToAddress(
    version: number,
    hash: Uint8Array,
    checksum: Base58CheckCodec = base58check,
): string {
    if (!isUInt8(version)) throw new TypeError('Expected UInt8 version');
    if (!isBytes20(hash)) throw new TypeError('Expected 20 bytes hash');

    const payload = new Uint8Array(ADDRESS_PAYLOAD_LENGTH);
    payload[0] = version;
    payload.set(hash, 1);

    return checksum.encode(payload);
}

/**
 * Decode an address to its version byte and 20-byte hash.
 *
 * Any version from 0 up to and including `maxVersion` is accepted. This is a
 * ceiling, not an exact match: with `maxVersion = 0x6f` a version-0 address
 * passes too. Compare `version` yourself when an exact match is needed.
 *
 * Besides the Base58Check failures (InvalidCharacter, TooShort,
 * ChecksumMismatch) this fails with EmptyPayload, InvalidLength or
 * InvalidVersion.
 *
 * @throws TypeError if `maxVersion` is not a byte
 */
export function addressToHash(
    text: string,
    maxVersion: number = bitcoin.maxVersion,
    checksum: Base58CheckCodec = base58check,
): CodecResult<AddressHash> {
    assertMaxVersion(maxVersion);

    const decoded = checksum.decode(text);
    if (!decoded.success) return decoded;

    const payload = decoded.value;
    if (payload.length === 0) {
        return fail(CodecErrorCode.EmptyPayload, 'Address payload is empty');
    }

    const hash = payload.slice(1);
    if (payload.length !== ADDRESS_PAYLOAD_LENGTH || !isBytes20(hash)) {
        return fail(
            CodecErrorCode.InvalidLength,
            `Address payload is ${payload.length} bytes, expected ${ADDRESS_PAYLOAD_LENGTH}`,
            { expectedLength: ADDRESS_PAYLOAD_LENGTH, actualLength: payload.length },
        );
    }

    const version = payload[0];
    if (version > maxVersion) {
        return fail(
            CodecErrorCode.InvalidVersion,
            `Address version ${version} is above the maximum ${maxVersion}`,
            { version, maxVersion },
        );
    }

    return ok({ version, hash });
}

/**
 * True if `text` decodes to a well-formed address with an accepted version.
 * A `maxVersion` that is not a byte accepts nothing.
 */
export function isValidAddress(
    text: string,
    maxVersion: number = bitcoin.maxVersion,
    checksum: Base58CheckCodec = base58check,
): boolean {
    if (!isUInt8(maxVersion)) return false;
    return addressToHash(text, maxVersion, checksum).success;
}

/**
 * decode address with base58 specification, return address version and address hash if valid
 *
 * @throws CodecError on any decode failure
 */
export function fromBase58Check(
    address: string,
    maxVersion: number = bitcoin.maxVersion,
    checksum: Base58CheckCodec = base58check,
): AddressHash {
    return unwrap(addressToHash(address, maxVersion, checksum));
}

/**
 * Reduce a public key to its 20-byte hash and encode it as a pay-to-pubkey-hash
 * address for `network`.
 *
 * @param hasher - Public key digest, RIPEMD-160(SHA-256) unless given
 * @throws TypeError if `hasher` does not return 20 bytes
 */
export function pubKeyToAddress(
    pubKey: Uint8Array,
    network: Network = bitcoin,
    hasher: HashFunction = hash160,
    checksum: Base58CheckCodec = base58check,
): string {
    const hash = hasher(pubKey);
    if (!isBytes20(hash)) {
        throw new TypeError(`Public key hash must be ${HASH160_LENGTH} bytes, got ${hash.length}`);
    }
    return hashToAddress(network.pubKeyHash, hash, checksum);
}

export interface AddressCodec {
    readonly network: Network;
    toAddress(hash: Uint8Array): string;
    fromAddress(text: string): CodecResult<AddressHash>;
    isValid(text: string): boolean;
    fromPublicKey(pubKey: Uint8Array, hasher?: HashFunction): string;
}

/**
 * Binds the address functions to a network's version parameters and a
 * checksum codec.
 *
 * @example
 * ```typescript
 * const codec = createAddressCodec(networks.testnet);
 * const address = codec.fromPublicKey(pubKey);
 * codec.isValid(address); // true
 * ```
 */
export function createAddressCodec(
    network: Network = bitcoin,
    checksum: Base58CheckCodec = base58check,
): AddressCodec {
    if (!isUInt8(network.pubKeyHash)) throw new TypeError('Expected UInt8 pubKeyHash');
    assertMaxVersion(network.maxVersion);

    return {
        network,
        toAddress: (hash) => hashToAddress(network.pubKeyHash, hash, checksum),
        fromAddress: (text) => addressToHash(text, network.maxVersion, checksum),
        isValid: (text) => isValidAddress(text, network.maxVersion, checksum),
        fromPublicKey: (pubKey, hasher = hash160) =>
            pubKeyToAddress(pubKey, network, hasher, checksum),
    };
}
