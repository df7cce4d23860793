/**
 * Address version parameters.
 *
 * @packageDocumentation
 */

export interface Network {
    readonly name: string;
    /** Version byte written in front of a pay-to-pubkey-hash address. */
    readonly pubKeyHash: number;
    /**
     * Highest version byte accepted on decode. Any version from 0 up to and
     * including this value passes; it is not an equality check.
     */
    readonly maxVersion: number;
}

export const bitcoin: Network = Object.freeze({
    name: 'bitcoin',
    pubKeyHash: 0x00,
    maxVersion: 0x00,
});

export const testnet: Network = Object.freeze({
    name: 'testnet',
    pubKeyHash: 0x6f,
    maxVersion: 0x6f,
});
