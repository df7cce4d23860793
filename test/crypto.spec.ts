import assert from 'assert';
import { describe, it } from 'vitest';

import { hash160, hash256, ripemd160, sha256 } from '../src/crypto.js';
import { isBytes20, isBytes32 } from '../src/types.js';
import { toHex } from '../src/uint8array-utils.js';
import { fromUtf8 } from './bytes.utils.js';

const EMPTY = new Uint8Array(0);

describe('crypto', () => {
    it('sha256', () => {
        assert.strictEqual(
            toHex(sha256(EMPTY)),
            'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
        );
        assert.strictEqual(
            toHex(sha256(fromUtf8('abc'))),
            'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
        );
    });

    it('ripemd160', () => {
        assert.strictEqual(toHex(ripemd160(EMPTY)), '9c1185a5c5e9fc54612808977ee8f548b2258d31');
    });

    it('hash256 is sha256 applied twice', () => {
        const data = fromUtf8('double');
        assert.strictEqual(toHex(hash256(data)), toHex(sha256(sha256(data))));
        assert.strictEqual(toHex(hash256(EMPTY)).slice(0, 8), '5df6e0e2');
    });

    it('hash160 is ripemd160 of sha256', () => {
        const data = fromUtf8('identity');
        assert.strictEqual(toHex(hash160(data)), toHex(ripemd160(sha256(data))));
        assert.strictEqual(toHex(hash160(EMPTY)), 'b472a266d0bd89c13706a4132ccfb16f7c3b9fcb');
    });

    it('returns branded fixed-width digests', () => {
        assert.ok(isBytes32(sha256(EMPTY)));
        assert.ok(isBytes32(hash256(EMPTY)));
        assert.ok(isBytes20(ripemd160(EMPTY)));
        assert.ok(isBytes20(hash160(EMPTY)));
    });
});
