import assert from 'assert';
import { describe, it } from 'vitest';

import { CodecError, CodecErrorCode, fail, isCodecError, ok, unwrap } from '../src/errors.js';

describe('errors', () => {
    it('builds a success result', () => {
        const result = ok(42);
        assert.strictEqual(result.success, true);
        assert.strictEqual(result.value, 42);
        assert.strictEqual(unwrap(result), 42);
    });

    it('builds a failure result carrying a CodecError', () => {
        const result = fail(CodecErrorCode.TooShort, 'too short', {
            expectedLength: 4,
            actualLength: 1,
        });
        assert.strictEqual(result.success, false);
        assert.ok(result.error instanceof Error);
        assert.strictEqual(result.error.name, 'CodecError');
        assert.strictEqual(result.error.code, 'TooShort');
        assert.strictEqual(result.error.message, 'too short');
        assert.deepStrictEqual(result.error.details, { expectedLength: 4, actualLength: 1 });
    });

    it('defaults details to an empty object', () => {
        assert.deepStrictEqual(new CodecError(CodecErrorCode.EmptyPayload, 'empty').details, {});
    });

    it('unwrap throws the failure error', () => {
        const result = fail(CodecErrorCode.InvalidLength, 'bad length');
        assert.throws(
            () => unwrap(result),
            (err: unknown) => err === result.error,
        );
    });

    it('distinguishes codec errors from other errors', () => {
        assert.strictEqual(isCodecError(new CodecError(CodecErrorCode.InvalidVersion, 'v')), true);
        assert.strictEqual(isCodecError(new TypeError('v')), false);
        assert.strictEqual(isCodecError('InvalidVersion'), false);
    });

    it('has six distinct codes', () => {
        assert.deepStrictEqual(Object.values(CodecErrorCode), [
            'InvalidCharacter',
            'TooShort',
            'ChecksumMismatch',
            'EmptyPayload',
            'InvalidLength',
            'InvalidVersion',
        ]);
    });
});
