/**
 * UTF-8 encodes a string, for building readable test payloads.
 */
export function fromUtf8(str: string): Uint8Array {
    return new TextEncoder().encode(str);
}
