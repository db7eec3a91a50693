/**
 * Writes `n` big endian into `len` bytes
 * @throws if `n` is negative or does not fit
 */
export function uint8_fromBigInt(n: bigint, len: number): Uint8Array {
    let buf = new Uint8Array(len);

    if (n < 0n || n >> BigInt(len * 8) > 0n) {
        throw new Error(n + ": does not fit in specified size")
    }

    let i = len;
    while (i-- > 0 && n > 0n) {
        buf[i] = Number(n & 0xffn);
        n >>= 8n;
    }

    return buf;
}

/** Reads the whole array as a big endian unsigned integer */
export function uint8_toBigInt(source: Uint8Array): bigint {
    let n = 0n;

    for (let i = 0; i < source.byteLength; i++) {
        n = (n << 8n) | BigInt(source[i]);
    }

    return n;
}

export function uint8_readUint16BE(source: Uint8Array, offset = 0) {
    offset = offset >>> 0; // make positive
    return (source[offset] << 8)
        + (source[offset + 1])
}
