/**
 * Creates a mask with the top `maskLength` bits of `addressLength` set
 * @returns mask, or -1n if `maskLength` does not fit
 */
export function createPrefixMask(addressLength: number, maskLength: number): bigint {
    if (!Number.isInteger(maskLength) || maskLength < 0 || maskLength > addressLength) {
        return -1n;
    }

    let all = (1n << BigInt(addressLength)) - 1n;
    return all ^ ((1n << BigInt(addressLength - maskLength)) - 1n);
}

/** complement of the prefix mask, the bits that identify a host */
export function createHostMask(addressLength: number, maskLength: number): bigint {
    let mask = createPrefixMask(addressLength, maskLength);
    if (mask < 0n) return mask;

    return ((1n << BigInt(addressLength)) - 1n) ^ mask;
}

/**
 * negative return value means the mask is not contiguous
 * @param mask
 * @returns length
 */
export function calculateMaskLength(addressLength: number, mask: bigint): number {
    let length = 0;
    let bit = 1n << BigInt(addressLength - 1);

    while (bit > 0n && (mask & bit) != 0n) {
        length++;
        bit >>= 1n;
    }

    // any bit set after the first zero
    if ((mask & ((1n << BigInt(addressLength - length)) - 1n)) != 0n) {
        return -1;
    }

    return length;
}
