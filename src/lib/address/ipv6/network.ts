import { calculateMaskLength, createHostMask, createPrefixMask } from "../mask";
import { IPV6Address, toBigInt, type FormatMode } from "./address";
import { AddressRangeError, NetworkIndexError } from "./errors";
import { NetworkIterable, type NetworkIterator, type SliceBound } from "./network-iterable";
import { parseCidrNotated } from "./parser";

export type NetworkOptions = {
    /** by default false, if true an address with host bits set is rejected instead of masked */
    strict: boolean;
}

export const DEFAULT_NETWORK_OPTIONS: NetworkOptions = {
    strict: false
}

export class IPV6Network implements Iterable<IPV6Address> {
    static parse(input: string, options?: Partial<NetworkOptions>): IPV6Network {
        let { value, prefixLength } = parseCidrNotated(input);
        return new IPV6Network(new IPV6Address(value), prefixLength, options);
    }

    /**
     * @param prefix prefix length, or a contiguous mask such as `ffff:ffff::`
     */
    static create(address: string | bigint | number | IPV6Address, prefix: number | IPV6Address, options?: Partial<NetworkOptions>): IPV6Network {
        let base = address instanceof IPV6Address ? address :
            typeof address == "string" ? IPV6Address.parse(address) :
                IPV6Address.fromInteger(address);

        return new IPV6Network(base, prefix, options);
    }

    readonly baseAddress: IPV6Address;
    readonly prefixLength: number;
    readonly prefixMask: bigint;

    constructor(address: IPV6Address, prefix: number | IPV6Address, options: Partial<NetworkOptions> = {}) {
        let strict = options.strict ?? DEFAULT_NETWORK_OPTIONS.strict;

        let prefixLength = prefix instanceof IPV6Address ?
            calculateMaskLength(IPV6Address.ADDRESS_LENGTH, prefix.value) :
            prefix;

        let mask = createPrefixMask(IPV6Address.ADDRESS_LENGTH, prefixLength);
        if (mask < 0n) {
            throw new AddressRangeError("INVALID_PREFIX_LENGTH", `invalid prefix length: ${prefix}`, prefix);
        }

        let base = address.and(mask);
        if (!base.equals(address)) {
            if (strict) {
                throw new AddressRangeError("HOST_BITS_SET", `${address}/${prefixLength} has host bits set`, address);
            }

            console.warn(`${address}/${prefixLength}: host bits set, using ${base}`);
        }

        this.baseAddress = base;
        this.prefixLength = prefixLength;
        this.prefixMask = mask;
    }

    get hostMask(): bigint {
        return createHostMask(IPV6Address.ADDRESS_LENGTH, this.prefixLength);
    }

    get hostCount(): bigint {
        return 1n << BigInt(IPV6Address.ADDRESS_LENGTH - this.prefixLength);
    }

    get maxIndex(): bigint {
        return this.hostCount - 1n;
    }

    get lastAddress(): IPV6Address {
        return this.baseAddress.or(this.hostMask);
    }

    contains(address: IPV6Address): boolean {
        return address.and(this.prefixMask).equals(this.baseAddress);
    }

    addressAt(index: bigint | number): IPV6Address {
        if (typeof index == "number" && !Number.isSafeInteger(index)) {
            throw new NetworkIndexError(`${index} is not an index`, index);
        }

        let k = toBigInt(index);
        if (k < 0n || k > this.maxIndex) {
            throw new NetworkIndexError(`index ${k} is outside of ${this}`, index);
        }

        return this.baseAddress.add(k);
    }

    /** every address of the network, ascending */
    iterate(): NetworkIterator {
        return this.slice()[Symbol.iterator]();
    }

    [Symbol.iterator](): NetworkIterator {
        return this.iterate();
    }

    /**
     * @param start offset or address, defaults to the base address
     * @param stop offset or address (exclusive), defaults to one past the last address
     * @param step defaults to 1, negative walks backwards
     */
    slice(start?: SliceBound, stop?: SliceBound, step?: bigint | number): NetworkIterable {
        return new NetworkIterable(this, start, stop, step);
    }

    equals(other: unknown): boolean {
        return other instanceof IPV6Network &&
            other.prefixLength == this.prefixLength &&
            other.baseAddress.equals(this.baseAddress);
    }

    format(mode?: FormatMode): string {
        return this.baseAddress.format(mode) + "/" + this.prefixLength;
    }

    toString(mode?: FormatMode): string {
        return this.format(mode);
    }

    toJSON(): { type: string; network: string } {
        return {
            type: this.constructor.name,
            network: this.toString(),
        }
    }
}
