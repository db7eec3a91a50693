import { uint8_fromBigInt, uint8_readUint16BE, uint8_toBigInt } from "../../binary/uint8-array";
import { AddressRangeError } from "./errors";
import { formatHextets, resolveFormatOptions, type FormatOptions } from "./format";
import { parseColonNotated } from "./parser";

const ADDRESS_LENGTH = 128;
const MAX_VALUE = (1n << BigInt(ADDRESS_LENGTH)) - 1n;

export type FormatMode = string | Partial<FormatOptions>;

/** converts to bigint, a number has to be a safe integer */
export function toBigInt(input: bigint | number): bigint {
    if (typeof input == "bigint") {
        return input;
    }

    if (!Number.isSafeInteger(input)) {
        throw new AddressRangeError("OUT_OF_RANGE", `${input} is not a safe integer`, input);
    }

    return BigInt(input);
}

export class IPV6Address {
    static readonly ADDRESS_LENGTH = ADDRESS_LENGTH;
    static readonly MAX_VALUE = MAX_VALUE;

    static parse(input: string): IPV6Address {
        return new IPV6Address(parseColonNotated(input));
    }

    static fromInteger(value: bigint | number): IPV6Address {
        return new IPV6Address(toBigInt(value));
    }

    static fromBytes(input: Uint8Array): IPV6Address {
        if (input.byteLength != ADDRESS_LENGTH / 8) {
            throw new AddressRangeError("OUT_OF_RANGE", `expected ${ADDRESS_LENGTH / 8} bytes, received ${input.byteLength}`, input);
        }

        return new IPV6Address(uint8_toBigInt(input));
    }

    readonly value: bigint;

    constructor(input: string | bigint | Uint8Array | IPV6Address) {
        if (typeof input == "string") {
            this.value = parseColonNotated(input);
        } else if (typeof input == "bigint") {
            if (input < 0n || input > MAX_VALUE) {
                throw new AddressRangeError("OUT_OF_RANGE", `${input} is outside of the 128-bit range`, input);
            }
            this.value = input;
        } else if (input instanceof Uint8Array) {
            this.value = IPV6Address.fromBytes(input).value;
        } else {
            this.value = input.value;
        }
    }

    toInteger(): bigint {
        return this.value;
    }

    /** big endian, 16 bytes */
    toBytes(): Uint8Array {
        return uint8_fromBigInt(this.value, ADDRESS_LENGTH / 8);
    }

    /** the 8 16-bit groups, most significant first */
    get hextets(): number[] {
        let bytes = this.toBytes();
        let hextets = new Array<number>(8);

        for (let i = 0; i < hextets.length; i++) {
            hextets[i] = uint8_readUint16BE(bytes, i * 2);
        }

        return hextets;
    }

    add(delta: bigint | number): IPV6Address {
        return new IPV6Address(this.value + toBigInt(delta));
    }

    subtract(delta: bigint | number): IPV6Address {
        return new IPV6Address(this.value - toBigInt(delta));
    }

    and(mask: bigint | IPV6Address): IPV6Address {
        return new IPV6Address(this.value & (typeof mask == "bigint" ? mask : mask.value));
    }

    or(mask: bigint | IPV6Address): IPV6Address {
        return new IPV6Address(this.value | (typeof mask == "bigint" ? mask : mask.value));
    }

    equals(other: unknown): boolean {
        return other instanceof IPV6Address && other.value == this.value;
    }

    compare(other: IPV6Address): -1 | 0 | 1 {
        if (this.value < other.value) return -1;
        if (this.value > other.value) return 1;
        return 0;
    }

    /**
     * @param mode format flags ("s", "l", "c", "e", "p", "t") or options, defaults to the short form
     */
    format(mode?: FormatMode): string {
        return formatHextets(this.hextets, resolveFormatOptions(mode));
    }

    toString(mode?: FormatMode): string {
        return this.format(mode);
    }

    toJSON(): { type: string; address: string } {
        return {
            type: this.constructor.name,
            address: this.toString(),
        }
    }
}
