import { IPV6Address, toBigInt } from "./address";
import { AddressRangeError } from "./errors";
import type { IPV6Network } from "./network";

/** offset from the base address, or an absolute address */
export type SliceBound = bigint | number | IPV6Address;

function clamp(n: bigint, min: bigint, max: bigint): bigint {
    return n < min ? min : n > max ? max : n;
}

export class NetworkIterator implements IterableIterator<IPV6Address> {
    private cursor: bigint;

    constructor(start: bigint, private stop: bigint, private step: bigint) {
        this.cursor = start;
    }

    next(): IteratorResult<IPV6Address> {
        let done = this.step > 0n ? this.cursor >= this.stop : this.cursor <= this.stop;
        if (done) {
            return { done: true, value: undefined };
        }

        let value = new IPV6Address(this.cursor);
        this.cursor += this.step;

        return { done: false, value };
    }

    [Symbol.iterator](): NetworkIterator {
        return this;
    }
}

/**
 * A window `[start, stop)` of a network walked by `step`.
 * A negative step walks the same window from the top down.
 */
export class NetworkIterable implements Iterable<IPV6Address> {
    readonly start: bigint;
    readonly stop: bigint;
    readonly step: bigint;

    constructor(network: IPV6Network, start?: SliceBound, stop?: SliceBound, step: bigint | number = 1n) {
        let first = network.baseAddress.value;
        let end = first + network.hostCount;

        let resolve = (bound: SliceBound | undefined, fallback: bigint): bigint => {
            if (bound === undefined) return fallback;
            if (bound instanceof IPV6Address) return clamp(bound.value, first, end);
            return clamp(first + toBigInt(bound), first, end);
        }

        this.start = resolve(start, first);
        this.stop = resolve(stop, end);
        this.step = toBigInt(step);

        if (this.step == 0n) {
            throw new AddressRangeError("INVALID_STEP", "step cannot be 0", step);
        }
    }

    [Symbol.iterator](): NetworkIterator {
        if (this.step < 0n) {
            return new NetworkIterator(this.stop - 1n, this.start - 1n, this.step);
        }

        return new NetworkIterator(this.start, this.stop, this.step);
    }

    toArray(): IPV6Address[] {
        return Array.from(this);
    }
}
