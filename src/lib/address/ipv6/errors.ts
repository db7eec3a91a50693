export type ParseErrorCode =
    "MALFORMED_HEXTET" |
    "MULTIPLE_ELISION" |
    "UNRECOGNIZED_TOKEN" |
    "TRAILING_DATA_AFTER_PREFIX" |
    "MISSING_PREFIX_LENGTH" |
    "INVALID_HEXTET_COUNT" |
    "UNEXPECTED_PREFIX_LENGTH";

export type RangeErrorCode =
    "OUT_OF_RANGE" |
    "INVALID_PREFIX_LENGTH" |
    "HOST_BITS_SET" |
    "INVALID_STEP";

export type IPV6ErrorCode = ParseErrorCode | RangeErrorCode | "INDEX_OUT_OF_RANGE" | "INVALID_FORMAT_FLAG";

export class IPV6Error<C extends IPV6ErrorCode = IPV6ErrorCode> extends Error {
    constructor(public code: C, message: string, public value: unknown) {
        super(message);
        this.name = new.target.name;
    }
}

export class AddressParseError extends IPV6Error<ParseErrorCode> { }

export class AddressRangeError extends IPV6Error<RangeErrorCode> { }

export class NetworkIndexError extends IPV6Error<"INDEX_OUT_OF_RANGE"> {
    constructor(message: string, value: unknown) {
        super("INDEX_OUT_OF_RANGE", message, value);
    }
}

export class FormatFlagError extends IPV6Error<"INVALID_FORMAT_FLAG"> {
    constructor(message: string, value: unknown) {
        super("INVALID_FORMAT_FLAG", message, value);
    }
}
