export { IPV6Address, type FormatMode } from "./address";
export {
    AddressParseError,
    AddressRangeError,
    FormatFlagError,
    IPV6Error,
    NetworkIndexError,
    type IPV6ErrorCode,
    type ParseErrorCode,
    type RangeErrorCode,
} from "./errors";
export {
    DEFAULT_FORMAT_OPTIONS,
    LONG_FORMAT,
    SHORT_FORMAT,
    findElision,
    formatHextet,
    formatHextets,
    parseFormatFlags,
    resolveFormatOptions,
    type Compression,
    type FormatOptions,
    type Padding,
    type Sequence,
} from "./format";
export { DEFAULT_NETWORK_OPTIONS, IPV6Network, type NetworkOptions } from "./network";
export { NetworkIterable, NetworkIterator, type SliceBound } from "./network-iterable";
export { parseCidrNotated, parseColonNotated, type CidrNotated } from "./parser";
export { scanToken, tokenize, type Token, type TokenKind } from "./tokenizer";
