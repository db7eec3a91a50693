import { AddressParseError } from "./errors";
import { tokenize, type Token } from "./tokenizer";

const HEXTET_COUNT = 8;
const HEXTET_LENGTH = 16n;

export type CidrNotated = {
    value: bigint;
    prefixLength: number;
}

type ParseResult = {
    value: bigint;
    prefixLength: number | undefined;
}

function unreachable(token: never): never {
    throw new Error("unknown token: " + JSON.stringify(token));
}

function parseHextet(token: Token): number {
    if (token.text.length > 4) {
        throw new AddressParseError("MALFORMED_HEXTET", "hextet must be 4 digits or less", token.text);
    }

    if (!/^[0-9a-fA-F]+$/.test(token.text)) {
        throw new AddressParseError("MALFORMED_HEXTET", `hextet "${token.text}" is not hexadecimal`, token.text);
    }

    return parseInt(token.text, 16);
}

/**
 * Folds the tokens of `input` into a 128-bit value.
 * Hextets before "::" are placed from the most significant end,
 * hextets after it are shifted in from the least significant end.
 */
function parse(input: string, allowPrefix: boolean): ParseResult {
    let hi = 0n, lo = 0n;
    let count = 0, loCount = 0;
    let elided = false;
    let prefixLength: number | undefined;

    for (let token of tokenize(input)) {
        if (prefixLength !== undefined) {
            throw new AddressParseError("TRAILING_DATA_AFTER_PREFIX", `unexpected "${token.text}" after prefix length`, input);
        }

        switch (token.kind) {
            case "HEXTET": {
                let hextet = BigInt(parseHextet(token));
                if (elided) {
                    lo = (lo << HEXTET_LENGTH) | hextet;
                    loCount++;
                } else {
                    if (count >= HEXTET_COUNT) {
                        throw new AddressParseError("INVALID_HEXTET_COUNT", "address has more than 8 hextets", input);
                    }
                    hi |= hextet << (BigInt(HEXTET_COUNT - 1 - count) * HEXTET_LENGTH);
                    count++;
                }
                break;
            }
            case "ELISION":
                if (elided) {
                    throw new AddressParseError("MULTIPLE_ELISION", "address can only have one '::'", input);
                }
                elided = true;
                break;
            case "SEPARATOR":
                break;
            case "PREFIX_LENGTH":
                if (!allowPrefix) {
                    throw new AddressParseError("UNEXPECTED_PREFIX_LENGTH", "address cannot have a prefix length", input);
                }
                prefixLength = parseInt(token.text, 10);
                break;
            case "UNRECOGNIZED":
                throw new AddressParseError("UNRECOGNIZED_TOKEN", `unrecognized "${token.text}" at ${token.start}`, token.text);
            default:
                unreachable(token.kind);
        }
    }

    if (elided ? count + loCount > HEXTET_COUNT - 1 : count != HEXTET_COUNT) {
        throw new AddressParseError("INVALID_HEXTET_COUNT", elided ?
            "address with '::' can have at most 7 hextets" :
            "address must have 8 hextets", input);
    }

    return { value: hi | lo, prefixLength };
}

/** parses an address without a prefix length, the result is not range checked */
export function parseColonNotated(input: string): bigint {
    return parse(input, false).value;
}

/** parses "address/prefix-length", the prefix length is required */
export function parseCidrNotated(input: string): CidrNotated {
    let { value, prefixLength } = parse(input, true);

    if (prefixLength === undefined) {
        throw new AddressParseError("MISSING_PREFIX_LENGTH", "no prefix length specified", input);
    }

    return { value, prefixLength };
}
