// Lexemes of colon notated addresses, optionally followed by a "/prefix-length"
// <https://www.rfc-editor.org/rfc/rfc4291.html#section-2.2>

export type TokenKind = "HEXTET" | "ELISION" | "SEPARATOR" | "PREFIX_LENGTH" | "UNRECOGNIZED";

export type Token = {
    kind: TokenKind;
    /** matched text, for PREFIX_LENGTH only the digits */
    text: string;
    start: number;
    end: number;
}

function isAlphanumeric(c: string | undefined): boolean {
    return c !== undefined && /^[0-9a-zA-Z]$/.test(c);
}

function isDigit(c: string | undefined): boolean {
    return c !== undefined && c >= "0" && c <= "9";
}

/** true if any token other than UNRECOGNIZED could start at `offset` */
function startsToken(input: string, offset: number): boolean {
    let c = input[offset];
    return c == ":" || isAlphanumeric(c) || (c == "/" && isDigit(input[offset + 1]));
}

/**
 * Scans the token at `offset`
 * @returns undefined when the end of input is reached
 */
export function scanToken(input: string, offset: number): Token | undefined {
    if (offset >= input.length) {
        return undefined;
    }

    let end = offset;

    // "::" has to be tried before ":"
    if (input.startsWith("::", offset)) {
        return { kind: "ELISION", text: "::", start: offset, end: offset + 2 };
    }

    if (input[offset] == ":") {
        return { kind: "SEPARATOR", text: ":", start: offset, end: offset + 1 };
    }

    if (isAlphanumeric(input[offset])) {
        while (isAlphanumeric(input[end])) end++;
        return { kind: "HEXTET", text: input.substring(offset, end), start: offset, end };
    }

    if (input[offset] == "/" && isDigit(input[offset + 1])) {
        end = offset + 1;
        while (isDigit(input[end])) end++;
        return { kind: "PREFIX_LENGTH", text: input.substring(offset + 1, end), start: offset, end };
    }

    end = offset + 1;
    while (end < input.length && !startsToken(input, end)) end++;

    return { kind: "UNRECOGNIZED", text: input.substring(offset, end), start: offset, end };
}

export function* tokenize(input: string): Generator<Token, void, undefined> {
    let offset = 0;
    let token: Token | undefined;

    while ((token = scanToken(input, offset)) !== undefined) {
        yield token;
        offset = token.end;
    }
}
