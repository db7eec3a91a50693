import { FormatFlagError } from "./errors";

// Text representation <https://www.rfc-editor.org/rfc/rfc5952.html#section-4>

export type Compression = "compress" | "expand";
export type Padding = "pad" | "trim";

export type FormatOptions = {
    /** "compress" replaces the longest run of zero hextets with "::" */
    compression: Compression;
    /** "pad" writes every hextet with 4 digits, "trim" removes leading zeroes */
    padding: Padding;
    /** shortest run of zero hextets that is compressed, 2 per RFC 5952 */
    minElisionLength: number;
}

export const DEFAULT_FORMAT_OPTIONS: FormatOptions = {
    compression: "compress",
    padding: "trim",
    minElisionLength: 2
}

export const SHORT_FORMAT: Pick<FormatOptions, "compression" | "padding"> = { compression: "compress", padding: "trim" };
export const LONG_FORMAT: Pick<FormatOptions, "compression" | "padding"> = { compression: "expand", padding: "pad" };

/**
 * Flags:
 * - `s` short, compress & trim
 * - `l` long, expand & pad
 * - `c` compress, `e` expand
 * - `p` pad, `t` trim
 *
 * Flags are applied left to right, so the last one wins.
 */
export function parseFormatFlags(flags: string): FormatOptions {
    let options: FormatOptions = { ...DEFAULT_FORMAT_OPTIONS };

    for (let flag of flags) {
        switch (flag) {
            case "s": Object.assign(options, SHORT_FORMAT); break;
            case "l": Object.assign(options, LONG_FORMAT); break;
            case "c": options.compression = "compress"; break;
            case "e": options.compression = "expand"; break;
            case "p": options.padding = "pad"; break;
            case "t": options.padding = "trim"; break;
            default:
                throw new FormatFlagError(`unknown format flag "${flag}"`, flags);
        }
    }

    return options;
}

export function resolveFormatOptions(mode?: string | Partial<FormatOptions>): FormatOptions {
    if (typeof mode == "string") {
        return parseFormatFlags(mode);
    }

    return {
        compression: mode?.compression ?? DEFAULT_FORMAT_OPTIONS.compression,
        padding: mode?.padding ?? DEFAULT_FORMAT_OPTIONS.padding,
        minElisionLength: mode?.minElisionLength ?? DEFAULT_FORMAT_OPTIONS.minElisionLength,
    };
}

export type Sequence = [startIndex: number, length: number];

/** finds the leftmost longest run of zero hextets that is at least `minLength` long */
export function findElision(hextets: readonly number[], minLength: number): Sequence | undefined {
    let best: Sequence | undefined;
    // trailing sentinel ends the last run
    let values = [...hextets, -1];
    let runStart = 0;

    for (let i = 1; i < values.length; i++) {
        if (values[i] == values[runStart]) {
            continue;
        }

        let length = i - runStart;
        if (values[runStart] == 0 && length >= minLength && (!best || length > best[1])) {
            best = [runStart, length];
        }

        runStart = i;
    }

    return best;
}

export function formatHextet(hextet: number, padding: Padding): string {
    let digits = hextet.toString(16);
    return padding == "pad" ? digits.padStart(4, "0") : digits;
}

export function formatHextets(hextets: readonly number[], options: FormatOptions = DEFAULT_FORMAT_OPTIONS): string {
    let elision = options.compression == "compress" ?
        findElision(hextets, options.minElisionLength) :
        undefined;

    let str = "";
    let separate = false;

    for (let i = 0; i < hextets.length; i++) {
        if (elision && i == elision[0]) {
            str += "::";
            separate = false;
            i += elision[1] - 1;
            continue;
        }

        if (separate) {
            str += ":";
        }

        str += formatHextet(hextets[i], options.padding);
        separate = true;
    }

    return str;
}
