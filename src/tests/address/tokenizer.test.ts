import { describe, expect, test } from "vitest";
import { scanToken, tokenize } from "../../lib/address/ipv6/tokenizer";

const kinds = (input: string) => Array.from(tokenize(input), (t) => t.kind);
const texts = (input: string) => Array.from(tokenize(input), (t) => t.text);

describe("IPV6 Tokenizer", () => {
    test("scanToken", () => {
        expect(scanToken("fe80::1", 0)).toStrictEqual({ kind: "HEXTET", text: "fe80", start: 0, end: 4 });
        expect(scanToken("fe80::1", 4)).toStrictEqual({ kind: "ELISION", text: "::", start: 4, end: 6 });
        expect(scanToken("fe80::1", 7)).toBeUndefined();
        expect(scanToken("1:2", 1)).toStrictEqual({ kind: "SEPARATOR", text: ":", start: 1, end: 2 });
    })

    test("elision is preferred over separator", () => {
        expect(kinds("a::b")).toStrictEqual(["HEXTET", "ELISION", "HEXTET"]);
        expect(kinds(":::")).toStrictEqual(["ELISION", "SEPARATOR"]);
    })

    test("hextets are not length checked", () => {
        expect(texts("abcdef0123:zz")).toStrictEqual(["abcdef0123", ":", "zz"]);
    })

    test("prefix length", () => {
        expect(scanToken("::/64", 2)).toStrictEqual({ kind: "PREFIX_LENGTH", text: "64", start: 2, end: 5 });
        expect(kinds("2001:db8::/32")).toStrictEqual(["HEXTET", "SEPARATOR", "HEXTET", "ELISION", "PREFIX_LENGTH"]);
    })

    test("unrecognized", () => {
        expect(texts("1. 2")).toStrictEqual(["1", ". ", "2"]);
        expect(kinds("::/")).toStrictEqual(["ELISION", "UNRECOGNIZED"]);
        expect(scanToken("/x", 0)).toStrictEqual({ kind: "UNRECOGNIZED", text: "/", start: 0, end: 1 });
        expect(texts("-/-/8")).toStrictEqual(["-/-", "8"]);
    })

    test("empty input", () => {
        expect(kinds("")).toStrictEqual([]);
    })
})
