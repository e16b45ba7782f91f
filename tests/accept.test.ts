/**
 * Content negotiation header tests
 */

import { describe, expect, it } from "vitest";
import {
	accept,
	acceptCharset,
	acceptEncoding,
	acceptLanguage,
	formatAccept,
	formatAcceptCharset,
	formatAcceptEncoding,
	formatAcceptLanguage,
	formatMediaRange,
	type MediaRange,
} from "../src/index";

const closed = (type: string, subtype: string, parameters: Record<string, string> = {}): MediaRange => ({
	parameters,
	spec: { kind: "closed", subtype, type },
});

describe("accept", () => {
	it("should distinguish open, partial and closed media ranges", () => {
		expect(accept("text/*, text/plain, text/plain;format=flowed, */*")).toEqual([
			{ mediaRange: { parameters: {}, spec: { kind: "partial", type: "text" } }, parameters: {}, weight: null },
			{ mediaRange: closed("text", "plain"), parameters: {}, weight: null },
			{ mediaRange: closed("text", "plain", { format: "flowed" }), parameters: {}, weight: null },
			{ mediaRange: { parameters: {}, spec: { kind: "open" } }, parameters: {}, weight: null },
		]);
	});

	it("should read a subtype that starts with * as a closed range", () => {
		expect(accept("text/*foo, */*bar;q=0")).toEqual([
			{ mediaRange: closed("text", "*foo"), parameters: {}, weight: null },
			{ mediaRange: closed("*", "*bar"), parameters: {}, weight: 0 },
		]);
	});

	it("should split media type parameters from accept parameters at q=", () => {
		const entries = accept(
			"text/*;q=0.3, text/html;q=0.7, text/html;level=1, text/html;level=2;q=0.4, */*;q=0.5"
		);
		expect(entries?.map((entry) => entry.weight)).toEqual([0.3, 0.7, null, 0.4, 0.5]);
		expect(entries?.[2].mediaRange).toEqual(closed("text", "html", { level: "1" }));
		expect(entries?.[3].mediaRange).toEqual(closed("text", "html", { level: "2" }));
		expect(entries?.[3].parameters).toEqual({});
	});

	it("should read extension parameters after the weight", () => {
		expect(accept('text/html;level=1;q=0.5;ext="a \\"b\\"";flag')).toEqual([
			{
				mediaRange: closed("text", "html", { level: "1" }),
				parameters: { ext: 'a "b"', flag: null },
				weight: 0.5,
			},
		]);
	});

	it("should treat Q= as the weight and qs= as a parameter", () => {
		expect(accept("text/plain;Q=0.5")?.[0].weight).toBe(0.5);
		expect(accept("text/plain;qs=1")?.[0].mediaRange).toEqual(closed("text", "plain", { qs: "1" }));
	});

	it("should let later duplicate parameters win", () => {
		expect(accept("text/plain;a=1;a=2")?.[0].mediaRange.parameters).toEqual({ a: "2" });
	});

	it("should keep header order rather than sorting by weight", () => {
		expect(accept("a/b;q=0.1, c/d;q=0.9")?.map((entry) => entry.mediaRange)).toEqual([
			closed("a", "b"),
			closed("c", "d"),
		]);
	});

	it("should tolerate whitespace and empty elements", () => {
		expect(accept("")).toEqual([]);
		expect(accept(" , ,")).toEqual([]);
		expect(accept(" text/plain ; q=1 ,, ")).toEqual([
			{ mediaRange: closed("text", "plain"), parameters: {}, weight: 1 },
		]);
	});

	it("should reject malformed values", () => {
		expect(accept("text")).toBeNull();
		expect(accept("text/plain;q=1.5")).toBeNull();
		expect(accept("text/plain;q=0.1234")).toBeNull();
		expect(accept("text/plain text/html")).toBeNull();
		// media type parameter values must be tokens
		expect(accept('text/plain;charset="utf-8"')).toBeNull();
	});

	it("should format entries that parse back to the same value", () => {
		const header = 'text/html;level=1;q=0.5;ext="a b";flag, */*';
		const entries = accept(header);
		expect(entries).not.toBeNull();
		expect(formatAccept(entries ?? [])).toBe(header);
		expect(accept(formatAccept(entries ?? []))).toEqual(entries);
	});

	it("should format media ranges with their parameters", () => {
		expect(formatMediaRange(closed("text", "plain", { format: "flowed" }))).toBe("text/plain;format=flowed");
		expect(formatMediaRange({ parameters: {}, spec: { kind: "partial", type: "image" } })).toBe("image/*");
	});
});

describe("acceptCharset", () => {
	it("should parse named charsets with optional weights", () => {
		expect(acceptCharset("iso-8859-5, unicode-1-1;q=0.8")).toEqual([
			{ charset: { charset: "iso-8859-5", kind: "named" }, weight: null },
			{ charset: { charset: "unicode-1-1", kind: "named" }, weight: 0.8 },
		]);
	});

	it("should parse the wildcard", () => {
		expect(acceptCharset("*;q=0.1")).toEqual([{ charset: { kind: "any" }, weight: 0.1 }]);
	});

	it("should require at least one charset", () => {
		expect(acceptCharset("")).toBeNull();
		expect(acceptCharset(" , ")).toBeNull();
	});

	it("should format and parse back", () => {
		const entries = acceptCharset("utf-8, *;q=0.5");
		expect(formatAcceptCharset(entries ?? [])).toBe("utf-8, *;q=0.5");
	});
});

describe("acceptEncoding", () => {
	it("should classify wildcard, identity and named codings", () => {
		expect(acceptEncoding("gzip;q=1.0, identity; q=0.5, *;q=0")).toEqual([
			{ encoding: { encoding: "gzip", kind: "named" }, weight: 1 },
			{ encoding: { kind: "identity" }, weight: 0.5 },
			{ encoding: { kind: "any" }, weight: 0 },
		]);
	});

	it("should match identity case-insensitively and only as a whole token", () => {
		expect(acceptEncoding("IDENTITY")).toEqual([{ encoding: { kind: "identity" }, weight: null }]);
		expect(acceptEncoding("identityx")).toEqual([
			{ encoding: { encoding: "identityx", kind: "named" }, weight: null },
		]);
	});

	it("should accept an empty value", () => {
		expect(acceptEncoding("")).toEqual([]);
	});

	it("should reject malformed values", () => {
		expect(acceptEncoding("gzip;q=")).toBeNull();
		expect(acceptEncoding("gzip deflate")).toBeNull();
	});

	it("should format entries", () => {
		const entries = acceptEncoding("compress;q=0.5, gzip;q=1.0");
		expect(formatAcceptEncoding(entries ?? [])).toBe("compress;q=0.5, gzip;q=1");
	});
});

describe("acceptLanguage", () => {
	it("should parse language ranges with optional subtags", () => {
		expect(acceptLanguage("da, en-gb;q=0.8, en;q=0.7")).toEqual([
			{ language: "da", weight: null },
			{ language: "en-gb", weight: 0.8 },
			{ language: "en", weight: 0.7 },
		]);
	});

	it("should preserve case", () => {
		expect(acceptLanguage("en-US")).toEqual([{ language: "en-US", weight: null }]);
	});

	it("should limit components to eight letters", () => {
		expect(acceptLanguage("abcdefgh")).toEqual([{ language: "abcdefgh", weight: null }]);
		expect(acceptLanguage("abcdefghi")).toBeNull();
		expect(acceptLanguage("en-abcdefghi")).toBeNull();
	});

	it("should reject incomplete or non-alphabetic ranges", () => {
		expect(acceptLanguage("en-")).toBeNull();
		expect(acceptLanguage("en1")).toBeNull();
		expect(acceptLanguage("*")).toBeNull();
	});

	it("should format entries", () => {
		const entries = acceptLanguage("fr-CH, fr;q=0.9");
		expect(formatAcceptLanguage(entries ?? [])).toBe("fr-CH, fr;q=0.9");
	});
});
