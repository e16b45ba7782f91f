/**
 * Conditional request header tests
 */

import { describe, expect, it } from "vitest";
import {
	type EntityTag,
	entityTag,
	formatIfMatch,
	formatIfNoneMatch,
	ifMatch,
	ifNoneMatch,
	parse,
	strongCompare,
	weakCompare,
} from "../src/index";

const strong = (tag: string): EntityTag => ({ kind: "strong", tag });
const weak = (tag: string): EntityTag => ({ kind: "weak", tag });

describe("entityTag", () => {
	it("should parse strong and weak tags", () => {
		expect(parse(entityTag, '"xyzzy"')).toEqual(strong("xyzzy"));
		expect(parse(entityTag, 'W/"xyzzy"')).toEqual(weak("xyzzy"));
	});

	it("should require an uppercase weak indicator and a quoted token", () => {
		expect(parse(entityTag, 'w/"xyzzy"')).toBeNull();
		expect(parse(entityTag, "xyzzy")).toBeNull();
		expect(parse(entityTag, '"a b"')).toBeNull();
		expect(parse(entityTag, '""')).toBeNull();
	});
});

describe("ifMatch / ifNoneMatch", () => {
	it("should parse the wildcard", () => {
		expect(ifMatch("*")).toEqual({ kind: "any" });
		expect(ifNoneMatch(" * ")).toEqual({ kind: "any" });
	});

	it("should parse entity tag lists in order", () => {
		expect(ifNoneMatch('"xyzzy", "r2d2xxxx"')).toEqual({
			kind: "tags",
			tags: [strong("xyzzy"), strong("r2d2xxxx")],
		});
		expect(ifMatch('W/"v1", , "v2",')).toEqual({ kind: "tags", tags: [weak("v1"), strong("v2")] });
	});

	it("should yield no tags for an empty value", () => {
		expect(ifMatch("")).toEqual({ kind: "tags", tags: [] });
	});

	it("should not mix the wildcard with tags", () => {
		expect(ifMatch('*, "a"')).toBeNull();
		expect(ifNoneMatch('"a", *')).toBeNull();
	});

	it("should format values that parse back", () => {
		expect(formatIfMatch({ kind: "any" })).toBe("*");
		const header = 'W/"xyzzy", "r2d2xxxx"';
		const value = ifNoneMatch(header);
		expect(value).not.toBeNull();
		expect(formatIfNoneMatch(value ?? { kind: "any" })).toBe(header);
	});
});

describe("entity tag comparison", () => {
	it("should follow the RFC 7232 comparison table", () => {
		expect(strongCompare(weak("1"), weak("1"))).toBe(false);
		expect(weakCompare(weak("1"), weak("1"))).toBe(true);

		expect(strongCompare(weak("1"), weak("2"))).toBe(false);
		expect(weakCompare(weak("1"), weak("2"))).toBe(false);

		expect(strongCompare(weak("1"), strong("1"))).toBe(false);
		expect(weakCompare(weak("1"), strong("1"))).toBe(true);

		expect(strongCompare(strong("1"), strong("1"))).toBe(true);
		expect(weakCompare(strong("1"), strong("1"))).toBe(true);
	});
});
