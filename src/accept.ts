/**
 * Content negotiation headers (RFC 7231 Sections 5.3.2 - 5.3.5)
 * Accept, Accept-Charset, Accept-Encoding and Accept-Language
 */

import { ALPHA } from "./charsets";
import { formatWeight, weight } from "./quality";
import {
	choice,
	infix,
	infix1,
	isToken,
	keepLeft,
	keepRight,
	literal,
	literalCI,
	map,
	notFollowedBy,
	optional,
	ows,
	pair,
	type Parser,
	parse,
	prefix,
	quote,
	quotedString,
	satisfyMany,
	token,
} from "./syntax";
import type {
	AcceptCharsetEntry,
	AcceptEncodingEntry,
	AcceptEntry,
	AcceptLanguageEntry,
	CharsetSpec,
	EncodingSpec,
	LanguageRange,
	MediaRange,
	MediaRangeSpec,
} from "./types";

const comma = literal(",");
const semicolon = literal(";");

/*
 * Accept
 */

// A `q=` parameter starts the accept-params, so it is never a media type parameter
const parameter: Parser<[string, string]> = keepRight(
	notFollowedBy(literalCI("q=")),
	pair(keepLeft(token, literal("=")), token)
);

/**
 * Media type parameters: *( OWS ";" OWS token "=" token )
 * Later duplicates overwrite earlier ones
 */
export const parameters: Parser<Record<string, string>> = map(prefix(semicolon, parameter), (pairs) =>
	Object.fromEntries(pairs)
);

// A wildcard subtype is only a wildcard when no further token characters follow, so `text/*x` is closed
const wildcard = keepLeft(literal("*"), notFollowedBy(token));

const mediaRangeSpecOpen = map(keepRight(literal("*/"), wildcard), (): MediaRangeSpec => ({ kind: "open" }));

const mediaRangeSpecPartial = map(
	keepLeft(token, keepRight(literal("/"), wildcard)),
	(type): MediaRangeSpec => ({ kind: "partial", type })
);

const mediaRangeSpecClosed = map(
	pair(keepLeft(token, literal("/")), token),
	([type, subtype]): MediaRangeSpec => ({ kind: "closed", subtype, type })
);

/**
 * Wildcard forms are tried first so that `*` is never read as a literal subtype
 */
export const mediaRangeSpec: Parser<MediaRangeSpec> = choice(
	mediaRangeSpecOpen,
	mediaRangeSpecPartial,
	mediaRangeSpecClosed
);

/**
 * A media range (any type, any subtype of a type, or a single type and subtype)
 * followed by its media type parameters
 */
export const mediaRange: Parser<MediaRange> = map(
	pair(keepLeft(mediaRangeSpec, ows), parameters),
	([spec, params]) => ({ parameters: params, spec })
);

const acceptExt: Parser<[string, string | null]> = pair(
	token,
	optional(keepRight(literal("="), choice(quotedString, token)))
);

const acceptExts = map(prefix(semicolon, acceptExt), (pairs) => Object.fromEntries(pairs));

const acceptParams = pair(keepLeft(weight, ows), acceptExts);

/**
 * Accept = #( media-range [ accept-params ] )
 */
export const acceptRule: Parser<AcceptEntry[]> = infix(
	comma,
	map(pair(keepLeft(mediaRange, ows), optional(acceptParams)), ([range, params]): AcceptEntry => ({
		mediaRange: range,
		parameters: params === null ? {} : params[1],
		weight: params === null ? null : params[0],
	}))
);

/*
 * Accept-Charset
 */

const charsetSpec: Parser<CharsetSpec> = choice(
	map(literal("*"), (): CharsetSpec => ({ kind: "any" })),
	map(token, (charset): CharsetSpec => ({ charset, kind: "named" }))
);

/**
 * Accept-Charset = 1#( ( charset / "*" ) [ weight ] )
 */
export const acceptCharsetRule: Parser<AcceptCharsetEntry[]> = infix1(
	comma,
	map(pair(keepLeft(charsetSpec, ows), optional(weight)), ([charset, q]) => ({ charset, weight: q }))
);

/*
 * Accept-Encoding
 */

const encodingSpec: Parser<EncodingSpec> = choice(
	map(literal("*"), (): EncodingSpec => ({ kind: "any" })),
	map(token, (encoding): EncodingSpec =>
		encoding.toLowerCase() === "identity" ? { kind: "identity" } : { encoding, kind: "named" }
	)
);

/**
 * Accept-Encoding = #( codings [ weight ] )
 */
export const acceptEncodingRule: Parser<AcceptEncodingEntry[]> = infix(
	comma,
	map(pair(keepLeft(encodingSpec, ows), optional(weight)), ([encoding, q]) => ({ encoding, weight: q }))
);

/*
 * Accept-Language
 *
 * Language ranges follow the basic language range of RFC 4647 Section 2.1,
 * limited to a primary tag and one subtag
 */

const languageComponent = satisfyMany(ALPHA, 1, 8);

/** A primary tag with an optional subtag, e.g. `en` or `en-US` */
export const languageRange: Parser<LanguageRange> = map(
	pair(languageComponent, optional(keepRight(literal("-"), languageComponent))),
	([primary, sub]) => (sub === null ? primary : `${primary}-${sub}`)
);

/**
 * Accept-Language = #( language-range [ weight ] )
 */
export const acceptLanguageRule: Parser<AcceptLanguageEntry[]> = infix(
	comma,
	map(pair(keepLeft(languageRange, ows), optional(weight)), ([language, q]) => ({ language, weight: q }))
);

/**
 * Parses an Accept header value
 * @returns Entries in header order, or null if the value does not match the grammar
 */
export function accept(value: string): AcceptEntry[] | null {
	return parse(acceptRule, value);
}

/**
 * Parses an Accept-Charset header value
 * @returns At least one entry, or null if the value is empty or malformed
 */
export function acceptCharset(value: string): AcceptCharsetEntry[] | null {
	return parse(acceptCharsetRule, value);
}

/**
 * Parses an Accept-Encoding header value
 * An empty value is valid and yields no entries
 */
export function acceptEncoding(value: string): AcceptEncodingEntry[] | null {
	return parse(acceptEncodingRule, value);
}

/**
 * Parses an Accept-Language header value
 */
export function acceptLanguage(value: string): AcceptLanguageEntry[] | null {
	return parse(acceptLanguageRule, value);
}

/*
 * Formatting
 */

function formatWeightOf(value: number | null): string {
	return value === null ? "" : formatWeight(value);
}

/**
 * Writes a media range spec, using `*` for wildcard parts
 * @param spec - The media range spec
 */
export function formatMediaRangeSpec(spec: MediaRangeSpec): string {
	switch (spec.kind) {
		case "open":
			return "*/*";
		case "partial":
			return `${spec.type}/*`;
		case "closed":
			return `${spec.type}/${spec.subtype}`;
	}
}

/**
 * Writes a media range followed by its `;key=value` parameters
 * @param range - The media range
 */
export function formatMediaRange(range: MediaRange): string {
	const params = Object.entries(range.parameters).map(([key, value]) => `;${key}=${value}`);
	return formatMediaRangeSpec(range.spec) + params.join("");
}

/**
 * Formats Accept entries
 * Extension parameters can only follow a weight, so they are dropped from entries without one
 */
export function formatAccept(entries: AcceptEntry[]): string {
	return entries
		.map((entry) => {
			if (entry.weight === null) {
				return formatMediaRange(entry.mediaRange);
			}
			const extensions = Object.entries(entry.parameters).map(([key, value]) => {
				if (value === null) return `;${key}`;
				return `;${key}=${isToken(value) ? value : quote(value)}`;
			});
			return formatMediaRange(entry.mediaRange) + formatWeight(entry.weight) + extensions.join("");
		})
		.join(", ");
}

/**
 * Formats Accept-Charset entries as a comma separated list
 * @param entries - Entries in header order
 */
export function formatAcceptCharset(entries: AcceptCharsetEntry[]): string {
	return entries
		.map(({ charset, weight: q }) => (charset.kind === "any" ? "*" : charset.charset) + formatWeightOf(q))
		.join(", ");
}

function formatEncodingSpec(encoding: EncodingSpec): string {
	switch (encoding.kind) {
		case "any":
			return "*";
		case "identity":
			return "identity";
		case "named":
			return encoding.encoding;
	}
}

/**
 * Formats Accept-Encoding entries as a comma separated list
 * @param entries - Entries in header order
 */
export function formatAcceptEncoding(entries: AcceptEncodingEntry[]): string {
	return entries.map(({ encoding, weight: q }) => formatEncodingSpec(encoding) + formatWeightOf(q)).join(", ");
}

/**
 * Formats Accept-Language entries as a comma separated list
 * @param entries - Entries in header order
 */
export function formatAcceptLanguage(entries: AcceptLanguageEntry[]): string {
	return entries.map(({ language, weight: q }) => language + formatWeightOf(q)).join(", ");
}
