/**
 * Core type definitions for HTTP header field grammars
 * Provides type-safe models for the values produced by each header parser
 */

/**
 * HTTP method enumeration
 * Contains the methods recognised by name; anything else is a custom method
 */
export enum HttpMethod {
	DELETE = "DELETE",
	HEAD = "HEAD",
	GET = "GET",
	OPTIONS = "OPTIONS",
	PATCH = "PATCH",
	POST = "POST",
	PUT = "PUT",
	TRACE = "TRACE",
}

/**
 * Request method, either a recognised standard method or an extension token
 */
export type Method =
	| { kind: "standard"; method: HttpMethod }
	| { kind: "custom"; method: string };

/**
 * Request-line protocol
 */
export type Protocol = { kind: "http"; version: number } | { kind: "custom"; protocol: string };

/**
 * URI scheme
 */
export type Scheme = { kind: "http" } | { kind: "https" } | { kind: "custom"; scheme: string };

/**
 * Query string as a key/value mapping (values are not percent-decoded)
 */
export type Query = Record<string, string>;

/**
 * Media range pattern
 * - open: any type and subtype
 * - partial: a type with any subtype
 * - closed: an exact type/subtype pair
 */
export type MediaRangeSpec =
	| { kind: "open" }
	| { kind: "partial"; type: string }
	| { kind: "closed"; type: string; subtype: string };

/**
 * A media range with the parameters that precede any quality value
 */
export interface MediaRange {
	/** The (possibly wildcarded) type/subtype pattern */
	spec: MediaRangeSpec;
	/** Media type parameters, e.g. `format=flowed` */
	parameters: Record<string, string>;
}

/**
 * A single element of an Accept header
 */
export interface AcceptEntry {
	/** The media range being accepted */
	mediaRange: MediaRange;
	/** Quality value, null when no `q=` parameter was given */
	weight: number | null;
	/** Extension parameters following `q=`; valueless extensions map to null */
	parameters: Record<string, string | null>;
}

export type CharsetSpec = { kind: "any" } | { kind: "named"; charset: string };

/**
 * A single element of an Accept-Charset header
 */
export interface AcceptCharsetEntry {
	charset: CharsetSpec;
	weight: number | null;
}

export type EncodingSpec = { kind: "any" } | { kind: "identity" } | { kind: "named"; encoding: string };

/**
 * A single element of an Accept-Encoding header
 */
export interface AcceptEncodingEntry {
	encoding: EncodingSpec;
	weight: number | null;
}

/**
 * Basic language range: 1-8 letters, optionally followed by `-` and a 1-8 letter subtag
 */
export type LanguageRange = string;

/**
 * A single element of an Accept-Language header
 */
export interface AcceptLanguageEntry {
	language: LanguageRange;
	weight: number | null;
}

/**
 * Entity tag validator, strong (`"tag"`) or weak (`W/"tag"`)
 */
export type EntityTag = { kind: "strong"; tag: string } | { kind: "weak"; tag: string };

/**
 * Value of an If-Match header
 */
export type IfMatch = { kind: "any" } | { kind: "tags"; tags: EntityTag[] };

/**
 * Value of an If-None-Match header
 */
export type IfNoneMatch = { kind: "any" } | { kind: "tags"; tags: EntityTag[] };

/**
 * Header kinds understood by HeaderParser
 */
export enum HeaderKind {
	ACCEPT = "accept",
	ACCEPT_CHARSET = "accept-charset",
	ACCEPT_ENCODING = "accept-encoding",
	ACCEPT_LANGUAGE = "accept-language",
	IF_MATCH = "if-match",
	IF_NONE_MATCH = "if-none-match",
	QUERY = "query",
}

/**
 * Maps each header kind to the value its parser produces
 */
export interface HeaderValueMap {
	[HeaderKind.ACCEPT]: AcceptEntry[];
	[HeaderKind.ACCEPT_CHARSET]: AcceptCharsetEntry[];
	[HeaderKind.ACCEPT_ENCODING]: AcceptEncodingEntry[];
	[HeaderKind.ACCEPT_LANGUAGE]: AcceptLanguageEntry[];
	[HeaderKind.IF_MATCH]: IfMatch;
	[HeaderKind.IF_NONE_MATCH]: IfNoneMatch;
	[HeaderKind.QUERY]: Query;
}

/**
 * Header error codes
 */
export enum HeaderErrorCode {
	/** Accept value does not match its grammar */
	INVALID_ACCEPT = "INVALID_ACCEPT",
	/** Accept-Charset value does not match its grammar */
	INVALID_ACCEPT_CHARSET = "INVALID_ACCEPT_CHARSET",
	/** Accept-Encoding value does not match its grammar */
	INVALID_ACCEPT_ENCODING = "INVALID_ACCEPT_ENCODING",
	/** Accept-Language value does not match its grammar */
	INVALID_ACCEPT_LANGUAGE = "INVALID_ACCEPT_LANGUAGE",
	/** If-Match value does not match its grammar */
	INVALID_IF_MATCH = "INVALID_IF_MATCH",
	/** If-None-Match value does not match its grammar */
	INVALID_IF_NONE_MATCH = "INVALID_IF_NONE_MATCH",
	/** Query string has a pair without `=` */
	INVALID_QUERY = "INVALID_QUERY",
	/** Value exceeds the configured maximum length */
	VALUE_TOO_LONG = "VALUE_TOO_LONG",
}

/**
 * Header parse error with detailed information
 */
export interface ParserError {
	/** Error code */
	code: HeaderErrorCode;
	/** Human-readable error message */
	message: string;
	/** The header the value belonged to */
	header: HeaderKind;
	/** Offset in the value where the grammar stopped matching */
	position?: number;
}

/**
 * Result of a HeaderParser operation
 */
export type HeaderParseResult<T> = { value: T; error?: undefined } | { value?: undefined; error: ParserError };

/**
 * Minimal logger accepted by HeaderParser
 */
export interface HeaderLogger {
	debug(message: string): void;
	warn(message: string): void;
}

/**
 * HeaderParser configuration options
 */
export interface HeaderParserOptions {
	/** Maximum value length in characters (default: 8192) */
	maxValueLength?: number;
	/** Whether to strip surrounding whitespace before parsing (default: true) */
	trimValues?: boolean;
	/** Logger for rejected values (default: module logger) */
	logger?: HeaderLogger;
}

/**
 * Anything that can look up a header value by name, such as a WHATWG Headers object
 */
export interface HeaderLookup {
	get(name: string): string | null | undefined;
}

/**
 * Headers extracted by HeaderParser.parseHeaders
 * A field is present only when the header was present and parsed
 */
export interface ParsedHeaders {
	accept?: AcceptEntry[];
	acceptCharset?: AcceptCharsetEntry[];
	acceptEncoding?: AcceptEncodingEntry[];
	acceptLanguage?: AcceptLanguageEntry[];
	ifMatch?: IfMatch;
	ifNoneMatch?: IfNoneMatch;
}
