/**
 * Header parser facade
 * Applies length limits, error reporting and logging over the header grammars
 */

import { acceptCharsetRule, acceptEncodingRule, acceptLanguageRule, acceptRule } from "./accept";
import { ifMatchRule, ifNoneMatchRule } from "./conditional";
import { createError, formatError, INVALID_VALUE_CODES } from "./errors";
import { logger } from "./logger";
import { queryRule } from "./request";
import { type Parser, run } from "./syntax";
import {
	type AcceptCharsetEntry,
	type AcceptEncodingEntry,
	type AcceptEntry,
	type AcceptLanguageEntry,
	HeaderErrorCode,
	HeaderKind,
	type HeaderLookup,
	type HeaderParseResult,
	type HeaderParserOptions,
	type HeaderValueMap,
	type IfMatch,
	type IfNoneMatch,
	type ParsedHeaders,
	type Query,
} from "./types";

/**
 * Default parser options
 */
const DEFAULT_OPTIONS: Required<HeaderParserOptions> = {
	logger,
	maxValueLength: 8192,
	trimValues: true,
};

// Leading and trailing OWS (SP / HTAB)
const SURROUNDING_OWS = /^[ \t]+|[ \t]+$/g;

const RULES: { [K in HeaderKind]: Parser<HeaderValueMap[K]> } = {
	[HeaderKind.ACCEPT]: acceptRule,
	[HeaderKind.ACCEPT_CHARSET]: acceptCharsetRule,
	[HeaderKind.ACCEPT_ENCODING]: acceptEncodingRule,
	[HeaderKind.ACCEPT_LANGUAGE]: acceptLanguageRule,
	[HeaderKind.IF_MATCH]: ifMatchRule,
	[HeaderKind.IF_NONE_MATCH]: ifNoneMatchRule,
	[HeaderKind.QUERY]: queryRule,
};

/**
 * Parses header values with configured limits
 * Instances hold only their options and can be shared freely
 */
export class HeaderParser {
	private readonly options: Required<HeaderParserOptions>;

	/**
	 * Creates a new HeaderParser instance
	 * @param options - Optional parser configuration
	 */
	constructor(options: HeaderParserOptions = {}) {
		this.options = { ...DEFAULT_OPTIONS, ...options };
	}

	/**
	 * Parses a value of the given header kind
	 * @param kind - Which grammar to apply
	 * @param raw - The field value as received
	 * @returns The parsed value, or an error describing why it was rejected
	 */
	parse<K extends HeaderKind>(kind: K, raw: string): HeaderParseResult<HeaderValueMap[K]> {
		const value = this.options.trimValues ? raw.replace(SURROUNDING_OWS, "") : raw;

		if (value.length > this.options.maxValueLength) {
			this.options.logger.warn(
				`Rejected ${kind} value of ${value.length} characters (limit ${this.options.maxValueLength})`
			);
			return { error: createError(HeaderErrorCode.VALUE_TOO_LONG, kind) };
		}

		const result = run(RULES[kind], value);
		if (!result.success) {
			const error = createError(INVALID_VALUE_CODES[kind], kind, result.position);
			this.options.logger.debug(`${formatError(error)}: ${JSON.stringify(value)}`);
			return { error };
		}

		return { value: result.value };
	}

	accept(value: string): AcceptEntry[] | null {
		return this.parse(HeaderKind.ACCEPT, value).value ?? null;
	}

	acceptCharset(value: string): AcceptCharsetEntry[] | null {
		return this.parse(HeaderKind.ACCEPT_CHARSET, value).value ?? null;
	}

	acceptEncoding(value: string): AcceptEncodingEntry[] | null {
		return this.parse(HeaderKind.ACCEPT_ENCODING, value).value ?? null;
	}

	acceptLanguage(value: string): AcceptLanguageEntry[] | null {
		return this.parse(HeaderKind.ACCEPT_LANGUAGE, value).value ?? null;
	}

	ifMatch(value: string): IfMatch | null {
		return this.parse(HeaderKind.IF_MATCH, value).value ?? null;
	}

	ifNoneMatch(value: string): IfNoneMatch | null {
		return this.parse(HeaderKind.IF_NONE_MATCH, value).value ?? null;
	}

	query(value: string): Query | null {
		return this.parse(HeaderKind.QUERY, value).value ?? null;
	}

	/**
	 * Parses every supported header present in `headers`
	 * Missing and unparsable headers are left out of the result
	 * @param headers - Header lookup, e.g. a WHATWG Headers object
	 */
	parseHeaders(headers: HeaderLookup): ParsedHeaders {
		const parsed: ParsedHeaders = {};

		const accept = this.field(headers, HeaderKind.ACCEPT);
		if (accept) parsed.accept = accept;

		const acceptCharset = this.field(headers, HeaderKind.ACCEPT_CHARSET);
		if (acceptCharset) parsed.acceptCharset = acceptCharset;

		const acceptEncoding = this.field(headers, HeaderKind.ACCEPT_ENCODING);
		if (acceptEncoding) parsed.acceptEncoding = acceptEncoding;

		const acceptLanguage = this.field(headers, HeaderKind.ACCEPT_LANGUAGE);
		if (acceptLanguage) parsed.acceptLanguage = acceptLanguage;

		const ifMatch = this.field(headers, HeaderKind.IF_MATCH);
		if (ifMatch) parsed.ifMatch = ifMatch;

		const ifNoneMatch = this.field(headers, HeaderKind.IF_NONE_MATCH);
		if (ifNoneMatch) parsed.ifNoneMatch = ifNoneMatch;

		return parsed;
	}

	/**
	 * Looks up a header by its field name (the header kind) and parses it
	 */
	private field<K extends HeaderKind>(headers: HeaderLookup, kind: K): HeaderValueMap[K] | undefined {
		const raw = headers.get(kind);
		if (raw === null || raw === undefined) {
			return undefined;
		}
		return this.parse(kind, raw).value;
	}
}
