/**
 * Request line tokens
 * Maps the method, protocol and scheme tokens to variants and splits query strings
 */

import { fail, type Parser, parse, succeed } from "./syntax";
import { HttpMethod, type Method, type Protocol, type Query, type Scheme } from "./types";

const STANDARD_METHODS: ReadonlyMap<string, HttpMethod> = new Map(
	Object.values(HttpMethod).map((method): [string, HttpMethod] => [method, method])
);

/**
 * Maps a method token to a method variant
 * Matching is exact and case-sensitive; unknown methods are custom
 * @param method - The method token from the request line
 */
export function parseMethod(method: string): Method {
	const standard = STANDARD_METHODS.get(method);
	return standard === undefined ? { kind: "custom", method } : { kind: "standard", method: standard };
}

/**
 * Maps a protocol token to a protocol variant
 * Only `HTTP/1.0` and `HTTP/1.1` are recognized; anything else is custom
 * @param protocol - The protocol token from the request line
 */
export function parseProtocol(protocol: string): Protocol {
	switch (protocol) {
		case "HTTP/1.0":
			return { kind: "http", version: 1.0 };
		case "HTTP/1.1":
			return { kind: "http", version: 1.1 };
		default:
			return { kind: "custom", protocol };
	}
}

/**
 * Maps a URI scheme to a scheme variant
 * @param scheme - The scheme, e.g. `https`
 */
export function parseScheme(scheme: string): Scheme {
	switch (scheme) {
		case "http":
			return { kind: "http" };
		case "https":
			return { kind: "https" };
		default:
			return { kind: "custom", scheme };
	}
}

/**
 * Splits `key=value` pairs separated by `&`
 * Each pair splits at its first `=`; a pair without one fails at the pair's offset.
 * Nothing is percent-decoded.
 */
export const queryRule: Parser<Query> = (input, offset) => {
	const pairs: [string, string][] = [];
	if (offset === input.length) {
		return succeed(Object.fromEntries(pairs), offset);
	}

	let position = offset;
	for (const pair of input.slice(offset).split("&")) {
		const separator = pair.indexOf("=");
		if (separator === -1) {
			return fail(position);
		}
		pairs.push([pair.slice(0, separator), pair.slice(separator + 1)]);
		position += pair.length + 1;
	}

	return succeed(Object.fromEntries(pairs), input.length);
};

/**
 * Parses a raw query string (without the leading `?`)
 * @returns The key/value mapping, later keys overwriting earlier ones, or null if any pair lacks `=`
 */
export function parseQuery(query: string): Query | null {
	return parse(queryRule, query);
}

/**
 * Writes a method back as its token
 * @param method - The method variant
 */
export function formatMethod(method: Method): string {
	return method.method;
}

/**
 * Writes a protocol back as its token
 * @param protocol - The protocol variant
 * @returns e.g. `HTTP/1.1`
 */
export function formatProtocol(protocol: Protocol): string {
	return protocol.kind === "http" ? `HTTP/${protocol.version.toFixed(1)}` : protocol.protocol;
}

/**
 * Writes a scheme back as its token
 * @param scheme - The scheme variant
 */
export function formatScheme(scheme: Scheme): string {
	return scheme.kind === "custom" ? scheme.scheme : scheme.kind;
}

/**
 * Joins a query mapping into `key=value` pairs separated by `&`
 * Nothing is percent-encoded
 * @param query - The key/value mapping
 */
export function formatQuery(query: Query): string {
	return Object.entries(query)
		.map(([key, value]) => `${key}=${value}`)
		.join("&");
}
