/**
 * Generic field value syntax
 * Parser infrastructure plus the RFC 7230 whitespace, token, quoted-string and #rule list grammars
 */

import { type CharacterClass, DQUOTE, inClass, QDTEXT, QUOTED_PAIR, TCHAR, WSP } from "./charsets";

/**
 * Outcome of applying a parser at an offset
 */
export type Reply<T> = { success: true; value: T; offset: number } | { success: false; offset: number };

/**
 * A parser reads from `input` starting at `offset`
 * Parsers hold no state, so backtracking is retrying from an earlier offset
 */
export type Parser<T> = (input: string, offset: number) => Reply<T>;

/**
 * Result of running a parser over a complete value
 */
export type RunResult<T> = { success: true; value: T } | { success: false; position: number };

const BACKSLASH = 0x5c;

/**
 * Builds a successful reply ending at `offset`
 */
export function succeed<T>(value: T, offset: number): Reply<T> {
	return { offset, success: true, value };
}

/**
 * Builds a failed reply at `offset`
 */
export function fail<T>(offset: number): Reply<T> {
	return { offset, success: false };
}

/**
 * Matches `text` exactly
 */
export function literal(text: string): Parser<string> {
	return (input, offset) =>
		input.startsWith(text, offset) ? succeed(text, offset + text.length) : fail(offset);
}

/**
 * Matches `text` ignoring ASCII case, returning the input as written
 */
export function literalCI(text: string): Parser<string> {
	const expected = text.toLowerCase();
	return (input, offset) => {
		const actual = input.slice(offset, offset + text.length);
		return actual.toLowerCase() === expected ? succeed(actual, offset + text.length) : fail(offset);
	};
}

/**
 * Matches between `min` and `max` characters of a class
 * Stops at `max` without looking further
 */
export function satisfyMany(set: CharacterClass, min: number, max: number = Infinity): Parser<string> {
	return (input, offset) => {
		let position = offset;
		while (
			position < input.length &&
			position - offset < max &&
			inClass(set, input.charCodeAt(position))
		) {
			position++;
		}
		if (position - offset < min) {
			return fail(position);
		}
		return succeed(input.slice(offset, position), position);
	};
}

/**
 * Transforms the value of a successful parse
 * @param parser - The parser to run
 * @param transform - Applied to the parsed value
 */
export function map<A, B>(parser: Parser<A>, transform: (value: A) => B): Parser<B> {
	return (input, offset) => {
		const reply = parser(input, offset);
		return reply.success ? succeed(transform(reply.value), reply.offset) : fail(reply.offset);
	};
}

/**
 * Runs two parsers in order and pairs their values
 */
export function pair<A, B>(first: Parser<A>, second: Parser<B>): Parser<[A, B]> {
	return (input, offset) => {
		const a = first(input, offset);
		if (!a.success) return fail(a.offset);
		const b = second(input, a.offset);
		if (!b.success) return fail(b.offset);
		const values: [A, B] = [a.value, b.value];
		return succeed(values, b.offset);
	};
}

/**
 * Runs both parsers, keeping the value of the first
 */
export function keepLeft<A>(parser: Parser<A>, skip: Parser<unknown>): Parser<A> {
	return map(pair(parser, skip), ([value]) => value);
}

/**
 * Runs both parsers, keeping the value of the second
 */
export function keepRight<B>(skip: Parser<unknown>, parser: Parser<B>): Parser<B> {
	return map(pair(skip, parser), ([, value]) => value);
}

/**
 * Runs `parser`, yielding null without consuming input when it fails
 */
export function optional<T>(parser: Parser<T>): Parser<T | null> {
	return (input, offset) => {
		const reply = parser(input, offset);
		return reply.success ? reply : succeed(null, offset);
	};
}

/**
 * Tries each alternative in order from the same offset; the first success wins
 */
export function choice<T>(...parsers: Parser<T>[]): Parser<T> {
	return (input, offset) => {
		let furthest = offset;
		for (const parser of parsers) {
			const reply = parser(input, offset);
			if (reply.success) return reply;
			furthest = Math.max(furthest, reply.offset);
		}
		return fail(furthest);
	};
}

/**
 * Succeeds without consuming input when `parser` does not match here
 */
export function notFollowedBy(parser: Parser<unknown>): Parser<null> {
	return (input, offset) => (parser(input, offset).success ? fail(offset) : succeed(null, offset));
}

/**
 * Returns the offset after any SP and HTAB characters at `offset`
 */
export function skipOws(input: string, offset: number): number {
	let position = offset;
	while (position < input.length && inClass(WSP, input.charCodeAt(position))) {
		position++;
	}
	return position;
}

/**
 * OWS = *( SP / HTAB )
 */
export const ows: Parser<null> = (input, offset) => succeed(null, skipOws(input, offset));

/**
 * BWS, whitespace allowed only for historical reasons; parsed exactly like OWS
 */
export const bws = ows;

/**
 * token = 1*tchar
 */
export const token: Parser<string> = satisfyMany(TCHAR, 1);

/**
 * quoted-string = DQUOTE *( qdtext / quoted-pair ) DQUOTE
 * The value is unescaped: `\"` becomes `"`
 */
export const quotedString: Parser<string> = (input, offset) => {
	if (input.charCodeAt(offset) !== DQUOTE) return fail(offset);

	let value = "";
	let position = offset + 1;
	while (position < input.length) {
		const code = input.charCodeAt(position);
		if (code === DQUOTE) {
			return succeed(value, position + 1);
		}
		if (code === BACKSLASH) {
			if (!inClass(QUOTED_PAIR, input.charCodeAt(position + 1))) {
				return fail(position + 1);
			}
			value += input.charAt(position + 1);
			position += 2;
			continue;
		}
		if (!inClass(QDTEXT, code)) {
			return fail(position);
		}
		value += input.charAt(position);
		position++;
	}

	// Unterminated
	return fail(position);
};

/*
 * ABNF list extension (RFC 7230 Section 7)
 *
 * Senders may produce empty list elements for backward compatibility, so
 * `, , a ,, b ,` is a valid two element list. Empty elements are skipped,
 * never returned.
 */

/**
 * #element: `OWS [element] *( OWS separator OWS [element] ) OWS`
 */
export function infix<T>(separator: Parser<unknown>, element: Parser<T>): Parser<T[]> {
	return (input, offset) => {
		const values: T[] = [];
		let position = skipOws(input, offset);

		const head = element(input, position);
		if (head.success) {
			values.push(head.value);
			position = head.offset;
		}

		for (;;) {
			const start = skipOws(input, position);
			const sep = separator(input, start);
			if (!sep.success || sep.offset === start) break;

			position = skipOws(input, sep.offset);
			const next = element(input, position);
			if (next.success) {
				values.push(next.value);
				position = next.offset;
			}
		}

		return succeed(values, skipOws(input, position));
	};
}

/**
 * 1#element: as infix, but at least one element must be present
 */
export function infix1<T>(separator: Parser<unknown>, element: Parser<T>): Parser<T[]> {
	const list = infix(separator, element);
	return (input, offset) => {
		const reply = list(input, offset);
		return reply.success && reply.value.length === 0 ? fail(offset) : reply;
	};
}

/**
 * `*( OWS separator OWS element )`, as used for `;` parameter lists
 */
export function prefix<T>(separator: Parser<unknown>, element: Parser<T>): Parser<T[]> {
	return (input, offset) => {
		const values: T[] = [];
		let position = offset;

		for (;;) {
			const start = skipOws(input, position);
			const sep = separator(input, start);
			if (!sep.success || sep.offset === start) break;

			const next = element(input, skipOws(input, sep.offset));
			if (!next.success) break;

			values.push(next.value);
			position = next.offset;
		}

		return succeed(values, position);
	};
}

/**
 * Runs a parser over the whole of `input`
 * Fails with the position where matching stopped when input is left over
 */
export function run<T>(parser: Parser<T>, input: string): RunResult<T> {
	const reply = parser(input, 0);
	if (!reply.success) {
		return { position: reply.offset, success: false };
	}
	if (reply.offset !== input.length) {
		return { position: reply.offset, success: false };
	}
	return { success: true, value: reply.value };
}

/**
 * Runs a parser over the whole of `input`, returning null on any failure
 */
export function parse<T>(parser: Parser<T>, input: string): T | null {
	const result = run(parser, input);
	return result.success ? result.value : null;
}

/**
 * Whether `value` is a non-empty token
 */
export function isToken(value: string): boolean {
	return parse(token, value) !== null;
}

/**
 * Writes `value` as a quoted-string, escaping `"` and `\`
 */
export function quote(value: string): string {
	return `"${value.replace(/["\\]/g, "\\$&")}"`;
}
