/**
 * Character classes
 * RFC 5234 Appendix B.1 core rules and the RFC 7230 Section 3.2.6 field value classes
 */

/**
 * A read-only set of character codes
 * Only membership, size and iteration are exposed, so a class cannot be changed after load
 */
export interface CharacterClass extends Iterable<number> {
	readonly size: number;
	has(code: number): boolean;
}

function range(from: number, to: number): number[] {
	const codes: number[] = [];
	for (let code = from; code <= to; code++) {
		codes.push(code);
	}
	return codes;
}

function chars(value: string): number[] {
	return Array.from(value, (char) => char.charCodeAt(0));
}

function charClass(...parts: number[][]): CharacterClass {
	const codes = new Set(parts.flat());
	return Object.freeze({
		has: (code: number) => codes.has(code),
		size: codes.size,
		[Symbol.iterator]: () => codes.values(),
	});
}

export const DQUOTE = 0x22;
export const HTAB = 0x09;
export const SP = 0x20;

/** RFC 5234 core rules */
export const ALPHA = charClass(range(0x41, 0x5a), range(0x61, 0x7a));
export const DIGIT = charClass(range(0x30, 0x39));
export const VCHAR = charClass(range(0x21, 0x7e));
export const WSP = charClass([SP, HTAB]);

/** RFC 7230 field value classes */
export const TCHAR = charClass(chars("!#$%&'*+-.^_`|~"), [...ALPHA], [...DIGIT]);
export const OBS_TEXT = charClass(range(0x80, 0xff));
export const QDTEXT = charClass([HTAB, SP, 0x21], range(0x23, 0x5b), range(0x5d, 0x7e), [...OBS_TEXT]);
export const CTEXT = charClass([HTAB, SP], range(0x21, 0x27), range(0x2a, 0x5b), range(0x5d, 0x7e), [
	...OBS_TEXT,
]);

/** Characters allowed after a backslash in a quoted-pair */
export const QUOTED_PAIR = charClass([HTAB, SP], [...VCHAR], [...OBS_TEXT]);

/**
 * Tests whether a character code belongs to a class
 * @param set - The character class
 * @param code - A UTF-16 code unit, as returned by `charCodeAt`
 */
export function inClass(set: CharacterClass, code: number): boolean {
	return set.has(code);
}
