/**
 * Quality values (RFC 7231 Section 5.3.1)
 */

import { DIGIT } from "./charsets";
import {
	choice,
	keepLeft,
	keepRight,
	literal,
	literalCI,
	map,
	notFollowedBy,
	optional,
	ows,
	type Parser,
	satisfyMany,
} from "./syntax";

const ZERO = new Set([0x30]);

const digit = satisfyMany(DIGIT, 1, 1);

// At most three fractional digits, and no fourth one after them
const fraction = keepRight(literal("."), keepLeft(satisfyMany(DIGIT, 0, 3), notFollowedBy(digit)));
const zeroes = keepRight(literal("."), keepLeft(satisfyMany(ZERO, 0, 3), notFollowedBy(digit)));

/**
 * qvalue = ( "0" [ "." 0*3DIGIT ] ) / ( "1" [ "." 0*3("0") ] )
 */
export const qvalue: Parser<number> = choice(
	map(keepRight(literal("0"), optional(fraction)), (digits) => (digits === null ? 0 : Number(`0.${digits}`))),
	map(keepRight(literal("1"), optional(zeroes)), () => 1)
);

/**
 * weight = ";" OWS "q=" qvalue OWS, with `q=` matched case-insensitively
 */
export const weight: Parser<number> = keepRight(
	literal(";"),
	keepRight(ows, keepRight(literalCI("q="), keepLeft(qvalue, ows)))
);

/**
 * Formats a weight as a `;q=` parameter with at most three fractional digits
 */
export function formatWeight(value: number): string {
	return `;q=${value.toFixed(3).replace(/\.?0+$/, "")}`;
}
