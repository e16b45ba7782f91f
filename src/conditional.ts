/**
 * Conditional request headers (RFC 7232)
 * Entity tags, If-Match and If-None-Match
 */

import { choice, infix, keepLeft, keepRight, literal, map, ows, type Parser, parse, token } from "./syntax";
import type { EntityTag, IfMatch, IfNoneMatch } from "./types";

const dquote = literal('"');

const opaqueTag = keepRight(dquote, keepLeft(token, dquote));

/**
 * entity-tag = [ "W/" ] DQUOTE token DQUOTE
 * The weak indicator is case-sensitive
 */
export const entityTag: Parser<EntityTag> = choice(
	map(keepRight(literal("W/"), opaqueTag), (tag): EntityTag => ({ kind: "weak", tag })),
	map(opaqueTag, (tag): EntityTag => ({ kind: "strong", tag }))
);

const anyTag = keepRight(ows, keepLeft(literal("*"), ows));

const entityTags = infix(literal(","), entityTag);

/**
 * If-Match = "*" / 1#entity-tag
 */
export const ifMatchRule: Parser<IfMatch> = choice(
	map(anyTag, (): IfMatch => ({ kind: "any" })),
	map(entityTags, (tags): IfMatch => ({ kind: "tags", tags }))
);

/**
 * If-None-Match = "*" / 1#entity-tag
 */
export const ifNoneMatchRule: Parser<IfNoneMatch> = choice(
	map(anyTag, (): IfNoneMatch => ({ kind: "any" })),
	map(entityTags, (tags): IfNoneMatch => ({ kind: "tags", tags }))
);

/**
 * Parses an If-Match header value
 * @param value - The field value
 * @returns The wildcard or the listed tags, or null if the value is malformed
 */
export function ifMatch(value: string): IfMatch | null {
	return parse(ifMatchRule, value);
}

/**
 * Parses an If-None-Match header value
 * @param value - The field value
 * @returns The wildcard or the listed tags, or null if the value is malformed
 */
export function ifNoneMatch(value: string): IfNoneMatch | null {
	return parse(ifNoneMatchRule, value);
}

/**
 * Strong comparison (RFC 7232 Section 2.3.2): both tags strong and identical
 */
export function strongCompare(a: EntityTag, b: EntityTag): boolean {
	return a.kind === "strong" && b.kind === "strong" && a.tag === b.tag;
}

/**
 * Weak comparison (RFC 7232 Section 2.3.2): identical opaque tags, either may be weak
 */
export function weakCompare(a: EntityTag, b: EntityTag): boolean {
	return a.tag === b.tag;
}

/**
 * Writes an entity tag, prefixing weak tags with `W/`
 * @param tag - The entity tag
 */
export function formatEntityTag(tag: EntityTag): string {
	return tag.kind === "weak" ? `W/"${tag.tag}"` : `"${tag.tag}"`;
}

function formatTags(value: IfMatch | IfNoneMatch): string {
	return value.kind === "any" ? "*" : value.tags.map(formatEntityTag).join(", ");
}

/**
 * Formats an If-Match value
 * @param value - `*` or a list of entity tags
 */
export function formatIfMatch(value: IfMatch): string {
	return formatTags(value);
}

/**
 * Formats an If-None-Match value
 * @param value - `*` or a list of entity tags
 */
export function formatIfNoneMatch(value: IfNoneMatch): string {
	return formatTags(value);
}
