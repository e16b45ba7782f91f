/**
 * Error handling utilities for the header parsers
 * Provides consistent error creation across header kinds
 */

import { HeaderErrorCode, HeaderKind, type ParserError } from "./types";

/**
 * Error messages for each error code
 */
const ERROR_MESSAGES: Record<HeaderErrorCode, string> = {
	[HeaderErrorCode.INVALID_ACCEPT]: "Invalid Accept header",
	[HeaderErrorCode.INVALID_ACCEPT_CHARSET]: "Invalid Accept-Charset header",
	[HeaderErrorCode.INVALID_ACCEPT_ENCODING]: "Invalid Accept-Encoding header",
	[HeaderErrorCode.INVALID_ACCEPT_LANGUAGE]: "Invalid Accept-Language header",
	[HeaderErrorCode.INVALID_IF_MATCH]: "Invalid If-Match header",
	[HeaderErrorCode.INVALID_IF_NONE_MATCH]: "Invalid If-None-Match header",
	[HeaderErrorCode.INVALID_QUERY]: "Invalid query string",
	[HeaderErrorCode.VALUE_TOO_LONG]: "Header value too long",
};

/**
 * Grammar failure code for each header kind
 */
export const INVALID_VALUE_CODES: Record<HeaderKind, HeaderErrorCode> = {
	[HeaderKind.ACCEPT]: HeaderErrorCode.INVALID_ACCEPT,
	[HeaderKind.ACCEPT_CHARSET]: HeaderErrorCode.INVALID_ACCEPT_CHARSET,
	[HeaderKind.ACCEPT_ENCODING]: HeaderErrorCode.INVALID_ACCEPT_ENCODING,
	[HeaderKind.ACCEPT_LANGUAGE]: HeaderErrorCode.INVALID_ACCEPT_LANGUAGE,
	[HeaderKind.IF_MATCH]: HeaderErrorCode.INVALID_IF_MATCH,
	[HeaderKind.IF_NONE_MATCH]: HeaderErrorCode.INVALID_IF_NONE_MATCH,
	[HeaderKind.QUERY]: HeaderErrorCode.INVALID_QUERY,
};

/**
 * Creates a parser error with the given code and details
 * @param code - The error code
 * @param header - The header whose value was rejected
 * @param position - Optional offset in the value where matching stopped
 * @returns A ParserError object
 */
export function createError(code: HeaderErrorCode, header: HeaderKind, position?: number): ParserError {
	const error: ParserError = {
		code,
		header,
		message: ERROR_MESSAGES[code],
	};
	if (position !== undefined) {
		error.position = position;
	}
	return error;
}

/**
 * Formats an error for display, including the position when known
 */
export function formatError(error: ParserError): string {
	return error.position === undefined ? error.message : `${error.message} at position ${error.position}`;
}
