/**
 * HTTP header field grammars
 *
 * Parsers for the content negotiation and conditional request headers
 * (RFC 7230, 7231 and 7232) and the request line tokens, producing
 * strongly-typed values.
 *
 * @packageDocumentation
 */

// Content negotiation
export * from "./accept";
// Character classes
export * from "./charsets";
// Conditional requests
export * from "./conditional";
// Errors
export * from "./errors";
// Logging
export { isDebugEnabled, LOG_NAMESPACE, logger } from "./logger";
// Facade
export { HeaderParser } from "./parser";
// Quality values
export * from "./quality";
// Request line tokens
export * from "./request";
// Generic syntax and list combinators
export * from "./syntax";
// Types
export * from "./types";

// Version
export const VERSION = "1.0.0";
