/**
 * Simple logger for http-header-grammar
 * Debug output is disabled unless DEBUG names this package (or is "*")
 */

import process from "node:process";
import type { HeaderLogger } from "./types";

export const LOG_NAMESPACE = "http-header-grammar";

/**
 * Whether DEBUG, a comma separated list, names this package or `*`
 */
export const isDebugEnabled = (): boolean => {
	const debug = process.env["DEBUG"] ?? "";
	return debug
		.split(",")
		.map((name) => name.trim())
		.some((name) => name === "*" || name === LOG_NAMESPACE);
};

// Logger - mockable in tests
export const logger: HeaderLogger = {
	debug: (message: string) => {
		if (isDebugEnabled()) {
			console.debug(`[${LOG_NAMESPACE}] ${message}`);
		}
	},
	warn: (message: string) => console.warn(`[${LOG_NAMESPACE}] ${message}`),
};
