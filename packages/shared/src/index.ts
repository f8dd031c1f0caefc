/**
 * prcast shared utilities
 *
 * Cross-cutting pieces used by the core and CLI packages.
 */

export const VERSION = "0.1.0";

// Logger
export {
	createLogger,
	formatMessage,
	silentLogger,
	type LogLevel,
	type Logger,
	type LoggerOptions,
} from "./logger";
