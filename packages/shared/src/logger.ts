import type { Logger } from "@outfitter/contracts";

export type { Logger };

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

const LEVEL_ORDER: Record<LogLevel, number> = {
	trace: 0,
	debug: 1,
	info: 2,
	warn: 3,
	error: 4,
	fatal: 5,
};

export interface LoggerOptions {
	/** Minimum log level to output. Default: "info" */
	level?: LogLevel;
	/** Context to include in all log messages */
	context?: Record<string, unknown>;
	/**
	 * "split" sends warn/error/fatal to stderr and the rest to stdout.
	 * "stderr" sends everything to stderr. Default: "split"
	 */
	stream?: "split" | "stderr";
	/** Suppress all output (for testing). Default: false */
	silent?: boolean;
}

function shouldLog(current: LogLevel, minimum: LogLevel): boolean {
	return LEVEL_ORDER[current] >= LEVEL_ORDER[minimum];
}

export function formatMessage(
	level: LogLevel,
	message: string,
	metadata: Record<string, unknown> | undefined,
	context: Record<string, unknown>,
): string {
	const merged = metadata ? { ...context, ...metadata } : context;
	const hasContext = Object.keys(merged).length > 0;

	if (hasContext) {
		return `[${level}] ${message} ${JSON.stringify(merged)}`;
	}
	return `[${level}] ${message}`;
}

/**
 * Create a Logger that satisfies the @outfitter/contracts Logger interface.
 *
 * Lines look like `[level] message {"key":"value"}`. Child loggers inherit
 * the parent's level, stream and context.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
	const minLevel = options.level ?? "info";
	const context = options.context ?? {};
	const stream = options.stream ?? "split";
	const silent = options.silent ?? false;

	function log(
		level: LogLevel,
		message: string,
		metadata?: Record<string, unknown>,
	): void {
		if (silent || !shouldLog(level, minLevel)) return;

		const formatted = formatMessage(level, message, metadata, context);

		if (
			stream === "stderr" ||
			level === "error" ||
			level === "fatal" ||
			level === "warn"
		) {
			console.error(formatted);
		} else {
			console.log(formatted);
		}
	}

	return {
		trace: (message, metadata) => log("trace", message, metadata),
		debug: (message, metadata) => log("debug", message, metadata),
		info: (message, metadata) => log("info", message, metadata),
		warn: (message, metadata) => log("warn", message, metadata),
		error: (message, metadata) => log("error", message, metadata),
		fatal: (message, metadata) => log("fatal", message, metadata),
		child(childContext) {
			return createLogger({
				level: minLevel,
				context: { ...context, ...childContext },
				stream,
				silent,
			});
		},
	};
}

/** A no-op logger that discards all messages. Useful for tests. */
export const silentLogger: Logger = createLogger({ silent: true });
