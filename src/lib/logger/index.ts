/**
 * Domain-agnostic structured logging backed by pino.
 *
 * Components take an optional `Logger`; when none is passed they build one
 * with `defaultLogger({ component })` so every line says where it came from.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

/** Log severity levels from least to most severe. */
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerConfig {
	readonly level: LogLevel | "silent";
	readonly redactPaths?: readonly string[] | undefined;
	readonly bindings?: Record<string, unknown> | undefined;
	/** Alternative sink for the JSON lines, e.g. a test buffer. */
	readonly destination?: { write(msg: string): void } | undefined;
}

interface LogMethod {
	(msg: string): void;
	(obj: Record<string, unknown>, msg: string): void;
}

/** Structured logger interface. Fields go in the object, never in the message. */
export interface Logger {
	trace: LogMethod;
	debug: LogMethod;
	info: LogMethod;
	warn: LogMethod;
	error: LogMethod;
	fatal: LogMethod;
	child(bindings: Record<string, unknown>): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

// ── Factory ─────────────────────────────────────────────────────────

function method(pinoLogger: pino.Logger, level: LogLevel): LogMethod {
	return (msgOrObj: string | Record<string, unknown>, msg?: string): void => {
		if (typeof msgOrObj === "string") {
			pinoLogger[level](msgOrObj);
		} else {
			pinoLogger[level](msgOrObj, msg ?? "");
		}
	};
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		trace: method(pinoLogger, "trace"),
		debug: method(pinoLogger, "debug"),
		info: method(pinoLogger, "info"),
		warn: method(pinoLogger, "warn"),
		error: method(pinoLogger, "error"),
		fatal: method(pinoLogger, "fatal"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info", bindings: { component: "poller" } });
 * logger.info({ accountId }, "snapshot fetched");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	const base = config.destination ? pino(pinoOptions, config.destination) : pino(pinoOptions);
	return wrapPino(config.bindings ? base.child(config.bindings) : base);
}

/** Info-level logger on stdout with the given bindings. */
export function defaultLogger(bindings: Record<string, unknown>): Logger {
	return createLogger({ level: "info", bindings });
}

/** Logger that drops everything. */
export function silentLogger(): Logger {
	return createLogger({ level: "silent" });
}
