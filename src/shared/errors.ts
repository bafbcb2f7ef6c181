/**
 * Structured error classification.
 *
 * Every error carries a category (retryable, non-retryable, fatal). The poller
 * uses it to decide whether an account keeps its baseline and is tried again
 * next cycle, is skipped, or stops the engine.
 */

/** Error severity categories that drive retry and shutdown behaviour. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing EngineError subclasses with optional cause chain. */
interface EngineErrorOptions {
	readonly cause?: unknown;
}

type ErrorContext = Record<string, unknown> & EngineErrorOptions;

/** Base error class for the engine, with category-based retry semantics. */
export class EngineError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "EngineError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	get isFatal(): boolean {
		return this.category === ErrorCategory.Fatal;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

function splitCause(context: ErrorContext): {
	cause: unknown;
	rest: Record<string, unknown>;
} {
	const { cause, ...rest } = context;
	return { cause, rest };
}

// ── Specific error types ─────────────────────────────────────────────

/** Retryable error for a snapshot source that could not be reached. */
export class FetchError extends EngineError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "FETCH_ERROR", ErrorCategory.Retryable, rest);
		this.name = "FetchError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Retryable error for a snapshot fetch that exceeded its deadline. */
export class TimeoutError extends EngineError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "TIMEOUT_ERROR", ErrorCategory.Retryable, rest);
		this.name = "TimeoutError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Retryable error for a throttled request; carries the retry-after hint. */
export class RateLimitError extends EngineError {
	readonly retryAfterMs: number;
	constructor(message: string, retryAfterMs: number, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "RATE_LIMIT_ERROR", ErrorCategory.Retryable, rest);
		this.name = "RateLimitError";
		this.retryAfterMs = retryAfterMs;
		if (cause !== undefined) this.cause = cause;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			retryAfterMs: this.retryAfterMs,
		};
	}
}

/** Retryable error raised by an alert sink that failed to deliver. */
export class DeliveryError extends EngineError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "DELIVERY_ERROR", ErrorCategory.Retryable, rest);
		this.name = "DeliveryError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Retryable error for a rule, account or journal file that could not be read or written. */
export class StorageError extends EngineError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "STORAGE_ERROR", ErrorCategory.Retryable, rest);
		this.name = "StorageError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Non-retryable error for a malformed snapshot or trade event. */
export class DataError extends EngineError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "DATA_ERROR", ErrorCategory.NonRetryable, rest);
		this.name = "DataError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for invalid or missing configuration. */
export class ConfigError extends EngineError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for a broken internal guarantee; the engine stops when it sees one. */
export class InvariantViolationError extends EngineError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "INVARIANT_VIOLATION", ErrorCategory.Fatal, rest);
		this.name = "InvariantViolationError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for unexpected internal failures. */
export class SystemError extends EngineError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, rest);
		this.name = "SystemError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification helper ────────────────────────────────────────────

/** HTTP status carried on the error, its `context`, or its direct cause. */
function httpStatus(error: unknown, depth = 0): number | undefined {
	if (typeof error !== "object" || error === null || depth > 2) return undefined;
	if ("status" in error && typeof error.status === "number" && error.status >= 400) {
		return error.status;
	}
	if ("context" in error) {
		const fromContext = httpStatus(error.context, depth + 1);
		if (fromContext !== undefined) return fromContext;
	}
	if ("cause" in error) {
		return httpStatus(error.cause, depth + 1);
	}
	return undefined;
}

function errorCode(error: Error): string | undefined {
	return "code" in error && typeof error.code === "string" ? error.code : undefined;
}

const CONNECTION_CODES = new Set(["ECONNREFUSED", "ENOTFOUND", "ECONNRESET", "EAI_AGAIN", "EPIPE"]);

/**
 * Classify an unknown thrown value into the hierarchy by inspecting its
 * HTTP status, Node error code and message.
 */
export function classifyError(error: unknown): EngineError {
	if (error instanceof EngineError) return error;
	if (error instanceof Error) {
		const msg = error.message.toLowerCase();
		const code = errorCode(error);
		const status = httpStatus(error);

		if (status === 429 || code === "429" || code === "HTTP_429") {
			return new RateLimitError(error.message, 1000, { cause: error });
		}
		if (status !== undefined && status >= 500) {
			return new FetchError(error.message, { cause: error, status });
		}
		if (status !== undefined) {
			return new DataError(error.message, { cause: error, status });
		}

		if (code === "ETIMEDOUT" || error.name === "AbortError" || error.name === "TimeoutError") {
			return new TimeoutError(error.message, { cause: error });
		}
		if (code !== undefined && CONNECTION_CODES.has(code)) {
			return new FetchError(error.message, { cause: error, code });
		}

		if (msg.includes("timeout") || msg.includes("timed out")) {
			return new TimeoutError(error.message, { cause: error });
		}
		if (msg.includes("econnrefused") || msg.includes("enotfound") || msg.includes("fetch failed")) {
			return new FetchError(error.message, { cause: error });
		}
		if (msg.includes("rate limit")) {
			return new RateLimitError(error.message, 1000, { cause: error });
		}
		return new SystemError(error.message, { cause: error });
	}
	return new SystemError(String(error), { cause: error });
}
