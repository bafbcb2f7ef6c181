/**
 * Retrying decorator for an AlertSink.
 *
 * Backoff doubles per attempt up to `maxDelayMs`, with jitter, and a
 * RateLimitError's `retryAfterMs` is its floor. Only errors marked
 * `isRetryable` are retried. An alert that would be older than `maxAgeMs`
 * by the next attempt is dropped with a DeliveryError instead of being
 * sent late.
 */

import { type Logger, defaultLogger } from "../lib/logger/index.js";
import { DeliveryError, type EngineError, RateLimitError } from "../shared/errors.js";
import { type Result, err } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import {
	type AlertPayload,
	type AlertSink,
	DEFAULT_DELIVERY_RETRY_CONFIG,
	type DeliveryRetryConfig,
} from "./types.js";

export interface DeliveryRetryOptions extends Partial<DeliveryRetryConfig> {
	readonly clock?: Clock | undefined;
	readonly logger?: Logger | undefined;
	/** Pause between attempts; a timer by default. */
	readonly wait?: ((ms: number) => Promise<void>) | undefined;
	/** Source of jitter in [0, 1). */
	readonly random?: (() => number) | undefined;
}

function timerWait(ms: number): Promise<void> {
	if (ms <= 0) return Promise.resolve();
	return new Promise((resolve) => {
		setTimeout(resolve, ms);
	});
}

/** Delay before retry number `retry` (0-based), rounded to whole ms. */
export function backoffDelay(
	retry: number,
	config: DeliveryRetryConfig,
	error: EngineError,
	random: () => number = Math.random,
): number {
	const floor = error instanceof RateLimitError ? error.retryAfterMs : 0;
	const base = Math.max(Math.min(config.baseDelayMs * 2 ** retry, config.maxDelayMs), floor);
	const spread = base * config.jitterFactor;
	return Math.round(base - spread + random() * 2 * spread);
}

/**
 * @example
 * ```ts
 * const sink = withDeliveryRetry(webhookSink, { maxAttempts: 5, maxAgeMs: 60_000 });
 * ```
 */
export function withDeliveryRetry(sink: AlertSink, options: DeliveryRetryOptions = {}): AlertSink {
	const defaults = DEFAULT_DELIVERY_RETRY_CONFIG;
	const config: DeliveryRetryConfig = {
		maxAttempts: options.maxAttempts ?? defaults.maxAttempts,
		baseDelayMs: options.baseDelayMs ?? defaults.baseDelayMs,
		maxDelayMs: options.maxDelayMs ?? defaults.maxDelayMs,
		jitterFactor: options.jitterFactor ?? defaults.jitterFactor,
		maxAgeMs: options.maxAgeMs ?? defaults.maxAgeMs,
	};
	const clock = options.clock ?? SystemClock;
	const logger = options.logger ?? defaultLogger({ component: "alert-retry" });
	const wait = options.wait ?? timerWait;
	const random = options.random ?? Math.random;

	return {
		async deliver(payload: AlertPayload): Promise<Result<void, EngineError>> {
			let result = await sink.deliver(payload);
			for (let attempt = 1; attempt < config.maxAttempts; attempt++) {
				if (result.ok || !result.error.isRetryable) return result;

				const delayMs = backoffDelay(attempt - 1, config, result.error, random);
				const ageMs = clock.now() + delayMs - payload.createdAt;
				if (ageMs > config.maxAgeMs) {
					logger.warn(
						{ scopeKey: payload.scopeKey, attempts: attempt, ageMs },
						"alert too old to retry",
					);
					return err(
						new DeliveryError(`Alert for ${payload.scopeKey} expired after ${attempt} attempts`, {
							scopeKey: payload.scopeKey,
							attempts: attempt,
							ageMs,
							cause: result.error,
						}),
					);
				}

				logger.debug(
					{ scopeKey: payload.scopeKey, attempt, delayMs, code: result.error.code },
					"retrying alert delivery",
				);
				await wait(delayMs);
				result = await sink.deliver(payload);
			}
			return result;
		},
	};
}
