import { ConfigError, RateLimitError } from "../../shared/errors.js";
import type { Clock } from "../../shared/time.js";

/**
 * Configuration for TokenBucketRateLimiter.
 */
export interface RateLimiterConfig {
	readonly capacity: number;
	/** Tokens added per second. */
	readonly refillRate: number;
	readonly clock: Clock;
}

export interface RateLimiterStats {
	readonly acquired: number;
	readonly waits: number;
	readonly timeouts: number;
}

function delay(ms: number): Promise<void> {
	return new Promise((resolve) => {
		setTimeout(resolve, ms);
	});
}

/**
 * Token-bucket rate limiter placed in front of snapshot fetches so a large
 * account list does not burst the upstream API.
 *
 * Tokens accumulate at `refillRate` per second up to `capacity`. `acquire()`
 * sleeps until the next token is due instead of polling.
 */
export class TokenBucketRateLimiter {
	private readonly capacity: number;
	private readonly refillRate: number;
	private readonly clock: Clock;
	private tokens: number;
	private lastRefillMs: number;

	private _acquired = 0;
	private _waits = 0;
	private _timeouts = 0;

	constructor(config: RateLimiterConfig) {
		if (config.capacity < 1) {
			throw new ConfigError("capacity must be >= 1", { capacity: config.capacity });
		}
		if (config.refillRate <= 0) {
			throw new ConfigError("refillRate must be > 0", { refillRate: config.refillRate });
		}
		this.capacity = config.capacity;
		this.refillRate = config.refillRate;
		this.clock = config.clock;
		this.tokens = config.capacity;
		this.lastRefillMs = this.clock.now();
	}

	/** Takes a token if one is available right now. */
	tryAcquire(): boolean {
		this.refill();
		if (this.tokens >= 1) {
			this.tokens -= 1;
			this._acquired++;
			return true;
		}
		return false;
	}

	/** Whole tokens available now. */
	availableTokens(): number {
		this.refill();
		return Math.floor(this.tokens);
	}

	/** 0 when a token is available now. */
	timeUntilNextTokenMs(): number {
		this.refill();
		if (this.tokens >= 1) {
			return 0;
		}
		return Math.ceil(((1 - this.tokens) / this.refillRate) * 1000);
	}

	/**
	 * Waits for a token, then takes it.
	 * @throws RateLimitError if no token is available within `timeoutMs`
	 */
	async acquire(timeoutMs = 30_000): Promise<void> {
		if (this.tryAcquire()) return;

		this._waits++;
		const deadline = this.clock.now() + timeoutMs;
		for (;;) {
			const wait = this.timeUntilNextTokenMs();
			const remaining = deadline - this.clock.now();
			if (wait > remaining) {
				this._timeouts++;
				throw new RateLimitError("Timed out waiting for a rate limit token", wait, {
					timeoutMs,
				});
			}
			await delay(wait);
			if (this.tryAcquire()) return;
		}
	}

	getStats(): RateLimiterStats {
		return {
			acquired: this._acquired,
			waits: this._waits,
			timeouts: this._timeouts,
		};
	}

	private refill(): void {
		const now = this.clock.now();
		const elapsedMs = now - this.lastRefillMs;
		if (elapsedMs <= 0) return;

		const newTokens = (elapsedMs / 1000) * this.refillRate;
		this.tokens = Math.min(this.capacity, this.tokens + newTokens);
		this.lastRefillMs = now;
	}
}
