/**
 * Per-account fetch health.
 *
 * Graduated status:
 * - Healthy: last fetch succeeded and the account is not silent
 * - Degraded: at least `degradedAfterFailures` consecutive failures
 * - Stale: `staleAfterFailures` consecutive failures, or no success for `staleAfterMs`
 *
 * A stale account stops contributing events; nothing else reacts to it.
 */

import type { EngineError } from "../shared/errors.js";
import type { AccountId } from "../shared/identifiers.js";
import { type Clock, Duration, SystemClock } from "../shared/time.js";

export const HealthStatus = {
	Healthy: "healthy",
	Degraded: "degraded",
	Stale: "stale",
} as const;

export type HealthStatus = (typeof HealthStatus)[keyof typeof HealthStatus];

export interface HealthConfig {
	readonly degradedAfterFailures: number;
	readonly staleAfterFailures: number;
	readonly staleAfterMs: number;
}

export const DEFAULT_HEALTH_CONFIG: HealthConfig = {
	degradedAfterFailures: 1,
	staleAfterFailures: 5,
	staleAfterMs: Duration.minutes(10),
};

export interface AccountHealth {
	readonly accountId: AccountId;
	readonly status: HealthStatus;
	readonly consecutiveFailures: number;
	readonly lastSuccessAt: number | null;
	readonly lastError: { readonly code: string; readonly message: string; readonly at: number } | null;
}

interface Entry {
	consecutiveFailures: number;
	lastSuccessAt: number | null;
	lastError: AccountHealth["lastError"];
	readonly firstSeenAt: number;
}

export class AccountHealthTracker {
	private readonly entries = new Map<AccountId, Entry>();
	private readonly config: HealthConfig;
	private readonly clock: Clock;

	constructor(config: HealthConfig = DEFAULT_HEALTH_CONFIG, clock: Clock = SystemClock) {
		this.config = config;
		this.clock = clock;
	}

	recordSuccess(id: AccountId): void {
		const entry = this.entry(id);
		entry.consecutiveFailures = 0;
		entry.lastSuccessAt = this.clock.now();
	}

	/** @returns the new consecutive failure count */
	recordFailure(id: AccountId, error: EngineError): number {
		const entry = this.entry(id);
		entry.consecutiveFailures++;
		entry.lastError = { code: error.code, message: error.message, at: this.clock.now() };
		return entry.consecutiveFailures;
	}

	consecutiveFailures(id: AccountId): number {
		return this.entries.get(id)?.consecutiveFailures ?? 0;
	}

	status(id: AccountId): HealthStatus {
		const entry = this.entries.get(id);
		if (entry === undefined) return HealthStatus.Healthy;
		const silentSince = entry.lastSuccessAt ?? entry.firstSeenAt;
		if (
			entry.consecutiveFailures >= this.config.staleAfterFailures ||
			this.clock.now() - silentSince >= this.config.staleAfterMs
		) {
			return HealthStatus.Stale;
		}
		if (entry.consecutiveFailures >= this.config.degradedAfterFailures) {
			return HealthStatus.Degraded;
		}
		return HealthStatus.Healthy;
	}

	snapshot(id: AccountId): AccountHealth {
		const entry = this.entries.get(id);
		return {
			accountId: id,
			status: this.status(id),
			consecutiveFailures: entry?.consecutiveFailures ?? 0,
			lastSuccessAt: entry?.lastSuccessAt ?? null,
			lastError: entry?.lastError ?? null,
		};
	}

	all(): AccountHealth[] {
		return [...this.entries.keys()].map((id) => this.snapshot(id));
	}

	forget(id: AccountId): void {
		this.entries.delete(id);
	}

	private entry(id: AccountId): Entry {
		let entry = this.entries.get(id);
		if (entry === undefined) {
			entry = {
				consecutiveFailures: 0,
				lastSuccessAt: null,
				lastError: null,
				firstSeenAt: this.clock.now(),
			};
			this.entries.set(id, entry);
		}
		return entry;
	}
}
