/**
 * Per-scope, time-ordered buffers of recent trade events.
 *
 * A scope key is an instrument id or a category id. Every entry carries a
 * sequence number from a counter that may be shared between stores, so ties
 * on timestamp still order by arrival. Scopes whose last entry is evicted are
 * dropped from the index.
 */

import type { TradeEvent } from "../snapshot/types.js";

export interface WindowEntry {
	readonly seq: number;
	readonly event: TradeEvent;
}

export interface InsertResult {
	/** The stored entry, or null when the event was already outside the window. */
	readonly entry: WindowEntry | null;
	/** Live entries for the scope after eviction and insertion, oldest first. */
	readonly live: readonly WindowEntry[];
}

/** Monotonic insertion counter. */
export interface SequenceSource {
	next(): number;
}

export function createSequence(start = 0): SequenceSource {
	let value = start;
	return {
		next: () => {
			value += 1;
			return value;
		},
	};
}

function isExpired(entry: WindowEntry, now: number, windowMs: number): boolean {
	return now - entry.event.timestamp >= windowMs;
}

function compareEntries(a: WindowEntry, b: WindowEntry): number {
	return a.event.timestamp - b.event.timestamp || a.seq - b.seq;
}

export class EventWindowStore {
	private readonly scopes = new Map<string, WindowEntry[]>();
	private readonly sequence: SequenceSource;

	constructor(sequence: SequenceSource = createSequence()) {
		this.sequence = sequence;
	}

	/**
	 * Evict, then append. The reference time is the newest of the event and
	 * the scope's latest entry, so a late-arriving event cannot pull expired
	 * entries back into view.
	 */
	insert(scopeKey: string, event: TradeEvent, windowMs: number): InsertResult {
		const existing = this.scopes.get(scopeKey) ?? [];
		const latest = existing[existing.length - 1];
		const now = Math.max(event.timestamp, latest?.event.timestamp ?? event.timestamp);

		const kept = existing.filter((entry) => !isExpired(entry, now, windowMs));
		let entry: WindowEntry | null = null;
		if (now - event.timestamp < windowMs) {
			entry = { seq: this.sequence.next(), event };
			kept.push(entry);
			if (latest !== undefined && event.timestamp < latest.event.timestamp) {
				kept.sort(compareEntries);
			}
		}

		if (kept.length === 0) {
			this.scopes.delete(scopeKey);
		} else {
			this.scopes.set(scopeKey, kept);
		}
		return { entry, live: kept.slice() };
	}

	/** Drop entries older than `windowMs` at `now` across every scope. */
	evictExpired(now: number, windowMs: number): number {
		let evicted = 0;
		for (const [scopeKey, entries] of this.scopes) {
			const kept = entries.filter((entry) => !isExpired(entry, now, windowMs));
			evicted += entries.length - kept.length;
			if (kept.length === 0) {
				this.scopes.delete(scopeKey);
			} else if (kept.length !== entries.length) {
				this.scopes.set(scopeKey, kept);
			}
		}
		return evicted;
	}

	live(scopeKey: string): readonly WindowEntry[] {
		return this.scopes.get(scopeKey)?.slice() ?? [];
	}

	scopeKeys(): string[] {
		return [...this.scopes.keys()].sort();
	}

	/** Total entries across all scopes. */
	get size(): number {
		let total = 0;
		for (const entries of this.scopes.values()) total += entries.length;
		return total;
	}

	clear(): void {
		this.scopes.clear();
	}
}
