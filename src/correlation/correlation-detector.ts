/**
 * Threshold check over a scope's live window, with a
 * per-scope cooldown.
 *
 * A scope that fired stays quiet for one window unless an account that was
 * not in the last emitted group joins. Accounts leaving never re-trigger.
 */

import { Decimal } from "../shared/decimal.js";
import type { AccountId, InstrumentId } from "../shared/identifiers.js";
import type { TradeEvent } from "../snapshot/types.js";
import type { WindowEntry } from "../window/event-window-store.js";
import type { CorrelationGroup, EvaluationRules, ScopeKind } from "./types.js";

interface Cooldown {
	readonly emittedAt: number;
	readonly windowMs: number;
	readonly participants: ReadonlySet<AccountId>;
}

function isLater(a: WindowEntry, b: WindowEntry): boolean {
	if (a.event.timestamp !== b.event.timestamp) return a.event.timestamp > b.event.timestamp;
	return a.seq > b.seq;
}

/** Latest entry per account, ordered by (timestamp, seq). */
export function latestPerAccount(live: readonly WindowEntry[]): WindowEntry[] {
	const latest = new Map<AccountId, WindowEntry>();
	for (const entry of live) {
		const current = latest.get(entry.event.accountId);
		if (current === undefined || isLater(entry, current)) {
			latest.set(entry.event.accountId, entry);
		}
	}
	return [...latest.values()].sort(
		(a, b) => a.event.timestamp - b.event.timestamp || a.seq - b.seq,
	);
}

export class CorrelationDetector {
	readonly kind: ScopeKind;
	private readonly cooldowns = new Map<string, Cooldown>();

	constructor(kind: ScopeKind) {
		this.kind = kind;
	}

	evaluate(
		scopeKey: string,
		live: readonly WindowEntry[],
		trigger: TradeEvent,
		rules: EvaluationRules,
	): CorrelationGroup | null {
		const reduced = latestPerAccount(live);
		if (reduced.length < rules.threshold) return null;

		const now = trigger.timestamp;
		const participants = reduced.map((entry) => entry.event.accountId);
		if (this.isCoolingDown(scopeKey, participants, now, rules.windowMs)) return null;

		this.cooldowns.set(scopeKey, {
			emittedAt: now,
			windowMs: rules.windowMs,
			participants: new Set(participants),
		});
		return buildGroup(this.kind, scopeKey, reduced, trigger, rules, now);
	}

	/** Forget cooldown state for one scope, or for all. */
	reset(scopeKey?: string): void {
		if (scopeKey === undefined) {
			this.cooldowns.clear();
		} else {
			this.cooldowns.delete(scopeKey);
		}
	}

	/** Drop cooldowns whose window has passed. Returns how many were dropped. */
	pruneCooldowns(now: number): number {
		let pruned = 0;
		for (const [scopeKey, cooldown] of this.cooldowns) {
			if (now - cooldown.emittedAt >= cooldown.windowMs) {
				this.cooldowns.delete(scopeKey);
				pruned++;
			}
		}
		return pruned;
	}

	get cooldownCount(): number {
		return this.cooldowns.size;
	}

	private isCoolingDown(
		scopeKey: string,
		participants: readonly AccountId[],
		now: number,
		windowMs: number,
	): boolean {
		const cooldown = this.cooldowns.get(scopeKey);
		if (cooldown === undefined) return false;
		if (now - cooldown.emittedAt >= windowMs) return false;
		return participants.every((account) => cooldown.participants.has(account));
	}
}

function buildGroup(
	kind: ScopeKind,
	scopeKey: string,
	reduced: readonly WindowEntry[],
	trigger: TradeEvent,
	rules: EvaluationRules,
	detectedAt: number,
): CorrelationGroup {
	const events = reduced.map((entry) => entry.event);
	const participants = events.map((event) => event.accountId);
	const instruments: InstrumentId[] = [...new Set(events.map((event) => event.instrument))].sort();
	const timestamps = events.map((event) => event.timestamp);
	return Object.freeze({
		kind,
		scopeKey,
		events: Object.freeze(events),
		trigger,
		participants: Object.freeze(participants),
		participantCount: participants.length,
		instruments: Object.freeze(instruments),
		totalValue: Decimal.sum(events.map((event) => event.value)),
		windowStart: Math.min(...timestamps),
		windowEnd: Math.max(...timestamps),
		windowMs: rules.windowMs,
		threshold: rules.threshold,
		detectedAt,
	});
}
