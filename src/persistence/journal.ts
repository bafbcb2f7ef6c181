/**
 * Append-only history of what the engine detected.
 *
 * Decimals are stored as strings and identifiers as plain strings so that
 * entries survive a JSON round trip unchanged.
 */

import type { CorrelationGroup, ScopeKind } from "../correlation/types.js";
import { z } from "../lib/validation/index.js";
import type { RuleName, RuleSet } from "../rules/types.js";
import { ruleSetToDto } from "../rules/types.js";
import type { EngineError } from "../shared/errors.js";
import type { AccountId } from "../shared/identifiers.js";
import type { PositionSide, TradeAction, TradeEvent } from "../snapshot/types.js";

export interface Journal {
	record(entry: JournalEntry): Promise<void>;
	flush(): Promise<void>;
}

export type JournalEntry =
	| {
			readonly type: "trade_detected";
			readonly accountId: string;
			readonly instrument: string;
			readonly category: string | null;
			readonly action: TradeAction;
			readonly side: PositionSide;
			readonly sizeDelta: string;
			readonly size: string;
			readonly value: string;
			readonly snapshotTimestamp: number;
			readonly timestamp: number;
	  }
	| {
			readonly type: "correlation_emitted";
			readonly kind: ScopeKind;
			readonly scopeKey: string;
			readonly participants: readonly string[];
			readonly instruments: readonly string[];
			readonly totalValue: string;
			readonly threshold: number;
			readonly windowStart: number;
			readonly windowEnd: number;
			readonly windowMs: number;
			readonly timestamp: number;
	  }
	| {
			readonly type: "fetch_failed";
			readonly accountId: string;
			readonly code: string;
			readonly message: string;
			readonly consecutiveFailures: number;
			readonly timestamp: number;
	  }
	| {
			readonly type: "baseline_reset";
			readonly accountId: string;
			readonly consecutiveFailures: number;
			readonly timestamp: number;
	  }
	| {
			readonly type: "rule_changed";
			readonly changed: readonly RuleName[];
			readonly rules: ReturnType<typeof ruleSetToDto>;
			readonly timestamp: number;
	  };

export type JournalEntryType = JournalEntry["type"];

// ── Entry builders ───────────────────────────────────────────────────

export function tradeDetected(event: TradeEvent): JournalEntry {
	return {
		type: "trade_detected",
		accountId: event.accountId,
		instrument: event.instrument,
		category: event.category,
		action: event.action,
		side: event.side,
		sizeDelta: event.sizeDelta.toString(),
		size: event.size.toString(),
		value: event.value.toString(),
		snapshotTimestamp: event.snapshotTimestamp,
		timestamp: event.timestamp,
	};
}

export function correlationEmitted(group: CorrelationGroup): JournalEntry {
	return {
		type: "correlation_emitted",
		kind: group.kind,
		scopeKey: group.scopeKey,
		participants: [...group.participants],
		instruments: [...group.instruments],
		totalValue: group.totalValue.toString(),
		threshold: group.threshold,
		windowStart: group.windowStart,
		windowEnd: group.windowEnd,
		windowMs: group.windowMs,
		timestamp: group.detectedAt,
	};
}

export function fetchFailed(
	accountId: AccountId,
	error: EngineError,
	consecutiveFailures: number,
	timestamp: number,
): JournalEntry {
	return {
		type: "fetch_failed",
		accountId,
		code: error.code,
		message: error.message,
		consecutiveFailures,
		timestamp,
	};
}

export function baselineReset(
	accountId: AccountId,
	consecutiveFailures: number,
	timestamp: number,
): JournalEntry {
	return { type: "baseline_reset", accountId, consecutiveFailures, timestamp };
}

export function ruleChanged(
	rules: RuleSet,
	changed: readonly RuleName[],
	timestamp: number,
): JournalEntry {
	return { type: "rule_changed", changed: [...changed], rules: ruleSetToDto(rules), timestamp };
}

// ── Reading back ─────────────────────────────────────────────────────

export const correlationEntrySchema = z.object({
	type: z.literal("correlation_emitted"),
	kind: z.enum(["instrument", "category"]),
	scopeKey: z.string(),
	participants: z.array(z.string()),
	instruments: z.array(z.string()),
	totalValue: z.string(),
	threshold: z.number().int(),
	windowStart: z.number(),
	windowEnd: z.number(),
	windowMs: z.number(),
	timestamp: z.number(),
});

export type CorrelationEntry = z.infer<typeof correlationEntrySchema>;
