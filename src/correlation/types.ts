/**
 * What the detector emits when enough distinct accounts
 * move on one scope inside its window.
 */

import type { Decimal } from "../shared/decimal.js";
import type { AccountId, InstrumentId } from "../shared/identifiers.js";
import type { TradeEvent } from "../snapshot/types.js";

// ── Scope ────────────────────────────────────────────────────────────

export const ScopeKind = {
	/** Keyed by instrument id. */
	Instrument: "instrument",
	/** Keyed by category id. */
	Category: "category",
} as const;

export type ScopeKind = (typeof ScopeKind)[keyof typeof ScopeKind];

// ── Groups ───────────────────────────────────────────────────────────

/**
 * One alert-worthy cluster. `events` holds the latest event of each
 * participating account, ordered by (timestamp, seq). Frozen on creation.
 */
export interface CorrelationGroup {
	readonly kind: ScopeKind;
	readonly scopeKey: string;
	readonly events: readonly TradeEvent[];
	/** The inserted event whose arrival produced the group. */
	readonly trigger: TradeEvent;
	readonly participants: readonly AccountId[];
	readonly participantCount: number;
	/** Distinct instruments among `events`, sorted. */
	readonly instruments: readonly InstrumentId[];
	readonly totalValue: Decimal;
	readonly windowStart: number;
	readonly windowEnd: number;
	readonly windowMs: number;
	readonly threshold: number;
	readonly detectedAt: number;
}

export interface EvaluationRules {
	readonly threshold: number;
	readonly windowMs: number;
}
