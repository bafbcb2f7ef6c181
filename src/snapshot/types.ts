/**
 * Snapshot and trade-event types.
 *
 * A PositionSnapshot is the full set of open positions one account reported at
 * one instant. Diffing consecutive snapshots yields TradeEvents, the unit the
 * correlation layer works on.
 */

import type { Decimal } from "../shared/decimal.js";
import type { EngineError } from "../shared/errors.js";
import type { AccountId, CategoryId, InstrumentId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";

// ── Positions ────────────────────────────────────────────────────────

export interface Position {
	readonly instrument: InstrumentId;
	/** Signed: positive long, negative short. */
	readonly size: Decimal;
	/** Absolute notional value in quote currency. */
	readonly notional: Decimal;
	readonly entryPrice: Decimal | null;
}

export interface PositionSnapshot {
	readonly accountId: AccountId;
	/** Exchange-reported time of the snapshot (ms). */
	readonly timestamp: number;
	readonly positions: readonly Position[];
}

// ── Trade events ─────────────────────────────────────────────────────

export const TradeAction = {
	Open: "open",
	Increase: "increase",
	Decrease: "decrease",
	Close: "close",
} as const;

export type TradeAction = (typeof TradeAction)[keyof typeof TradeAction];

export const PositionSide = {
	Long: "long",
	Short: "short",
	Flat: "flat",
} as const;

export type PositionSide = (typeof PositionSide)[keyof typeof PositionSide];

/** One account changing its exposure to one instrument between two snapshots. */
export interface TradeEvent {
	readonly accountId: AccountId;
	readonly instrument: InstrumentId;
	readonly category: CategoryId | null;
	readonly action: TradeAction;
	/** `size - previousSize`, signed. */
	readonly sizeDelta: Decimal;
	readonly previousSize: Decimal;
	/** Resulting signed size; zero after a close. */
	readonly size: Decimal;
	/** Resulting notional value; zero after a close. */
	readonly value: Decimal;
	/** Resulting side. */
	readonly side: PositionSide;
	/** Detection time (engine clock, ms). */
	readonly timestamp: number;
	readonly snapshotTimestamp: number;
}

// ── Collaborators ────────────────────────────────────────────────────

export interface FetchOptions {
	readonly signal: AbortSignal;
}

/**
 * Read-only view of an exchange's account state. Implementations translate
 * their wire format through `snapshotFromDto`.
 */
export interface SnapshotSource {
	readonly name: string;
	fetchSnapshot(
		accountId: AccountId,
		options: FetchOptions,
	): Promise<Result<PositionSnapshot, EngineError>>;
}

export type ClassifyFn = (instrument: InstrumentId) => CategoryId | null;

export interface DiffOptions {
	/** Detection time stamped on every produced event. */
	readonly now: number;
	readonly classify?: ClassifyFn | undefined;
}

/** Strategy that turns two consecutive snapshots into trade events. */
export type TradeDiffer = (
	accountId: AccountId,
	previous: PositionSnapshot | null,
	current: PositionSnapshot,
	options: DiffOptions,
) => TradeEvent[];
