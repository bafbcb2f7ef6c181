/**
 * Builders for snapshots and trade events in tests and demos.
 */

import type { Position, PositionSnapshot, TradeEvent } from "../snapshot/types.js";
import { PositionSide, TradeAction } from "../snapshot/types.js";
import { Decimal } from "../shared/decimal.js";
import {
	type AccountId,
	type CategoryId,
	accountId,
	categoryId,
	instrumentId,
} from "../shared/identifiers.js";

/** Deterministic address built from a single hex digit, e.g. `testAccount("a")`. */
export function testAccount(digit: string): AccountId {
	return accountId(`0x${digit.repeat(40)}`);
}

/** `[instrument, size, notional]`; notional defaults to |size| × 1000. */
export type PositionTuple = readonly [string, string | number, (string | number)?];

export function position([instrument, size, notional]: PositionTuple): Position {
	const sized = Decimal.from(size);
	return {
		instrument: instrumentId(instrument),
		size: sized,
		notional:
			notional !== undefined ? Decimal.from(notional) : Decimal.from(`${sized.abs().toString()}e3`),
		entryPrice: null,
	};
}

export function snapshot(
	account: AccountId,
	positions: readonly PositionTuple[],
	timestamp = 0,
): PositionSnapshot {
	return { accountId: account, timestamp, positions: positions.map(position) };
}

export interface TradeEventInput {
	readonly account: AccountId;
	readonly instrument: string;
	readonly value: string | number;
	readonly timestamp: number;
	readonly action?: TradeAction | undefined;
	readonly category?: string | null | undefined;
	readonly size?: string | number | undefined;
}

/** A trade event with sensible defaults for everything but the correlation keys. */
export function tradeEvent(input: TradeEventInput): TradeEvent {
	const action = input.action ?? TradeAction.Open;
	const size = action === TradeAction.Close ? Decimal.zero() : Decimal.from(input.size ?? 1);
	const category: CategoryId | null =
		input.category === undefined || input.category === null ? null : categoryId(input.category);
	return {
		accountId: input.account,
		instrument: instrumentId(input.instrument),
		category,
		action,
		sizeDelta: size,
		previousSize: Decimal.zero(),
		size,
		value: Decimal.from(input.value),
		side: size.isZero() ? PositionSide.Flat : size.isNegative() ? PositionSide.Short : PositionSide.Long,
		timestamp: input.timestamp,
		snapshotTimestamp: input.timestamp,
	};
}
