/**
 * Turns two consecutive snapshots of one account into
 * discrete trade events.
 *
 * Rules, per instrument:
 * - absent before, present now              → open
 * - present before, absent now               → close (value 0)
 * - same sign, larger magnitude              → increase
 * - same sign, smaller magnitude             → decrease
 * - sign flipped (long ↔ short)              → a single open of the new side
 * - unchanged size                           → nothing
 *
 * A position with size exactly zero counts as absent. The first snapshot for
 * an account (`previous === null`) is a baseline and yields no events.
 */

import { Decimal } from "../shared/decimal.js";
import { InvariantViolationError } from "../shared/errors.js";
import type { AccountId, InstrumentId } from "../shared/identifiers.js";
import {
	type DiffOptions,
	type Position,
	PositionSide,
	type PositionSnapshot,
	TradeAction,
	type TradeEvent,
} from "./types.js";

function indexPositions(snapshot: PositionSnapshot): Map<InstrumentId, Position> {
	const index = new Map<InstrumentId, Position>();
	for (const position of snapshot.positions) {
		if (index.has(position.instrument)) {
			throw new InvariantViolationError("Snapshot reached the differ with a duplicate instrument", {
				accountId: snapshot.accountId,
				instrument: position.instrument,
			});
		}
		if (!position.size.isZero()) {
			index.set(position.instrument, position);
		}
	}
	return index;
}

function classifyAction(previous: Decimal, current: Decimal): TradeAction {
	if (previous.isZero()) return TradeAction.Open;
	if (current.isZero()) return TradeAction.Close;
	if (previous.sign() !== current.sign()) return TradeAction.Open;
	return current.abs().gt(previous.abs()) ? TradeAction.Increase : TradeAction.Decrease;
}

function sideOf(size: Decimal): PositionSide {
	if (size.isZero()) return PositionSide.Flat;
	return size.isNegative() ? PositionSide.Short : PositionSide.Long;
}

function assertOneEventPerInstrument(accountId: AccountId, events: readonly TradeEvent[]): void {
	const seen = new Set<InstrumentId>();
	for (const event of events) {
		if (seen.has(event.instrument)) {
			throw new InvariantViolationError("Differ produced two events for one instrument", {
				accountId,
				instrument: event.instrument,
			});
		}
		seen.add(event.instrument);
	}
}

/**
 * Diff two snapshots of the same account.
 *
 * Events are ordered by instrument id.
 *
 * @throws InvariantViolationError if either snapshot belongs to another
 * account or lists an instrument twice
 */
export function diffSnapshots(
	accountId: AccountId,
	previous: PositionSnapshot | null,
	current: PositionSnapshot,
	options: DiffOptions,
): TradeEvent[] {
	if (current.accountId !== accountId || (previous && previous.accountId !== accountId)) {
		throw new InvariantViolationError("Snapshot account does not match the diffed account", {
			accountId,
			current: current.accountId,
			previous: previous?.accountId,
		});
	}

	const after = indexPositions(current);
	if (previous === null) return [];
	const before = indexPositions(previous);

	const instruments = [...new Set([...before.keys(), ...after.keys()])].sort();
	const events: TradeEvent[] = [];

	for (const instrument of instruments) {
		const was = before.get(instrument);
		const now = after.get(instrument);
		const previousSize = was?.size ?? Decimal.zero();
		const size = now?.size ?? Decimal.zero();
		if (previousSize.eq(size)) continue;

		events.push({
			accountId,
			instrument,
			category: options.classify ? options.classify(instrument) : null,
			action: classifyAction(previousSize, size),
			sizeDelta: size.sub(previousSize),
			previousSize,
			size,
			value: now?.notional ?? Decimal.zero(),
			side: sideOf(size),
			timestamp: options.now,
			snapshotTimestamp: current.timestamp,
		});
	}

	assertOneEventPerInstrument(accountId, events);
	return events;
}
