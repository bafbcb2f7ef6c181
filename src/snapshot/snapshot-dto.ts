/**
 * The only place raw exchange payloads become
 * domain snapshots.
 *
 * Source adapters map their wire format onto `SnapshotDto` and call
 * `snapshotFromDto`. Anything malformed surfaces as a `DataError`; the poller
 * then keeps the account's previous baseline.
 */

import { formatIssue, validate, z } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";
import { DataError } from "../shared/errors.js";
import { type AccountId, accountId, instrumentId, isAccountAddress } from "../shared/identifiers.js";
import { type Result, collect, err, ok } from "../shared/result.js";
import type { Position, PositionSnapshot } from "./types.js";

const decimalLike = z.union([z.string(), z.number()]);

const positionDtoSchema = z.object({
	instrument: z.string().trim().min(1),
	size: decimalLike,
	notional: decimalLike,
	entryPrice: decimalLike.nullable().optional(),
});

export const snapshotDtoSchema = z.object({
	accountId: z.string().refine(isAccountAddress, "must be a 0x-prefixed 40-hex-digit address"),
	timestamp: z.number().int().nonnegative(),
	positions: z.array(positionDtoSchema),
});

export type PositionDto = z.input<typeof positionDtoSchema>;
export type SnapshotDto = z.input<typeof snapshotDtoSchema>;

function parseDecimal(raw: string | number, field: string, instrument: string): Result<Decimal, DataError> {
	const value = Decimal.tryFrom(raw);
	if (value === null) {
		return err(new DataError(`Unparseable ${field} for ${instrument}`, { field, instrument, raw }));
	}
	return ok(value);
}

function positionFromDto(dto: z.output<typeof positionDtoSchema>): Result<Position, DataError> {
	const size = parseDecimal(dto.size, "size", dto.instrument);
	if (!size.ok) return size;
	const notional = parseDecimal(dto.notional, "notional", dto.instrument);
	if (!notional.ok) return notional;

	let entryPrice: Decimal | null = null;
	if (dto.entryPrice !== undefined && dto.entryPrice !== null) {
		const parsed = parseDecimal(dto.entryPrice, "entryPrice", dto.instrument);
		if (!parsed.ok) return parsed;
		entryPrice = parsed.value;
	}

	return ok({
		instrument: instrumentId(dto.instrument),
		size: size.value,
		notional: notional.value,
		entryPrice,
	});
}

/** Parse and validate an untrusted payload into a PositionSnapshot. */
export function snapshotFromDto(dto: unknown): Result<PositionSnapshot, DataError> {
	const parsed = validate(snapshotDtoSchema, dto, "snapshot");
	if (!parsed.ok) {
		return err(
			new DataError(parsed.error.message, {
				issues: parsed.error.issues.map(formatIssue),
			}),
		);
	}

	const positions = collect(parsed.value.positions.map(positionFromDto));
	if (!positions.ok) return positions;

	const snapshot: PositionSnapshot = {
		accountId: accountId(parsed.value.accountId),
		timestamp: parsed.value.timestamp,
		positions: positions.value,
	};
	return validateSnapshot(snapshot, snapshot.accountId);
}

/**
 * Check the structural guarantees the differ relies on.
 *
 * Rejects a snapshot for another account, a duplicate instrument, a negative
 * notional or a non-finite timestamp.
 */
export function validateSnapshot(
	snapshot: PositionSnapshot,
	expected: AccountId,
): Result<PositionSnapshot, DataError> {
	if (snapshot.accountId !== expected) {
		return err(
			new DataError("Snapshot belongs to a different account", {
				expected,
				received: snapshot.accountId,
			}),
		);
	}
	if (!Number.isFinite(snapshot.timestamp) || snapshot.timestamp < 0) {
		return err(new DataError("Snapshot timestamp is not a valid time", { accountId: expected }));
	}

	const seen = new Set<string>();
	for (const position of snapshot.positions) {
		if (seen.has(position.instrument)) {
			return err(
				new DataError("Snapshot lists an instrument twice", {
					accountId: expected,
					instrument: position.instrument,
				}),
			);
		}
		seen.add(position.instrument);
		if (position.notional.isNegative()) {
			return err(
				new DataError("Position notional must not be negative", {
					accountId: expected,
					instrument: position.instrument,
				}),
			);
		}
	}
	return ok(snapshot);
}
