/**
 * Branded strings for accounts, instruments and categories.
 *
 * Brands stop an instrument symbol from being passed where an account address
 * is expected. Factories normalise the raw value and throw on malformed input;
 * boundary code that must not throw checks with the `is*` predicates first.
 */

import { isAddress } from "viem";

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Exchange account address (vault or wallet), always lower-case. */
export type AccountId = Brand<string, "AccountId">;
/** Tradable instrument symbol, e.g. `ETH`, always upper-case. */
export type InstrumentId = Brand<string, "InstrumentId">;
/** Thematic category key from the classifier table, e.g. `AI`. */
export type CategoryId = Brand<string, "CategoryId">;

// ── Factory functions with validation ────────────────────────────────

function createSymbolId<B extends string>(value: string, label: B): Brand<string, B> {
	const trimmed = value.trim().toUpperCase();
	if (trimmed.length === 0) {
		throw new Error(`${label} cannot be empty`);
	}
	return trimmed as Brand<string, B>;
}

/** True when `value` is a 0x-prefixed, 20-byte hex address. */
export function isAccountAddress(value: string): boolean {
	return isAddress(value.trim().toLowerCase(), { strict: false });
}

/** Create an AccountId from an address. Throws if it is not a valid address. */
export function accountId(value: string): AccountId {
	const normalised = value.trim().toLowerCase();
	if (!isAddress(normalised, { strict: false })) {
		throw new Error(`AccountId must be a 0x-prefixed 40-hex-digit address, got: ${value}`);
	}
	return normalised as AccountId;
}

/** Create an InstrumentId. Throws if empty. */
export function instrumentId(value: string): InstrumentId {
	return createSymbolId(value, "InstrumentId");
}

/** Create a CategoryId. Throws if empty. */
export function categoryId(value: string): CategoryId {
	return createSymbolId(value, "CategoryId");
}

// ── Display ──────────────────────────────────────────────────────────

/** `0x1234...abcd` form used in alerts and logs. */
export function shortAccount(id: AccountId): string {
	return `${id.slice(0, 6)}...${id.slice(-4)}`;
}
