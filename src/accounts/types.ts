/**
 * The exchange addresses whose positions are polled.
 */

import { z } from "../lib/validation/index.js";
import { type AccountId, accountId, isAccountAddress } from "../shared/identifiers.js";

export const AccountKind = {
	Vault: "vault",
	Wallet: "wallet",
} as const;

export type AccountKind = (typeof AccountKind)[keyof typeof AccountKind];

export interface TrackedAccount {
	readonly id: AccountId;
	/** Display name used in alerts; defaults to the short address. */
	readonly name: string;
	readonly kind: AccountKind;
	readonly active: boolean;
	readonly addedAt: number;
}

export interface AccountInput {
	readonly address: string;
	readonly name?: string | undefined;
	readonly kind?: AccountKind | undefined;
}

// ── Persisted form ───────────────────────────────────────────────────

const addressSchema = z
	.string()
	.refine(isAccountAddress, "Expected a 0x-prefixed 40-hex-digit address")
	.transform((value) => accountId(value));

export const accountInputSchema = z.object({
	address: addressSchema,
	name: z.string().trim().min(1).max(64).optional(),
	kind: z.enum([AccountKind.Vault, AccountKind.Wallet]).optional(),
});

const accountRecordSchema = z.object({
	address: addressSchema,
	name: z.string().min(1),
	kind: z.enum([AccountKind.Vault, AccountKind.Wallet]),
	active: z.boolean(),
	added_at: z.number().int().nonnegative(),
});

export const accountDocumentSchema = z.object({
	accounts: z.array(accountRecordSchema),
});

export type AccountDocument = z.input<typeof accountDocumentSchema>;

export function accountsToDocument(accounts: Iterable<TrackedAccount>): AccountDocument {
	return {
		accounts: [...accounts].map((account) => ({
			address: account.id,
			name: account.name,
			kind: account.kind,
			active: account.active,
			added_at: account.addedAt,
		})),
	};
}

export function accountsFromDocument(
	document: z.output<typeof accountDocumentSchema>,
): TrackedAccount[] {
	return document.accounts.map((record) => ({
		id: record.address,
		name: record.name,
		kind: record.kind,
		active: record.active,
		addedAt: record.added_at,
	}));
}
