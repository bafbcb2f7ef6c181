/**
 * The set of tracked accounts, persisted as one document.
 *
 * Addresses are compared lower-cased. Every change is written to the store
 * before the in-memory map is replaced; writes are serialized.
 */

import { type Logger, defaultLogger } from "../lib/logger/index.js";
import { ValidationError, validate } from "../lib/validation/index.js";
import type { DocumentStore } from "../persistence/document-store.js";
import type { StorageError } from "../shared/errors.js";
import { type AccountId, shortAccount } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import {
	type AccountInput,
	AccountKind,
	type TrackedAccount,
	accountDocumentSchema,
	accountInputSchema,
	accountsFromDocument,
	accountsToDocument,
} from "./types.js";

export type AccountWriteError = ValidationError | StorageError;

/** Called after a change is persisted; `previous` is null for a new account. */
export type AccountChangeListener = (
	account: TrackedAccount,
	previous: TrackedAccount | null,
) => void;

export interface AccountRegistryOptions {
	readonly store: DocumentStore;
	readonly clock?: Clock | undefined;
	readonly logger?: Logger | undefined;
}

function unknownAccount(id: string): ValidationError {
	return new ValidationError(`Unknown account: ${id}`, [
		{ path: ["address"], message: "Not tracked" },
	]);
}

export class AccountRegistry {
	private accounts: ReadonlyMap<AccountId, TrackedAccount>;
	private readonly store: DocumentStore;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly listeners = new Set<AccountChangeListener>();
	private writeQueue: Promise<unknown> = Promise.resolve();

	private constructor(
		accounts: readonly TrackedAccount[],
		store: DocumentStore,
		clock: Clock,
		logger: Logger,
	) {
		this.accounts = new Map(accounts.map((account) => [account.id, account]));
		this.store = store;
		this.clock = clock;
		this.logger = logger;
	}

	static async create(
		options: AccountRegistryOptions,
	): Promise<Result<AccountRegistry, AccountWriteError>> {
		const clock = options.clock ?? SystemClock;
		const logger = options.logger ?? defaultLogger({ component: "accounts" });
		const loaded = await options.store.load();
		if (!loaded.ok) return loaded;
		if (loaded.value === null) {
			return ok(new AccountRegistry([], options.store, clock, logger));
		}
		const parsed = validate(accountDocumentSchema, loaded.value.document, "account list");
		if (!parsed.ok) return parsed;
		const accounts = accountsFromDocument(parsed.value);
		const ids = new Set(accounts.map((account) => account.id));
		if (ids.size !== accounts.length) {
			return err(
				new ValidationError("Invalid account list: duplicate address", [
					{ path: ["accounts"], message: "Duplicate address" },
				]),
			);
		}
		logger.info({ total: accounts.length }, "accounts loaded");
		return ok(new AccountRegistry(accounts, options.store, clock, logger));
	}

	// ── Reads ──────────────────────────────────────────────────────

	get(id: AccountId): TrackedAccount | null {
		return this.accounts.get(id) ?? null;
	}

	/** Accounts that are polled, in insertion order. */
	active(): TrackedAccount[] {
		return [...this.accounts.values()].filter((account) => account.active);
	}

	all(): TrackedAccount[] {
		return [...this.accounts.values()];
	}

	/** Display name, or the short address for an untracked id. */
	displayName(id: AccountId): string {
		return this.accounts.get(id)?.name ?? shortAccount(id);
	}

	get size(): number {
		return this.accounts.size;
	}

	onChange(listener: AccountChangeListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	// ── Writes ─────────────────────────────────────────────────────

	add(input: AccountInput): Promise<Result<TrackedAccount, AccountWriteError>> {
		return this.enqueue(async () => {
			const parsed = validate(accountInputSchema, input, "account");
			if (!parsed.ok) return parsed;
			const id = parsed.value.address;
			if (this.accounts.has(id)) {
				return err(
					new ValidationError(`Account already tracked: ${id}`, [
						{ path: ["address"], message: "Duplicate address" },
					]),
				);
			}
			const account: TrackedAccount = {
				id,
				name: parsed.value.name ?? shortAccount(id),
				kind: parsed.value.kind ?? AccountKind.Vault,
				active: true,
				addedAt: this.clock.now(),
			};
			const saved = await this.commit(account);
			if (!saved.ok) return saved;
			this.logger.info({ accountId: id, name: account.name, kind: account.kind }, "account added");
			return ok(account);
		});
	}

	/** Stop polling an account; its record is kept. */
	deactivate(id: AccountId): Promise<Result<TrackedAccount, AccountWriteError>> {
		return this.setActive(id, false);
	}

	activate(id: AccountId): Promise<Result<TrackedAccount, AccountWriteError>> {
		return this.setActive(id, true);
	}

	private setActive(
		id: AccountId,
		active: boolean,
	): Promise<Result<TrackedAccount, AccountWriteError>> {
		return this.enqueue(async () => {
			const existing = this.accounts.get(id);
			if (existing === undefined) return err(unknownAccount(id));
			if (existing.active === active) return ok(existing);
			const updated: TrackedAccount = { ...existing, active };
			const saved = await this.commit(updated);
			if (!saved.ok) return saved;
			this.logger.info({ accountId: id, active }, "account status changed");
			return ok(updated);
		});
	}

	private async commit(account: TrackedAccount): Promise<Result<void, StorageError>> {
		const previous = this.accounts.get(account.id) ?? null;
		const next = new Map(this.accounts);
		next.set(account.id, account);
		const saved = await this.store.save(accountsToDocument(next.values()));
		if (!saved.ok) {
			this.logger.error(
				{ accountId: account.id, error: saved.error.message },
				"account change not persisted",
			);
			return saved;
		}
		this.accounts = next;
		for (const listener of this.listeners) {
			try {
				listener(account, previous);
			} catch (error: unknown) {
				this.logger.error({ error: String(error) }, "account change listener threw");
			}
		}
		return ok(undefined);
	}

	private enqueue<T>(task: () => Promise<T>): Promise<T> {
		const run = this.writeQueue.then(task);
		this.writeQueue = run.catch(() => undefined);
		return run;
	}
}
