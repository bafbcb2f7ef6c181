import type { AccountId } from "../shared/identifiers.js";
import type { PositionSnapshot } from "./types.js";

interface Baseline {
	readonly previous: PositionSnapshot | null;
	readonly current: PositionSnapshot;
}

/**
 * Last two accepted snapshots per account.
 *
 * Only the poller writes here, and only after a snapshot has been validated
 * and diffed, so a failed fetch never moves the baseline.
 */
export class BaselineStore {
	private readonly baselines = new Map<AccountId, Baseline>();

	current(accountId: AccountId): PositionSnapshot | null {
		return this.baselines.get(accountId)?.current ?? null;
	}

	previous(accountId: AccountId): PositionSnapshot | null {
		return this.baselines.get(accountId)?.previous ?? null;
	}

	has(accountId: AccountId): boolean {
		return this.baselines.has(accountId);
	}

	/** Promote `current` to `previous` and store the new snapshot. */
	commit(snapshot: PositionSnapshot): void {
		const existing = this.baselines.get(snapshot.accountId);
		this.baselines.set(snapshot.accountId, {
			previous: existing?.current ?? null,
			current: snapshot,
		});
	}

	/** Forget an account; its next snapshot becomes a fresh baseline. */
	reset(accountId: AccountId): boolean {
		return this.baselines.delete(accountId);
	}

	accounts(): AccountId[] {
		return [...this.baselines.keys()];
	}

	get size(): number {
		return this.baselines.size;
	}
}
