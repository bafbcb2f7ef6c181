/**
 * In-memory journal for tests and short-lived runs.
 */

import {
	type CorrelationEntry,
	type Journal,
	type JournalEntry,
	type JournalEntryType,
	correlationEntrySchema,
} from "./journal.js";

export interface MemoryJournalConfig {
	readonly maxEntries?: number | undefined;
}

export class MemoryJournal implements Journal {
	private readonly store: JournalEntry[] = [];
	private readonly maxEntries: number;

	constructor(config?: MemoryJournalConfig) {
		this.maxEntries = config?.maxEntries ?? Number.POSITIVE_INFINITY;
	}

	async record(entry: JournalEntry): Promise<void> {
		this.store.push(entry);
		const excess = this.store.length - this.maxEntries;
		if (excess > 0) {
			this.store.splice(0, excess);
		}
	}

	/** All entries, or only those of one type. */
	entries(type?: JournalEntryType): JournalEntry[] {
		return type === undefined ? [...this.store] : this.store.filter((e) => e.type === type);
	}

	async recentCorrelations(sinceMs: number): Promise<CorrelationEntry[]> {
		const correlations: CorrelationEntry[] = [];
		for (const entry of this.store) {
			const parsed = correlationEntrySchema.safeParse(entry);
			if (parsed.success && parsed.data.timestamp >= sinceMs) correlations.push(parsed.data);
		}
		return correlations;
	}

	clear(): void {
		this.store.length = 0;
	}

	async flush(): Promise<void> {}

	get size(): number {
		return this.store.length;
	}
}
