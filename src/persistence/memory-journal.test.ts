import { describe, expect, it } from "vitest";
import { FetchError } from "../shared/errors.js";
import { testAccount, tradeEvent } from "../testing/fixtures.js";
import { fetchFailed, tradeDetected } from "./journal.js";
import { MemoryJournal } from "./memory-journal.js";

const A = testAccount("a");

function trade(timestamp: number) {
	return tradeDetected(tradeEvent({ account: A, instrument: "ETH", value: 5000, timestamp }));
}

describe("MemoryJournal", () => {
	it("keeps entries in order", async () => {
		const journal = new MemoryJournal();
		await journal.record(trade(1));
		await journal.record(trade(2));

		expect(journal.entries().map((e) => e.timestamp)).toEqual([1, 2]);
		expect(journal.size).toBe(2);
	});

	it("filters by type", async () => {
		const journal = new MemoryJournal();
		await journal.record(trade(1));
		await journal.record(fetchFailed(A, new FetchError("down"), 1, 2));

		expect(journal.entries("fetch_failed")).toEqual([
			{
				type: "fetch_failed",
				accountId: A,
				code: "FETCH_ERROR",
				message: "down",
				consecutiveFailures: 1,
				timestamp: 2,
			},
		]);
	});

	it("drops the oldest entries beyond maxEntries", async () => {
		const journal = new MemoryJournal({ maxEntries: 2 });
		for (const ts of [1, 2, 3]) await journal.record(trade(ts));

		expect(journal.entries().map((e) => e.timestamp)).toEqual([2, 3]);
	});

	it("clear empties the journal", async () => {
		const journal = new MemoryJournal();
		await journal.record(trade(1));
		journal.clear();
		expect(journal.size).toBe(0);
	});
});
