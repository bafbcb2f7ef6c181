import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { testAccount, tradeEvent } from "../testing/fixtures.js";
import { EventWindowStore } from "./event-window-store.js";

const A = testAccount("a");
const B = testAccount("b");

/** A window and a gap anywhere in [0, 2W], edges included. */
const windowAndGap = fc
	.integer({ min: 1, max: 86_400_000 })
	.chain((w) => fc.tuple(fc.constant(w), fc.integer({ min: 0, max: 2 * w })));
const start = fc.integer({ min: 0, max: 2_000_000_000 });

function eth(account: typeof A, timestamp: number) {
	return tradeEvent({ account, instrument: "ETH", value: 5000, timestamp });
}

describe("EventWindowStore (property-based)", () => {
	it("keeps an entry on insert exactly while the gap is below the window", () => {
		fc.assert(
			fc.property(windowAndGap, start, ([w, gap], t) => {
				const store = new EventWindowStore();
				store.insert("ETH", eth(A, t), w);

				const { live } = store.insert("ETH", eth(B, t + gap), w);

				const accounts = live.map((entry) => entry.event.accountId);
				expect(accounts).toEqual(gap < w ? [A, B] : [B]);
			}),
			{ numRuns: 300 },
		);
	});

	it("sweeps an entry exactly when the gap reaches the window", () => {
		fc.assert(
			fc.property(windowAndGap, start, ([w, gap], t) => {
				const store = new EventWindowStore();
				store.insert("ETH", eth(A, t), w);

				const evicted = store.evictExpired(t + gap, w);

				expect(evicted).toBe(gap < w ? 0 : 1);
				expect(store.scopeKeys()).toEqual(gap < w ? ["ETH"] : []);
			}),
			{ numRuns: 300 },
		);
	});

	it("keeps live entries in (timestamp, seq) order whatever the arrival order", () => {
		fc.assert(
			fc.property(fc.array(fc.integer({ min: 0, max: 1_000 }), { maxLength: 30 }), (times) => {
				const store = new EventWindowStore();
				for (const t of times) store.insert("ETH", eth(A, t), 1_000_000);

				const live = store.live("ETH");

				expect(live).toHaveLength(times.length);
				for (let i = 1; i < live.length; i++) {
					const prev = live[i - 1];
					const curr = live[i];
					if (prev === undefined || curr === undefined) continue;
					const ordered =
						prev.event.timestamp < curr.event.timestamp ||
						(prev.event.timestamp === curr.event.timestamp && prev.seq < curr.seq);
					expect(ordered).toBe(true);
				}
			}),
			{ numRuns: 200 },
		);
	});
});
