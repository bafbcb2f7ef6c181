import { describe, expect, it, vi } from "vitest";
import type { AlertPayload } from "../alert/types.js";
import type { CorrelationGroup } from "../correlation/types.js";
import type { CycleReport } from "../poller/types.js";
import { type EngineError, InvariantViolationError, StorageError } from "../shared/errors.js";
import type { AccountId } from "../shared/identifiers.js";
import type { TradeDiffer } from "../snapshot/types.js";
import {
	ALPHA,
	BRAVO,
	CHARLIE,
	START,
	createHarness,
} from "./engine-test-helpers.js";
import type { ConfluenceEngine } from "./confluence-engine.js";

async function cycle(engine: ConfluenceEngine): Promise<CycleReport> {
	const result = await engine.runCycle();
	if (!result.ok) throw result.error;
	return result.value;
}

describe("ConfluenceEngine", () => {
	describe("instrument confluence", () => {
		it("alerts when two accounts open the same instrument within the window", async () => {
			const { engine, source, sink, journal, clock } = await createHarness();
			source.setPositions(CHARLIE, [["ETH", 3]]);
			await cycle(engine);

			source.setPositions(ALPHA, [["ETH", 5]]);
			await cycle(engine);
			clock.advance(120_000);
			source.setPositions(BRAVO, [["ETH", 2]]).setPositions(CHARLIE, []);
			const report = await cycle(engine);
			await engine.stop();

			expect(report.groups).toHaveLength(1);
			expect(sink.payloads).toHaveLength(1);
			const [alert] = sink.payloads;
			expect(alert?.title).toBe("🚨 Confluence: ETH");
			expect(alert?.participants.map((p) => [p.name, p.value, p.isTrigger])).toEqual([
				["Alpha", "5000", false],
				["Bravo", "2000", true],
			]);
			expect(alert?.totalValue).toBe("7000");

			expect(journal.entries("trade_detected")).toHaveLength(3);
			expect(journal.entries("correlation_emitted")).toHaveLength(1);
			expect(engine.health().correlation).toEqual({
				accepted: 2,
				belowMinimum: 1,
				malformed: 0,
				groups: 1,
			});
		});

		it("emits the group together with its alert", async () => {
			const { engine, source } = await createHarness();
			const seen: Array<[CorrelationGroup, AlertPayload]> = [];
			engine.on("correlation", (group, alert) => seen.push([group, alert]));
			await cycle(engine);

			source.setPositions(ALPHA, [["BTC", 2]]).setPositions(BRAVO, [["BTC", -3]]);
			await cycle(engine);

			expect(seen).toHaveLength(1);
			expect(seen[0]?.[0].scopeKey).toBe("BTC");
			expect(seen[0]?.[1].scopeKey).toBe("BTC");
		});

		it("stays quiet below the threshold", async () => {
			const { engine, source, sink } = await createHarness();
			await engine.rules.set("confluenceCount", 3);
			await cycle(engine);

			source.setPositions(ALPHA, [["ETH", 5]]).setPositions(BRAVO, [["ETH", 2]]);
			await cycle(engine);
			await engine.stop();

			expect(sink.payloads).toEqual([]);
		});
	});

	describe("theme confluence", () => {
		it("groups different instruments of one category", async () => {
			const { engine, source, sink } = await createHarness();
			await cycle(engine);

			source.setPositions(ALPHA, [["ARKM", 2]]).setPositions(BRAVO, [["FET", 3]]);
			const report = await cycle(engine);
			await engine.stop();

			expect(report.groups.map((g) => [g.kind, g.scopeKey])).toEqual([["category", "AI"]]);
			expect(report.groups[0]?.instruments).toEqual(["ARKM", "FET"]);
			expect(sink.payloads[0]?.title).toBe("🤖 Theme confluence: AI");
		});

		it("ignores categories when themes are off", async () => {
			const { engine, source } = await createHarness();
			await engine.rules.set("themeEnabled", false);
			await cycle(engine);

			source.setPositions(ALPHA, [["ARKM", 2]]).setPositions(BRAVO, [["FET", 3]]);
			const report = await cycle(engine);

			expect(report.groups).toEqual([]);
		});
	});

	describe("events and journal", () => {
		it("reports fetch failures", async () => {
			const { engine, source, journal, clock } = await createHarness();
			const failures: Array<[AccountId, number]> = [];
			engine.on("account_failed", (accountId, _error, count) => failures.push([accountId, count]));
			source.failNext(BRAVO);

			await cycle(engine);
			await engine.stop();

			expect(failures).toEqual([[BRAVO, 1]]);
			expect(journal.entries("fetch_failed")).toEqual([
				{
					type: "fetch_failed",
					accountId: BRAVO,
					code: "FETCH_ERROR",
					message: "Scripted failure",
					consecutiveFailures: 1,
					timestamp: clock.now(),
				},
			]);
			expect(engine.health().accounts.map((a) => [a.accountId, a.status])).toEqual([
				[ALPHA, "healthy"],
				[BRAVO, "degraded"],
				[CHARLIE, "healthy"],
			]);
		});

		it("journals baseline resets", async () => {
			const { engine, source, journal } = await createHarness({
				config: { rebaselineAfterFailures: 2 },
			});
			const resets: AccountId[] = [];
			engine.on("baseline_reset", (accountId) => resets.push(accountId));
			await cycle(engine);
			source.failNext(ALPHA).failNext(ALPHA);

			await cycle(engine);
			await cycle(engine);
			await engine.stop();

			expect(resets).toEqual([ALPHA]);
			expect(journal.entries("baseline_reset")).toHaveLength(1);
		});

		it("journals rule changes", async () => {
			const { engine, journal } = await createHarness();

			await engine.rules.update({ confluenceCount: 3, themeCount: 4 });
			await engine.stop();

			const [entry] = journal.entries("rule_changed");
			expect(entry?.type === "rule_changed" && entry.changed).toEqual([
				"confluenceCount",
				"themeCount",
			]);
		});

		it("keeps polling when a listener throws", async () => {
			const { engine, source, sink } = await createHarness();
			engine.on("trade", () => {
				throw new Error("listener bug");
			});
			await cycle(engine);

			source.setPositions(ALPHA, [["ETH", 5]]).setPositions(BRAVO, [["ETH", 2]]);
			const report = await cycle(engine);
			await engine.stop();

			expect(report.events).toHaveLength(2);
			expect(sink.payloads).toHaveLength(1);
		});

		it("counts journal failures without stopping", async () => {
			const failing = {
				record: async (): Promise<void> => {
					throw new StorageError("disk full");
				},
				flush: async (): Promise<void> => undefined,
			};
			const { engine, source } = await createHarness({ journal: failing });
			const errors: EngineError[] = [];
			engine.on("journal_error", (error) => errors.push(error));
			await cycle(engine);

			source.setPositions(ALPHA, [["ETH", 5]]);
			const report = await cycle(engine);
			await engine.stop();

			expect(report.events).toHaveLength(1);
			expect(errors.map((e) => e.message)).toEqual(["disk full"]);
			expect(engine.health().journalFailures).toBe(1);
		});
	});

	describe("accounts", () => {
		it("starts a re-activated account from a fresh baseline", async () => {
			const { engine, source } = await createHarness();
			await cycle(engine);

			await engine.accounts.deactivate(ALPHA);
			const withoutAlpha = await cycle(engine);
			expect(withoutAlpha.polled).toBe(2);

			await engine.accounts.activate(ALPHA);
			source.setPositions(ALPHA, [["ETH", 5]]);
			const report = await cycle(engine);

			expect(report.events).toEqual([]);
		});

		it("drops the baseline as soon as an account is deactivated", async () => {
			const { engine, source } = await createHarness();
			await cycle(engine);

			await engine.accounts.deactivate(ALPHA);
			await engine.accounts.activate(ALPHA);
			source.setPositions(ALPHA, [["ETH", 5]]);
			const report = await cycle(engine);

			expect(report.events).toEqual([]);
		});

		it("forgets failure history of a deactivated account without a baseline", async () => {
			const { engine, source } = await createHarness({ config: { rebaselineAfterFailures: 2 } });
			await cycle(engine);
			source.failNext(ALPHA).failNext(ALPHA);
			await cycle(engine);
			await cycle(engine);
			const alphaHealth = () => engine.health().accounts.find((a) => a.accountId === ALPHA);
			expect(alphaHealth()?.consecutiveFailures).toBe(2);

			await engine.accounts.deactivate(ALPHA);
			await engine.accounts.activate(ALPHA);

			expect(alphaHealth()).toMatchObject({
				status: "healthy",
				consecutiveFailures: 0,
				lastError: null,
			});
		});
	});

	describe("lifecycle", () => {
		it("halts and emits on an invariant violation", async () => {
			const differ: TradeDiffer = () => {
				throw new InvariantViolationError("differ broke");
			};
			const { engine } = await createHarness({ differ });
			const fatal: EngineError[] = [];
			engine.on("fatal", (error) => fatal.push(error));

			const result = await engine.runCycle();

			expect(result.ok).toBe(false);
			expect(fatal.map((e) => e.code)).toEqual(["INVARIANT_VIOLATION"]);
			expect(engine.health().scheduler).toMatchObject({
				state: "halted",
				metadata: { type: "halt", reason: "differ broke" },
			});
		});

		it("polls on a schedule until stopped", async () => {
			const { engine } = await createHarness();
			const cycles: number[] = [];
			engine.on("cycle", (report) => cycles.push(report.cycle));

			expect(engine.start().ok).toBe(true);
			await vi.waitFor(() => expect(cycles.length).toBeGreaterThanOrEqual(2));
			await engine.stop();

			expect(engine.health().scheduler.state).toBe("idle");
			expect(cycles.slice(0, 2)).toEqual([1, 2]);
		});

		it("stamps events with the engine clock", async () => {
			const { engine, source, clock } = await createHarness();
			await cycle(engine);
			clock.set(START + 42_000);

			source.setPositions(ALPHA, [["SOL", 50, 5000]]);
			const report = await cycle(engine);

			expect(report.events.map((e) => e.timestamp)).toEqual([START + 42_000]);
		});
	});
});
