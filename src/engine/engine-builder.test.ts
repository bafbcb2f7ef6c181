import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MemoryAlertSink } from "../alert/memory-alert-sink.js";
import { silentLogger } from "../lib/logger/index.js";
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../shared/config.js";
import { FakeClock } from "../shared/time.js";
import { FakeSnapshotSource } from "../testing/fake-snapshot-source.js";
import { ALPHA, createHarness } from "./engine-test-helpers.js";
import { EngineBuilder } from "./engine-builder.js";

describe("EngineBuilder", () => {
	it("requires a snapshot source", () => {
		const result = EngineBuilder.create().build();
		expect(!result.ok && result.error.message).toBe("Engine requires a snapshot source");
	});

	it("names the first missing component", () => {
		const result = EngineBuilder.create()
			.withSource(new FakeSnapshotSource())
			.withSink(new MemoryAlertSink())
			.build();
		expect(!result.ok && result.error.message).toBe("Engine requires a rule registry");
	});

	it("leaves the original builder untouched", () => {
		const base = EngineBuilder.create();
		base.withSource(new FakeSnapshotSource());
		const result = base.build();
		expect(!result.ok && result.error.message).toBe("Engine requires a snapshot source");
	});

	it("rejects an invalid config", async () => {
		await expect(createHarness({ config: { pollIntervalMs: 0 } })).rejects.toThrow(
			"pollIntervalMs must be a positive integer",
		);
	});

	describe("fromConfig", () => {
		let dir: string;

		beforeEach(async () => {
			dir = await mkdtemp(join(tmpdir(), "engine-builder-"));
		});

		afterEach(async () => {
			await rm(dir, { recursive: true, force: true });
		});

		function config(overrides: Partial<EngineConfig> = {}): EngineConfig {
			return {
				...DEFAULT_ENGINE_CONFIG,
				rulesPath: join(dir, "rules.json"),
				accountsPath: join(dir, "accounts.json"),
				journalPath: join(dir, "journal.jsonl"),
				...overrides,
			};
		}

		it("loads state from files and persists changes", async () => {
			const loaded = await EngineBuilder.fromConfig(config(), {
				clock: new FakeClock(0),
				logger: silentLogger(),
			});
			if (!loaded.ok) throw loaded.error;
			const built = loaded.value
				.withSource(new FakeSnapshotSource())
				.withSink(new MemoryAlertSink())
				.build();
			if (!built.ok) throw built.error;
			const engine = built.value;

			expect((await engine.rules.set("themeCount", 3)).ok).toBe(true);
			expect((await engine.accounts.add({ address: ALPHA, name: "Alpha" })).ok).toBe(true);
			await engine.stop();

			const rules: unknown = JSON.parse(await readFile(join(dir, "rules.json"), "utf-8"));
			expect(rules).toMatchObject({ theme_count: 3 });
			const accounts: unknown = JSON.parse(await readFile(join(dir, "accounts.json"), "utf-8"));
			expect(accounts).toMatchObject({ accounts: [{ address: ALPHA, name: "Alpha" }] });
			const journal = await readFile(join(dir, "journal.jsonl"), "utf-8");
			const entries = journal
				.trim()
				.split("\n")
				.map((line): unknown => JSON.parse(line));
			expect(entries).toEqual([expect.objectContaining({ type: "rule_changed", changed: ["themeCount"] })]);
		});

		it("fails on an invalid account file", async () => {
			await writeFile(join(dir, "accounts.json"), JSON.stringify({ accounts: [{ address: 42 }] }));

			const loaded = await EngineBuilder.fromConfig(config(), { logger: silentLogger() });

			expect(loaded.ok).toBe(false);
			expect(!loaded.ok && loaded.error.message).toMatch(/^Invalid account list/);
		});

		it("fails on a missing category table", async () => {
			const loaded = await EngineBuilder.fromConfig(
				config({ categoriesPath: join(dir, "missing.json") }),
				{ logger: silentLogger() },
			);

			expect(!loaded.ok && loaded.error.code).toBe("STORAGE_ERROR");
		});
	});
});
