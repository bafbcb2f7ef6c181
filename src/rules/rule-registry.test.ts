import { describe, expect, it, vi } from "vitest";
import { silentLogger } from "../lib/logger/index.js";
import { ValidationError } from "../lib/validation/index.js";
import { MemoryDocumentStore } from "../persistence/document-store.js";
import { Decimal } from "../shared/decimal.js";
import { StorageError } from "../shared/errors.js";
import { RuleRegistry } from "./rule-registry.js";
import { DEFAULT_RULES } from "./types.js";

const logger = silentLogger();

async function createRegistry(store = new MemoryDocumentStore()): Promise<RuleRegistry> {
	const result = await RuleRegistry.create({ store, logger });
	if (!result.ok) throw result.error;
	return result.value;
}

describe("RuleRegistry", () => {
	describe("create", () => {
		it("uses defaults for an empty store", async () => {
			const registry = await createRegistry();
			expect(registry.get("confluenceCount")).toBe(2);
			expect(registry.get("timeWindowMs")).toBe(300_000);
			expect(registry.get("minTradeValue").toString()).toBe("1000");
			expect(registry.get("themeWindowMs")).toBe(1_800_000);
		});

		it("merges stored snake_case values over defaults", async () => {
			const store = new MemoryDocumentStore({
				confluence_count: 3,
				time_window: 600,
				min_trade_value: "2500.5",
			});
			const registry = await createRegistry(store);

			expect(registry.get("confluenceCount")).toBe(3);
			expect(registry.get("timeWindowMs")).toBe(600_000);
			expect(registry.get("minTradeValue").toString()).toBe("2500.5");
			expect(registry.get("themeCount")).toBe(2);
		});

		it("rejects a stored set that breaks a constraint", async () => {
			const result = await RuleRegistry.create({
				store: new MemoryDocumentStore({ time_window: 30 }),
				logger,
			});
			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error).toBeInstanceOf(ValidationError);
				expect(result.error.message).toBe(
					"Invalid rule set: timeWindowMs: Number must be greater than or equal to 60000",
				);
			}
		});

		it.each([["lots"], ["1e9999999999999999"]])("rejects a stored minimum of %j", async (raw) => {
			const result = await RuleRegistry.create({
				store: new MemoryDocumentStore({ min_trade_value: raw }),
				logger,
			});
			expect(result.ok).toBe(false);
		});
	});

	describe("set", () => {
		it("validates, persists and swaps", async () => {
			const store = new MemoryDocumentStore();
			const registry = await createRegistry(store);

			const result = await registry.set("confluenceCount", 4);

			expect(result.ok).toBe(true);
			expect(registry.get("confluenceCount")).toBe(4);
			expect(store.peek()).toEqual({
				confluence_count: 4,
				time_window: 300,
				min_trade_value: "1000",
				enabled: true,
				theme_count: 2,
				theme_window: 1800,
				theme_enabled: true,
			});
		});

		it.each([
			["confluenceCount", 1],
			["confluenceCount", 2.5],
			["timeWindowMs", 59_999],
			["themeWindowMs", 0],
		] as const)("rejects %s = %s and keeps the prior value", async (name, value) => {
			const registry = await createRegistry();
			const before = registry.current();

			const result = await registry.set(name, value);

			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error).toBeInstanceOf(ValidationError);
			expect(registry.current()).toBe(before);
		});

		it("rejects a negative minimum trade value", async () => {
			const registry = await createRegistry();
			const result = await registry.set("minTradeValue", Decimal.from("-1"));
			expect(result.ok).toBe(false);
			expect(registry.get("minTradeValue").toString()).toBe("1000");
		});

		it("accepts a zero minimum trade value", async () => {
			const registry = await createRegistry();
			const result = await registry.set("minTradeValue", Decimal.zero());
			expect(result.ok).toBe(true);
		});

		it("leaves state untouched when persistence fails", async () => {
			const store = new MemoryDocumentStore();
			const registry = await createRegistry(store);
			store.setFailWrites(true);

			const result = await registry.set("enabled", false);

			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error).toBeInstanceOf(StorageError);
			expect(registry.get("enabled")).toBe(true);
		});

		it("skips persistence for a no-op write", async () => {
			const store = new MemoryDocumentStore();
			const registry = await createRegistry(store);

			await registry.set("confluenceCount", 2);

			expect(store.saves).toBe(0);
		});
	});

	describe("update", () => {
		it("applies several rules in one swap", async () => {
			const registry = await createRegistry();
			const listener = vi.fn();
			registry.onChange(listener);

			await registry.update({ confluenceCount: 3, timeWindowMs: 120_000 });

			expect(listener).toHaveBeenCalledTimes(1);
			expect(listener.mock.calls[0]?.[2]).toEqual(["confluenceCount", "timeWindowMs"]);
		});

		it("serializes concurrent writers", async () => {
			const registry = await createRegistry();

			const results = await Promise.all([
				registry.set("confluenceCount", 3),
				registry.set("confluenceCount", 5),
				registry.set("timeWindowMs", 90_000),
			]);

			expect(results.every((r) => r.ok)).toBe(true);
			expect(registry.get("confluenceCount")).toBe(5);
			expect(registry.get("timeWindowMs")).toBe(90_000);
		});
	});

	it("notifies listeners with the changed names and can unsubscribe", async () => {
		const registry = await createRegistry();
		const listener = vi.fn();
		const unsubscribe = registry.onChange(listener);

		await registry.set("themeEnabled", false);
		unsubscribe();
		await registry.set("themeEnabled", true);

		expect(listener).toHaveBeenCalledTimes(1);
		expect(listener.mock.calls[0]?.[2]).toEqual(["themeEnabled"]);
	});

	it("returns frozen rule sets", async () => {
		const registry = await createRegistry();
		expect(Object.isFrozen(registry.current())).toBe(true);
		expect(DEFAULT_RULES.enabled).toBe(true);
	});
});
