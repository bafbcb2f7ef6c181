import { describe, expect, it } from "vitest";
import { silentLogger } from "../lib/logger/index.js";
import { ValidationError } from "../lib/validation/index.js";
import { MemoryDocumentStore } from "../persistence/document-store.js";
import { StorageError } from "../shared/errors.js";
import { FakeClock } from "../shared/time.js";
import { testAccount } from "../testing/fixtures.js";
import { AccountRegistry } from "./account-registry.js";

const ADDRESS_A = `0x${"a".repeat(40)}`;
const ADDRESS_B = `0x${"b".repeat(40)}`;
const ADDRESS_A_UPPER = `0x${"A".repeat(40)}`;

async function createRegistry(store = new MemoryDocumentStore(), clock = new FakeClock(1_000)) {
	const result = await AccountRegistry.create({ store, clock, logger: silentLogger() });
	if (!result.ok) throw result.error;
	return result.value;
}

describe("AccountRegistry", () => {
	it("starts empty without a stored document", async () => {
		const registry = await createRegistry();
		expect(registry.all()).toEqual([]);
	});

	it("adds an account with defaults and persists it", async () => {
		const store = new MemoryDocumentStore();
		const registry = await createRegistry(store);

		const result = await registry.add({ address: ADDRESS_A_UPPER });

		expect(result.ok).toBe(true);
		if (result.ok) {
			expect(result.value).toEqual({
				id: testAccount("a"),
				name: "0xaaaa...aaaa",
				kind: "vault",
				active: true,
				addedAt: 1_000,
			});
		}
		expect(store.peek()).toEqual({
			accounts: [
				{ address: ADDRESS_A, name: "0xaaaa...aaaa", kind: "vault", active: true, added_at: 1_000 },
			],
		});
	});

	it("rejects an address already tracked in another case", async () => {
		const registry = await createRegistry();
		await registry.add({ address: ADDRESS_A, name: "Alpha" });

		const result = await registry.add({ address: ADDRESS_A_UPPER });

		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.message).toBe(`Account already tracked: ${ADDRESS_A}`);
		expect(registry.size).toBe(1);
	});

	it("rejects an invalid address", async () => {
		const registry = await createRegistry();

		const result = await registry.add({ address: "0x1234" });

		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error).toBeInstanceOf(ValidationError);
	});

	it("deactivates and reactivates", async () => {
		const registry = await createRegistry();
		await registry.add({ address: ADDRESS_A, name: "Alpha" });
		await registry.add({ address: ADDRESS_B, name: "Beta", kind: "wallet" });

		await registry.deactivate(testAccount("a"));
		expect(registry.active().map((a) => a.name)).toEqual(["Beta"]);

		await registry.activate(testAccount("a"));
		expect(registry.active().map((a) => a.name)).toEqual(["Alpha", "Beta"]);
	});

	it("notifies listeners after each persisted change", async () => {
		const store = new MemoryDocumentStore();
		const registry = await createRegistry(store);
		const seen: Array<[string, boolean, boolean | null]> = [];
		const unsubscribe = registry.onChange((account, previous) => {
			seen.push([account.name, account.active, previous?.active ?? null]);
		});

		await registry.add({ address: ADDRESS_A, name: "Alpha" });
		await registry.deactivate(testAccount("a"));
		await registry.deactivate(testAccount("a"));
		store.setFailWrites(true);
		await registry.activate(testAccount("a"));
		store.setFailWrites(false);
		unsubscribe();
		await registry.activate(testAccount("a"));

		expect(seen).toEqual([
			["Alpha", true, null],
			["Alpha", false, true],
		]);
	});

	it("reports an unknown account", async () => {
		const registry = await createRegistry();
		const result = await registry.deactivate(testAccount("c"));
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.message).toBe(`Unknown account: ${testAccount("c")}`);
	});

	it("keeps state when the write fails", async () => {
		const store = new MemoryDocumentStore();
		const registry = await createRegistry(store);
		store.setFailWrites(true);

		const result = await registry.add({ address: ADDRESS_A });

		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error).toBeInstanceOf(StorageError);
		expect(registry.size).toBe(0);
	});

	it("reloads what it saved", async () => {
		const store = new MemoryDocumentStore();
		const first = await createRegistry(store);
		await first.add({ address: ADDRESS_A, name: "Alpha" });
		await first.deactivate(testAccount("a"));

		const second = await createRegistry(store);

		expect(second.get(testAccount("a"))).toEqual({
			id: testAccount("a"),
			name: "Alpha",
			kind: "vault",
			active: false,
			addedAt: 1_000,
		});
	});

	it("rejects a stored list with duplicates", async () => {
		const record = { address: ADDRESS_A, name: "Alpha", kind: "vault", active: true, added_at: 0 };
		const result = await AccountRegistry.create({
			store: new MemoryDocumentStore({ accounts: [record, record] }),
			logger: silentLogger(),
		});
		expect(result.ok).toBe(false);
	});

	it("displayName falls back to the short address", async () => {
		const registry = await createRegistry();
		await registry.add({ address: ADDRESS_A, name: "Alpha" });

		expect(registry.displayName(testAccount("a"))).toBe("Alpha");
		expect(registry.displayName(testAccount("b"))).toBe("0xbbbb...bbbb");
	});
});
