import { describe, expect, it } from "vitest";
import { snapshot, testAccount } from "../testing/fixtures.js";
import { BaselineStore } from "./baseline-store.js";

const A = testAccount("a");

describe("BaselineStore", () => {
	it("starts empty", () => {
		const store = new BaselineStore();
		expect(store.current(A)).toBeNull();
		expect(store.previous(A)).toBeNull();
		expect(store.size).toBe(0);
	});

	it("shifts current to previous on commit", () => {
		const store = new BaselineStore();
		const first = snapshot(A, [["ETH", 1]], 1);
		const second = snapshot(A, [["ETH", 2]], 2);

		store.commit(first);
		expect(store.previous(A)).toBeNull();
		expect(store.current(A)).toBe(first);

		store.commit(second);
		expect(store.previous(A)).toBe(first);
		expect(store.current(A)).toBe(second);
		expect(store.accounts()).toEqual([A]);
	});

	it("reset forgets the account", () => {
		const store = new BaselineStore();
		store.commit(snapshot(A, []));
		expect(store.reset(A)).toBe(true);
		expect(store.has(A)).toBe(false);
		expect(store.reset(A)).toBe(false);
	});
});
