import { describe, expect, it } from "vitest";
import { LibDecimal } from "./index.js";

describe("LibDecimal", () => {
	describe("from", () => {
		it("parses decimal strings exactly", () => {
			expect(LibDecimal.from("0.1").add(LibDecimal.from("0.2")).toString()).toBe("0.3");
		});

		it("accepts finite numbers", () => {
			expect(LibDecimal.from(2.5).toString()).toBe("2.5");
		});

		it.each([["abc"], [""], ["1.2.3"], ["NaN"]])("rejects %j", (raw) => {
			expect(() => LibDecimal.from(raw)).toThrow("LibDecimal.from: not a number");
		});

		it("rejects non-finite numbers", () => {
			expect(() => LibDecimal.from(Number.POSITIVE_INFINITY)).toThrow("invalid number");
		});
	});

	describe("tryFrom", () => {
		it("returns null instead of throwing", () => {
			expect(LibDecimal.tryFrom("oops")).toBeNull();
			expect(LibDecimal.tryFrom(Number.NaN)).toBeNull();
			expect(LibDecimal.tryFrom(" -1.50 ")?.toString()).toBe("-1.5");
		});

		it("returns null for an exponent out of range", () => {
			expect(LibDecimal.tryFrom("1e9999999999999999")).toBeNull();
		});
	});

	it("sum adds every element", () => {
		const values = ["5000", "2000", "0.5"].map((v) => LibDecimal.from(v));
		expect(LibDecimal.sum(values).toString()).toBe("7000.5");
		expect(LibDecimal.sum([]).toString()).toBe("0");
	});

	it("compares exactly", () => {
		const a = LibDecimal.from("1.10");
		const b = LibDecimal.from("1.1");
		expect(a.eq(b)).toBe(true);
		expect(a.cmp(LibDecimal.from("2"))).toBe(-1);
		expect(LibDecimal.from("3").cmp(a)).toBe(1);
		expect(a.cmp(b)).toBe(0);
	});

	it("reports sign", () => {
		expect(LibDecimal.from("-0.01").sign()).toBe(-1);
		expect(LibDecimal.zero().sign()).toBe(0);
		expect(LibDecimal.from("4").sign()).toBe(1);
	});

	it("serializes to JSON as a string", () => {
		expect(JSON.stringify({ v: LibDecimal.from("12.50") })).toBe('{"v":"12.5"}');
	});

	it("toFixed rounds to the requested places", () => {
		expect(LibDecimal.from("1234.5678").toFixed(2)).toBe("1234.57");
	});
});
