import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { silentLogger } from "../lib/logger/index.js";
import { ValidationError } from "../lib/validation/index.js";
import { StorageError } from "../shared/errors.js";
import { categoryId, instrumentId } from "../shared/identifiers.js";
import { InstrumentClassifier } from "./instrument-classifier.js";

const logger = silentLogger();

const TABLE = {
	version: 3,
	categories: {
		ai: { emoji: "🤖", instruments: ["fet", "ARKM"] },
		layer2: { emoji: "🔗", instruments: ["ARB", "FET"] },
	},
};

function build(table: unknown = TABLE): InstrumentClassifier {
	const result = InstrumentClassifier.fromTable(table, { logger });
	if (!result.ok) throw result.error;
	return result.value;
}

describe("InstrumentClassifier", () => {
	it("classifies listed instruments and normalises case", () => {
		const classifier = build();
		expect(classifier.classify(instrumentId("FET"))).toBe("AI");
		expect(classifier.classify(instrumentId("arb"))).toBe("LAYER2");
		expect(classifier.version).toBe(3);
	});

	it("returns null for unknown instruments", () => {
		expect(build().classify(instrumentId("XYZ"))).toBeNull();
	});

	it("keeps the first category for an instrument listed twice", () => {
		const classifier = build();
		expect(classifier.classify(instrumentId("FET"))).toBe("AI");
		expect(classifier.instruments(categoryId("LAYER2"))).toEqual(["ARB"]);
	});

	it("exposes emoji with a default for unknown categories", () => {
		const classifier = build();
		expect(classifier.emoji(categoryId("AI"))).toBe("🤖");
		expect(classifier.emoji(categoryId("NOPE"))).toBe("📊");
		expect(classifier.categories()).toEqual(["AI", "LAYER2"]);
	});

	it("rejects a malformed table", () => {
		const result = InstrumentClassifier.fromTable({ version: "x", categories: {} }, { logger });
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error).toBeInstanceOf(ValidationError);
	});

	it("replace keeps the old table when the new one is invalid", () => {
		const classifier = build();
		const result = classifier.replace({ categories: "nope" });
		expect(result.ok).toBe(false);
		expect(classifier.classify(instrumentId("FET"))).toBe("AI");
	});

	it("replace swaps in a valid table", () => {
		const classifier = build();
		const result = classifier.replace({
			version: 4,
			categories: { MEME: { emoji: "🐸", instruments: ["FET"] } },
		});
		expect(result).toEqual({ ok: true, value: 4 });
		expect(classifier.classify(instrumentId("FET"))).toBe("MEME");
		expect(classifier.classify(instrumentId("ARB"))).toBeNull();
	});

	it("reload fails without a backing file", async () => {
		const result = await build().reload();
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error).toBeInstanceOf(StorageError);
	});

	describe("bundled table", () => {
		it("maps the documented examples", async () => {
			const result = await InstrumentClassifier.fromFile(undefined, { logger });
			expect(result.ok).toBe(true);
			if (!result.ok) return;
			const classifier = result.value;
			expect(classifier.classify(instrumentId("ARKM"))).toBe("AI");
			expect(classifier.classify(instrumentId("ETH"))).toBe("LAYER1");
			expect(classifier.classify(instrumentId("MATIC"))).toBe("LAYER2");
			expect(classifier.classify(instrumentId("LINK"))).toBe("ORACLES");
			expect(classifier.categories()).toHaveLength(10);
		});
	});

	describe("file-backed", () => {
		let dir: string;

		beforeEach(async () => {
			dir = await mkdtemp(join(tmpdir(), "classifier-"));
		});

		afterEach(async () => {
			await rm(dir, { recursive: true, force: true });
		});

		it("hot-reloads an edited table", async () => {
			const path = join(dir, "categories.json");
			await writeFile(path, JSON.stringify(TABLE));
			const loaded = await InstrumentClassifier.fromFile(path, { logger });
			if (!loaded.ok) throw loaded.error;

			await writeFile(
				path,
				JSON.stringify({ version: 9, categories: { DEFI: { emoji: "🏦", instruments: ["ARB"] } } }),
			);
			const reloaded = await loaded.value.reload();

			expect(reloaded).toEqual({ ok: true, value: 9 });
			expect(loaded.value.classify(instrumentId("ARB"))).toBe("DEFI");
		});

		it("keeps the current table when the file becomes invalid JSON", async () => {
			const path = join(dir, "categories.json");
			await writeFile(path, JSON.stringify(TABLE));
			const loaded = await InstrumentClassifier.fromFile(path, { logger });
			if (!loaded.ok) throw loaded.error;

			await writeFile(path, "{ not json");
			const reloaded = await loaded.value.reload();

			expect(reloaded.ok).toBe(false);
			expect(loaded.value.classify(instrumentId("FET"))).toBe("AI");
		});

		it("reports a missing file as StorageError", async () => {
			const result = await InstrumentClassifier.fromFile(join(dir, "missing.json"), { logger });
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error).toBeInstanceOf(StorageError);
		});
	});
});
