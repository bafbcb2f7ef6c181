/**
 * Maps instruments to thematic categories.
 *
 * The mapping is data (`data/categories.json`), not code, so categories can be
 * edited and hot-reloaded without a release. An instrument listed under two
 * categories belongs to the first one in table order.
 */

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { type Logger, defaultLogger } from "../lib/logger/index.js";
import { ValidationError, validate, z } from "../lib/validation/index.js";
import { StorageError } from "../shared/errors.js";
import {
	type CategoryId,
	type InstrumentId,
	categoryId,
	instrumentId,
} from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";

export const DEFAULT_CATEGORIES_PATH = fileURLToPath(
	new URL("../../data/categories.json", import.meta.url),
);

const FALLBACK_EMOJI = "📊";

export const categoryTableSchema = z.object({
	version: z.number().int().nonnegative(),
	defaultEmoji: z.string().min(1).optional(),
	categories: z.record(
		z.string().trim().min(1),
		z.object({
			emoji: z.string().min(1),
			instruments: z.array(z.string().trim().min(1)),
		}),
	),
});

export type CategoryTable = z.infer<typeof categoryTableSchema>;

export type ClassifierLoadError = StorageError | ValidationError;

interface CompiledTable {
	readonly version: number;
	readonly defaultEmoji: string;
	readonly index: ReadonlyMap<InstrumentId, CategoryId>;
	readonly members: ReadonlyMap<CategoryId, readonly InstrumentId[]>;
	readonly emojis: ReadonlyMap<CategoryId, string>;
}

export interface ClassifierOptions {
	readonly logger?: Logger | undefined;
}

function compile(table: CategoryTable, logger: Logger): CompiledTable {
	const index = new Map<InstrumentId, CategoryId>();
	const members = new Map<CategoryId, InstrumentId[]>();
	const emojis = new Map<CategoryId, string>();

	for (const [rawCategory, entry] of Object.entries(table.categories)) {
		const category = categoryId(rawCategory);
		emojis.set(category, entry.emoji);
		const list: InstrumentId[] = [];
		for (const raw of entry.instruments) {
			const instrument = instrumentId(raw);
			const existing = index.get(instrument);
			if (existing !== undefined) {
				logger.warn(
					{ instrument, kept: existing, ignored: category },
					"instrument listed in two categories",
				);
				continue;
			}
			index.set(instrument, category);
			list.push(instrument);
		}
		members.set(category, list);
	}

	return {
		version: table.version,
		defaultEmoji: table.defaultEmoji ?? FALLBACK_EMOJI,
		index,
		members,
		emojis,
	};
}

async function readTable(path: string): Promise<Result<unknown, ClassifierLoadError>> {
	let content: string;
	try {
		content = await readFile(path, "utf-8");
	} catch (cause: unknown) {
		return err(new StorageError(`Cannot read category table ${path}`, { path, cause }));
	}
	try {
		const data: unknown = JSON.parse(content);
		return ok(data);
	} catch (cause: unknown) {
		const message = cause instanceof Error ? cause.message : String(cause);
		return err(new ValidationError(`Category table ${path} is not valid JSON`, [{ path: [], message }]));
	}
}

export class InstrumentClassifier {
	private table: CompiledTable;
	private readonly sourcePath: string | null;
	private readonly logger: Logger;

	private constructor(table: CompiledTable, sourcePath: string | null, logger: Logger) {
		this.table = table;
		this.sourcePath = sourcePath;
		this.logger = logger;
	}

	/** Build from an in-memory table, validating its shape. */
	static fromTable(
		table: unknown,
		options: ClassifierOptions = {},
	): Result<InstrumentClassifier, ValidationError> {
		const logger = options.logger ?? defaultLogger({ component: "classifier" });
		const parsed = validate(categoryTableSchema, table, "category table");
		if (!parsed.ok) return parsed;
		return ok(new InstrumentClassifier(compile(parsed.value, logger), null, logger));
	}

	/** Load from a JSON file; `reload()` re-reads the same file. */
	static async fromFile(
		path: string = DEFAULT_CATEGORIES_PATH,
		options: ClassifierOptions = {},
	): Promise<Result<InstrumentClassifier, ClassifierLoadError>> {
		const logger = options.logger ?? defaultLogger({ component: "classifier" });
		const raw = await readTable(path);
		if (!raw.ok) return raw;
		const parsed = validate(categoryTableSchema, raw.value, "category table");
		if (!parsed.ok) return parsed;
		return ok(new InstrumentClassifier(compile(parsed.value, logger), path, logger));
	}

	// ── Queries ────────────────────────────────────────────────────

	classify(instrument: InstrumentId): CategoryId | null {
		return this.table.index.get(instrument) ?? null;
	}

	emoji(category: CategoryId): string {
		return this.table.emojis.get(category) ?? this.table.defaultEmoji;
	}

	categories(): CategoryId[] {
		return [...this.table.members.keys()];
	}

	instruments(category: CategoryId): readonly InstrumentId[] {
		return this.table.members.get(category) ?? [];
	}

	get version(): number {
		return this.table.version;
	}

	// ── Updates ────────────────────────────────────────────────────

	/**
	 * Swap in a new table. On failure the current table stays in effect.
	 * @returns the new table version
	 */
	replace(table: unknown): Result<number, ValidationError> {
		const parsed = validate(categoryTableSchema, table, "category table");
		if (!parsed.ok) {
			this.logger.warn({ error: parsed.error.message }, "category table rejected");
			return parsed;
		}
		this.table = compile(parsed.value, this.logger);
		this.logger.info(
			{ version: this.table.version, instruments: this.table.index.size },
			"category table loaded",
		);
		return ok(this.table.version);
	}

	/** Re-read the backing file. Fails for classifiers built with `fromTable`. */
	async reload(): Promise<Result<number, ClassifierLoadError>> {
		if (this.sourcePath === null) {
			return err(new StorageError("Classifier has no backing file to reload"));
		}
		const raw = await readTable(this.sourcePath);
		if (!raw.ok) {
			this.logger.warn({ error: raw.error.message }, "category table reload failed");
			return raw;
		}
		return this.replace(raw.value);
	}
}
