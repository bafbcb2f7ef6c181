/**
 * The single writer of correlation rules.
 *
 * Readers call `current()` and get a frozen RuleSet; a change builds a new
 * set, validates it, persists it, and only then swaps the reference. A reader
 * therefore never sees a new threshold paired with an old window, and a
 * rejected or unpersisted write leaves the previous rules in force.
 */

import { type Logger, defaultLogger } from "../lib/logger/index.js";
import { ValidationError, validate } from "../lib/validation/index.js";
import type { DocumentStore } from "../persistence/document-store.js";
import type { StorageError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import {
	DEFAULT_RULES,
	type RuleName,
	type RuleSet,
	type RuleSource,
	ruleSetDtoSchema,
	ruleSetFromDto,
	ruleSetSchema,
	ruleSetToDto,
} from "./types.js";

export type RuleWriteError = ValidationError | StorageError;

export type RuleChangeListener = (
	next: RuleSet,
	previous: RuleSet,
	changed: readonly RuleName[],
) => void;

export interface RuleRegistryOptions {
	readonly store: DocumentStore;
	readonly defaults?: RuleSet | undefined;
	readonly logger?: Logger | undefined;
}

const RULE_NAMES: readonly RuleName[] = [
	"confluenceCount",
	"timeWindowMs",
	"minTradeValue",
	"enabled",
	"themeCount",
	"themeWindowMs",
	"themeEnabled",
];

type RulePatch = { -readonly [K in RuleName]?: RuleSet[K] };

function patchOf<K extends RuleName>(name: K, value: RuleSet[K]): RulePatch {
	const patch: RulePatch = {};
	patch[name] = value;
	return patch;
}

function sameValue(a: RuleSet, b: RuleSet, name: RuleName): boolean {
	if (name === "minTradeValue") return a.minTradeValue.eq(b.minTradeValue);
	return a[name] === b[name];
}

function validateRules(candidate: RuleSet): Result<RuleSet, ValidationError> {
	const parsed = validate(ruleSetSchema, candidate, "rule set");
	if (!parsed.ok) return parsed;
	return ok(Object.freeze(parsed.value));
}

export class RuleRegistry implements RuleSource {
	private rules: RuleSet;
	private readonly store: DocumentStore;
	private readonly logger: Logger;
	private readonly listeners = new Set<RuleChangeListener>();
	private writeQueue: Promise<unknown> = Promise.resolve();

	private constructor(rules: RuleSet, store: DocumentStore, logger: Logger) {
		this.rules = rules;
		this.store = store;
		this.logger = logger;
	}

	/**
	 * Load persisted rules, filling gaps from the defaults. An empty store
	 * yields the defaults; an invalid persisted set is an error.
	 */
	static async create(options: RuleRegistryOptions): Promise<Result<RuleRegistry, RuleWriteError>> {
		const logger = options.logger ?? defaultLogger({ component: "rules" });
		const defaults = options.defaults ?? DEFAULT_RULES;

		const loaded = await options.store.load();
		if (!loaded.ok) return loaded;
		if (loaded.value === null) {
			const validated = validateRules(defaults);
			if (!validated.ok) return validated;
			logger.info(ruleSetToDto(validated.value), "no stored rules, using defaults");
			return ok(new RuleRegistry(validated.value, options.store, logger));
		}

		const dto = validate(ruleSetDtoSchema, loaded.value.document, "stored rule set");
		if (!dto.ok) return dto;
		const merged = ruleSetFromDto(dto.value, defaults);
		if (merged === null) {
			return err(
				new ValidationError("Invalid stored rule set: min_trade_value is not a number", [
					{ path: ["min_trade_value"], message: "Expected a decimal" },
				]),
			);
		}
		const validated = validateRules(merged);
		if (!validated.ok) return validated;
		logger.info(ruleSetToDto(validated.value), "rules loaded");
		return ok(new RuleRegistry(validated.value, options.store, logger));
	}

	// ── Reads ──────────────────────────────────────────────────────

	/** The latest committed rule set. Never partially updated. */
	current(): RuleSet {
		return this.rules;
	}

	get<K extends RuleName>(name: K): RuleSet[K] {
		return this.rules[name];
	}

	// ── Writes ─────────────────────────────────────────────────────

	set<K extends RuleName>(name: K, value: RuleSet[K]): Promise<Result<RuleSet, RuleWriteError>> {
		return this.update(patchOf(name, value));
	}

	/** Apply several changes as one validated, persisted swap. */
	update(patch: Partial<RuleSet>): Promise<Result<RuleSet, RuleWriteError>> {
		const run = this.writeQueue.then(() => this.apply(patch));
		this.writeQueue = run.catch(() => undefined);
		return run;
	}

	/** @returns unsubscribe function */
	onChange(listener: RuleChangeListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	private async apply(patch: Partial<RuleSet>): Promise<Result<RuleSet, RuleWriteError>> {
		const previous = this.rules;
		const validated = validateRules({ ...previous, ...patch });
		if (!validated.ok) {
			this.logger.warn({ issues: validated.error.context["issues"] }, "rule change rejected");
			return validated;
		}
		const next = validated.value;
		const changed = RULE_NAMES.filter((name) => !sameValue(previous, next, name));
		if (changed.length === 0) return ok(previous);

		const saved = await this.store.save(ruleSetToDto(next));
		if (!saved.ok) {
			this.logger.error({ changed, error: saved.error.message }, "rule change not persisted");
			return saved;
		}

		this.rules = next;
		this.logger.info({ changed, rules: ruleSetToDto(next) }, "rules updated");
		for (const listener of this.listeners) {
			try {
				listener(next, previous, changed);
			} catch (error: unknown) {
				this.logger.error({ error: String(error) }, "rule change listener threw");
			}
		}
		return ok(next);
	}
}
