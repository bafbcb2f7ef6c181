/**
 * Thresholds, windows and switches read on every evaluation.
 */

import { z } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";
import { Duration } from "../shared/time.js";

/** Immutable snapshot of every rule; replaced as a whole on each change. */
export interface RuleSet {
	/** Distinct accounts on one instrument needed to fire. */
	readonly confluenceCount: number;
	readonly timeWindowMs: number;
	/** Events whose resulting notional is below this never reach a window. */
	readonly minTradeValue: Decimal;
	readonly enabled: boolean;
	/** Distinct accounts in one category needed to fire. */
	readonly themeCount: number;
	readonly themeWindowMs: number;
	readonly themeEnabled: boolean;
}

export type RuleName = keyof RuleSet;

/** Read access the correlation pipeline needs. */
export interface RuleSource {
	current(): RuleSet;
}

export const MIN_WINDOW_MS = Duration.seconds(60);

export const DEFAULT_RULES: RuleSet = Object.freeze({
	confluenceCount: 2,
	timeWindowMs: Duration.minutes(5),
	minTradeValue: Decimal.from(1000),
	enabled: true,
	themeCount: 2,
	themeWindowMs: Duration.minutes(30),
	themeEnabled: true,
});

// ── Validation ───────────────────────────────────────────────────────

const decimalSchema = z.custom<Decimal>((value) => value instanceof Decimal, "Expected a decimal");

export const ruleSetSchema = z
	.object({
		confluenceCount: z.number().int().min(2),
		timeWindowMs: z.number().int().min(MIN_WINDOW_MS),
		minTradeValue: decimalSchema.refine((d) => !d.isNegative(), "Must be >= 0"),
		enabled: z.boolean(),
		themeCount: z.number().int().min(2),
		themeWindowMs: z.number().int().min(MIN_WINDOW_MS),
		themeEnabled: z.boolean(),
	})
	.strict();

// ── Persisted form ───────────────────────────────────────────────────

/**
 * On-disk shape: snake_case names, windows in seconds, the minimum value as a
 * decimal string. Missing keys take their defaults on load.
 */
export const ruleSetDtoSchema = z
	.object({
		confluence_count: z.number().int(),
		time_window: z.number(),
		min_trade_value: z.union([z.string(), z.number()]),
		enabled: z.boolean(),
		theme_count: z.number().int(),
		theme_window: z.number(),
		theme_enabled: z.boolean(),
	})
	.partial();

export type RuleSetDto = z.infer<typeof ruleSetDtoSchema>;

export function ruleSetToDto(rules: RuleSet): Required<RuleSetDto> {
	return {
		confluence_count: rules.confluenceCount,
		time_window: Duration.toSeconds(rules.timeWindowMs),
		min_trade_value: rules.minTradeValue.toString(),
		enabled: rules.enabled,
		theme_count: rules.themeCount,
		theme_window: Duration.toSeconds(rules.themeWindowMs),
		theme_enabled: rules.themeEnabled,
	};
}

/**
 * Merge a persisted DTO onto `base`. The result is unvalidated; run it
 * through `ruleSetSchema` before use.
 */
export function ruleSetFromDto(dto: RuleSetDto, base: RuleSet = DEFAULT_RULES): RuleSet | null {
	let minTradeValue = base.minTradeValue;
	if (dto.min_trade_value !== undefined) {
		const parsed = Decimal.tryFrom(dto.min_trade_value);
		if (parsed === null) return null;
		minTradeValue = parsed;
	}
	return {
		confluenceCount: dto.confluence_count ?? base.confluenceCount,
		timeWindowMs:
			dto.time_window !== undefined ? Duration.seconds(dto.time_window) : base.timeWindowMs,
		minTradeValue,
		enabled: dto.enabled ?? base.enabled,
		themeCount: dto.theme_count ?? base.themeCount,
		themeWindowMs:
			dto.theme_window !== undefined ? Duration.seconds(dto.theme_window) : base.themeWindowMs,
		themeEnabled: dto.theme_enabled ?? base.themeEnabled,
	};
}
