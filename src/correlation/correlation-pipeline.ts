/**
 * Filters trade events and runs them through the
 * instrument-level and category-level (window store, detector) pairs.
 *
 * One RuleSet is read per `ingest` call. Each insert-then-evaluate runs
 * synchronously, so two events for the same scope are always both counted.
 */

import { type Logger, defaultLogger } from "../lib/logger/index.js";
import type { RuleSet, RuleSource } from "../rules/types.js";
import type { TradeEvent } from "../snapshot/types.js";
import { EventWindowStore, createSequence } from "../window/event-window-store.js";
import { CorrelationDetector } from "./correlation-detector.js";
import { type CorrelationGroup, type EvaluationRules, ScopeKind } from "./types.js";

export interface CorrelationPipelineOptions {
	readonly rules: RuleSource;
	readonly logger?: Logger | undefined;
}

export interface PipelineStats {
	readonly accepted: number;
	readonly belowMinimum: number;
	readonly malformed: number;
	readonly groups: number;
}

export interface SweepResult {
	readonly evicted: number;
	readonly cooldownsPruned: number;
}

interface ScopePath {
	readonly store: EventWindowStore;
	readonly detector: CorrelationDetector;
}

/** Reason an event cannot enter a window, or null when it can. */
export function malformedReason(event: TradeEvent): string | null {
	if (event.instrument.length === 0) return "empty instrument";
	if (!Number.isFinite(event.timestamp)) return "non-finite timestamp";
	if (event.value.isNegative()) return "negative value";
	return null;
}

export class CorrelationPipeline {
	private readonly rules: RuleSource;
	private readonly logger: Logger;
	private readonly instrumentPath: ScopePath;
	private readonly categoryPath: ScopePath;
	private accepted = 0;
	private belowMinimum = 0;
	private malformed = 0;
	private groups = 0;

	constructor(options: CorrelationPipelineOptions) {
		this.rules = options.rules;
		this.logger = options.logger ?? defaultLogger({ component: "correlation" });
		const sequence = createSequence();
		this.instrumentPath = {
			store: new EventWindowStore(sequence),
			detector: new CorrelationDetector(ScopeKind.Instrument),
		};
		this.categoryPath = {
			store: new EventWindowStore(sequence),
			detector: new CorrelationDetector(ScopeKind.Category),
		};
	}

	ingest(events: readonly TradeEvent[]): CorrelationGroup[] {
		const rules = this.rules.current();
		if (!rules.enabled) return [];

		const groups: CorrelationGroup[] = [];
		for (const event of events) {
			if (!this.admit(event, rules)) continue;
			this.accepted++;

			const byInstrument = this.evaluate(this.instrumentPath, event.instrument, event, {
				threshold: rules.confluenceCount,
				windowMs: rules.timeWindowMs,
			});
			if (byInstrument !== null) groups.push(byInstrument);

			if (rules.themeEnabled && event.category !== null) {
				const byCategory = this.evaluate(this.categoryPath, event.category, event, {
					threshold: rules.themeCount,
					windowMs: rules.themeWindowMs,
				});
				if (byCategory !== null) groups.push(byCategory);
			}
		}
		this.groups += groups.length;
		return groups;
	}

	/** Evict expired entries from both stores and prune stale cooldowns. */
	sweep(now: number): SweepResult {
		const rules = this.rules.current();
		const evicted =
			this.instrumentPath.store.evictExpired(now, rules.timeWindowMs) +
			this.categoryPath.store.evictExpired(now, rules.themeWindowMs);
		const cooldownsPruned =
			this.instrumentPath.detector.pruneCooldowns(now) +
			this.categoryPath.detector.pruneCooldowns(now);
		if (evicted > 0 || cooldownsPruned > 0) {
			this.logger.debug({ evicted, cooldownsPruned }, "windows swept");
		}
		return { evicted, cooldownsPruned };
	}

	/** Live window view, for inspection and tests. */
	windows(kind: ScopeKind): EventWindowStore {
		return kind === ScopeKind.Instrument ? this.instrumentPath.store : this.categoryPath.store;
	}

	stats(): PipelineStats {
		return {
			accepted: this.accepted,
			belowMinimum: this.belowMinimum,
			malformed: this.malformed,
			groups: this.groups,
		};
	}

	/** Clear windows and cooldowns. */
	reset(): void {
		for (const path of [this.instrumentPath, this.categoryPath]) {
			path.store.clear();
			path.detector.reset();
		}
	}

	private admit(event: TradeEvent, rules: RuleSet): boolean {
		const reason = malformedReason(event);
		if (reason !== null) {
			this.malformed++;
			this.logger.warn(
				{ accountId: event.accountId, instrument: event.instrument, reason },
				"malformed trade event dropped",
			);
			return false;
		}
		if (event.value.lt(rules.minTradeValue)) {
			this.belowMinimum++;
			this.logger.debug(
				{
					accountId: event.accountId,
					instrument: event.instrument,
					value: event.value.toString(),
					minTradeValue: rules.minTradeValue.toString(),
				},
				"trade below minimum value",
			);
			return false;
		}
		return true;
	}

	private evaluate(
		path: ScopePath,
		scopeKey: string,
		event: TradeEvent,
		rules: EvaluationRules,
	): CorrelationGroup | null {
		const { entry, live } = path.store.insert(scopeKey, event, rules.windowMs);
		if (entry === null) {
			this.logger.debug({ scopeKey, timestamp: event.timestamp }, "event outside window");
			return null;
		}
		const group = path.detector.evaluate(scopeKey, live, event, rules);
		if (group !== null) {
			this.logger.info(
				{
					kind: group.kind,
					scopeKey,
					participants: group.participantCount,
					totalValue: group.totalValue.toString(),
				},
				"correlation detected",
			);
		}
		return group;
	}
}
