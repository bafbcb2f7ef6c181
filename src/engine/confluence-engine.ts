/**
 * The running system: poller, correlation pipeline and
 * alert dispatch behind one object.
 *
 * Side effects hang off the poller hooks: every trade, group, failure and
 * rule change is journalled, groups become alerts, and each step is emitted
 * to listeners.
 */

import { AccountHealthTracker, type HealthConfig } from "../accounts/account-health.js";
import type { AccountRegistry } from "../accounts/account-registry.js";
import { AlertDispatcher } from "../alert/alert-dispatcher.js";
import type { AlertSink } from "../alert/types.js";
import type { InstrumentClassifier } from "../classifier/instrument-classifier.js";
import { CorrelationPipeline } from "../correlation/correlation-pipeline.js";
import type { CorrelationGroup } from "../correlation/types.js";
import { TypedEmitter } from "../lib/events/index.js";
import { TokenBucketRateLimiter } from "../lib/http/rate-limiter.js";
import type { Logger } from "../lib/logger/index.js";
import type { StateError } from "../lifecycle/types.js";
import {
	type Journal,
	type JournalEntry,
	baselineReset,
	correlationEmitted,
	fetchFailed,
	ruleChanged,
	tradeDetected,
} from "../persistence/journal.js";
import { PollerCoordinator } from "../poller/poller-coordinator.js";
import type { CycleReport } from "../poller/types.js";
import type { RuleRegistry } from "../rules/rule-registry.js";
import type { EngineConfig } from "../shared/config.js";
import { type EngineError, classifyError } from "../shared/errors.js";
import { type AccountId, categoryId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { BaselineStore } from "../snapshot/baseline-store.js";
import type { SnapshotSource, TradeDiffer, TradeEvent } from "../snapshot/types.js";
import type { EngineEvents, EngineHealth } from "./types.js";

/** Everything a ConfluenceEngine is assembled from; see EngineBuilder. */
export interface ConfluenceEngineDeps {
	readonly source: SnapshotSource;
	readonly sink: AlertSink;
	readonly rules: RuleRegistry;
	readonly accounts: AccountRegistry;
	readonly classifier: InstrumentClassifier;
	readonly journal: Journal | null;
	readonly differ: TradeDiffer;
	readonly config: EngineConfig;
	readonly healthConfig: HealthConfig;
	readonly clock: Clock;
	readonly logger: Logger;
}

export class ConfluenceEngine {
	readonly rules: RuleRegistry;
	readonly accounts: AccountRegistry;
	private readonly emitter = new TypedEmitter<EngineEvents>();
	private readonly baselines = new BaselineStore();
	private readonly healthTracker: AccountHealthTracker;
	private readonly pipeline: CorrelationPipeline;
	private readonly dispatcher: AlertDispatcher;
	private readonly poller: PollerCoordinator;
	private readonly journal: Journal | null;
	private readonly pendingWrites = new Set<Promise<void>>();
	private readonly clock: Clock;
	private readonly logger: Logger;
	private journalFailures = 0;

	constructor(deps: ConfluenceEngineDeps) {
		this.rules = deps.rules;
		this.accounts = deps.accounts;
		this.journal = deps.journal;
		this.clock = deps.clock;
		this.logger = deps.logger;
		this.healthTracker = new AccountHealthTracker(deps.healthConfig, deps.clock);
		this.pipeline = new CorrelationPipeline({
			rules: deps.rules,
			logger: deps.logger.child({ component: "correlation" }),
		});
		this.dispatcher = new AlertDispatcher({
			sink: deps.sink,
			format: {
				resolveName: (id) => deps.accounts.displayName(id),
				emoji: (category) => deps.classifier.emoji(categoryId(category)),
			},
			logger: deps.logger.child({ component: "alerts" }),
		});

		const perSecond = deps.config.fetchesPerSecond;
		this.poller = new PollerCoordinator({
			source: deps.source,
			accounts: deps.accounts,
			pipeline: this.pipeline,
			baselines: this.baselines,
			health: this.healthTracker,
			differ: deps.differ,
			classify: (instrument) => deps.classifier.classify(instrument),
			settings: deps.config,
			rateLimiter:
				perSecond > 0
					? new TokenBucketRateLimiter({ capacity: perSecond, refillRate: perSecond, clock: deps.clock })
					: null,
			clock: deps.clock,
			logger: deps.logger.child({ component: "poller" }),
			hooks: {
				onTrades: (events) => this.handleTrades(events),
				onGroups: (groups) => this.handleGroups(groups),
				onAccountFailed: (accountId, error, failures) =>
					this.handleAccountFailed(accountId, error, failures),
				onBaselineReset: (accountId, failures) => this.handleBaselineReset(accountId, failures),
				onCycle: (report) => this.handleCycle(report),
				onFatal: (error) => this.safeEmit("fatal", error),
			},
		});

		deps.accounts.onChange((account) => {
			if (!account.active) this.forget(account.id);
		});
		deps.rules.onChange((next, _previous, changed) => {
			this.logger.info({ changed }, "rules changed");
			this.record(ruleChanged(next, changed, this.clock.now()));
		});
	}

	// ── Lifecycle ──────────────────────────────────────────────────

	start(): Result<void, StateError> {
		return this.poller.start();
	}

	/** Stop polling, then wait for alert deliveries and journal writes. */
	async stop(): Promise<void> {
		await this.poller.stop();
		await this.dispatcher.drain();
		while (this.pendingWrites.size > 0) {
			await Promise.all([...this.pendingWrites]);
		}
		await this.journal?.flush();
	}

	/** One poll of every active account, outside the schedule. */
	runCycle(): Promise<Result<CycleReport, EngineError>> {
		return this.poller.runCycle();
	}

	health(): EngineHealth {
		return {
			scheduler: this.poller.lifecycleSnapshot(),
			accounts: this.accounts.active().map((account) => this.healthTracker.snapshot(account.id)),
			alerts: this.dispatcher.stats(),
			correlation: this.pipeline.stats(),
			journalFailures: this.journalFailures,
		};
	}

	// ── Events ─────────────────────────────────────────────────────

	on<K extends keyof EngineEvents>(event: K, handler: EngineEvents[K]): this {
		this.emitter.on(event, handler);
		return this;
	}

	off<K extends keyof EngineEvents>(event: K, handler: EngineEvents[K]): this {
		this.emitter.off(event, handler);
		return this;
	}

	once<K extends keyof EngineEvents>(event: K, handler: EngineEvents[K]): this {
		this.emitter.once(event, handler);
		return this;
	}

	// ── Hook handlers ──────────────────────────────────────────────

	private handleTrades(events: readonly TradeEvent[]): void {
		for (const event of events) this.record(tradeDetected(event));
		this.safeEmit("trade", events);
	}

	private handleGroups(groups: readonly CorrelationGroup[]): void {
		for (const group of groups) {
			const alert = this.dispatcher.dispatch(group);
			this.record(correlationEmitted(group));
			this.logger.info(
				{
					kind: group.kind,
					scopeKey: group.scopeKey,
					participants: group.participantCount,
					threshold: group.threshold,
				},
				"correlation detected",
			);
			this.safeEmit("correlation", group, alert);
		}
	}

	private handleAccountFailed(accountId: AccountId, error: EngineError, failures: number): void {
		this.record(fetchFailed(accountId, error, failures, this.clock.now()));
		this.safeEmit("account_failed", accountId, error, failures);
	}

	private handleBaselineReset(accountId: AccountId, failures: number): void {
		this.record(baselineReset(accountId, failures, this.clock.now()));
		this.safeEmit("baseline_reset", accountId, failures);
	}

	private handleCycle(report: CycleReport): void {
		this.forgetInactive();
		this.safeEmit("cycle", report);
	}

	/**
	 * Drop state for deactivated accounts so a later re-activation starts from
	 * a fresh baseline. Runs on deactivation and again after each cycle.
	 */
	private forgetInactive(): void {
		const active = new Set(this.accounts.active().map((account) => account.id));
		const known = new Set([
			...this.baselines.accounts(),
			...this.healthTracker.all().map((health) => health.accountId),
		]);
		for (const id of known) {
			if (!active.has(id)) this.forget(id);
		}
	}

	private forget(id: AccountId): void {
		this.baselines.reset(id);
		this.healthTracker.forget(id);
	}

	// ── Side effects ───────────────────────────────────────────────

	private record(entry: JournalEntry): void {
		if (this.journal === null) return;
		const write: Promise<void> = this.journal
			.record(entry)
			.catch((thrown: unknown) => this.onJournalError(entry, thrown))
			.finally(() => {
				this.pendingWrites.delete(write);
			});
		this.pendingWrites.add(write);
	}

	private onJournalError(entry: JournalEntry, thrown: unknown): void {
		this.journalFailures++;
		const error = classifyError(thrown);
		this.logger.error({ entry: entry.type, error: error.message }, "journal write failed");
		this.safeEmit("journal_error", error);
	}

	/** A throwing listener is logged and never reaches the poller. */
	private safeEmit<K extends keyof EngineEvents>(
		event: K,
		...args: Parameters<EngineEvents[K]>
	): void {
		try {
			this.emitter.emit(event, ...args);
		} catch (thrown: unknown) {
			const detail = thrown instanceof Error ? thrown.message : String(thrown);
			this.logger.error({ event, error: detail }, "event listener threw");
		}
	}
}
