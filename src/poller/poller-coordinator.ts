/**
 * Drives polling cycles over the active accounts.
 *
 * Per account: fetch (rate-limited, with a deadline) → validate → diff →
 * commit baseline and ingest events. The last step is synchronous, so an
 * account's baseline and the windows it feeds move together or not at all.
 *
 * Cycles never overlap: the next one is scheduled `pollIntervalMs` after the
 * previous one ends. A fatal error halts the scheduler.
 */

import type { AccountHealthTracker } from "../accounts/account-health.js";
import type { TrackedAccount } from "../accounts/types.js";
import type { CorrelationGroup } from "../correlation/types.js";
import type { CorrelationPipeline } from "../correlation/correlation-pipeline.js";
import type { TokenBucketRateLimiter } from "../lib/http/rate-limiter.js";
import { type Logger, defaultLogger } from "../lib/logger/index.js";
import { SchedulerStateMachine } from "../lifecycle/state-machine.js";
import { SchedulerState, type StateError, type StateSnapshot } from "../lifecycle/types.js";
import type { EngineConfig } from "../shared/config.js";
import { type EngineError, TimeoutError, classifyError } from "../shared/errors.js";
import type { AccountId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import type { BaselineStore } from "../snapshot/baseline-store.js";
import { validateSnapshot } from "../snapshot/snapshot-dto.js";
import type {
	ClassifyFn,
	PositionSnapshot,
	SnapshotSource,
	TradeDiffer,
	TradeEvent,
} from "../snapshot/types.js";
import { KeyedSerialQueue, mapWithConcurrency } from "./concurrency.js";
import type { AccountOutcome, CycleReport, PollerHooks } from "./types.js";

export type PollerSettings = Pick<
	EngineConfig,
	"pollIntervalMs" | "maxConcurrency" | "fetchTimeoutMs" | "rebaselineAfterFailures"
>;

interface FatalOutcome {
	readonly status: "fatal";
	readonly error: EngineError;
}

export interface PollerDeps {
	readonly source: SnapshotSource;
	readonly accounts: { active(): readonly TrackedAccount[] };
	readonly pipeline: CorrelationPipeline;
	readonly baselines: BaselineStore;
	readonly health: AccountHealthTracker;
	readonly differ: TradeDiffer;
	readonly classify: ClassifyFn;
	readonly settings: PollerSettings;
	readonly rateLimiter?: TokenBucketRateLimiter | null | undefined;
	readonly hooks?: PollerHooks | undefined;
	readonly clock?: Clock | undefined;
	readonly logger?: Logger | undefined;
}

export class PollerCoordinator {
	private readonly deps: PollerDeps;
	private readonly hooks: PollerHooks;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly lifecycle: SchedulerStateMachine;
	private readonly accountQueue = new KeyedSerialQueue<AccountId>();
	private timer: ReturnType<typeof setTimeout> | null = null;
	private inFlight: Promise<Result<CycleReport, EngineError>> | null = null;
	private stopping: Promise<void> | null = null;
	private cycleCount = 0;

	constructor(deps: PollerDeps) {
		this.deps = deps;
		this.hooks = deps.hooks ?? {};
		this.clock = deps.clock ?? SystemClock;
		this.logger = deps.logger ?? defaultLogger({ component: "poller" });
		this.lifecycle = new SchedulerStateMachine(this.clock);
	}

	// ── Lifecycle ──────────────────────────────────────────────────

	state(): SchedulerState {
		return this.lifecycle.state();
	}

	/** Current state with the time it was entered and, once halted, the reason. */
	lifecycleSnapshot(): StateSnapshot {
		return this.lifecycle.snapshot();
	}

	/** Begin polling: one cycle now, then one per interval. No-op when running. */
	start(): Result<void, StateError> {
		if (this.lifecycle.state() === SchedulerState.Running) return ok(undefined);
		const started = this.lifecycle.transition({ type: "start" });
		if (!started.ok) return started;
		this.logger.info({ intervalMs: this.deps.settings.pollIntervalMs }, "poller started");
		this.schedule(0);
		return ok(undefined);
	}

	/** Cancel the pending cycle and wait for the running one. No-op when idle. */
	async stop(): Promise<void> {
		if (this.stopping !== null) return this.stopping;
		if (this.lifecycle.state() !== SchedulerState.Running) return;
		this.lifecycle.transition({ type: "stop" });
		this.clearTimer();
		this.stopping = this.finishStop();
		try {
			await this.stopping;
		} finally {
			this.stopping = null;
		}
	}

	// ── Cycles ─────────────────────────────────────────────────────

	/**
	 * Poll every active account once. A call while a cycle is running joins
	 * that cycle. Returns an error only for fatal failures, after halting.
	 */
	runCycle(): Promise<Result<CycleReport, EngineError>> {
		if (this.inFlight !== null) return this.inFlight;
		const run = this.executeCycle()
			.catch((thrown: unknown) => {
				const error = classifyError(thrown);
				this.halt(error);
				return err(error);
			})
			.finally(() => {
				this.inFlight = null;
			});
		this.inFlight = run;
		return run;
	}

	/** Poll one account outside the schedule. */
	pollAccount(account: TrackedAccount): Promise<AccountOutcome> {
		return this.accountQueue.run(account.id, () => this.poll(account));
	}

	private async executeCycle(): Promise<Result<CycleReport, EngineError>> {
		const startedAt = this.clock.now();
		const cycle = ++this.cycleCount;
		const accounts = this.deps.accounts.active();

		const outcomes = await mapWithConcurrency(
			accounts,
			this.deps.settings.maxConcurrency,
			async (account): Promise<AccountOutcome | FatalOutcome> => {
				try {
					return await this.pollAccount(account);
				} catch (thrown: unknown) {
					return { status: "fatal", error: classifyError(thrown) };
				}
			},
		);

		const fatal = outcomes.find((outcome): outcome is FatalOutcome => outcome.status === "fatal");
		if (fatal !== undefined) {
			this.halt(fatal.error);
			return err(fatal.error);
		}

		const events: TradeEvent[] = [];
		const groups: CorrelationGroup[] = [];
		let failed = 0;
		for (const outcome of outcomes) {
			if (outcome.status === "fatal") continue;
			if (outcome.status === "failed") {
				failed++;
				continue;
			}
			events.push(...outcome.events);
			groups.push(...outcome.groups);
		}
		const { evicted } = this.deps.pipeline.sweep(this.clock.now());

		const report: CycleReport = {
			cycle,
			startedAt,
			durationMs: this.clock.now() - startedAt,
			polled: accounts.length,
			failed,
			events,
			groups,
			evicted,
		};
		this.logger.info(
			{
				cycle,
				polled: report.polled,
				failed,
				events: events.length,
				groups: groups.length,
				durationMs: report.durationMs,
			},
			"cycle complete",
		);
		this.hooks.onCycle?.(report);
		return ok(report);
	}

	private async poll(account: TrackedAccount): Promise<AccountOutcome> {
		const fetched = await this.fetch(account.id);
		const validated = fetched.ok ? validateSnapshot(fetched.value, account.id) : fetched;
		if (!validated.ok) return this.recordFailure(account.id, validated.error);

		this.deps.health.recordSuccess(account.id);
		const snapshot = validated.value;

		// Diff, commit and ingest run without yielding.
		const previous = this.deps.baselines.current(account.id);
		const events = this.deps.differ(account.id, previous, snapshot, {
			now: this.clock.now(),
			classify: this.deps.classify,
		});
		this.deps.baselines.commit(snapshot);
		const groups = this.deps.pipeline.ingest(events);

		if (previous === null) {
			this.logger.info(
				{ accountId: account.id, positions: snapshot.positions.length },
				"baseline established",
			);
		} else if (events.length > 0) {
			this.logger.debug({ accountId: account.id, events: events.length }, "trades detected");
		}
		if (events.length > 0) this.hooks.onTrades?.(events);
		if (groups.length > 0) this.hooks.onGroups?.(groups);
		return { status: "ok", accountId: account.id, events, groups, baseline: previous === null };
	}

	private async fetch(accountId: AccountId): Promise<Result<PositionSnapshot, EngineError>> {
		const timeoutMs = this.deps.settings.fetchTimeoutMs;
		const controller = new AbortController();
		let timer: ReturnType<typeof setTimeout> | undefined;
		const deadline = new Promise<Result<PositionSnapshot, EngineError>>((resolve) => {
			timer = setTimeout(() => {
				resolve(
					err(
						new TimeoutError(`Snapshot fetch timed out after ${timeoutMs}ms`, {
							accountId,
							timeoutMs,
						}),
					),
				);
				controller.abort();
			}, timeoutMs);
		});

		try {
			await this.deps.rateLimiter?.acquire(timeoutMs);
			const request = this.deps.source.fetchSnapshot(accountId, { signal: controller.signal });
			return await Promise.race([request, deadline]);
		} catch (thrown: unknown) {
			return err(classifyError(thrown));
		} finally {
			if (timer !== undefined) clearTimeout(timer);
		}
	}

	private recordFailure(accountId: AccountId, error: EngineError): AccountOutcome {
		const consecutiveFailures = this.deps.health.recordFailure(accountId, error);
		this.logger.warn(
			{ accountId, code: error.code, error: error.message, consecutiveFailures },
			"snapshot fetch failed",
		);
		this.hooks.onAccountFailed?.(accountId, error, consecutiveFailures);

		if (
			consecutiveFailures >= this.deps.settings.rebaselineAfterFailures &&
			this.deps.baselines.reset(accountId)
		) {
			this.logger.warn({ accountId, consecutiveFailures }, "baseline dropped after failures");
			this.hooks.onBaselineReset?.(accountId, consecutiveFailures);
		}
		return { status: "failed", accountId, error, consecutiveFailures };
	}

	// ── Scheduling ─────────────────────────────────────────────────

	private schedule(delayMs: number): void {
		this.clearTimer();
		this.timer = setTimeout(() => {
			this.timer = null;
			void this.tick();
		}, delayMs);
	}

	private async tick(): Promise<void> {
		if (this.lifecycle.state() !== SchedulerState.Running) return;
		const result = await this.runCycle();
		if (result.ok && this.lifecycle.state() === SchedulerState.Running) {
			this.schedule(this.deps.settings.pollIntervalMs);
		}
	}

	private async finishStop(): Promise<void> {
		if (this.inFlight !== null) await this.inFlight;
		if (this.lifecycle.state() === SchedulerState.Stopping) {
			this.lifecycle.transition({ type: "stopped" });
		}
		this.logger.info({ cycles: this.cycleCount }, "poller stopped");
	}

	private halt(error: EngineError): void {
		this.clearTimer();
		if (this.lifecycle.state() === SchedulerState.Halted) return;
		this.lifecycle.transition({ type: "halt", reason: error.message });
		this.logger.fatal({ error: error.toJSON() }, "fatal error, poller halted");
		this.hooks.onFatal?.(error);
	}

	private clearTimer(): void {
		if (this.timer !== null) {
			clearTimeout(this.timer);
			this.timer = null;
		}
	}
}
