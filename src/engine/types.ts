import type { AccountHealth } from "../accounts/account-health.js";
import type { DispatchStats } from "../alert/alert-dispatcher.js";
import type { AlertPayload } from "../alert/types.js";
import type { PipelineStats } from "../correlation/correlation-pipeline.js";
import type { CorrelationGroup } from "../correlation/types.js";
import type { StateSnapshot } from "../lifecycle/types.js";
import type { CycleReport } from "../poller/types.js";
import type { EngineError } from "../shared/errors.js";
import type { AccountId } from "../shared/identifiers.js";
import type { TradeEvent } from "../snapshot/types.js";

/** Events a running engine emits. Listeners run synchronously on the poll path. */
export type EngineEvents = {
	correlation: (group: CorrelationGroup, alert: AlertPayload) => void;
	trade: (events: readonly TradeEvent[]) => void;
	cycle: (report: CycleReport) => void;
	account_failed: (accountId: AccountId, error: EngineError, consecutiveFailures: number) => void;
	baseline_reset: (accountId: AccountId, consecutiveFailures: number) => void;
	journal_error: (error: EngineError) => void;
	fatal: (error: EngineError) => void;
};

export interface EngineHealth {
	readonly scheduler: StateSnapshot;
	/** One entry per active account, in registry order. */
	readonly accounts: readonly AccountHealth[];
	readonly alerts: DispatchStats;
	readonly correlation: PipelineStats;
	readonly journalFailures: number;
}
