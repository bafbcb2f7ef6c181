/**
 * Per-account outcomes, cycle reports and the hooks the engine
 * plugs in.
 */

import type { CorrelationGroup } from "../correlation/types.js";
import type { EngineError } from "../shared/errors.js";
import type { AccountId } from "../shared/identifiers.js";
import type { TradeEvent } from "../snapshot/types.js";

export type AccountOutcome =
	| {
			readonly status: "ok";
			readonly accountId: AccountId;
			readonly events: readonly TradeEvent[];
			readonly groups: readonly CorrelationGroup[];
			/** True when this snapshot only established a baseline. */
			readonly baseline: boolean;
	  }
	| {
			readonly status: "failed";
			readonly accountId: AccountId;
			readonly error: EngineError;
			readonly consecutiveFailures: number;
	  };

export interface CycleReport {
	readonly cycle: number;
	readonly startedAt: number;
	readonly durationMs: number;
	readonly polled: number;
	readonly failed: number;
	readonly events: readonly TradeEvent[];
	readonly groups: readonly CorrelationGroup[];
	readonly evicted: number;
}

/** Callbacks invoked synchronously as work completes. Must not throw. */
export interface PollerHooks {
	readonly onTrades?: ((events: readonly TradeEvent[]) => void) | undefined;
	readonly onGroups?: ((groups: readonly CorrelationGroup[]) => void) | undefined;
	readonly onAccountFailed?:
		| ((accountId: AccountId, error: EngineError, consecutiveFailures: number) => void)
		| undefined;
	readonly onBaselineReset?:
		| ((accountId: AccountId, consecutiveFailures: number) => void)
		| undefined;
	readonly onCycle?: ((report: CycleReport) => void) | undefined;
	readonly onFatal?: ((error: EngineError) => void) | undefined;
}
