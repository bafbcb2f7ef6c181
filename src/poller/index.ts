export {
	PollerCoordinator,
	type PollerDeps,
	type PollerSettings,
} from "./poller-coordinator.js";
export { KeyedSerialQueue, mapWithConcurrency } from "./concurrency.js";
export type { AccountOutcome, CycleReport, PollerHooks } from "./types.js";
