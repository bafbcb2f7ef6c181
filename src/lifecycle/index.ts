export {
	SchedulerState,
	StateErrorKind,
	type SchedulerTransition,
	type StateSnapshot,
	type StateMetadata,
	type StateError,
} from "./types.js";

export { SchedulerStateMachine } from "./state-machine.js";
