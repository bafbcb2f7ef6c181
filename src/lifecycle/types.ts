/**
 * Scheduler lifecycle types.
 *
 * Idle → Running → Stopping → Idle, plus Halted after a fatal error.
 * Transitions are validated; nothing changes state implicitly.
 */

// ── States ───────────────────────────────────────────────────────────

export const SchedulerState = {
	/** Not polling; `start` allowed. */
	Idle: "idle",
	/** Cycles are scheduled. */
	Running: "running",
	/** No new cycles; waiting for the in-flight one to finish. */
	Stopping: "stopping",
	/** Stopped by a fatal error; only inspection is possible. */
	Halted: "halted",
} as const;

export type SchedulerState = (typeof SchedulerState)[keyof typeof SchedulerState];

// ── Transitions ──────────────────────────────────────────────────────

export type SchedulerTransition =
	| { readonly type: "start" }
	| { readonly type: "stop" }
	| { readonly type: "stopped" }
	| { readonly type: "halt"; readonly reason: string };

export type StateMetadata =
	| { readonly type: "none" }
	| { readonly type: "halt"; readonly reason: string };

export interface StateSnapshot {
	readonly state: SchedulerState;
	readonly enteredAt: number;
	readonly metadata: StateMetadata;
}

// ── Errors ───────────────────────────────────────────────────────────

export const StateErrorKind = {
	InvalidTransition: "invalid_transition",
	AlreadyHalted: "already_halted",
} as const;

export type StateErrorKind = (typeof StateErrorKind)[keyof typeof StateErrorKind];

export interface StateError {
	readonly kind: StateErrorKind;
	readonly message: string;
	readonly from: SchedulerState;
	readonly transition: SchedulerTransition["type"];
}
