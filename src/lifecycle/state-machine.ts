/**
 * Validated lifecycle FSM for the poller.
 *
 * All transitions go through transition() which validates the move.
 */

import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import {
	SchedulerState,
	type SchedulerTransition,
	type StateError,
	StateErrorKind,
	type StateMetadata,
	type StateSnapshot,
} from "./types.js";

export class SchedulerStateMachine {
	private current: SchedulerState = SchedulerState.Idle;
	private currentEnteredAt: number;
	private currentMetadata: StateMetadata = { type: "none" };
	private readonly clock: Clock;

	constructor(clock: Clock = SystemClock) {
		this.clock = clock;
		this.currentEnteredAt = clock.now();
	}

	// ── Queries ────────────────────────────────────────────────────

	state(): SchedulerState {
		return this.current;
	}

	snapshot(): StateSnapshot {
		return {
			state: this.current,
			enteredAt: this.currentEnteredAt,
			metadata: this.currentMetadata,
		};
	}

	// ── Transitions ────────────────────────────────────────────────

	transition(t: SchedulerTransition): Result<SchedulerState, StateError> {
		const from = this.current;
		if (from === SchedulerState.Halted) {
			return err({
				kind: StateErrorKind.AlreadyHalted,
				message: "Scheduler halted after a fatal error",
				from,
				transition: t.type,
			});
		}

		const next = this.validateTransition(from, t);
		if (!next.ok) return next;

		const { state, metadata } = next.value;
		this.current = state;
		this.currentEnteredAt = this.clock.now();
		this.currentMetadata = metadata;
		return ok(state);
	}

	private validateTransition(
		from: SchedulerState,
		t: SchedulerTransition,
	): Result<{ state: SchedulerState; metadata: StateMetadata }, StateError> {
		switch (t.type) {
			case "start":
				if (from === SchedulerState.Idle) {
					return ok({ state: SchedulerState.Running, metadata: { type: "none" } });
				}
				break;

			case "stop":
				if (from === SchedulerState.Running) {
					return ok({ state: SchedulerState.Stopping, metadata: { type: "none" } });
				}
				break;

			case "stopped":
				if (from === SchedulerState.Stopping) {
					return ok({ state: SchedulerState.Idle, metadata: { type: "none" } });
				}
				break;

			case "halt":
				return ok({ state: SchedulerState.Halted, metadata: { type: "halt", reason: t.reason } });
		}

		return err({
			kind: StateErrorKind.InvalidTransition,
			message: `Cannot transition from ${from} via ${t.type}`,
			from,
			transition: t.type,
		});
	}
}
