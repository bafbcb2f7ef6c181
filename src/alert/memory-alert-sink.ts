import { DeliveryError, type EngineError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import type { AlertPayload, AlertSink } from "./types.js";

/** Collects payloads in memory. Can be told to fail the next N deliveries. */
export class MemoryAlertSink implements AlertSink {
	readonly payloads: AlertPayload[] = [];
	private failuresLeft = 0;
	private failure: EngineError = new DeliveryError("Memory sink failure");
	private attempts = 0;

	async deliver(payload: AlertPayload): Promise<Result<void, EngineError>> {
		this.attempts++;
		if (this.failuresLeft > 0) {
			this.failuresLeft--;
			return err(this.failure);
		}
		this.payloads.push(payload);
		return ok(undefined);
	}

	failNext(count: number, error: EngineError = new DeliveryError("Memory sink failure")): void {
		this.failuresLeft = count;
		this.failure = error;
	}

	get attemptCount(): number {
		return this.attempts;
	}
}
