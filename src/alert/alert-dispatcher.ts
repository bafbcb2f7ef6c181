/**
 * Formats groups and hands them to the sink without
 * blocking detection.
 *
 * Deliveries are tracked so `drain()` can await them on shutdown. A failed
 * delivery is logged and counted; the group is never re-evaluated.
 */

import type { CorrelationGroup } from "../correlation/types.js";
import { type Logger, defaultLogger } from "../lib/logger/index.js";
import { classifyError } from "../shared/errors.js";
import { type FormatOptions, formatAlert } from "./alert-formatter.js";
import type { AlertPayload, AlertSink } from "./types.js";

export interface AlertDispatcherOptions {
	readonly sink: AlertSink;
	readonly format?: FormatOptions | undefined;
	readonly logger?: Logger | undefined;
}

export interface DispatchStats {
	readonly delivered: number;
	readonly failed: number;
	readonly pending: number;
}

export class AlertDispatcher {
	private readonly sink: AlertSink;
	private readonly format: FormatOptions;
	private readonly logger: Logger;
	private readonly inFlight = new Set<Promise<void>>();
	private delivered = 0;
	private failed = 0;

	constructor(options: AlertDispatcherOptions) {
		this.sink = options.sink;
		this.format = options.format ?? {};
		this.logger = options.logger ?? defaultLogger({ component: "alerts" });
	}

	/** Format and start delivery; returns the payload without waiting. */
	dispatch(group: CorrelationGroup): AlertPayload {
		const payload = formatAlert(group, this.format);
		const delivery: Promise<void> = this.deliver(payload).finally(() => {
			this.inFlight.delete(delivery);
		});
		this.inFlight.add(delivery);
		return payload;
	}

	/** Resolves once every delivery started so far has settled. */
	async drain(): Promise<void> {
		while (this.inFlight.size > 0) {
			await Promise.all([...this.inFlight]);
		}
	}

	stats(): DispatchStats {
		return { delivered: this.delivered, failed: this.failed, pending: this.inFlight.size };
	}

	private async deliver(payload: AlertPayload): Promise<void> {
		try {
			const result = await this.sink.deliver(payload);
			if (result.ok) {
				this.delivered++;
				this.logger.debug({ kind: payload.kind, scopeKey: payload.scopeKey }, "alert delivered");
				return;
			}
			this.failed++;
			this.logger.error(
				{ kind: payload.kind, scopeKey: payload.scopeKey, error: result.error.toJSON() },
				"alert delivery failed",
			);
		} catch (thrown: unknown) {
			this.failed++;
			const error = classifyError(thrown);
			this.logger.error(
				{ kind: payload.kind, scopeKey: payload.scopeKey, error: error.toJSON() },
				"alert sink threw",
			);
		}
	}
}
