/**
 * Alert payloads and the sink they are delivered to.
 */

import type { ScopeKind } from "../correlation/types.js";
import type { EngineError } from "../shared/errors.js";
import type { AccountId, InstrumentId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import type { PositionSide, TradeAction } from "../snapshot/types.js";

export interface AlertParticipant {
	readonly accountId: AccountId;
	readonly name: string;
	readonly instrument: InstrumentId;
	readonly action: TradeAction;
	/** Direction traded; a close reports the side it closed. */
	readonly side: PositionSide;
	/** Signed decimal strings. */
	readonly sizeDelta: string;
	readonly previousSize: string;
	readonly size: string;
	/** Decimal string. */
	readonly value: string;
	readonly isTrigger: boolean;
}

/** Rendered alert, ready for any transport. */
export interface AlertPayload {
	readonly kind: ScopeKind;
	readonly scopeKey: string;
	readonly title: string;
	readonly text: string;
	readonly participants: readonly AlertParticipant[];
	/** Decimal string. */
	readonly totalValue: string;
	readonly createdAt: number;
}

/** Outbound channel for alerts (chat bot, webhook, queue). */
export interface AlertSink {
	deliver(payload: AlertPayload): Promise<Result<void, EngineError>>;
}

export interface DeliveryRetryConfig {
	readonly maxAttempts: number;
	readonly baseDelayMs: number;
	readonly maxDelayMs: number;
	/** Fraction of the delay randomised in both directions, 0..1. */
	readonly jitterFactor: number;
	/** Give up once an alert would be this old (ms since `createdAt`) at the next attempt. */
	readonly maxAgeMs: number;
}

export const DEFAULT_DELIVERY_RETRY_CONFIG: DeliveryRetryConfig = {
	maxAttempts: 3,
	baseDelayMs: 500,
	maxDelayMs: 10_000,
	jitterFactor: 0.1,
	maxAgeMs: 300_000,
};
