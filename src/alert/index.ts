export {
	type AlertParticipant,
	type AlertPayload,
	type AlertSink,
	type DeliveryRetryConfig,
	DEFAULT_DELIVERY_RETRY_CONFIG,
} from "./types.js";
export { formatAlert, formatUsd, type FormatOptions } from "./alert-formatter.js";
export {
	backoffDelay,
	withDeliveryRetry,
	type DeliveryRetryOptions,
} from "./delivery-retry.js";
export {
	AlertDispatcher,
	type AlertDispatcherOptions,
	type DispatchStats,
} from "./alert-dispatcher.js";
export { MemoryAlertSink } from "./memory-alert-sink.js";
