export {
	type AccountId,
	type InstrumentId,
	type CategoryId,
	accountId,
	instrumentId,
	categoryId,
	isAccountAddress,
	shortAccount,
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	map,
	mapErr,
	flatMap,
	collect,
	unwrap,
	unwrapOr,
	isOk,
	isErr,
	tryCatch,
	tryCatchAsync,
} from "./result.js";

export {
	ErrorCategory,
	EngineError,
	FetchError,
	TimeoutError,
	RateLimitError,
	DeliveryError,
	StorageError,
	DataError,
	ConfigError,
	InvariantViolationError,
	SystemError,
	classifyError,
} from "./errors.js";

export { Decimal } from "./decimal.js";
export {
	type Clock,
	SystemClock,
	FakeClock,
	Duration,
	formatUtc,
	formatDuration,
} from "./time.js";
export {
	type EngineConfig,
	DEFAULT_ENGINE_CONFIG,
	configFromEnv,
	resolveEngineConfig,
} from "./config.js";
