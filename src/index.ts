// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type AccountId,
	type InstrumentId,
	type CategoryId,
	accountId,
	instrumentId,
	categoryId,
	isAccountAddress,
	shortAccount,
	type Result,
	ok,
	err,
	isOk,
	isErr,
	unwrap,
	unwrapOr,
	Decimal,
	type Clock,
	SystemClock,
	FakeClock,
	Duration,
	formatUtc,
	formatDuration,
	type EngineConfig,
	DEFAULT_ENGINE_CONFIG,
	configFromEnv,
	resolveEngineConfig,
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
} from "./shared/index.js";

// ── Engine ───────────────────────────────────────────────────────────
export {
	ConfluenceEngine,
	EngineBuilder,
	type EngineComponents,
	type EngineEvents,
	type EngineHealth,
	type FromConfigOptions,
} from "./engine/index.js";

// ── Snapshots ────────────────────────────────────────────────────────
export {
	TradeAction,
	PositionSide,
	type Position,
	type PositionSnapshot,
	type TradeEvent,
	type SnapshotSource,
	type FetchOptions,
	type ClassifyFn,
	type DiffOptions,
	type TradeDiffer,
	diffSnapshots,
	snapshotFromDto,
	snapshotDtoSchema,
	validateSnapshot,
	type SnapshotDto,
	type PositionDto,
	BaselineStore,
} from "./snapshot/index.js";

// ── Classification ───────────────────────────────────────────────────
export {
	InstrumentClassifier,
	DEFAULT_CATEGORIES_PATH,
	categoryTableSchema,
	type CategoryTable,
} from "./classifier/index.js";

// ── Correlation ──────────────────────────────────────────────────────
export {
	ScopeKind,
	type CorrelationGroup,
	CorrelationDetector,
	CorrelationPipeline,
	type PipelineStats,
} from "./correlation/index.js";
export { EventWindowStore, type WindowEntry } from "./window/index.js";

// ── Rules & Accounts ─────────────────────────────────────────────────
export {
	type RuleSet,
	type RuleName,
	DEFAULT_RULES,
	MIN_WINDOW_MS,
	RuleRegistry,
	type RuleChangeListener,
} from "./rules/index.js";
export {
	AccountKind,
	type AccountInput,
	type TrackedAccount,
	AccountRegistry,
	AccountHealthTracker,
	HealthStatus,
	DEFAULT_HEALTH_CONFIG,
	type AccountHealth,
	type HealthConfig,
} from "./accounts/index.js";

// ── Polling ──────────────────────────────────────────────────────────
export {
	PollerCoordinator,
	type PollerSettings,
	type CycleReport,
	type PollerHooks,
} from "./poller/index.js";
export { SchedulerState, type StateError } from "./lifecycle/index.js";

// ── Alerts ───────────────────────────────────────────────────────────
export {
	type AlertPayload,
	type AlertParticipant,
	type AlertSink,
	type DeliveryRetryConfig,
	DEFAULT_DELIVERY_RETRY_CONFIG,
	formatAlert,
	formatUsd,
	withDeliveryRetry,
	type DeliveryRetryOptions,
	AlertDispatcher,
	MemoryAlertSink,
} from "./alert/index.js";

// ── Persistence ──────────────────────────────────────────────────────
export {
	type Journal,
	type JournalEntry,
	type CorrelationEntry,
	FileJournal,
	MemoryJournal,
	FileDocumentStore,
	MemoryDocumentStore,
	type DocumentStore,
} from "./persistence/index.js";

// ── Testing ──────────────────────────────────────────────────────────
export { FakeSnapshotSource } from "./testing/fake-snapshot-source.js";

// ── Lib: HTTP ────────────────────────────────────────────────────────
export { TokenBucketRateLimiter } from "./lib/http/index.js";
export type { RateLimiterConfig, RateLimiterStats } from "./lib/http/index.js";

// ── Lib: Logger ─────────────────────────────────────────────────────
export { createLogger, silentLogger } from "./lib/logger/index.js";
export type { Logger, LoggerConfig, LogLevel } from "./lib/logger/index.js";

// ── Lib: Validation ─────────────────────────────────────────────────
export { validate, ValidationError, z } from "./lib/validation/index.js";
export type { ValidationIssue } from "./lib/validation/index.js";

// ── Lib: Events ─────────────────────────────────────────────────────
export { TypedEmitter } from "./lib/events/index.js";
export type { EventMap } from "./lib/events/index.js";
