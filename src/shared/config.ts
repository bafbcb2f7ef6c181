/**
 * Process-level settings that are not correlation rules.
 *
 * Rules (thresholds, windows, minimum value) live in the rule registry and can
 * change at runtime; everything here is fixed for the life of the process.
 */

import { type LogLevel, isLogLevel } from "../lib/logger/index.js";
import { ConfigError } from "./errors.js";
import { Duration } from "./time.js";

export interface EngineConfig {
	/** Delay between the end of one poll cycle and the start of the next. */
	readonly pollIntervalMs: number;
	/** Maximum snapshot fetches in flight at once. */
	readonly maxConcurrency: number;
	/** Deadline for a single snapshot fetch. */
	readonly fetchTimeoutMs: number;
	/** Consecutive failed fetches after which an account's baseline is dropped. */
	readonly rebaselineAfterFailures: number;
	/** Snapshot fetches allowed per second across all accounts; 0 disables the limiter. */
	readonly fetchesPerSecond: number;
	readonly logLevel: LogLevel;
	readonly rulesPath?: string | undefined;
	readonly accountsPath?: string | undefined;
	readonly categoriesPath?: string | undefined;
	readonly journalPath?: string | undefined;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
	pollIntervalMs: Duration.seconds(30),
	maxConcurrency: 5,
	fetchTimeoutMs: Duration.seconds(10),
	rebaselineAfterFailures: 3,
	fetchesPerSecond: 0,
	logLevel: "info",
};

/** Mutable builder shape for constructing Partial<EngineConfig>. */
interface MutableEngineConfig {
	pollIntervalMs?: number;
	maxConcurrency?: number;
	fetchTimeoutMs?: number;
	rebaselineAfterFailures?: number;
	fetchesPerSecond?: number;
	logLevel?: LogLevel;
	rulesPath?: string;
	accountsPath?: string;
	categoriesPath?: string;
	journalPath?: string;
}

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Reads engine settings from `CONFLUENCE_*` environment variables:
 * POLL_INTERVAL_MS, MAX_CONCURRENCY, FETCH_TIMEOUT_MS, REBASELINE_AFTER_FAILURES,
 * FETCHES_PER_SECOND, LOG_LEVEL, RULES_PATH, ACCOUNTS_PATH, CATEGORIES_PATH, JOURNAL_PATH.
 * @throws ConfigError if a variable holds an invalid value
 */
export function configFromEnv(env: Env = process.env): Partial<EngineConfig> {
	const result: MutableEngineConfig = {};

	const pollIntervalMs = parseIntEnv(env, "CONFLUENCE_POLL_INTERVAL_MS", 1);
	if (pollIntervalMs !== undefined) result.pollIntervalMs = pollIntervalMs;

	const maxConcurrency = parseIntEnv(env, "CONFLUENCE_MAX_CONCURRENCY", 1);
	if (maxConcurrency !== undefined) result.maxConcurrency = maxConcurrency;

	const fetchTimeoutMs = parseIntEnv(env, "CONFLUENCE_FETCH_TIMEOUT_MS", 1);
	if (fetchTimeoutMs !== undefined) result.fetchTimeoutMs = fetchTimeoutMs;

	const rebaseline = parseIntEnv(env, "CONFLUENCE_REBASELINE_AFTER_FAILURES", 1);
	if (rebaseline !== undefined) result.rebaselineAfterFailures = rebaseline;

	const fetchesPerSecond = parseIntEnv(env, "CONFLUENCE_FETCHES_PER_SECOND", 0);
	if (fetchesPerSecond !== undefined) result.fetchesPerSecond = fetchesPerSecond;

	const logLevel = env["CONFLUENCE_LOG_LEVEL"];
	if (logLevel) {
		const normalised = logLevel.trim().toLowerCase();
		if (!isLogLevel(normalised)) {
			throw new ConfigError(`Invalid CONFLUENCE_LOG_LEVEL: "${logLevel}"`);
		}
		result.logLevel = normalised;
	}

	const rulesPath = env["CONFLUENCE_RULES_PATH"];
	if (rulesPath) result.rulesPath = rulesPath;
	const accountsPath = env["CONFLUENCE_ACCOUNTS_PATH"];
	if (accountsPath) result.accountsPath = accountsPath;
	const categoriesPath = env["CONFLUENCE_CATEGORIES_PATH"];
	if (categoriesPath) result.categoriesPath = categoriesPath;
	const journalPath = env["CONFLUENCE_JOURNAL_PATH"];
	if (journalPath) result.journalPath = journalPath;

	return result;
}

/**
 * Merges overrides onto the defaults and checks cross-field constraints.
 * @throws ConfigError on a non-positive interval, timeout or concurrency
 */
export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
	const config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, ...overrides };
	requirePositiveInt("pollIntervalMs", config.pollIntervalMs);
	requirePositiveInt("maxConcurrency", config.maxConcurrency);
	requirePositiveInt("fetchTimeoutMs", config.fetchTimeoutMs);
	requirePositiveInt("rebaselineAfterFailures", config.rebaselineAfterFailures);
	if (!Number.isFinite(config.fetchesPerSecond) || config.fetchesPerSecond < 0) {
		throw new ConfigError("fetchesPerSecond must be >= 0", {
			fetchesPerSecond: config.fetchesPerSecond,
		});
	}
	return config;
}

function requirePositiveInt(key: string, value: number): void {
	if (!Number.isInteger(value) || value <= 0) {
		throw new ConfigError(`${key} must be a positive integer`, { [key]: value });
	}
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function parseIntEnv(env: Env, key: string, min: number): number | undefined {
	const raw = env[key];
	if (!raw) return undefined;
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed) || parsed < min) {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be an integer >= ${min}`);
	}
	return parsed;
}
