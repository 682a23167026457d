/**
 * Core configuration — timeouts, retry budgets and safety switches.
 *
 * Risk profiles are configured separately (see risk/profile.ts); this covers
 * the process-wide knobs that every account shares.
 */

import type { LogLevel } from "../lib/logger/index.js";
import { ConfigError } from "./errors.js";

export interface ProtectiveRetryConfig {
	readonly maxAttempts: number;
	readonly baseDelayMs: number;
	readonly maxDelayMs: number;
	readonly jitterFactor: number;
}

export interface EntryReconcileConfig {
	/** Position reads made after an entry whose response was lost. */
	readonly maxAttempts: number;
	readonly delayMs: number;
}

export interface CoreConfig {
	readonly logLevel: LogLevel;
	/** Upper bound for one `dispatch()` across all accounts. */
	readonly coordinatorTimeoutMs: number;
	/** Upper bound for a single live exchange call made through the cache. */
	readonly exchangeTimeoutMs: number;
	/** Retry budget for stop/target placement after an entry fill. */
	readonly protectiveRetry: ProtectiveRetryConfig;
	/** How long to look for the fill of an entry that timed out or lost its connection. */
	readonly entryReconcile: EntryReconcileConfig;
	/** Delay before the single retry of a failed position-state write. */
	readonly stateRetryDelayMs: number;
	/** Flatten an entry whose protective orders could not be placed. */
	readonly emergencyCloseUnprotected: boolean;
}

export const DEFAULT_CORE_CONFIG: CoreConfig = {
	logLevel: "info",
	coordinatorTimeoutMs: 10_000,
	exchangeTimeoutMs: 5_000,
	protectiveRetry: {
		maxAttempts: 3,
		baseDelayMs: 200,
		maxDelayMs: 2_000,
		jitterFactor: 0.1,
	},
	entryReconcile: {
		maxAttempts: 3,
		delayMs: 1_000,
	},
	stateRetryDelayMs: 500,
	emergencyCloseUnprotected: false,
};

/** Environment overrides; `protectiveRetry` is partial so single fields can be set. */
export interface CoreConfigOverrides {
	logLevel?: LogLevel;
	coordinatorTimeoutMs?: number;
	exchangeTimeoutMs?: number;
	protectiveRetry?: Partial<ProtectiveRetryConfig>;
	entryReconcile?: Partial<EntryReconcileConfig>;
	stateRetryDelayMs?: number;
	emergencyCloseUnprotected?: boolean;
}

/** Merge overrides onto the defaults. */
export function resolveConfig(overrides: CoreConfigOverrides = {}): CoreConfig {
	return {
		logLevel: overrides.logLevel ?? DEFAULT_CORE_CONFIG.logLevel,
		coordinatorTimeoutMs: overrides.coordinatorTimeoutMs ?? DEFAULT_CORE_CONFIG.coordinatorTimeoutMs,
		exchangeTimeoutMs: overrides.exchangeTimeoutMs ?? DEFAULT_CORE_CONFIG.exchangeTimeoutMs,
		protectiveRetry: { ...DEFAULT_CORE_CONFIG.protectiveRetry, ...overrides.protectiveRetry },
		entryReconcile: { ...DEFAULT_CORE_CONFIG.entryReconcile, ...overrides.entryReconcile },
		stateRetryDelayMs: overrides.stateRetryDelayMs ?? DEFAULT_CORE_CONFIG.stateRetryDelayMs,
		emergencyCloseUnprotected:
			overrides.emergencyCloseUnprotected ?? DEFAULT_CORE_CONFIG.emergencyCloseUnprotected,
	};
}

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((l) => l === value);
}

/**
 * Reads config overrides from environment variables.
 * Supported: SENTINEL_LOG_LEVEL, SENTINEL_COORDINATOR_TIMEOUT_MS,
 * SENTINEL_EXCHANGE_TIMEOUT_MS, SENTINEL_PROTECTIVE_MAX_ATTEMPTS,
 * SENTINEL_ENTRY_RECONCILE_ATTEMPTS, SENTINEL_STATE_RETRY_DELAY_MS, SENTINEL_EMERGENCY_CLOSE_UNPROTECTED.
 * @throws ConfigError if a variable holds an invalid value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): CoreConfigOverrides {
	const result: CoreConfigOverrides = {};

	const level = env["SENTINEL_LOG_LEVEL"];
	if (level) {
		if (!isLogLevel(level)) {
			throw new ConfigError(`Invalid SENTINEL_LOG_LEVEL: "${level}"`);
		}
		result.logLevel = level;
	}

	const coordinatorTimeout = readPositiveInt(env, "SENTINEL_COORDINATOR_TIMEOUT_MS");
	if (coordinatorTimeout !== undefined) result.coordinatorTimeoutMs = coordinatorTimeout;

	const exchangeTimeout = readPositiveInt(env, "SENTINEL_EXCHANGE_TIMEOUT_MS");
	if (exchangeTimeout !== undefined) result.exchangeTimeoutMs = exchangeTimeout;

	const attempts = readPositiveInt(env, "SENTINEL_PROTECTIVE_MAX_ATTEMPTS");
	if (attempts !== undefined) result.protectiveRetry = { maxAttempts: attempts };

	const reconcileAttempts = readPositiveInt(env, "SENTINEL_ENTRY_RECONCILE_ATTEMPTS");
	if (reconcileAttempts !== undefined) result.entryReconcile = { maxAttempts: reconcileAttempts };

	const stateDelay = readNonNegativeInt(env, "SENTINEL_STATE_RETRY_DELAY_MS");
	if (stateDelay !== undefined) result.stateRetryDelayMs = stateDelay;

	const emergency = env["SENTINEL_EMERGENCY_CLOSE_UNPROTECTED"];
	if (emergency !== undefined && emergency !== "") {
		if (emergency !== "true" && emergency !== "false") {
			throw new ConfigError(
				`Invalid SENTINEL_EMERGENCY_CLOSE_UNPROTECTED: "${emergency}" must be true or false`,
			);
		}
		result.emergencyCloseUnprotected = emergency === "true";
	}

	return result;
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function readPositiveInt(env: NodeJS.ProcessEnv, key: string): number | undefined {
	const raw = env[key];
	if (!raw) return undefined;
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed) || parsed <= 0) {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be a positive integer`);
	}
	return parsed;
}

function readNonNegativeInt(env: NodeJS.ProcessEnv, key: string): number | undefined {
	const raw = env[key];
	if (!raw) return undefined;
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed) || parsed < 0) {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be a non-negative integer`);
	}
	return parsed;
}
