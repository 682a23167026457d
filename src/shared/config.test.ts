import { describe, expect, it } from "vitest";
import { DEFAULT_CORE_CONFIG, configFromEnv, resolveConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("CoreConfig", () => {
	describe("DEFAULT_CORE_CONFIG", () => {
		it("keeps emergency close off by default", () => {
			expect(DEFAULT_CORE_CONFIG.emergencyCloseUnprotected).toBe(false);
		});

		it("bounds a dispatch more loosely than a single exchange call", () => {
			expect(DEFAULT_CORE_CONFIG.coordinatorTimeoutMs).toBeGreaterThan(DEFAULT_CORE_CONFIG.exchangeTimeoutMs);
		});

		it("all fields are defined", () => {
			for (const [key, value] of Object.entries(DEFAULT_CORE_CONFIG)) {
				expect(value, `${key} should not be undefined`).toBeDefined();
			}
		});
	});

	describe("resolveConfig", () => {
		it("returns the defaults without overrides", () => {
			expect(resolveConfig()).toEqual(DEFAULT_CORE_CONFIG);
		});

		it("merges a partial protective retry budget", () => {
			const config = resolveConfig({ protectiveRetry: { maxAttempts: 5 } });
			expect(config.protectiveRetry).toEqual({ ...DEFAULT_CORE_CONFIG.protectiveRetry, maxAttempts: 5 });
		});
	});

	describe("entryReconcile", () => {
		it("merges a partial reconcile budget", () => {
			expect(resolveConfig({ entryReconcile: { maxAttempts: 6 } }).entryReconcile).toEqual({
				maxAttempts: 6,
				delayMs: 1_000,
			});
		});
	});

	describe("configFromEnv", () => {
		it("returns an empty object when no SENTINEL_ variables are set", () => {
			expect(configFromEnv({ HOME: "/root" })).toEqual({});
		});

		it("reads every supported variable", () => {
			expect(
				configFromEnv({
					SENTINEL_LOG_LEVEL: "debug",
					SENTINEL_COORDINATOR_TIMEOUT_MS: "8000",
					SENTINEL_EXCHANGE_TIMEOUT_MS: "3000",
					SENTINEL_PROTECTIVE_MAX_ATTEMPTS: "4",
					SENTINEL_ENTRY_RECONCILE_ATTEMPTS: "5",
					SENTINEL_STATE_RETRY_DELAY_MS: "0",
					SENTINEL_EMERGENCY_CLOSE_UNPROTECTED: "true",
				}),
			).toEqual({
				logLevel: "debug",
				coordinatorTimeoutMs: 8_000,
				exchangeTimeoutMs: 3_000,
				protectiveRetry: { maxAttempts: 4 },
				entryReconcile: { maxAttempts: 5 },
				stateRetryDelayMs: 0,
				emergencyCloseUnprotected: true,
			});
		});

		it("ignores empty values", () => {
			expect(configFromEnv({ SENTINEL_LOG_LEVEL: "", SENTINEL_EMERGENCY_CLOSE_UNPROTECTED: "" })).toEqual({});
		});

		it("throws ConfigError for an unknown log level", () => {
			expect(() => configFromEnv({ SENTINEL_LOG_LEVEL: "loud" })).toThrow(ConfigError);
			expect(() => configFromEnv({ SENTINEL_LOG_LEVEL: "loud" })).toThrow('Invalid SENTINEL_LOG_LEVEL: "loud"');
		});

		it("throws for a non-integer timeout", () => {
			expect(() => configFromEnv({ SENTINEL_COORDINATOR_TIMEOUT_MS: "10s" })).toThrow(
				'Invalid SENTINEL_COORDINATOR_TIMEOUT_MS: "10s" must be a positive integer',
			);
		});

		it("throws for a zero attempt budget", () => {
			expect(() => configFromEnv({ SENTINEL_PROTECTIVE_MAX_ATTEMPTS: "0" })).toThrow(ConfigError);
		});

		it("throws for a negative state retry delay", () => {
			expect(() => configFromEnv({ SENTINEL_STATE_RETRY_DELAY_MS: "-1" })).toThrow(
				'Invalid SENTINEL_STATE_RETRY_DELAY_MS: "-1" must be a non-negative integer',
			);
		});

		it("throws for a flag that is not true or false", () => {
			expect(() => configFromEnv({ SENTINEL_EMERGENCY_CLOSE_UNPROTECTED: "yes" })).toThrow(ConfigError);
		});

		it("feeds resolveConfig", () => {
			const config = resolveConfig(configFromEnv({ SENTINEL_EXCHANGE_TIMEOUT_MS: "2500" }));
			expect(config.exchangeTimeoutMs).toBe(2_500);
			expect(config.coordinatorTimeoutMs).toBe(DEFAULT_CORE_CONFIG.coordinatorTimeoutMs);
		});
	});
});
