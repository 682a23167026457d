/**
 * Retry helper — exponential backoff with jitter for Result-returning calls.
 *
 * Only errors marked `isRetryable` are retried. Non-retryable errors
 * short-circuit immediately; a RateLimitError stretches the delay to its
 * retry-after hint.
 */

import { RateLimitError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import { sleep as defaultSleep } from "../shared/time.js";

/** Configuration for exponential backoff retry behaviour. */
export interface RetryConfig {
	readonly maxAttempts: number;
	readonly baseDelayMs: number;
	readonly maxDelayMs: number;
	readonly jitterFactor: number;
}

/** 3 attempts, 100ms base delay, 5s max, 10% jitter. */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
	maxAttempts: 3,
	baseDelayMs: 100,
	maxDelayMs: 5000,
	jitterFactor: 0.1,
};

export interface RetryOptions {
	/** Called before each retry with the 1-based attempt about to run. */
	readonly onRetry?: (attempt: number, error: TradingError) => void;
	/** Retry non-retryable errors too (protective orders). */
	readonly retryAll?: boolean;
	readonly sleep?: (ms: number) => Promise<void>;
}

function resolveConfig(overrides?: Partial<RetryConfig>): RetryConfig {
	return {
		maxAttempts: overrides?.maxAttempts ?? DEFAULT_RETRY_CONFIG.maxAttempts,
		baseDelayMs: overrides?.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
		maxDelayMs: overrides?.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
		jitterFactor: overrides?.jitterFactor ?? DEFAULT_RETRY_CONFIG.jitterFactor,
	};
}

/** @internal Exported for testing only. */
export function computeDelay(attempt: number, config: RetryConfig, error: TradingError): number {
	const exponential = config.baseDelayMs * 2 ** attempt;
	let delay = Math.min(exponential, config.maxDelayMs);

	if (error instanceof RateLimitError) {
		delay = Math.max(delay, error.retryAfterMs);
	}

	const jitter = 1 + (Math.random() - 0.5) * 2 * config.jitterFactor;
	return delay * jitter;
}

/**
 * Run `op` up to `maxAttempts` times, backing off between retryable failures.
 * Returns the first success or the last failure.
 *
 * @example
 * ```ts
 * const placed = await withRetry(() => exchange.placeStopMarket(req), { maxAttempts: 3 });
 * ```
 */
export async function withRetry<T>(
	op: () => Promise<Result<T, TradingError>>,
	config?: Partial<RetryConfig>,
	options: RetryOptions = {},
): Promise<Result<T, TradingError>> {
	const resolved = resolveConfig(config);
	const pause = options.sleep ?? defaultSleep;

	let lastResult = await op();
	for (let attempt = 1; attempt < resolved.maxAttempts; attempt++) {
		if (lastResult.ok) return lastResult;
		if (!lastResult.error.isRetryable && options.retryAll !== true) return lastResult;

		options.onRetry?.(attempt + 1, lastResult.error);
		await pause(computeDelay(attempt - 1, resolved, lastResult.error));
		lastResult = await op();
	}
	return lastResult;
}
