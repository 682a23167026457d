/**
 * TradingError hierarchy — structured error classification.
 *
 * The category drives retry behaviour: retryable errors get bounded backoff,
 * non-retryable errors surface immediately, fatal errors stop the operation.
 */

/** Error severity categories that drive retry behaviour. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

type ErrorContext = Record<string, unknown> & { readonly cause?: unknown };

/** Base error for every exchange, store and validation failure. */
export class TradingError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
	) {
		super(message);
		this.name = "TradingError";
		this.category = category;
		this.code = code;
		this.context = context;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

function splitCause(context: ErrorContext): {
	cause: unknown;
	rest: Record<string, unknown>;
} {
	const { cause, ...rest } = context;
	return { cause, rest };
}

// ── Specific error types ─────────────────────────────────────────────

/** Retryable: connectivity failure towards the exchange or a store. */
export class NetworkError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "NETWORK_ERROR", ErrorCategory.Retryable, rest);
		this.name = "NetworkError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Retryable: a bounded remote call ran out of time. */
export class TimeoutError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "TIMEOUT_ERROR", ErrorCategory.Retryable, rest);
		this.name = "TimeoutError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Retryable: HTTP 429 or exchange weight exhaustion; carries a retry-after hint. */
export class RateLimitError extends TradingError {
	readonly retryAfterMs: number;

	constructor(message: string, retryAfterMs: number, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "RATE_LIMIT_ERROR", ErrorCategory.Retryable, rest);
		this.name = "RateLimitError";
		this.retryAfterMs = retryAfterMs;
		if (cause !== undefined) this.cause = cause;
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), retryAfterMs: this.retryAfterMs };
	}
}

/** Retryable: the shared store or relational store could not be reached. */
export class StoreUnavailableError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "STORE_UNAVAILABLE", ErrorCategory.Retryable, rest);
		this.name = "StoreUnavailableError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Non-retryable: API key rejected or missing permissions. */
export class AuthError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "AUTH_ERROR", ErrorCategory.NonRetryable, rest);
		this.name = "AuthError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Non-retryable: the exchange refused the order (filters, margin, reduce-only...). */
export class OrderRejectedError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "ORDER_REJECTED", ErrorCategory.NonRetryable, rest);
		this.name = "OrderRejectedError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Non-retryable: available balance too low for the computed order. */
export class InsufficientBalanceError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "INSUFFICIENT_BALANCE", ErrorCategory.NonRetryable, rest);
		this.name = "InsufficientBalanceError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Non-retryable: a live market fact could not be obtained. */
export class MarketDataError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "MARKET_DATA_UNAVAILABLE", ErrorCategory.NonRetryable, rest);
		this.name = "MarketDataError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Non-retryable: a stored record is missing or no longer in the expected state. */
export class StateConflictError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "STATE_CONFLICT", ErrorCategory.NonRetryable, rest);
		this.name = "StateConflictError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal: invalid or missing configuration. */
export class ConfigError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal: unexpected internal failure. */
export class SystemError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = splitCause(context);
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, rest);
		this.name = "SystemError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification helper ────────────────────────────────────────────

function readStatus(value: unknown): number | undefined {
	if (typeof value !== "object" || value === null || !("context" in value)) return undefined;
	const ctx = value.context;
	if (typeof ctx !== "object" || ctx === null || !("status" in ctx)) return undefined;
	return typeof ctx.status === "number" && ctx.status >= 400 ? ctx.status : undefined;
}

function readCode(error: Error): string | undefined {
	return "code" in error && typeof error.code === "string" ? error.code : undefined;
}

/** Classify an unknown thrown value into the TradingError hierarchy. */
export function classifyError(error: unknown): TradingError {
	if (error instanceof TradingError) return error;
	if (!(error instanceof Error)) {
		return new SystemError(String(error), { cause: error });
	}

	const status = readStatus(error) ?? readStatus(error.cause);
	const code = readCode(error);
	const msg = error.message.toLowerCase();

	if (status === 429 || code === "429") {
		return new RateLimitError(error.message, 1000, { cause: error });
	}
	if (status === 401 || status === 403) {
		return new AuthError(error.message, { cause: error });
	}
	if (status !== undefined && status >= 500) {
		return new NetworkError(error.message, { cause: error, status });
	}
	if (code === "ETIMEDOUT" || msg.includes("timeout") || msg.includes("timed out")) {
		return new TimeoutError(error.message, { cause: error });
	}
	if (
		code === "ECONNREFUSED" ||
		code === "ENOTFOUND" ||
		code === "ECONNRESET" ||
		msg.includes("fetch failed")
	) {
		return new NetworkError(error.message, { cause: error });
	}
	if (msg.includes("rate limit")) {
		return new RateLimitError(error.message, 1000, { cause: error });
	}
	return new SystemError(error.message, { cause: error });
}

/** Human-readable message for any thrown value. */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
