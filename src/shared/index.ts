export {
	type AccountId,
	type StrategyId,
	type SymbolId,
	type OrderId,
	accountId,
	strategyId,
	symbolId,
	orderId,
	positionKey,
	accountStrategyKey,
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	map,
	mapErr,
	unwrap,
	unwrapOr,
	isOk,
	isErr,
	tryCatchAsync,
} from "./result.js";

export {
	ErrorCategory,
	TradingError,
	NetworkError,
	TimeoutError,
	RateLimitError,
	StoreUnavailableError,
	AuthError,
	OrderRejectedError,
	InsufficientBalanceError,
	MarketDataError,
	StateConflictError,
	ConfigError,
	SystemError,
	classifyError,
	errorMessage,
} from "./errors.js";

export { Decimal, floorToStep, roundToTick } from "./decimal.js";
export { Direction, OrderSide, directionSign, entrySide, exitSide, parseDirection } from "./direction.js";
export {
	type Clock,
	type Weekday,
	SystemClock,
	FakeClock,
	Duration,
	WEEKDAYS,
	sleep,
	withTimeout,
	startOfUtcDay,
	nextUtcMidnight,
	utcDateKey,
	utcWeekday,
	utcSecondOfDay,
} from "./time.js";
export {
	type CoreConfig,
	type CoreConfigOverrides,
	type ProtectiveRetryConfig,
	type EntryReconcileConfig,
	DEFAULT_CORE_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./config.js";
