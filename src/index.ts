// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type AccountId,
	type StrategyId,
	type SymbolId,
	type OrderId,
	accountId,
	strategyId,
	symbolId,
	orderId,
	type Result,
	ok,
	err,
	isOk,
	isErr,
	map,
	mapErr,
	unwrap,
	unwrapOr,
	tryCatchAsync,
	Decimal,
	floorToStep,
	roundToTick,
	Direction,
	OrderSide,
	parseDirection,
	type Clock,
	SystemClock,
	FakeClock,
	Duration,
	sleep,
	withTimeout,
	type CoreConfig,
	type CoreConfigOverrides,
	type ProtectiveRetryConfig,
	type EntryReconcileConfig,
	DEFAULT_CORE_CONFIG,
	configFromEnv,
	resolveConfig,
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
} from "./shared/index.js";

// ── Signals & Inbound Payloads ──────────────────────────────────────
export type { TradeSignal } from "./signal/index.js";
export { parseGuardianPayload, parseSignalPayload } from "./inbound/index.js";
export type { GuardianPayload, SignalPayload } from "./inbound/index.js";

// ── Risk ────────────────────────────────────────────────────────────
export {
	RejectionCode,
	allow,
	block,
	isAllowed,
	isBlocked,
	GuardPipeline,
	RiskEngine,
	MemoryRiskProfileStore,
	loadRiskProfiles,
	parseRiskProfile,
	parseRiskProfiles,
	TierFilterGuard,
	ScheduleGuard,
	CircuitBreakerGuard,
	AntiRepetitionGuard,
	OpenPositionGuard,
	LossCooldownGuard,
	SymbolBlacklistGuard,
	DailyLossGuard,
} from "./risk/index.js";
export type {
	AccountState,
	EntryGuard,
	FailurePolicy,
	GuardContext,
	GuardVerdict,
	RiskEngineDeps,
	RiskProfile,
	RiskProfileStore,
	StoredRiskProfile,
} from "./risk/index.js";

// ── Execution ───────────────────────────────────────────────────────
export {
	FailureCode,
	DEFAULT_RETRY_CONFIG,
	withRetry,
	EntryExecutor,
	positionSize,
	ExecutionCoordinator,
	GuardianDispatcher,
	checkFreshness,
} from "./execution/index.js";
export type {
	AccountOutcome,
	AggregatedResult,
	CoordinatorDeps,
	DispatchCounts,
	EntryExecutorDeps,
	GuardianDispatchSummary,
	GuardianDispatcherDeps,
	GuardianRequest,
	MarketContext,
	RetryConfig,
} from "./execution/index.js";

// ── Position Guardian ───────────────────────────────────────────────
export { PositionGuardian, GuardianCode, GuardianStatus, isGuardianSuccess } from "./position/index.js";
export type {
	GuardianAction,
	GuardianDeps,
	GuardianOutcome,
	LevelMetadata,
	OpenPositionInput,
	Position,
	StateSync,
} from "./position/index.js";

// ── Market Data ─────────────────────────────────────────────────────
export { FACT_TTL_MS, MarketDataCache } from "./market/index.js";
export type { CachedFact, FactKind, MarketCacheStats, MarketDataCacheConfig, MarketFacts } from "./market/index.js";

// ── Exchange ────────────────────────────────────────────────────────
export { BoundedExchange, DEFAULT_PAPER_FILTERS, PaperExchange } from "./exchange/index.js";
export type {
	ExchangeClient,
	ExchangePosition,
	ExchangeResult,
	MarketDataSource,
	OrderFill,
	PaperExchangeConfig,
	PlacedOrder,
	SymbolFilters,
} from "./exchange/index.js";

// ── Persistence ─────────────────────────────────────────────────────
export {
	ExitReason,
	FileJournal,
	MemoryJournal,
	MemoryStore,
	MemoryTradeHistory,
	PositionStore,
	TradePauseStore,
} from "./persistence/index.js";
export type {
	FileJournalConfig,
	Journal,
	RestoreResult,
	SharedStore,
	TradeHistoryRecord,
	TradeHistoryRepository,
} from "./persistence/index.js";

// ── Audit & Alerts ──────────────────────────────────────────────────
export { AlertBus, AlertKind, AuditLog } from "./audit/index.js";
export type { AuditOperation, AuditRecord, CoreAlert } from "./audit/index.js";

// ── Lib: Logger ─────────────────────────────────────────────────────
export { createLogger, silentLogger, DEFAULT_REDACT_PATHS } from "./lib/logger/index.js";
export type { Logger, LoggerConfig, LogLevel } from "./lib/logger/index.js";

// ── Lib: Validation ─────────────────────────────────────────────────
export { validate, ValidationError, z } from "./lib/validation/index.js";
export type { ValidationIssue } from "./lib/validation/index.js";

// ── Lib: Events ─────────────────────────────────────────────────────
export { TypedEmitter } from "./lib/events/index.js";
export type { EventMap, TypedEmitterOptions } from "./lib/events/index.js";
