export type {
	AccountOutcome,
	AggregatedResult,
	AlertOutcome,
	DispatchCounts,
	ExecutedOutcome,
	FailedOutcome,
	RejectedOutcome,
} from "./types.js";
export { FailureCode, countOutcomes } from "./types.js";
export { DEFAULT_RETRY_CONFIG, computeDelay, withRetry } from "./retry.js";
export type { RetryConfig, RetryOptions } from "./retry.js";
export { EntryExecutor, positionSize, type EntryExecutorDeps } from "./entry-executor.js";
export { ExecutionCoordinator, type CoordinatorDeps } from "./coordinator.js";
export {
	DEFAULT_MAX_DRIFT_PCT,
	MAX_DECISION_AGE_MS,
	checkFreshness,
	checkInProfit,
	priceDriftPct,
	type FreshnessVerdict,
	type MarketContext,
} from "./freshness.js";
export {
	GuardianDispatcher,
	type GuardianDispatcherDeps,
	type GuardianDispatchSummary,
	type GuardianRequest,
	type GuardianRequestAction,
} from "./guardian-dispatcher.js";
