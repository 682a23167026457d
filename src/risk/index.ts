/**
 * Pre-trade protection: per-account risk profiles and the gate pipeline
 * every signal passes before an entry order is sent.
 *
 * Gates, in evaluation order:
 * - {@link TierFilterGuard}: signal tier against the profile's ceiling
 * - {@link ScheduleGuard}: UTC trading windows per weekday
 * - {@link CircuitBreakerGuard}: consecutive losing exits
 * - {@link AntiRepetitionGuard}: same symbol and direction opened recently
 * - {@link OpenPositionGuard}: one position per symbol, optional account limit
 * - {@link LossCooldownGuard}: pause on a symbol after a losing exit
 * - {@link SymbolBlacklistGuard}: blocked symbols
 * - {@link DailyLossGuard}: realised loss against the day's opening balance
 *
 * @module
 */
export type {
	AccountState,
	BlockVerdict,
	EntryGuard,
	FailurePolicy,
	GuardCheck,
	GuardContext,
	GuardVerdict,
} from "./types.js";
export { RejectionCode, allow, block, isAllowed, isBlocked } from "./types.js";

export type {
	CircuitBreakerConfig,
	DailyLossConfig,
	RiskProfile,
	RiskProfileStore,
	ScheduleMap,
	StoredRiskProfile,
} from "./profile.js";
export { MemoryRiskProfileStore, loadRiskProfiles, parseRiskProfile, parseRiskProfiles } from "./profile.js";

export { GuardPipeline } from "./guard-pipeline.js";
export { RiskEngine, type RiskEngineDeps } from "./risk-engine.js";

export { AntiRepetitionGuard } from "./guards/anti-repetition.js";
export { CircuitBreakerGuard, evaluateBreaker, type BreakerState } from "./guards/circuit-breaker.js";
export { DailyLossGuard, initialBalanceKey, type DailyLossDeps } from "./guards/daily-loss.js";
export { LossCooldownGuard, isLosingExit } from "./guards/loss-cooldown.js";
export { OpenPositionGuard } from "./guards/open-position.js";
export { ScheduleGuard, parseTimeOfDay, withinSchedule } from "./guards/schedule.js";
export { SymbolBlacklistGuard } from "./guards/symbol-blacklist.js";
export { TierFilterGuard } from "./guards/tier-filter.js";
