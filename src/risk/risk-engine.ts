import type { AuditLog } from "../audit/audit-log.js";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { PositionStore } from "../persistence/position-store.js";
import type { SharedStore } from "../persistence/shared-store.js";
import type { TradeHistoryRepository } from "../persistence/trade-history.js";
import { TradePauseStore } from "../persistence/trade-pause-store.js";
import type { TradeSignal } from "../signal/trade-signal.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import { GuardPipeline } from "./guard-pipeline.js";
import { AntiRepetitionGuard } from "./guards/anti-repetition.js";
import { CircuitBreakerGuard } from "./guards/circuit-breaker.js";
import { DailyLossGuard } from "./guards/daily-loss.js";
import { LossCooldownGuard } from "./guards/loss-cooldown.js";
import { OpenPositionGuard } from "./guards/open-position.js";
import { ScheduleGuard } from "./guards/schedule.js";
import { SymbolBlacklistGuard } from "./guards/symbol-blacklist.js";
import { TierFilterGuard } from "./guards/tier-filter.js";
import type { RiskProfile } from "./profile.js";
import type { AccountState, GuardVerdict } from "./types.js";

export interface RiskEngineDeps {
	readonly history: TradeHistoryRepository;
	readonly store: SharedStore;
	readonly audit: AuditLog;
	readonly clock?: Clock;
	readonly logger?: Logger;
	/** Defaults to a pause store over `store`. */
	readonly pauses?: TradePauseStore;
	/** Defaults to a position store over `store`. */
	readonly positions?: PositionStore;
}

/**
 * Runs one signal through one account's protection pipeline:
 * tier filter, schedule, circuit breaker, anti-repetition, open position,
 * loss cooldown, symbol blacklist, then daily loss. Every evaluation leaves an audit record.
 */
export class RiskEngine {
	private readonly pipeline: GuardPipeline;
	private readonly audit: AuditLog;
	private readonly clock: Clock;
	private readonly logger: Logger;

	constructor(deps: RiskEngineDeps) {
		this.clock = deps.clock ?? SystemClock;
		this.audit = deps.audit;
		this.logger = (deps.logger ?? silentLogger()).child({ component: "risk-engine" });
		const pauses = deps.pauses ?? new TradePauseStore(deps.store, this.clock);
		const positions = deps.positions ?? new PositionStore(deps.store);

		this.pipeline = GuardPipeline.create(deps.logger)
			.with(TierFilterGuard.create())
			.with(ScheduleGuard.create())
			.with(CircuitBreakerGuard.create(deps.history))
			.with(AntiRepetitionGuard.create(deps.history))
			.with(OpenPositionGuard.create(positions, deps.history))
			.with(LossCooldownGuard.create(deps.history))
			.with(SymbolBlacklistGuard.create())
			.with(DailyLossGuard.create({ pauses, history: deps.history, store: deps.store, logger: deps.logger }));
	}

	/** Gate names in evaluation order. */
	get guardNames(): readonly string[] {
		return this.pipeline.guardNames();
	}

	async evaluate(signal: TradeSignal, profile: RiskProfile, account: AccountState): Promise<GuardVerdict> {
		const verdict = await this.pipeline.evaluate({
			signal,
			profile,
			account,
			nowMs: this.clock.now(),
		});

		if (verdict.type === "block") {
			this.logger.info(
				{ accountId: account.accountId, symbol: signal.symbol, code: verdict.code, guard: verdict.guard },
				verdict.reason,
			);
		}

		await this.audit.record({
			accountId: account.accountId,
			symbol: signal.symbol,
			operation: "risk_evaluation",
			params: {
				strategyId: signal.strategyId,
				direction: signal.direction,
				tier: signal.tier,
				profileVersion: profile.version,
			},
			result:
				verdict.type === "allow"
					? { verdict: "allow" }
					: { verdict: "block", guard: verdict.guard, code: verdict.code, details: verdict.details },
			success: verdict.type === "allow",
			error: verdict.type === "block" ? verdict.reason : null,
		});
		return verdict;
	}
}
