import type { Logger } from "../../lib/logger/index.js";
import { silentLogger } from "../../lib/logger/index.js";
import type { SharedStore } from "../../persistence/shared-store.js";
import type { TradeHistoryRepository } from "../../persistence/trade-history.js";
import type { TradePauseStore } from "../../persistence/trade-pause-store.js";
import { Decimal } from "../../shared/decimal.js";
import type { TradingError } from "../../shared/errors.js";
import { accountStrategyKey } from "../../shared/identifiers.js";
import type { AccountId, StrategyId } from "../../shared/identifiers.js";
import { ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";
import { Duration, nextUtcMidnight, startOfUtcDay, utcDateKey } from "../../shared/time.js";
import type { EntryGuard, GuardCheck, GuardContext } from "../types.js";
import { RejectionCode, allow, block } from "../types.js";

export interface DailyLossDeps {
	readonly pauses: TradePauseStore;
	readonly history: TradeHistoryRepository;
	/** Holds the per-day initial balance snapshot. */
	readonly store: SharedStore;
	readonly logger?: Logger;
}

/** Shared-store key of the initial balance snapshot for one UTC day. */
export function initialBalanceKey(account: AccountId, strategy: StrategyId, nowMs: number): string {
	return `initial_balance:${accountStrategyKey(account, strategy)}:${utcDateKey(nowMs)}`;
}

/**
 * Pauses new entries once today's realised loss reaches `maxLossPct` of the
 * balance the account started the UTC day with.
 *
 * The day's starting balance is derived as `currentBalance - dailyPnl` and
 * cached until the next UTC midnight. Deposits and withdrawals made during the
 * day are not seen by the snapshot; the percentage is approximate in that case.
 */
export class DailyLossGuard implements EntryGuard {
	readonly name = "daily_loss";
	readonly failurePolicy = "closed";
	private readonly deps: DailyLossDeps;
	private readonly logger: Logger;

	private constructor(deps: DailyLossDeps) {
		this.deps = deps;
		this.logger = (deps.logger ?? silentLogger()).child({ component: "daily_loss" });
	}

	static create(deps: DailyLossDeps): DailyLossGuard {
		return new DailyLossGuard(deps);
	}

	async check(ctx: GuardContext): GuardCheck {
		const { profile, nowMs } = ctx;
		if (!profile.dailyLoss.enabled) return ok(allow());

		const paused = await this.deps.pauses.active(profile.accountId, profile.strategyId);
		if (!paused.ok) return paused;
		if (paused.value) {
			return ok(
				block(this.name, RejectionCode.DailyLossPauseActive, "daily loss pause active", {
					resumeAt: paused.value.resumeAt,
				}),
			);
		}

		const closed = await this.deps.history.closedSince(
			profile.accountId,
			profile.strategyId,
			startOfUtcDay(nowMs),
		);
		if (!closed.ok) return closed;
		const dailyPnl = Decimal.sum(closed.value.map((r) => r.pnlUsdt ?? 0));

		const initial = await this.initialBalance(ctx, dailyPnl);
		if (!initial.ok) return initial;
		if (!initial.value.isPositive()) {
			this.logger.warn(
				{ accountId: profile.accountId, initialBalance: initial.value.toString() },
				"non-positive initial balance, daily loss not evaluated",
			);
			return ok(allow());
		}

		const lossPct = dailyPnl.div(initial.value).mul(Decimal.from(100));
		if (lossPct.gt(Decimal.from(-profile.dailyLoss.maxLossPct))) return ok(allow());

		const resumeAt = nowMs + Duration.hours(profile.dailyLoss.pauseDurationHours);
		const reason = `daily loss ${lossPct.toFixed(2)}% reached limit -${profile.dailyLoss.maxLossPct}%`;
		const written = await this.deps.pauses.pause(profile.accountId, profile.strategyId, resumeAt, reason);
		if (!written.ok) {
			this.logger.warn(
				{ accountId: profile.accountId, error: written.error.message },
				"could not persist trade pause",
			);
		}
		return ok(
			block(this.name, RejectionCode.DailyLossPauseActive, reason, {
				dailyPnlUsdt: dailyPnl.toNumber(),
				initialBalance: initial.value.toNumber(),
				dailyLossPct: lossPct.toNumber(),
				resumeAt,
			}),
		);
	}

	/** Cached snapshot for today, or derived from the live balance and cached until midnight. */
	private async initialBalance(
		ctx: GuardContext,
		dailyPnl: Decimal,
	): Promise<Result<Decimal, TradingError>> {
		const { profile, nowMs } = ctx;
		const key = initialBalanceKey(profile.accountId, profile.strategyId, nowMs);

		const cached = await this.deps.store.get(key);
		if (!cached.ok) {
			this.logger.warn({ key, error: cached.error.message }, "initial balance cache unreadable");
		} else if (cached.value !== undefined) {
			const parsed = parseCached(cached.value);
			if (parsed) return ok(parsed);
		}

		const balance = await ctx.account.currentBalance();
		if (!balance.ok) return balance;
		const initial = Decimal.from(balance.value).sub(dailyPnl);

		const stored = await this.deps.store.set(key, initial.toString(), nextUtcMidnight(nowMs) - nowMs);
		if (!stored.ok) {
			this.logger.warn({ key, error: stored.error.message }, "initial balance not cached");
		}
		return ok(initial);
	}
}

function parseCached(raw: string): Decimal | undefined {
	try {
		return Decimal.from(raw);
	} catch {
		return undefined;
	}
}
