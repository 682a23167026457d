import type { TradeHistoryRecord, TradeHistoryRepository } from "../../persistence/trade-history.js";
import { ExitReason } from "../../persistence/trade-history.js";
import { ok } from "../../shared/result.js";
import { Duration } from "../../shared/time.js";
import type { EntryGuard, GuardCheck, GuardContext } from "../types.js";
import { RejectionCode, allow, block } from "../types.js";

/** A stop-out, or a manual close taken at a loss. */
export function isLosingExit(trade: TradeHistoryRecord): boolean {
	if (trade.exitReason === ExitReason.StopHit) return true;
	return trade.exitReason === ExitReason.ManualClose && (trade.pnlUsdt ?? 0) < 0;
}

/**
 * Keeps a symbol closed to new entries for `lossCooldownHours` after its
 * most recent exit was a loss. Only the latest exit on the symbol counts.
 */
export class LossCooldownGuard implements EntryGuard {
	readonly name = "loss_cooldown";
	readonly failurePolicy = "closed";
	private readonly history: TradeHistoryRepository;

	private constructor(history: TradeHistoryRepository) {
		this.history = history;
	}

	static create(history: TradeHistoryRepository): LossCooldownGuard {
		return new LossCooldownGuard(history);
	}

	async check(ctx: GuardContext): GuardCheck {
		const { signal, profile } = ctx;
		const cooldownMs = Duration.hours(profile.lossCooldownHours);
		if (cooldownMs <= 0) return ok(allow());

		const closed = await this.history.closedSince(profile.accountId, profile.strategyId, ctx.nowMs - cooldownMs);
		if (!closed.ok) return closed;
		const last = closed.value.filter((t) => t.symbol === signal.symbol).at(-1);
		if (!last || last.exitTime === null || !isLosingExit(last)) return ok(allow());

		return ok(
			block(
				this.name,
				RejectionCode.LossCooldown,
				`${signal.symbol} cooling down after a ${last.exitReason} exit`,
				{ exitReason: last.exitReason, exitTime: last.exitTime, until: last.exitTime + cooldownMs },
			),
		);
	}
}
