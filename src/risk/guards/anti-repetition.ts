import type { TradeHistoryRepository } from "../../persistence/trade-history.js";
import { ok } from "../../shared/result.js";
import { Duration } from "../../shared/time.js";
import type { EntryGuard, GuardCheck, GuardContext } from "../types.js";
import { RejectionCode, allow, block } from "../types.js";

/**
 * Rejects a signal when the same account already opened the same symbol in
 * the same direction within the profile's window. A window of 0 disables it.
 */
export class AntiRepetitionGuard implements EntryGuard {
	readonly name = "anti_repetition";
	readonly failurePolicy = "closed";
	private readonly history: TradeHistoryRepository;

	private constructor(history: TradeHistoryRepository) {
		this.history = history;
	}

	static create(history: TradeHistoryRepository): AntiRepetitionGuard {
		return new AntiRepetitionGuard(history);
	}

	async check(ctx: GuardContext): GuardCheck {
		const windowMs = Duration.minutes(ctx.profile.antiRepetitionWindowMinutes);
		if (windowMs <= 0) return ok(allow());

		const { signal, profile } = ctx;
		const last = await this.history.lastOpened(
			profile.accountId,
			profile.strategyId,
			signal.symbol,
			signal.direction,
		);
		if (!last.ok) return last;
		if (!last.value || last.value.entryTime < ctx.nowMs - windowMs) return ok(allow());

		return ok(
			block(
				this.name,
				RejectionCode.RecentDuplicate,
				`${signal.symbol} ${signal.direction} already opened within ${profile.antiRepetitionWindowMinutes}m`,
				{ lastEntryTime: last.value.entryTime, windowMinutes: profile.antiRepetitionWindowMinutes },
			),
		);
	}
}
