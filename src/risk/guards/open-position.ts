import type { PositionStore } from "../../persistence/position-store.js";
import type { TradeHistoryRepository } from "../../persistence/trade-history.js";
import { ok } from "../../shared/result.js";
import type { EntryGuard, GuardCheck, GuardContext } from "../types.js";
import { RejectionCode, allow, block } from "../types.js";

/**
 * One position per (account, symbol): rejects a signal while the guardian
 * record or an open history row exists for the symbol, and, when the profile
 * sets a limit, while the account already holds that many positions.
 */
export class OpenPositionGuard implements EntryGuard {
	readonly name = "open_position";
	readonly failurePolicy = "closed";
	private readonly positions: PositionStore;
	private readonly history: TradeHistoryRepository;

	private constructor(positions: PositionStore, history: TradeHistoryRepository) {
		this.positions = positions;
		this.history = history;
	}

	static create(positions: PositionStore, history: TradeHistoryRepository): OpenPositionGuard {
		return new OpenPositionGuard(positions, history);
	}

	async check(ctx: GuardContext): GuardCheck {
		const { signal, profile } = ctx;
		const guarded = await this.positions.get(profile.accountId, signal.symbol);
		if (!guarded.ok) return guarded;
		const open = await this.history.findOpen(profile.accountId, signal.symbol);
		if (!open.ok) return open;

		const existing = guarded.value ?? open.value;
		if (existing) {
			return ok(
				block(this.name, RejectionCode.PositionAlreadyOpen, `${signal.symbol} already has an open position`, {
					direction: existing.direction,
					entryPrice: existing.entryPrice,
					guarded: guarded.value !== undefined,
				}),
			);
		}

		const limit = profile.maxOpenPositions;
		if (limit === null) return ok(allow());
		const held = await this.positions.listByAccount(profile.accountId);
		if (!held.ok) return held;
		if (held.value.length < limit) return ok(allow());

		return ok(
			block(this.name, RejectionCode.MaxOpenPositions, `${held.value.length} positions open, limit ${limit}`, {
				open: held.value.length,
				maxOpenPositions: limit,
			}),
		);
	}
}
