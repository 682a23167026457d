import type { TradeHistoryRecord, TradeHistoryRepository } from "../../persistence/trade-history.js";
import { ok } from "../../shared/result.js";
import { Duration } from "../../shared/time.js";
import type { EntryGuard, GuardCheck, GuardContext } from "../types.js";
import { RejectionCode, allow, block } from "../types.js";

export interface BreakerState {
	readonly active: boolean;
	/** Losses closed inside the window ending now. */
	readonly lossesInWindow: number;
	/** When entries become possible again; null when inactive. */
	readonly resumeAt: number | null;
}

/**
 * Evaluate the breaker from closed trades (oldest exit first).
 *
 * The breaker trips at loss `i` when `maxLosses` losses closed within
 * `windowMs` ending at that loss, and stays tripped for `cooldownMs` after
 * the tripping loss, or for as long as the window ending now still holds
 * `maxLosses` losses.
 */
export function evaluateBreaker(
	closed: readonly TradeHistoryRecord[],
	nowMs: number,
	maxLosses: number,
	windowMs: number,
	cooldownMs: number,
): BreakerState {
	const lossTimes = closed
		.filter((r) => r.pnlUsdt !== null && r.pnlUsdt < 0 && r.exitTime !== null)
		.map((r) => r.exitTime ?? 0)
		.sort((a, b) => a - b);

	const lossesInWindow = lossTimes.filter((t) => t >= nowMs - windowMs && t <= nowMs).length;

	let lastTrip: number | null = null;
	for (let i = 0; i < lossTimes.length; i++) {
		const at = lossTimes[i] ?? 0;
		const count = lossTimes.filter((t) => t >= at - windowMs && t <= at).length;
		if (count >= maxLosses) lastTrip = at;
	}

	const cooldownEnd = lastTrip === null ? null : lastTrip + cooldownMs;
	if (cooldownEnd !== null && nowMs < cooldownEnd) {
		return { active: true, lossesInWindow, resumeAt: cooldownEnd };
	}
	if (lossesInWindow >= maxLosses) {
		// window must slide past the oldest counted loss before entries resume
		const counted = lossTimes.filter((t) => t >= nowMs - windowMs && t <= nowMs);
		const releaseAt = (counted[counted.length - maxLosses] ?? nowMs) + windowMs;
		return { active: true, lossesInWindow, resumeAt: Math.max(releaseAt, cooldownEnd ?? 0) };
	}
	return { active: false, lossesInWindow, resumeAt: null };
}

/** Rejects entries after too many losing trades in a rolling window. */
export class CircuitBreakerGuard implements EntryGuard {
	readonly name = "circuit_breaker";
	readonly failurePolicy = "closed";
	private readonly history: TradeHistoryRepository;

	private constructor(history: TradeHistoryRepository) {
		this.history = history;
	}

	static create(history: TradeHistoryRepository): CircuitBreakerGuard {
		return new CircuitBreakerGuard(history);
	}

	async check(ctx: GuardContext): GuardCheck {
		const config = ctx.profile.circuitBreaker;
		if (!config.enabled) return ok(allow());

		const windowMs = Duration.minutes(config.windowMinutes);
		const cooldownMs = Duration.minutes(config.cooldownMinutes);
		const closed = await this.history.closedSince(
			ctx.profile.accountId,
			ctx.profile.strategyId,
			ctx.nowMs - windowMs - cooldownMs,
		);
		if (!closed.ok) return closed;

		const state = evaluateBreaker(closed.value, ctx.nowMs, config.maxLosses, windowMs, cooldownMs);
		if (!state.active) return ok(allow());

		return ok(
			block(
				this.name,
				RejectionCode.CircuitBreakerActive,
				`${state.lossesInWindow} losses in ${config.windowMinutes}m, cooling down`,
				{ lossesInWindow: state.lossesInWindow, resumeAt: state.resumeAt },
			),
		);
	}
}
