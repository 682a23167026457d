/**
 * Freshness of a guardian decision: the price and time the decision was made
 * at, compared with the market when the request is carried out.
 *
 * Anything missing (no trigger price, no mark) lets the request through.
 */

import type { Position } from "../position/types.js";
import { GuardianCode } from "../position/types.js";
import { Direction } from "../shared/direction.js";
import { Duration } from "../shared/time.js";
import type { GuardianRequestAction } from "./guardian-dispatcher.js";

/** Where the decision was taken. */
export interface MarketContext {
	readonly triggerPrice: number;
	/** Epoch milliseconds. */
	readonly timestamp: number;
	/** adjust only. Default: 1 */
	readonly maxDriftPct?: number | undefined;
}

export const DEFAULT_MAX_DRIFT_PCT = 1;

/** Oldest decision each action still carries out. */
export const MAX_DECISION_AGE_MS: Readonly<Record<GuardianRequestAction, number>> = {
	close: Duration.seconds(60),
	adjust: Duration.seconds(45),
	half_close: Duration.seconds(90),
};

export type FreshnessVerdict =
	| { readonly fresh: true; readonly driftPct: number | null }
	| { readonly fresh: false; readonly code: GuardianCode; readonly reason: string };

/** Price move from `triggerPrice` to `mark`, in percent of the trigger. */
export function priceDriftPct(triggerPrice: number, mark: number): number {
	return (Math.abs(mark - triggerPrice) / triggerPrice) * 100;
}

/**
 * Judge one request against the current mark. Closes only go stale;
 * adjustments also reject a drift past `maxDriftPct`.
 */
export function checkFreshness(
	action: GuardianRequestAction,
	context: MarketContext,
	mark: number | undefined,
	nowMs: number,
): FreshnessVerdict {
	if (context.triggerPrice <= 0 || mark === undefined || mark <= 0) return { fresh: true, driftPct: null };

	const ageMs = nowMs - context.timestamp;
	const driftPct = priceDriftPct(context.triggerPrice, mark);
	const maxDrift = context.maxDriftPct ?? DEFAULT_MAX_DRIFT_PCT;

	if (action === "adjust" && driftPct > maxDrift) {
		return {
			fresh: false,
			code: GuardianCode.PriceDrift,
			reason: `price moved ${driftPct.toFixed(3)}% since the decision (max ${maxDrift}%)`,
		};
	}
	if (ageMs > MAX_DECISION_AGE_MS[action]) {
		return {
			fresh: false,
			code: GuardianCode.StaleRequest,
			reason: `${action} decided ${(ageMs / 1_000).toFixed(1)}s ago (max ${MAX_DECISION_AGE_MS[action] / 1_000}s)`,
		};
	}
	return { fresh: true, driftPct };
}

/** A half close only goes ahead while the position is still in profit. */
export function checkInProfit(position: Position, mark: number): FreshnessVerdict {
	const inProfit = position.direction === Direction.Long ? mark > position.entryPrice : mark < position.entryPrice;
	if (inProfit) return { fresh: true, driftPct: null };
	return {
		fresh: false,
		code: GuardianCode.NotInProfit,
		reason: `mark ${mark} is not in profit against entry ${position.entryPrice}`,
	};
}
