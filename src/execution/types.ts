/**
 * Per-account outcomes and the aggregated result of one dispatched signal.
 *
 * Each outcome is built only from its own account's data; nothing in one
 * entry refers to another account's orders or credentials.
 */

import type { StateSync } from "../position/types.js";
import type { RejectionCode } from "../risk/types.js";
import type { Direction } from "../shared/direction.js";
import type { AccountId, OrderId, StrategyId, SymbolId } from "../shared/identifiers.js";

export const FailureCode = {
	Timeout: "TIMEOUT",
	NoExchangeClient: "NO_EXCHANGE_CLIENT",
	InvalidStopDistance: "INVALID_STOP_DISTANCE",
	QuantityBelowMinimum: "QUANTITY_BELOW_MINIMUM",
	Unexpected: "UNEXPECTED",
} as const;

export type FailureCode = (typeof FailureCode)[keyof typeof FailureCode];

export interface ExecutedOutcome {
	readonly kind: "executed";
	readonly accountId: AccountId;
	/** Null when the fill was found by reading the exchange position after a lost response. */
	readonly orderId: OrderId | null;
	readonly quantity: number;
	readonly entryPrice: number;
	readonly slOrderId: OrderId;
	readonly tpOrderId: OrderId;
	/** `degraded` when the trade row or the guardian record could not be written. */
	readonly stateSync: StateSync;
}

export interface RejectedOutcome {
	readonly kind: "rejected";
	readonly accountId: AccountId;
	readonly code: RejectionCode;
	readonly reason: string;
	readonly details: Readonly<Record<string, unknown>>;
}

export interface FailedOutcome {
	readonly kind: "failed";
	readonly accountId: AccountId;
	/** FailureCode or the TradingError code that stopped the account. */
	readonly code: string;
	readonly reason: string;
}

/**
 * Needs an operator: the entry filled but protection could not be completed,
 * or the entry's fate is unknown.
 */
export interface AlertOutcome {
	readonly kind: "alert";
	readonly accountId: AccountId;
	readonly code: "UNPROTECTED_POSITION" | "ENTRY_UNCONFIRMED";
	readonly reason: string;
	readonly orderId: OrderId | null;
	readonly slOrderId: OrderId | null;
	readonly tpOrderId: OrderId | null;
	/** True when the emergency reduce-only close went through. */
	readonly emergencyClosed: boolean;
}

export type AccountOutcome = ExecutedOutcome | RejectedOutcome | FailedOutcome | AlertOutcome;

export interface DispatchCounts {
	readonly total: number;
	readonly executed: number;
	readonly rejected: number;
	readonly failed: number;
	readonly alerts: number;
}

export interface AggregatedResult {
	readonly strategyId: StrategyId;
	readonly symbol: SymbolId;
	readonly direction: Direction;
	readonly perAccount: readonly AccountOutcome[];
	readonly counts: DispatchCounts;
	/** True when the coordinator deadline cut some accounts short. */
	readonly timedOut: boolean;
}

export function countOutcomes(outcomes: readonly AccountOutcome[]): DispatchCounts {
	return {
		total: outcomes.length,
		executed: outcomes.filter((o) => o.kind === "executed").length,
		rejected: outcomes.filter((o) => o.kind === "rejected").length,
		failed: outcomes.filter((o) => o.kind === "failed").length,
		alerts: outcomes.filter((o) => o.kind === "alert").length,
	};
}
