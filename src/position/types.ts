/**
 * Position guardian domain types.
 */

import type { Direction } from "../shared/direction.js";
import type { AccountId, OrderId, StrategyId, SymbolId } from "../shared/identifiers.js";

/** Level recorded before any trailing adjustment. */
export const INITIAL_LEVEL = "initial";

/**
 * Authoritative local shadow of one open position's protective orders,
 * keyed by (accountId, symbol). The exchange remains the source of truth for
 * fills; this record enforces tighten-only and avoids redundant calls.
 */
export interface Position {
	readonly accountId: AccountId;
	readonly strategyId: StrategyId;
	readonly symbol: SymbolId;
	readonly direction: Direction;
	readonly entryPrice: number;
	readonly quantity: number;
	readonly currentStop: number;
	readonly currentTarget: number | null;
	/** Entry order; null when the fill was only found by reconciliation. */
	readonly orderId: OrderId | null;
	readonly slOrderId: OrderId | null;
	readonly tpOrderId: OrderId | null;
	readonly levelApplied: string;
	readonly levelThresholdPct: number | null;
	readonly previousLevel: string | null;
	/** Version marker for optimistic updates. */
	readonly lastAdjustmentTs: number;
	readonly previousStop: number | null;
	readonly openedAt: number;
	readonly halfClosed: boolean;
	/** PnL already realised by partial closes, in quote currency. */
	readonly realisedPnlUsdt: number;
	/** Trade history row opened with this position, when it could be written. */
	readonly tradeId: string | null;
}

/** Trailing-stop progress attached to an adjust_stop request. */
export interface LevelMetadata {
	readonly level: string;
	readonly thresholdPct?: number | null | undefined;
}

export type GuardianAction =
	| "open"
	| "close"
	| "adjust_stop"
	| "adjust_target"
	| "adjust_both"
	| "half_close"
	| "sync";

export const GuardianStatus = {
	Applied: "applied",
	Noop: "noop",
	Rejected: "rejected",
	Partial: "partial",
	Failed: "failed",
} as const;

export type GuardianStatus = (typeof GuardianStatus)[keyof typeof GuardianStatus];

/**
 * Whether the durable Position write after an exchange mutation succeeded.
 * `degraded` = the exchange is updated but the store is not.
 */
export type StateSync = "synced" | "degraded" | "not_applicable";

/** Reason codes for guardian outcomes that did not apply. */
export const GuardianCode = {
	NoPosition: "NO_POSITION",
	StopLoosens: "STOP_LOOSENS",
	StopWrongSideOfMark: "STOP_WRONG_SIDE_OF_MARK",
	TargetWrongSideOfMark: "TARGET_WRONG_SIDE_OF_MARK",
	PriceOutOfRange: "PRICE_OUT_OF_RANGE",
	Conflict: "CONFLICT",
	ExchangeError: "EXCHANGE_ERROR",
	MarketData: "MARKET_DATA_UNAVAILABLE",
	StoreUnavailable: "STORE_UNAVAILABLE",
	StopMoveFailed: "STOP_MOVE_FAILED",
	NothingToClose: "NOTHING_TO_CLOSE",
	InvalidRequest: "INVALID_REQUEST",
	/** A record already exists for the (account, symbol) being opened. */
	PositionExists: "POSITION_EXISTS",
	StaleRequest: "STALE_REQUEST",
	PriceDrift: "PRICE_DRIFT",
	NotInProfit: "NOT_IN_PROFIT",
} as const;

export type GuardianCode = (typeof GuardianCode)[keyof typeof GuardianCode];

export interface GuardianOutcome {
	readonly status: GuardianStatus;
	readonly action: GuardianAction;
	readonly accountId: AccountId;
	readonly symbol: SymbolId;
	readonly code?: GuardianCode | undefined;
	readonly reason?: string | undefined;
	readonly stateSync: StateSync;
	/** Record after the action; absent when the position is gone or unknown. */
	readonly position?: Position | undefined;
	/** Realised PnL in quote currency, for close / half_close. */
	readonly pnlUsdt?: number | undefined;
}

/** `applied` and `noop` count as success; `partial` is surfaced separately. */
export function isGuardianSuccess(outcome: GuardianOutcome): boolean {
	return outcome.status === GuardianStatus.Applied || outcome.status === GuardianStatus.Noop;
}
