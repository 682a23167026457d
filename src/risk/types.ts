/**
 * Risk framework type definitions.
 *
 * Gates see one signal, one account's profile and a lazily queried account
 * state; they never see another account's data.
 */

import type { TradingError } from "../shared/errors.js";
import type { AccountId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import type { TradeSignal } from "../signal/trade-signal.js";
import type { RiskProfile } from "./profile.js";

// ── Rejection codes ─────────────────────────────────────────────────

export const RejectionCode = {
	TierRejected: "TIER_REJECTED",
	OutsideSchedule: "OUTSIDE_SCHEDULE",
	CircuitBreakerActive: "CIRCUIT_BREAKER_ACTIVE",
	RecentDuplicate: "RECENT_DUPLICATE",
	PositionAlreadyOpen: "POSITION_ALREADY_OPEN",
	MaxOpenPositions: "MAX_OPEN_POSITIONS",
	LossCooldown: "LOSS_COOLDOWN",
	SymbolBlocked: "SYMBOL_BLOCKED",
	DailyLossPauseActive: "DAILY_LOSS_PAUSE_ACTIVE",
	/** A fail-closed gate could not evaluate. */
	GateError: "GATE_ERROR",
} as const;

export type RejectionCode = (typeof RejectionCode)[keyof typeof RejectionCode];

// ── Guard verdict (discriminated union) ─────────────────────────────

export type GuardVerdict =
	| { readonly type: "allow" }
	| {
			readonly type: "block";
			readonly guard: string;
			readonly code: RejectionCode;
			readonly reason: string;
			readonly details: Readonly<Record<string, unknown>>;
	  };

export type BlockVerdict = Extract<GuardVerdict, { readonly type: "block" }>;

export function allow(): GuardVerdict {
	return { type: "allow" };
}

export function block(
	guard: string,
	code: RejectionCode,
	reason: string,
	details: Readonly<Record<string, unknown>> = {},
): GuardVerdict {
	return { type: "block", guard, code, reason, details };
}

export function isAllowed(verdict: GuardVerdict): verdict is { readonly type: "allow" } {
	return verdict.type === "allow";
}

export function isBlocked(verdict: GuardVerdict): verdict is BlockVerdict {
	return verdict.type === "block";
}

// ── Guard context ───────────────────────────────────────────────────

/** Live account facts, queried only by the gates that need them. */
export interface AccountState {
	readonly accountId: AccountId;
	currentBalance(): Promise<Result<number, TradingError>>;
}

export interface GuardContext {
	readonly signal: TradeSignal;
	readonly profile: RiskProfile;
	readonly account: AccountState;
	/** Evaluation instant, fixed for the whole pipeline run. */
	readonly nowMs: number;
}

// ── Entry guard interface ───────────────────────────────────────────

/**
 * What happens when a gate cannot evaluate (error result or thrown):
 * `open` allows the signal and logs, `closed` rejects with GATE_ERROR.
 */
export type FailurePolicy = "open" | "closed";

export type GuardCheck = Promise<Result<GuardVerdict, TradingError>>;

export interface EntryGuard {
	readonly name: string;
	readonly failurePolicy: FailurePolicy;
	check(ctx: GuardContext): GuardCheck;
}
