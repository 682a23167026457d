/**
 * GuardianDispatcher — routes one inbound guardian request to the accounts
 * it concerns.
 *
 * Without an explicit account the request applies to every account holding
 * a stored position on the symbol. Closes run in parallel; adjustments and
 * half-closes run one account at a time.
 *
 * A request that carries its market context is checked for freshness against
 * the current mark first; a stale or drifted decision is rejected for every
 * account it concerns.
 */

import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import type { MarketDataCache } from "../market/market-data-cache.js";
import type { PositionGuardian } from "../position/guardian.js";
import { GuardianCode, GuardianStatus, isGuardianSuccess } from "../position/types.js";
import type { GuardianAction, GuardianOutcome, LevelMetadata } from "../position/types.js";
import type { TradingError } from "../shared/errors.js";
import type { AccountId, SymbolId } from "../shared/identifiers.js";
import { ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import { checkFreshness, checkInProfit } from "./freshness.js";
import type { FreshnessVerdict, MarketContext } from "./freshness.js";

/** A close is carried out past this drift, with a warning. */
const CLOSE_DRIFT_WARN_PCT = 2;

export type GuardianRequestAction = "close" | "adjust" | "half_close";

export interface GuardianRequest {
	readonly symbol: SymbolId;
	readonly action: GuardianRequestAction;
	readonly stop?: number | undefined;
	readonly target?: number | undefined;
	readonly accountId?: AccountId | undefined;
	readonly level?: LevelMetadata | undefined;
	/** half_close only. Default: true */
	readonly moveStopToBreakEven?: boolean | undefined;
	/** Price and time the decision was taken at; absent skips the freshness check. */
	readonly context?: MarketContext | undefined;
}

export interface GuardianDispatcherDeps {
	readonly guardian: PositionGuardian;
	/** Source of the mark price the freshness check compares against. */
	readonly market: MarketDataCache;
	readonly clock?: Clock | undefined;
	readonly logger?: Logger | undefined;
}

export interface GuardianDispatchSummary {
	readonly symbol: SymbolId;
	readonly action: GuardianRequestAction;
	readonly total: number;
	readonly succeeded: number;
	readonly partial: number;
	readonly failed: number;
	readonly outcomes: readonly GuardianOutcome[];
}

export class GuardianDispatcher {
	private readonly guardian: PositionGuardian;
	private readonly market: MarketDataCache;
	private readonly clock: Clock;
	private readonly logger: Logger;

	constructor(deps: GuardianDispatcherDeps) {
		this.guardian = deps.guardian;
		this.market = deps.market;
		this.clock = deps.clock ?? SystemClock;
		this.logger = (deps.logger ?? silentLogger()).child({ component: "guardian-dispatcher" });
	}

	async dispatch(request: GuardianRequest): Promise<Result<GuardianDispatchSummary, TradingError>> {
		let accounts: readonly AccountId[];
		if (request.accountId !== undefined) {
			accounts = [request.accountId];
		} else {
			const found = await this.guardian.accountsWithPosition(request.symbol);
			if (!found.ok) return found;
			accounts = found.value;
		}

		const mark = request.context ? await this.markPrice(request.symbol) : undefined;
		const verdict = request.context
			? checkFreshness(request.action, request.context, mark, this.clock.now())
			: undefined;

		let outcomes: GuardianOutcome[];
		if (verdict && !verdict.fresh) {
			this.logger.warn({ symbol: request.symbol, action: request.action, code: verdict.code }, verdict.reason);
			outcomes = accounts.map((a) => refused(a, request, verdict));
		} else if (request.action === "close") {
			const driftPct = verdict?.fresh ? verdict.driftPct : null;
			if (driftPct !== null && driftPct > CLOSE_DRIFT_WARN_PCT) {
				this.logger.warn({ symbol: request.symbol, driftPct }, "closing despite price drift");
			}
			outcomes = await Promise.all(accounts.map((a) => this.apply(a, request, mark)));
		} else {
			outcomes = [];
			for (const account of accounts) {
				outcomes.push(await this.apply(account, request, mark));
			}
		}

		const summary: GuardianDispatchSummary = {
			symbol: request.symbol,
			action: request.action,
			total: outcomes.length,
			succeeded: outcomes.filter(isGuardianSuccess).length,
			partial: outcomes.filter((o) => o.status === GuardianStatus.Partial).length,
			failed: outcomes.filter((o) => !isGuardianSuccess(o) && o.status !== GuardianStatus.Partial).length,
			outcomes,
		};
		this.logger.info(
			{
				symbol: request.symbol,
				action: request.action,
				total: summary.total,
				succeeded: summary.succeeded,
				partial: summary.partial,
				failed: summary.failed,
			},
			"guardian request dispatched",
		);
		return ok(summary);
	}

	/** Undefined when the mark cannot be read; the freshness check then passes. */
	private async markPrice(symbol: SymbolId): Promise<number | undefined> {
		const mark = await this.market.get("mark_price", symbol);
		if (mark.ok) return mark.value.value;
		this.logger.warn({ symbol, err: mark.error.message }, "mark price unavailable; freshness not checked");
		return undefined;
	}

	/** With a mark to compare against, a half close needs the position still in profit. */
	private async halfClose(
		account: AccountId,
		request: GuardianRequest,
		mark: number | undefined,
	): Promise<GuardianOutcome> {
		if (mark !== undefined) {
			const position = await this.guardian.get(account, request.symbol);
			if (position.ok && position.value) {
				const profit = checkInProfit(position.value, mark);
				if (!profit.fresh) return refused(account, request, profit);
			}
		}
		return this.guardian.halfClose(account, request.symbol, request.moveStopToBreakEven ?? true);
	}

	private apply(account: AccountId, request: GuardianRequest, mark: number | undefined): Promise<GuardianOutcome> {
		const { symbol, stop, target, level } = request;
		switch (request.action) {
			case "close":
				return this.guardian.close(account, symbol);
			case "half_close":
				return this.halfClose(account, request, mark);
			case "adjust":
				if (stop !== undefined && target !== undefined) {
					return this.guardian.adjustBoth(account, symbol, stop, target, level);
				}
				if (stop !== undefined) return this.guardian.adjustStop(account, symbol, stop, level);
				if (target !== undefined) return this.guardian.adjustTarget(account, symbol, target);
				return Promise.resolve({
					status: GuardianStatus.Rejected,
					action: "adjust_stop",
					accountId: account,
					symbol,
					code: GuardianCode.InvalidRequest,
					reason: "adjust requires a stop or a target",
					stateSync: "not_applicable",
				});
		}
	}
}

function guardianAction(request: GuardianRequest): GuardianAction {
	if (request.action !== "adjust") return request.action;
	if (request.stop !== undefined && request.target !== undefined) return "adjust_both";
	return request.stop !== undefined ? "adjust_stop" : "adjust_target";
}

function refused(
	account: AccountId,
	request: GuardianRequest,
	verdict: Extract<FreshnessVerdict, { readonly fresh: false }>,
): GuardianOutcome {
	return {
		status: GuardianStatus.Rejected,
		action: guardianAction(request),
		accountId: account,
		symbol: request.symbol,
		code: verdict.code,
		reason: verdict.reason,
		stateSync: "not_applicable",
	};
}
