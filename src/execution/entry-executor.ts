/**
 * EntryExecutor — sizes, places and protects one account's entry.
 *
 * The entry order is sent at most once. An entry that times out or loses its
 * connection is looked up on the exchange before it is called failed; a fill
 * found that way is protected like any other, and an entry that cannot be
 * confirmed either way raises an alert. Stop and target orders are retried
 * within the protective budget; when they still fail the outcome is an
 * `alert`, never a silent success, and the position may be flattened.
 */

import { AlertKind } from "../audit/alerts.js";
import type { AlertBus } from "../audit/alerts.js";
import type { AuditLog } from "../audit/audit-log.js";
import type { ExchangeClient, OrderFill, PlacedOrder } from "../exchange/types.js";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import type { MarketDataCache } from "../market/market-data-cache.js";
import type { TradeHistoryRepository } from "../persistence/trade-history.js";
import type { PositionGuardian } from "../position/guardian.js";
import type { StateSync } from "../position/types.js";
import type { RiskProfile } from "../risk/profile.js";
import type { TradeSignal } from "../signal/trade-signal.js";
import type { CoreConfig } from "../shared/config.js";
import { DEFAULT_CORE_CONFIG } from "../shared/config.js";
import { Decimal, floorToStep, roundToTick } from "../shared/decimal.js";
import { Direction, entrySide, exitSide } from "../shared/direction.js";
import { NetworkError, TimeoutError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import type { AccountId, OrderId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock, sleep as defaultSleep } from "../shared/time.js";
import { withRetry } from "./retry.js";
import { FailureCode } from "./types.js";
import type { AccountOutcome, AlertOutcome, FailedOutcome } from "./types.js";

export interface EntryExecutorDeps {
	readonly history: TradeHistoryRepository;
	readonly guardian: PositionGuardian;
	readonly market: MarketDataCache;
	readonly audit: AuditLog;
	readonly alerts?: AlertBus | undefined;
	readonly config?: Partial<ExecutorConfig> | undefined;
	readonly clock?: Clock | undefined;
	readonly logger?: Logger | undefined;
	/** Backoff sleep between protective retries and reconciliation reads. */
	readonly sleep?: ((ms: number) => Promise<void>) | undefined;
}

type ExecutorConfig = Pick<CoreConfig, "protectiveRetry" | "emergencyCloseUnprotected" | "entryReconcile">;

/** An entry fill; a fill recovered from the exchange position has no order id. */
type EntryFill = Omit<OrderFill, "orderId"> & { readonly orderId: OrderId | null };

/**
 * Quantity risking `riskPct` percent of `balance` between entry and stop,
 * floored to the symbol's step size. Zero when the stop distance is zero.
 */
export function positionSize(
	balance: number,
	riskPct: number,
	entryPrice: number,
	stopPrice: number,
	stepSize: number,
): number {
	const distance = Decimal.from(entryPrice).sub(Decimal.from(stopPrice)).abs();
	if (distance.isZero()) return 0;
	const riskAmount = Decimal.from(balance).mul(Decimal.from(riskPct)).div(Decimal.from(100));
	return floorToStep(riskAmount.div(distance).toNumber(), stepSize);
}

export class EntryExecutor {
	private readonly deps: EntryExecutorDeps;
	private readonly config: ExecutorConfig;
	private readonly clock: Clock;
	private readonly logger: Logger;

	constructor(deps: EntryExecutorDeps) {
		this.deps = deps;
		this.config = {
			protectiveRetry: deps.config?.protectiveRetry ?? DEFAULT_CORE_CONFIG.protectiveRetry,
			emergencyCloseUnprotected:
				deps.config?.emergencyCloseUnprotected ?? DEFAULT_CORE_CONFIG.emergencyCloseUnprotected,
			entryReconcile: deps.config?.entryReconcile ?? DEFAULT_CORE_CONFIG.entryReconcile,
		};
		this.clock = deps.clock ?? SystemClock;
		this.logger = (deps.logger ?? silentLogger()).child({ component: "entry-executor" });
	}

	/**
	 * Place and protect the entry for one account. `abort` is honoured only
	 * before the entry order; once it is filled, protection always runs.
	 */
	async execute(
		signal: TradeSignal,
		profile: RiskProfile,
		exchange: ExchangeClient,
		abort?: AbortSignal,
	): Promise<AccountOutcome> {
		const account = profile.accountId;
		const log = this.logger.child({ accountId: account, symbol: signal.symbol });

		const balance = await exchange.getBalance();
		if (!balance.ok) return failedFrom(account, balance.error);

		const filters = await this.deps.market.get("exchange_filters", signal.symbol);
		if (!filters.ok) return failedFrom(account, filters.error);
		const { stepSize, tickSize, minQty, minNotional } = filters.value.value;

		if (signal.entryPrice === signal.stopPrice) {
			return failed(account, FailureCode.InvalidStopDistance, "entry and stop are equal");
		}
		const quantity = positionSize(balance.value, profile.riskPct, signal.entryPrice, signal.stopPrice, stepSize);
		if (quantity <= 0 || quantity < minQty || quantity * signal.entryPrice < minNotional) {
			return failed(
				account,
				FailureCode.QuantityBelowMinimum,
				`quantity ${quantity} below exchange minimum (minQty ${minQty}, minNotional ${minNotional})`,
			);
		}

		if (abort?.aborted) {
			return failed(account, FailureCode.Timeout, "coordinator deadline passed before entry");
		}

		const entry = await exchange.placeMarketOrder({
			symbol: signal.symbol,
			side: entrySide(signal.direction),
			quantity,
			reduceOnly: false,
		});
		await this.deps.audit.record({
			accountId: account,
			symbol: signal.symbol,
			operation: "entry_execution",
			params: { side: entrySide(signal.direction), quantity, riskPct: profile.riskPct },
			result: entry.ok ? { orderId: entry.value.orderId, avgPrice: entry.value.avgPrice } : {},
			success: entry.ok,
			error: entry.ok ? null : entry.error.message,
		});
		let fill: EntryFill;
		if (entry.ok) {
			fill = entry.value;
			log.info({ orderId: fill.orderId, quantity: fill.executedQty }, "entry filled");
		} else if (!isLostResponse(entry.error)) {
			log.error({ err: entry.error.message, code: entry.error.code }, "entry order failed");
			return failedFrom(account, entry.error);
		} else {
			log.warn(
				{ err: entry.error.message, code: entry.error.code },
				"entry response lost; reading exchange position",
			);
			const found = await this.reconcileEntry(signal, profile, exchange, quantity);
			if (!found) return this.unconfirmed(signal, profile, quantity, entry.error);
			fill = found;
		}

		const stopPrice = roundToTick(signal.stopPrice, tickSize);
		const targetPrice = roundToTick(signal.targetPrice, tickSize);
		const side = exitSide(signal.direction);
		const [stop, target] = await Promise.all([
			this.protect(() => exchange.placeStopMarket({ symbol: signal.symbol, side, triggerPrice: stopPrice })),
			this.protect(() =>
				exchange.placeTakeProfitMarket({ symbol: signal.symbol, side, triggerPrice: targetPrice }),
			),
		]);
		await this.deps.audit.record({
			accountId: account,
			symbol: signal.symbol,
			operation: "protective_orders",
			params: { stop: stopPrice, target: targetPrice },
			result: {
				slOrderId: stop.ok ? stop.value.orderId : null,
				tpOrderId: target.ok ? target.value.orderId : null,
			},
			success: stop.ok && target.ok,
			error: protectionError(stop, target),
		});

		if (!stop.ok || !target.ok) {
			return this.unprotected(signal, profile, exchange, fill, stop, target, stopPrice, targetPrice);
		}

		const sync = await this.recordState(signal, profile, fill, stopPrice, targetPrice, stop.value, target.value);
		return {
			kind: "executed",
			accountId: account,
			orderId: fill.orderId,
			quantity: fill.executedQty,
			entryPrice: fill.avgPrice,
			slOrderId: stop.value.orderId,
			tpOrderId: target.value.orderId,
			stateSync: sync,
		};
	}

	/**
	 * Read the exchange position up to `entryReconcile.maxAttempts` times.
	 * A position on the entry's side is taken as its fill.
	 */
	private async reconcileEntry(
		signal: TradeSignal,
		profile: RiskProfile,
		exchange: ExchangeClient,
		quantity: number,
	): Promise<EntryFill | undefined> {
		const { maxAttempts, delayMs } = this.config.entryReconcile;
		const pause = this.deps.sleep ?? defaultSleep;
		let fill: EntryFill | undefined;
		let lastError: string | null = null;
		let attempts = 0;
		while (attempts < maxAttempts && !fill) {
			if (attempts > 0) await pause(delayMs);
			attempts++;
			const position = await exchange.getPosition(signal.symbol);
			if (!position.ok) {
				lastError = position.error.message;
				continue;
			}
			const held = position.value;
			if (held && onEntrySide(signal.direction, held.size)) {
				fill = { orderId: null, avgPrice: held.entryPrice, executedQty: Math.abs(held.size) };
			}
		}

		await this.deps.audit.record({
			accountId: profile.accountId,
			symbol: signal.symbol,
			operation: "entry_reconciliation",
			params: { side: entrySide(signal.direction), quantity, attempts },
			result: fill ? { avgPrice: fill.avgPrice, executedQty: fill.executedQty } : {},
			success: fill !== undefined,
			error: fill ? null : lastError ?? "no position on the exchange",
		});
		if (fill) {
			this.logger.warn(
				{ accountId: profile.accountId, symbol: signal.symbol, quantity: fill.executedQty, attempts },
				"entry fill found on the exchange",
			);
		}
		return fill;
	}

	private unconfirmed(
		signal: TradeSignal,
		profile: RiskProfile,
		quantity: number,
		error: TradingError,
	): AlertOutcome {
		const reason = `entry of ${quantity} not confirmed after ${error.message}; no position found`;
		this.raise(profile.accountId, signal, AlertKind.EntryUnconfirmed, reason);
		return {
			kind: "alert",
			accountId: profile.accountId,
			code: "ENTRY_UNCONFIRMED",
			reason,
			orderId: null,
			slOrderId: null,
			tpOrderId: null,
			emergencyClosed: false,
		};
	}

	private protect(place: () => Promise<Result<PlacedOrder, TradingError>>): Promise<Result<PlacedOrder, TradingError>> {
		return withRetry(place, this.config.protectiveRetry, {
			retryAll: true,
			sleep: this.deps.sleep,
		});
	}

	/** Trade row, then guardian record; failures degrade the outcome instead of failing it. */
	private async recordState(
		signal: TradeSignal,
		profile: RiskProfile,
		fill: EntryFill,
		stopPrice: number,
		targetPrice: number | null,
		stop: PlacedOrder | null,
		target: PlacedOrder | null,
	): Promise<StateSync> {
		let sync: StateSync = "synced";
		const row = await this.deps.history.recordEntry({
			accountId: profile.accountId,
			strategyId: profile.strategyId,
			symbol: signal.symbol,
			direction: signal.direction,
			quantity: fill.executedQty,
			entryTime: this.clock.now(),
			entryPrice: fill.avgPrice,
			orderId: fill.orderId,
			slOrderId: stop?.orderId ?? null,
			tpOrderId: target?.orderId ?? null,
		});
		if (!row.ok) {
			sync = "degraded";
			this.logger.warn(
				{ accountId: profile.accountId, symbol: signal.symbol, err: row.error.message },
				"trade row not written",
			);
		}

		const opened = await this.deps.guardian.open({
			accountId: profile.accountId,
			strategyId: profile.strategyId,
			symbol: signal.symbol,
			direction: signal.direction,
			entryPrice: fill.avgPrice,
			quantity: fill.executedQty,
			stop: stopPrice,
			target: targetPrice,
			orderId: fill.orderId,
			slOrderId: stop?.orderId ?? null,
			tpOrderId: target?.orderId ?? null,
			tradeId: row.ok ? row.value.id : null,
		});
		if (opened.stateSync !== "synced") sync = "degraded";
		return sync;
	}

	private async unprotected(
		signal: TradeSignal,
		profile: RiskProfile,
		exchange: ExchangeClient,
		fill: EntryFill,
		stop: Result<PlacedOrder, TradingError>,
		target: Result<PlacedOrder, TradingError>,
		stopPrice: number,
		targetPrice: number,
	): Promise<AlertOutcome> {
		const account = profile.accountId;
		const reason = protectionError(stop, target) ?? "protective orders missing";
		this.raise(account, signal, AlertKind.UnprotectedPosition, `entry ${fill.orderId ?? "found by position read"} unprotected: ${reason}`);

		let emergencyClosed = false;
		let stopLeft = stop.ok ? stop.value : null;
		let targetLeft = target.ok ? target.value : null;
		if (this.config.emergencyCloseUnprotected) {
			const cancelled = await exchange.cancelAllOrders(signal.symbol);
			if (cancelled.ok) {
				stopLeft = null;
				targetLeft = null;
			}
			const closed = await exchange.placeMarketOrder({
				symbol: signal.symbol,
				side: exitSide(signal.direction),
				quantity: fill.executedQty,
				reduceOnly: true,
			});
			emergencyClosed = closed.ok;
			if (!closed.ok) {
				this.raise(account, signal, AlertKind.EmergencyCloseFailed, `emergency close failed: ${closed.error.message}`);
			}
		}

		if (!emergencyClosed) {
			// still tracked so the guardian can repair protection later
			await this.recordState(
				signal,
				profile,
				fill,
				stopPrice,
				targetLeft ? targetPrice : null,
				stopLeft,
				targetLeft,
			);
		}

		return {
			kind: "alert",
			accountId: account,
			code: "UNPROTECTED_POSITION",
			reason,
			orderId: fill.orderId,
			slOrderId: stopLeft?.orderId ?? null,
			tpOrderId: targetLeft?.orderId ?? null,
			emergencyClosed,
		};
	}

	private raise(account: AccountId, signal: TradeSignal, kind: AlertKind, message: string): void {
		this.logger.error({ severity: "critical", kind, accountId: account, symbol: signal.symbol }, message);
		this.deps.alerts?.emit("alert", {
			severity: "critical",
			kind,
			accountId: account,
			symbol: signal.symbol,
			message,
			timestamp: this.clock.now(),
		});
	}
}

/** The entry may have filled even though no response came back. */
function isLostResponse(error: TradingError): boolean {
	return error instanceof TimeoutError || error instanceof NetworkError;
}

function onEntrySide(direction: Direction, size: number): boolean {
	return direction === Direction.Long ? size > 0 : size < 0;
}

function protectionError(
	stop: Result<PlacedOrder, TradingError>,
	target: Result<PlacedOrder, TradingError>,
): string | null {
	const parts: string[] = [];
	if (!stop.ok) parts.push(`stop: ${stop.error.message}`);
	if (!target.ok) parts.push(`target: ${target.error.message}`);
	return parts.length > 0 ? parts.join("; ") : null;
}

function failed(accountId: AccountId, code: string, reason: string): FailedOutcome {
	return { kind: "failed", accountId, code, reason };
}

function failedFrom(accountId: AccountId, error: TradingError): FailedOutcome {
	return failed(accountId, error.code, error.message);
}
