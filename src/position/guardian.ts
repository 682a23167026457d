/**
 * PositionGuardian — mutates protective orders of open positions safely.
 *
 * Every action on one (account, symbol) runs under a keyed lock, validates
 * against the stored record and the live mark price before touching the
 * exchange, and writes the record back optimistically. The exchange is
 * authoritative: once it has changed, the action reports success even when
 * the record could not be written, flagged `stateSync: "degraded"`.
 */

import { AlertKind } from "../audit/alerts.js";
import type { AlertBus, AlertSeverity } from "../audit/alerts.js";
import type { AuditLog } from "../audit/audit-log.js";
import { BoundedExchange } from "../exchange/bounded-exchange.js";
import type { ExchangeClient, SymbolFilters } from "../exchange/types.js";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import type { MarketDataCache } from "../market/market-data-cache.js";
import type { PositionStore } from "../persistence/position-store.js";
import { ExitReason } from "../persistence/trade-history.js";
import type { TradeHistoryRepository } from "../persistence/trade-history.js";
import type { CoreConfig } from "../shared/config.js";
import { DEFAULT_CORE_CONFIG } from "../shared/config.js";
import { Decimal, floorToStep, roundToTick } from "../shared/decimal.js";
import { Direction, directionSign, exitSide } from "../shared/direction.js";
import type { TradingError } from "../shared/errors.js";
import { errorMessage } from "../shared/errors.js";
import { positionKey } from "../shared/identifiers.js";
import type { AccountId, OrderId, StrategyId, SymbolId } from "../shared/identifiers.js";
import { ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock, sleep as defaultSleep } from "../shared/time.js";
import { IdempotencyGuard, actionKey } from "./idempotency-guard.js";
import { KeyedLock } from "./keyed-lock.js";
import { nextPositionState } from "./position-state.js";
import { GuardianCode, GuardianStatus, INITIAL_LEVEL, isGuardianSuccess } from "./types.js";
import type {
	GuardianAction,
	GuardianOutcome,
	LevelMetadata,
	Position,
	StateSync,
} from "./types.js";

// ── Configuration ───────────────────────────────────────────────────

export interface GuardianDeps {
	/** Exchange client per account; calls are wrapped with `exchangeTimeoutMs`. */
	readonly exchanges: ReadonlyMap<AccountId, ExchangeClient>;
	readonly positions: PositionStore;
	readonly history: TradeHistoryRepository;
	/** Source of exchange filters (tick and step sizes). */
	readonly market: MarketDataCache;
	readonly audit: AuditLog;
	readonly alerts?: AlertBus | undefined;
	readonly config?: Partial<Pick<CoreConfig, "stateRetryDelayMs" | "exchangeTimeoutMs">> | undefined;
	readonly clock?: Clock | undefined;
	readonly logger?: Logger | undefined;
	readonly sleep?: ((ms: number) => Promise<void>) | undefined;
}

/** Everything known about a freshly filled entry. */
export interface OpenPositionInput {
	readonly accountId: AccountId;
	readonly strategyId: StrategyId;
	readonly symbol: SymbolId;
	readonly direction: Direction;
	readonly entryPrice: number;
	readonly quantity: number;
	readonly stop: number;
	readonly target: number | null;
	readonly orderId: OrderId | null;
	readonly slOrderId: OrderId | null;
	readonly tpOrderId: OrderId | null;
	readonly tradeId: string | null;
}

/** Half-close claims outlive any plausible redelivery of the same request. */
const HALF_CLOSE_CLAIM_TTL_MS = 24 * 3_600_000;

type Draft = Omit<GuardianOutcome, "action" | "accountId" | "symbol">;

interface Session {
	readonly exchange: ExchangeClient;
	readonly position: Position;
	readonly filters: SymbolFilters;
}

type Replacement =
	| { readonly kind: "replaced"; readonly orderId: OrderId }
	| { readonly kind: "failed"; readonly error: TradingError; readonly restored: OrderId | null };

interface WriteResult {
	readonly sync: StateSync;
	readonly position: Position;
	readonly conflict: boolean;
}

// ── Guardian ────────────────────────────────────────────────────────

export class PositionGuardian {
	private readonly deps: GuardianDeps;
	private readonly exchanges = new Map<AccountId, ExchangeClient>();
	private readonly lock = new KeyedLock();
	private readonly claims: IdempotencyGuard;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly pause: (ms: number) => Promise<void>;
	private readonly stateRetryDelayMs: number;

	constructor(deps: GuardianDeps) {
		this.deps = deps;
		this.clock = deps.clock ?? SystemClock;
		this.logger = (deps.logger ?? silentLogger()).child({ component: "guardian" });
		this.pause = deps.sleep ?? defaultSleep;
		this.stateRetryDelayMs = deps.config?.stateRetryDelayMs ?? DEFAULT_CORE_CONFIG.stateRetryDelayMs;
		const timeoutMs = deps.config?.exchangeTimeoutMs ?? DEFAULT_CORE_CONFIG.exchangeTimeoutMs;
		for (const [account, client] of deps.exchanges) {
			this.exchanges.set(account, new BoundedExchange(client, timeoutMs));
		}
		this.claims = IdempotencyGuard.create({ ttlMs: HALF_CLOSE_CLAIM_TTL_MS }, this.clock);
	}

	// ── Queries ────────────────────────────────────────────────────

	async get(account: AccountId, symbol: SymbolId): Promise<Result<Position | undefined, TradingError>> {
		return this.deps.positions.get(account, symbol);
	}

	/** Accounts holding a stored position on `symbol`. */
	async accountsWithPosition(symbol: SymbolId): Promise<Result<AccountId[], TradingError>> {
		const found = await this.deps.positions.listBySymbol(symbol);
		if (!found.ok) return found;
		return ok(found.value.map((p) => p.accountId));
	}

	// ── Actions ────────────────────────────────────────────────────

	/** Start guarding a filled entry. */
	async open(input: OpenPositionInput): Promise<GuardianOutcome> {
		const params = { ...input };
		return this.perform("open", input.accountId, input.symbol, params, async () => {
			const now = this.clock.now();
			const position: Position = {
				accountId: input.accountId,
				strategyId: input.strategyId,
				symbol: input.symbol,
				direction: input.direction,
				entryPrice: input.entryPrice,
				quantity: input.quantity,
				currentStop: input.stop,
				currentTarget: input.target,
				orderId: input.orderId,
				slOrderId: input.slOrderId,
				tpOrderId: input.tpOrderId,
				levelApplied: INITIAL_LEVEL,
				levelThresholdPct: null,
				previousLevel: null,
				lastAdjustmentTs: now,
				previousStop: null,
				openedAt: now,
				halfClosed: false,
				realisedPnlUsdt: 0,
				tradeId: input.tradeId,
			};
			const written = await this.retryOnce(() => this.deps.positions.create(position));
			if (!written.ok) {
				this.desync(position, "open", written.error);
				return { status: GuardianStatus.Applied, stateSync: "degraded", position };
			}
			if (!written.value) {
				const reason = `a position on ${input.symbol} is already recorded; entry ${input.orderId ?? "unknown"} not tracked`;
				this.alert("critical", AlertKind.StateDesync, position, reason);
				return { status: GuardianStatus.Rejected, code: GuardianCode.PositionExists, reason, stateSync: "degraded" };
			}
			return { status: GuardianStatus.Applied, stateSync: "synced", position };
		});
	}

	/**
	 * Move the stop. Tighten-only: a long stop may only rise, a short stop
	 * may only fall, and it must sit on the protective side of the mark.
	 * Repeating an applied request is a noop.
	 */
	async adjustStop(
		account: AccountId,
		symbol: SymbolId,
		newStop: number,
		level?: LevelMetadata,
	): Promise<GuardianOutcome> {
		const params = { stop: newStop, level: level ?? null };
		return this.perform("adjust_stop", account, symbol, params, async () => {
			const session = await this.session(account, symbol);
			if ("status" in session) return session;
			const { exchange, position, filters } = session;

			const stop = roundToTick(newStop, filters.tickSize);
			const invalid = this.checkRange(stop, filters) ?? checkTightens(position, stop);
			if (invalid) return { ...invalid, position };
			if (stop === position.currentStop) {
				return { status: GuardianStatus.Noop, stateSync: "not_applicable", position };
			}

			const mark = await exchange.fetchMarkPrice(symbol);
			if (!mark.ok) return marketFailure(mark.error, position);
			const wrongSide = checkStopSide(position.direction, stop, mark.value);
			if (wrongSide) return { ...wrongSide, position };

			const base = await this.recheckStop(position, stop);
			if ("status" in base) return base;

			const replaced = await this.replaceStop(exchange, base, stop);
			if (replaced.kind === "failed") return this.afterFailedStop(base, replaced);

			const stopOrder = replaced.orderId;
			const next = withStop(base, stop, stopOrder, level, this.clock.now());
			const written = await this.persist(next, base.lastAdjustmentTs, (latest) =>
				tightensFrom(latest, stop) ? withStop(latest, stop, stopOrder, level, this.clock.now()) : undefined,
			);
			if (lostToTighterStop(written, stop)) return this.yieldToWinner(exchange, next, written.position);
			return applied(written);
		});
	}

	/** Replace the take-profit order; the stop order is left untouched. */
	async adjustTarget(account: AccountId, symbol: SymbolId, newTarget: number): Promise<GuardianOutcome> {
		return this.perform("adjust_target", account, symbol, { target: newTarget }, async () => {
			const session = await this.session(account, symbol);
			if ("status" in session) return session;
			const { exchange, position, filters } = session;

			const target = roundToTick(newTarget, filters.tickSize);
			const outOfRange = this.checkRange(target, filters);
			if (outOfRange) return { ...outOfRange, position };
			if (target === position.currentTarget) {
				return { status: GuardianStatus.Noop, stateSync: "not_applicable", position };
			}

			const mark = await exchange.fetchMarkPrice(symbol);
			if (!mark.ok) return marketFailure(mark.error, position);
			const wrongSide = checkTargetSide(position.direction, target, mark.value);
			if (wrongSide) return { ...wrongSide, position };

			const replaced = await this.replaceTarget(exchange, position, target);
			if (replaced.kind === "failed") return this.afterFailedTarget(position, replaced);

			const targetOrder = replaced.orderId;
			const next = withTarget(position, target, targetOrder, this.clock.now());
			const written = await this.persist(next, position.lastAdjustmentTs, (latest) =>
				withTarget(latest, target, targetOrder, this.clock.now()),
			);
			return applied(written);
		});
	}

	/**
	 * Move stop and target together. Both are validated before either order
	 * is touched; when the target fails after the stop moved, the outcome is
	 * `partial`.
	 */
	async adjustBoth(
		account: AccountId,
		symbol: SymbolId,
		newStop: number,
		newTarget: number,
		level?: LevelMetadata,
	): Promise<GuardianOutcome> {
		const params = { stop: newStop, target: newTarget, level: level ?? null };
		return this.perform("adjust_both", account, symbol, params, async () => {
			const session = await this.session(account, symbol);
			if ("status" in session) return session;
			const { exchange, position, filters } = session;

			const stop = roundToTick(newStop, filters.tickSize);
			const target = roundToTick(newTarget, filters.tickSize);
			const invalid =
				this.checkRange(stop, filters) ??
				this.checkRange(target, filters) ??
				checkTightens(position, stop);
			if (invalid) return { ...invalid, position };

			const stopChanges = stop !== position.currentStop;
			const targetChanges = target !== position.currentTarget;
			if (!stopChanges && !targetChanges) {
				return { status: GuardianStatus.Noop, stateSync: "not_applicable", position };
			}

			const mark = await exchange.fetchMarkPrice(symbol);
			if (!mark.ok) return marketFailure(mark.error, position);
			const wrongSide =
				(stopChanges ? checkStopSide(position.direction, stop, mark.value) : undefined) ??
				(targetChanges ? checkTargetSide(position.direction, target, mark.value) : undefined);
			if (wrongSide) return { ...wrongSide, position };

			let base = position;
			if (stopChanges) {
				const rechecked = await this.recheckStop(position, stop);
				if ("status" in rechecked) return rechecked;
				base = rechecked;
			}

			let next = base;
			if (stopChanges) {
				const replaced = await this.replaceStop(exchange, base, stop);
				if (replaced.kind === "failed") return this.afterFailedStop(base, replaced);
				next = withStop(next, stop, replaced.orderId, level, this.clock.now());
			}

			let targetError: TradingError | undefined;
			if (targetChanges) {
				const replaced = await this.replaceTarget(exchange, next, target);
				if (replaced.kind === "replaced") {
					next = withTarget(next, target, replaced.orderId, this.clock.now());
				} else {
					targetError = replaced.error;
					next = { ...next, tpOrderId: replaced.restored, lastAdjustmentTs: this.stamp(next) };
				}
			}

			const stopOrder = next.slOrderId;
			const targetOrder = next.tpOrderId;
			const written = await this.persist(next, base.lastAdjustmentTs, (latest) => {
				if (stopChanges && !tightensFrom(latest, stop)) return undefined;
				const rebased = stopChanges ? withStop(latest, stop, stopOrder, level, this.clock.now()) : latest;
				return targetError
					? { ...rebased, tpOrderId: targetOrder, lastAdjustmentTs: this.stamp(rebased) }
					: withTarget(rebased, target, targetOrder, this.clock.now());
			});

			if (stopChanges && lostToTighterStop(written, stop)) {
				const winner = { ...written.position, currentTarget: next.currentTarget, tpOrderId: next.tpOrderId };
				return this.yieldToWinner(exchange, next, winner);
			}
			if (targetError && stopChanges) {
				return {
					status: GuardianStatus.Partial,
					code: GuardianCode.ExchangeError,
					reason: `stop moved, target not replaced: ${targetError.message}`,
					stateSync: written.sync,
					position: written.position,
				};
			}
			if (targetError) return exchangeFailure(targetError, written.position, written.sync);
			return applied(written);
		});
	}

	/**
	 * Close half of the exchange position with a reduce-only order, then
	 * optionally move the stop to break-even. A stop move that fails after
	 * the size was reduced yields `partial`. Only the first call per
	 * position acts; later ones are noops.
	 */
	async halfClose(account: AccountId, symbol: SymbolId, moveStopToBreakEven = true): Promise<GuardianOutcome> {
		return this.perform("half_close", account, symbol, { moveStopToBreakEven }, async () => {
			const session = await this.session(account, symbol);
			if ("status" in session) return session;
			const { exchange, position, filters } = session;

			if (position.halfClosed) {
				return { status: GuardianStatus.Noop, stateSync: "not_applicable", position };
			}
			const claim = actionKey("half_close", position.accountId, position.symbol, position.openedAt);
			if (this.claims.isDuplicate(claim)) {
				return { status: GuardianStatus.Noop, stateSync: "not_applicable", position };
			}

			const live = await exchange.getPosition(symbol);
			if (!live.ok) {
				this.claims.release(claim);
				return exchangeFailure(live.error, position);
			}
			const size = Math.abs(live.value?.size ?? 0);
			const qty = floorToStep(size / 2, filters.stepSize);
			if (qty <= 0 || qty < filters.minQty) {
				this.claims.release(claim);
				return {
					status: GuardianStatus.Rejected,
					code: GuardianCode.NothingToClose,
					reason: `half of ${size} is below the minimum quantity ${filters.minQty}`,
					stateSync: "not_applicable",
					position,
				};
			}

			const fill = await exchange.placeMarketOrder({
				symbol,
				side: exitSide(position.direction),
				quantity: qty,
				reduceOnly: true,
			});
			if (!fill.ok) {
				this.claims.release(claim);
				return exchangeFailure(fill.error, position);
			}

			const pnl = realisedPnl(position, fill.value.avgPrice, fill.value.executedQty);
			let next: Position = {
				...position,
				quantity: Decimal.from(position.quantity).sub(Decimal.from(fill.value.executedQty)).toNumber(),
				halfClosed: true,
				realisedPnlUsdt: Decimal.from(position.realisedPnlUsdt).add(Decimal.from(pnl)).toNumber(),
				lastAdjustmentTs: this.stamp(position),
			};

			let stopError: string | undefined;
			if (moveStopToBreakEven) {
				const moved = await this.moveToBreakEven(exchange, next, filters);
				if (moved.kind === "moved") next = moved.position;
				if (moved.kind === "failed") {
					stopError = moved.reason;
					next = moved.position;
				}
			}

			const result = next;
			const written = await this.persist(result, position.lastAdjustmentTs, (latest) => ({
				...latest,
				quantity: result.quantity,
				halfClosed: true,
				realisedPnlUsdt: result.realisedPnlUsdt,
				currentStop: result.currentStop,
				previousStop: result.previousStop,
				slOrderId: result.slOrderId,
				lastAdjustmentTs: this.stamp(latest),
			}));

			if (stopError !== undefined) {
				return {
					status: GuardianStatus.Partial,
					code: GuardianCode.StopMoveFailed,
					reason: `size reduced, stop not moved to break-even: ${stopError}`,
					stateSync: written.sync,
					position: written.position,
					pnlUsdt: pnl,
				};
			}
			return { ...applied(written), pnlUsdt: pnl };
		});
	}

	/**
	 * Cancel protective orders, flatten with a reduce-only market order,
	 * complete the trade row as `manual_close` and drop the record.
	 */
	async close(account: AccountId, symbol: SymbolId): Promise<GuardianOutcome> {
		return this.perform("close", account, symbol, {}, async () => {
			const session = await this.session(account, symbol, false);
			if ("status" in session) return session;
			const { exchange, position } = session;

			const cancelled = await exchange.cancelAllOrders(symbol);
			if (!cancelled.ok) {
				this.logger.error(
					{ accountId: account, symbol, err: cancelled.error.message },
					"could not cancel protective orders before close",
				);
			}

			const live = await exchange.getPosition(symbol);
			if (!live.ok) return exchangeFailure(live.error, position);
			const size = Math.abs(live.value?.size ?? 0);
			if (size === 0) {
				const mark = await exchange.fetchMarkPrice(symbol);
				const exitPrice = mark.ok ? mark.value : position.currentStop;
				return this.finalise(position, exitPrice, position.quantity, ExitReason.ExternalClose);
			}

			const fill = await exchange.placeMarketOrder({
				symbol,
				side: exitSide(position.direction),
				quantity: size,
				reduceOnly: true,
			});
			if (!fill.ok) {
				if (cancelled.ok && cancelled.value > 0) {
					this.alert(
						"critical",
						AlertKind.UnprotectedPosition,
						position,
						`close failed after protective orders were cancelled: ${fill.error.message}`,
					);
				}
				return exchangeFailure(fill.error, position);
			}
			return this.finalise(position, fill.value.avgPrice, fill.value.executedQty, ExitReason.ManualClose);
		});
	}

	/**
	 * Reconcile one record with the exchange. A flat exchange position means
	 * the trade ended outside the guardian; it is finalised as `stop_hit` or
	 * `target_hit` when `exitPrice` (default: mark) sits within a tick of the
	 * stop or target, else `external_close`.
	 */
	async syncWithExchange(account: AccountId, symbol: SymbolId, exitPrice?: number): Promise<GuardianOutcome> {
		return this.perform("sync", account, symbol, { exitPrice: exitPrice ?? null }, async () => {
			const session = await this.session(account, symbol);
			if ("status" in session) return session;
			const { exchange, position, filters } = session;

			const live = await exchange.getPosition(symbol);
			if (!live.ok) return exchangeFailure(live.error, position);
			if (live.value && live.value.size !== 0) {
				return { status: GuardianStatus.Noop, stateSync: "not_applicable", position };
			}

			let price = exitPrice;
			if (price === undefined) {
				const mark = await exchange.fetchMarkPrice(symbol);
				if (!mark.ok) return marketFailure(mark.error, position);
				price = mark.value;
			}

			const leftovers = await exchange.cancelAllOrders(symbol);
			if (!leftovers.ok) {
				this.logger.warn(
					{ accountId: account, symbol, err: leftovers.error.message },
					"could not cancel leftover orders of a flat position",
				);
			}
			return this.finalise(position, price, position.quantity, classifyExit(position, price, filters.tickSize));
		});
	}

	// ── Internals ──────────────────────────────────────────────────

	private async perform(
		action: GuardianAction,
		account: AccountId,
		symbol: SymbolId,
		params: Record<string, unknown>,
		body: () => Promise<Draft>,
	): Promise<GuardianOutcome> {
		const draft = await this.lock.run(positionKey(account, symbol), async (): Promise<Draft> => {
			try {
				return await body();
			} catch (e) {
				this.logger.error({ action, accountId: account, symbol, err: errorMessage(e) }, "guardian action threw");
				return {
					status: GuardianStatus.Failed,
					code: GuardianCode.ExchangeError,
					reason: errorMessage(e),
					stateSync: "not_applicable",
				};
			}
		});
		const outcome: GuardianOutcome = { ...draft, action, accountId: account, symbol };

		await this.deps.audit.record({
			accountId: account,
			symbol,
			operation: action,
			params,
			result: {
				status: outcome.status,
				code: outcome.code ?? null,
				stateSync: outcome.stateSync,
				currentStop: outcome.position?.currentStop ?? null,
				currentTarget: outcome.position?.currentTarget ?? null,
				pnlUsdt: outcome.pnlUsdt ?? null,
			},
			success: isGuardianSuccess(outcome),
			error: isGuardianSuccess(outcome) ? null : (outcome.reason ?? outcome.code ?? null),
		});
		return outcome;
	}

	/** Exchange client, stored record and symbol filters, or the outcome explaining why not. */
	private async session(account: AccountId, symbol: SymbolId, needFilters = true): Promise<Session | Draft> {
		const exchange = this.exchanges.get(account);
		if (!exchange) {
			return {
				status: GuardianStatus.Failed,
				code: GuardianCode.ExchangeError,
				reason: `no exchange client registered for ${account}`,
				stateSync: "not_applicable",
			};
		}

		const stored = await this.deps.positions.get(account, symbol);
		if (!stored.ok) {
			return {
				status: GuardianStatus.Failed,
				code: GuardianCode.StoreUnavailable,
				reason: stored.error.message,
				stateSync: "not_applicable",
			};
		}
		const position = stored.value;
		if (!position) {
			return {
				status: GuardianStatus.Rejected,
				code: GuardianCode.NoPosition,
				reason: `no open position for ${account} on ${symbol}`,
				stateSync: "not_applicable",
			};
		}

		if (!needFilters) return { exchange, position, filters: NO_FILTERS };
		const filters = await this.deps.market.get("exchange_filters", symbol);
		if (!filters.ok) return marketFailure(filters.error, position);
		return { exchange, position, filters: filters.value.value };
	}

	private checkRange(price: number, filters: SymbolFilters): Draft | undefined {
		if (price < filters.minPrice || price > filters.maxPrice) {
			return {
				status: GuardianStatus.Rejected,
				code: GuardianCode.PriceOutOfRange,
				reason: `price ${price} outside [${filters.minPrice}, ${filters.maxPrice}]`,
				stateSync: "not_applicable",
			};
		}
		return undefined;
	}

	/** Cancel the old stop and place the new one; on failure put the old stop back. */
	private async replaceStop(exchange: ExchangeClient, position: Position, stop: number): Promise<Replacement> {
		const side = exitSide(position.direction);
		if (position.slOrderId !== null) {
			const cancelled = await exchange.cancelOrder(position.symbol, position.slOrderId);
			if (!cancelled.ok) {
				return { kind: "failed", error: cancelled.error, restored: position.slOrderId };
			}
		}
		const placed = await exchange.placeStopMarket({ symbol: position.symbol, side, triggerPrice: stop });
		if (placed.ok) return { kind: "replaced", orderId: placed.value.orderId };

		const restored = await exchange.placeStopMarket({
			symbol: position.symbol,
			side,
			triggerPrice: position.currentStop,
		});
		if (restored.ok) return { kind: "failed", error: placed.error, restored: restored.value.orderId };

		this.alert(
			"critical",
			AlertKind.StopLost,
			position,
			`stop ${stop} rejected (${placed.error.message}); previous stop ${position.currentStop} not restored (${restored.error.message})`,
		);
		return { kind: "failed", error: placed.error, restored: null };
	}

	private async replaceTarget(exchange: ExchangeClient, position: Position, target: number): Promise<Replacement> {
		const side = exitSide(position.direction);
		if (position.tpOrderId !== null) {
			const cancelled = await exchange.cancelOrder(position.symbol, position.tpOrderId);
			if (!cancelled.ok) {
				return { kind: "failed", error: cancelled.error, restored: position.tpOrderId };
			}
		}
		const placed = await exchange.placeTakeProfitMarket({ symbol: position.symbol, side, triggerPrice: target });
		if (placed.ok) return { kind: "replaced", orderId: placed.value.orderId };
		if (position.currentTarget === null) return { kind: "failed", error: placed.error, restored: null };

		const restored = await exchange.placeTakeProfitMarket({
			symbol: position.symbol,
			side,
			triggerPrice: position.currentTarget,
		});
		if (restored.ok) return { kind: "failed", error: placed.error, restored: restored.value.orderId };
		this.logger.warn(
			{ accountId: position.accountId, symbol: position.symbol, err: restored.error.message },
			"previous target could not be restored",
		);
		return { kind: "failed", error: placed.error, restored: null };
	}

	/** Record the stop order id that survived a failed replacement. */
	private async afterFailedStop(
		position: Position,
		replaced: Extract<Replacement, { kind: "failed" }>,
	): Promise<Draft> {
		if (replaced.restored === position.slOrderId) {
			return exchangeFailure(replaced.error, position);
		}
		const next = { ...position, slOrderId: replaced.restored, lastAdjustmentTs: this.stamp(position) };
		const written = await this.persist(next, position.lastAdjustmentTs, (latest) => ({
			...latest,
			slOrderId: replaced.restored,
			lastAdjustmentTs: this.stamp(latest),
		}));
		return exchangeFailure(replaced.error, written.position, written.sync);
	}

	private async afterFailedTarget(
		position: Position,
		replaced: Extract<Replacement, { kind: "failed" }>,
	): Promise<Draft> {
		if (replaced.restored === position.tpOrderId) {
			return exchangeFailure(replaced.error, position);
		}
		const next = { ...position, tpOrderId: replaced.restored, lastAdjustmentTs: this.stamp(position) };
		const written = await this.persist(next, position.lastAdjustmentTs, (latest) => ({
			...latest,
			tpOrderId: replaced.restored,
			lastAdjustmentTs: this.stamp(latest),
		}));
		return exchangeFailure(replaced.error, written.position, written.sync);
	}

	/**
	 * Stop to the entry price, shifted one tick inside the mark when the entry
	 * is already on the wrong side of it. Skipped when that would not tighten.
	 */
	private async moveToBreakEven(
		exchange: ExchangeClient,
		position: Position,
		filters: SymbolFilters,
	): Promise<
		| { readonly kind: "moved"; readonly position: Position }
		| { readonly kind: "skipped" }
		| { readonly kind: "failed"; readonly reason: string; readonly position: Position }
	> {
		const mark = await exchange.fetchMarkPrice(position.symbol);
		if (!mark.ok) return { kind: "failed", reason: mark.error.message, position };

		let stop = roundToTick(position.entryPrice, filters.tickSize);
		if (checkStopSide(position.direction, stop, mark.value)) {
			const shift = position.direction === Direction.Long ? -filters.tickSize : filters.tickSize;
			stop = roundToTick(mark.value + shift, filters.tickSize);
		}
		if (stop === position.currentStop || !tightensFrom(position, stop)) return { kind: "skipped" };

		const replaced = await this.replaceStop(exchange, position, stop);
		if (replaced.kind === "failed") {
			return {
				kind: "failed",
				reason: replaced.error.message,
				position: { ...position, slOrderId: replaced.restored },
			};
		}
		return {
			kind: "moved",
			position: { ...position, currentStop: stop, previousStop: position.currentStop, slOrderId: replaced.orderId },
		};
	}

	/** Complete the trade row and delete the record. */
	private async finalise(
		position: Position,
		exitPrice: number,
		quantity: number,
		reason: ExitReason,
	): Promise<Draft> {
		const closed = nextPositionState({ kind: "open", level: position.levelApplied }, { type: "closed" });
		if (!closed.ok) {
			return {
				status: GuardianStatus.Rejected,
				code: GuardianCode.Conflict,
				reason: closed.error.message,
				stateSync: "not_applicable",
			};
		}

		const pnl = Decimal.from(realisedPnl(position, exitPrice, quantity))
			.add(Decimal.from(position.realisedPnlUsdt))
			.toNumber();
		const pnlPct = Decimal.from(exitPrice)
			.sub(Decimal.from(position.entryPrice))
			.div(Decimal.from(position.entryPrice))
			.mul(Decimal.from(100 * directionSign(position.direction)))
			.toNumber();

		let sync: StateSync = "synced";
		const tradeId = await this.resolveTradeId(position);
		if (tradeId === undefined) {
			sync = "degraded";
		} else {
			const completed = await this.retryOnce(() =>
				this.deps.history.completeExit(tradeId, {
					exitTime: this.clock.now(),
					exitPrice,
					exitReason: reason,
					pnlPct,
					pnlUsdt: pnl,
				}),
			);
			if (!completed.ok) {
				sync = "degraded";
				this.desync(position, "trade history", completed.error);
			}
		}

		const deleted = await this.retryOnce(() => this.deps.positions.delete(position.accountId, position.symbol));
		if (!deleted.ok) {
			sync = "degraded";
			this.desync(position, "position delete", deleted.error);
		}
		return { status: GuardianStatus.Applied, stateSync: sync, reason, pnlUsdt: pnl };
	}

	private async resolveTradeId(position: Position): Promise<string | undefined> {
		if (position.tradeId !== null) return position.tradeId;
		const open = await this.deps.history.findOpen(position.accountId, position.symbol);
		if (open.ok && open.value) return open.value.id;
		this.logger.warn(
			{ accountId: position.accountId, symbol: position.symbol },
			"no open trade row to complete",
		);
		return undefined;
	}

	/**
	 * Optimistic write. A store failure is retried once after
	 * `stateRetryDelayMs`; a version conflict is rebased once onto the record
	 * that won, when `rebase` still accepts it.
	 */
	private async persist(
		next: Position,
		expectedTs: number,
		rebase: (latest: Position) => Position | undefined,
	): Promise<WriteResult> {
		let candidate = next;
		let expected = expectedTs;
		let rebased = false;
		let failures = 0;
		let lastError = "";

		while (failures < 2) {
			const written = await this.deps.positions.compareAndSet(candidate, expected);
			if (!written.ok) {
				failures++;
				lastError = written.error.message;
				if (failures < 2) await this.pause(this.stateRetryDelayMs);
				continue;
			}
			if (written.value.kind === "written") return { sync: "synced", position: candidate, conflict: false };

			const latest = written.value.current;
			const merged = latest && !rebased ? rebase(latest) : undefined;
			if (!latest || !merged) {
				this.alert(
					"warning",
					AlertKind.StateDesync,
					candidate,
					"record changed concurrently; change no longer applies on top of it",
				);
				return { sync: "degraded", position: latest ?? candidate, conflict: true };
			}
			candidate = merged;
			expected = latest.lastAdjustmentTs;
			rebased = true;
		}

		this.desync(candidate, "position write", lastError);
		return { sync: "degraded", position: candidate, conflict: false };
	}

	/**
	 * Re-read the record just before the exchange stop is touched. A newer
	 * version is validated again; a vanished one means the position closed.
	 */
	private async recheckStop(position: Position, stop: number): Promise<Position | Draft> {
		const stored = await this.deps.positions.get(position.accountId, position.symbol);
		// an unreadable store is reported by the write that follows
		if (!stored.ok) return position;
		const latest = stored.value;
		if (!latest) {
			return {
				status: GuardianStatus.Rejected,
				code: GuardianCode.NoPosition,
				reason: `position on ${position.symbol} closed concurrently`,
				stateSync: "not_applicable",
			};
		}
		if (latest.lastAdjustmentTs === position.lastAdjustmentTs) return position;
		const loosens = checkTightens(latest, stop);
		if (loosens) return { ...loosens, position: latest };
		if (latest.currentStop === stop) {
			return { status: GuardianStatus.Noop, stateSync: "not_applicable", position: latest };
		}
		return latest;
	}

	/**
	 * A concurrent writer stored a tighter stop after ours reached the
	 * exchange. Put the winner's stop back on the exchange and keep its record.
	 */
	private async yieldToWinner(exchange: ExchangeClient, ours: Position, winner: Position): Promise<Draft> {
		const restored = await this.replaceStop(exchange, ours, winner.currentStop);
		if (restored.kind === "failed") {
			const reason = `stop ${winner.currentStop} stored concurrently; exchange stop not restored: ${restored.error.message}`;
			this.alert("critical", AlertKind.StateDesync, winner, reason);
			return {
				status: GuardianStatus.Failed,
				code: GuardianCode.Conflict,
				reason,
				stateSync: "degraded",
				position: winner,
			};
		}
		const next: Position = { ...winner, slOrderId: restored.orderId, lastAdjustmentTs: this.stamp(winner) };
		const written = await this.persist(next, winner.lastAdjustmentTs, () => undefined);
		return {
			status: GuardianStatus.Rejected,
			code: GuardianCode.Conflict,
			reason: `stop ${winner.currentStop} stored concurrently is tighter; exchange stop set back to it`,
			stateSync: written.sync,
			position: written.position,
		};
	}

	private async retryOnce<T>(op: () => Promise<Result<T, TradingError>>): Promise<Result<T, TradingError>> {
		const first = await op();
		if (first.ok) return first;
		await this.pause(this.stateRetryDelayMs);
		return op();
	}

	/** Strictly increasing version marker. */
	private stamp(position: Position): number {
		return Math.max(this.clock.now(), position.lastAdjustmentTs + 1);
	}

	private desync(position: Position, what: string, error: TradingError | string): void {
		const message = typeof error === "string" ? error : error.message;
		this.logger.warn(
			{ accountId: position.accountId, symbol: position.symbol, err: message },
			`${what} not persisted; exchange already updated`,
		);
		this.alert("warning", AlertKind.StateDesync, position, `${what} not persisted: ${message}`);
	}

	private alert(severity: AlertSeverity, kind: AlertKind, position: Position, message: string): void {
		const bindings = { severity, kind, accountId: position.accountId, symbol: position.symbol };
		if (severity === "critical") {
			this.logger.error(bindings, message);
		} else {
			this.logger.warn(bindings, message);
		}
		this.deps.alerts?.emit("alert", {
			severity,
			kind,
			accountId: position.accountId,
			symbol: position.symbol,
			message,
			timestamp: this.clock.now(),
		});
	}
}

// ── Pure helpers ────────────────────────────────────────────────────

const NO_FILTERS: SymbolFilters = {
	tickSize: 0,
	stepSize: 0,
	minQty: 0,
	minPrice: 0,
	maxPrice: Number.POSITIVE_INFINITY,
	minNotional: 0,
};

/** True when `stop` is at least as protective as the stored stop. */
export function tightensFrom(position: Position, stop: number): boolean {
	return position.direction === Direction.Long ? stop >= position.currentStop : stop <= position.currentStop;
}

function checkTightens(position: Position, stop: number): Draft | undefined {
	if (tightensFrom(position, stop)) return undefined;
	return {
		status: GuardianStatus.Rejected,
		code: GuardianCode.StopLoosens,
		reason: `stop ${stop} would loosen ${position.direction} stop ${position.currentStop}`,
		stateSync: "not_applicable",
		position,
	};
}

/** Long stops sit below the mark, short stops above it. */
export function checkStopSide(direction: Direction, stop: number, mark: number): Draft | undefined {
	const valid = direction === Direction.Long ? stop < mark : stop > mark;
	if (valid) return undefined;
	return {
		status: GuardianStatus.Rejected,
		code: GuardianCode.StopWrongSideOfMark,
		reason: `${direction} stop ${stop} must be ${direction === Direction.Long ? "below" : "above"} mark ${mark}`,
		stateSync: "not_applicable",
	};
}

/** Long targets sit above the mark, short targets below it. */
export function checkTargetSide(direction: Direction, target: number, mark: number): Draft | undefined {
	const valid = direction === Direction.Long ? target > mark : target < mark;
	if (valid) return undefined;
	return {
		status: GuardianStatus.Rejected,
		code: GuardianCode.TargetWrongSideOfMark,
		reason: `${direction} target ${target} must be ${direction === Direction.Long ? "above" : "below"} mark ${mark}`,
		stateSync: "not_applicable",
	};
}

function withStop(
	position: Position,
	stop: number,
	slOrderId: OrderId | null,
	level: LevelMetadata | undefined,
	now: number,
): Position {
	return {
		...position,
		currentStop: stop,
		previousStop: position.currentStop,
		slOrderId,
		levelApplied: level?.level ?? position.levelApplied,
		levelThresholdPct: level ? (level.thresholdPct ?? null) : position.levelThresholdPct,
		previousLevel: level ? position.levelApplied : position.previousLevel,
		lastAdjustmentTs: Math.max(now, position.lastAdjustmentTs + 1),
	};
}

function withTarget(position: Position, target: number, tpOrderId: OrderId | null, now: number): Position {
	return {
		...position,
		currentTarget: target,
		tpOrderId,
		lastAdjustmentTs: Math.max(now, position.lastAdjustmentTs + 1),
	};
}

function realisedPnl(position: Position, exitPrice: number, quantity: number): number {
	return Decimal.from(exitPrice)
		.sub(Decimal.from(position.entryPrice))
		.mul(Decimal.from(quantity))
		.mul(Decimal.from(directionSign(position.direction)))
		.toNumber();
}

function classifyExit(position: Position, exitPrice: number, tick: number): ExitReason {
	const tolerance = tick > 0 ? tick : 0;
	if (Math.abs(exitPrice - position.currentStop) <= tolerance) return ExitReason.StopHit;
	if (position.currentTarget !== null && Math.abs(exitPrice - position.currentTarget) <= tolerance) {
		return ExitReason.TargetHit;
	}
	return ExitReason.ExternalClose;
}

/** The write lost to a record whose stop is tighter than `stop`. */
function lostToTighterStop(written: WriteResult, stop: number): boolean {
	return written.conflict && written.position.currentStop !== stop && !tightensFrom(written.position, stop);
}

function applied(written: WriteResult): Draft {
	return {
		status: GuardianStatus.Applied,
		stateSync: written.sync,
		position: written.position,
		...(written.conflict
			? { code: GuardianCode.Conflict, reason: "record changed concurrently; state not written" }
			: {}),
	};
}

function exchangeFailure(error: TradingError, position: Position, sync: StateSync = "not_applicable"): Draft {
	return {
		status: GuardianStatus.Failed,
		code: GuardianCode.ExchangeError,
		reason: error.message,
		stateSync: sync,
		position,
	};
}

function marketFailure(error: TradingError, position: Position): Draft {
	return {
		status: GuardianStatus.Failed,
		code: GuardianCode.MarketData,
		reason: error.message,
		stateSync: "not_applicable",
		position,
	};
}
