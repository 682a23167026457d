/**
 * PaperExchange — in-process ExchangeClient for paper trading and tests.
 *
 * Fills market orders at the scripted mark price, keeps a signed position per
 * symbol, holds trigger orders until cancelled or fired, and lets callers
 * inject failures per method. No network calls; deterministic given a
 * FakeClock and zero latency.
 */

import { Decimal } from "../shared/decimal.js";
import { OrderSide } from "../shared/direction.js";
import { MarketDataError, OrderRejectedError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import { orderId } from "../shared/identifiers.js";
import type { OrderId, SymbolId } from "../shared/identifiers.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock, sleep } from "../shared/time.js";
import type {
	ExchangeClient,
	ExchangePosition,
	ExchangeResult,
	Kline,
	LeverageBracket,
	MarketOrderRequest,
	OrderBookSnapshot,
	OrderFill,
	PlacedOrder,
	SymbolFilters,
	TriggerOrderRequest,
} from "./types.js";

export type ExchangeMethod = keyof ExchangeClient;

export const DEFAULT_PAPER_FILTERS: SymbolFilters = {
	tickSize: 0.01,
	stepSize: 0.001,
	minQty: 0.001,
	minPrice: 0.01,
	maxPrice: 1_000_000,
	minNotional: 5,
};

export interface PaperExchangeConfig {
	readonly balance: number;
	readonly clock: Clock;
	/** Artificial delay applied to every call. Default: 0 */
	readonly latencyMs: number;
}

export type TriggerKind = "STOP_MARKET" | "TAKE_PROFIT_MARKET";

export interface PaperTriggerOrder {
	readonly orderId: OrderId;
	readonly symbol: SymbolId;
	readonly kind: TriggerKind;
	readonly side: OrderSide;
	readonly triggerPrice: number;
	readonly placedAt: number;
}

/** One recorded call, in call order, including calls that failed. */
export interface ExchangeCall {
	readonly method: ExchangeMethod;
	readonly symbol: SymbolId | null;
	readonly detail: Record<string, unknown>;
}

interface PaperPosition {
	readonly size: Decimal;
	readonly entryPrice: number;
}

export class PaperExchange implements ExchangeClient {
	private readonly config: PaperExchangeConfig;
	private balance: Decimal;
	private orderCounter = 0;
	private readonly marks = new Map<SymbolId, number>();
	private readonly filters = new Map<SymbolId, SymbolFilters>();
	private readonly books = new Map<SymbolId, OrderBookSnapshot>();
	private readonly klines = new Map<SymbolId, Kline[]>();
	private readonly brackets = new Map<SymbolId, LeverageBracket[]>();
	private readonly positions = new Map<SymbolId, PaperPosition>();
	private readonly triggers = new Map<string, PaperTriggerOrder>();
	private readonly failures = new Map<ExchangeMethod, TradingError[]>();
	private readonly log: ExchangeCall[] = [];
	private readonly realised: { readonly symbol: SymbolId; readonly pnl: number }[] = [];

	constructor(config?: Partial<PaperExchangeConfig>) {
		this.config = {
			balance: config?.balance ?? 1_000,
			clock: config?.clock ?? SystemClock,
			latencyMs: config?.latencyMs ?? 0,
		};
		this.balance = Decimal.from(this.config.balance);
	}

	// ── Scripting ──────────────────────────────────────────────────

	setMarkPrice(symbol: SymbolId, price: number): this {
		this.marks.set(symbol, price);
		return this;
	}

	setBalance(balance: number): this {
		this.balance = Decimal.from(balance);
		return this;
	}

	setFilters(symbol: SymbolId, filters: Partial<SymbolFilters>): this {
		this.filters.set(symbol, { ...DEFAULT_PAPER_FILTERS, ...filters });
		return this;
	}

	setOrderBook(symbol: SymbolId, book: OrderBookSnapshot): this {
		this.books.set(symbol, book);
		return this;
	}

	setKlines(symbol: SymbolId, klines: Kline[]): this {
		this.klines.set(symbol, klines);
		return this;
	}

	setLeverageBrackets(symbol: SymbolId, brackets: LeverageBracket[]): this {
		this.brackets.set(symbol, brackets);
		return this;
	}

	/** Open a position directly, as if filled earlier. */
	seedPosition(symbol: SymbolId, size: number, entryPrice: number): this {
		this.positions.set(symbol, { size: Decimal.from(size), entryPrice });
		return this;
	}

	/** Make the next `times` calls to `method` fail with `error`. */
	failNext(method: ExchangeMethod, error: TradingError, times = 1): this {
		const queue = this.failures.get(method) ?? [];
		for (let i = 0; i < times; i++) queue.push(error);
		this.failures.set(method, queue);
		return this;
	}

	/**
	 * Fire a resting trigger order: flattens the position at its trigger
	 * price and cancels the remaining orders on the symbol.
	 */
	fireTrigger(id: OrderId): boolean {
		const order = this.triggers.get(id);
		if (!order) return false;
		const position = this.positions.get(order.symbol);
		if (position) {
			this.realise(order.symbol, position, position.size.abs(), order.triggerPrice);
			this.positions.delete(order.symbol);
		}
		for (const [key, o] of this.triggers) {
			if (o.symbol === order.symbol) this.triggers.delete(key);
		}
		return true;
	}

	// ── Inspection ─────────────────────────────────────────────────

	calls(method?: ExchangeMethod): readonly ExchangeCall[] {
		return method === undefined ? [...this.log] : this.log.filter((c) => c.method === method);
	}

	openOrders(symbol?: SymbolId): readonly PaperTriggerOrder[] {
		const all = [...this.triggers.values()];
		return symbol === undefined ? all : all.filter((o) => o.symbol === symbol);
	}

	/** Realised PnL per reducing fill, in fill order. */
	realisedPnl(symbol?: SymbolId): readonly number[] {
		return this.realised.filter((r) => symbol === undefined || r.symbol === symbol).map((r) => r.pnl);
	}

	currentBalance(): number {
		return this.balance.toNumber();
	}

	// ── MarketDataSource ───────────────────────────────────────────

	async fetchMarkPrice(symbol: SymbolId): ExchangeResult<number> {
		return this.call("fetchMarkPrice", symbol, {}, () => {
			const mark = this.marks.get(symbol);
			return mark === undefined
				? err(new MarketDataError(`no mark price for ${symbol}`, { symbol }))
				: ok(mark);
		});
	}

	async fetchOrderBook(symbol: SymbolId): ExchangeResult<OrderBookSnapshot> {
		return this.call("fetchOrderBook", symbol, {}, () => {
			const book = this.books.get(symbol);
			if (book) return ok(book);
			const mark = this.marks.get(symbol);
			if (mark === undefined) {
				return err(new MarketDataError(`no order book for ${symbol}`, { symbol }));
			}
			return ok({ bids: [[mark, 1]], asks: [[mark, 1]] });
		});
	}

	async fetchKlines(symbol: SymbolId): ExchangeResult<Kline[]> {
		return this.call("fetchKlines", symbol, {}, () => ok(this.klines.get(symbol) ?? []));
	}

	async fetchExchangeFilters(symbol: SymbolId): ExchangeResult<SymbolFilters> {
		return this.call("fetchExchangeFilters", symbol, {}, () =>
			ok(this.filters.get(symbol) ?? DEFAULT_PAPER_FILTERS),
		);
	}

	async fetchLeverageBrackets(symbol: SymbolId): ExchangeResult<LeverageBracket[]> {
		return this.call("fetchLeverageBrackets", symbol, {}, () =>
			ok(this.brackets.get(symbol) ?? []),
		);
	}

	// ── Account ────────────────────────────────────────────────────

	async getBalance(): ExchangeResult<number> {
		return this.call("getBalance", null, {}, () => ok(this.balance.toNumber()));
	}

	async getPosition(symbol: SymbolId): ExchangeResult<ExchangePosition | null> {
		return this.call("getPosition", symbol, {}, () => {
			const position = this.positions.get(symbol);
			if (!position || position.size.isZero()) return ok(null);
			const mark = this.marks.get(symbol) ?? position.entryPrice;
			const pnl = Decimal.from(mark)
				.sub(Decimal.from(position.entryPrice))
				.mul(position.size)
				.toNumber();
			return ok({
				symbol,
				size: position.size.toNumber(),
				entryPrice: position.entryPrice,
				markPrice: mark,
				unrealizedPnl: pnl,
			});
		});
	}

	async placeMarketOrder(req: MarketOrderRequest): ExchangeResult<OrderFill> {
		return this.call("placeMarketOrder", req.symbol, { ...req }, () => this.fillMarket(req));
	}

	async placeStopMarket(req: TriggerOrderRequest): ExchangeResult<PlacedOrder> {
		return this.call("placeStopMarket", req.symbol, { ...req }, () =>
			this.placeTrigger("STOP_MARKET", req),
		);
	}

	async placeTakeProfitMarket(req: TriggerOrderRequest): ExchangeResult<PlacedOrder> {
		return this.call("placeTakeProfitMarket", req.symbol, { ...req }, () =>
			this.placeTrigger("TAKE_PROFIT_MARKET", req),
		);
	}

	async cancelOrder(symbol: SymbolId, id: OrderId): ExchangeResult<void> {
		return this.call("cancelOrder", symbol, { orderId: id }, () => {
			const order = this.triggers.get(id);
			if (!order || order.symbol !== symbol) {
				return err(new OrderRejectedError("Unknown order sent", { symbol, orderId: id }));
			}
			this.triggers.delete(id);
			return ok(undefined);
		});
	}

	async cancelAllOrders(symbol: SymbolId): ExchangeResult<number> {
		return this.call("cancelAllOrders", symbol, {}, () => {
			let cancelled = 0;
			for (const [key, order] of this.triggers) {
				if (order.symbol === symbol) {
					this.triggers.delete(key);
					cancelled++;
				}
			}
			return ok(cancelled);
		});
	}

	// ── Internals ──────────────────────────────────────────────────

	private async call<T>(
		method: ExchangeMethod,
		symbol: SymbolId | null,
		detail: Record<string, unknown>,
		run: () => Result<T, TradingError>,
	): ExchangeResult<T> {
		this.log.push({ method, symbol, detail });
		if (this.config.latencyMs > 0) await sleep(this.config.latencyMs);
		const injected = this.failures.get(method)?.shift();
		if (injected) return err(injected);
		return run();
	}

	private nextOrderId(): OrderId {
		this.orderCounter++;
		return orderId(`paper-${this.orderCounter}`);
	}

	private fillMarket(req: MarketOrderRequest): Result<OrderFill, TradingError> {
		const mark = this.marks.get(req.symbol);
		if (mark === undefined) {
			return err(new OrderRejectedError(`no price for ${req.symbol}`, { symbol: req.symbol }));
		}
		if (req.quantity <= 0) {
			return err(new OrderRejectedError("Quantity less than or equal to zero", { ...req }));
		}

		const signedQty = Decimal.from(req.side === OrderSide.Buy ? req.quantity : -req.quantity);
		const existing = this.positions.get(req.symbol);
		const id = this.nextOrderId();

		if (req.reduceOnly) {
			if (!existing || existing.size.isZero() || existing.size.isPositive() === signedQty.isPositive()) {
				return err(new OrderRejectedError("ReduceOnly Order is rejected", { ...req }));
			}
			const closeQty = Decimal.min(signedQty.abs(), existing.size.abs());
			this.realise(req.symbol, existing, closeQty, mark);
			const remaining = existing.size.isPositive()
				? existing.size.sub(closeQty)
				: existing.size.add(closeQty);
			if (remaining.isZero()) {
				this.positions.delete(req.symbol);
			} else {
				this.positions.set(req.symbol, { size: remaining, entryPrice: existing.entryPrice });
			}
			return ok({ orderId: id, avgPrice: mark, executedQty: closeQty.toNumber() });
		}

		if (!existing) {
			this.positions.set(req.symbol, { size: signedQty, entryPrice: mark });
		} else {
			const total = existing.size.add(signedQty);
			const weighted = existing.size
				.abs()
				.mul(Decimal.from(existing.entryPrice))
				.add(signedQty.abs().mul(Decimal.from(mark)));
			const qty = existing.size.abs().add(signedQty.abs());
			this.positions.set(req.symbol, { size: total, entryPrice: weighted.div(qty).toNumber() });
		}
		return ok({ orderId: id, avgPrice: mark, executedQty: req.quantity });
	}

	private placeTrigger(
		kind: TriggerKind,
		req: TriggerOrderRequest,
	): Result<PlacedOrder, TradingError> {
		const mark = this.marks.get(req.symbol);
		if (mark !== undefined && wouldTriggerImmediately(kind, req.side, req.triggerPrice, mark)) {
			return err(
				new OrderRejectedError("Order would immediately trigger.", {
					symbol: req.symbol,
					triggerPrice: req.triggerPrice,
					markPrice: mark,
				}),
			);
		}
		const id = this.nextOrderId();
		this.triggers.set(id, {
			orderId: id,
			symbol: req.symbol,
			kind,
			side: req.side,
			triggerPrice: req.triggerPrice,
			placedAt: this.config.clock.now(),
		});
		return ok({ orderId: id });
	}

	private realise(symbol: SymbolId, position: PaperPosition, qty: Decimal, price: number): void {
		const move = Decimal.from(price).sub(Decimal.from(position.entryPrice));
		const pnl = position.size.isPositive() ? move.mul(qty) : move.neg().mul(qty);
		this.balance = this.balance.add(pnl);
		this.realised.push({ symbol, pnl: pnl.toNumber() });
	}
}

function wouldTriggerImmediately(
	kind: TriggerKind,
	side: OrderSide,
	trigger: number,
	mark: number,
): boolean {
	// SELL stop closes a long below mark; SELL take-profit closes it above.
	if (kind === "STOP_MARKET") {
		return side === OrderSide.Sell ? trigger >= mark : trigger <= mark;
	}
	return side === OrderSide.Sell ? trigger <= mark : trigger >= mark;
}
