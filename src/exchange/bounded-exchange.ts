/**
 * Puts a timeout on every call of a wrapped ExchangeClient.
 *
 * A call that outlives the budget resolves to a TimeoutError result, and a
 * call that throws resolves to its classified error, so callers only ever
 * see Results.
 */

import { TimeoutError, classifyError } from "../shared/errors.js";
import type { OrderId, SymbolId } from "../shared/identifiers.js";
import { err } from "../shared/result.js";
import { withTimeout } from "../shared/time.js";
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

export class BoundedExchange implements ExchangeClient {
	private readonly inner: ExchangeClient;
	private readonly timeoutMs: number;

	constructor(inner: ExchangeClient, timeoutMs: number) {
		this.inner = inner;
		this.timeoutMs = timeoutMs;
	}

	fetchMarkPrice(symbol: SymbolId): ExchangeResult<number> {
		return this.bound("fetchMarkPrice", () => this.inner.fetchMarkPrice(symbol));
	}

	fetchOrderBook(symbol: SymbolId): ExchangeResult<OrderBookSnapshot> {
		return this.bound("fetchOrderBook", () => this.inner.fetchOrderBook(symbol));
	}

	fetchKlines(symbol: SymbolId): ExchangeResult<Kline[]> {
		return this.bound("fetchKlines", () => this.inner.fetchKlines(symbol));
	}

	fetchExchangeFilters(symbol: SymbolId): ExchangeResult<SymbolFilters> {
		return this.bound("fetchExchangeFilters", () => this.inner.fetchExchangeFilters(symbol));
	}

	fetchLeverageBrackets(symbol: SymbolId): ExchangeResult<LeverageBracket[]> {
		return this.bound("fetchLeverageBrackets", () => this.inner.fetchLeverageBrackets(symbol));
	}

	getBalance(): ExchangeResult<number> {
		return this.bound("getBalance", () => this.inner.getBalance());
	}

	getPosition(symbol: SymbolId): ExchangeResult<ExchangePosition | null> {
		return this.bound("getPosition", () => this.inner.getPosition(symbol));
	}

	placeMarketOrder(req: MarketOrderRequest): ExchangeResult<OrderFill> {
		return this.bound("placeMarketOrder", () => this.inner.placeMarketOrder(req));
	}

	placeStopMarket(req: TriggerOrderRequest): ExchangeResult<PlacedOrder> {
		return this.bound("placeStopMarket", () => this.inner.placeStopMarket(req));
	}

	placeTakeProfitMarket(req: TriggerOrderRequest): ExchangeResult<PlacedOrder> {
		return this.bound("placeTakeProfitMarket", () => this.inner.placeTakeProfitMarket(req));
	}

	cancelOrder(symbol: SymbolId, orderId: OrderId): ExchangeResult<void> {
		return this.bound("cancelOrder", () => this.inner.cancelOrder(symbol, orderId));
	}

	cancelAllOrders(symbol: SymbolId): ExchangeResult<number> {
		return this.bound("cancelAllOrders", () => this.inner.cancelAllOrders(symbol));
	}

	private async bound<T>(method: string, call: () => ExchangeResult<T>): ExchangeResult<T> {
		try {
			return await withTimeout(
				call(),
				this.timeoutMs,
				() => new TimeoutError(`${method} timed out after ${this.timeoutMs}ms`, { method }),
			);
		} catch (e) {
			return err(classifyError(e));
		}
	}
}
