/**
 * Exchange boundary — the fallible remote collaborator the core trades through.
 *
 * One ExchangeClient per account. Every call returns a Result; transport,
 * signing and rate limiting live behind the implementation.
 */

import type { OrderSide } from "../shared/direction.js";
import type { TradingError } from "../shared/errors.js";
import type { OrderId, SymbolId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";

export type ExchangeResult<T> = Promise<Result<T, TradingError>>;

// ── Market facts ─────────────────────────────────────────────────────

export interface OrderBookSnapshot {
	/** [price, quantity], best first. */
	readonly bids: readonly (readonly [number, number])[];
	readonly asks: readonly (readonly [number, number])[];
}

export interface Kline {
	readonly openTime: number;
	readonly open: number;
	readonly high: number;
	readonly low: number;
	readonly close: number;
	readonly volume: number;
}

export interface SymbolFilters {
	readonly tickSize: number;
	readonly stepSize: number;
	readonly minQty: number;
	readonly minPrice: number;
	readonly maxPrice: number;
	readonly minNotional: number;
}

export interface LeverageBracket {
	readonly bracket: number;
	readonly initialLeverage: number;
	readonly notionalCap: number;
	readonly notionalFloor: number;
	readonly maintMarginRatio: number;
}

/** Read-only market fact fetches; these are the calls worth caching. */
export interface MarketDataSource {
	fetchMarkPrice(symbol: SymbolId): ExchangeResult<number>;
	fetchOrderBook(symbol: SymbolId): ExchangeResult<OrderBookSnapshot>;
	fetchKlines(symbol: SymbolId): ExchangeResult<Kline[]>;
	fetchExchangeFilters(symbol: SymbolId): ExchangeResult<SymbolFilters>;
	fetchLeverageBrackets(symbol: SymbolId): ExchangeResult<LeverageBracket[]>;
}

// ── Account state & orders ───────────────────────────────────────────

export interface ExchangePosition {
	readonly symbol: SymbolId;
	/** Signed: positive long, negative short, 0 flat. */
	readonly size: number;
	readonly entryPrice: number;
	readonly markPrice: number;
	readonly unrealizedPnl: number;
}

export interface MarketOrderRequest {
	readonly symbol: SymbolId;
	readonly side: OrderSide;
	readonly quantity: number;
	readonly reduceOnly: boolean;
}

/** STOP_MARKET / TAKE_PROFIT_MARKET that closes the whole position when triggered. */
export interface TriggerOrderRequest {
	readonly symbol: SymbolId;
	readonly side: OrderSide;
	readonly triggerPrice: number;
}

export interface OrderFill {
	readonly orderId: OrderId;
	readonly avgPrice: number;
	readonly executedQty: number;
}

export interface PlacedOrder {
	readonly orderId: OrderId;
}

export interface ExchangeClient extends MarketDataSource {
	/** Available quote-currency balance (USDT). */
	getBalance(): ExchangeResult<number>;
	/** Current position, or null when flat. */
	getPosition(symbol: SymbolId): ExchangeResult<ExchangePosition | null>;
	placeMarketOrder(req: MarketOrderRequest): ExchangeResult<OrderFill>;
	placeStopMarket(req: TriggerOrderRequest): ExchangeResult<PlacedOrder>;
	placeTakeProfitMarket(req: TriggerOrderRequest): ExchangeResult<PlacedOrder>;
	cancelOrder(symbol: SymbolId, orderId: OrderId): ExchangeResult<void>;
	/** Cancel every open order on the symbol; returns how many were cancelled. */
	cancelAllOrders(symbol: SymbolId): ExchangeResult<number>;
}
