export type {
	ExchangeClient,
	ExchangePosition,
	ExchangeResult,
	Kline,
	LeverageBracket,
	MarketDataSource,
	MarketOrderRequest,
	OrderBookSnapshot,
	OrderFill,
	PlacedOrder,
	SymbolFilters,
	TriggerOrderRequest,
} from "./types.js";
export {
	DEFAULT_PAPER_FILTERS,
	PaperExchange,
	type ExchangeCall,
	type ExchangeMethod,
	type PaperExchangeConfig,
	type PaperTriggerOrder,
	type TriggerKind,
} from "./paper-exchange.js";
export { BoundedExchange } from "./bounded-exchange.js";
