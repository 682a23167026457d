export {
	FACT_TTL_MS,
	MarketDataCache,
	factKey,
	type CachedFact,
	type FactKind,
	type FactSource,
	type MarketCacheStats,
	type MarketDataCacheConfig,
	type MarketFacts,
} from "./market-data-cache.js";
