/**
 * MarketDataCache — cache-with-fallback for short-lived market facts.
 *
 * Serves mark price, order book, klines, exchange filters and leverage
 * brackets from the shared store while younger than their freshness budget;
 * otherwise fetches live, writes back with a fresh timestamp and returns
 * `source: "live"`. A stale value is never returned in place of a failed
 * live fetch: the failure comes back as MarketDataError.
 */

import type {
	Kline,
	LeverageBracket,
	MarketDataSource,
	OrderBookSnapshot,
	SymbolFilters,
} from "../exchange/types.js";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { validate, z } from "../lib/validation/index.js";
import type { SharedStore } from "../persistence/shared-store.js";
import { MarketDataError, TimeoutError, classifyError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import type { SymbolId } from "../shared/identifiers.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { Duration, SystemClock, withTimeout } from "../shared/time.js";

/** Value type per fact kind. */
export interface MarketFacts {
	readonly mark_price: number;
	readonly order_book: OrderBookSnapshot;
	readonly klines: Kline[];
	readonly exchange_filters: SymbolFilters;
	readonly leverage_brackets: LeverageBracket[];
}

export type FactKind = keyof MarketFacts;

/** Freshness budget per fact kind. */
export const FACT_TTL_MS: Readonly<Record<FactKind, number>> = {
	mark_price: Duration.seconds(30),
	order_book: Duration.seconds(4),
	klines: Duration.seconds(60),
	exchange_filters: Duration.hours(1),
	leverage_brackets: Duration.hours(1),
};

export type FactSource = "live" | "cache";

export interface CachedFact<T> {
	readonly value: T;
	readonly capturedAt: number;
	readonly source: FactSource;
}

export interface MarketCacheStats {
	readonly hits: number;
	readonly misses: number;
	readonly liveFetches: number;
	readonly liveFailures: number;
	readonly storeErrors: number;
}

// ── Stored shapes ───────────────────────────────────────────────────

const levelSchema = z.tuple([z.number(), z.number()]);

const FACT_SCHEMAS: { readonly [K in FactKind]: z.ZodType<MarketFacts[K], z.ZodTypeDef, unknown> } =
	{
		mark_price: z.number().positive(),
		order_book: z.object({ bids: z.array(levelSchema), asks: z.array(levelSchema) }),
		klines: z.array(
			z.object({
				openTime: z.number(),
				open: z.number(),
				high: z.number(),
				low: z.number(),
				close: z.number(),
				volume: z.number(),
			}),
		),
		exchange_filters: z.object({
			tickSize: z.number().positive(),
			stepSize: z.number().positive(),
			minQty: z.number().nonnegative(),
			minPrice: z.number().nonnegative(),
			maxPrice: z.number().positive(),
			minNotional: z.number().nonnegative(),
		}),
		leverage_brackets: z.array(
			z.object({
				bracket: z.number(),
				initialLeverage: z.number(),
				notionalCap: z.number(),
				notionalFloor: z.number(),
				maintMarginRatio: z.number(),
			}),
		),
	};

const envelopeSchema = z.object({ value: z.unknown(), capturedAt: z.number() });

type Fetchers = {
	readonly [K in FactKind]: (symbol: SymbolId) => Promise<Result<MarketFacts[K], TradingError>>;
};

function fetchersFor(source: MarketDataSource): Fetchers {
	return {
		mark_price: (s) => source.fetchMarkPrice(s),
		order_book: (s) => source.fetchOrderBook(s),
		klines: (s) => source.fetchKlines(s),
		exchange_filters: (s) => source.fetchExchangeFilters(s),
		leverage_brackets: (s) => source.fetchLeverageBrackets(s),
	};
}

export function factKey(kind: FactKind, symbol: SymbolId): string {
	return `market:${kind}:${symbol}`;
}

// ── Cache ────────────────────────────────────────────────────────────

export interface MarketDataCacheConfig {
	readonly store: SharedStore;
	readonly source: MarketDataSource;
	readonly clock?: Clock | undefined;
	readonly logger?: Logger | undefined;
	/** Upper bound on a single live fetch. Default: 5s */
	readonly liveTimeoutMs?: number | undefined;
	readonly ttlOverrides?: Partial<Record<FactKind, number>> | undefined;
}

export class MarketDataCache {
	private readonly store: SharedStore;
	private readonly fetchers: Fetchers;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly liveTimeoutMs: number;
	private readonly ttls: Readonly<Record<FactKind, number>>;
	private hits = 0;
	private misses = 0;
	private liveFetches = 0;
	private liveFailures = 0;
	private storeErrors = 0;

	constructor(config: MarketDataCacheConfig) {
		this.store = config.store;
		this.fetchers = fetchersFor(config.source);
		this.clock = config.clock ?? SystemClock;
		this.logger = (config.logger ?? silentLogger()).child({ component: "market-data-cache" });
		this.liveTimeoutMs = config.liveTimeoutMs ?? Duration.seconds(5);
		this.ttls = { ...FACT_TTL_MS, ...config.ttlOverrides };
	}

	/** Fresh value for `kind` on `symbol`, from the store when young enough, else live. */
	async get<K extends FactKind>(
		kind: K,
		symbol: SymbolId,
	): Promise<Result<CachedFact<MarketFacts[K]>, TradingError>> {
		const cached = await this.readStored(kind, symbol);
		if (cached) {
			this.hits++;
			return ok(cached);
		}
		this.misses++;
		return this.refresh(kind, symbol);
	}

	/** Bypass the store and fetch live, writing the value back. */
	async refresh<K extends FactKind>(
		kind: K,
		symbol: SymbolId,
	): Promise<Result<CachedFact<MarketFacts[K]>, TradingError>> {
		this.liveFetches++;
		const live = await this.fetchLive(kind, symbol);
		if (!live.ok) {
			this.liveFailures++;
			this.logger.error(
				{ kind, symbol, err: live.error.message, code: live.error.code },
				"live market fetch failed",
			);
			return err(
				new MarketDataError(`${kind} unavailable for ${symbol}: ${live.error.message}`, {
					kind,
					symbol,
					cause: live.error,
				}),
			);
		}

		const capturedAt = this.clock.now();
		const written = await this.store.set(
			factKey(kind, symbol),
			JSON.stringify({ value: live.value, capturedAt }),
			this.ttls[kind],
		);
		if (!written.ok) {
			this.storeErrors++;
			this.logger.warn({ kind, symbol, err: written.error.message }, "market cache write-back failed");
		}
		return ok({ value: live.value, capturedAt, source: "live" });
	}

	async invalidate(kind: FactKind, symbol: SymbolId): Promise<void> {
		const removed = await this.store.delete(factKey(kind, symbol));
		if (!removed.ok) {
			this.storeErrors++;
			this.logger.warn({ kind, symbol, err: removed.error.message }, "market cache invalidate failed");
		}
	}

	stats(): MarketCacheStats {
		return {
			hits: this.hits,
			misses: this.misses,
			liveFetches: this.liveFetches,
			liveFailures: this.liveFailures,
			storeErrors: this.storeErrors,
		};
	}

	ttlFor(kind: FactKind): number {
		return this.ttls[kind];
	}

	private async readStored<K extends FactKind>(
		kind: K,
		symbol: SymbolId,
	): Promise<CachedFact<MarketFacts[K]> | null> {
		const raw = await this.store.get(factKey(kind, symbol));
		if (!raw.ok) {
			this.storeErrors++;
			this.logger.warn({ kind, symbol, err: raw.error.message }, "market cache read failed");
			return null;
		}
		if (raw.value === undefined) return null;

		let parsed: unknown;
		try {
			parsed = JSON.parse(raw.value);
		} catch {
			this.logger.warn({ kind, symbol }, "discarding unparsable cached market fact");
			return null;
		}
		const envelope = validate(envelopeSchema, parsed);
		if (!envelope.ok) return null;
		const value = validate(FACT_SCHEMAS[kind], envelope.value.value);
		if (!value.ok) {
			this.logger.warn({ kind, symbol, issues: value.error.describe() }, "discarding invalid cached market fact");
			return null;
		}

		const age = this.clock.now() - envelope.value.capturedAt;
		if (age < 0 || age >= this.ttls[kind]) return null;
		return { value: value.value, capturedAt: envelope.value.capturedAt, source: "cache" };
	}

	private async fetchLive<K extends FactKind>(
		kind: K,
		symbol: SymbolId,
	): Promise<Result<MarketFacts[K], TradingError>> {
		const fetcher: (s: SymbolId) => Promise<Result<MarketFacts[K], TradingError>> =
			this.fetchers[kind];
		try {
			return await withTimeout(
				fetcher(symbol),
				this.liveTimeoutMs,
				() => new TimeoutError(`${kind} fetch exceeded ${this.liveTimeoutMs}ms`, { symbol }),
			);
		} catch (e) {
			return err(classifyError(e));
		}
	}
}
