/**
 * Branded identifier strings.
 *
 * Prevents passing an AccountId where a StrategyId is expected, and keeps
 * symbol normalisation (upper-case, trimmed) in one place.
 */

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** Exchange account ("user") the core trades on behalf of. */
export type AccountId = Brand<string, "AccountId">;
/** Strategy whose signals an account subscribes to. */
export type StrategyId = Brand<string, "StrategyId">;
/** Futures symbol, always upper-case (e.g. BTCUSDT). */
export type SymbolId = Brand<string, "SymbolId">;
/** Exchange-assigned order identifier. */
export type OrderId = Brand<string, "OrderId">;

function brand<B extends string>(value: string, label: B): Brand<string, B> {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error(`${label} cannot be empty`);
	}
	return trimmed as Brand<string, B>;
}

export function accountId(value: string): AccountId {
	return brand(value, "AccountId");
}

export function strategyId(value: string): StrategyId {
	return brand(value, "StrategyId");
}

/** Create a SymbolId; the value is upper-cased. */
export function symbolId(value: string): SymbolId {
	return brand(value.toUpperCase(), "SymbolId");
}

export function orderId(value: string | number): OrderId {
	return brand(String(value), "OrderId");
}

/** Composite key for per-(account, symbol) records. */
export function positionKey(account: AccountId, symbol: SymbolId): string {
	return `${account}:${symbol}`;
}

/** Composite key for per-(account, strategy) records. */
export function accountStrategyKey(account: AccountId, strategy: StrategyId): string {
	return `${account}:${strategy}`;
}
