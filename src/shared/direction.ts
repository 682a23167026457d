/**
 * Position direction and the order sides derived from it.
 */

export const Direction = {
	Long: "LONG",
	Short: "SHORT",
} as const;

export type Direction = (typeof Direction)[keyof typeof Direction];

export const OrderSide = {
	Buy: "BUY",
	Sell: "SELL",
} as const;

export type OrderSide = (typeof OrderSide)[keyof typeof OrderSide];

/** Side of the order that opens a position in this direction. */
export function entrySide(direction: Direction): OrderSide {
	return direction === Direction.Long ? OrderSide.Buy : OrderSide.Sell;
}

/** Side of the reduce-only / protective orders that close it. */
export function exitSide(direction: Direction): OrderSide {
	return direction === Direction.Long ? OrderSide.Sell : OrderSide.Buy;
}

/** +1 for LONG, -1 for SHORT: multiplies price moves into PnL. */
export function directionSign(direction: Direction): 1 | -1 {
	return direction === Direction.Long ? 1 : -1;
}

/** Parse LONG/SHORT/BUY/SELL (any case) into a Direction, or null. */
export function parseDirection(raw: string): Direction | null {
	switch (raw.trim().toUpperCase()) {
		case "LONG":
		case "BUY":
			return Direction.Long;
		case "SHORT":
		case "SELL":
			return Direction.Short;
		default:
			return null;
	}
}
