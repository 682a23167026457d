import type { Direction } from "../shared/direction.js";
import type { StrategyId, SymbolId } from "../shared/identifiers.js";

export interface TradeSignal {
	readonly strategyId: StrategyId;
	readonly symbol: SymbolId;
	readonly direction: Direction;
	readonly entryPrice: number;
	readonly stopPrice: number;
	readonly targetPrice: number;
	readonly riskReward: number;
	readonly probability: number;
	/** 1 (best) .. 10 (worst). */
	readonly tier: number;
	readonly signalQualityScore: number;
	/** Epoch ms the signal was received by the core. */
	readonly receivedAt: number;
}
