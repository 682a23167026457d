export type { TradeSignal } from "./trade-signal.js";
