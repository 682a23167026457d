export type { Journal } from "./journal.js";
export { FileJournal } from "./file-journal.js";
export type { CorruptLine, FileJournalConfig, RestoreResult } from "./file-journal.js";
export { MemoryJournal, type MemoryJournalConfig } from "./memory-journal.js";
export { MemoryStore, type SharedStore, type StoreResult } from "./shared-store.js";
export { PositionStore, type CompareAndSetOutcome } from "./position-store.js";
export {
	ExitReason,
	MemoryTradeHistory,
	type HistoryResult,
	type NewTradeRecord,
	type TradeExit,
	type TradeHistoryRecord,
	type TradeHistoryRepository,
} from "./trade-history.js";
export { TradePauseStore, type TradePauseState } from "./trade-pause-store.js";
