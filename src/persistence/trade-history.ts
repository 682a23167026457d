/**
 * TradeHistoryRepository — relational-store port for trade rows.
 *
 * A row is written at entry with exit fields null and completed exactly once
 * at exit; a completed row is never mutated again.
 */

import type { Direction } from "../shared/direction.js";
import { StateConflictError, StoreUnavailableError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import type { AccountId, OrderId, StrategyId, SymbolId } from "../shared/identifiers.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";

export const ExitReason = {
	ManualClose: "manual_close",
	StopHit: "stop_hit",
	TargetHit: "target_hit",
	ExternalClose: "external_close",
} as const;

export type ExitReason = (typeof ExitReason)[keyof typeof ExitReason];

export interface TradeHistoryRecord {
	readonly id: string;
	readonly accountId: AccountId;
	readonly strategyId: StrategyId;
	readonly symbol: SymbolId;
	readonly direction: Direction;
	readonly quantity: number;
	readonly entryTime: number;
	readonly entryPrice: number;
	readonly exitTime: number | null;
	readonly exitPrice: number | null;
	readonly exitReason: ExitReason | null;
	readonly pnlPct: number | null;
	readonly pnlUsdt: number | null;
	readonly orderId: OrderId | null;
	readonly slOrderId: OrderId | null;
	readonly tpOrderId: OrderId | null;
}

export type NewTradeRecord = Omit<
	TradeHistoryRecord,
	"id" | "exitTime" | "exitPrice" | "exitReason" | "pnlPct" | "pnlUsdt"
>;

export interface TradeExit {
	readonly exitTime: number;
	readonly exitPrice: number;
	readonly exitReason: ExitReason;
	readonly pnlPct: number;
	readonly pnlUsdt: number;
}

export type HistoryResult<T> = Promise<Result<T, TradingError>>;

export interface TradeHistoryRepository {
	recordEntry(entry: NewTradeRecord): HistoryResult<TradeHistoryRecord>;
	/** Fails if the row is missing or already closed. */
	completeExit(id: string, exit: TradeExit): HistoryResult<TradeHistoryRecord>;
	/** Closed rows for (account, strategy) with `exitTime >= sinceMs`, oldest exit first. */
	closedSince(account: AccountId, strategy: StrategyId, sinceMs: number): HistoryResult<TradeHistoryRecord[]>;
	/** The open row for (account, symbol), if any. */
	findOpen(account: AccountId, symbol: SymbolId): HistoryResult<TradeHistoryRecord | undefined>;
	/** Most recent entry on (account, strategy, symbol, direction), open or closed. */
	lastOpened(
		account: AccountId,
		strategy: StrategyId,
		symbol: SymbolId,
		direction: Direction,
	): HistoryResult<TradeHistoryRecord | undefined>;
}

/** In-process repository; `setAvailable(false)` simulates an outage. */
export class MemoryTradeHistory implements TradeHistoryRepository {
	private readonly rows = new Map<string, TradeHistoryRecord>();
	private counter = 0;
	private available = true;

	setAvailable(available: boolean): void {
		this.available = available;
	}

	/** Insert a fully formed row (fixtures). */
	seed(row: Omit<TradeHistoryRecord, "id">): TradeHistoryRecord {
		const record = { ...row, id: this.nextId() };
		this.rows.set(record.id, record);
		return record;
	}

	all(): readonly TradeHistoryRecord[] {
		return [...this.rows.values()];
	}

	async recordEntry(entry: NewTradeRecord): HistoryResult<TradeHistoryRecord> {
		if (!this.available) return this.outage("recordEntry");
		const record: TradeHistoryRecord = {
			...entry,
			id: this.nextId(),
			exitTime: null,
			exitPrice: null,
			exitReason: null,
			pnlPct: null,
			pnlUsdt: null,
		};
		this.rows.set(record.id, record);
		return ok(record);
	}

	async completeExit(id: string, exit: TradeExit): HistoryResult<TradeHistoryRecord> {
		if (!this.available) return this.outage("completeExit");
		const row = this.rows.get(id);
		if (!row) return err(new StateConflictError(`trade ${id} not found`, { id }));
		if (row.exitReason !== null) {
			return err(new StateConflictError(`trade ${id} already closed`, { id, exitReason: row.exitReason }));
		}
		const completed: TradeHistoryRecord = { ...row, ...exit };
		this.rows.set(id, completed);
		return ok(completed);
	}

	async closedSince(
		account: AccountId,
		strategy: StrategyId,
		sinceMs: number,
	): HistoryResult<TradeHistoryRecord[]> {
		if (!this.available) return this.outage("closedSince");
		const rows = [...this.rows.values()].filter(
			(r) =>
				r.accountId === account &&
				r.strategyId === strategy &&
				r.exitTime !== null &&
				r.exitTime >= sinceMs,
		);
		rows.sort((a, b) => (a.exitTime ?? 0) - (b.exitTime ?? 0));
		return ok(rows);
	}

	async findOpen(account: AccountId, symbol: SymbolId): HistoryResult<TradeHistoryRecord | undefined> {
		if (!this.available) return this.outage("findOpen");
		let latest: TradeHistoryRecord | undefined;
		for (const r of this.rows.values()) {
			if (r.accountId !== account || r.symbol !== symbol || r.exitReason !== null) continue;
			if (!latest || r.entryTime > latest.entryTime) latest = r;
		}
		return ok(latest);
	}

	async lastOpened(
		account: AccountId,
		strategy: StrategyId,
		symbol: SymbolId,
		direction: Direction,
	): HistoryResult<TradeHistoryRecord | undefined> {
		if (!this.available) return this.outage("lastOpened");
		let latest: TradeHistoryRecord | undefined;
		for (const r of this.rows.values()) {
			if (
				r.accountId !== account ||
				r.strategyId !== strategy ||
				r.symbol !== symbol ||
				r.direction !== direction
			) {
				continue;
			}
			if (!latest || r.entryTime > latest.entryTime) latest = r;
		}
		return ok(latest);
	}

	private nextId(): string {
		this.counter++;
		return `trade-${this.counter}`;
	}

	private outage(op: string): Result<never, TradingError> {
		return err(new StoreUnavailableError(`trade history unavailable during ${op}`));
	}
}
