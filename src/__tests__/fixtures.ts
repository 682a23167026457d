/**
 * Shared builders for tests: profiles, signals, account state and a fully
 * wired in-process core (paper exchanges, memory stores, fake clock).
 */

import { AlertBus } from "../audit/alerts.js";
import type { CoreAlert } from "../audit/alerts.js";
import { AuditLog } from "../audit/audit-log.js";
import type { AuditRecord } from "../audit/audit-log.js";
import { PaperExchange } from "../exchange/paper-exchange.js";
import type { ExchangeClient } from "../exchange/types.js";
import { EntryExecutor } from "../execution/entry-executor.js";
import { MarketDataCache } from "../market/market-data-cache.js";
import { MemoryJournal } from "../persistence/memory-journal.js";
import { PositionStore } from "../persistence/position-store.js";
import { MemoryStore } from "../persistence/shared-store.js";
import type { StoreResult } from "../persistence/shared-store.js";
import { MemoryTradeHistory } from "../persistence/trade-history.js";
import type { TradeHistoryRecord } from "../persistence/trade-history.js";
import { PositionGuardian } from "../position/guardian.js";
import type { Position } from "../position/types.js";
import { parseRiskProfile } from "../risk/profile.js";
import type { RiskProfile, StoredRiskProfile } from "../risk/profile.js";
import type { AccountState } from "../risk/types.js";
import type { TradeSignal } from "../signal/trade-signal.js";
import type { CoreConfig } from "../shared/config.js";
import { Direction } from "../shared/direction.js";
import { StoreUnavailableError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import { accountId, orderId, strategyId, symbolId } from "../shared/identifiers.js";
import type { AccountId } from "../shared/identifiers.js";
import { err, ok, unwrap } from "../shared/result.js";
import { FakeClock } from "../shared/time.js";

/** Monday 2024-01-01 10:00:00 UTC. */
export const MONDAY_10_UTC = Date.UTC(2024, 0, 1, 10, 0, 0);

export const ACC_A = accountId("acc-a");
export const ACC_B = accountId("acc-b");
export const STRATEGY = strategyId("breakout");
export const BTC = symbolId("BTCUSDT");

export function makeProfile(overrides: Partial<StoredRiskProfile> = {}): RiskProfile {
	return unwrap(
		parseRiskProfile({
			account_id: ACC_A,
			strategy_id: STRATEGY,
			...overrides,
		}),
	);
}

export function makeSignal(overrides: Partial<TradeSignal> = {}): TradeSignal {
	return {
		strategyId: STRATEGY,
		symbol: BTC,
		direction: Direction.Long,
		entryPrice: 45_000,
		stopPrice: 44_000,
		targetPrice: 48_000,
		riskReward: 3,
		probability: 60,
		tier: 3,
		signalQualityScore: 80,
		receivedAt: MONDAY_10_UTC,
		...overrides,
	};
}

/** Account state whose balance query is counted; pass an error to make it fail. */
export function makeAccount(
	balance: number | TradingError,
	id: AccountId = ACC_A,
): AccountState & { readonly balanceQueries: () => number } {
	let queries = 0;
	return {
		accountId: id,
		async currentBalance() {
			queries++;
			return typeof balance === "number" ? ok(balance) : err(balance);
		},
		balanceQueries: () => queries,
	};
}

/** A closed trade row, ready for `MemoryTradeHistory.seed`. */
/** Guardian record for a long 0.01 BTC at 45000, stop 44000, target 48000. */
export function makePosition(overrides: Partial<Position> = {}): Position {
	return {
		accountId: ACC_A,
		strategyId: STRATEGY,
		symbol: BTC,
		direction: Direction.Long,
		entryPrice: 45_000,
		quantity: 0.01,
		currentStop: 44_000,
		currentTarget: 48_000,
		orderId: orderId("paper-1"),
		slOrderId: orderId("paper-2"),
		tpOrderId: orderId("paper-3"),
		levelApplied: "initial",
		levelThresholdPct: null,
		previousLevel: null,
		lastAdjustmentTs: MONDAY_10_UTC,
		previousStop: null,
		openedAt: MONDAY_10_UTC,
		halfClosed: false,
		realisedPnlUsdt: 0,
		tradeId: "trade-1",
		...overrides,
	};
}

export function closedTrade(
	exitTime: number,
	pnlUsdt: number,
	overrides: Partial<Omit<TradeHistoryRecord, "id">> = {},
): Omit<TradeHistoryRecord, "id"> {
	return {
		accountId: ACC_A,
		strategyId: STRATEGY,
		symbol: BTC,
		direction: Direction.Long,
		quantity: 0.01,
		entryTime: exitTime - 600_000,
		entryPrice: 45_000,
		exitTime,
		exitPrice: 45_000 + pnlUsdt * 100,
		exitReason: pnlUsdt < 0 ? "stop_hit" : "target_hit",
		pnlPct: pnlUsdt / 4.5,
		pnlUsdt,
		orderId: null,
		slOrderId: null,
		tpOrderId: null,
		...overrides,
	};
}

// ── Wired core ──────────────────────────────────────────────────────

export interface TestCore {
	readonly clock: FakeClock;
	readonly store: MemoryStore;
	readonly positions: PositionStore;
	readonly history: MemoryTradeHistory;
	readonly journal: MemoryJournal<AuditRecord>;
	readonly audit: AuditLog;
	readonly alerts: CoreAlert[];
	readonly alertBus: AlertBus;
	readonly market: MarketDataCache;
	readonly exchanges: Map<AccountId, ExchangeClient>;
	readonly guardian: PositionGuardian;
	readonly executor: EntryExecutor;
}

/** Paper exchange with a BTC mark price, as most tests want. */
export function paperWithMark(clock: FakeClock, mark = 45_000, balance = 1_000): PaperExchange {
	return new PaperExchange({ clock, balance }).setMarkPrice(BTC, mark);
}

/**
 * MemoryStore whose compare-and-swap can be made to fail, or preceded by a
 * concurrent write.
 */
export class FlakyStore extends MemoryStore {
	failSwaps = 0;
	beforeSwap: (() => Promise<void>) | undefined;

	override async compareAndSwap(key: string, expected: string | undefined, next: string): StoreResult<boolean> {
		const hook = this.beforeSwap;
		this.beforeSwap = undefined;
		if (hook) await hook();
		if (this.failSwaps > 0) {
			this.failSwaps--;
			return err(new StoreUnavailableError("swap refused", { key }));
		}
		return super.compareAndSwap(key, expected, next);
	}
}

export function buildCore(
	paper: ReadonlyMap<AccountId, ExchangeClient>,
	config: Partial<CoreConfig> = {},
	clock = new FakeClock(MONDAY_10_UTC),
	store: MemoryStore = new MemoryStore(clock),
): TestCore {
	const positions = new PositionStore(store);
	const history = new MemoryTradeHistory();
	const journal = new MemoryJournal<AuditRecord>();
	const audit = new AuditLog(journal, clock);
	const alerts: CoreAlert[] = [];
	const alertBus = new AlertBus();
	alertBus.on("alert", (a) => alerts.push(a));

	const exchanges = new Map(paper);
	const [first] = [...exchanges.values()];
	if (!first) throw new Error("buildCore needs at least one exchange");
	const market = new MarketDataCache({ store, source: first, clock });
	const noSleep = async (): Promise<void> => undefined;

	const guardian = new PositionGuardian({
		exchanges,
		positions,
		history,
		market,
		audit,
		alerts: alertBus,
		config: { stateRetryDelayMs: 0, ...config },
		clock,
		sleep: noSleep,
	});
	const executor = new EntryExecutor({
		history,
		guardian,
		market,
		audit,
		alerts: alertBus,
		config,
		clock,
		sleep: noSleep,
	});
	return {
		clock,
		store,
		positions,
		history,
		journal,
		audit,
		alerts,
		alertBus,
		market,
		exchanges,
		guardian,
		executor,
	};
}
