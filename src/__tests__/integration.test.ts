import { describe, expect, it } from "vitest";
import { ExecutionCoordinator } from "../execution/coordinator.js";
import { GuardianDispatcher } from "../execution/guardian-dispatcher.js";
import { parseGuardianPayload, parseSignalPayload } from "../inbound/schemas.js";
import { MemoryRiskProfileStore } from "../risk/profile.js";
import { RiskEngine } from "../risk/risk-engine.js";
import { unwrap } from "../shared/result.js";
import { Duration, FakeClock } from "../shared/time.js";
import { ACC_A, ACC_B, BTC, MONDAY_10_UTC, STRATEGY, buildCore, makeProfile, paperWithMark } from "./fixtures.js";

const SIGNAL_PAYLOAD = {
	symbol: "btcusdt",
	direction: "buy",
	entry: 45_000,
	stop: 44_000,
	target: 48_000,
	risk_reward: 3,
	probability: 64,
	tier: 2,
	signal_quality_score: 77,
};

function setup() {
	const clock = new FakeClock(MONDAY_10_UTC);
	const a = paperWithMark(clock);
	const b = paperWithMark(clock);
	const core = buildCore(
		new Map([
			[ACC_A, a],
			[ACC_B, b],
		]),
		{},
		clock,
	);
	const coordinator = new ExecutionCoordinator({
		profiles: new MemoryRiskProfileStore([
			makeProfile({ anti_repetition_window_minutes: 60 }),
			makeProfile({ account_id: ACC_B, tier_filter_enabled: true, tier_ceiling: 1 }),
		]),
		exchanges: core.exchanges,
		risk: new RiskEngine({ history: core.history, store: core.store, audit: core.audit, clock }),
		executor: core.executor,
	});
	const guardian = new GuardianDispatcher({ guardian: core.guardian, market: core.market, clock });
	return { a, b, clock, core, coordinator, guardian };
}

describe("signal to closed trade", () => {
	it("enters, trails the stop, refuses a repeat and closes with a history row", async () => {
		const { a, b, clock, core, coordinator, guardian } = setup();

		// Entry: A trades, B's tier ceiling refuses.
		const signal = unwrap(parseSignalPayload(SIGNAL_PAYLOAD, STRATEGY, clock.now()));
		const entry = unwrap(await coordinator.dispatch(signal));
		expect(entry.counts).toEqual({ total: 2, executed: 1, rejected: 1, failed: 0, alerts: 0 });
		expect(entry.perAccount[0]).toMatchObject({
			kind: "executed",
			accountId: ACC_A,
			orderId: "paper-1",
			quantity: 0.01,
			slOrderId: "paper-2",
			tpOrderId: "paper-3",
		});
		expect(entry.perAccount[1]).toMatchObject({ kind: "rejected", accountId: ACC_B, code: "TIER_REJECTED" });
		expect(b.calls("placeMarketOrder")).toHaveLength(0);

		// Trail the stop to break-even once price has moved.
		clock.advance(Duration.minutes(5));
		a.setMarkPrice(BTC, 46_500);
		const adjust = unwrap(
			parseGuardianPayload({
				symbol: "BTCUSDT",
				action: "adjust",
				stop: 45_000,
				level_metadata: { level: "breakeven", threshold_pct: 3 },
			}),
		);
		const adjusted = unwrap(await guardian.dispatch(adjust));
		expect(adjusted.outcomes.map((o) => [o.accountId, o.action, o.status])).toEqual([
			[ACC_A, "adjust_stop", "applied"],
		]);
		expect(unwrap(await core.positions.get(ACC_A, BTC))).toMatchObject({
			currentStop: 45_000,
			currentTarget: 48_000,
			levelApplied: "breakeven",
		});
		expect(
			a
				.openOrders(BTC)
				.map((o) => o.triggerPrice)
				.sort((x, y) => x - y),
		).toEqual([45_000, 48_000]);

		// The same setup again is a repeat for A.
		const repeat = unwrap(await coordinator.dispatch({ ...signal, receivedAt: clock.now() }));
		expect(repeat.perAccount[0]).toMatchObject({
			kind: "rejected",
			accountId: ACC_A,
			code: "RECENT_DUPLICATE",
			reason: "BTCUSDT LONG already opened within 60m",
		});
		expect(a.calls("placeMarketOrder")).toHaveLength(1);

		// Close at a profit.
		clock.advance(Duration.minutes(5));
		a.setMarkPrice(BTC, 47_000);
		const closed = unwrap(await guardian.dispatch(unwrap(parseGuardianPayload({ symbol: "btcusdt", action: "close" }))));
		expect(closed).toMatchObject({ total: 1, succeeded: 1, partial: 0, failed: 0 });
		expect(closed.outcomes[0]?.pnlUsdt).toBe(20);

		expect(unwrap(await a.getPosition(BTC))).toBeNull();
		expect(a.openOrders(BTC)).toEqual([]);
		expect(unwrap(await core.positions.get(ACC_A, BTC))).toBeUndefined();

		const rows = core.history.all();
		expect(rows).toHaveLength(1);
		expect(rows[0]).toMatchObject({
			accountId: ACC_A,
			symbol: BTC,
			direction: "LONG",
			entryPrice: 45_000,
			quantity: 0.01,
			exitPrice: 47_000,
			exitReason: "manual_close",
			exitTime: MONDAY_10_UTC + Duration.minutes(10),
			pnlUsdt: 20,
		});
	});
});
