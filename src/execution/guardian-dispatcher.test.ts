import { describe, expect, it } from "vitest";
import { ACC_A, ACC_B, BTC, MONDAY_10_UTC, STRATEGY, buildCore, paperWithMark } from "../__tests__/fixtures.js";
import type { TestCore } from "../__tests__/fixtures.js";
import type { PaperExchange } from "../exchange/paper-exchange.js";
import { Direction, OrderSide } from "../shared/direction.js";
import { NetworkError, OrderRejectedError } from "../shared/errors.js";
import { orderId, symbolId } from "../shared/identifiers.js";
import type { AccountId } from "../shared/identifiers.js";
import { unwrap } from "../shared/result.js";
import { FakeClock } from "../shared/time.js";
import { GuardianDispatcher } from "./guardian-dispatcher.js";

async function guard(core: TestCore, paper: PaperExchange, account: AccountId): Promise<void> {
	paper.seedPosition(BTC, 0.01, 45_000);
	const sl = unwrap(await paper.placeStopMarket({ symbol: BTC, side: OrderSide.Sell, triggerPrice: 44_000 }));
	await core.guardian.open({
		accountId: account,
		strategyId: STRATEGY,
		symbol: BTC,
		direction: Direction.Long,
		entryPrice: 45_000,
		quantity: 0.01,
		stop: 44_000,
		target: null,
		orderId: orderId(`entry-${account}`),
		slOrderId: sl.orderId,
		tpOrderId: null,
		tradeId: null,
	});
}

/** Both accounts long 0.01 BTC at 45000 with a stop at 44000. */
async function setup(mark = 45_000) {
	const clock = new FakeClock(MONDAY_10_UTC);
	const a = paperWithMark(clock, mark);
	const b = paperWithMark(clock, mark);
	const core = buildCore(
		new Map([
			[ACC_A, a],
			[ACC_B, b],
		]),
		{},
		clock,
	);
	await guard(core, a, ACC_A);
	await guard(core, b, ACC_B);
	const dispatcher = new GuardianDispatcher({ guardian: core.guardian, market: core.market, clock });
	return { a, b, core, dispatcher };
}

describe("GuardianDispatcher", () => {
	it("adjusts every account holding the symbol", async () => {
		const { a, b, dispatcher } = await setup();

		const summary = unwrap(await dispatcher.dispatch({ symbol: BTC, action: "adjust", stop: 44_500 }));

		expect(summary).toMatchObject({ symbol: BTC, action: "adjust", total: 2, succeeded: 2, partial: 0, failed: 0 });
		expect(summary.outcomes.map((o) => [o.accountId, o.action, o.status])).toEqual([
			[ACC_A, "adjust_stop", "applied"],
			[ACC_B, "adjust_stop", "applied"],
		]);
		expect(a.openOrders(BTC).map((o) => o.triggerPrice)).toEqual([44_500]);
		expect(b.openOrders(BTC).map((o) => o.triggerPrice)).toEqual([44_500]);
	});

	it("limits the request to an explicit account", async () => {
		const { a, b, dispatcher } = await setup();

		const summary = unwrap(
			await dispatcher.dispatch({ symbol: BTC, action: "adjust", stop: 44_500, accountId: ACC_B }),
		);

		expect(summary.outcomes.map((o) => o.accountId)).toEqual([ACC_B]);
		expect(a.openOrders(BTC).map((o) => o.triggerPrice)).toEqual([44_000]);
		expect(b.openOrders(BTC).map((o) => o.triggerPrice)).toEqual([44_500]);
	});

	it("routes stop and target together to a combined adjustment", async () => {
		const { b, dispatcher } = await setup();

		const summary = unwrap(
			await dispatcher.dispatch({ symbol: BTC, action: "adjust", stop: 44_500, target: 47_000, accountId: ACC_B }),
		);

		expect(summary.outcomes[0]?.action).toBe("adjust_both");
		expect(summary.outcomes[0]?.status).toBe("applied");
		expect(
			b
				.openOrders(BTC)
				.map((o) => o.triggerPrice)
				.sort((x, y) => x - y),
		).toEqual([44_500, 47_000]);
	});

	it("routes a target-only adjustment", async () => {
		const { dispatcher } = await setup();

		const summary = unwrap(
			await dispatcher.dispatch({ symbol: BTC, action: "adjust", target: 47_000, accountId: ACC_A }),
		);

		expect(summary.outcomes[0]?.action).toBe("adjust_target");
		expect(summary.outcomes[0]?.position?.currentTarget).toBe(47_000);
	});

	it("rejects an adjustment with neither stop nor target", async () => {
		const { dispatcher } = await setup();

		const summary = unwrap(await dispatcher.dispatch({ symbol: BTC, action: "adjust", accountId: ACC_A }));

		expect(summary.failed).toBe(1);
		expect(summary.outcomes[0]).toMatchObject({
			status: "rejected",
			code: "INVALID_REQUEST",
			reason: "adjust requires a stop or a target",
		});
	});

	it("closes every account and completes their positions", async () => {
		const { a, b, core, dispatcher } = await setup();

		const summary = unwrap(await dispatcher.dispatch({ symbol: BTC, action: "close" }));

		expect(summary.succeeded).toBe(2);
		expect(unwrap(await a.getPosition(BTC))).toBeNull();
		expect(unwrap(await b.getPosition(BTC))).toBeNull();
		expect(unwrap(await core.guardian.accountsWithPosition(BTC))).toEqual([]);
	});

	it("counts a partial half-close separately", async () => {
		const { b, dispatcher } = await setup(46_000);
		b.failNext("placeStopMarket", new OrderRejectedError("rejected"), 2);

		const summary = unwrap(await dispatcher.dispatch({ symbol: BTC, action: "half_close" }));

		expect(summary).toMatchObject({ total: 2, succeeded: 1, partial: 1, failed: 0 });
		expect(summary.outcomes.map((o) => o.status)).toEqual(["applied", "partial"]);
	});

	it("passes the break-even flag through", async () => {
		const { core, dispatcher } = await setup(46_000);

		await dispatcher.dispatch({ symbol: BTC, action: "half_close", accountId: ACC_A, moveStopToBreakEven: false });

		expect(unwrap(await core.positions.get(ACC_A, BTC))).toMatchObject({ halfClosed: true, currentStop: 44_000 });
	});

	it("returns an empty summary when nobody holds the symbol", async () => {
		const { dispatcher } = await setup();

		const summary = unwrap(await dispatcher.dispatch({ symbol: symbolId("ETHUSDT"), action: "close" }));

		expect(summary).toEqual({
			symbol: "ETHUSDT",
			action: "close",
			total: 0,
			succeeded: 0,
			partial: 0,
			failed: 0,
			outcomes: [],
		});
	});

	describe("decision freshness", () => {
		const SECOND = 1_000;

		it("rejects an adjustment decided too long ago for every account", async () => {
			const { a, b, dispatcher } = await setup();
			const context = { triggerPrice: 45_000, timestamp: MONDAY_10_UTC - 46 * SECOND };

			const summary = unwrap(await dispatcher.dispatch({ symbol: BTC, action: "adjust", stop: 44_500, context }));

			expect(summary).toMatchObject({ total: 2, succeeded: 0, failed: 2 });
			expect(summary.outcomes[0]).toEqual({
				status: "rejected",
				action: "adjust_stop",
				accountId: ACC_A,
				symbol: BTC,
				code: "STALE_REQUEST",
				reason: "adjust decided 46.0s ago (max 45s)",
				stateSync: "not_applicable",
			});
			expect(a.openOrders(BTC).map((o) => o.triggerPrice)).toEqual([44_000]);
			expect(b.openOrders(BTC).map((o) => o.triggerPrice)).toEqual([44_000]);
		});

		it("rejects an adjustment whose price has drifted past the limit", async () => {
			const { dispatcher } = await setup();
			const context = { triggerPrice: 44_400, timestamp: MONDAY_10_UTC };

			const summary = unwrap(
				await dispatcher.dispatch({ symbol: BTC, action: "adjust", stop: 44_500, accountId: ACC_A, context }),
			);

			expect(summary.outcomes[0]).toMatchObject({
				status: "rejected",
				code: "PRICE_DRIFT",
				reason: "price moved 1.351% since the decision (max 1%)",
			});
		});

		it("accepts the drift a request allows itself", async () => {
			const { dispatcher } = await setup();
			const context = { triggerPrice: 44_400, timestamp: MONDAY_10_UTC, maxDriftPct: 2 };

			const summary = unwrap(
				await dispatcher.dispatch({ symbol: BTC, action: "adjust", stop: 44_500, accountId: ACC_A, context }),
			);

			expect(summary.outcomes[0]?.status).toBe("applied");
		});

		it("closes despite a large drift while the decision is under a minute old", async () => {
			const { a, dispatcher } = await setup();
			const context = { triggerPrice: 43_650, timestamp: MONDAY_10_UTC - 30 * SECOND };

			const summary = unwrap(await dispatcher.dispatch({ symbol: BTC, action: "close", context }));

			expect(summary.succeeded).toBe(2);
			expect(unwrap(await a.getPosition(BTC))).toBeNull();
		});

		it("refuses a half close that is no longer in profit", async () => {
			const { core, dispatcher } = await setup();
			const context = { triggerPrice: 45_000, timestamp: MONDAY_10_UTC };

			const summary = unwrap(
				await dispatcher.dispatch({ symbol: BTC, action: "half_close", accountId: ACC_A, context }),
			);

			expect(summary.outcomes[0]).toMatchObject({
				status: "rejected",
				action: "half_close",
				code: "NOT_IN_PROFIT",
				reason: "mark 45000 is not in profit against entry 45000",
			});
			expect(unwrap(await core.positions.get(ACC_A, BTC))?.halfClosed).toBe(false);
		});

		it("half closes a position in profit within ninety seconds", async () => {
			const { dispatcher } = await setup(46_000);
			const context = { triggerPrice: 46_000, timestamp: MONDAY_10_UTC - 60 * SECOND };

			const summary = unwrap(
				await dispatcher.dispatch({ symbol: BTC, action: "half_close", accountId: ACC_A, context }),
			);

			expect(summary.outcomes[0]?.status).toBe("applied");
		});

		it("lets the request through when the mark cannot be read", async () => {
			const { a, dispatcher } = await setup();
			a.failNext("fetchMarkPrice", new NetworkError("reset"));
			const context = { triggerPrice: 45_000, timestamp: MONDAY_10_UTC - 100 * SECOND };

			const summary = unwrap(
				await dispatcher.dispatch({ symbol: BTC, action: "adjust", stop: 44_500, accountId: ACC_A, context }),
			);

			expect(summary.outcomes[0]?.status).toBe("applied");
		});
	});

	it("returns the store error when positions cannot be listed", async () => {
		const { core, dispatcher } = await setup();
		core.store.setAvailable(false);

		const result = await dispatcher.dispatch({ symbol: BTC, action: "close" });
		expect(!result.ok && result.error.code).toBe("STORE_UNAVAILABLE");
	});
});
