import { describe, expect, it } from "vitest";
import {
	ACC_A,
	ACC_B,
	BTC,
	MONDAY_10_UTC,
	buildCore,
	makeProfile,
	makeSignal,
	paperWithMark,
} from "../__tests__/fixtures.js";
import type { TestCore } from "../__tests__/fixtures.js";
import { PaperExchange } from "../exchange/paper-exchange.js";
import { MemoryRiskProfileStore } from "../risk/profile.js";
import type { RiskProfile, RiskProfileStore } from "../risk/profile.js";
import { RiskEngine } from "../risk/risk-engine.js";
import type { GuardVerdict } from "../risk/types.js";
import { Direction } from "../shared/direction.js";
import { OrderRejectedError, StoreUnavailableError } from "../shared/errors.js";
import { accountId } from "../shared/identifiers.js";
import { err, unwrap } from "../shared/result.js";
import { FakeClock } from "../shared/time.js";
import { ExecutionCoordinator } from "./coordinator.js";

function engineFor(core: TestCore): RiskEngine {
	return new RiskEngine({ history: core.history, store: core.store, audit: core.audit, clock: core.clock });
}

function setup(profiles: readonly RiskProfile[], coordinatorTimeoutMs = 10_000) {
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
		profiles: new MemoryRiskProfileStore(profiles),
		exchanges: core.exchanges,
		risk: engineFor(core),
		executor: core.executor,
		config: { coordinatorTimeoutMs },
	});
	return { a, b, core, coordinator };
}

const profileA = makeProfile();
const profileB = makeProfile({ account_id: ACC_B });

describe("ExecutionCoordinator", () => {
	it("applies each account's own risk profile", async () => {
		const { a, b, coordinator } = setup([
			makeProfile({ tier_filter_enabled: true, tier_ceiling: 7 }),
			makeProfile({ account_id: ACC_B, tier_filter_enabled: true, tier_ceiling: 9 }),
		]);

		const result = unwrap(await coordinator.dispatch(makeSignal({ tier: 8 })));

		expect(result.counts).toEqual({ total: 2, executed: 1, rejected: 1, failed: 0, alerts: 0 });
		expect(result.timedOut).toBe(false);
		expect(result.perAccount[0]).toEqual({
			kind: "rejected",
			accountId: ACC_A,
			code: "TIER_REJECTED",
			reason: "tier 8 exceeds ceiling 7",
			details: { tier: 8, tierCeiling: 7 },
		});
		expect(result.perAccount[1]).toMatchObject({ kind: "executed", accountId: ACC_B, orderId: "paper-1" });
		expect(a.calls("placeMarketOrder")).toHaveLength(0);
		expect(b.calls("placeMarketOrder")).toHaveLength(1);
	});

	it("reports the signal's identity alongside the outcomes", async () => {
		const { coordinator } = setup([profileA]);

		const result = unwrap(await coordinator.dispatch(makeSignal()));

		expect(result.strategyId).toBe("breakout");
		expect(result.symbol).toBe(BTC);
		expect(result.direction).toBe("LONG");
	});

	it("keeps one account's exchange failure away from the others", async () => {
		const { a, b, core, coordinator } = setup([profileA, profileB]);
		a.failNext("placeMarketOrder", new OrderRejectedError("Margin is insufficient"));

		const result = unwrap(await coordinator.dispatch(makeSignal()));

		expect(result.perAccount).toEqual([
			{ kind: "failed", accountId: ACC_A, code: "ORDER_REJECTED", reason: "Margin is insufficient" },
			expect.objectContaining({ kind: "executed", accountId: ACC_B, quantity: 0.01 }),
		]);
		expect(unwrap(await a.getPosition(BTC))).toBeNull();
		expect(unwrap(await b.getPosition(BTC))?.size).toBe(0.01);
		expect(unwrap(await core.guardian.accountsWithPosition(BTC))).toEqual([ACC_B]);
	});

	it("sizes each account from its own balance", async () => {
		const { b, coordinator } = setup([profileA, profileB]);
		b.setBalance(3_000);

		const result = unwrap(await coordinator.dispatch(makeSignal()));

		expect(result.perAccount.map((o) => (o.kind === "executed" ? o.quantity : null))).toEqual([0.01, 0.03]);
	});

	it("fails an account without an exchange client", async () => {
		const orphan = accountId("acc-c");
		const { coordinator } = setup([profileA, makeProfile({ account_id: orphan })]);

		const result = unwrap(await coordinator.dispatch(makeSignal()));

		expect(result.perAccount[1]).toEqual({
			kind: "failed",
			accountId: orphan,
			code: "NO_EXCHANGE_CLIENT",
			reason: "no exchange client registered for acc-c",
		});
		expect(result.counts.executed).toBe(1);
	});

	it("returns an empty result when nobody subscribes to the strategy", async () => {
		const { coordinator } = setup([]);

		const result = unwrap(await coordinator.dispatch(makeSignal()));

		expect(result.perAccount).toEqual([]);
		expect(result.counts).toEqual({ total: 0, executed: 0, rejected: 0, failed: 0, alerts: 0 });
		expect(result.timedOut).toBe(false);
	});

	it("returns the profile store's error", async () => {
		const { core } = setup([]);
		const down: RiskProfileStore = {
			get: async () => err(new StoreUnavailableError("profiles offline")),
			forStrategy: async () => err(new StoreUnavailableError("profiles offline")),
		};
		const coordinator = new ExecutionCoordinator({
			profiles: down,
			exchanges: core.exchanges,
			risk: engineFor(core),
			executor: core.executor,
		});

		const result = await coordinator.dispatch(makeSignal());
		expect(!result.ok && result.error.code).toBe("STORE_UNAVAILABLE");
	});

	it("turns a thrown error into an UNEXPECTED failure for that account only", async () => {
		class ExplodingRisk extends RiskEngine {
			override async evaluate(...args: Parameters<RiskEngine["evaluate"]>): Promise<GuardVerdict> {
				const [, profile] = args;
				if (profile.accountId === ACC_A) throw new Error("boom");
				return super.evaluate(...args);
			}
		}
		const { core } = setup([]);
		const coordinator = new ExecutionCoordinator({
			profiles: new MemoryRiskProfileStore([profileA, profileB]),
			exchanges: core.exchanges,
			risk: new ExplodingRisk({ history: core.history, store: core.store, audit: core.audit, clock: core.clock }),
			executor: core.executor,
		});

		const result = unwrap(await coordinator.dispatch(makeSignal()));

		expect(result.perAccount[0]).toEqual({ kind: "failed", accountId: ACC_A, code: "UNEXPECTED", reason: "boom" });
		expect(result.perAccount[1]?.kind).toBe("executed");
	});

	it("rejects an entry on a symbol the account already holds", async () => {
		const { a, core, coordinator } = setup([profileA]);
		const first = unwrap(await coordinator.dispatch(makeSignal()));
		expect(first.perAccount[0]?.kind).toBe("executed");

		const second = unwrap(await coordinator.dispatch(makeSignal({ direction: Direction.Short })));

		expect(second.perAccount[0]).toMatchObject({
			kind: "rejected",
			accountId: ACC_A,
			code: "POSITION_ALREADY_OPEN",
			reason: "BTCUSDT already has an open position",
		});
		expect(a.calls("placeMarketOrder")).toHaveLength(1);
		expect(core.history.all().filter((r) => r.exitReason === null)).toHaveLength(1);
		const position = unwrap(await core.positions.get(ACC_A, BTC));
		expect(position?.direction).toBe("LONG");
		expect(position?.entryPrice).toBe(45_000);
	});

	it("lets only one of two overlapping dispatches enter the same symbol", async () => {
		const { a, coordinator } = setup([profileA]);

		const [first, second] = await Promise.all([
			coordinator.dispatch(makeSignal()),
			coordinator.dispatch(makeSignal()),
		]);

		expect(unwrap(first).perAccount[0]?.kind).toBe("executed");
		expect(unwrap(second).perAccount[0]).toMatchObject({ kind: "rejected", code: "POSITION_ALREADY_OPEN" });
		expect(a.calls("placeMarketOrder")).toHaveLength(1);
	});

	it("reports slow accounts as timed out and never enters after the deadline", async () => {
		const clock = new FakeClock(MONDAY_10_UTC);
		const fast = paperWithMark(clock);
		const slow = new PaperExchange({ clock, balance: 1_000, latencyMs: 60 }).setMarkPrice(BTC, 45_000);
		const core = buildCore(
			new Map([
				[ACC_A, fast],
				[ACC_B, slow],
			]),
			{},
			clock,
		);
		const coordinator = new ExecutionCoordinator({
			profiles: new MemoryRiskProfileStore([profileA, profileB]),
			exchanges: core.exchanges,
			risk: engineFor(core),
			executor: core.executor,
			config: { coordinatorTimeoutMs: 20 },
		});

		const result = unwrap(await coordinator.dispatch(makeSignal()));

		expect(result.timedOut).toBe(true);
		expect(result.perAccount[0]?.kind).toBe("executed");
		expect(result.perAccount[1]).toEqual({
			kind: "failed",
			accountId: ACC_B,
			code: "TIMEOUT",
			reason: "not finished within 20ms",
		});
		expect(coordinator.pendingTasks).toBe(1);

		await coordinator.drain();
		expect(slow.calls("placeMarketOrder")).toHaveLength(0);
	});
});
