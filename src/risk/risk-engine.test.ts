import { describe, expect, it } from "vitest";
import { ACC_A, MONDAY_10_UTC, makeAccount, makeProfile, makeSignal } from "../__tests__/fixtures.js";
import { AuditLog } from "../audit/audit-log.js";
import type { AuditRecord } from "../audit/audit-log.js";
import { MemoryJournal } from "../persistence/memory-journal.js";
import { MemoryStore } from "../persistence/shared-store.js";
import { MemoryTradeHistory } from "../persistence/trade-history.js";
import { FakeClock } from "../shared/time.js";
import { RiskEngine } from "./risk-engine.js";

function setup() {
	const clock = new FakeClock(MONDAY_10_UTC);
	const journal = new MemoryJournal<AuditRecord>();
	const engine = new RiskEngine({
		history: new MemoryTradeHistory(),
		store: new MemoryStore(clock),
		audit: new AuditLog(journal, clock),
		clock,
	});
	return { engine, journal };
}

describe("RiskEngine", () => {
	it("evaluates the gates in the documented order", () => {
		expect(setup().engine.guardNames).toEqual([
			"tier_filter",
			"schedule",
			"circuit_breaker",
			"anti_repetition",
			"open_position",
			"loss_cooldown",
			"symbol_blacklist",
			"daily_loss",
		]);
	});

	it("audits an allowed signal", async () => {
		const { engine, journal } = setup();
		const verdict = await engine.evaluate(makeSignal(), makeProfile({ version: 4 }), makeAccount(1_000));

		expect(verdict).toEqual({ type: "allow" });
		expect(journal.entries()).toEqual([
			{
				timestamp: MONDAY_10_UTC,
				accountId: ACC_A,
				symbol: "BTCUSDT",
				operation: "risk_evaluation",
				params: { strategyId: "breakout", direction: "LONG", tier: 3, profileVersion: 4 },
				result: { verdict: "allow" },
				success: true,
				error: null,
			},
		]);
	});

	it("audits a rejection with the gate and its details", async () => {
		const { engine, journal } = setup();
		await engine.evaluate(
			makeSignal({ tier: 9 }),
			makeProfile({ tier_filter_enabled: true, tier_ceiling: 5 }),
			makeAccount(1_000),
		);

		const [record] = journal.entries();
		expect(record?.success).toBe(false);
		expect(record?.error).toBe("tier 9 exceeds ceiling 5");
		expect(record?.result).toEqual({
			verdict: "block",
			guard: "tier_filter",
			code: "TIER_REJECTED",
			details: { tier: 9, tierCeiling: 5 },
		});
	});

	it("stops at the first rejecting gate", async () => {
		const { engine } = setup();
		const account = makeAccount(1_000);
		const verdict = await engine.evaluate(
			makeSignal({ tier: 9 }),
			makeProfile({
				tier_filter_enabled: true,
				tier_ceiling: 5,
				daily_loss: { enabled: true, max_loss_pct: 5 },
			}),
			account,
		);

		expect(verdict.type === "block" && verdict.guard).toBe("tier_filter");
		expect(account.balanceQueries()).toBe(0);
	});

	it("still returns the verdict when the audit journal fails", async () => {
		const clock = new FakeClock(MONDAY_10_UTC);
		const audit = new AuditLog(
			{
				record: async () => {
					throw new Error("disk full");
				},
				flush: async () => undefined,
			},
			clock,
		);
		const engine = new RiskEngine({ history: new MemoryTradeHistory(), store: new MemoryStore(clock), audit, clock });

		expect(await engine.evaluate(makeSignal(), makeProfile(), makeAccount(1_000))).toEqual({ type: "allow" });
		expect(audit.failedWrites).toBe(1);
	});
});
