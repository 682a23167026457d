import { describe, expect, it } from "vitest";
import { accountId, strategyId } from "../shared/identifiers.js";
import { FakeClock } from "../shared/time.js";
import { MemoryStore } from "./shared-store.js";
import { TradePauseStore } from "./trade-pause-store.js";

const ACC = accountId("acc-a");
const STRATEGY = strategyId("breakout");
const HOUR = 3_600_000;

function setup() {
	const clock = new FakeClock(1_000_000);
	const store = new MemoryStore(clock);
	return { clock, store, pauses: new TradePauseStore(store, clock) };
}

describe("TradePauseStore", () => {
	it("reports no pause by default", async () => {
		expect(await setup().pauses.active(ACC, STRATEGY)).toEqual({ ok: true, value: undefined });
	});

	it("stores a pause that expires at resumeAt", async () => {
		const { clock, store, pauses } = setup();
		const resumeAt = clock.now() + 24 * HOUR;

		await pauses.pause(ACC, STRATEGY, resumeAt, "daily loss");

		expect(await pauses.active(ACC, STRATEGY)).toEqual({
			ok: true,
			value: { paused: true, resumeAt, reason: "daily loss" },
		});
		expect(store.ttl(TradePauseStore.key(ACC, STRATEGY))).toBe(24 * HOUR);

		clock.advance(24 * HOUR);
		expect(await pauses.active(ACC, STRATEGY)).toEqual({ ok: true, value: undefined });
	});

	it("keys pauses per account and strategy", async () => {
		const { clock, pauses } = setup();
		await pauses.pause(ACC, STRATEGY, clock.now() + HOUR);

		expect(TradePauseStore.key(ACC, STRATEGY)).toBe("trade_pause:acc-a:breakout");
		expect(await pauses.active(accountId("acc-b"), STRATEGY)).toEqual({ ok: true, value: undefined });
		expect(await pauses.active(ACC, strategyId("mean-revert"))).toEqual({ ok: true, value: undefined });
	});

	it("lifts a pause early on manual override", async () => {
		const { clock, pauses } = setup();
		await pauses.pause(ACC, STRATEGY, clock.now() + HOUR);

		expect(await pauses.clearPause(ACC, STRATEGY)).toEqual({ ok: true, value: true });
		expect(await pauses.active(ACC, STRATEGY)).toEqual({ ok: true, value: undefined });
	});

	it("ignores a malformed flag", async () => {
		const { store, pauses } = setup();
		await store.set(TradePauseStore.key(ACC, STRATEGY), "{not json");
		expect(await pauses.active(ACC, STRATEGY)).toEqual({ ok: true, value: undefined });

		await store.set(TradePauseStore.key(ACC, STRATEGY), JSON.stringify({ paused: "yes" }));
		expect(await pauses.active(ACC, STRATEGY)).toEqual({ ok: true, value: undefined });
	});

	it("surfaces a store outage", async () => {
		const { store, pauses } = setup();
		store.setAvailable(false);

		const result = await pauses.active(ACC, STRATEGY);
		expect(!result.ok && result.error.code).toBe("STORE_UNAVAILABLE");
	});
});
