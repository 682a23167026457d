import { describe, expect, it } from "vitest";
import { symbolId } from "../shared/identifiers.js";
import { BoundedExchange } from "./bounded-exchange.js";
import { PaperExchange } from "./paper-exchange.js";

const BTC = symbolId("BTCUSDT");

describe("BoundedExchange", () => {
	it("passes results through", async () => {
		const paper = new PaperExchange({ balance: 250 });
		const bounded = new BoundedExchange(paper, 1_000);
		expect(await bounded.getBalance()).toEqual({ ok: true, value: 250 });
	});

	it("turns a slow call into a TimeoutError result", async () => {
		const paper = new PaperExchange({ latencyMs: 200 }).setMarkPrice(BTC, 45_000);
		const bounded = new BoundedExchange(paper, 10);
		const result = await bounded.fetchMarkPrice(BTC);
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.code).toBe("TIMEOUT_ERROR");
			expect(result.error.message).toBe("fetchMarkPrice timed out after 10ms");
		}
	});

	it("classifies a thrown error", async () => {
		const paper = new PaperExchange();
		paper.getBalance = async () => {
			throw Object.assign(new Error("connect refused"), { code: "ECONNREFUSED" });
		};
		const result = await new BoundedExchange(paper, 1_000).getBalance();
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.code).toBe("NETWORK_ERROR");
	});
});
