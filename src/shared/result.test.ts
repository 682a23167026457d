import { describe, expect, it } from "vitest";
import { err, isErr, isOk, map, mapErr, ok, tryCatchAsync, unwrap, unwrapOr } from "./result.js";

describe("Result", () => {
	describe("ok / err factories", () => {
		it("ok wraps a value", () => {
			expect(ok(42)).toEqual({ ok: true, value: 42 });
		});

		it("err wraps an error", () => {
			expect(err("something failed")).toEqual({ ok: false, error: "something failed" });
		});
	});

	describe("isOk / isErr type guards", () => {
		it("narrow both sides", () => {
			expect(isOk(ok(10))).toBe(true);
			expect(isErr(ok(10))).toBe(false);
			expect(isOk(err("fail"))).toBe(false);
			expect(isErr(err("fail"))).toBe(true);
		});
	});

	describe("map / mapErr", () => {
		it("map transforms only successes", () => {
			expect(map(ok(2), (n) => n * 3)).toEqual({ ok: true, value: 6 });
			expect(map(err<string>("no"), (n: number) => n * 3)).toEqual({ ok: false, error: "no" });
		});

		it("mapErr transforms only failures", () => {
			expect(mapErr(err("no"), (e) => `${e}!`)).toEqual({ ok: false, error: "no!" });
			expect(mapErr(ok(1), (e: string) => `${e}!`)).toEqual({ ok: true, value: 1 });
		});
	});

	describe("unwrap / unwrapOr", () => {
		it("unwrap returns the value", () => {
			expect(unwrap(ok("v"))).toBe("v");
		});

		it("unwrap throws the error", () => {
			const e = new Error("boom");
			expect(() => unwrap(err(e))).toThrow(e);
		});

		it("unwrap wraps non-Error failures", () => {
			expect(() => unwrap(err("plain"))).toThrow("plain");
		});

		it("unwrapOr falls back on failure", () => {
			expect(unwrapOr(err("no"), 7)).toBe(7);
			expect(unwrapOr(ok(3), 7)).toBe(3);
		});
	});

	describe("tryCatchAsync", () => {
		it("captures a resolved value", async () => {
			expect(await tryCatchAsync(async () => "done")).toEqual({ ok: true, value: "done" });
		});

		it("captures a rejection as an Error", async () => {
			const result = await tryCatchAsync(async () => {
				throw "raw";
			});
			expect(!result.ok && result.error.message).toBe("raw");
		});
	});
});
