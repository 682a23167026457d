import { describe, expect, it } from "vitest";
import { Decimal, floorToStep, roundToTick } from "./decimal.js";

const d = (value: string | number): Decimal => Decimal.from(value);

describe("Decimal", () => {
	describe("parsing", () => {
		it("reads exchange price and quantity strings", () => {
			expect(d("45000.10").toString()).toBe("45000.1");
			expect(d("0.00100000").toString()).toBe("0.001");
			expect(d("+3").toString()).toBe("3");
			expect(d(".5").toString()).toBe("0.5");
		});

		it("reads numbers, including exponent form", () => {
			expect(d(46_500).toString()).toBe("46500");
			expect(d(-0.25).toString()).toBe("-0.25");
			expect(d(1e-7).toString()).toBe("0.0000001");
		});

		it("returns the same instance for a Decimal", () => {
			const price = d("100");
			expect(Decimal.from(price)).toBe(price);
		});

		it("rejects what an exchange never sends", () => {
			expect(() => d("  ")).toThrow("empty string");
			expect(() => d("1,000")).toThrow('invalid numeric string "1,000"');
			expect(() => d("1e5")).toThrow("invalid numeric string");
			expect(() => d(Number.NaN)).toThrow("invalid number NaN");
		});
	});

	describe("arithmetic", () => {
		it("adds tenths without float drift", () => {
			expect(d("0.1").add(d("0.2")).eq(d("0.3"))).toBe(true);
		});

		it("computes long and short PnL", () => {
			const entry = d("45000");
			const exit = d("46500");
			const qty = d("0.004");
			expect(exit.sub(entry).mul(qty).toString()).toBe("6");
			expect(entry.sub(exit).mul(qty).toString()).toBe("-6");
		});

		it("sizes a position from risk and stop distance", () => {
			const qty = d("20").div(d("45000").sub(d("44000")));
			expect(qty.toString()).toBe("0.02");
		});

		it("truncates a repeating quotient at 18 digits", () => {
			expect(d("1").div(d("3")).toString()).toBe("0.333333333333333333");
			expect(d("-7").div(d("2")).toString()).toBe("-3.5");
		});

		it("refuses to divide by zero", () => {
			expect(() => d("10").div(Decimal.zero())).toThrow("division by zero");
		});

		it("sums mixed numbers and decimals", () => {
			expect(Decimal.sum([-3.47, -2.1, d("-4.82")]).toString()).toBe("-10.39");
			expect(Decimal.sum([]).isZero()).toBe(true);
		});

		it("keeps the smallest unit exact", () => {
			const unit = d("0.000000000000000001");
			expect(unit.add(unit).toString()).toBe("0.000000000000000002");
		});
	});

	describe("comparison", () => {
		it("orders prices", () => {
			const stop = d("44000");
			const mark = d("45500");
			expect(stop.lt(mark)).toBe(true);
			expect(mark.gt(stop)).toBe(true);
			expect(stop.lte(d("44000.0"))).toBe(true);
			expect(mark.gte(stop)).toBe(true);
		});

		it("reports sign and picks the smaller size", () => {
			expect(d("-0.01").abs().isPositive()).toBe(true);
			expect(d("0.01").neg().isPositive()).toBe(false);
			expect(Decimal.min(d("0.5"), d("0.2")).toString()).toBe("0.2");
		});
	});

	describe("formatting", () => {
		it("truncates to the requested places", () => {
			expect(d("12.3456").toFixed(2)).toBe("12.34");
			expect(d("0.999").toFixed(0)).toBe("0");
			expect(d("1.2").toFixed(3)).toBe("1.200");
		});

		it("prints negative zero without a sign", () => {
			expect(d("-0").toFixed(2)).toBe("0.00");
		});

		it("serialises to its string form", () => {
			expect(JSON.stringify({ qty: d("0.015") })).toBe('{"qty":"0.015"}');
			expect(d("-42.5").toNumber()).toBe(-42.5);
		});
	});

	describe("exchange filters", () => {
		it("floors a quantity to the lot step", () => {
			expect(d("0.0109").floorToStep(d("0.001")).toString()).toBe("0.01");
			expect(floorToStep(1.372, 0.01)).toBe(1.37);
		});

		it("floors negative values toward -infinity", () => {
			expect(d("-1.25").floorToStep(d("0.1")).toString()).toBe("-1.3");
		});

		it("rounds a trigger price to the tick, halves away from zero", () => {
			expect(roundToTick(44_000.3, 0.5)).toBe(44_000.5);
			expect(roundToTick(44_000.25, 0.5)).toBe(44_000.5);
			expect(roundToTick(44_799.994, 0.01)).toBe(44_799.99);
			expect(d("-2.5").roundToStep(d("1")).toString()).toBe("-3");
		});

		it("leaves the value alone for a non-positive step", () => {
			expect(floorToStep(1.2345, 0)).toBe(1.2345);
			expect(roundToTick(1.2345, -1)).toBe(1.2345);
		});
	});
});
