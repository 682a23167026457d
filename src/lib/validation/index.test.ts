import { describe, expect, it } from "vitest";
import { TradingError } from "../../shared/errors.js";
import { isErr, isOk } from "../../shared/result.js";
import { ValidationError, validate, z } from "./index.js";

describe("validation wrapper", () => {
	describe("validate()", () => {
		it("returns ok(data) for valid input", () => {
			const result = validate(z.string(), "BTCUSDT");

			expect(isOk(result)).toBe(true);
			if (result.ok) {
				expect(result.value).toBe("BTCUSDT");
			}
		});

		it("returns err(ValidationError) for invalid input", () => {
			const result = validate(z.number(), "not a number");

			expect(isErr(result)).toBe(true);
			if (!result.ok) {
				expect(result.error).toBeInstanceOf(ValidationError);
				expect(result.error.message).toBe("Validation failed");
			}
		});

		it("reports the path of every nested failure", () => {
			const schema = z.object({
				circuit_breaker: z.object({
					max_losses: z.number(),
					window_minutes: z.number(),
				}),
			});
			const result = validate(schema, {
				circuit_breaker: { max_losses: "three", window_minutes: "sixty" },
			});

			expect(isErr(result)).toBe(true);
			if (!result.ok) {
				expect(result.error.issues.map((i) => i.path)).toEqual([
					["circuit_breaker", "max_losses"],
					["circuit_breaker", "window_minutes"],
				]);
			}
		});

		it("uses the supplied label as the error message", () => {
			const result = validate(z.number(), "x", "Invalid risk profile");
			expect(!result.ok && result.error.message).toBe("Invalid risk profile");
		});

		it("applies schema transforms to the parsed value", () => {
			const schema = z.object({ symbol: z.string().transform((s) => s.toUpperCase()) });
			const result = validate(schema, { symbol: "ethusdt" });
			expect(result.ok && result.value.symbol).toBe("ETHUSDT");
		});
	});

	describe("ValidationError", () => {
		it("extends TradingError as non-retryable", () => {
			const issues = [{ path: ["tier"], message: "bad" }];
			const error = new ValidationError("Validation failed", issues);

			expect(error).toBeInstanceOf(TradingError);
			expect(error.code).toBe("VALIDATION_FAILED");
			expect(error.category).toBe("non_retryable");
			expect(error.isRetryable).toBe(false);
			expect(error.issues).toBe(issues);
		});

		it("describe() joins path and message per issue", () => {
			const error = new ValidationError("Validation failed", [
				{ path: ["daily_loss", "max_loss_pct"], message: "Required" },
				{ path: [], message: "stop must be below entry" },
			]);
			expect(error.describe()).toBe(
				"daily_loss.max_loss_pct: Required; stop must be below entry",
			);
		});
	});
});
