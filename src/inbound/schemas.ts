/**
 * Inbound payload schemas — trade signals and guardian requests as they
 * arrive from the (out-of-scope) transport layer, snake_case and loosely
 * typed, parsed into immutable domain values.
 */

import type { GuardianRequest } from "../execution/guardian-dispatcher.js";
import { validate, z } from "../lib/validation/index.js";
import type { ValidationError } from "../lib/validation/index.js";
import type { TradeSignal } from "../signal/trade-signal.js";
import { Direction, parseDirection } from "../shared/direction.js";
import { accountId, symbolId } from "../shared/identifiers.js";
import type { StrategyId } from "../shared/identifiers.js";
import { ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import { Duration } from "../shared/time.js";

const directionSchema = z
	.string()
	.transform((raw, ctx) => {
		const direction = parseDirection(raw);
		if (direction === null) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown direction "${raw}"` });
			return z.NEVER;
		}
		return direction;
	});

const price = z.number().finite().positive();

const signalPayloadSchema = z
	.object({
		symbol: z.string().trim().min(1).transform(symbolId),
		direction: directionSchema,
		entry: price,
		stop: price,
		target: price,
		risk_reward: z.number().finite().nonnegative().default(0),
		probability: z.number().finite().min(0).max(100).default(0),
		tier: z.number().int().min(1).max(10),
		signal_quality_score: z.number().finite().default(0),
	})
	.superRefine((s, ctx) => {
		const ordered =
			s.direction === Direction.Long
				? s.stop < s.entry && s.entry < s.target
				: s.target < s.entry && s.entry < s.stop;
		if (!ordered) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["stop"],
				message:
					s.direction === Direction.Long
						? "LONG requires stop < entry < target"
						: "SHORT requires target < entry < stop",
			});
		}
	});

export type SignalPayload = z.input<typeof signalPayloadSchema>;

/**
 * Parse a trade-signal payload for `strategy`.
 *
 * @example
 * ```ts
 * parseSignalPayload(
 *   { symbol: "btcusdt", direction: "buy", entry: 45000, stop: 44000, target: 48000, tier: 3 },
 *   strategyId("breakout"),
 *   Date.now(),
 * );
 * ```
 */
export function parseSignalPayload(
	raw: unknown,
	strategy: StrategyId,
	receivedAt: number,
): Result<TradeSignal, ValidationError> {
	const parsed = validate(signalPayloadSchema, raw, "Invalid trade signal");
	if (!parsed.ok) return parsed;
	const s = parsed.value;
	return ok({
		strategyId: strategy,
		symbol: s.symbol,
		direction: s.direction,
		entryPrice: s.entry,
		stopPrice: s.stop,
		targetPrice: s.target,
		riskReward: s.risk_reward,
		probability: s.probability,
		tier: s.tier,
		signalQualityScore: s.signal_quality_score,
		receivedAt,
	});
}

const guardianPayloadSchema = z
	.object({
		symbol: z.string().trim().min(1).transform(symbolId),
		action: z.enum(["close", "adjust", "half_close"]),
		stop: price.optional(),
		target: price.optional(),
		account_id: z.string().trim().min(1).transform(accountId).optional(),
		level_metadata: z
			.object({
				level: z.string().min(1),
				threshold_pct: z.number().finite().nullable().optional(),
			})
			.optional(),
		move_stop_to_break_even: z.boolean().optional(),
		// epoch seconds; a zero trigger price means no context to check against
		market_context: z
			.object({
				trigger_price: z.number().finite().nonnegative(),
				timestamp: z.number().finite().nonnegative(),
				max_acceptable_drift_pct: z.number().finite().positive().optional(),
			})
			.optional(),
	})
	.refine((p) => p.action !== "adjust" || p.stop !== undefined || p.target !== undefined, {
		message: "adjust requires stop or target",
		path: ["stop"],
	});

export type GuardianPayload = z.input<typeof guardianPayloadSchema>;

export function parseGuardianPayload(raw: unknown): Result<GuardianRequest, ValidationError> {
	const parsed = validate(guardianPayloadSchema, raw, "Invalid guardian request");
	if (!parsed.ok) return parsed;
	const p = parsed.value;
	return ok({
		symbol: p.symbol,
		action: p.action,
		stop: p.stop,
		target: p.target,
		accountId: p.account_id,
		level: p.level_metadata
			? { level: p.level_metadata.level, thresholdPct: p.level_metadata.threshold_pct ?? null }
			: undefined,
		moveStopToBreakEven: p.move_stop_to_break_even,
		context: p.market_context
			? {
					triggerPrice: p.market_context.trigger_price,
					timestamp: Duration.seconds(p.market_context.timestamp),
					maxDriftPct: p.market_context.max_acceptable_drift_pct,
				}
			: undefined,
	});
}
