/**
 * RiskProfile — per (account, strategy) risk configuration.
 *
 * Stored as snake_case JSON; parsed once at load into an immutable, typed
 * profile with documented defaults for every absent section. A reload
 * replaces profiles wholesale.
 */

import { readFile } from "node:fs/promises";
import { validate, z } from "../lib/validation/index.js";
import type { ValidationError } from "../lib/validation/index.js";
import { ConfigError, errorMessage } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import { accountId, accountStrategyKey, strategyId, symbolId } from "../shared/identifiers.js";
import type { AccountId, StrategyId, SymbolId } from "../shared/identifiers.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";

/**
 * Weekday name → list of `[start, end]` UTC windows (`HH:MM` or `HH:MM:SS`).
 * Time strings are parsed by the schedule gate, not at load.
 */
export type ScheduleMap = Readonly<Record<string, readonly (readonly string[])[]>>;

export interface CircuitBreakerConfig {
	readonly enabled: boolean;
	readonly maxLosses: number;
	readonly windowMinutes: number;
	readonly cooldownMinutes: number;
}

export interface DailyLossConfig {
	readonly enabled: boolean;
	readonly maxLossPct: number;
	readonly pauseDurationHours: number;
}

export interface RiskProfile {
	readonly accountId: AccountId;
	readonly strategyId: StrategyId;
	readonly version: number;
	readonly tierCeiling: number;
	readonly tierFilterEnabled: boolean;
	readonly scheduleEnabled: boolean;
	readonly schedule: ScheduleMap;
	/** Why a stored schedule was set aside; the schedule gate then fails open. */
	readonly scheduleIssue: string | null;
	readonly circuitBreaker: CircuitBreakerConfig;
	/** 0 disables the gate. */
	readonly antiRepetitionWindowMinutes: number;
	readonly blacklistedSymbols: ReadonlySet<SymbolId>;
	/** Open positions allowed on the account at once; null means no limit. */
	readonly maxOpenPositions: number | null;
	/** Hours a symbol stays closed to new entries after a losing exit; 0 disables the gate. */
	readonly lossCooldownHours: number;
	readonly dailyLoss: DailyLossConfig;
	/** Percent of balance risked per trade (stop distance). */
	readonly riskPct: number;
}

// ── Stored shape ─────────────────────────────────────────────────────

const circuitBreakerSchema = z
	.object({
		enabled: z.boolean().default(false),
		max_losses: z.number().int().min(1).default(3),
		window_minutes: z.number().positive().default(60),
		cooldown_minutes: z.number().nonnegative().default(60),
	})
	.default({});

const dailyLossSchema = z
	.object({
		enabled: z.boolean().default(false),
		max_loss_pct: z.number().positive().default(5),
		pause_duration_hours: z.number().positive().default(24),
	})
	.default({});

const scheduleSchema = z.record(z.string(), z.array(z.array(z.string())));

const storedProfileSchema = z.object({
	account_id: z.string().trim().min(1),
	strategy_id: z.string().trim().min(1),
	version: z.number().int().nonnegative().default(1),
	tier_ceiling: z.number().int().min(1).max(10).default(10),
	tier_filter_enabled: z.boolean().default(false),
	schedule_enabled: z.boolean().default(false),
	// checked in the transform so one bad schedule does not reject the whole profile
	schedule: z.unknown(),
	circuit_breaker: circuitBreakerSchema,
	anti_repetition_window_minutes: z.number().nonnegative().default(0),
	blacklisted_symbols: z.array(z.string().trim().min(1)).default([]),
	max_open_positions: z.number().int().min(1).nullable().default(null),
	loss_cooldown_hours: z.number().nonnegative().default(0),
	daily_loss: dailyLossSchema,
	risk_pct: z.number().positive().max(100).default(1),
});

const riskProfileSchema = storedProfileSchema.transform((p): RiskProfile => {
	const schedule = validate(scheduleSchema, p.schedule ?? {}, "Invalid schedule");
	return {
		accountId: accountId(p.account_id),
		strategyId: strategyId(p.strategy_id),
		version: p.version,
		tierCeiling: p.tier_ceiling,
		tierFilterEnabled: p.tier_filter_enabled,
		scheduleEnabled: p.schedule_enabled,
		schedule: schedule.ok ? schedule.value : {},
		scheduleIssue: schedule.ok ? null : schedule.error.describe(),
		circuitBreaker: {
			enabled: p.circuit_breaker.enabled,
			maxLosses: p.circuit_breaker.max_losses,
			windowMinutes: p.circuit_breaker.window_minutes,
			cooldownMinutes: p.circuit_breaker.cooldown_minutes,
		},
		antiRepetitionWindowMinutes: p.anti_repetition_window_minutes,
		blacklistedSymbols: new Set(p.blacklisted_symbols.map(symbolId)),
		maxOpenPositions: p.max_open_positions,
		lossCooldownHours: p.loss_cooldown_hours,
		dailyLoss: {
			enabled: p.daily_loss.enabled,
			maxLossPct: p.daily_loss.max_loss_pct,
			pauseDurationHours: p.daily_loss.pause_duration_hours,
		},
		riskPct: p.risk_pct,
	};
});

/** Input accepted by `parseRiskProfile` (snake_case, sections optional). */
export type StoredRiskProfile = z.input<typeof storedProfileSchema>;

export function parseRiskProfile(raw: unknown): Result<RiskProfile, ValidationError> {
	return validate(riskProfileSchema, raw, "Invalid risk profile");
}

export function parseRiskProfiles(raw: unknown): Result<RiskProfile[], ValidationError> {
	return validate(z.array(riskProfileSchema), raw, "Invalid risk profiles");
}

/** Read and validate a JSON array of profiles. */
export async function loadRiskProfiles(filePath: string): Promise<Result<RiskProfile[], TradingError>> {
	let content: string;
	try {
		content = await readFile(filePath, "utf-8");
	} catch (e) {
		return err(new ConfigError(`cannot read risk profiles from ${filePath}`, { cause: e }));
	}
	let json: unknown;
	try {
		json = JSON.parse(content);
	} catch (e) {
		return err(
			new ConfigError(`risk profiles at ${filePath} are not valid JSON: ${errorMessage(e)}`),
		);
	}
	return parseRiskProfiles(json);
}

// ── Store ────────────────────────────────────────────────────────────

/** Configuration storage port; reads are fallible like any remote store. */
export interface RiskProfileStore {
	get(account: AccountId, strategy: StrategyId): Promise<Result<RiskProfile | undefined, TradingError>>;
	/** Every account profile subscribed to `strategy`. */
	forStrategy(strategy: StrategyId): Promise<Result<RiskProfile[], TradingError>>;
}

export class MemoryRiskProfileStore implements RiskProfileStore {
	private profiles: ReadonlyMap<string, RiskProfile>;
	private generation = 0;

	constructor(profiles: readonly RiskProfile[] = []) {
		this.profiles = MemoryRiskProfileStore.index(profiles);
	}

	async get(
		account: AccountId,
		strategy: StrategyId,
	): Promise<Result<RiskProfile | undefined, TradingError>> {
		return ok(this.profiles.get(accountStrategyKey(account, strategy)));
	}

	async forStrategy(strategy: StrategyId): Promise<Result<RiskProfile[], TradingError>> {
		return ok([...this.profiles.values()].filter((p) => p.strategyId === strategy));
	}

	/**
	 * Replace every profile with the parsed contents of `raw`.
	 * On validation failure the current profiles stay in place.
	 */
	reload(raw: unknown): Result<number, ValidationError> {
		const parsed = parseRiskProfiles(raw);
		if (!parsed.ok) return parsed;
		this.replace(parsed.value);
		return ok(parsed.value.length);
	}

	replace(profiles: readonly RiskProfile[]): void {
		this.profiles = MemoryRiskProfileStore.index(profiles);
		this.generation++;
	}

	/** Incremented on every reload. */
	get reloads(): number {
		return this.generation;
	}

	private static index(profiles: readonly RiskProfile[]): ReadonlyMap<string, RiskProfile> {
		const map = new Map<string, RiskProfile>();
		for (const p of profiles) map.set(accountStrategyKey(p.accountId, p.strategyId), p);
		return map;
	}
}
