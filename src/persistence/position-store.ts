/**
 * PositionStore — durable guardian records in the shared store.
 *
 * One JSON value per (account, symbol). Updates are optimistic: the writer
 * names the `lastAdjustmentTs` it read, and the write is refused when the
 * stored record has moved on.
 */

import { validate, z } from "../lib/validation/index.js";
import type { Position } from "../position/types.js";
import { Direction } from "../shared/direction.js";
import type { StoreUnavailableError } from "../shared/errors.js";
import { accountId, orderId, positionKey, strategyId, symbolId } from "../shared/identifiers.js";
import type { AccountId, SymbolId } from "../shared/identifiers.js";
import { ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { SharedStore, StoreResult } from "./shared-store.js";

const KEY_PREFIX = "position:";

// ids are checked before branding so a bad record decodes as absent instead of throwing
const idText = z.string().trim().min(1);
const orderIdSchema = z.union([idText, z.number()]).transform(orderId);

const positionSchema: z.ZodType<Position, z.ZodTypeDef, unknown> = z.object({
	accountId: idText.transform(accountId),
	strategyId: idText.transform(strategyId),
	symbol: idText.transform(symbolId),
	direction: z.enum([Direction.Long, Direction.Short]),
	entryPrice: z.number(),
	quantity: z.number(),
	currentStop: z.number(),
	currentTarget: z.number().nullable(),
	orderId: orderIdSchema.nullable(),
	slOrderId: orderIdSchema.nullable(),
	tpOrderId: orderIdSchema.nullable(),
	levelApplied: z.string(),
	levelThresholdPct: z.number().nullable(),
	previousLevel: z.string().nullable(),
	lastAdjustmentTs: z.number(),
	previousStop: z.number().nullable(),
	openedAt: z.number(),
	halfClosed: z.boolean(),
	realisedPnlUsdt: z.number().default(0),
	tradeId: z.string().nullable(),
});

export type CompareAndSetOutcome =
	| { readonly kind: "written" }
	| { readonly kind: "conflict"; readonly current: Position | undefined };

export class PositionStore {
	private readonly store: SharedStore;

	constructor(store: SharedStore) {
		this.store = store;
	}

	static key(account: AccountId, symbol: SymbolId): string {
		return `${KEY_PREFIX}${positionKey(account, symbol)}`;
	}

	async get(account: AccountId, symbol: SymbolId): StoreResult<Position | undefined> {
		const raw = await this.store.get(PositionStore.key(account, symbol));
		if (!raw.ok) return raw;
		return ok(raw.value === undefined ? undefined : decode(raw.value));
	}

	/**
	 * Write a new record. Returns false, writing nothing, when a readable
	 * record already exists for the key; an unreadable one is replaced.
	 */
	async create(position: Position): StoreResult<boolean> {
		const key = PositionStore.key(position.accountId, position.symbol);
		const raw = await this.store.get(key);
		if (!raw.ok) return raw;
		if (raw.value !== undefined && decode(raw.value) !== undefined) return ok(false);
		return this.store.compareAndSwap(key, raw.value, encode(position));
	}

	/**
	 * Replace the record only if its stored `lastAdjustmentTs` still equals
	 * `expectedTs`. A conflict returns the record that won.
	 */
	async compareAndSet(
		next: Position,
		expectedTs: number,
	): Promise<Result<CompareAndSetOutcome, StoreUnavailableError>> {
		const key = PositionStore.key(next.accountId, next.symbol);
		const raw = await this.store.get(key);
		if (!raw.ok) return raw;

		const current = raw.value === undefined ? undefined : decode(raw.value);
		if (raw.value === undefined || current === undefined || current.lastAdjustmentTs !== expectedTs) {
			return ok({ kind: "conflict", current });
		}

		const swapped = await this.store.compareAndSwap(key, raw.value, encode(next));
		if (!swapped.ok) return swapped;
		if (swapped.value) return ok({ kind: "written" });

		const latest = await this.get(next.accountId, next.symbol);
		return ok({ kind: "conflict", current: latest.ok ? latest.value : undefined });
	}

	async delete(account: AccountId, symbol: SymbolId): StoreResult<boolean> {
		return this.store.delete(PositionStore.key(account, symbol));
	}

	/** Every stored record held by `account`. */
	async listByAccount(account: AccountId): StoreResult<Position[]> {
		return this.list(`${KEY_PREFIX}${account}:`, (p) => p.accountId === account);
	}

	/** Every stored record for `symbol`, across accounts. */
	async listBySymbol(symbol: SymbolId): StoreResult<Position[]> {
		return this.list(KEY_PREFIX, (p) => p.symbol === symbol);
	}

	private async list(prefix: string, keep: (position: Position) => boolean): StoreResult<Position[]> {
		const keys = await this.store.keys(prefix);
		if (!keys.ok) return keys;
		const found: Position[] = [];
		for (const key of keys.value) {
			const raw = await this.store.get(key);
			if (!raw.ok) return raw;
			const position = raw.value === undefined ? undefined : decode(raw.value);
			if (position && keep(position)) found.push(position);
		}
		return ok(found);
	}
}

function encode(position: Position): string {
	return JSON.stringify(position);
}

/** Unreadable records decode to undefined; callers treat them as absent. */
function decode(raw: string): Position | undefined {
	let json: unknown;
	try {
		json = JSON.parse(raw);
	} catch {
		return undefined;
	}
	const parsed = validate(positionSchema, json);
	return parsed.ok ? parsed.value : undefined;
}

