/**
 * SharedStore — port for the fast key/value store (positions, pauses,
 * cached market facts, per-day balance snapshots).
 *
 * Values are opaque strings; callers serialise and validate their own shapes.
 * Every call is fallible and reports an outage as StoreUnavailableError so
 * the caller can degrade the one feature that depends on it.
 */

import { StoreUnavailableError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";

export type StoreResult<T> = Promise<Result<T, StoreUnavailableError>>;

export interface SharedStore {
	get(key: string): StoreResult<string | undefined>;
	/** Store `value`; with `ttlMs` the key expires after that many milliseconds. */
	set(key: string, value: string, ttlMs?: number): StoreResult<void>;
	delete(key: string): StoreResult<boolean>;
	/**
	 * Atomically replace the value only if it still equals `expected`
	 * (`undefined` = key must be absent). Returns false on mismatch.
	 */
	compareAndSwap(key: string, expected: string | undefined, next: string): StoreResult<boolean>;
	/** Keys starting with `prefix`, in no particular order. */
	keys(prefix: string): StoreResult<string[]>;
}

interface StoredValue {
	readonly value: string;
	readonly expiresAt: number | null;
}

/**
 * In-process SharedStore with clock-driven expiry.
 *
 * `setAvailable(false)` makes every call fail, standing in for an outage.
 */
export class MemoryStore implements SharedStore {
	private readonly data = new Map<string, StoredValue>();
	private readonly clock: Clock;
	private available = true;

	constructor(clock: Clock = SystemClock) {
		this.clock = clock;
	}

	setAvailable(available: boolean): void {
		this.available = available;
	}

	async get(key: string): StoreResult<string | undefined> {
		if (!this.available) return this.outage("get", key);
		return ok(this.live(key)?.value);
	}

	async set(key: string, value: string, ttlMs?: number): StoreResult<void> {
		if (!this.available) return this.outage("set", key);
		if (ttlMs !== undefined && ttlMs <= 0) {
			this.data.delete(key);
			return ok(undefined);
		}
		this.data.set(key, {
			value,
			expiresAt: ttlMs === undefined ? null : this.clock.now() + ttlMs,
		});
		return ok(undefined);
	}

	async delete(key: string): StoreResult<boolean> {
		if (!this.available) return this.outage("delete", key);
		const existed = this.live(key) !== undefined;
		this.data.delete(key);
		return ok(existed);
	}

	async compareAndSwap(
		key: string,
		expected: string | undefined,
		next: string,
	): StoreResult<boolean> {
		if (!this.available) return this.outage("compareAndSwap", key);
		const current = this.live(key);
		if (current?.value !== expected) return ok(false);
		this.data.set(key, { value: next, expiresAt: current?.expiresAt ?? null });
		return ok(true);
	}

	async keys(prefix: string): StoreResult<string[]> {
		if (!this.available) return this.outage("keys", prefix);
		const found: string[] = [];
		for (const key of this.data.keys()) {
			if (key.startsWith(prefix) && this.live(key) !== undefined) found.push(key);
		}
		return ok(found);
	}

	/** Remaining TTL in ms, `null` for no expiry, `undefined` when absent. */
	ttl(key: string): number | null | undefined {
		const entry = this.live(key);
		if (!entry) return undefined;
		return entry.expiresAt === null ? null : entry.expiresAt - this.clock.now();
	}

	private live(key: string): StoredValue | undefined {
		const entry = this.data.get(key);
		if (!entry) return undefined;
		if (entry.expiresAt !== null && this.clock.now() >= entry.expiresAt) {
			this.data.delete(key);
			return undefined;
		}
		return entry;
	}

	private outage(op: string, key: string): Result<never, StoreUnavailableError> {
		return err(new StoreUnavailableError(`shared store unavailable during ${op}`, { key }));
	}
}
