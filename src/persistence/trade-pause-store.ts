/**
 * TradePauseStore — daily-loss pause flags with self-expiry.
 *
 * A pause is a shared-store key whose TTL ends at `resumeAt`; absence of the
 * key means "not paused". Only `clearPause` (manual override) deletes early.
 */

import { validate, z } from "../lib/validation/index.js";
import { accountStrategyKey } from "../shared/identifiers.js";
import type { AccountId, StrategyId } from "../shared/identifiers.js";
import { ok } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import type { SharedStore, StoreResult } from "./shared-store.js";

export interface TradePauseState {
	readonly paused: boolean;
	readonly resumeAt: number;
	readonly reason?: string | undefined;
}

const pauseSchema = z.object({
	paused: z.boolean(),
	resumeAt: z.number(),
	reason: z.string().optional(),
});

export class TradePauseStore {
	private readonly store: SharedStore;
	private readonly clock: Clock;

	constructor(store: SharedStore, clock: Clock = SystemClock) {
		this.store = store;
		this.clock = clock;
	}

	static key(account: AccountId, strategy: StrategyId): string {
		return `trade_pause:${accountStrategyKey(account, strategy)}`;
	}

	/** Active pause, or undefined when none is in force. */
	async active(account: AccountId, strategy: StrategyId): StoreResult<TradePauseState | undefined> {
		const raw = await this.store.get(TradePauseStore.key(account, strategy));
		if (!raw.ok) return raw;
		if (raw.value === undefined) return ok(undefined);

		let json: unknown;
		try {
			json = JSON.parse(raw.value);
		} catch {
			return ok(undefined);
		}
		const parsed = validate(pauseSchema, json);
		if (!parsed.ok || !parsed.value.paused || parsed.value.resumeAt <= this.clock.now()) {
			return ok(undefined);
		}
		return ok(parsed.value);
	}

	async pause(
		account: AccountId,
		strategy: StrategyId,
		resumeAt: number,
		reason?: string,
	): StoreResult<TradePauseState> {
		const state: TradePauseState = { paused: true, resumeAt, reason };
		const written = await this.store.set(
			TradePauseStore.key(account, strategy),
			JSON.stringify(state),
			resumeAt - this.clock.now(),
		);
		if (!written.ok) return written;
		return ok(state);
	}

	/** Manual override: lift the pause before it expires. */
	async clearPause(account: AccountId, strategy: StrategyId): StoreResult<boolean> {
		return this.store.delete(TradePauseStore.key(account, strategy));
	}
}
