/**
 * Idempotency guard — remembers recently applied (action, parameters) keys.
 *
 * Keys expire after the TTL so a genuinely new request with the same shape
 * (e.g. a later position on the same symbol) is not swallowed forever.
 */
import type { Clock } from "../shared/time.js";

export interface IdempotencyConfig {
	readonly ttlMs: number;
}

interface Entry {
	readonly expiresMs: number;
}

/** Key for a guardian request: action plus its identifying parameters. */
export function actionKey(action: string, ...parts: readonly (string | number | boolean | null)[]): string {
	return [action, ...parts.map(String)].join(":");
}

export class IdempotencyGuard {
	private readonly entries = new Map<string, Entry>();
	private readonly ttlMs: number;
	private readonly clock: Clock;

	private constructor(config: IdempotencyConfig, clock: Clock) {
		this.ttlMs = config.ttlMs;
		this.clock = clock;
	}

	static create(config: IdempotencyConfig, clock: Clock): IdempotencyGuard {
		return new IdempotencyGuard(config, clock);
	}

	/**
	 * True when `key` was claimed and has not expired. Otherwise claims it
	 * and returns false.
	 */
	isDuplicate(key: string): boolean {
		this.evict();
		if (this.entries.has(key)) return true;
		this.entries.set(key, { expiresMs: this.clock.now() + this.ttlMs });
		return false;
	}

	/** Drop a claim, e.g. when the claimed action failed and may be retried. */
	release(key: string): void {
		this.entries.delete(key);
	}

	/** Number of active (non-expired) entries. */
	get size(): number {
		this.evict();
		return this.entries.size;
	}

	clear(): void {
		this.entries.clear();
	}

	private evict(): void {
		const now = this.clock.now();
		for (const [key, entry] of this.entries) {
			if (entry.expiresMs <= now) {
				this.entries.delete(key);
			}
		}
	}
}
