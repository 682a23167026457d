/**
 * In-memory, append-only journal. Nothing survives a restart; used by tests
 * and by deployments that ship audit records elsewhere.
 *
 * `setAvailable(false)` makes writes fail with StoreUnavailableError, the way
 * the other in-process stand-ins simulate an outage.
 */

import { StoreUnavailableError } from "../shared/errors.js";
import type { Journal } from "./journal.js";

export interface MemoryJournalConfig {
	/** Oldest records are dropped beyond this count. Default: unbounded */
	readonly maxEntries?: number;
}

export class MemoryJournal<T> implements Journal<T> {
	private readonly records: T[] = [];
	private readonly limit: number;
	private available = true;

	constructor(config: MemoryJournalConfig = {}) {
		this.limit = config.maxEntries ?? Number.POSITIVE_INFINITY;
	}

	setAvailable(available: boolean): void {
		this.available = available;
	}

	async record(entry: T): Promise<void> {
		if (!this.available) throw new StoreUnavailableError("journal unavailable");
		this.records.push(entry);
		if (this.records.length > this.limit) {
			this.records.splice(0, this.records.length - this.limit);
		}
	}

	async flush(): Promise<void> {
		return undefined;
	}

	/** Oldest first; a copy. */
	entries(): T[] {
		return this.records.slice();
	}

	get size(): number {
		return this.records.length;
	}

	clear(): void {
		this.records.splice(0);
	}
}
