/**
 * Serialises async work per key inside one process.
 *
 * Calls for the same key run one after another in arrival order; calls for
 * different keys run concurrently. Cross-process safety comes from the
 * optimistic write in PositionStore, not from this lock.
 */
export class KeyedLock {
	private readonly tails = new Map<string, Promise<void>>();

	async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
		const previous = this.tails.get(key) ?? Promise.resolve();
		let release: () => void = () => undefined;
		const current = new Promise<void>((resolve) => {
			release = resolve;
		});
		const tail = previous.then(() => current);
		this.tails.set(key, tail);

		await previous;
		try {
			return await fn();
		} finally {
			release();
			if (this.tails.get(key) === tail) this.tails.delete(key);
		}
	}

	/** Keys with work queued or running. */
	get activeKeys(): number {
		return this.tails.size;
	}
}
