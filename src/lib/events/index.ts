import { EventEmitter } from "eventemitter3";

/**
 * Generic typed event map -- keys are event names, values are handler signatures.
 * Example: { alert: (a: CoreAlert) => void; degraded: (key: string) => void }
 */
export type EventMap = Record<string, (...args: never[]) => void>;

/**
 * Type-safe event emitter wrapping eventemitter3 with compile-time handler validation.
 *
 * @example
 * ```ts
 * type Events = { alert: (a: CoreAlert) => void };
 * const emitter = new TypedEmitter<Events>();
 * emitter.on("alert", (a) => pager.notify(a));
 * ```
 */
export interface TypedEmitterOptions {
	/**
	 * Receives an error thrown by a listener. When set, `emit()` does not
	 * rethrow; listeners registered after the failing one are skipped.
	 */
	readonly onListenerError?: (event: string, error: unknown) => void;
}

export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();
	private readonly onListenerError: TypedEmitterOptions["onListenerError"];

	constructor(options: TypedEmitterOptions = {}) {
		this.onListenerError = options.onListenerError;
	}

	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.on(event, handler as (...args: unknown[]) => void);
		return this;
	}

	off<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.off(event, handler as (...args: unknown[]) => void);
		return this;
	}

	once<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.once(event, handler as (...args: unknown[]) => void);
		return this;
	}

	/** Invokes every handler for `event`; returns false when nobody listens. */
	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		try {
			return this.ee.emit(event, ...args);
		} catch (error) {
			if (!this.onListenerError) throw error;
			this.onListenerError(event, error);
			return true;
		}
	}

	removeAllListeners<K extends keyof TEvents & string>(event?: K): this {
		if (event) {
			this.ee.removeAllListeners(event);
		} else {
			this.ee.removeAllListeners();
		}
		return this;
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}
}
