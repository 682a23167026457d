/**
 * Injectable clock and the UTC calendar helpers the schedule and daily-loss gates use.
 *
 * All core code reads time through Clock.now(), so schedules, cooldowns and
 * day boundaries can be driven deterministically in tests.
 */

/** Injectable time source (epoch milliseconds). */
export interface Clock {
	now(): number;
}

/** Production clock backed by `Date.now()`. */
export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Controllable clock for deterministic testing. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}
}

/** Helpers to convert human-readable durations to milliseconds. */
export const Duration = {
	ms: (n: number) => n,
	seconds: (n: number) => n * 1_000,
	minutes: (n: number) => n * 60_000,
	hours: (n: number) => n * 3_600_000,
} as const;

// ── UTC calendar ─────────────────────────────────────────────────────

const DAY_MS = 86_400_000;

/** English weekday names, indexed like `Date#getUTCDay()`. */
export const WEEKDAYS = [
	"Sunday",
	"Monday",
	"Tuesday",
	"Wednesday",
	"Thursday",
	"Friday",
	"Saturday",
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

/** Epoch ms of 00:00:00 UTC on the day containing `ms`. */
export function startOfUtcDay(ms: number): number {
	return Math.floor(ms / DAY_MS) * DAY_MS;
}

/** Epoch ms of the next 00:00:00 UTC strictly after `ms`. */
export function nextUtcMidnight(ms: number): number {
	return startOfUtcDay(ms) + DAY_MS;
}

/** `YYYY-MM-DD` of the UTC day containing `ms`. */
export function utcDateKey(ms: number): string {
	return new Date(ms).toISOString().slice(0, 10);
}

export function utcWeekday(ms: number): Weekday {
	return WEEKDAYS[new Date(ms).getUTCDay()] ?? "Sunday";
}

/** Seconds elapsed since 00:00:00 UTC on the day containing `ms`. */
export function utcSecondOfDay(ms: number): number {
	return Math.floor((ms - startOfUtcDay(ms)) / 1_000);
}

/** Resolve after `ms` milliseconds; resolves immediately for `ms <= 0`. */
export function sleep(ms: number): Promise<void> {
	if (ms <= 0) return Promise.resolve();
	return new Promise((resolve) => {
		setTimeout(resolve, ms);
	});
}

/**
 * Race `promise` against a timer. Rejects with `onTimeout()` when the timer
 * wins; the timer is always cleared.
 */
export async function withTimeout<T>(
	promise: Promise<T>,
	ms: number,
	onTimeout: () => Error,
): Promise<T> {
	let timer: ReturnType<typeof setTimeout> | undefined;
	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(() => reject(onTimeout()), ms);
	});
	try {
		return await Promise.race([promise, timeout]);
	} finally {
		if (timer !== undefined) clearTimeout(timer);
	}
}
