import type { ScheduleMap } from "../profile.js";
import { ConfigError } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import { utcSecondOfDay, utcWeekday } from "../../shared/time.js";
import type { EntryGuard, GuardCheck, GuardContext } from "../types.js";
import { RejectionCode, allow, block } from "../types.js";

const TIME_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;

/** Parse `HH:MM` or `HH:MM:SS` into seconds since midnight; throws when malformed. */
export function parseTimeOfDay(text: string): number {
	const match = TIME_PATTERN.exec(text.trim());
	if (!match) throw new Error(`malformed schedule time "${text}"`);
	const hours = Number(match[1]);
	const minutes = Number(match[2]);
	const seconds = match[3] === undefined ? 0 : Number(match[3]);
	if (hours > 23 || minutes > 59 || seconds > 59) {
		throw new Error(`schedule time out of range "${text}"`);
	}
	return hours * 3600 + minutes * 60 + seconds;
}

/** Windows for `weekday`, matching the key case-insensitively. */
function windowsFor(schedule: ScheduleMap, weekday: string): readonly (readonly string[])[] {
	const wanted = weekday.toLowerCase();
	for (const [day, windows] of Object.entries(schedule)) {
		if (day.toLowerCase() === wanted) return windows;
	}
	return [];
}

/** True when `secondOfDay` falls inside some `[start, end]` window (both ends inclusive). */
export function withinSchedule(
	schedule: ScheduleMap,
	weekday: string,
	secondOfDay: number,
): boolean {
	for (const window of windowsFor(schedule, weekday)) {
		const [start, end] = window;
		if (window.length !== 2 || start === undefined || end === undefined) {
			throw new Error(`schedule window for ${weekday} must be [start, end]`);
		}
		if (parseTimeOfDay(start) <= secondOfDay && secondOfDay <= parseTimeOfDay(end)) {
			return true;
		}
	}
	return false;
}

/**
 * Allows trading only inside the profile's UTC windows for the current
 * weekday. A weekday with no windows rejects all day. Fails open: a schedule
 * that cannot be parsed lets the trade through.
 */
export class ScheduleGuard implements EntryGuard {
	readonly name = "schedule";
	readonly failurePolicy = "open";

	static create(): ScheduleGuard {
		return new ScheduleGuard();
	}

	async check(ctx: GuardContext): GuardCheck {
		if (!ctx.profile.scheduleEnabled) return ok(allow());
		if (ctx.profile.scheduleIssue !== null) {
			return err(new ConfigError(`unusable schedule: ${ctx.profile.scheduleIssue}`));
		}

		const weekday = utcWeekday(ctx.nowMs);
		const second = utcSecondOfDay(ctx.nowMs);
		if (withinSchedule(ctx.profile.schedule, weekday, second)) return ok(allow());

		return ok(
			block(this.name, RejectionCode.OutsideSchedule, `outside trading schedule for ${weekday}`, {
				weekday,
				utcTime: new Date(ctx.nowMs).toISOString().slice(11, 19),
			}),
		);
	}
}
