import { describe, expect, it } from "vitest";
import { MemoryJournal } from "./memory-journal.js";

interface Entry {
	readonly operation: string;
	readonly timestamp: number;
}

const entry = (operation: string, timestamp: number): Entry => ({ operation, timestamp });

describe("MemoryJournal", () => {
	it("keeps entries in insertion order", async () => {
		const journal = new MemoryJournal<Entry>();
		await journal.record(entry("open", 1));
		await journal.record(entry("close", 2));

		expect(journal.entries()).toEqual([entry("open", 1), entry("close", 2)]);
		expect(journal.size).toBe(2);
	});

	it("returns a copy", async () => {
		const journal = new MemoryJournal<Entry>();
		await journal.record(entry("open", 1));

		journal.entries().pop();
		expect(journal.size).toBe(1);
	});

	it("drops the oldest entries beyond maxEntries", async () => {
		const journal = new MemoryJournal<Entry>({ maxEntries: 2 });
		for (let i = 1; i <= 4; i++) await journal.record(entry("adjust_stop", i));

		expect(journal.entries().map((e) => e.timestamp)).toEqual([3, 4]);
	});

	it("clear() empties the journal", async () => {
		const journal = new MemoryJournal<Entry>();
		await journal.record(entry("open", 1));
		journal.clear();
		await journal.flush();

		expect(journal.entries()).toEqual([]);
	});

	it("rejects writes during a simulated outage", async () => {
		const journal = new MemoryJournal<Entry>();
		journal.setAvailable(false);

		await expect(journal.record(entry("open", 1))).rejects.toThrow("journal unavailable");
		expect(journal.size).toBe(0);
	});
});
