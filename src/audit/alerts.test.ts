import { describe, expect, it } from "vitest";
import { ACC_A, BTC, MONDAY_10_UTC } from "../__tests__/fixtures.js";
import { createLogger } from "../lib/logger/index.js";
import { AlertBus, AlertKind } from "./alerts.js";
import type { CoreAlert } from "./alerts.js";

const ALERT: CoreAlert = {
	severity: "critical",
	kind: AlertKind.UnprotectedPosition,
	accountId: ACC_A,
	symbol: BTC,
	message: "entry paper-1 unprotected: stop: reset",
	timestamp: MONDAY_10_UTC,
};

describe("AlertBus", () => {
	it("delivers alerts to subscribers", () => {
		const bus = new AlertBus();
		const seen: CoreAlert[] = [];
		bus.on("alert", (a) => seen.push(a));

		bus.emit("alert", ALERT);

		expect(seen).toEqual([ALERT]);
	});

	it("logs a failing subscriber instead of throwing", () => {
		const lines: string[] = [];
		const bus = new AlertBus(createLogger({ level: "info", destination: { write: (msg) => lines.push(msg) } }));
		bus.on("alert", () => {
			throw new Error("pager down");
		});

		expect(() => bus.emit("alert", ALERT)).not.toThrow();
		const record = JSON.parse(lines[0] ?? "{}");
		expect([record.msg, record.event, record.err]).toEqual(["alert listener failed", "alert", "pager down"]);
	});
});
