/**
 * Operator alerts raised by the coordinator and the guardian.
 */

import { TypedEmitter } from "../lib/events/index.js";
import { silentLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import { errorMessage } from "../shared/errors.js";
import type { AccountId, SymbolId } from "../shared/identifiers.js";

export type AlertSeverity = "warning" | "critical";

export const AlertKind = {
	/** Entry filled but a protective order could not be placed. */
	UnprotectedPosition: "UNPROTECTED_POSITION",
	/** An entry timed out or lost its connection and no fill could be found. */
	EntryUnconfirmed: "ENTRY_UNCONFIRMED",
	/** A replaced stop could not be restored after its replacement failed. */
	StopLost: "STOP_LOST",
	/** Exchange changed, durable state did not. */
	StateDesync: "STATE_DESYNC",
	EmergencyCloseFailed: "EMERGENCY_CLOSE_FAILED",
} as const;

export type AlertKind = (typeof AlertKind)[keyof typeof AlertKind];

export interface CoreAlert {
	readonly severity: AlertSeverity;
	readonly kind: AlertKind;
	readonly accountId: AccountId;
	readonly symbol: SymbolId;
	readonly message: string;
	readonly timestamp: number;
}

export type CoreEvents = {
	alert: (alert: CoreAlert) => void;
};

/**
 * Fan-out for operator alerts. A throwing subscriber is logged and never
 * reaches the order path that raised the alert.
 */
export class AlertBus extends TypedEmitter<CoreEvents> {
	constructor(logger: Logger = silentLogger()) {
		super({
			onListenerError: (event, error) => logger.error({ event, err: errorMessage(error) }, "alert listener failed"),
		});
	}
}
