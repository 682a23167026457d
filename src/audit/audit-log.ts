/**
 * One audit record per risk decision and guardian action.
 *
 * Writes never propagate failure to the caller: a broken journal is logged
 * and counted, and the primary operation carries on.
 */

import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { z } from "../lib/validation/index.js";
import type { Journal } from "../persistence/journal.js";
import { errorMessage } from "../shared/errors.js";
import { accountId, symbolId } from "../shared/identifiers.js";
import type { AccountId, SymbolId } from "../shared/identifiers.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";

export const AUDIT_OPERATIONS = [
	"risk_evaluation",
	"entry_execution",
	"entry_reconciliation",
	"protective_orders",
	"open",
	"close",
	"adjust_stop",
	"adjust_target",
	"adjust_both",
	"half_close",
	"sync",
] as const;

export type AuditOperation = (typeof AUDIT_OPERATIONS)[number];

export interface AuditRecord {
	readonly timestamp: number;
	readonly accountId: AccountId;
	readonly symbol: SymbolId;
	readonly operation: AuditOperation;
	readonly params: Record<string, unknown>;
	readonly result: Record<string, unknown>;
	readonly success: boolean;
	readonly error: string | null;
}

/** Shape of a stored record, for reading a journal back. */
export const auditRecordSchema: z.ZodType<AuditRecord, z.ZodTypeDef, unknown> = z.object({
	timestamp: z.number(),
	accountId: z.string().transform(accountId),
	symbol: z.string().transform(symbolId),
	operation: z.enum(AUDIT_OPERATIONS),
	params: z.record(z.unknown()),
	result: z.record(z.unknown()),
	success: z.boolean(),
	error: z.string().nullable(),
});

export type AuditInput = Omit<AuditRecord, "timestamp" | "error"> & {
	readonly error?: string | null | undefined;
};

export class AuditLog {
	private readonly journal: Journal<AuditRecord>;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private failures = 0;

	constructor(journal: Journal<AuditRecord>, clock: Clock = SystemClock, logger?: Logger) {
		this.journal = journal;
		this.clock = clock;
		this.logger = (logger ?? silentLogger()).child({ component: "audit" });
	}

	async record(input: AuditInput): Promise<void> {
		const entry: AuditRecord = {
			timestamp: this.clock.now(),
			accountId: input.accountId,
			symbol: input.symbol,
			operation: input.operation,
			params: input.params,
			result: input.result,
			success: input.success,
			error: input.error ?? null,
		};
		try {
			await this.journal.record(entry);
		} catch (e) {
			this.failures++;
			this.logger.error(
				{ operation: entry.operation, accountId: entry.accountId, symbol: entry.symbol, err: errorMessage(e) },
				"audit write failed",
			);
		}
	}

	/** Writes that failed since construction. */
	get failedWrites(): number {
		return this.failures;
	}
}
