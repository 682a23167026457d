import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { errorMessage } from "../shared/errors.js";
import type { EntryGuard, GuardContext, GuardVerdict } from "./types.js";
import { RejectionCode, allow, block } from "./types.js";

/**
 * Ordered sequence of entry guards; the first block short-circuits the rest.
 *
 * A guard that fails to evaluate is resolved by its own failure policy:
 * fail-open guards are skipped with a warning, fail-closed guards reject
 * with GATE_ERROR.
 *
 * @example
 * ```ts
 * const pipeline = GuardPipeline.create(logger)
 *   .with(TierFilterGuard.create())
 *   .with(SymbolBlacklistGuard.create());
 * const verdict = await pipeline.evaluate(ctx);
 * ```
 */
export class GuardPipeline {
	private readonly guards: readonly EntryGuard[];
	private readonly logger: Logger;

	private constructor(guards: readonly EntryGuard[], logger: Logger) {
		this.guards = guards;
		this.logger = logger;
	}

	static create(logger?: Logger): GuardPipeline {
		return new GuardPipeline([], (logger ?? silentLogger()).child({ component: "guard-pipeline" }));
	}

	/** Returns a new pipeline with `guard` appended. */
	with(guard: EntryGuard): GuardPipeline {
		return new GuardPipeline([...this.guards, guard], this.logger);
	}

	async evaluate(ctx: GuardContext): Promise<GuardVerdict> {
		for (const guard of this.guards) {
			const verdict = await this.run(guard, ctx);
			if (verdict.type === "block") return verdict;
		}
		return allow();
	}

	isEmpty(): boolean {
		return this.guards.length === 0;
	}

	len(): number {
		return this.guards.length;
	}

	guardNames(): readonly string[] {
		return this.guards.map((g) => g.name);
	}

	private async run(guard: EntryGuard, ctx: GuardContext): Promise<GuardVerdict> {
		let failure: string;
		try {
			const result = await guard.check(ctx);
			if (result.ok) return result.value;
			failure = result.error.message;
		} catch (e) {
			failure = errorMessage(e);
		}

		const bindings = {
			guard: guard.name,
			accountId: ctx.account.accountId,
			symbol: ctx.signal.symbol,
			err: failure,
		};
		if (guard.failurePolicy === "open") {
			this.logger.warn(bindings, "guard failed to evaluate; allowing (fail-open)");
			return allow();
		}
		this.logger.error(bindings, "guard failed to evaluate; rejecting (fail-closed)");
		return block(guard.name, RejectionCode.GateError, `${guard.name} could not evaluate: ${failure}`, {
			error: failure,
		});
	}
}
