/**
 * ExecutionCoordinator — fans one signal out to every subscribed account.
 *
 * Each account runs risk evaluation, entry placement and state write in
 * order, concurrently with the other accounts and without seeing their data.
 * The whole dispatch is bounded by `coordinatorTimeoutMs`; accounts still
 * running at the deadline are reported as failed with TIMEOUT.
 *
 * Work on one (account, symbol) is serialised across overlapping dispatches,
 * so a second signal is evaluated only after the first one's position is
 * recorded.
 */

import { BoundedExchange } from "../exchange/bounded-exchange.js";
import type { ExchangeClient } from "../exchange/types.js";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { PositionStore } from "../persistence/position-store.js";
import { KeyedLock } from "../position/keyed-lock.js";
import type { RiskProfile, RiskProfileStore } from "../risk/profile.js";
import type { RiskEngine } from "../risk/risk-engine.js";
import type { AccountState } from "../risk/types.js";
import type { TradeSignal } from "../signal/trade-signal.js";
import type { CoreConfig } from "../shared/config.js";
import { DEFAULT_CORE_CONFIG } from "../shared/config.js";
import type { TradingError } from "../shared/errors.js";
import { errorMessage } from "../shared/errors.js";
import type { AccountId } from "../shared/identifiers.js";
import { ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { EntryExecutor } from "./entry-executor.js";
import { FailureCode, countOutcomes } from "./types.js";
import type { AccountOutcome, AggregatedResult } from "./types.js";

export interface CoordinatorDeps {
	readonly profiles: RiskProfileStore;
	readonly exchanges: ReadonlyMap<AccountId, ExchangeClient>;
	readonly risk: RiskEngine;
	readonly executor: EntryExecutor;
	readonly config?: Partial<Pick<CoreConfig, "coordinatorTimeoutMs" | "exchangeTimeoutMs">> | undefined;
	readonly logger?: Logger | undefined;
}

export class ExecutionCoordinator {
	private readonly deps: CoordinatorDeps;
	private readonly exchanges = new Map<AccountId, ExchangeClient>();
	private readonly timeoutMs: number;
	private readonly logger: Logger;
	private readonly inFlight = new Set<Promise<void>>();
	private readonly claims = new KeyedLock();

	constructor(deps: CoordinatorDeps) {
		this.deps = deps;
		this.timeoutMs = deps.config?.coordinatorTimeoutMs ?? DEFAULT_CORE_CONFIG.coordinatorTimeoutMs;
		this.logger = (deps.logger ?? silentLogger()).child({ component: "coordinator" });
		const exchangeTimeoutMs = deps.config?.exchangeTimeoutMs ?? DEFAULT_CORE_CONFIG.exchangeTimeoutMs;
		for (const [account, client] of deps.exchanges) {
			this.exchanges.set(account, new BoundedExchange(client, exchangeTimeoutMs));
		}
	}

	/**
	 * Evaluate and execute `signal` for every account subscribed to its
	 * strategy. The signal itself is never retried.
	 *
	 * @example
	 * ```ts
	 * const result = await coordinator.dispatch(signal);
	 * if (result.ok) console.log(result.value.counts); // { total: 2, executed: 1, rejected: 1, ... }
	 * ```
	 */
	async dispatch(signal: TradeSignal): Promise<Result<AggregatedResult, TradingError>> {
		const subscribed = await this.deps.profiles.forStrategy(signal.strategyId);
		if (!subscribed.ok) return subscribed;
		const profiles = subscribed.value;

		const settled = new Map<AccountId, AccountOutcome>();
		const controller = new AbortController();
		const tasks = profiles.map(async (profile) => {
			const outcome = await this.runAccount(signal, profile, controller.signal);
			settled.set(profile.accountId, outcome);
			if (controller.signal.aborted) {
				this.logger.warn(
					{ accountId: profile.accountId, symbol: signal.symbol, outcome: outcome.kind },
					"account finished after the dispatch deadline",
				);
			}
		});

		const all = Promise.all(tasks).then(() => undefined);
		this.track(all);
		const finished = await this.raceDeadline(all);
		if (!finished) controller.abort();

		const perAccount = profiles.map(
			(p): AccountOutcome =>
				settled.get(p.accountId) ?? {
					kind: "failed",
					accountId: p.accountId,
					code: FailureCode.Timeout,
					reason: `not finished within ${this.timeoutMs}ms`,
				},
		);
		const counts = countOutcomes(perAccount);
		this.logger.info(
			{ strategyId: signal.strategyId, symbol: signal.symbol, ...counts, timedOut: !finished },
			"signal dispatched",
		);
		return ok({
			strategyId: signal.strategyId,
			symbol: signal.symbol,
			direction: signal.direction,
			perAccount,
			counts,
			timedOut: !finished,
		});
	}

	/** Wait for account tasks still running past their dispatch deadline. */
	async drain(): Promise<void> {
		await Promise.all([...this.inFlight]);
	}

	get pendingTasks(): number {
		return this.inFlight.size;
	}

	private async runAccount(signal: TradeSignal, profile: RiskProfile, abort: AbortSignal): Promise<AccountOutcome> {
		const accountId = profile.accountId;
		const exchange = this.exchanges.get(accountId);
		if (!exchange) {
			return {
				kind: "failed",
				accountId,
				code: FailureCode.NoExchangeClient,
				reason: `no exchange client registered for ${accountId}`,
			};
		}

		try {
			const claim = PositionStore.key(accountId, signal.symbol);
			return await this.claims.run(claim, async (): Promise<AccountOutcome> => {
				const account: AccountState = { accountId, currentBalance: () => exchange.getBalance() };
				const verdict = await this.deps.risk.evaluate(signal, profile, account);
				if (verdict.type === "block") {
					return {
						kind: "rejected",
						accountId,
						code: verdict.code,
						reason: verdict.reason,
						details: verdict.details,
					};
				}
				return this.deps.executor.execute(signal, profile, exchange, abort);
			});
		} catch (e) {
			this.logger.error({ accountId, symbol: signal.symbol, err: errorMessage(e) }, "account task threw");
			return { kind: "failed", accountId, code: FailureCode.Unexpected, reason: errorMessage(e) };
		}
	}

	/** True when `work` settled before the deadline. */
	private async raceDeadline(work: Promise<void>): Promise<boolean> {
		let timer: ReturnType<typeof setTimeout> | undefined;
		const deadline = new Promise<false>((resolve) => {
			timer = setTimeout(() => resolve(false), this.timeoutMs);
		});
		try {
			return await Promise.race([work.then((): true => true), deadline]);
		} finally {
			if (timer !== undefined) clearTimeout(timer);
		}
	}

	private track(work: Promise<void>): void {
		this.inFlight.add(work);
		void work
			.catch((e: unknown) => {
				this.logger.error({ err: errorMessage(e) }, "dispatch task failed");
			})
			.finally(() => this.inFlight.delete(work));
	}
}
