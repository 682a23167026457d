import { ok } from "../../shared/result.js";
import type { EntryGuard, GuardCheck, GuardContext } from "../types.js";
import { RejectionCode, allow, block } from "../types.js";

export class SymbolBlacklistGuard implements EntryGuard {
	readonly name = "symbol_blacklist";
	readonly failurePolicy = "closed";

	static create(): SymbolBlacklistGuard {
		return new SymbolBlacklistGuard();
	}

	async check(ctx: GuardContext): GuardCheck {
		if (!ctx.profile.blacklistedSymbols.has(ctx.signal.symbol)) return ok(allow());
		return ok(
			block(this.name, RejectionCode.SymbolBlocked, `${ctx.signal.symbol} is blacklisted`, {
				symbol: ctx.signal.symbol,
			}),
		);
	}
}
