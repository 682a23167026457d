import { ok } from "../../shared/result.js";
import type { EntryGuard, GuardCheck, GuardContext } from "../types.js";
import { RejectionCode, allow, block } from "../types.js";

/**
 * Rejects signals whose tier exceeds the account's ceiling (1 = best).
 * Disabled profiles accept every tier.
 */
export class TierFilterGuard implements EntryGuard {
	readonly name = "tier_filter";
	readonly failurePolicy = "closed";

	static create(): TierFilterGuard {
		return new TierFilterGuard();
	}

	async check(ctx: GuardContext): GuardCheck {
		const { profile, signal } = ctx;
		if (!profile.tierFilterEnabled || signal.tier <= profile.tierCeiling) {
			return ok(allow());
		}
		return ok(
			block(
				this.name,
				RejectionCode.TierRejected,
				`tier ${signal.tier} exceeds ceiling ${profile.tierCeiling}`,
				{ tier: signal.tier, tierCeiling: profile.tierCeiling },
			),
		);
	}
}
