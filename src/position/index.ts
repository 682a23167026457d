export type {
	GuardianAction,
	GuardianOutcome,
	LevelMetadata,
	Position,
	StateSync,
} from "./types.js";
export { GuardianCode, GuardianStatus, INITIAL_LEVEL, isGuardianSuccess } from "./types.js";
export {
	PositionGuardian,
	checkStopSide,
	checkTargetSide,
	tightensFrom,
	type GuardianDeps,
	type OpenPositionInput,
} from "./guardian.js";
export { IdempotencyGuard, actionKey, type IdempotencyConfig } from "./idempotency-guard.js";
export { KeyedLock } from "./keyed-lock.js";
export {
	initialPositionState,
	isClosed,
	nextPositionState,
	type PositionEvent,
	type PositionState,
} from "./position-state.js";
