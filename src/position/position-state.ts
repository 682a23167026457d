/**
 * Position lifecycle transitions.
 *
 * open(initial) → open(level L1) → … → open(level Ln) → closed
 *
 * Any number of trailing levels may be applied while open; `closed` is
 * terminal.
 */

import { StateConflictError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import { INITIAL_LEVEL } from "./types.js";

export type PositionState =
	| { readonly kind: "open"; readonly level: string }
	| { readonly kind: "closed" };

export type PositionEvent =
	| { readonly type: "level_applied"; readonly level: string }
	| { readonly type: "adjusted" }
	| { readonly type: "closed" };

export function initialPositionState(): PositionState {
	return { kind: "open", level: INITIAL_LEVEL };
}

export function isClosed(state: PositionState): boolean {
	return state.kind === "closed";
}

/**
 * Applies `event` to `state`. Every event on a closed position is a conflict.
 *
 * @example
 * ```ts
 * nextPositionState({ kind: "open", level: "initial" }, { type: "level_applied", level: "L1" });
 * // ok({ kind: "open", level: "L1" })
 * ```
 */
export function nextPositionState(
	state: PositionState,
	event: PositionEvent,
): Result<PositionState, StateConflictError> {
	if (state.kind === "closed") {
		return err(new StateConflictError(`position already closed, cannot apply ${event.type}`));
	}
	switch (event.type) {
		case "level_applied":
			return ok({ kind: "open", level: event.level });
		case "adjusted":
			return ok(state);
		case "closed":
			return ok({ kind: "closed" });
	}
}
