/**
 * Risk type definitions.
 *
 * A risk rejection is an expected outcome, not an error, so the controller
 * answers with a GuardVerdict rather than a Result.
 */

import type { Decimal } from "../shared/decimal.js";

// ── Guard verdict (discriminated union) ─────────────────────────────

/** Result of a risk check -- either allows the trade or blocks it with a reason. */
export type GuardVerdict =
	| { readonly type: "allow" }
	| {
			readonly type: "block";
			readonly guard: string;
			readonly reason: string;
			readonly recoverable: boolean;
			readonly currentValue?: number | undefined;
			readonly threshold?: number | undefined;
	  };

/** Create an "allow" verdict. */
export function allow(): GuardVerdict {
	return { type: "allow" };
}

/** Create a non-recoverable "block" verdict -- the halt stays until reset or day rollover. */
export function blockFatal(guard: string, reason: string): GuardVerdict {
	return { type: "block", guard, reason, recoverable: false };
}

/** Create a non-recoverable "block" verdict with diagnostic values. */
export function blockFatalWithValues(
	guard: string,
	reason: string,
	currentValue: number,
	threshold: number,
): GuardVerdict {
	return { type: "block", guard, reason, recoverable: false, currentValue, threshold };
}

/** Type guard: narrows a GuardVerdict to its "allow" variant. */
export function isAllowed(verdict: GuardVerdict): verdict is { readonly type: "allow" } {
	return verdict.type === "allow";
}

/** Type guard: narrows a GuardVerdict to its "block" variant. */
export function isBlocked(
	verdict: GuardVerdict,
): verdict is GuardVerdict & { readonly type: "block" } {
	return verdict.type === "block";
}

// ── Limits and state ────────────────────────────────────────────────

export interface RiskLimits {
	/** Halt once daily PnL falls strictly below the negative of this. */
	readonly maxDailyLoss: Decimal;
	/** Halt once this many losing trades occur in a row. */
	readonly maxConsecutiveLosses: number;
	/** Halt when available balance is strictly below this. */
	readonly minBalance: Decimal;
}

/** Read-only snapshot of the controller's bookkeeping. */
export interface RiskState {
	readonly dailyPnl: Decimal;
	readonly consecutiveLosses: number;
	readonly halted: boolean;
	readonly haltReason: string | null;
	/** Epoch ms of the local midnight the daily figures belong to. */
	readonly dayStart: number;
}
