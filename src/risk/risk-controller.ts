import type { Logger } from "../lib/logger/index.js";
import { Decimal } from "../shared/decimal.js";
import { SystemClock, startOfLocalDay } from "../shared/time.js";
import type { Clock } from "../shared/time.js";
import { allow, blockFatal, blockFatalWithValues } from "./types.js";
import type { GuardVerdict, RiskLimits, RiskState } from "./types.js";

const DAY_MS = 86_400_000;

/**
 * Sticky circuit breaker consulted before every trade attempt.
 *
 * `check` latches a halt on the first failing limit and keeps rejecting
 * with that reason until `reset()` or a local-day rollover. Daily PnL and the
 * losing streak are fed by `recordTrade`.
 *
 * @example
 * ```ts
 * const risk = new RiskController(limits, logger);
 * if (risk.check(balance).type === "allow") { ... }
 * risk.recordTrade(Decimal.from("-1.2"));
 * ```
 */
export class RiskController {
	private readonly limits: RiskLimits;
	private readonly logger: Logger;
	private readonly clock: Clock;

	private daily: Decimal = Decimal.zero();
	private losses = 0;
	private halted = false;
	private reason: string | null = null;
	private dayStart: number;

	constructor(limits: RiskLimits, logger: Logger, clock: Clock = SystemClock) {
		this.limits = limits;
		this.logger = logger.child({ component: "risk" });
		this.clock = clock;
		this.dayStart = startOfLocalDay(clock.now());
	}

	/** Gates one trade attempt against the configured limits. */
	check(availableBalance: Decimal): GuardVerdict {
		this.rollDayIfDue();

		if (this.halted) {
			return blockFatal("Halted", this.reason ?? "halted");
		}

		if (availableBalance.lt(this.limits.minBalance)) {
			return this.latch(
				blockFatalWithValues(
					"Balance",
					`available balance ${availableBalance.toFixed(2)} below minimum ${this.limits.minBalance.toFixed(2)}`,
					availableBalance.toNumber(),
					this.limits.minBalance.toNumber(),
				),
			);
		}

		if (this.daily.lt(this.limits.maxDailyLoss.neg())) {
			return this.latch(
				blockFatalWithValues(
					"DailyLoss",
					`daily loss ${this.daily.neg().toFixed(2)} exceeds limit ${this.limits.maxDailyLoss.toFixed(2)}`,
					this.daily.neg().toNumber(),
					this.limits.maxDailyLoss.toNumber(),
				),
			);
		}

		if (this.losses >= this.limits.maxConsecutiveLosses) {
			return this.latch(
				blockFatalWithValues(
					"ConsecutiveLosses",
					`${this.losses} consecutive losses reached limit ${this.limits.maxConsecutiveLosses}`,
					this.losses,
					this.limits.maxConsecutiveLosses,
				),
			);
		}

		return allow();
	}

	/** Adds a trade outcome. A negative PnL extends the losing streak; anything else ends it. */
	recordTrade(pnl: Decimal): void {
		this.daily = this.daily.add(pnl);
		if (pnl.isNegative()) {
			this.losses += 1;
			this.logger.info(
				{ pnl: pnl.toString(), dailyPnl: this.daily.toString(), consecutiveLosses: this.losses },
				"losing trade recorded",
			);
		} else {
			this.losses = 0;
			this.logger.info({ pnl: pnl.toString(), dailyPnl: this.daily.toString() }, "trade recorded");
		}
	}

	/** Operator action: clears the halt and the losing streak. Daily PnL is kept. */
	reset(): void {
		this.halted = false;
		this.reason = null;
		this.losses = 0;
		this.logger.warn("risk halt reset by operator");
	}

	dailyPnl(): Decimal {
		return this.daily;
	}

	consecutiveLosses(): number {
		return this.losses;
	}

	isHalted(): boolean {
		return this.halted;
	}

	haltReason(): string | null {
		return this.reason;
	}

	snapshot(): RiskState {
		return {
			dailyPnl: this.daily,
			consecutiveLosses: this.losses,
			halted: this.halted,
			haltReason: this.reason,
			dayStart: this.dayStart,
		};
	}

	// ── Internals ──────────────────────────────────────────────────

	private latch(verdict: GuardVerdict): GuardVerdict {
		if (verdict.type === "block" && !this.halted) {
			this.halted = true;
			this.reason = verdict.reason;
			this.logger.error({ guard: verdict.guard, reason: verdict.reason }, "risk halt");
		}
		return verdict;
	}

	private rollDayIfDue(): void {
		const now = this.clock.now();
		if (now <= this.dayStart + DAY_MS) return;
		this.daily = Decimal.zero();
		this.losses = 0;
		this.halted = false;
		this.reason = null;
		this.dayStart = startOfLocalDay(now);
		this.logger.info({ dayStart: this.dayStart }, "new trading day, daily figures reset");
	}
}
