export interface ReconnectionConfig {
	/** Floor: the delay before the first attempt after a reset. */
	readonly baseDelayMs: number;
	/** Ceiling the doubling never exceeds, before jitter. */
	readonly maxDelayMs: number;
	/** Symmetric jitter as a fraction of the delay; 0 disables it. */
	readonly jitterFactor: number;
}

/**
 * Exponential backoff: base, 2×base, 4×base … capped at maxDelayMs.
 *
 * The owner decides when a cycle counts as recovered and calls `reset()`;
 * until then every `nextDelay()` escalates.
 */
export class ReconnectionPolicy {
	private readonly config: ReconnectionConfig;
	private readonly random: () => number;
	private attempts = 0;

	constructor(config: ReconnectionConfig, random: () => number = Math.random) {
		this.config = config;
		this.random = random;
	}

	/** Delay for the next attempt; escalates the policy. */
	nextDelay(): number {
		const capped = this.peekDelay();
		this.attempts += 1;
		if (this.config.jitterFactor === 0) return capped;
		const jitter = capped * this.config.jitterFactor * (this.random() * 2 - 1);
		return Math.max(0, Math.round(capped + jitter));
	}

	/** Delay the next attempt would use, without jitter and without escalating. */
	peekDelay(): number {
		const raw = this.config.baseDelayMs * 2 ** this.attempts;
		return Math.min(raw, this.config.maxDelayMs);
	}

	/** Attempts since the last reset. */
	get attemptCount(): number {
		return this.attempts;
	}

	reset(): void {
		this.attempts = 0;
	}
}
