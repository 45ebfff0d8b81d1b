/**
 * Time utilities — injectable clock for deterministic testing.
 *
 * Code that reasons about elapsed time reads Clock.now() instead of
 * Date.now(), so tests move time by hand.
 */

/** Injectable time source. */
export interface Clock {
	now(): number;
}

/** Production clock backed by `Date.now()`. */
export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Controllable clock for deterministic testing -- advance time manually with `advance()`. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}
}

// ── Duration helpers ─────────────────────────────────────────────────

/** Helpers to convert human-readable durations to milliseconds. */
export const Duration = {
	ms: (n: number) => n,
	seconds: (n: number) => n * 1_000,
	minutes: (n: number) => n * 60_000,
	hours: (n: number) => n * 3_600_000,
} as const;

/** Epoch milliseconds of local midnight for the day containing `ms`. */
export function startOfLocalDay(ms: number): number {
	const d = new Date(ms);
	return new Date(d.getFullYear(), d.getMonth(), d.getDate()).getTime();
}

/**
 * Waits `ms`, resolving early when `signal` aborts.
 * @returns true when the full delay elapsed, false when aborted
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
	if (signal?.aborted) return Promise.resolve(false);
	return new Promise<boolean>((resolve) => {
		const onAbort = (): void => {
			clearTimeout(timer);
			resolve(false);
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve(true);
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}
