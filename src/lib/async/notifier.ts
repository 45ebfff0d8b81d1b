/**
 * Notifier — a capacity-1 wake-up signal.
 *
 * `notify()` never blocks and never queues more than one pending signal:
 * repeated notifications before the consumer wakes collapse into one.
 */
export class Notifier {
	private pending = false;
	private waiter: ((signalled: boolean) => void) | null = null;

	/** Raise the signal. Returns false when one was already pending. */
	notify(): boolean {
		if (this.waiter !== null) {
			const wake = this.waiter;
			this.waiter = null;
			wake(true);
			return true;
		}
		if (this.pending) return false;
		this.pending = true;
		return true;
	}

	isPending(): boolean {
		return this.pending;
	}

	/**
	 * Resolves true once a signal is consumed, or false when `signal` aborts first.
	 * Only one waiter is supported at a time.
	 */
	wait(signal?: AbortSignal): Promise<boolean> {
		if (signal?.aborted) return Promise.resolve(false);
		if (this.pending) {
			this.pending = false;
			return Promise.resolve(true);
		}
		if (this.waiter !== null) {
			return Promise.reject(new Error("Notifier already has a waiter"));
		}
		return new Promise<boolean>((resolve) => {
			const onAbort = (): void => {
				this.waiter = null;
				resolve(false);
			};
			this.waiter = (signalled) => {
				signal?.removeEventListener("abort", onAbort);
				resolve(signalled);
			};
			signal?.addEventListener("abort", onAbort, { once: true });
		});
	}
}
