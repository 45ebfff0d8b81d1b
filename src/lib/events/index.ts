import EventEmitter from "eventemitter3";

/** Event name → listener signature. Declare maps with `type`, not `interface`. */
// biome-ignore lint/suspicious/noExplicitAny: listener parameters are contravariant
export type EventMap = Record<string, (...args: any[]) => void>;

/**
 * eventemitter3 behind a name-checked, argument-checked surface.
 *
 * Listeners run synchronously inside `emit`, so they must not block.
 *
 * @example
 * ```ts
 * stream.events.on("reconnected", (count) => logger.info({ count }, "stream back"));
 * ```
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly inner = new EventEmitter();

	on<K extends keyof TEvents & string>(event: K, listener: TEvents[K]): this {
		this.inner.on(event, listener);
		return this;
	}

	off<K extends keyof TEvents & string>(event: K, listener: TEvents[K]): this {
		this.inner.off(event, listener);
		return this;
	}

	/** @returns whether any listener was registered */
	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.inner.emit(event, ...args);
	}

	listenerCount(event: keyof TEvents & string): number {
		return this.inner.listenerCount(event);
	}
}
