import { Notifier } from "../lib/async/notifier.js";
import { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import type { WsTransport, WsTransportFactory } from "../lib/websocket/types.js";
import { NetworkError, TimeoutError, classifyError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import { SystemClock, sleep } from "../shared/time.js";
import type { Clock } from "../shared/time.js";
import { type ReconnectionConfig, ReconnectionPolicy } from "./reconnection.js";
import type {
	ConnectionState,
	StreamDialect,
	StreamEvents,
	StreamState,
	Subscription,
	TopicHandler,
} from "./types.js";

export interface StreamClientConfig {
	/** Venue label used in logs and errors. */
	readonly venue: string;
	readonly pingIntervalMs: number;
	readonly pongTimeoutMs: number;
	readonly reconnect: ReconnectionConfig;
}

export interface StreamClientDeps {
	readonly transportFactory: WsTransportFactory;
	readonly dialect: StreamDialect;
	readonly logger: Logger;
	readonly clock?: Clock;
	/** Overrides the backoff built from `config.reconnect`. */
	readonly reconnectionPolicy?: ReconnectionPolicy;
}

/**
 * Resilient streaming client for one venue.
 *
 * Holds one live connection at a time. Failures (read error, close, heartbeat
 * stall, probe-send failure) tear the connection down and wake the reconnect
 * supervisor, which redials with exponential backoff and replays every
 * subscription in registration order. Callbacks from a superseded connection
 * are discarded by generation.
 *
 * @example
 * ```ts
 * const stream = new StreamClient(config, { transportFactory, dialect, logger });
 * const connected = await stream.connect();
 * if (connected.ok) stream.subscribe("orderbook.1.BTCUSDT", onBook);
 * ```
 */
export class StreamClient {
	readonly events = new TypedEmitter<StreamEvents>();

	private readonly config: StreamClientConfig;
	private readonly transportFactory: WsTransportFactory;
	private readonly dialect: StreamDialect;
	private readonly logger: Logger;
	private readonly clock: Clock;
	private readonly backoff: ReconnectionPolicy;

	private readonly subscriptions: Subscription[] = [];
	private readonly reconnectSignal = new Notifier();
	private readonly shutdown = new AbortController();
	private readonly outstandingPings = new Map<number, number>();

	private transport: WsTransport | null = null;
	private generation = 0;
	private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
	private supervisor: Promise<void> | null = null;
	private seq = 0;
	private state: StreamState = "disconnected";
	private reconnectCount = 0;
	private lastMessageAt: number | null = null;
	private lastPongAt: number | null = null;
	private roundTripMs: number | null = null;

	constructor(config: StreamClientConfig, deps: StreamClientDeps) {
		this.config = config;
		this.transportFactory = deps.transportFactory;
		this.dialect = deps.dialect;
		this.logger = deps.logger.child({ component: "stream", venue: config.venue });
		this.clock = deps.clock ?? SystemClock;
		this.backoff = deps.reconnectionPolicy ?? new ReconnectionPolicy(config.reconnect);
	}

	// ── Lifecycle ──────────────────────────────────────────────────

	/**
	 * Dials the first connection and starts background recovery.
	 * A failed first dial is returned to the caller and starts nothing.
	 */
	async connect(): Promise<Result<void, TradingError>> {
		if (this.state === "closed") {
			return err(new NetworkError("stream client is closed", { venue: this.config.venue }));
		}
		if (this.supervisor !== null) {
			return err(new NetworkError("stream client already connected", { venue: this.config.venue }));
		}
		const dialed = await this.dial();
		if (!dialed.ok) {
			this.setState("disconnected");
			return dialed;
		}
		this.supervisor = this.superviseReconnects().catch((e: unknown) => {
			this.logger.error({ err: classifyError(e) }, "reconnect supervisor crashed");
		});
		return ok(undefined);
	}

	/**
	 * Registers `topic` and asks the venue for it.
	 *
	 * The registration survives a failed send and is replayed on reconnect.
	 * Duplicate topics are kept; dispatch goes to the first registered.
	 */
	subscribe(topic: string, handler: TopicHandler): Result<void, TradingError> {
		if (this.state === "closed") {
			return err(new NetworkError("stream client is closed", { venue: this.config.venue, topic }));
		}
		this.subscriptions.push({ topic, handler });
		const transport = this.transport;
		if (transport === null || this.state !== "connected") {
			return err(new NetworkError("stream not connected", { venue: this.config.venue, topic }));
		}
		return transport.send(this.dialect.encodeSubscribe(topic));
	}

	isReady(): boolean {
		return this.state === "connected";
	}

	/** Terminal and idempotent: stops the heartbeat and supervisor and closes the socket. */
	close(): void {
		if (this.state === "closed") return;
		this.state = "closed";
		this.shutdown.abort();
		this.stopHeartbeat();
		this.outstandingPings.clear();
		const transport = this.transport;
		this.transport = null;
		transport?.close();
		this.events.emit("state", "closed");
		this.logger.info("stream closed");
	}

	/** Resolves once the reconnect supervisor has exited (after `close()`). */
	async whenStopped(): Promise<void> {
		await this.supervisor;
	}

	getConnectionState(): ConnectionState {
		return {
			state: this.state,
			connected: this.state === "connected",
			reconnectCount: this.reconnectCount,
			lastMessageAt: this.lastMessageAt,
			lastPongAt: this.lastPongAt,
			outstandingPings: new Map(this.outstandingPings),
			roundTripMs: this.roundTripMs,
		};
	}

	// ── Connection ─────────────────────────────────────────────────

	private async dial(): Promise<Result<void, TradingError>> {
		this.setState("connecting");
		const generation = ++this.generation;
		const transport = this.transportFactory();

		transport.onMessage((raw) => this.handleFrame(generation, raw));
		transport.onPong((payload) => {
			if (!this.isCurrent(generation)) return;
			this.lastMessageAt = this.clock.now();
			this.handleAck(parseSeq(payload));
		});
		transport.onPing(() => {
			if (this.isCurrent(generation)) this.lastMessageAt = this.clock.now();
		});
		transport.onClose((code, reason) => {
			this.fail(generation, new NetworkError("connection closed", { code, reason }));
		});
		transport.onError((error) => this.fail(generation, classifyError(error)));

		const result = await transport.connect();
		if (!result.ok) {
			this.logger.warn({ err: result.error }, "dial failed");
			return result;
		}
		if (this.shutdown.signal.aborted) {
			transport.close();
			return err(
				new NetworkError("stream client closed during dial", { venue: this.config.venue }),
			);
		}

		this.transport = transport;
		this.outstandingPings.clear();
		this.lastPongAt = this.clock.now();
		this.setState("connected");
		this.startHeartbeat(generation);
		this.logger.info({ generation }, "connected");
		return ok(undefined);
	}

	/** Tears down the connection of `generation` once and wakes the supervisor. */
	private fail(generation: number, reason: TradingError): void {
		if (!this.isCurrent(generation) || this.state !== "connected") return;
		this.stopHeartbeat();
		this.setState("disconnected");
		this.outstandingPings.clear();
		const transport = this.transport;
		this.transport = null;
		transport?.terminate();
		this.logger.warn({ err: reason }, "connection lost");
		this.events.emit("disconnected", reason);
		this.reconnectSignal.notify();
	}

	private isCurrent(generation: number): boolean {
		return generation === this.generation && this.state !== "closed";
	}

	private setState(next: StreamState): void {
		if (this.state === "closed" || this.state === next) return;
		this.state = next;
		this.events.emit("state", next);
	}

	// ── Inbound ────────────────────────────────────────────────────

	private handleFrame(generation: number, raw: string): void {
		if (!this.isCurrent(generation)) return;
		this.lastMessageAt = this.clock.now();
		const frame = this.dialect.decodeFrame(raw);
		switch (frame.kind) {
			case "ack":
				this.handleAck(frame.seq);
				return;
			case "ignored":
				return;
			case "data":
				this.dispatch(frame.topic, frame.payload);
				return;
		}
	}

	private dispatch(topic: string, payload: unknown): void {
		if (topic.length === 0) return;
		const sub = this.subscriptions.find((s) => s.topic === topic);
		if (sub === undefined) return;
		try {
			sub.handler(payload);
		} catch (e) {
			this.logger.error({ err: classifyError(e), topic }, "subscription handler threw");
		}
	}

	/** Liveness is refreshed by any ack; RTT only by an ack matching an outstanding probe. */
	private handleAck(seq: number | null): void {
		const now = this.clock.now();
		this.lastPongAt = now;
		if (seq === null) return;
		const sentAt = this.outstandingPings.get(seq);
		if (sentAt === undefined) return;
		this.outstandingPings.delete(seq);
		this.roundTripMs = now - sentAt;
	}

	// ── Heartbeat ──────────────────────────────────────────────────

	private startHeartbeat(generation: number): void {
		this.stopHeartbeat();
		this.heartbeatTimer = setInterval(() => this.heartbeat(generation), this.config.pingIntervalMs);
	}

	private stopHeartbeat(): void {
		if (this.heartbeatTimer !== null) {
			clearInterval(this.heartbeatTimer);
			this.heartbeatTimer = null;
		}
	}

	private heartbeat(generation: number): void {
		const transport = this.transport;
		if (!this.isCurrent(generation) || transport === null) return;

		const now = this.clock.now();
		const silentMs = now - (this.lastPongAt ?? now);
		if (silentMs > this.config.pingIntervalMs + this.config.pongTimeoutMs) {
			this.events.emit("stale", silentMs);
			this.fail(generation, new TimeoutError("heartbeat stale", { silentMs }));
			return;
		}

		this.seq += 1;
		const seq = this.seq;
		this.outstandingPings.set(seq, now);
		const style = this.dialect.heartbeat;
		const sent =
			style.kind === "control"
				? transport.ping(String(seq))
				: transport.send(style.encodeProbe(seq));
		if (!sent.ok) {
			this.fail(generation, sent.error);
		}
	}

	// ── Recovery ───────────────────────────────────────────────────

	private async superviseReconnects(): Promise<void> {
		const signal = this.shutdown.signal;
		while (!signal.aborted) {
			if (!(await this.reconnectSignal.wait(signal))) return;
			this.setState("reconnecting");

			const delayMs = this.backoff.nextDelay();
			this.logger.info({ delayMs, attempt: this.backoff.attemptCount }, "reconnecting");
			if (!(await sleep(delayMs, signal))) return;

			const dialed = await this.dial();
			if (signal.aborted) return;
			if (!dialed.ok) {
				this.setState("disconnected");
				this.reconnectSignal.notify();
				continue;
			}

			this.reconnectCount += 1;
			const failures = this.resubscribeAll();
			if (failures === 0) {
				this.backoff.reset();
			}
			this.logger.info(
				{ reconnectCount: this.reconnectCount, subscriptions: this.subscriptions.length, failures },
				"reconnected",
			);
			this.events.emit("reconnected", this.reconnectCount);
		}
	}

	/** Resends every subscription in registration order. Returns the number of failed sends. */
	private resubscribeAll(): number {
		const transport = this.transport;
		if (transport === null) return this.subscriptions.length;
		let failures = 0;
		for (const sub of this.subscriptions) {
			const sent = transport.send(this.dialect.encodeSubscribe(sub.topic));
			if (!sent.ok) {
				failures += 1;
				this.logger.warn({ err: sent.error, topic: sub.topic }, "resubscribe failed");
			}
		}
		return failures;
	}
}

function parseSeq(payload: string): number | null {
	return /^\d+$/.test(payload) ? Number(payload) : null;
}
