import type { TradingError } from "../shared/errors.js";

/** Callback receiving the opaque payload of a data frame for one topic. */
export type TopicHandler = (payload: unknown) => void;

/** A registered topic; replayed verbatim after every reconnect. */
export interface Subscription {
	readonly topic: string;
	readonly handler: TopicHandler;
}

/**
 * Decoded inbound frame.
 * - `data`: application frame for a topic, payload decoded on demand by the handler
 * - `ack`: heartbeat acknowledgement; `seq` is null when it carries no usable sequence
 * - `ignored`: anything else (subscribe confirmations, malformed frames, unknown ops)
 */
export type Frame =
	| { readonly kind: "data"; readonly topic: string; readonly payload: unknown }
	| { readonly kind: "ack"; readonly seq: number | null }
	| { readonly kind: "ignored" };

/**
 * How a venue proves liveness.
 * - `control`: WebSocket ping control frames carrying the sequence; the pong echoes it
 * - `message`: application-level probe frames acknowledged by an `ack` frame
 */
export type HeartbeatStyle =
	| { readonly kind: "control" }
	| { readonly kind: "message"; encodeProbe(seq: number): string };

/** Venue wire dialect as seen by the stream client. */
export interface StreamDialect {
	encodeSubscribe(topic: string): string;
	decodeFrame(raw: string): Frame;
	readonly heartbeat: HeartbeatStyle;
}

export type StreamState = "disconnected" | "connecting" | "connected" | "reconnecting" | "closed";

/** Read-only snapshot of a stream client's connection bookkeeping. */
export interface ConnectionState {
	readonly state: StreamState;
	readonly connected: boolean;
	readonly reconnectCount: number;
	/** Epoch ms of the last inbound frame of any kind, null before the first. */
	readonly lastMessageAt: number | null;
	/** Epoch ms of the last heartbeat ack, or of the dial when none arrived yet. */
	readonly lastPongAt: number | null;
	/** Outstanding probes: sequence → send time (epoch ms). */
	readonly outstandingPings: ReadonlyMap<number, number>;
	readonly roundTripMs: number | null;
}

/** Events emitted by a stream client. */
export type StreamEvents = {
	state: (state: StreamState) => void;
	/** A redial and resubscription completed; the count includes this one. */
	reconnected: (reconnectCount: number) => void;
	/** The heartbeat found no ack for `silentMs` and dropped the connection. */
	stale: (silentMs: number) => void;
	/** A connection ended; recovery follows unless the client is closed. */
	disconnected: (reason: TradingError) => void;
};
