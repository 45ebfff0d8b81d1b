import type { TradingError } from "../../shared/errors.js";
import type { Result } from "../../shared/result.js";

/**
 * Configuration for one WebSocket connection.
 */
export interface WsConfig {
	/** WebSocket server URL (ws:// or wss://) */
	readonly url: string;
	/** Upper bound on the opening handshake, including the TCP dial. */
	readonly dialTimeoutMs: number;
}

/**
 * WebSocket connection lifecycle state.
 * - `connecting`: Connection in progress
 * - `open`: Connected and ready
 * - `closing`: Close initiated
 * - `closed`: Connection terminated
 */
export type WsState = "connecting" | "open" | "closing" | "closed";

/** Callback invoked with each text frame received. */
export type WsMessageHandler = (data: string) => void;

/** Callback invoked once when the connection closes. */
export type WsCloseHandler = (code: number, reason: string) => void;

export type WsErrorHandler = (error: Error) => void;

/** Callback invoked with the payload of a ping or pong control frame. */
export type WsControlHandler = (payload: string) => void;

/**
 * Full-duplex frame channel with ping/pong control frames.
 *
 * `WsClient` is the production implementation; tests substitute in-memory fakes.
 */
export interface WsTransport {
	connect(): Promise<Result<void, TradingError>>;
	send(data: string): Result<void, TradingError>;
	ping(payload: string): Result<void, TradingError>;
	/** Closing handshake. */
	close(): void;
	/** Drops the socket without a closing handshake. */
	terminate(): void;
	getState(): WsState;
	onMessage(handler: WsMessageHandler): void;
	onClose(handler: WsCloseHandler): void;
	onError(handler: WsErrorHandler): void;
	onPong(handler: WsControlHandler): void;
	onPing(handler: WsControlHandler): void;
}

/** Builds a fresh transport per dial. */
export type WsTransportFactory = () => WsTransport;
