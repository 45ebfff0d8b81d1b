import WebSocket from "ws";
import { NetworkError, classifyError } from "../../shared/errors.js";
import type { TradingError } from "../../shared/errors.js";
import { type Result, err, ok } from "../../shared/result.js";
import type {
	WsCloseHandler,
	WsConfig,
	WsControlHandler,
	WsErrorHandler,
	WsMessageHandler,
	WsState,
	WsTransport,
	WsTransportFactory,
} from "./types.js";

/**
 * WebSocket transport over the ws library.
 *
 * One instance carries one connection; callers build a new one per dial.
 * Keepalive policy lives with the caller, which drives `ping()` and listens
 * through `onPong()`. All network errors are returned as Result, never thrown.
 */
export class WsClient implements WsTransport {
	private readonly config: WsConfig;
	private ws: WebSocket | null = null;
	private state: WsState = "closed";
	private readonly messageHandlers: WsMessageHandler[] = [];
	private readonly closeHandlers: WsCloseHandler[] = [];
	private readonly errorHandlers: WsErrorHandler[] = [];
	private readonly pongHandlers: WsControlHandler[] = [];
	private readonly pingHandlers: WsControlHandler[] = [];

	constructor(config: WsConfig) {
		this.config = config;
	}

	/**
	 * Opens the connection, bounded by `dialTimeoutMs`.
	 * Resolves to err if already used, or if the handshake fails or times out.
	 */
	connect(): Promise<Result<void, TradingError>> {
		if (this.state !== "closed" || this.ws !== null) {
			return Promise.resolve(err(new NetworkError("WebSocket is already connecting or open")));
		}
		return new Promise<Result<void, TradingError>>((resolve) => {
			this.state = "connecting";
			const ws = new WebSocket(this.config.url, {
				handshakeTimeout: this.config.dialTimeoutMs,
			});
			this.ws = ws;

			let settled = false;
			const settle = (result: Result<void, TradingError>): void => {
				if (settled) return;
				settled = true;
				resolve(result);
			};

			ws.on("open", () => {
				this.state = "open";
				settle(ok(undefined));
			});

			ws.on("message", (data) => {
				const message = data.toString();
				for (const handler of this.messageHandlers) {
					handler(message);
				}
			});

			ws.on("pong", (data) => {
				const payload = data.toString();
				for (const handler of this.pongHandlers) {
					handler(payload);
				}
			});

			ws.on("ping", (data) => {
				const payload = data.toString();
				for (const handler of this.pingHandlers) {
					handler(payload);
				}
			});

			ws.on("close", (code, reason) => {
				this.state = "closed";
				if (!settled) {
					settle(err(new NetworkError("WebSocket closed during handshake", { code })));
					return;
				}
				for (const handler of this.closeHandlers) {
					handler(code, reason.toString());
				}
			});

			ws.on("error", (error) => {
				if (!settled) {
					this.state = "closed";
					settle(err(classifyError(error)));
					return;
				}
				for (const handler of this.errorHandlers) {
					handler(error);
				}
			});
		});
	}

	/** Sends a text frame. */
	send(data: string): Result<void, TradingError> {
		if (this.state !== "open" || this.ws === null) {
			return err(new NetworkError("WebSocket is not connected"));
		}
		try {
			this.ws.send(data);
			return ok(undefined);
		} catch (error) {
			return err(new NetworkError("WebSocket send failed", { cause: error }));
		}
	}

	/** Sends a ping control frame carrying `payload`; the peer echoes it in its pong. */
	ping(payload: string): Result<void, TradingError> {
		if (this.state !== "open" || this.ws === null) {
			return err(new NetworkError("WebSocket is not connected"));
		}
		try {
			this.ws.ping(payload);
			return ok(undefined);
		} catch (error) {
			return err(new NetworkError("WebSocket ping failed", { cause: error }));
		}
	}

	close(): void {
		if (this.ws !== null && this.state !== "closed") {
			this.state = "closing";
			this.ws.close();
		}
	}

	terminate(): void {
		if (this.ws !== null && this.state !== "closed") {
			this.state = "closing";
			this.ws.terminate();
		}
	}

	getState(): WsState {
		return this.state;
	}

	onMessage(handler: WsMessageHandler): void {
		this.messageHandlers.push(handler);
	}

	onClose(handler: WsCloseHandler): void {
		this.closeHandlers.push(handler);
	}

	onError(handler: WsErrorHandler): void {
		this.errorHandlers.push(handler);
	}

	onPong(handler: WsControlHandler): void {
		this.pongHandlers.push(handler);
	}

	onPing(handler: WsControlHandler): void {
		this.pingHandlers.push(handler);
	}
}

/** Factory producing a fresh `WsClient` for every dial against `config`. */
export function wsTransportFactory(config: WsConfig): WsTransportFactory {
	return () => new WsClient(config);
}
