import { afterEach, describe, expect, it } from "vitest";
import { type App, createApp } from "./app.js";
import { parseConfig } from "./config/load.js";
import type { AppConfig } from "./config/schema.js";
import { silentLogger } from "./lib/logger/index.js";
import type {
	WsCloseHandler,
	WsControlHandler,
	WsErrorHandler,
	WsMessageHandler,
	WsState,
	WsTransport,
} from "./lib/websocket/types.js";
import { NetworkError } from "./shared/errors.js";
import type { TradingError } from "./shared/errors.js";
import { type Result, err, ok } from "./shared/result.js";

// ── In-process venues ───────────────────────────────────────────────

/** Answers each known subscribe frame with one canned book frame. */
class ScriptedTransport implements WsTransport {
	private state: WsState = "closed";
	private readonly messageHandlers: WsMessageHandler[] = [];

	constructor(
		private readonly replies: ReadonlyMap<string, string>,
		private readonly refuse = false,
	) {}

	async connect(): Promise<Result<void, TradingError>> {
		if (this.refuse) return err(new NetworkError("connect ECONNREFUSED"));
		this.state = "open";
		return ok(undefined);
	}

	send(data: string): Result<void, TradingError> {
		if (this.state !== "open") return err(new NetworkError("send failed"));
		const reply = this.replies.get(data);
		if (reply !== undefined) {
			for (const handler of this.messageHandlers) handler(reply);
		}
		return ok(undefined);
	}

	ping(): Result<void, TradingError> {
		return this.state === "open" ? ok(undefined) : err(new NetworkError("ping failed"));
	}

	close(): void {
		this.state = "closed";
	}

	terminate(): void {
		this.state = "closed";
	}

	getState(): WsState {
		return this.state;
	}

	onMessage(handler: WsMessageHandler): void {
		this.messageHandlers.push(handler);
	}

	onClose(_handler: WsCloseHandler): void {}
	onError(_handler: WsErrorHandler): void {}
	onPong(_handler: WsControlHandler): void {}
	onPing(_handler: WsControlHandler): void {}
}

const subscribeFrame = (topic: string): string => JSON.stringify({ op: "subscribe", args: [topic] });

const REPLIES = new Map([
	[
		subscribeFrame("orderbook.BTC-USDC"),
		JSON.stringify({
			topic: "orderbook.BTC-USDC",
			data: { bids: [["98.5", "1"]], asks: [["99.0", "2"]] },
		}),
	],
	[
		subscribeFrame("orderbook.1.BTCUSDT"),
		JSON.stringify({
			topic: "orderbook.1.BTCUSDT",
			type: "snapshot",
			data: { s: "BTCUSDT", b: [["100.5", "3"]], a: [["101", "3"]] },
		}),
	],
]);

const ROUTES: Record<string, string> = {
	"POST https://home.test/api/v1/order": '{"data":{"id":42}}',
	"GET https://hedge.test/v5/account/wallet-balance?accountType=UNIFIED":
		'{"retCode":0,"result":{"list":[{"totalAvailableBalance":"1000","totalEquity":"1200"}]}}',
	"POST https://hedge.test/v5/order/create": '{"retCode":0,"retMsg":"OK","result":{"orderId":"h-1"}}',
	"POST https://hedge.test/v5/order/cancel-all": '{"retCode":0,"retMsg":"OK","result":{}}',
};

interface Call {
	readonly route: string;
	readonly body: string | null;
}

function venueFetch(calls: Call[]) {
	return async (url: string, init: RequestInit): Promise<Response> => {
		const route = `${init.method ?? "GET"} ${url}`;
		calls.push({ route, body: typeof init.body === "string" ? init.body : null });
		const body = ROUTES[route];
		return body === undefined ? new Response("not found", { status: 404 }) : new Response(body);
	};
}

function config(): AppConfig {
	const parsed = parseConfig({
		home: {
			restUrl: "https://home.test/",
			wsUrl: "wss://home.test/ws",
			apiKey: "home-key",
			apiSecret: "test-secret",
		},
		hedge: {
			restUrl: "https://hedge.test",
			wsUrl: "wss://hedge.test/ws",
			apiKey: "hedge-key",
			apiSecret: "test-secret",
		},
		homeSymbol: "BTC-USDC",
		hedgeSymbol: "BTCUSDT",
		strategy: {
			minSpread: "1",
			orderSize: "0.01",
			maxPosition: "1",
			tickIntervalMs: 60_000,
			statusIntervalMs: 60_000,
			readyTimeoutMs: 1_000,
			takeProfit: "100",
			stopLoss: "100",
			pricePrecision: 2,
			sizePrecision: 3,
		},
		risk: { maxDailyLoss: "50", maxConsecutiveLosses: 3, minBalance: "100" },
	});
	if (!parsed.ok) throw parsed.error;
	return parsed.value;
}

const apps: App[] = [];

afterEach(async () => {
	await Promise.all(apps.splice(0).map((app) => app.engine.stop()));
});

// ── Tests ───────────────────────────────────────────────────────────

describe("createApp", () => {
	it("wires both venues end to end through one hedged trade", async () => {
		const calls: Call[] = [];
		const built = createApp(config(), silentLogger(), {
			transportFor: () => () => new ScriptedTransport(REPLIES),
			fetchFn: venueFetch(calls),
		});
		if (!built.ok) throw built.error;
		const app = built.value;
		apps.push(app);

		expect(await app.engine.start()).toEqual({ ok: true, value: undefined });
		const outcome = await app.engine.tick();
		expect(outcome.kind === "executed" && outcome.execution.status).toBe("hedged");

		await app.engine.stop();
		expect(calls.map((c) => c.route)).toEqual([
			"GET https://hedge.test/v5/account/wallet-balance?accountType=UNIFIED",
			"POST https://home.test/api/v1/order",
			"POST https://hedge.test/v5/order/create",
			"POST https://hedge.test/v5/order/cancel-all",
		]);
		expect(calls[1]?.body).toBe(
			'{"symbol":"BTC-USDC","side":"BUY","type":"LIMIT","size":"0.010","price":"99.00","timeInForce":"IOC","reduceOnly":false}',
		);
		expect(app.engine.position().toString()).toBe("0.01");
		expect(app.homeStream.getConnectionState().state).toBe("closed");
		expect(app.hedgeStream.getConnectionState().state).toBe("closed");
	});

	it("fails to start and closes both streams when a venue refuses the dial", async () => {
		const built = createApp(config(), silentLogger(), {
			transportFor: (url) => () => new ScriptedTransport(REPLIES, url.includes("hedge")),
			fetchFn: venueFetch([]),
		});
		if (!built.ok) throw built.error;
		const app = built.value;

		const started = await app.engine.start();
		expect(!started.ok && started.error.code).toBe("NETWORK_ERROR");
		expect(app.engine.getState()).toBe("stopped");
		expect(app.homeStream.getConnectionState().state).toBe("closed");
		expect(app.hedgeStream.getConnectionState().state).toBe("closed");
	});
});
