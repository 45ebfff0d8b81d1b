import { describe, expect, it } from "vitest";
import { createCredentials } from "../../auth/credentials.js";
import { hmacSha256Hex } from "../../auth/request-signing.js";
import { FakeClock } from "../../shared/time.js";
import type { FetchFn, OrderRequest } from "../types.js";
import { HomeGateway } from "./gateway.js";

interface RecordedCall {
	readonly url: string;
	readonly init: RequestInit;
}

function stubFetch(...replies: (Response | Error)[]): { fetchFn: FetchFn; calls: RecordedCall[] } {
	const calls: RecordedCall[] = [];
	const fetchFn: FetchFn = async (url, init) => {
		calls.push({ url, init });
		const next = replies.shift();
		if (next === undefined) throw new Error("unexpected request");
		if (next instanceof Error) throw next;
		return next;
	};
	return { fetchFn, calls };
}

function json(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), { status });
}

const NOW = 1_700_000_000_000;

function gateway(fetchFn: FetchFn): HomeGateway {
	const created = HomeGateway.create({
		baseUrl: "https://home.test/",
		credentials: createCredentials({
			apiKey: "test-key",
			secret: "test-secret",
			passphrase: "test-passphrase",
		}),
		clock: new FakeClock(NOW),
		fetchFn,
	});
	if (!created.ok) throw created.error;
	return created.value;
}

const ORDER: OrderRequest = {
	symbol: "BTC-USDC",
	side: "buy",
	orderType: "limit",
	size: "0.010",
	price: "100.50",
	timeInForce: "ioc",
	reduceOnly: false,
};

describe("HomeGateway", () => {
	it("requires a base URL", () => {
		const created = HomeGateway.create({
			baseUrl: " ",
			credentials: createCredentials({ apiKey: "k", secret: "s" }),
		});
		expect(created.ok).toBe(false);
		if (created.ok) return;
		expect(created.error.code).toBe("CONFIG_ERROR");
	});

	describe("placeOrder", () => {
		it("posts a signed IOC limit order and returns the venue id", async () => {
			const { fetchFn, calls } = stubFetch(json({ data: { id: "o-1" } }, 201));
			const result = await gateway(fetchFn).placeOrder(ORDER);

			expect(result).toEqual({
				ok: true,
				value: { orderId: "o-1", symbol: "BTC-USDC", side: "buy" },
			});
			const [call] = calls;
			expect(call?.url).toBe("https://home.test/api/v1/order");
			expect(call?.init.method).toBe("POST");
			const body = String(call?.init.body);
			expect(JSON.parse(body)).toEqual({
				symbol: "BTC-USDC",
				side: "BUY",
				type: "LIMIT",
				size: "0.010",
				price: "100.50",
				timeInForce: "IOC",
				reduceOnly: false,
			});
			const headers = new Headers(call?.init.headers);
			expect(headers.get("X-API-KEY")).toBe("test-key");
			expect(headers.get("X-API-TIMESTAMP")).toBe(String(NOW));
			expect(headers.get("X-API-PASSPHRASE")).toBe("test-passphrase");
			expect(headers.get("X-API-SIGNATURE")).toBe(
				hmacSha256Hex("test-secret", `${NOW}POST/api/v1/order${body}`),
			);
		});

		it("forwards the client order id and stringifies numeric ids", async () => {
			const { fetchFn, calls } = stubFetch(json({ data: { id: 42 } }));
			const result = await gateway(fetchFn).placeOrder({
				...ORDER,
				side: "sell",
				clientOrderId: "c-9",
			});
			expect(result.ok && result.value.orderId).toBe("42");
			const body: unknown = JSON.parse(String(calls[0]?.init.body));
			expect(body).toMatchObject({ side: "SELL", clientOrderId: "c-9" });
		});

		it("classifies HTTP failures", async () => {
			const { fetchFn } = stubFetch(
				json({ msg: "slow" }, 429),
				json({ msg: "bad key" }, 401),
				json({ msg: "bad size" }, 400),
			);
			const gw = gateway(fetchFn);
			const codes: string[] = [];
			for (let i = 0; i < 3; i++) {
				const result = await gw.placeOrder(ORDER);
				codes.push(result.ok ? "ok" : result.error.code);
			}
			expect(codes).toEqual(["RATE_LIMIT_ERROR", "AUTH_ERROR", "ORDER_REJECTED"]);
		});

		it("classifies transport failures", async () => {
			const { fetchFn } = stubFetch(new TypeError("fetch failed"));
			const result = await gateway(fetchFn).placeOrder(ORDER);
			expect(result.ok).toBe(false);
			if (result.ok) return;
			expect(result.error.code).toBe("NETWORK_ERROR");
		});

		it("rejects a response without an order id", async () => {
			const { fetchFn } = stubFetch(json({ data: {} }));
			const result = await gateway(fetchFn).placeOrder(ORDER);
			expect(result.ok).toBe(false);
			if (result.ok) return;
			expect(result.error.code).toBe("VALIDATION_FAILED");
		});
	});

	it("cancels all orders with the query in the signed path", async () => {
		const { fetchFn, calls } = stubFetch(json({ data: true }));
		const result = await gateway(fetchFn).cancelAllOrders("BTC-USDC");

		expect(result).toEqual({ ok: true, value: undefined });
		const [call] = calls;
		expect(call?.url).toBe("https://home.test/api/v1/open-orders?symbol=BTC-USDC");
		expect(call?.init.method).toBe("DELETE");
		expect(call?.init.body).toBeUndefined();
		expect(new Headers(call?.init.headers).get("X-API-SIGNATURE")).toBe(
			hmacSha256Hex("test-secret", `${NOW}DELETE/api/v1/open-orders?symbol=BTC-USDC`),
		);
	});

	describe("getAccount", () => {
		it("reads available and total equity", async () => {
			const { fetchFn, calls } = stubFetch(
				json({ data: { availableValue: "1234.5", equityValue: "2000" } }),
			);
			const result = await gateway(fetchFn).getAccount();

			expect(calls[0]?.url).toBe("https://home.test/api/v1/account");
			expect(result.ok).toBe(true);
			if (!result.ok) return;
			expect(result.value.availableBalance.toString()).toBe("1234.5");
			expect(result.value.totalEquity.toString()).toBe("2000");
		});

		it("maps a server error to SYSTEM_ERROR", async () => {
			const { fetchFn } = stubFetch(new Response("down", { status: 503 }));
			const result = await gateway(fetchFn).getAccount();
			expect(result.ok).toBe(false);
			if (result.ok) return;
			expect(result.error.code).toBe("SYSTEM_ERROR");
			expect(result.error.message).toBe("HTTP 503: down");
		});
	});
});
