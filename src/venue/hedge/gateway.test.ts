import { describe, expect, it } from "vitest";
import { createCredentials } from "../../auth/credentials.js";
import { hmacSha256Hex } from "../../auth/request-signing.js";
import { FakeClock } from "../../shared/time.js";
import type { FetchFn, OrderRequest } from "../types.js";
import { HedgeGateway, errorFromRetCode } from "./gateway.js";

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

function envelope(result: unknown, retCode = 0, retMsg = "OK"): Response {
	return new Response(JSON.stringify({ retCode, retMsg, result }), { status: 200 });
}

const NOW = 1_700_000_000_000;

function gateway(fetchFn: FetchFn): HedgeGateway {
	const created = HedgeGateway.create({
		baseUrl: "https://hedge.test",
		credentials: createCredentials({ apiKey: "test-key", secret: "test-secret" }),
		clock: new FakeClock(NOW),
		fetchFn,
	});
	if (!created.ok) throw created.error;
	return created.value;
}

const ORDER: OrderRequest = {
	symbol: "BTCUSDT",
	side: "sell",
	orderType: "limit",
	size: "0.010",
	price: "100.50",
	timeInForce: "ioc",
	reduceOnly: false,
};

describe("HedgeGateway", () => {
	describe("placeOrder", () => {
		it("posts a signed linear IOC order", async () => {
			const { fetchFn, calls } = stubFetch(envelope({ orderId: "h-1", orderLinkId: "" }));
			const result = await gateway(fetchFn).placeOrder(ORDER);

			expect(result).toEqual({
				ok: true,
				value: { orderId: "h-1", symbol: "BTCUSDT", side: "sell" },
			});
			const [call] = calls;
			expect(call?.url).toBe("https://hedge.test/v5/order/create");
			const body = String(call?.init.body);
			expect(JSON.parse(body)).toEqual({
				category: "linear",
				symbol: "BTCUSDT",
				side: "Sell",
				orderType: "Limit",
				qty: "0.010",
				price: "100.50",
				timeInForce: "IOC",
				reduceOnly: false,
			});
			const headers = new Headers(call?.init.headers);
			expect(headers.get("X-BAPI-API-KEY")).toBe("test-key");
			expect(headers.get("X-BAPI-RECV-WINDOW")).toBe("5000");
			expect(headers.get("X-BAPI-SIGN")).toBe(
				hmacSha256Hex("test-secret", `${NOW}test-key5000${body}`),
			);
		});

		it("maps the client order id to orderLinkId", async () => {
			const { fetchFn, calls } = stubFetch(envelope({ orderId: "h-2" }));
			await gateway(fetchFn).placeOrder({ ...ORDER, side: "buy", clientOrderId: "c-1" });
			const body: unknown = JSON.parse(String(calls[0]?.init.body));
			expect(body).toMatchObject({ side: "Buy", orderLinkId: "c-1" });
		});

		it("treats a non-zero retCode as a rejection", async () => {
			const { fetchFn } = stubFetch(envelope({}, 110007, "insufficient balance"));
			const result = await gateway(fetchFn).placeOrder(ORDER);
			expect(result.ok).toBe(false);
			if (result.ok) return;
			expect(result.error.code).toBe("ORDER_REJECTED");
			expect(result.error.message).toBe("retCode 110007: insufficient balance");
		});
	});

	it("cancels all orders for the symbol", async () => {
		const { fetchFn, calls } = stubFetch(envelope({ list: [] }));
		const result = await gateway(fetchFn).cancelAllOrders("BTCUSDT");
		expect(result).toEqual({ ok: true, value: undefined });
		expect(calls[0]?.url).toBe("https://hedge.test/v5/order/cancel-all");
		expect(JSON.parse(String(calls[0]?.init.body))).toEqual({
			category: "linear",
			symbol: "BTCUSDT",
		});
	});

	describe("getAccount", () => {
		it("signs the query string and reads the first wallet", async () => {
			const { fetchFn, calls } = stubFetch(
				envelope({ list: [{ totalAvailableBalance: "500.25", totalEquity: "800" }] }),
			);
			const result = await gateway(fetchFn).getAccount();

			const [call] = calls;
			expect(call?.url).toBe("https://hedge.test/v5/account/wallet-balance?accountType=UNIFIED");
			expect(call?.init.method).toBe("GET");
			expect(call?.init.body).toBeUndefined();
			expect(new Headers(call?.init.headers).get("X-BAPI-SIGN")).toBe(
				"3f10586267639c9f3f4f5e32e491a6ef80d157db06f51eb79e4988e24f97adba",
			);
			expect(result.ok).toBe(true);
			if (!result.ok) return;
			expect(result.value.availableBalance.toString()).toBe("500.25");
			expect(result.value.totalEquity.toString()).toBe("800");
		});

		it("rejects an empty wallet list", async () => {
			const { fetchFn } = stubFetch(envelope({ list: [] }));
			const result = await gateway(fetchFn).getAccount();
			expect(result.ok).toBe(false);
			if (result.ok) return;
			expect(result.error.code).toBe("VALIDATION_FAILED");
		});

		it("rejects a body without retCode", async () => {
			const { fetchFn } = stubFetch(new Response("{}", { status: 200 }));
			const result = await gateway(fetchFn).getAccount();
			expect(result.ok).toBe(false);
			if (result.ok) return;
			expect(result.error.code).toBe("VALIDATION_FAILED");
		});
	});
});

describe("errorFromRetCode", () => {
	it("maps auth and rate-limit codes", () => {
		expect(errorFromRetCode(10003, "invalid key").code).toBe("AUTH_ERROR");
		expect(errorFromRetCode(10005, "permission denied").code).toBe("AUTH_ERROR");
		expect(errorFromRetCode(10006, "too many visits").code).toBe("RATE_LIMIT_ERROR");
		expect(errorFromRetCode(170131, "insufficient").code).toBe("ORDER_REJECTED");
	});
});
