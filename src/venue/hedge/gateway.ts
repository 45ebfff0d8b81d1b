/**
 * HedgeGateway — signed REST client for the hedge venue (linear contracts).
 *
 * Signature covers `timestamp + apiKey + recvWindow + payload`, where the
 * payload is the JSON body for POST and the query string for GET. Every
 * response carries `retCode`; anything but 0 is a rejection.
 */

import type { Credentials } from "../../auth/credentials.js";
import { signHedgeRequest } from "../../auth/request-signing.js";
import { validate, z } from "../../lib/validation/index.js";
import {
	AuthError,
	ConfigError,
	OrderRejectedError,
	RateLimitError,
	classifyError,
} from "../../shared/errors.js";
import type { TradingError } from "../../shared/errors.js";
import { type Result, err, ok } from "../../shared/result.js";
import { OrderSide } from "../../shared/side.js";
import { SystemClock } from "../../shared/time.js";
import type { Clock } from "../../shared/time.js";
import { DEFAULT_REST_TIMEOUT_MS, globalFetch, requestJson } from "../http.js";
import { decimalValue } from "../schemas.js";
import type {
	AccountGateway,
	AccountSnapshot,
	FetchFn,
	OrderGateway,
	OrderHandle,
	OrderRequest,
	RestClientConfig,
} from "../types.js";

export interface HedgeGatewayConfig extends RestClientConfig {
	readonly credentials: Credentials;
	readonly clock?: Clock;
	readonly recvWindowMs?: number;
}

const CATEGORY = "linear";
const AUTH_RET_CODES: ReadonlySet<number> = new Set([10003, 10004, 10005]);
const RATE_LIMIT_RET_CODE = 10006;

const envelope = z
	.object({ retCode: z.number(), retMsg: z.string().default(""), result: z.unknown() })
	.passthrough();

const orderResult = z.object({ orderId: z.string() }).passthrough();

const walletResult = z.object({
	list: z
		.array(
			z.object({ totalAvailableBalance: decimalValue, totalEquity: decimalValue }).passthrough(),
		)
		.min(1),
});

/** Maps a non-zero `retCode` to the error a caller acts on. */
export function errorFromRetCode(retCode: number, retMsg: string): TradingError {
	const message = `retCode ${retCode}: ${retMsg}`;
	if (AUTH_RET_CODES.has(retCode)) return new AuthError(message, { retCode });
	if (retCode === RATE_LIMIT_RET_CODE) return new RateLimitError(message, 1000, { retCode });
	return new OrderRejectedError(message, { retCode });
}

export class HedgeGateway implements OrderGateway, AccountGateway {
	private readonly baseUrl: string;
	private readonly credentials: Credentials;
	private readonly timeoutMs: number;
	private readonly recvWindowMs: number | undefined;
	private readonly fetchFn: FetchFn;
	private readonly clock: Clock;

	private constructor(config: HedgeGatewayConfig) {
		this.baseUrl = config.baseUrl.replace(/\/+$/, "");
		this.credentials = config.credentials;
		this.timeoutMs = config.timeoutMs ?? DEFAULT_REST_TIMEOUT_MS;
		this.recvWindowMs = config.recvWindowMs;
		this.fetchFn = config.fetchFn ?? globalFetch;
		this.clock = config.clock ?? SystemClock;
	}

	static create(config: HedgeGatewayConfig): Result<HedgeGateway, ConfigError> {
		if (!config.baseUrl || config.baseUrl.trim().length === 0) {
			return err(new ConfigError("hedge baseUrl is required"));
		}
		return ok(new HedgeGateway(config));
	}

	async placeOrder(request: OrderRequest): Promise<Result<OrderHandle, TradingError>> {
		const body = {
			category: CATEGORY,
			symbol: request.symbol,
			side: request.side === OrderSide.Buy ? "Buy" : "Sell",
			orderType: request.orderType === "limit" ? "Limit" : "Market",
			qty: request.size,
			price: request.price,
			timeInForce: request.timeInForce === "ioc" ? "IOC" : "GTC",
			reduceOnly: request.reduceOnly,
			...(request.clientOrderId !== undefined ? { orderLinkId: request.clientOrderId } : {}),
		};
		const response = await this.post("/v5/order/create", body);
		if (!response.ok) return response;
		const parsed = validate(orderResult, response.value, "hedge order response");
		if (!parsed.ok) return parsed;
		return ok({ orderId: parsed.value.orderId, symbol: request.symbol, side: request.side });
	}

	async cancelAllOrders(symbol: string): Promise<Result<void, TradingError>> {
		const response = await this.post("/v5/order/cancel-all", { category: CATEGORY, symbol });
		return response.ok ? ok(undefined) : response;
	}

	async getAccount(): Promise<Result<AccountSnapshot, TradingError>> {
		const response = await this.get("/v5/account/wallet-balance", "accountType=UNIFIED");
		if (!response.ok) return response;
		const parsed = validate(walletResult, response.value, "hedge wallet response");
		if (!parsed.ok) return parsed;
		const [wallet] = parsed.value.list;
		if (wallet === undefined) {
			return err(new OrderRejectedError("wallet list is empty"));
		}
		return ok({ availableBalance: wallet.totalAvailableBalance, totalEquity: wallet.totalEquity });
	}

	// ── Transport ──────────────────────────────────────────────────

	private post(
		path: string,
		body: Record<string, unknown>,
	): Promise<Result<unknown, TradingError>> {
		const text = JSON.stringify(body);
		return this.send("POST", this.baseUrl + path, text, text);
	}

	private get(path: string, query: string): Promise<Result<unknown, TradingError>> {
		return this.send("GET", `${this.baseUrl}${path}?${query}`, query);
	}

	/** Signs, sends, and unwraps the `retCode` envelope to its `result`. */
	private async send(
		method: "GET" | "POST",
		url: string,
		payload: string,
		body?: string,
	): Promise<Result<unknown, TradingError>> {
		let headers: Record<string, string>;
		try {
			headers = signHedgeRequest(this.credentials, this.clock.now(), payload, this.recvWindowMs);
		} catch (e) {
			return err(classifyError(e));
		}
		if (body !== undefined) headers["Content-Type"] = "application/json";
		const response = await requestJson(this.fetchFn, {
			url,
			method,
			headers,
			...(body !== undefined ? { body } : {}),
			timeoutMs: this.timeoutMs,
		});
		if (!response.ok) return response;
		const parsed = validate(envelope, response.value, "hedge response envelope");
		if (!parsed.ok) return parsed;
		if (parsed.value.retCode !== 0) {
			return err(errorFromRetCode(parsed.value.retCode, parsed.value.retMsg));
		}
		return ok(parsed.value.result);
	}
}
