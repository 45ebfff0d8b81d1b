/**
 * HomeGateway — signed REST client for the home venue.
 *
 * Every request carries `X-API-*` headers whose signature covers
 * `timestamp + METHOD + path + body`; the path includes its query string.
 */

import type { Credentials } from "../../auth/credentials.js";
import { signHomeRequest } from "../../auth/request-signing.js";
import { validate, z } from "../../lib/validation/index.js";
import { ConfigError, classifyError } from "../../shared/errors.js";
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

export interface HomeGatewayConfig extends RestClientConfig {
	readonly credentials: Credentials;
	readonly clock?: Clock;
}

const orderResponse = z.object({ data: z.object({ id: z.union([z.string(), z.number()]) }) });

const accountResponse = z.object({
	data: z.object({ availableValue: decimalValue, equityValue: decimalValue }),
});

const TIME_IN_FORCE = { ioc: "IOC", gtc: "GOOD_TIL_CANCEL" } as const;

export class HomeGateway implements OrderGateway, AccountGateway {
	private readonly baseUrl: string;
	private readonly credentials: Credentials;
	private readonly timeoutMs: number;
	private readonly fetchFn: FetchFn;
	private readonly clock: Clock;

	private constructor(config: HomeGatewayConfig) {
		this.baseUrl = config.baseUrl.replace(/\/+$/, "");
		this.credentials = config.credentials;
		this.timeoutMs = config.timeoutMs ?? DEFAULT_REST_TIMEOUT_MS;
		this.fetchFn = config.fetchFn ?? globalFetch;
		this.clock = config.clock ?? SystemClock;
	}

	static create(config: HomeGatewayConfig): Result<HomeGateway, ConfigError> {
		if (!config.baseUrl || config.baseUrl.trim().length === 0) {
			return err(new ConfigError("home baseUrl is required"));
		}
		return ok(new HomeGateway(config));
	}

	/** Submits an order. Acceptance is not a fill; IOC remainders are cancelled by the venue. */
	async placeOrder(request: OrderRequest): Promise<Result<OrderHandle, TradingError>> {
		const body = {
			symbol: request.symbol,
			side: request.side === OrderSide.Buy ? "BUY" : "SELL",
			type: request.orderType === "limit" ? "LIMIT" : "MARKET",
			size: request.size,
			price: request.price,
			timeInForce: TIME_IN_FORCE[request.timeInForce],
			reduceOnly: request.reduceOnly,
			...(request.clientOrderId !== undefined ? { clientOrderId: request.clientOrderId } : {}),
		};
		const response = await this.send("POST", "/api/v1/order", JSON.stringify(body));
		if (!response.ok) return response;
		const parsed = validate(orderResponse, response.value, "home order response");
		if (!parsed.ok) return parsed;
		return ok({
			orderId: String(parsed.value.data.id),
			symbol: request.symbol,
			side: request.side,
		});
	}

	async cancelAllOrders(symbol: string): Promise<Result<void, TradingError>> {
		const path = `/api/v1/open-orders?symbol=${encodeURIComponent(symbol)}`;
		const response = await this.send("DELETE", path);
		return response.ok ? ok(undefined) : response;
	}

	async getAccount(): Promise<Result<AccountSnapshot, TradingError>> {
		const response = await this.send("GET", "/api/v1/account");
		if (!response.ok) return response;
		const parsed = validate(accountResponse, response.value, "home account response");
		if (!parsed.ok) return parsed;
		return ok({
			availableBalance: parsed.value.data.availableValue,
			totalEquity: parsed.value.data.equityValue,
		});
	}

	private async send(
		method: "GET" | "POST" | "DELETE",
		path: string,
		body?: string,
	): Promise<Result<unknown, TradingError>> {
		let headers: Record<string, string>;
		try {
			headers = signHomeRequest(this.credentials, this.clock.now(), method, path, body ?? "");
		} catch (e) {
			return err(classifyError(e));
		}
		if (body !== undefined) headers["Content-Type"] = "application/json";
		return requestJson(this.fetchFn, {
			url: this.baseUrl + path,
			method,
			headers,
			...(body !== undefined ? { body } : {}),
			timeoutMs: this.timeoutMs,
		});
	}
}
