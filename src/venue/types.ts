/**
 * Venue abstractions: the REST gateways the engine trades through and the
 * wire dialect a StreamClient speaks.
 */

import type { ValidationError } from "../lib/validation/index.js";
import type { MarketQuote, VenueId } from "../market/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { TradingError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import type { OrderSide } from "../shared/side.js";
import type { StreamDialect } from "../websocket/types.js";

// ── Orders ───────────────────────────────────────────────────────────

export type OrderType = "limit" | "market";

/** Immediate-or-cancel is the only policy the engine submits; GTC is accepted for manual use. */
export type TimeInForce = "ioc" | "gtc";

/**
 * Order as submitted. Size and price are already formatted at the venue's
 * precision, so the wire text is exactly what the caller chose.
 */
export interface OrderRequest {
	readonly symbol: string;
	readonly side: OrderSide;
	readonly orderType: OrderType;
	readonly size: string;
	readonly price: string;
	readonly timeInForce: TimeInForce;
	readonly reduceOnly: boolean;
	readonly clientOrderId?: string;
}

/** Venue acknowledgement of an accepted order. Acceptance is not a fill. */
export interface OrderHandle {
	readonly orderId: string;
	readonly symbol: string;
	readonly side: OrderSide;
}

export interface AccountSnapshot {
	readonly availableBalance: Decimal;
	readonly totalEquity: Decimal;
}

// ── Gateways ─────────────────────────────────────────────────────────

export interface OrderGateway {
	placeOrder(request: OrderRequest): Promise<Result<OrderHandle, TradingError>>;
	cancelAllOrders(symbol: string): Promise<Result<void, TradingError>>;
}

export interface AccountGateway {
	getAccount(): Promise<Result<AccountSnapshot, TradingError>>;
}

// ── Streaming ────────────────────────────────────────────────────────

/** Stream dialect plus the venue's top-of-book channel. */
export interface VenueDialect extends StreamDialect {
	readonly venue: VenueId;
	orderBookTopic(symbol: string): string;
	/** Decodes a data payload; `ok(null)` when either side of the book is empty. */
	decodeTopOfBook(payload: unknown): Result<MarketQuote | null, ValidationError>;
}

// ── HTTP ─────────────────────────────────────────────────────────────

/** The subset of `fetch` the gateways use; tests inject a stub. */
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

/** Connection settings shared by both REST gateways. */
export interface RestClientConfig {
	readonly baseUrl: string;
	readonly timeoutMs?: number;
	readonly fetchFn?: FetchFn;
}
