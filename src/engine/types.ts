import type { CrossSpreads, MarketQuote } from "../market/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { TradingError } from "../shared/errors.js";
import type { OrderSide } from "../shared/side.js";
import type { AccountGateway, OrderGateway, OrderHandle, VenueDialect } from "../venue/types.js";
import type { StreamClient } from "../websocket/stream-client.js";

/** The part of a StreamClient the engine drives. */
export type MarketStream = Pick<
	StreamClient,
	"connect" | "subscribe" | "isReady" | "close" | "getConnectionState"
>;

export interface VenueLink {
	readonly stream: MarketStream;
	readonly dialect: VenueDialect;
	readonly orders: OrderGateway;
}

/** The hedge venue also answers the account query that gates risk. */
export interface HedgeVenueLink extends VenueLink {
	readonly account: AccountGateway;
}

export interface EngineConfig {
	readonly homeSymbol: string;
	readonly hedgeSymbol: string;
	/** Minimum cross spread, inclusive, that triggers a trade. */
	readonly minSpread: Decimal;
	readonly orderSize: Decimal;
	/** Absolute cap on net position, exclusive. */
	readonly maxPosition: Decimal;
	readonly tickIntervalMs: number;
	readonly statusIntervalMs: number;
	readonly readyTimeoutMs: number;
	/** Poll period of the readiness wait. Defaults to 100 ms. */
	readonly readyPollMs?: number;
	readonly takeProfit: Decimal;
	readonly stopLoss: Decimal;
	readonly pricePrecision: number;
	readonly sizePrecision: number;
	/** Place the offsetting leg on the hedge venue. */
	readonly hedgeMode: boolean;
}

export type EngineState = "idle" | "starting" | "running" | "stopping" | "stopped";

/**
 * Which way the trade goes.
 * - `buy_home_sell_hedge`: home ask below hedge bid
 * - `sell_home_buy_hedge`: home bid above hedge ask
 */
export type Direction = "buy_home_sell_hedge" | "sell_home_buy_hedge";

export interface Opportunity {
	readonly direction: Direction;
	readonly homeSide: OrderSide;
	/** Observed home top price the leg-1 order is priced at. */
	readonly homePrice: Decimal;
	/** Observed opposing hedge top price the leg-2 order is priced at. */
	readonly hedgePrice: Decimal;
	readonly spread: Decimal;
}

/**
 * Result of one two-leg attempt.
 * - `leg1_failed`: nothing changed
 * - `hedged`: both legs accepted
 * - `unhedged`: leg 1 accepted, hedge mode off
 * - `naked`: leg 1 accepted, leg 2 rejected; exposure is open on the home venue
 *
 * `pnl` is the spread-based estimate booked for the trade, not a fill-derived figure.
 */
export type ExecutionOutcome =
	| { readonly status: "leg1_failed"; readonly error: TradingError }
	| {
			readonly status: "hedged";
			readonly home: OrderHandle;
			readonly hedge: OrderHandle;
			readonly pnl: Decimal;
	  }
	| { readonly status: "unhedged"; readonly home: OrderHandle; readonly pnl: Decimal }
	| {
			readonly status: "naked";
			readonly home: OrderHandle;
			readonly error: TradingError;
			readonly pnl: Decimal;
	  };

export type SkipReason =
	| "busy"
	| "stopping"
	| "quotes_not_ready"
	| "account_unavailable"
	| "risk_blocked"
	| "error";

/** What one decision-loop iteration did. */
export type TickOutcome =
	| { readonly kind: "skipped"; readonly reason: SkipReason }
	| { readonly kind: "stop_requested"; readonly reason: "take_profit" | "stop_loss" }
	| { readonly kind: "no_opportunity" }
	| {
			readonly kind: "executed";
			readonly opportunity: Opportunity;
			readonly execution: ExecutionOutcome;
	  };

export interface StreamStatus {
	readonly connected: boolean;
	readonly reconnectCount: number;
	readonly roundTripMs: number | null;
}

/** Snapshot logged by the status reporter. */
export interface StatusReport {
	readonly home: MarketQuote;
	readonly hedge: MarketQuote;
	readonly spreads: CrossSpreads;
	readonly absPosition: Decimal;
	readonly cumulativePnl: Decimal;
	readonly dailyPnl: Decimal;
	readonly streams: { readonly home: StreamStatus; readonly hedge: StreamStatus };
}
