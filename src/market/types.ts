import type { Decimal } from "../shared/decimal.js";

/** Which side of the trade a venue plays. */
export type VenueId = "home" | "hedge";

/**
 * A single price level in an orderbook.
 */
export interface OrderbookLevel {
	readonly price: Decimal;
	readonly size: Decimal;
}

/**
 * Best bid and ask of one venue, as last observed.
 * A zero price means the side has not been seen yet and is never tradable.
 */
export interface MarketQuote {
	readonly bestBid: Decimal;
	readonly bestBidSize: Decimal;
	readonly bestAsk: Decimal;
	readonly bestAskSize: Decimal;
}

/**
 * The two cross-venue spreads, each positive when profitable before fees.
 * - `buyHomeSellHedge`: hedge bid − home ask
 * - `sellHomeBuyHedge`: home bid − hedge ask
 */
export interface CrossSpreads {
	readonly buyHomeSellHedge: Decimal;
	readonly sellHomeBuyHedge: Decimal;
}
