import { Decimal } from "../shared/decimal.js";
import type { CrossSpreads, MarketQuote, OrderbookLevel } from "./types.js";

/** Quote with every field zero: nothing observed yet. */
export const EMPTY_QUOTE: MarketQuote = {
	bestBid: Decimal.zero(),
	bestBidSize: Decimal.zero(),
	bestAsk: Decimal.zero(),
	bestAskSize: Decimal.zero(),
};

/**
 * Builds a top-of-book quote from the first level of each side.
 * Levels are expected best-first, as venues publish them.
 * @returns null when either side is empty
 */
export function topOfBook(
	bids: readonly OrderbookLevel[],
	asks: readonly OrderbookLevel[],
): MarketQuote | null {
	const bid = bids[0];
	const ask = asks[0];
	if (bid === undefined || ask === undefined) return null;
	return {
		bestBid: bid.price,
		bestBidSize: bid.size,
		bestAsk: ask.price,
		bestAskSize: ask.size,
	};
}

/** True when both prices are strictly positive. */
export function isTradable(quote: MarketQuote): boolean {
	return quote.bestBid.isPositive() && quote.bestAsk.isPositive();
}

/**
 * Computes both cross-venue spreads.
 * @example
 * crossSpreads(home, hedge).buyHomeSellHedge // hedge.bestBid - home.bestAsk
 */
export function crossSpreads(home: MarketQuote, hedge: MarketQuote): CrossSpreads {
	return {
		buyHomeSellHedge: hedge.bestBid.sub(home.bestAsk),
		sellHomeBuyHedge: home.bestBid.sub(hedge.bestAsk),
	};
}
