export type { CrossSpreads, MarketQuote, OrderbookLevel, VenueId } from "./types.js";
export { EMPTY_QUOTE, crossSpreads, isTradable, topOfBook } from "./orderbook.js";
export { MarketView } from "./market-view.js";
