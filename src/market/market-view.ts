import { EMPTY_QUOTE, isTradable } from "./orderbook.js";
import type { MarketQuote, VenueId } from "./types.js";

/**
 * Latest-wins quote cells, one per venue.
 *
 * Each cell has a single writer (that venue's stream callback). Readers take
 * whole snapshots; quotes are immutable so a read never sees a torn update.
 */
export class MarketView {
	private readonly quotes: Record<VenueId, MarketQuote> = {
		home: EMPTY_QUOTE,
		hedge: EMPTY_QUOTE,
	};
	private readonly updatedAt: Record<VenueId, number | null> = {
		home: null,
		hedge: null,
	};

	/** Overwrites the venue's quote. No merging, no sequence checks. */
	update(venue: VenueId, quote: MarketQuote, atMs: number): void {
		this.quotes[venue] = quote;
		this.updatedAt[venue] = atMs;
	}

	get(venue: VenueId): MarketQuote {
		return this.quotes[venue];
	}

	lastUpdateAt(venue: VenueId): number | null {
		return this.updatedAt[venue];
	}

	/** Both venues have a quote with non-zero bid and ask. */
	isReady(): boolean {
		return isTradable(this.quotes.home) && isTradable(this.quotes.hedge);
	}
}
