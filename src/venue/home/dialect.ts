import { validate, z } from "../../lib/validation/index.js";
import { topOfBook } from "../../market/orderbook.js";
import { ok } from "../../shared/result.js";
import type { Frame } from "../../websocket/types.js";
import { parseFrameJson, priceLevels, streamEnvelope } from "../schemas.js";
import type { VenueDialect } from "../types.js";

const bookPayload = z.object({ bids: priceLevels, asks: priceLevels }).passthrough();

/**
 * Home venue stream dialect.
 *
 * Frames are `{ topic, data: { bids: [[p, s]], asks } }` on `orderbook.<SYMBOL>`.
 * Liveness uses WebSocket control frames, so no message is ever an ack.
 */
export const homeDialect: VenueDialect = {
	venue: "home",
	heartbeat: { kind: "control" },

	orderBookTopic(symbol) {
		return `orderbook.${symbol}`;
	},

	encodeSubscribe(topic) {
		return JSON.stringify({ op: "subscribe", args: [topic] });
	},

	decodeFrame(raw): Frame {
		const envelope = streamEnvelope.safeParse(parseFrameJson(raw));
		if (!envelope.success) return { kind: "ignored" };
		const { topic, data } = envelope.data;
		if (topic === undefined || topic.length === 0 || data === undefined) {
			return { kind: "ignored" };
		}
		return { kind: "data", topic, payload: data };
	},

	decodeTopOfBook(payload) {
		const book = validate(bookPayload, payload, "home orderbook");
		if (!book.ok) return book;
		return ok(topOfBook(book.value.bids, book.value.asks));
	},
};
