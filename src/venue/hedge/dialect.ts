import { validate, z } from "../../lib/validation/index.js";
import { topOfBook } from "../../market/orderbook.js";
import { ok } from "../../shared/result.js";
import type { Frame } from "../../websocket/types.js";
import { parseFrameJson, priceLevels, streamEnvelope } from "../schemas.js";
import type { VenueDialect } from "../types.js";

const bookPayload = z
	.object({ s: z.string().optional(), b: priceLevels, a: priceLevels })
	.passthrough();

const probeReply = z
	.object({
		op: z.string().optional(),
		ret_msg: z.string().optional(),
		req_id: z.string().optional(),
	})
	.passthrough();

function isPong(raw: unknown): { readonly seq: number | null } | null {
	const reply = probeReply.safeParse(raw);
	if (!reply.success) return null;
	const { op, ret_msg: retMsg, req_id: reqId } = reply.data;
	if (op !== "pong" && retMsg !== "pong") return null;
	return { seq: reqId !== undefined && /^\d+$/.test(reqId) ? Number(reqId) : null };
}

/**
 * Hedge venue stream dialect.
 *
 * Frames are `{ topic, type, data: { s, b, a } }` on `orderbook.1.<SYMBOL>`.
 * Liveness uses JSON probes `{ op: "ping", req_id }`; the reply carries
 * `op: "pong"` or `ret_msg: "pong"` and echoes `req_id`.
 */
export const hedgeDialect: VenueDialect = {
	venue: "hedge",
	heartbeat: {
		kind: "message",
		encodeProbe(seq) {
			return JSON.stringify({ op: "ping", req_id: String(seq) });
		},
	},

	orderBookTopic(symbol) {
		return `orderbook.1.${symbol}`;
	},

	encodeSubscribe(topic) {
		return JSON.stringify({ op: "subscribe", args: [topic] });
	},

	decodeFrame(raw): Frame {
		const json = parseFrameJson(raw);
		const pong = isPong(json);
		if (pong !== null) return { kind: "ack", seq: pong.seq };

		const envelope = streamEnvelope.safeParse(json);
		if (!envelope.success) return { kind: "ignored" };
		const { topic, data } = envelope.data;
		if (topic === undefined || topic.length === 0 || data === undefined) {
			return { kind: "ignored" };
		}
		return { kind: "data", topic, payload: data };
	},

	decodeTopOfBook(payload) {
		const book = validate(bookPayload, payload, "hedge orderbook");
		if (!book.ok) return book;
		return ok(topOfBook(book.value.b, book.value.a));
	},
};
