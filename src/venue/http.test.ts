import { describe, expect, it } from "vitest";
import { requestJson } from "./http.js";
import type { FetchFn } from "./types.js";

const GET = { url: "https://venue.test/x", method: "GET", headers: {}, timeoutMs: 1000 } as const;

function replying(response: Response): FetchFn {
	return async () => response;
}

describe("requestJson", () => {
	it("decodes a JSON body", async () => {
		const result = await requestJson(replying(new Response('{"a":1}')), GET);
		expect(result).toEqual({ ok: true, value: { a: 1 } });
	});

	it("decodes an empty body to null", async () => {
		const result = await requestJson(replying(new Response("")), GET);
		expect(result).toEqual({ ok: true, value: null });
	});

	it("reports malformed JSON as a validation failure", async () => {
		const result = await requestJson(replying(new Response("<html>")), GET);
		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error.code).toBe("VALIDATION_FAILED");
	});

	it("maps status codes and keeps the status in context", async () => {
		const result = await requestJson(replying(new Response("busy", { status: 429 })), GET);
		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error.code).toBe("RATE_LIMIT_ERROR");
		expect(result.error.context).toEqual({ method: "GET", url: "https://venue.test/x", status: 429 });
	});

	it("classifies an aborted request as a timeout", async () => {
		const fetchFn: FetchFn = async (_url, init) =>
			new Promise<Response>((_resolve, reject) => {
				init.signal?.addEventListener("abort", () => reject(init.signal?.reason));
			});
		const result = await requestJson(fetchFn, { ...GET, timeoutMs: 10 });
		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error.code).toBe("TIMEOUT_ERROR");
	});

	it("passes method, headers and body through", async () => {
		const seen: RequestInit[] = [];
		const fetchFn: FetchFn = async (_url, init) => {
			seen.push(init);
			return new Response("{}");
		};
		await requestJson(fetchFn, {
			url: "https://venue.test/y",
			method: "POST",
			headers: { "X-Test": "1" },
			body: '{"b":2}',
			timeoutMs: 1000,
		});
		expect(seen[0]?.method).toBe("POST");
		expect(seen[0]?.body).toBe('{"b":2}');
		expect(seen[0]?.headers).toEqual({ "X-Test": "1" });
	});
});
