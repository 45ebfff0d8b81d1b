import { ValidationError } from "../lib/validation/index.js";
import { classifyError, errorFromStatus } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import type { FetchFn } from "./types.js";

export const DEFAULT_REST_TIMEOUT_MS = 10_000;

/** Global fetch narrowed to the FetchFn signature. */
export const globalFetch: FetchFn = (url, init) => fetch(url, init);

export interface JsonRequest {
	readonly url: string;
	readonly method: "GET" | "POST" | "DELETE";
	readonly headers: Record<string, string>;
	readonly body?: string;
	readonly timeoutMs: number;
}

/**
 * Performs one HTTP exchange and decodes the body as JSON.
 *
 * Transport failures and timeouts are classified, a non-2xx status maps
 * through `errorFromStatus`, and an empty body decodes to `null`.
 */
export async function requestJson(
	fetchFn: FetchFn,
	request: JsonRequest,
): Promise<Result<unknown, TradingError>> {
	let response: Response;
	let text: string;
	try {
		const init: RequestInit = {
			method: request.method,
			headers: request.headers,
			signal: AbortSignal.timeout(request.timeoutMs),
		};
		if (request.body !== undefined) init.body = request.body;
		response = await fetchFn(request.url, init);
		text = await response.text();
	} catch (e) {
		return err(classifyError(e));
	}

	if (!response.ok) {
		return err(
			errorFromStatus(response.status, `HTTP ${response.status}: ${text.slice(0, 200)}`, {
				method: request.method,
				url: request.url,
			}),
		);
	}
	if (text.trim().length === 0) return ok(null);
	try {
		const parsed: unknown = JSON.parse(text);
		return ok(parsed);
	} catch (e) {
		const message = e instanceof Error ? e.message : String(e);
		return err(
			new ValidationError("invalid JSON response", [
				{ path: [], message: `invalid JSON: ${message}` },
			]),
		);
	}
}
