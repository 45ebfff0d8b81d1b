/**
 * Request signing — HMAC-SHA256 headers for both venues' REST APIs.
 */

import { createHmac } from "node:crypto";
import { AuthError } from "../shared/errors.js";
import { unwrapCredentials } from "./credentials.js";
import type { Credentials } from "./credentials.js";

const METHOD_RE = /^[A-Z]+$/;

/** Receive window sent with every hedge-venue request, in milliseconds. */
export const HEDGE_RECV_WINDOW_MS = 5000;

/** Lowercase hex HMAC-SHA256 of `message` under `secret`. */
export function hmacSha256Hex(secret: string, message: string): string {
	return createHmac("sha256", secret).update(message).digest("hex");
}

function requireSecret(secret: string): void {
	if (secret.length === 0) {
		throw new AuthError("HMAC secret must not be empty");
	}
}

function requireTimestamp(timestampMs: number): void {
	if (!Number.isFinite(timestampMs) || timestampMs <= 0) {
		throw new AuthError("Timestamp must be a positive finite number");
	}
}

/**
 * Builds home-venue auth headers. The signature covers
 * `timestamp + METHOD + path + body`, where path includes any query string.
 *
 * @param timestampMs - Unix time in milliseconds
 * @throws AuthError if credentials are invalid or parameters are malformed
 * @example
 * signHomeRequest(credentials, Date.now(), "DELETE", "/api/v1/open-orders?symbol=BTC-USDC");
 */
export function signHomeRequest(
	credentials: Credentials,
	timestampMs: number,
	method: string,
	path: string,
	body = "",
): Record<string, string> {
	const { apiKey, secret, passphrase } = unwrapCredentials(credentials);
	requireSecret(secret);
	requireTimestamp(timestampMs);
	if (!METHOD_RE.test(method)) {
		throw new AuthError("Method must contain only uppercase ASCII letters");
	}
	if (!path.startsWith("/")) {
		throw new AuthError("Path must start with /");
	}
	const timestamp = String(timestampMs);
	const headers: Record<string, string> = {
		"X-API-KEY": apiKey,
		"X-API-SIGNATURE": hmacSha256Hex(secret, timestamp + method + path + body),
		"X-API-TIMESTAMP": timestamp,
	};
	if (passphrase !== undefined) {
		headers["X-API-PASSPHRASE"] = passphrase;
	}
	return headers;
}

/**
 * Builds hedge-venue auth headers. The signature covers
 * `timestamp + apiKey + recvWindow + payload`, where payload is the JSON body
 * for POST and the query string (without `?`) for GET.
 *
 * @param timestampMs - Unix time in milliseconds
 * @throws AuthError if credentials are invalid or the timestamp is malformed
 */
export function signHedgeRequest(
	credentials: Credentials,
	timestampMs: number,
	payload: string,
	recvWindowMs = HEDGE_RECV_WINDOW_MS,
): Record<string, string> {
	const { apiKey, secret } = unwrapCredentials(credentials);
	requireSecret(secret);
	requireTimestamp(timestampMs);
	const timestamp = String(timestampMs);
	const recvWindow = String(recvWindowMs);
	return {
		"X-BAPI-API-KEY": apiKey,
		"X-BAPI-SIGN": hmacSha256Hex(secret, timestamp + apiKey + recvWindow + payload),
		"X-BAPI-TIMESTAMP": timestamp,
		"X-BAPI-RECV-WINDOW": recvWindow,
	};
}
