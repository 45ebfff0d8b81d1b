/**
 * TradingError hierarchy — structured error classification.
 *
 * The category decides what a caller does next: transport errors are
 * retried by reconnecting, venue rejections abort the attempt, and fatal
 * errors stop startup.
 */

/** Error severity categories. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

interface TradingErrorOptions {
	readonly cause?: unknown;
}

type ErrorContext = Record<string, unknown> & TradingErrorOptions;

/** Base error class for all trading operations, with category-based retry semantics. */
export class TradingError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
	) {
		super(message);
		this.name = "TradingError";
		this.category = category;
		this.code = code;
		this.context = context;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Retryable error for dial, read and write failures on a connection. */
export class NetworkError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "NETWORK_ERROR", ErrorCategory.Retryable, rest);
		this.name = "NetworkError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Retryable error for dial and request timeouts. */
export class TimeoutError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "TIMEOUT_ERROR", ErrorCategory.Retryable, rest);
		this.name = "TimeoutError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Retryable error for HTTP 429 responses; includes a retry-after hint. */
export class RateLimitError extends TradingError {
	readonly retryAfterMs: number;
	constructor(message: string, retryAfterMs: number, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "RATE_LIMIT_ERROR", ErrorCategory.Retryable, rest);
		this.name = "RateLimitError";
		this.retryAfterMs = retryAfterMs;
		if (cause !== undefined) this.cause = cause;
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), retryAfterMs: this.retryAfterMs };
	}
}

/** Non-retryable error for rejected credentials or signatures. */
export class AuthError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "AUTH_ERROR", ErrorCategory.NonRetryable, rest);
		this.name = "AuthError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Non-retryable error when a venue rejects an order or query. */
export class OrderRejectedError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "ORDER_REJECTED", ErrorCategory.NonRetryable, rest);
		this.name = "OrderRejectedError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for invalid or missing configuration. */
export class ConfigError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for unexpected internal failures. */
export class SystemError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, rest);
		this.name = "SystemError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification helper ────────────────────────────────────────────

/**
 * Maps a non-2xx HTTP status to the error a caller should act on.
 *
 * @example
 * errorFromStatus(429, "slow down").code; // "RATE_LIMIT_ERROR"
 */
export function errorFromStatus(
	status: number,
	message: string,
	context: ErrorContext = {},
): TradingError {
	const withStatus = { ...context, status };
	if (status === 429) return new RateLimitError(message, 1000, withStatus);
	if (status === 401 || status === 403) return new AuthError(message, withStatus);
	if (status >= 500) return new SystemError(message, withStatus);
	return new OrderRejectedError(message, withStatus);
}

function statusOf(value: unknown): number | undefined {
	if (typeof value !== "object" || value === null || !("context" in value)) return undefined;
	const ctx = value.context;
	if (typeof ctx !== "object" || ctx === null || !("status" in ctx)) return undefined;
	return typeof ctx.status === "number" && ctx.status >= 400 ? ctx.status : undefined;
}

function errnoOf(error: Error): string | undefined {
	const code = "code" in error ? error.code : undefined;
	if (typeof code === "string") return code;
	const cause = error.cause;
	if (typeof cause === "object" && cause !== null && "code" in cause) {
		return typeof cause.code === "string" ? cause.code : undefined;
	}
	return undefined;
}

/** Classify an unknown thrown value into the TradingError hierarchy. */
export function classifyError(error: unknown): TradingError {
	if (error instanceof TradingError) return error;
	if (!(error instanceof Error)) {
		return new SystemError(String(error), { cause: error });
	}

	const status = statusOf(error) ?? statusOf(error.cause);
	if (status !== undefined) return errorFromStatus(status, error.message, { cause: error });

	const code = errnoOf(error);
	if (code === "ETIMEDOUT" || error.name === "AbortError" || error.name === "TimeoutError") {
		return new TimeoutError(error.message, { cause: error });
	}
	if (code === "ECONNREFUSED" || code === "ENOTFOUND" || code === "ECONNRESET") {
		return new NetworkError(error.message, { cause: error });
	}

	const msg = error.message.toLowerCase();
	if (msg.includes("timeout") || msg.includes("timed out")) {
		return new TimeoutError(error.message, { cause: error });
	}
	if (msg.includes("fetch failed") || msg.includes("socket hang up")) {
		return new NetworkError(error.message, { cause: error });
	}
	return new SystemError(error.message, { cause: error });
}

/** Type guard for NetworkError. */
export function isNetworkError(e: unknown): e is NetworkError {
	return e instanceof NetworkError;
}
