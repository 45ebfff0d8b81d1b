/**
 * Logger wrapper — structured logging backed by pino.
 *
 * Auto-redacts opaque credential objects (anything with `__opaque: true`)
 * and supports path-based redaction for sensitive fields.
 */

import { pino } from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe; `silent` disables output. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
	readonly bindings?: Record<string, unknown>;
}

/** Structured logger interface with auto-redaction of opaque credentials. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

// ── Credential serializer ───────────────────────────────────────────

function isOpaqueCredential(value: unknown): boolean {
	return (
		typeof value === "object" && value !== null && "__opaque" in value && value.__opaque === true
	);
}

function redactCredentials(obj: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = isOpaqueCredential(value) ? "[REDACTED]" : value;
	}
	return result;
}

// ── Factory ─────────────────────────────────────────────────────────

type Level = "info" | "warn" | "error" | "debug";

function emitter(pinoLogger: pino.Logger, level: Level) {
	return (msgOrObj: string | Record<string, unknown> | null | undefined, msg?: string): void => {
		if (typeof msgOrObj === "string" || msgOrObj === undefined || msgOrObj === null) {
			pinoLogger[level](String(msgOrObj ?? ""));
		} else {
			pinoLogger[level](redactCredentials(msgOrObj), msg ?? "");
		}
	};
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info: emitter(pinoLogger, "info"),
		warn: emitter(pinoLogger, "warn"),
		error: emitter(pinoLogger, "error"),
		debug: emitter(pinoLogger, "debug"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * logger.info({ venue: "hedge", orderId: "abc" }, "order placed");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (config.bindings) {
		pinoOptions.base = config.bindings;
	}

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	const destination = config.destination;
	const pinoLogger = destination
		? pino(pinoOptions, {
				write(chunk: string): void {
					destination.write(chunk);
				},
			})
		: pino(pinoOptions);

	return wrapPino(pinoLogger);
}

/** Logger that discards everything. */
export function silentLogger(): Logger {
	return createLogger({ level: "silent" });
}
