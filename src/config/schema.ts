/**
 * Application configuration schema.
 *
 * Money values accept a string or a JSON number and come out as `Decimal`.
 * Venue credentials are sealed into opaque `Credentials` during parsing.
 */

import { createCredentials } from "../auth/credentials.js";
import type { Credentials } from "../auth/credentials.js";
import { LOG_LEVELS } from "../lib/logger/index.js";
import { z } from "../lib/validation/index.js";
import type { Decimal } from "../shared/decimal.js";
import { decimalValue } from "../venue/schemas.js";

// ── Building blocks ─────────────────────────────────────────────────

const positiveDecimal = decimalValue.refine((d: Decimal) => d.isPositive(), "must be positive");
const nonNegativeDecimal = decimalValue.refine(
	(d: Decimal) => !d.isNegative(),
	"must not be negative",
);
const intervalMs = z.number().int().positive();
const precision = z.number().int().min(0).max(18);
const wsUrl = z
	.string()
	.url()
	.refine((url) => /^wss?:\/\//.test(url), "must be a ws:// or wss:// URL");

export interface VenueConfig {
	readonly restUrl: string;
	readonly wsUrl: string;
	readonly credentials: Credentials;
}

const venueSchema = z
	.object({
		restUrl: z.string().url(),
		wsUrl,
		apiKey: z.string().min(1),
		apiSecret: z.string().min(1),
		passphrase: z.string().min(1).optional(),
	})
	.strict()
	.transform(
		(v): VenueConfig => ({
			restUrl: v.restUrl,
			wsUrl: v.wsUrl,
			credentials: createCredentials(
				v.passphrase === undefined
					? { apiKey: v.apiKey, secret: v.apiSecret }
					: { apiKey: v.apiKey, secret: v.apiSecret, passphrase: v.passphrase },
			),
		}),
	);

// ── Sections ────────────────────────────────────────────────────────

const strategySchema = z
	.object({
		// May be negative.
		minSpread: decimalValue,
		orderSize: positiveDecimal,
		maxPosition: positiveDecimal,
		tickIntervalMs: intervalMs.default(200),
		statusIntervalMs: intervalMs.default(30_000),
		readyTimeoutMs: intervalMs.default(10_000),
		takeProfit: positiveDecimal,
		stopLoss: positiveDecimal,
		pricePrecision: precision,
		sizePrecision: precision,
		hedgeMode: z.boolean().default(true),
	})
	.strict();

const riskSchema = z
	.object({
		maxDailyLoss: positiveDecimal,
		maxConsecutiveLosses: z.number().int().positive(),
		minBalance: nonNegativeDecimal,
	})
	.strict();

const streamSchema = z
	.object({
		pingIntervalMs: intervalMs.default(20_000),
		pongTimeoutMs: intervalMs.default(10_000),
		dialTimeoutMs: intervalMs.default(10_000),
		reconnectBaseDelayMs: intervalMs.default(1_000),
		reconnectMaxDelayMs: intervalMs.default(30_000),
		reconnectJitter: z.number().min(0).max(1).default(0),
	})
	.strict()
	.refine((s) => s.reconnectMaxDelayMs >= s.reconnectBaseDelayMs, {
		message: "reconnectMaxDelayMs must be at least reconnectBaseDelayMs",
		path: ["reconnectMaxDelayMs"],
	});

export const appConfigSchema = z
	.object({
		home: venueSchema,
		hedge: venueSchema,
		homeSymbol: z.string().min(1),
		hedgeSymbol: z.string().min(1),
		strategy: strategySchema,
		risk: riskSchema,
		stream: streamSchema.default({}),
		logLevel: z.enum(LOG_LEVELS).default("info"),
	})
	.strict();

export type AppConfig = z.output<typeof appConfigSchema>;
export type StrategyConfig = AppConfig["strategy"];
export type RiskConfig = AppConfig["risk"];
export type StreamConfig = AppConfig["stream"];
