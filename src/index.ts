// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type Result,
	ok,
	err,
	isOk,
	isErr,
	Decimal,
	OrderSide,
	oppositeSide,
	type Clock,
	SystemClock,
	FakeClock,
	Duration,
	TradingError,
	ErrorCategory,
	NetworkError,
	TimeoutError,
	RateLimitError,
	AuthError,
	OrderRejectedError,
	ConfigError,
	SystemError,
	classifyError,
} from "./shared/index.js";

// ── Config ──────────────────────────────────────────────────────────
export { loadConfig, parseConfig } from "./config/index.js";
export type { AppConfig, Env, VenueConfig } from "./config/index.js";

// ── App ─────────────────────────────────────────────────────────────
export { createApp } from "./app.js";
export type { App, AppOverrides } from "./app.js";

// ── Engine ──────────────────────────────────────────────────────────
export { ArbitrageEngine } from "./engine/index.js";
export type {
	ArbitrageEngineDeps,
	EngineConfig,
	EngineState,
	ExecutionOutcome,
	Opportunity,
	StatusReport,
	TickOutcome,
} from "./engine/index.js";

// ── Risk ────────────────────────────────────────────────────────────
export { RiskController, isAllowed, isBlocked } from "./risk/index.js";
export type { GuardVerdict, RiskLimits, RiskState } from "./risk/index.js";

// ── Market ──────────────────────────────────────────────────────────
export { MarketView, crossSpreads, isTradable, topOfBook } from "./market/index.js";
export type { CrossSpreads, MarketQuote, OrderbookLevel, VenueId } from "./market/index.js";

// ── Streaming ───────────────────────────────────────────────────────
export { ReconnectionPolicy, StreamClient } from "./websocket/index.js";
export type {
	ConnectionState,
	ReconnectionConfig,
	StreamClientConfig,
	StreamDialect,
	StreamState,
} from "./websocket/index.js";

// ── Venues ──────────────────────────────────────────────────────────
export {
	HedgeGateway,
	HomeGateway,
	hedgeDialect,
	homeDialect,
} from "./venue/index.js";
export type {
	AccountGateway,
	AccountSnapshot,
	OrderGateway,
	OrderHandle,
	OrderRequest,
	VenueDialect,
} from "./venue/index.js";

// ── Auth ────────────────────────────────────────────────────────────
export { type ApiKeySet, type Credentials, createCredentials } from "./auth/index.js";

// ── Lib: WebSocket ──────────────────────────────────────────────────
export { WsClient, wsTransportFactory } from "./lib/websocket/index.js";
export type { WsConfig, WsTransport } from "./lib/websocket/index.js";

// ── Lib: Logger ─────────────────────────────────────────────────────
export { createLogger, silentLogger } from "./lib/logger/index.js";
export type { Logger, LoggerConfig, LogLevel } from "./lib/logger/index.js";

// ── Lib: Validation ─────────────────────────────────────────────────
export { validate, ValidationError } from "./lib/validation/index.js";
export type { ValidationIssue } from "./lib/validation/index.js";

// ── Lib: Events ─────────────────────────────────────────────────────
export { TypedEmitter } from "./lib/events/index.js";
export type { EventMap } from "./lib/events/index.js";
