/**
 * Composition root: turns a validated `AppConfig` into a ready-to-start engine.
 */

import type { AppConfig, StreamConfig, VenueConfig } from "./config/schema.js";
import { ArbitrageEngine } from "./engine/arbitrage-engine.js";
import type { Logger } from "./lib/logger/index.js";
import { wsTransportFactory } from "./lib/websocket/client.js";
import type { WsTransportFactory } from "./lib/websocket/types.js";
import { RiskController } from "./risk/risk-controller.js";
import type { ConfigError } from "./shared/errors.js";
import { type Result, ok } from "./shared/result.js";
import { HedgeGateway } from "./venue/hedge/gateway.js";
import { hedgeDialect } from "./venue/hedge/dialect.js";
import { HomeGateway } from "./venue/home/gateway.js";
import { homeDialect } from "./venue/home/dialect.js";
import type { FetchFn, VenueDialect } from "./venue/types.js";
import { StreamClient } from "./websocket/stream-client.js";

export interface AppOverrides {
	/** Replaces the `ws` transport, one factory per venue URL. */
	readonly transportFor?: (url: string, dialTimeoutMs: number) => WsTransportFactory;
	readonly fetchFn?: FetchFn;
}

export interface App {
	readonly engine: ArbitrageEngine;
	readonly homeStream: StreamClient;
	readonly hedgeStream: StreamClient;
	readonly risk: RiskController;
}

function streamClient(
	venue: VenueConfig,
	dialect: VenueDialect,
	stream: StreamConfig,
	logger: Logger,
	overrides: AppOverrides,
): StreamClient {
	const transportFactory =
		overrides.transportFor?.(venue.wsUrl, stream.dialTimeoutMs) ??
		wsTransportFactory({ url: venue.wsUrl, dialTimeoutMs: stream.dialTimeoutMs });
	return new StreamClient(
		{
			venue: dialect.venue,
			pingIntervalMs: stream.pingIntervalMs,
			pongTimeoutMs: stream.pongTimeoutMs,
			reconnect: {
				baseDelayMs: stream.reconnectBaseDelayMs,
				maxDelayMs: stream.reconnectMaxDelayMs,
				jitterFactor: stream.reconnectJitter,
			},
		},
		{ transportFactory, dialect, logger },
	);
}

/** Wires streams, gateways, risk and the engine. Nothing is dialed until `engine.start()`. */
export function createApp(
	config: AppConfig,
	logger: Logger,
	overrides: AppOverrides = {},
): Result<App, ConfigError> {
	const rest = overrides.fetchFn === undefined ? {} : { fetchFn: overrides.fetchFn };
	const homeGateway = HomeGateway.create({
		baseUrl: config.home.restUrl,
		credentials: config.home.credentials,
		...rest,
	});
	if (!homeGateway.ok) return homeGateway;
	const hedgeGateway = HedgeGateway.create({
		baseUrl: config.hedge.restUrl,
		credentials: config.hedge.credentials,
		...rest,
	});
	if (!hedgeGateway.ok) return hedgeGateway;

	const homeStream = streamClient(config.home, homeDialect, config.stream, logger, overrides);
	const hedgeStream = streamClient(config.hedge, hedgeDialect, config.stream, logger, overrides);
	const risk = new RiskController(
		{
			maxDailyLoss: config.risk.maxDailyLoss,
			maxConsecutiveLosses: config.risk.maxConsecutiveLosses,
			minBalance: config.risk.minBalance,
		},
		logger,
	);
	const engine = new ArbitrageEngine(
		{ homeSymbol: config.homeSymbol, hedgeSymbol: config.hedgeSymbol, ...config.strategy },
		{
			home: { stream: homeStream, dialect: homeDialect, orders: homeGateway.value },
			hedge: {
				stream: hedgeStream,
				dialect: hedgeDialect,
				orders: hedgeGateway.value,
				account: hedgeGateway.value,
			},
			risk,
			logger,
		},
	);
	return ok({ engine, homeStream, hedgeStream, risk });
}
