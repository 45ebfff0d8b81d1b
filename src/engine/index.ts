export { ArbitrageEngine } from "./arbitrage-engine.js";
export type { ArbitrageEngineDeps } from "./arbitrage-engine.js";
export type {
	Direction,
	EngineConfig,
	EngineState,
	ExecutionOutcome,
	HedgeVenueLink,
	MarketStream,
	Opportunity,
	SkipReason,
	StatusReport,
	StreamStatus,
	TickOutcome,
	VenueLink,
} from "./types.js";
