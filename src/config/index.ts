export { loadConfig, parseConfig } from "./load.js";
export type { Env } from "./load.js";
export { appConfigSchema } from "./schema.js";
export type { AppConfig, RiskConfig, StrategyConfig, StreamConfig, VenueConfig } from "./schema.js";
