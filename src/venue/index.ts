export type {
	AccountGateway,
	AccountSnapshot,
	FetchFn,
	OrderGateway,
	OrderHandle,
	OrderRequest,
	OrderType,
	RestClientConfig,
	TimeInForce,
	VenueDialect,
} from "./types.js";
export { DEFAULT_REST_TIMEOUT_MS, requestJson } from "./http.js";
export { homeDialect } from "./home/dialect.js";
export { HomeGateway } from "./home/gateway.js";
export type { HomeGatewayConfig } from "./home/gateway.js";
export { hedgeDialect } from "./hedge/dialect.js";
export { HedgeGateway, errorFromRetCode } from "./hedge/gateway.js";
export type { HedgeGatewayConfig } from "./hedge/gateway.js";
