export type {
	ConnectionState,
	Frame,
	HeartbeatStyle,
	StreamDialect,
	StreamEvents,
	StreamState,
	Subscription,
	TopicHandler,
} from "./types.js";
export { ReconnectionPolicy } from "./reconnection.js";
export type { ReconnectionConfig } from "./reconnection.js";
export { StreamClient } from "./stream-client.js";
export type { StreamClientConfig, StreamClientDeps } from "./stream-client.js";
