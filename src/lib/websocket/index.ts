export type {
	WsConfig,
	WsState,
	WsMessageHandler,
	WsCloseHandler,
	WsErrorHandler,
	WsControlHandler,
	WsTransport,
	WsTransportFactory,
} from "./types.js";
export { WsClient, wsTransportFactory } from "./client.js";
