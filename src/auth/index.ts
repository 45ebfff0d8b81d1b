export type { ApiKeySet } from "./types.js";
export { Credentials, createCredentials, unwrapCredentials } from "./credentials.js";
export {
	HEDGE_RECV_WINDOW_MS,
	hmacSha256Hex,
	signHedgeRequest,
	signHomeRequest,
} from "./request-signing.js";
