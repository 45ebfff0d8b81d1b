/** Plaintext key material for one venue, before `createCredentials` seals it. */
export interface ApiKeySet {
	readonly apiKey: string;
	/** HMAC-SHA256 signing secret. */
	readonly secret: string;
	/** Home venue only: sent as `X-API-PASSPHRASE`. */
	readonly passphrase?: string;
}
