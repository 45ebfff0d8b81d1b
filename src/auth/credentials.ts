/**
 * Opaque credential container — secrets never leak through toString,
 * JSON.stringify, or Node.js inspect.
 */

import { AuthError } from "../shared/errors.js";
import type { ApiKeySet } from "./types.js";

// ── Private store ────────────────────────────────────────────────────

const inspectSymbol: unique symbol = Symbol.for("nodejs.util.inspect.custom");

const store = new WeakMap<Credentials, ApiKeySet>();

/**
 * Sealed API keys. Renders as "[REDACTED]" everywhere; the logger recognises
 * the `__opaque` marker. Use `unwrapCredentials()` at the signing boundary.
 */
export class Credentials {
	readonly __opaque = true;

	private constructor() {}

	/** @internal use createCredentials */
	static seal(keys: ApiKeySet): Credentials {
		const sealed = new Credentials();
		store.set(sealed, { ...keys });
		return sealed;
	}

	toString(): string {
		return "[REDACTED]";
	}

	toJSON(): string {
		return "[REDACTED]";
	}

	[inspectSymbol](): string {
		return "[REDACTED]";
	}
}

// ── Factory ──────────────────────────────────────────────────────────

/**
 * Seals an API key set into opaque Credentials.
 *
 * @example
 * const credentials = createCredentials({ apiKey: "key", secret: "test-secret" });
 * String(credentials); // "[REDACTED]"
 */
export function createCredentials(keys: ApiKeySet): Credentials {
	return Credentials.seal(keys);
}

// ── Accessor ─────────────────────────────────────────────────────────

/**
 * Returns a copy of the sealed key set.
 * @throws AuthError if the object was not produced by createCredentials
 */
export function unwrapCredentials(credentials: Credentials): ApiKeySet {
	const keys = store.get(credentials);
	if (!keys) {
		throw new AuthError("Invalid credentials object");
	}
	return { ...keys };
}
