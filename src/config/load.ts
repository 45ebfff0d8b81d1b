import { readFile } from "node:fs/promises";
import { validate } from "../lib/validation/index.js";
import { ConfigError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import { type AppConfig, appConfigSchema } from "./schema.js";

export type Env = Readonly<Record<string, string | undefined>>;

/** Environment variables that take precedence over the file, per venue field. */
const VENUE_ENV = {
	home: {
		apiKey: "ARB_HOME_API_KEY",
		apiSecret: "ARB_HOME_API_SECRET",
		passphrase: "ARB_HOME_PASSPHRASE",
	},
	hedge: {
		apiKey: "ARB_HEDGE_API_KEY",
		apiSecret: "ARB_HEDGE_API_SECRET",
	},
} as const;

const LOG_LEVEL_ENV = "ARB_LOG_LEVEL";

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Overlays non-empty environment values onto the raw document. */
function overlayEnv(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
	const merged: Record<string, unknown> = { ...raw };
	for (const [venue, fields] of Object.entries(VENUE_ENV)) {
		const block = raw[venue];
		const overlaid: Record<string, unknown> = isRecord(block) ? { ...block } : {};
		let touched = false;
		for (const [field, name] of Object.entries(fields)) {
			const value = env[name];
			if (value === undefined || value === "") continue;
			overlaid[field] = value;
			touched = true;
		}
		if (touched || isRecord(block)) merged[venue] = overlaid;
	}
	const level = env[LOG_LEVEL_ENV];
	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	if (level !== undefined && level !== "") merged["logLevel"] = level;
	return merged;
}

/**
 * Validates an already-parsed config document after applying env overrides.
 */
export function parseConfig(raw: unknown, env: Env = {}): Result<AppConfig, ConfigError> {
	if (!isRecord(raw)) {
		return err(new ConfigError("config must be a JSON object"));
	}
	const validated = validate(appConfigSchema, overlayEnv(raw, env), "invalid config");
	if (!validated.ok) {
		return err(
			new ConfigError(`invalid config: ${validated.error.summary()}`, {
				issues: validated.error.issues,
			}),
		);
	}
	return ok(validated.value);
}

/**
 * Reads the JSON config at `path`, overlays credential and log-level
 * environment variables, and validates the result.
 *
 * @example
 * ```ts
 * const config = await loadConfig("config.json", process.env);
 * if (!config.ok) process.exit(1);
 * ```
 */
export async function loadConfig(
	path: string,
	env: Env = process.env,
): Promise<Result<AppConfig, ConfigError>> {
	let text: string;
	try {
		text = await readFile(path, "utf8");
	} catch (e) {
		return err(new ConfigError(`cannot read config file ${path}`, { cause: e }));
	}

	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (e) {
		const message = e instanceof Error ? e.message : String(e);
		return err(new ConfigError(`config file ${path} is not valid JSON: ${message}`));
	}
	return parseConfig(raw, env);
}
