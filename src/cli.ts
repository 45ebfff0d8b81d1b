#!/usr/bin/env node
/**
 * spread-arb [config.json]
 *
 * Exit codes: 0 after a clean stop, 1 when config, wiring or startup fails.
 */

import { createApp } from "./app.js";
import { loadConfig } from "./config/load.js";
import { createLogger } from "./lib/logger/index.js";
import { classifyError } from "./shared/errors.js";

const DEFAULT_CONFIG_PATH = "config.json";

async function main(): Promise<number> {
	const path = process.argv[2] ?? DEFAULT_CONFIG_PATH;
	const bootLogger = createLogger({ level: "info", bindings: { service: "spread-arb" } });

	const config = await loadConfig(path, process.env);
	if (!config.ok) {
		bootLogger.error({ err: config.error, path }, "config load failed");
		return 1;
	}

	const logger = createLogger({
		level: config.value.logLevel,
		bindings: { service: "spread-arb" },
	});
	const app = createApp(config.value, logger);
	if (!app.ok) {
		logger.error({ err: app.error }, "wiring failed");
		return 1;
	}
	const { engine } = app.value;

	const started = await engine.start();
	if (!started.ok) {
		logger.error({ err: started.error }, "engine failed to start");
		return 1;
	}

	// Resolves on a signal. When the engine stops itself the process drains and exits 0.
	const signal = await new Promise<NodeJS.Signals>((resolve) => {
		process.once("SIGINT", resolve);
		process.once("SIGTERM", resolve);
	});
	logger.info({ signal }, "shutdown requested");
	await engine.stop();
	return 0;
}

main().then(
	(code) => {
		process.exit(code);
	},
	(e: unknown) => {
		createLogger({ level: "error" }).error({ err: classifyError(e) }, "fatal");
		process.exit(1);
	},
);
