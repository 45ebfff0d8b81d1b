import { describe, expect, it } from "vitest";
import { createCredentials } from "../../auth/credentials.js";
import { LOG_LEVELS, type LogLevel, createLogger, silentLogger } from "./index.js";

function capture(level: LogLevel, extra: { redactPaths?: readonly string[] } = {}) {
	const lines: Record<string, unknown>[] = [];
	const logger = createLogger({
		level,
		...extra,
		bindings: { service: "spread-arb" },
		destination: {
			write(chunk: string) {
				const parsed: unknown = JSON.parse(chunk);
				if (typeof parsed === "object" && parsed !== null) {
					lines.push(Object.fromEntries(Object.entries(parsed)));
				}
			},
		},
	});
	return { logger, lines };
}

describe("createLogger", () => {
	it("writes one JSON line per call with base and child bindings", () => {
		const { logger, lines } = capture("info");
		logger.child({ component: "stream", venue: "hedge" }).info({ delayMs: 2000 }, "reconnecting");

		expect(lines).toHaveLength(1);
		expect(lines[0]).toMatchObject({
			level: 30,
			service: "spread-arb",
			component: "stream",
			venue: "hedge",
			delayMs: 2000,
			msg: "reconnecting",
		});
	});

	it("accepts a bare message", () => {
		const { logger, lines } = capture("info");
		logger.warn("engine stopping");
		expect(lines[0]).toMatchObject({ level: 40, msg: "engine stopping" });
	});

	it("drops lines below the configured level", () => {
		const { logger, lines } = capture("warn");
		logger.debug("tick");
		logger.info("status");
		logger.warn("connection lost");
		logger.error("NAKED POSITION");

		expect(lines.map((l) => l["msg"])).toEqual(["connection lost", "NAKED POSITION"]);
	});

	it("redacts sealed credentials", () => {
		const { logger, lines } = capture("info");
		const credentials = createCredentials({ apiKey: "test-key", secret: "test-secret" });
		logger.info({ venue: "home", credentials }, "gateway ready");

		expect(lines[0]?.["credentials"]).toBe("[REDACTED]");
		expect(lines[0]?.["venue"]).toBe("home");
	});

	it("censors configured paths", () => {
		const { logger, lines } = capture("info", { redactPaths: ['headers["X-API-SIGNATURE"]'] });
		logger.info(
			{ headers: { "X-API-KEY": "test-key", "X-API-SIGNATURE": "abc123" } },
			"request signed",
		);

		expect(lines[0]?.["headers"]).toEqual({
			"X-API-KEY": "test-key",
			"X-API-SIGNATURE": "[REDACTED]",
		});
	});

	it("accepts every declared level", () => {
		for (const level of LOG_LEVELS) {
			expect(() => createLogger({ level })).not.toThrow();
		}
	});
});

describe("silentLogger", () => {
	it("builds children and swallows output", () => {
		const logger = silentLogger().child({ component: "engine" });
		expect(() => logger.error({ pnl: "-1" }, "stop failed")).not.toThrow();
	});
});
