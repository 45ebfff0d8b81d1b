/**
 * Zod building blocks shared by both venues' wire formats.
 */

import { z } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";
import type { OrderbookLevel } from "../market/types.js";

/** A decimal carried as a string or a JSON number. */
export const decimalValue = z.union([z.string(), z.number()]).transform((raw, ctx) => {
	const parsed = Decimal.parse(String(raw));
	if (parsed === null) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a decimal: ${String(raw)}` });
		return z.NEVER;
	}
	return parsed;
});

/** `[price, size, ...]` with any trailing fields ignored. */
export const priceLevel = z
	.tuple([decimalValue, decimalValue])
	.rest(z.unknown())
	.transform(([price, size]): OrderbookLevel => ({ price, size }));

export const priceLevels = z.array(priceLevel);

/** Parses a raw text frame as JSON, or null when it is not JSON. */
export function parseFrameJson(raw: string): unknown {
	try {
		return JSON.parse(raw);
	} catch {
		return null;
	}
}

/** Envelope fields common to both venues' stream frames. */
export const streamEnvelope = z
	.object({
		topic: z.string().optional(),
		op: z.string().optional(),
		data: z.unknown().optional(),
	})
	.passthrough();
