/**
 * Validation wrapper — thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Config files and venue frames are parsed through here; `z` is re-exported
 * so schemas are declared without a direct zod import.
 */

import { z } from "zod";
import { ErrorCategory, TradingError } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Non-retryable error containing one or more validation issues. */
export class ValidationError extends TradingError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", ErrorCategory.NonRetryable, { issues });
		this.name = "ValidationError";
		this.issues = issues;
	}

	/** One line per issue, `path: message`, joined with "; ". */
	summary(): string {
		return this.issues
			.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
			.join("; ");
	}
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
	label = "Validation failed",
): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: [...i.path],
		message: i.message,
	}));
	return err(new ValidationError(label, issues));
}

/** Parse a JSON string and validate it in one step. Malformed JSON becomes a single issue. */
export function parseJson<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	text: string,
	label = "Validation failed",
): Result<T, ValidationError> {
	let data: unknown;
	try {
		data = JSON.parse(text);
	} catch (e) {
		const message = e instanceof Error ? e.message : String(e);
		return err(new ValidationError(label, [{ path: [], message: `invalid JSON: ${message}` }]));
	}
	return validate(schema, data, label);
}
