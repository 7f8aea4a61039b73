/**
 * Validation wrapper — thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Venue responses, configuration and watchlist files are checked here before
 * they reach domain code. Re-exports `z` so schemas are built against a single
 * import path.
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
		super(message, "VALIDATION_FAILED", ErrorCategory.NonRetryable, {
			issues: formatIssues(issues),
		});
		this.name = "ValidationError";
		this.issues = issues;
	}
}

/** Render issues as `path: message` strings, `(root)` for top-level failures. */
export function formatIssues(issues: readonly ValidationIssue[]): string[] {
	return issues.map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`);
}

/**
 * Validate data against a Zod schema, returning a Result instead of throwing.
 * @param label - Prefix for the error message, e.g. "order book"
 */
export function validate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
	label = "input",
): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path,
		message: i.message,
	}));
	return err(new ValidationError(`Invalid ${label}`, issues));
}
