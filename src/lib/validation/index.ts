/**
 * Thin abstraction over Zod returning Result<T, ValidationError>.
 *
 * Rule writes, persisted files, the category table and snapshot DTOs are all
 * parsed through `validate`. `z` is re-exported so schemas are declared
 * against this module rather than importing zod directly.
 */

import { z } from "zod";
import { EngineError, ErrorCategory } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single failure with the path to the offending field. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Non-retryable error containing one or more validation issues. */
export class ValidationError extends EngineError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", ErrorCategory.NonRetryable, {
			issues: issues.map(formatIssue),
		});
		this.name = "ValidationError";
		this.issues = issues;
	}
}

/** `time_window: Number must be greater than or equal to 60` */
export function formatIssue(issue: ValidationIssue): string {
	return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

/**
 * Validate data against a Zod schema without throwing.
 * @param label - prefix for the error message, e.g. `"rule set"`
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
	const first = issues[0];
	const summary = first !== undefined ? `: ${formatIssue(first)}` : "";
	return err(new ValidationError(`Invalid ${label}${summary}`, issues));
}
