/**
 * Validation wrapper — thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Re-exports `z` so schemas are declared against a single import path.
 */

import { z } from "zod";
import { BigIntegerError, ErrorKind } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** One or more values failed their schema. */
export class ValidationError extends BigIntegerError {
	readonly issues: readonly ValidationIssue[];

	constructor(
		message: string,
		issues: readonly ValidationIssue[],
		kind: ErrorKind = ErrorKind.InvalidConfig,
	) {
		super(message, "VALIDATION_FAILED", kind, { issueCount: issues.length });
		this.name = "ValidationError";
		this.issues = issues;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			issues: this.issues,
		};
	}
}

export function isValidationError(e: unknown): e is ValidationError {
	return e instanceof ValidationError;
}

/** Render issues as `path: message` lines joined by "; ". */
export function formatIssues(issues: readonly ValidationIssue[]): string {
	return issues
		.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
		.join("; ");
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path,
		message: i.message,
	}));
	return err(new ValidationError("Validation failed", issues));
}
