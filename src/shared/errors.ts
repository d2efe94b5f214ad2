/**
 * BigIntegerError hierarchy — typed failures surfaced by the arithmetic core
 * and the layers around it.
 *
 * Every error carries a kind so callers can branch on what went wrong
 * without string matching. Nothing in the core retries or defaults a value.
 */

/** Failure kinds a caller can branch on. */
export const ErrorKind = {
	InvalidFormat: "invalid_format",
	DivisionByZero: "division_by_zero",
	Domain: "domain",
	Overflow: "overflow",
	InvalidConfig: "invalid_config",
	InvalidInput: "invalid_input",
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

/** Options for constructing BigIntegerError subclasses with optional cause chain. */
interface BigIntegerErrorOptions {
	readonly cause?: unknown;
}

/** Base error class for all integer operations. */
export class BigIntegerError extends Error {
	readonly kind: ErrorKind;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		kind: ErrorKind,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "BigIntegerError";
		this.kind = kind;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			kind: this.kind,
			...(this.hint !== undefined && { hint: this.hint }),
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Text or number that does not denote an integer. */
export class InvalidFormatError extends BigIntegerError {
	constructor(message: string, context: Record<string, unknown> & BigIntegerErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "INVALID_FORMAT", ErrorKind.InvalidFormat, rest);
		this.name = "InvalidFormatError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Division or remainder with a zero divisor. */
export class DivisionByZeroError extends BigIntegerError {
	constructor(message: string, context: Record<string, unknown> & BigIntegerErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "DIVISION_BY_ZERO", ErrorKind.DivisionByZero, rest);
		this.name = "DivisionByZeroError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Argument outside the mathematical domain of the operation (e.g. sqrt of a negative). */
export class DomainError extends BigIntegerError {
	constructor(message: string, context: Record<string, unknown> & BigIntegerErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "DOMAIN_ERROR", ErrorKind.Domain, rest);
		this.name = "DomainError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Value does not fit the target fixed-width range; carries the violated bounds. */
export class OverflowError extends BigIntegerError {
	readonly min: string;
	readonly max: string;

	constructor(
		message: string,
		min: string,
		max: string,
		context: Record<string, unknown> & BigIntegerErrorOptions = {},
	) {
		const { cause, ...rest } = context;
		super(message, "OVERFLOW", ErrorKind.Overflow, rest, "toBigInt() converts without a range limit");
		this.name = "OverflowError";
		this.min = min;
		this.max = max;
		if (cause !== undefined) this.cause = cause;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			min: this.min,
			max: this.max,
		};
	}
}

/** Invalid or missing configuration. */
export class ConfigError extends BigIntegerError {
	constructor(message: string, context: Record<string, unknown> & BigIntegerErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", ErrorKind.InvalidConfig, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Type guards ──────────────────────────────────────────────────────

export function isBigIntegerError(e: unknown): e is BigIntegerError {
	return e instanceof BigIntegerError;
}

export function isInvalidFormatError(e: unknown): e is InvalidFormatError {
	return e instanceof InvalidFormatError;
}

export function isDivisionByZeroError(e: unknown): e is DivisionByZeroError {
	return e instanceof DivisionByZeroError;
}

export function isDomainError(e: unknown): e is DomainError {
	return e instanceof DomainError;
}

export function isOverflowError(e: unknown): e is OverflowError {
	return e instanceof OverflowError;
}

export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}
