/**
 * Logger wrapper — structured logging backed by pino.
 *
 * Long numeric values are abbreviated before they reach pino: any string,
 * bigint, or object whose `toJSON()` yields a string longer than
 * `maxValueLength` is cut to that many characters plus its full length.
 * Path-based redaction is passed through to pino.
 */

import { pino, type Logger as PinoLogger, type LoggerOptions as PinoLoggerOptions } from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
	/** Longest value rendered in full (default 64 characters). */
	readonly maxValueLength?: number;
}

/** Overrides applied to a child logger. */
export interface ChildLoggerOptions {
	readonly level?: LogLevel;
}

/** Structured logger interface. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>, options?: ChildLoggerOptions): Logger;
}

export const DEFAULT_MAX_VALUE_LENGTH = 64;

// ── Value abbreviation ──────────────────────────────────────────────

function jsonText(value: unknown): string | undefined {
	if (typeof value === "string") return value;
	if (typeof value === "bigint") return value.toString();
	if (typeof value !== "object" || value === null || !("toJSON" in value)) return undefined;
	const toJSON = value.toJSON;
	if (typeof toJSON !== "function") return undefined;
	const out: unknown = toJSON.call(value);
	return typeof out === "string" ? out : undefined;
}

/** Cut a long textual value to `maxLength` characters, keeping its total length. */
export function abbreviateValue(value: unknown, maxLength: number): unknown {
	const text = jsonText(value);
	if (text === undefined) return value;
	if (text.length <= maxLength) return typeof value === "bigint" ? text : value;
	return `${text.slice(0, maxLength)}…(${text.length} chars)`;
}

function abbreviateFields(obj: object, maxLength: number): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = abbreviateValue(value, maxLength);
	}
	return result;
}

// ── Factory ─────────────────────────────────────────────────────────

function wrapPino(pinoLogger: PinoLogger, maxLength: number): Logger {
	const emit =
		(level: "info" | "warn" | "error" | "debug") =>
		(msgOrObj: unknown, msg?: string): void => {
			if (typeof msgOrObj === "string" || msgOrObj === undefined || msgOrObj === null) {
				pinoLogger[level](String(msgOrObj ?? ""));
			} else if (typeof msgOrObj === "object") {
				pinoLogger[level](abbreviateFields(msgOrObj, maxLength), msg ?? "");
			} else {
				pinoLogger[level](String(msgOrObj));
			}
		};

	return {
		info: emit("info"),
		warn: emit("warn"),
		error: emit("error"),
		debug: emit("debug"),
		child(bindings: Record<string, unknown>, options: ChildLoggerOptions = {}): Logger {
			const childOptions = options.level !== undefined ? { level: options.level } : {};
			return wrapPino(pinoLogger.child(abbreviateFields(bindings, maxLength), childOptions), maxLength);
		},
	};
}

/**
 * Creates a Logger backed by pino.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * logger.info({ result: BigInteger.parse("42") }, "evaluated");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: PinoLoggerOptions = {
		level: config.level,
	};

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	const destination = config.destination;
	const pinoLogger = destination
		? pino(pinoOptions, {
				write(chunk: string): void {
					destination.write(chunk);
				},
			})
		: pino(pinoOptions);

	return wrapPino(pinoLogger, config.maxValueLength ?? DEFAULT_MAX_VALUE_LENGTH);
}
