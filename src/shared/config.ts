/**
 * Calculator configuration.
 *
 * Defaults, then environment variables, then explicit overrides; the merged
 * result is validated before use. The arithmetic core takes no configuration.
 */

import { LOG_LEVELS, type LogLevel } from "../lib/logger/index.js";
import { formatIssues, validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";

export interface CalculatorConfig {
	/** Minimum severity written by the calculator's logger */
	readonly logLevel: LogLevel;
	/** Longest operand, in decimal digits, the calculator will parse */
	readonly maxOperandDigits: number;
}

export const DEFAULT_CALCULATOR_CONFIG: CalculatorConfig = {
	logLevel: "info",
	maxOperandDigits: 10_000,
};

const calculatorConfigSchema = z.object({
	logLevel: z.enum(LOG_LEVELS),
	maxOperandDigits: z.number().int().positive(),
});

/** Mutable builder shape for constructing Partial<CalculatorConfig>. */
interface MutableCalculatorConfig {
	logLevel?: LogLevel;
	maxOperandDigits?: number;
}

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

/**
 * Reads BIGCALC_LOG_LEVEL and BIGCALC_MAX_OPERAND_DIGITS.
 * @throws ConfigError if a variable is set to an invalid value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<CalculatorConfig> {
	const result: MutableCalculatorConfig = {};

	const level = env["BIGCALC_LOG_LEVEL"];
	if (level) {
		if (!isLogLevel(level)) {
			throw new ConfigError(
				`Invalid BIGCALC_LOG_LEVEL: "${level}" must be one of ${LOG_LEVELS.join(", ")}`,
			);
		}
		result.logLevel = level;
	}

	const maxDigits = env["BIGCALC_MAX_OPERAND_DIGITS"];
	if (maxDigits) {
		const parsed = strictParseInt(maxDigits);
		if (Number.isNaN(parsed) || parsed <= 0) {
			throw new ConfigError(
				`Invalid BIGCALC_MAX_OPERAND_DIGITS: "${maxDigits}" must be a positive integer`,
			);
		}
		result.maxOperandDigits = parsed;
	}

	return result;
}

/**
 * Merge defaults, environment and overrides, then validate.
 * @throws ConfigError listing every invalid field
 */
export function resolveConfig(
	overrides: Partial<CalculatorConfig> = {},
	env: NodeJS.ProcessEnv = process.env,
): CalculatorConfig {
	const merged = { ...DEFAULT_CALCULATOR_CONFIG, ...configFromEnv(env), ...overrides };
	const result = validate<CalculatorConfig>(calculatorConfigSchema, merged);
	if (!result.ok) {
		throw new ConfigError(`Invalid calculator config: ${formatIssues(result.error.issues)}`, {
			issues: result.error.issues,
			cause: result.error,
		});
	}
	return result.value;
}
