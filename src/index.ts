// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type Result,
	ok,
	err,
	map,
	flatMap,
	unwrap,
	unwrapOr,
	isOk,
	isErr,
	tryCatch,
	ErrorKind,
	BigIntegerError,
	InvalidFormatError,
	DivisionByZeroError,
	DomainError,
	OverflowError,
	ConfigError,
	isBigIntegerError,
	isInvalidFormatError,
	isDivisionByZeroError,
	isDomainError,
	isOverflowError,
	isConfigError,
	type CalculatorConfig,
	DEFAULT_CALCULATOR_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./shared/index.js";

// ── Integer ──────────────────────────────────────────────────────────
export {
	BigInteger,
	type BigIntegerLike,
	type DivRem,
	type Ordering,
	isqrt,
	gcd,
} from "./integer/index.js";

// ── Calculator ───────────────────────────────────────────────────────
export {
	Operator,
	type InfixOperator,
	type BinaryOperator,
	type Instruction,
	isInfixOperator,
	parseInstruction,
	formatInstruction,
	Calculator,
	type Evaluation,
} from "./calc/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export {
	type Logger,
	type ChildLoggerOptions,
	type LoggerConfig,
	type LogLevel,
	LOG_LEVELS,
	createLogger,
} from "./lib/logger/index.js";
export {
	ValidationError,
	type ValidationIssue,
	isValidationError,
	validate,
} from "./lib/validation/index.js";
