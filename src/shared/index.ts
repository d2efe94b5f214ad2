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
} from "./result.js";

export {
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
} from "./errors.js";

export {
	type CalculatorConfig,
	DEFAULT_CALCULATOR_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./config.js";
