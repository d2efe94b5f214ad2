import { BigInteger } from "../integer/big-integer.js";
import { gcd, isqrt } from "../integer/number-theory.js";
import type { Logger } from "../lib/logger/index.js";
import { ValidationError } from "../lib/validation/index.js";
import type { CalculatorConfig } from "../shared/config.js";
import type { BigIntegerError } from "../shared/errors.js";
import { ErrorKind, isBigIntegerError } from "../shared/errors.js";
import { err, flatMap, tryCatch } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import {
	type BinaryOperator,
	type Instruction,
	Operator,
	formatInstruction,
	parseInstruction,
} from "./instruction.js";

export type Evaluation = Result<BigInteger, BigIntegerError>;

function applyBinary(operator: BinaryOperator, left: BigInteger, right: BigInteger): BigInteger {
	switch (operator) {
		case Operator.Add:
			return left.add(right);
		case Operator.Subtract:
			return left.sub(right);
		case Operator.Multiply:
			return left.mul(right);
		case Operator.Divide:
			return left.div(right);
		case Operator.Remainder:
			return left.rem(right);
		case Operator.Gcd:
			return gcd(left, right);
	}
}

/** Digits in an operand's text, not counting a leading sign. */
function operandDigits(text: string): number {
	return text.startsWith("+") || text.startsWith("-") ? text.length - 1 : text.length;
}

/**
 * Evaluates calculator instructions against BigInteger.
 *
 * Failures come back as error Results, one per instruction; only errors
 * that are not BigIntegerErrors propagate as exceptions.
 */
export class Calculator {
	private readonly config: CalculatorConfig;
	private readonly logger: Logger;

	constructor(config: CalculatorConfig, logger: Logger) {
		this.config = config;
		this.logger = logger.child({ component: "calculator" }, { level: config.logLevel });
	}

	/** Parse and evaluate one line. */
	run(line: string): Evaluation {
		const parsed = parseInstruction(line);
		if (!parsed.ok) {
			this.logger.warn({ code: parsed.error.code, line }, parsed.error.message);
			return parsed;
		}
		return this.evaluate(parsed.value);
	}

	/** Evaluate every non-blank line that does not start with `#`. */
	runScript(script: string): Evaluation[] {
		return script
			.split(/\r?\n/)
			.map((line) => line.trim())
			.filter((line) => line.length > 0 && !line.startsWith("#"))
			.map((line) => this.run(line));
	}

	evaluate(instruction: Instruction): Evaluation {
		const outcome = this.compute(instruction);
		const text = formatInstruction(instruction);
		if (outcome.ok) {
			this.logger.debug({ instruction: text, result: outcome.value }, "evaluated");
		} else {
			this.logger.warn(
				{ instruction: text, code: outcome.error.code, kind: outcome.error.kind },
				outcome.error.message,
			);
		}
		return outcome;
	}

	private compute(instruction: Instruction): Evaluation {
		switch (instruction.kind) {
			case "unary":
				return flatMap(this.parseOperand(instruction.operand, 0), (operand) =>
					tryCatch(() => isqrt(operand), isBigIntegerError),
				);
			case "binary": {
				const { operator } = instruction;
				return flatMap(this.parseOperand(instruction.left, 0), (left) =>
					flatMap(this.parseOperand(instruction.right, 1), (right) =>
						tryCatch(() => applyBinary(operator, left, right), isBigIntegerError),
					),
				);
			}
		}
	}

	private parseOperand(text: string, position: number): Evaluation {
		const digits = operandDigits(text);
		if (digits > this.config.maxOperandDigits) {
			const message = `operand has ${digits} digits; the limit is ${this.config.maxOperandDigits}`;
			return err(
				new ValidationError(
					`Operand ${position} rejected: ${message}`,
					[{ path: ["operands", position], message }],
					ErrorKind.InvalidInput,
				),
			);
		}
		return BigInteger.tryParse(text);
	}
}
