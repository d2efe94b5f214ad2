/**
 * One-line calculator instructions.
 *
 *   <a> + <b>   <a> - <b>   <a> * <b>   <a> / <b>   <a> % <b>
 *   sqrt <a>
 *   gcd <a> <b>
 *
 * Tokens are separated by whitespace. Operands stay as text until evaluation
 * so the calculator can bound their size before parsing.
 */

import { InvalidFormatError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";

export const Operator = {
	Add: "+",
	Subtract: "-",
	Multiply: "*",
	Divide: "/",
	Remainder: "%",
	Sqrt: "sqrt",
	Gcd: "gcd",
} as const;

export type Operator = (typeof Operator)[keyof typeof Operator];

export type InfixOperator = Exclude<Operator, typeof Operator.Sqrt | typeof Operator.Gcd>;
export type BinaryOperator = Exclude<Operator, typeof Operator.Sqrt>;

const INFIX_OPERATORS: readonly InfixOperator[] = [
	Operator.Add,
	Operator.Subtract,
	Operator.Multiply,
	Operator.Divide,
	Operator.Remainder,
];

export function isInfixOperator(token: string): token is InfixOperator {
	return INFIX_OPERATORS.some((op) => op === token);
}

export type Instruction =
	| {
			readonly kind: "binary";
			readonly operator: BinaryOperator;
			readonly left: string;
			readonly right: string;
	  }
	| {
			readonly kind: "unary";
			readonly operator: typeof Operator.Sqrt;
			readonly operand: string;
	  };

/** Longest stretch of a rejected line quoted in the error message. */
const MAX_QUOTED_LENGTH = 40;

function quoteLine(line: string): string {
	const text = line.trim();
	if (text.length <= MAX_QUOTED_LENGTH) return `"${text}"`;
	return `"${text.slice(0, MAX_QUOTED_LENGTH)}"…(${text.length} chars)`;
}

export function parseInstruction(line: string): Result<Instruction, InvalidFormatError> {
	const tokens = line.trim().split(/\s+/).filter((token) => token.length > 0);
	const [first, second, third] = tokens;

	if (tokens.length === 2 && first === Operator.Sqrt && second !== undefined) {
		return ok({ kind: "unary", operator: Operator.Sqrt, operand: second });
	}
	if (tokens.length === 3 && first !== undefined && second !== undefined && third !== undefined) {
		if (first === Operator.Gcd) {
			return ok({ kind: "binary", operator: Operator.Gcd, left: second, right: third });
		}
		if (isInfixOperator(second)) {
			return ok({ kind: "binary", operator: second, left: first, right: third });
		}
	}

	return err(
		new InvalidFormatError(`Unrecognized instruction: ${quoteLine(line)}`, {
			input: line,
			tokenCount: tokens.length,
		}),
	);
}

/** Render an instruction back to its canonical one-line form. */
export function formatInstruction(instruction: Instruction): string {
	if (instruction.kind === "unary") {
		return `${instruction.operator} ${instruction.operand}`;
	}
	if (instruction.operator === Operator.Gcd) {
		return `${instruction.operator} ${instruction.left} ${instruction.right}`;
	}
	return `${instruction.left} ${instruction.operator} ${instruction.right}`;
}
