import { describe, expect, it } from "vitest";
import { InvalidFormatError } from "../shared/errors.js";
import { Operator, formatInstruction, isInfixOperator, parseInstruction } from "./instruction.js";

describe("parseInstruction", () => {
	it("parses infix arithmetic", () => {
		expect(parseInstruction("12 + 34")).toEqual({
			ok: true,
			value: { kind: "binary", operator: "+", left: "12", right: "34" },
		});
	});

	it("keeps operand signs", () => {
		expect(parseInstruction("-5 - -3")).toEqual({
			ok: true,
			value: { kind: "binary", operator: "-", left: "-5", right: "-3" },
		});
	});

	it("parses sqrt with surrounding whitespace", () => {
		expect(parseInstruction("  sqrt \t 99 ")).toEqual({
			ok: true,
			value: { kind: "unary", operator: "sqrt", operand: "99" },
		});
	});

	it("parses prefix gcd", () => {
		expect(parseInstruction("gcd 60 48")).toEqual({
			ok: true,
			value: { kind: "binary", operator: "gcd", left: "60", right: "48" },
		});
	});

	it.each(["", "   ", "sqrt", "12 ^ 3", "1 + 2 + 3", "gcd 1", "12 34"])("rejects %j", (line) => {
		const result = parseInstruction(line);
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(InvalidFormatError);
			expect(result.error.message).toBe(`Unrecognized instruction: "${line.trim()}"`);
		}
	});

	it("quotes only the start of a long rejected line", () => {
		const line = `1 + 2 ${"9".repeat(1000)}`;
		const result = parseInstruction(line);
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toBe(
				`Unrecognized instruction: "1 + 2 ${"9".repeat(34)}"…(1006 chars)`,
			);
			expect(result.error.context).toEqual({ input: line, tokenCount: 4 });
		}
	});

	it("leaves operand text unvalidated", () => {
		const result = parseInstruction("abc * 2");
		expect(result.ok).toBe(true);
	});
});

describe("isInfixOperator", () => {
	it("accepts only the five infix symbols", () => {
		for (const op of ["+", "-", "*", "/", "%"]) {
			expect(isInfixOperator(op)).toBe(true);
		}
		expect(isInfixOperator(Operator.Sqrt)).toBe(false);
		expect(isInfixOperator(Operator.Gcd)).toBe(false);
		expect(isInfixOperator("^")).toBe(false);
	});
});

describe("formatInstruction", () => {
	it.each(["1000 / 123", "sqrt 99", "gcd -60 48"])("round-trips %s", (line) => {
		const result = parseInstruction(line);
		expect(result.ok).toBe(true);
		if (result.ok) {
			expect(formatInstruction(result.value)).toBe(line);
		}
	});
});
