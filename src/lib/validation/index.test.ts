import { describe, expect, it } from "vitest";
import { BigIntegerError, ErrorKind } from "../../shared/errors.js";
import { isErr, isOk } from "../../shared/result.js";
import { ValidationError, formatIssues, isValidationError, validate, z } from "./index.js";

describe("validation wrapper", () => {
	describe("validate()", () => {
		it("returns ok(data) for valid input", () => {
			const result = validate(z.string(), "hello");

			expect(isOk(result)).toBe(true);
			if (result.ok) {
				expect(result.value).toBe("hello");
			}
		});

		it("returns err(ValidationError) for invalid input", () => {
			const result = validate(z.number(), "not a number");

			expect(isErr(result)).toBe(true);
			if (!result.ok) {
				expect(result.error).toBeInstanceOf(ValidationError);
				expect(result.error).toBeInstanceOf(BigIntegerError);
				expect(result.error.kind).toBe(ErrorKind.InvalidConfig);
				expect(result.error.code).toBe("VALIDATION_FAILED");
			}
		});

		it("reports the path of every failing field", () => {
			const schema = z.object({
				limits: z.object({
					digits: z.number().int(),
					level: z.enum(["info", "warn"]),
				}),
			});
			const result = validate(schema, { limits: { digits: 1.5, level: "loud" } });

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.issues.map((i) => i.path)).toEqual([
					["limits", "digits"],
					["limits", "level"],
				]);
				expect(result.error.context).toEqual({ issueCount: 2 });
			}
		});

		it("strips unknown keys from objects", () => {
			const result = validate(z.object({ a: z.number() }), { a: 1, b: 2 });
			expect(result).toEqual({ ok: true, value: { a: 1 } });
		});
	});

	describe("formatIssues", () => {
		it("joins path and message", () => {
			expect(
				formatIssues([
					{ path: ["operands", 0], message: "too long" },
					{ path: [], message: "root problem" },
				]),
			).toBe("operands.0: too long; root problem");
		});
	});

	it("takes the error kind from the caller", () => {
		const e = new ValidationError("too long", [], ErrorKind.InvalidInput);
		expect(e.kind).toBe("invalid_input");
		expect(e.toJSON()["kind"]).toBe("invalid_input");
	});

	it("isValidationError recognises only ValidationError", () => {
		expect(isValidationError(new ValidationError("x", []))).toBe(true);
		expect(isValidationError(new Error("x"))).toBe(false);
	});

	it("serializes issues in toJSON", () => {
		const e = new ValidationError("Validation failed", [{ path: ["a"], message: "bad" }]);
		expect(e.toJSON()["issues"]).toEqual([{ path: ["a"], message: "bad" }]);
	});
});
