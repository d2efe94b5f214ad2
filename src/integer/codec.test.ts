import { describe, expect, it } from "vitest";
import { InvalidFormatError } from "../shared/errors.js";
import { decodeDecimal, encodeDecimal } from "./codec.js";

describe("decimal codec", () => {
	describe("decodeDecimal", () => {
		it("stores digits least-significant first", () => {
			const result = decodeDecimal("123");
			expect(result).toEqual({ ok: true, value: { digits: [3, 2, 1], nonNegative: true } });
		});

		it("accepts an explicit plus sign", () => {
			const result = decodeDecimal("+100");
			expect(result).toEqual({ ok: true, value: { digits: [0, 0, 1], nonNegative: true } });
		});

		it("trims leading zeros", () => {
			const result = decodeDecimal("-007");
			expect(result).toEqual({ ok: true, value: { digits: [7], nonNegative: false } });
		});

		it("normalizes negative zero", () => {
			const result = decodeDecimal("-000");
			expect(result).toEqual({ ok: true, value: { digits: [0], nonNegative: true } });
		});

		it("rejects the empty string", () => {
			const result = decodeDecimal("");
			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error).toBeInstanceOf(InvalidFormatError);
				expect(result.error.message).toContain("empty string");
			}
		});

		it.each(["+", "-"])("rejects a bare %s sign", (sign) => {
			const result = decodeDecimal(sign);
			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.message).toContain("without digits");
			}
		});

		it("reports the index of the offending character", () => {
			const result = decodeDecimal("12a3");
			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.context).toEqual({ input: "12a3", index: 2 });
			}
		});

		it("reports the leftmost offending character when there are several", () => {
			const result = decodeDecimal("-1x2y3");
			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.message).toBe('Invalid integer text: unexpected character "x" at index 2');
				expect(result.error.context).toEqual({ input: "-1x2y3", index: 2 });
			}
		});

		it.each([" 12", "12 ", "1,000", "1.5", "--1", "+-1", "0x10"])("rejects %j", (text) => {
			expect(decodeDecimal(text).ok).toBe(false);
		});
	});

	describe("encodeDecimal", () => {
		it("renders zero without a sign", () => {
			expect(encodeDecimal([0], false)).toBe("0");
		});

		it("renders most-significant digit first", () => {
			expect(encodeDecimal([1, 2, 3], true)).toBe("321");
			expect(encodeDecimal([1, 2, 3], false)).toBe("-321");
		});
	});
});
