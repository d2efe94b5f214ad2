import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { DomainError } from "../shared/errors.js";
import { BigInteger } from "./big-integer.js";
import { gcd, isqrt } from "./number-theory.js";

describe("isqrt", () => {
	it.each([
		["0", "0"],
		["1", "1"],
		["3", "1"],
		["4", "2"],
		["99", "9"],
		["100", "10"],
		["12345678987654321", "111111111"],
		["98765432109876543210", "9938079900"],
		["10000000000000000000000000000000000000000", "100000000000000000000"],
	])("isqrt(%s) = %s", (n, expected) => {
		expect(isqrt(n).toString()).toBe(expected);
	});

	it("throws DomainError for a negative input", () => {
		expect(() => isqrt(-1)).toThrow(DomainError);
		expect(() => isqrt(BigInteger.parse("-98765432109876543210"))).toThrow(
			"isqrt: square root of a negative number",
		);
	});

	it("does not modify its argument", () => {
		const n = BigInteger.parse("99");
		isqrt(n);
		expect(n.toString()).toBe("99");
	});

	it("brackets n between consecutive squares", () => {
		fc.assert(
			fc.property(fc.bigUintN(200), (n) => {
				const r = isqrt(BigInteger.fromBigInt(n)).toBigInt();
				expect(r * r <= n).toBe(true);
				expect(n < (r + 1n) * (r + 1n)).toBe(true);
			}),
			{ numRuns: 200 },
		);
	});
});

describe("gcd", () => {
	it.each([
		[123, 0, "123"],
		[0, 123, "123"],
		[0, 0, "0"],
		[60, 48, "12"],
		[48, 60, "12"],
		[17, 13, "1"],
		[100, 20, "20"],
		[-60, 48, "12"],
		[60, -48, "12"],
		[-60, -48, "12"],
	])("gcd(%i, %i) = %s", (a, b, expected) => {
		expect(gcd(a, b).toString()).toBe(expected);
	});

	it("recovers a large common factor", () => {
		const g = BigInteger.parse("1000000007");
		expect(gcd(g.mul(17), g.mul(19)).eq(g)).toBe(true);
	});

	it("is non-negative and divides both arguments", () => {
		const anyInt = fc.bigInt({ min: -(10n ** 30n), max: 10n ** 30n });
		fc.assert(
			fc.property(anyInt, anyInt, (fa, fb) => {
				const a = BigInteger.fromBigInt(fa);
				const b = BigInteger.fromBigInt(fb);
				const g = gcd(a, b);
				expect(g.isNegative()).toBe(false);
				if (a.isZero() && b.isZero()) {
					expect(g.isZero()).toBe(true);
				} else {
					expect(a.rem(g).isZero()).toBe(true);
					expect(b.rem(g).isZero()).toBe(true);
				}
			}),
			{ numRuns: 300 },
		);
	});
});
