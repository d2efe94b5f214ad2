import { bench, describe } from "vitest";
import { BigInteger } from "../src/integer/big-integer.js";
import { gcd, isqrt } from "../src/integer/number-theory.js";

describe("number theory", () => {
	const square = BigInteger.parse("98765432109876543210".repeat(5));

	bench("isqrt of a 100-digit value", () => {
		isqrt(square);
	});

	bench("gcd of consecutive 30-digit values", () => {
		const x = BigInteger.parse("832040".repeat(5));
		gcd(x, x.add(1));
	});
});
