import { bench, describe } from "vitest";
import { BigInteger } from "../src/integer/big-integer.js";

describe("arithmetic", () => {
	const a = BigInteger.parse("7".repeat(200));
	const b = BigInteger.parse("3".repeat(200));
	const divisor = BigInteger.parse("123456789".repeat(5));

	bench("add 200-digit operands 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			a.add(b);
		}
	});

	bench("multiply 200-digit operands", () => {
		a.mul(b);
	});

	bench("divRem 400 digits by 45 digits", () => {
		a.mul(b).divRem(divisor);
	});
});
