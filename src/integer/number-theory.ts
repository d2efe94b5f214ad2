import { DomainError } from "../shared/errors.js";
import { BigInteger } from "./big-integer.js";
import type { BigIntegerLike } from "./big-integer.js";

/**
 * Floor of the square root, by Newton iteration from above.
 *
 * The start value `10^ceil(d / 2)` for a d-digit input is never below the
 * root, so the iterates decrease monotonically until they stop decreasing.
 *
 * @throws DomainError for a negative input
 */
export function isqrt(value: BigIntegerLike): BigInteger {
	const n = BigInteger.from(value);
	if (n.isNegative()) {
		throw new DomainError("isqrt: square root of a negative number", {
			digitCount: n.digitCount(),
		});
	}
	if (n.isZero()) return BigInteger.zero();

	let x = BigInteger.powerOfTen(Math.ceil(n.digitCount() / 2));
	while (true) {
		const next = x.add(n.div(x)).div(2);
		if (next.gte(x)) break;
		x = next;
	}

	// The integer fixed point can sit one above the floor root.
	if (x.mul(x).gt(n)) x.decrement();
	return x;
}

/** Greatest common divisor of the absolute values; `gcd(0, 0)` is zero. */
export function gcd(a: BigIntegerLike, b: BigIntegerLike): BigInteger {
	let x = BigInteger.from(a).abs();
	let y = BigInteger.from(b).abs();
	while (!y.isZero()) {
		const r = x.rem(y);
		x = y;
		y = r;
	}
	return x;
}
