/**
 * BigInteger — arbitrary-precision signed integer in base 10.
 *
 * Values behave like built-in integers with unbounded magnitude. Arithmetic
 * methods return new instances; the `*Assign`, `assign` and increment /
 * decrement methods mutate the receiver only, never an operand.
 *
 * Division truncates toward zero and the remainder takes the dividend's sign,
 * so `a == a.div(b).mul(b).add(a.rem(b))` always holds.
 *
 * @example
 * ```ts
 * const n = BigInteger.parse("12345678901234567890").add(54321);
 * n.toString(); // "12345678901234622211"
 * ```
 */

import { DivisionByZeroError, DomainError, InvalidFormatError, OverflowError } from "../shared/errors.js";
import { map, unwrap } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import { decodeDecimal, encodeDecimal } from "./codec.js";
import {
	type Digits,
	type Ordering,
	addDigits,
	compareDigits,
	divRemDigits,
	isZeroDigits,
	multiplyDigits,
	powerOfTen,
	subtractDigits,
} from "./digits.js";

/** Anything accepted where an integer operand is expected. */
export type BigIntegerLike = BigInteger | number | bigint | string;

/** Quotient and remainder of one truncating division. */
export interface DivRem {
	readonly quotient: BigInteger;
	readonly remainder: BigInteger;
}

const MAX_DESCRIBED_DIGITS = 40;

function reverseOrdering(ordering: Ordering): Ordering {
	if (ordering === 0) return 0;
	return ordering === 1 ? -1 : 1;
}

export class BigInteger {
	/** Magnitude, least-significant digit first. */
	private digits: Digits;
	/** True for zero and positive values. */
	private nonNegative: boolean;

	private constructor(digits: Digits, nonNegative: boolean) {
		this.digits = digits;
		this.nonNegative = nonNegative || isZeroDigits(digits);
	}

	// ── Factories ──────────────────────────────────────────────────

	static from(value: BigIntegerLike): BigInteger {
		if (value instanceof BigInteger) return value;
		switch (typeof value) {
			case "number":
				return BigInteger.fromNumber(value);
			case "bigint":
				return BigInteger.fromBigInt(value);
			default:
				return BigInteger.parse(value);
		}
	}

	/**
	 * @throws InvalidFormatError unless `value` is a safe integer
	 */
	static fromNumber(value: number): BigInteger {
		if (!Number.isSafeInteger(value)) {
			throw new InvalidFormatError(`BigInteger.fromNumber: ${value} is not a safe integer`, {
				value,
			});
		}
		const digits: Digits = [];
		let magnitude = Math.abs(value);
		do {
			digits.push(magnitude % 10);
			magnitude = Math.floor(magnitude / 10);
		} while (magnitude > 0);
		return new BigInteger(digits, value >= 0);
	}

	/** Exact for any bigint, the 64-bit minimum included. */
	static fromBigInt(value: bigint): BigInteger {
		const digits: Digits = [];
		let magnitude = value < 0n ? -value : value;
		do {
			digits.push(Number(magnitude % 10n));
			magnitude /= 10n;
		} while (magnitude > 0n);
		return new BigInteger(digits, value >= 0n);
	}

	/**
	 * Parses `['+' | '-'] digit+`. Leading zeros are accepted; `"-0"` is zero.
	 * @throws InvalidFormatError for empty text, a bare sign, or any other character
	 */
	static parse(text: string): BigInteger {
		return unwrap(BigInteger.tryParse(text));
	}

	static tryParse(text: string): Result<BigInteger, InvalidFormatError> {
		return map(decodeDecimal(text), (decoded) => new BigInteger(decoded.digits, decoded.nonNegative));
	}

	static zero(): BigInteger {
		return new BigInteger([0], true);
	}

	static one(): BigInteger {
		return new BigInteger([1], true);
	}

	/**
	 * `10^exponent`, built directly from its digits.
	 * @throws DomainError if `exponent` is not a non-negative safe integer
	 */
	static powerOfTen(exponent: number): BigInteger {
		if (!Number.isSafeInteger(exponent) || exponent < 0) {
			throw new DomainError(`BigInteger.powerOfTen: invalid exponent ${exponent}`, { exponent });
		}
		return new BigInteger(powerOfTen(exponent), true);
	}

	// ── Bounds for narrow conversion ───────────────────────────────

	private static readonly INT64_MIN = BigInteger.fromBigInt(-(2n ** 63n));
	private static readonly INT64_MAX = BigInteger.fromBigInt(2n ** 63n - 1n);
	private static readonly SAFE_MIN = BigInteger.fromNumber(Number.MIN_SAFE_INTEGER);
	private static readonly SAFE_MAX = BigInteger.fromNumber(Number.MAX_SAFE_INTEGER);

	// ── Arithmetic (immutable) ─────────────────────────────────────

	neg(): BigInteger {
		return new BigInteger([...this.digits], !this.nonNegative);
	}

	abs(): BigInteger {
		return new BigInteger([...this.digits], true);
	}

	add(other: BigIntegerLike): BigInteger {
		const rhs = BigInteger.from(other);
		return this.signedSum(rhs.digits, rhs.nonNegative);
	}

	sub(other: BigIntegerLike): BigInteger {
		const rhs = BigInteger.from(other);
		return this.signedSum(rhs.digits, !rhs.nonNegative);
	}

	/** `this + (±digits)`; a zero magnitude may carry either sign here. */
	private signedSum(digits: Digits, nonNegative: boolean): BigInteger {
		if (this.nonNegative === nonNegative) {
			return new BigInteger(addDigits(this.digits, digits), nonNegative);
		}
		const order = compareDigits(this.digits, digits);
		if (order === 0) return BigInteger.zero();
		return order > 0
			? new BigInteger(subtractDigits(this.digits, digits), this.nonNegative)
			: new BigInteger(subtractDigits(digits, this.digits), nonNegative);
	}

	mul(other: BigIntegerLike): BigInteger {
		const rhs = BigInteger.from(other);
		return new BigInteger(
			multiplyDigits(this.digits, rhs.digits),
			this.nonNegative === rhs.nonNegative,
		);
	}

	/**
	 * Quotient and remainder from a single long division.
	 * @throws DivisionByZeroError if `divisor` is zero
	 */
	divRem(divisor: BigIntegerLike): DivRem {
		return this.divide(divisor, "divRem");
	}

	/** Truncating quotient. */
	div(divisor: BigIntegerLike): BigInteger {
		return this.divide(divisor, "div").quotient;
	}

	/** Remainder with the dividend's sign. */
	rem(divisor: BigIntegerLike): BigInteger {
		return this.divide(divisor, "rem").remainder;
	}

	private divide(divisor: BigIntegerLike, operation: string): DivRem {
		const rhs = BigInteger.from(divisor);
		if (rhs.isZero()) {
			throw new DivisionByZeroError(`BigInteger.${operation}: division by zero`, { operation });
		}
		const { quotient, remainder } = divRemDigits(this.digits, rhs.digits);
		return {
			quotient: new BigInteger(quotient, this.nonNegative === rhs.nonNegative),
			remainder: new BigInteger(remainder, this.nonNegative),
		};
	}

	// ── In-place ───────────────────────────────────────────────────

	/** Replace this value with a copy of `value`. */
	assign(value: BigIntegerLike): this {
		const source = BigInteger.from(value);
		return this.replaceWith([...source.digits], source.nonNegative);
	}

	addAssign(other: BigIntegerLike): this {
		const result = this.add(other);
		return this.replaceWith(result.digits, result.nonNegative);
	}

	subAssign(other: BigIntegerLike): this {
		const result = this.sub(other);
		return this.replaceWith(result.digits, result.nonNegative);
	}

	mulAssign(other: BigIntegerLike): this {
		const result = this.mul(other);
		return this.replaceWith(result.digits, result.nonNegative);
	}

	divAssign(divisor: BigIntegerLike): this {
		const { quotient } = this.divide(divisor, "divAssign");
		return this.replaceWith(quotient.digits, quotient.nonNegative);
	}

	remAssign(divisor: BigIntegerLike): this {
		const { remainder } = this.divide(divisor, "remAssign");
		return this.replaceWith(remainder.digits, remainder.nonNegative);
	}

	/** Prefix increment: adds one and returns this. */
	increment(): this {
		return this.addAssign(1);
	}

	/** Prefix decrement: subtracts one and returns this. */
	decrement(): this {
		return this.subAssign(1);
	}

	/** Postfix increment: adds one and returns the previous value. */
	postIncrement(): BigInteger {
		const previous = this.clone();
		this.addAssign(1);
		return previous;
	}

	/** Postfix decrement: subtracts one and returns the previous value. */
	postDecrement(): BigInteger {
		const previous = this.clone();
		this.subAssign(1);
		return previous;
	}

	private replaceWith(digits: Digits, nonNegative: boolean): this {
		this.digits = digits;
		this.nonNegative = nonNegative || isZeroDigits(digits);
		return this;
	}

	// ── Comparison ─────────────────────────────────────────────────

	compare(other: BigIntegerLike): Ordering {
		const rhs = BigInteger.from(other);
		if (this.isZero() && rhs.isZero()) return 0;
		if (this.nonNegative !== rhs.nonNegative) return this.nonNegative ? 1 : -1;
		const magnitude = compareDigits(this.digits, rhs.digits);
		return this.nonNegative ? magnitude : reverseOrdering(magnitude);
	}

	eq(other: BigIntegerLike): boolean {
		return this.compare(other) === 0;
	}

	neq(other: BigIntegerLike): boolean {
		return this.compare(other) !== 0;
	}

	lt(other: BigIntegerLike): boolean {
		return this.compare(other) < 0;
	}

	lte(other: BigIntegerLike): boolean {
		return this.compare(other) <= 0;
	}

	gt(other: BigIntegerLike): boolean {
		return this.compare(other) > 0;
	}

	gte(other: BigIntegerLike): boolean {
		return this.compare(other) >= 0;
	}

	/** Comparator usable with `Array.prototype.sort`. */
	static compare(a: BigIntegerLike, b: BigIntegerLike): Ordering {
		return BigInteger.from(a).compare(b);
	}

	static min(a: BigInteger, b: BigInteger): BigInteger {
		return a.lte(b) ? a : b;
	}

	static max(a: BigInteger, b: BigInteger): BigInteger {
		return a.gte(b) ? a : b;
	}

	// ── Queries ────────────────────────────────────────────────────

	/** Number of decimal digits ignoring sign; zero has one. */
	digitCount(): number {
		return this.digits.length;
	}

	isZero(): boolean {
		return isZeroDigits(this.digits);
	}

	isEven(): boolean {
		return (this.digits[0] ?? 0) % 2 === 0;
	}

	isNegative(): boolean {
		return !this.nonNegative;
	}

	isPositive(): boolean {
		return this.nonNegative && !this.isZero();
	}

	sign(): Ordering {
		if (this.isZero()) return 0;
		return this.nonNegative ? 1 : -1;
	}

	// ── Conversion ─────────────────────────────────────────────────

	toString(): string {
		return encodeDecimal(this.digits, this.nonNegative);
	}

	toJSON(): string {
		return this.toString();
	}

	/** Lossless conversion to a native bigint. */
	toBigInt(): bigint {
		let acc = 0n;
		for (let i = this.digits.length - 1; i >= 0; i--) {
			acc = acc * 10n + BigInt(this.digits[i] ?? 0);
		}
		return this.nonNegative ? acc : -acc;
	}

	/**
	 * Narrow conversion to a signed 64-bit value.
	 * @throws OverflowError outside [-2^63, 2^63 - 1]
	 */
	toInt64(): bigint {
		this.assertWithin(BigInteger.INT64_MIN, BigInteger.INT64_MAX, "toInt64");
		// Accumulating toward the sign keeps every partial value inside the range.
		const step = this.nonNegative ? 1n : -1n;
		let acc = 0n;
		for (let i = this.digits.length - 1; i >= 0; i--) {
			acc = acc * 10n + step * BigInt(this.digits[i] ?? 0);
		}
		return acc;
	}

	/**
	 * Conversion to a safe-integer number.
	 * @throws OverflowError outside [Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER]
	 */
	toNumber(): number {
		this.assertWithin(BigInteger.SAFE_MIN, BigInteger.SAFE_MAX, "toNumber");
		const step = this.nonNegative ? 1 : -1;
		let acc = 0;
		for (let i = this.digits.length - 1; i >= 0; i--) {
			acc = acc * 10 + step * (this.digits[i] ?? 0);
		}
		return acc;
	}

	clone(): BigInteger {
		return new BigInteger([...this.digits], this.nonNegative);
	}

	private assertWithin(min: BigInteger, max: BigInteger, operation: string): void {
		if (this.lt(min) || this.gt(max)) {
			throw new OverflowError(
				`BigInteger.${operation}: ${this.describe()} is outside [${min.toString()}, ${max.toString()}]`,
				min.toString(),
				max.toString(),
				{ operation, digitCount: this.digitCount() },
			);
		}
	}

	private describe(): string {
		if (this.digits.length <= MAX_DESCRIBED_DIGITS) return this.toString();
		return `${this.nonNegative ? "" : "-"}${this.digits.length}-digit value`;
	}
}
