/**
 * Magnitude kernel — unsigned arithmetic on decimal digit vectors.
 *
 * A magnitude is an array of digits 0-9, least-significant first, never
 * empty, with no most-significant zeros except the single-digit zero `[0]`.
 * Every function here takes trimmed inputs, never mutates them, and returns
 * a freshly allocated trimmed result.
 */

export type Digits = number[];

/** Three-way comparison result. */
export type Ordering = -1 | 0 | 1;

const BASE = 10;

/** Drop most-significant zeros in place, keeping at least one digit. */
export function trimDigits(digits: Digits): Digits {
	while (digits.length > 1 && digits[digits.length - 1] === 0) {
		digits.pop();
	}
	if (digits.length === 0) digits.push(0);
	return digits;
}

export function isZeroDigits(digits: readonly number[]): boolean {
	return digits.length === 1 && digits[0] === 0;
}

/** Digits of `10^exponent`. */
export function powerOfTen(exponent: number): Digits {
	const digits: Digits = new Array<number>(exponent + 1).fill(0);
	digits[exponent] = 1;
	return digits;
}

/** Compare two magnitudes: longer is larger, then most-significant digit first. */
export function compareDigits(a: readonly number[], b: readonly number[]): Ordering {
	if (a.length !== b.length) return a.length < b.length ? -1 : 1;
	for (let i = a.length - 1; i >= 0; i--) {
		const da = a[i] ?? 0;
		const db = b[i] ?? 0;
		if (da !== db) return da < db ? -1 : 1;
	}
	return 0;
}

// ── Additive ─────────────────────────────────────────────────────────

export function addDigits(a: readonly number[], b: readonly number[]): Digits {
	const result: Digits = [];
	let carry = 0;
	for (let i = 0; i < a.length || i < b.length || carry > 0; i++) {
		const sum = (a[i] ?? 0) + (b[i] ?? 0) + carry;
		result.push(sum % BASE);
		carry = sum >= BASE ? 1 : 0;
	}
	return trimDigits(result);
}

/** `a - b` for `a >= b`; the caller orders the operands. */
export function subtractDigits(a: readonly number[], b: readonly number[]): Digits {
	const result: Digits = [];
	let borrow = 0;
	for (let i = 0; i < a.length; i++) {
		let diff = (a[i] ?? 0) - (b[i] ?? 0) - borrow;
		if (diff < 0) {
			diff += BASE;
			borrow = 1;
		} else {
			borrow = 0;
		}
		result.push(diff);
	}
	return trimDigits(result);
}

// ── Multiplicative ───────────────────────────────────────────────────

/**
 * Schoolbook product. Pairwise digit products accumulate into slot `i + j`
 * (slots may exceed 9 transiently), then one carry pass normalizes.
 */
export function multiplyDigits(a: readonly number[], b: readonly number[]): Digits {
	if (isZeroDigits(a) || isZeroDigits(b)) return [0];

	const slots: Digits = new Array<number>(a.length + b.length).fill(0);
	for (let i = 0; i < a.length; i++) {
		const da = a[i] ?? 0;
		if (da === 0) continue;
		for (let j = 0; j < b.length; j++) {
			slots[i + j] = (slots[i + j] ?? 0) + da * (b[j] ?? 0);
		}
	}

	let carry = 0;
	for (let k = 0; k < slots.length; k++) {
		const value = (slots[k] ?? 0) + carry;
		slots[k] = value % BASE;
		carry = Math.floor(value / BASE);
	}
	while (carry > 0) {
		slots.push(carry % BASE);
		carry = Math.floor(carry / BASE);
	}
	return trimDigits(slots);
}

// ── Division ─────────────────────────────────────────────────────────

export interface DigitsDivRem {
	readonly quotient: Digits;
	readonly remainder: Digits;
}

/** `r * 10 + digit` on a trimmed magnitude. */
function shiftIn(remainder: Digits, digit: number): Digits {
	return isZeroDigits(remainder) ? [digit] : [digit, ...remainder];
}

/** Largest d in [0, 9] with `multiples[d] <= target`, by binary search over the table. */
function quotientDigit(multiples: readonly Digits[], target: readonly number[]): number {
	let lo = 0;
	let hi = BASE - 1;
	while (lo < hi) {
		const mid = (lo + hi + 1) >> 1;
		if (compareDigits(multiples[mid] ?? [0], target) <= 0) {
			lo = mid;
		} else {
			hi = mid - 1;
		}
	}
	return lo;
}

/**
 * Long division of magnitudes, one dividend digit at a time from the most
 * significant end. Quotient digits come out most-significant first and are
 * reversed into storage order at the end. The divisor must be non-zero.
 */
export function divRemDigits(dividend: readonly number[], divisor: readonly number[]): DigitsDivRem {
	if (compareDigits(dividend, divisor) < 0) {
		return { quotient: [0], remainder: [...dividend] };
	}

	const multiples: Digits[] = [[0]];
	for (let k = 1; k < BASE; k++) {
		multiples.push(addDigits(multiples[k - 1] ?? [0], divisor));
	}

	const emitted: Digits = [];
	let remainder: Digits = [0];
	for (let i = dividend.length - 1; i >= 0; i--) {
		remainder = shiftIn(remainder, dividend[i] ?? 0);
		const digit = quotientDigit(multiples, remainder);
		if (digit > 0) {
			remainder = subtractDigits(remainder, multiples[digit] ?? [0]);
		}
		emitted.push(digit);
	}

	return { quotient: trimDigits(emitted.reverse()), remainder };
}
