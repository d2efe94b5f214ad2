/**
 * Decimal text codec for signed magnitudes.
 *
 * Grammar: `['+' | '-'] digit+`. No whitespace, no grouping separators.
 */

import { InvalidFormatError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import { type Digits, isZeroDigits, trimDigits } from "./digits.js";

/** A sign and a trimmed magnitude, before it is wrapped in a BigInteger. */
export interface SignedDigits {
	readonly digits: Digits;
	readonly nonNegative: boolean;
}

const ZERO_CODE = 48;
const NINE_CODE = 57;

/** Parse decimal text into canonical sign and digits; zero is always non-negative. */
export function decodeDecimal(text: string): Result<SignedDigits, InvalidFormatError> {
	if (text.length === 0) {
		return err(new InvalidFormatError("Invalid integer text: empty string", { input: text }));
	}

	const first = text.charAt(0);
	const hasSign = first === "+" || first === "-";
	const start = hasSign ? 1 : 0;
	if (start === text.length) {
		return err(
			new InvalidFormatError(`Invalid integer text: sign "${first}" without digits`, {
				input: text,
			}),
		);
	}

	const digits: Digits = [];
	for (let i = start; i < text.length; i++) {
		const code = text.charCodeAt(i);
		if (code < ZERO_CODE || code > NINE_CODE) {
			return err(
				new InvalidFormatError(
					`Invalid integer text: unexpected character "${text.charAt(i)}" at index ${i}`,
					{ input: text, index: i },
				),
			);
		}
		digits.push(code - ZERO_CODE);
	}
	// Stored least-significant first.
	trimDigits(digits.reverse());

	return ok({ digits, nonNegative: first !== "-" || isZeroDigits(digits) });
}

/** Canonical rendering: `"0"` for zero, otherwise optional `-` and digits most-significant first. */
export function encodeDecimal(digits: readonly number[], nonNegative: boolean): string {
	if (isZeroDigits(digits)) return "0";
	let out = nonNegative ? "" : "-";
	for (let i = digits.length - 1; i >= 0; i--) {
		out += String(digits[i] ?? 0);
	}
	return out;
}
