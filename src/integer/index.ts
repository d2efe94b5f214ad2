export { BigInteger, type BigIntegerLike, type DivRem } from "./big-integer.js";
export type { Ordering } from "./digits.js";
export { isqrt, gcd } from "./number-theory.js";
