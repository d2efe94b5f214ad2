/**
 * Calculator Demo — arithmetic on integers far beyond the 64-bit range.
 *
 * Run: npx tsx examples/calculator-demo.ts
 */

import {
	BigInteger,
	Calculator,
	createLogger,
	isDivisionByZeroError,
	isqrt,
	resolveConfig,
} from "../src/index.js";

const config = resolveConfig();
const logger = createLogger({ level: config.logLevel });

const a = BigInteger.parse("12345678901234567890");
const b = BigInteger.from(54321);
console.log(`a = ${a}`);
console.log(`b = ${b}`);

console.log(`\na + b = ${a.add(b)}`);
console.log(`a * b = ${a.mul(b)}`);
console.log(`sqrt(a) = ${isqrt(a)}`);

const { quotient, remainder } = a.divRem(b);
console.log(`a / b = ${quotient} remainder ${remainder}`);

try {
	a.div(0);
} catch (error) {
	if (!isDivisionByZeroError(error)) throw error;
	console.log(`a / 0 -> ${error.code}: ${error.message}`);
}

console.log("\nIn-place updates:");
const counter = BigInteger.from(10);
const before = counter.postIncrement();
console.log(`counter++ returned ${before}, counter is now ${counter}`);
counter.subAssign(5);
console.log(`counter -= 5 gives ${counter}`);

console.log("\nCalculator script:");
const calculator = new Calculator(config, logger);
const script = `
# operands wider than 64 bits
99999999999999999999 * 99999999999999999999
99999999999999999999 / 7
sqrt 98765432109876543210
gcd 1071 462
5 % 0
`;
for (const result of calculator.runScript(script)) {
	console.log(result.ok ? result.value.toString() : `error ${result.error.code}`);
}
