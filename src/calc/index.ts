export {
	Operator,
	type InfixOperator,
	type BinaryOperator,
	type Instruction,
	isInfixOperator,
	parseInstruction,
	formatInstruction,
} from "./instruction.js";
export { Calculator, type Evaluation } from "./calculator.js";
