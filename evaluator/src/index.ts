export { calculate } from "./calculate";
export { evaluate, evaluateBatch, EvaluationOutcome } from "./evaluate";
export { serializeOutcome, SerializedOutcome } from "./outcome";

export { Expr, parseExpr, printExpr } from "../../ast";
export {
    Expression, ParseOptions, ComputeError, ComputeResult, ErrorKind, ComputeFailure, describeError
} from "../../arith";
