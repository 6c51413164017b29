import { ErrorKind } from "../../arith";
import { EvaluationOutcome } from "./evaluate";

export type SerializedOutcome =
    | { expression: string; success: true; result: number }
    | { expression: string; success: false; error: { kind: ErrorKind; message: string } };

// plain record for wire and display collaborators; keeps the error kind and message
export function serializeOutcome(outcome: EvaluationOutcome): SerializedOutcome
{
    const { expression, result } = outcome;
    if (result.ok) {
        return { expression, success: true, result: result.value };
    }
    return {
        expression,
        success: false,
        error: { kind: result.error.kind, message: result.error.message },
    };
}
