import { parseExpr } from "../../ast";
import { ComputeResult, Expression, ParseOptions } from "../../arith";
import { calculate } from "./calculate";

/*
    Parses and evaluates one expression end to end.
    Blank input is reported as an EmptyExpression error, unlike Expression.create().
*/
export function evaluate(content: string | Expression, options?: ParseOptions): ComputeResult<number>
{
    const tree = parseExpr(content, options);
    if (!tree.ok) {
        return tree;
    }
    return calculate(tree.value);
}

export interface EvaluationOutcome {
    expression: string; // the text as given, not the parsed tree
    result: ComputeResult<number>;
}

// one outcome per input, in input order; a failing entry never stops the rest
export function evaluateBatch(expressions: Iterable<Expression | string>, options?: ParseOptions): EvaluationOutcome[]
{
    const outcomes: EvaluationOutcome[] = [];
    for (const expression of expressions) {
        const text = typeof expression === 'string' ? expression : expression.text;
        outcomes.push({ expression: text, result: evaluate(text, options) });
    }
    return outcomes;
}
