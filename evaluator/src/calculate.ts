import { Expr } from "../../ast";
import { ComputeResult, divisionByZero, failure, invalidStructure, success } from "../../arith";

function combine(operation: '+' | '-' | '*', left: number, right: number): number {
    switch (operation) {
        case '+': return left + right;
        case '-': return left - right;
        case '*': return left * right;
    }
}

/*
    Reduces a tree to a number. The first failing subtree fails the whole expression.
    Only an exact zero divisor is an error (0 and -0 alike); Infinity and NaN
    coming from huge literals pass through as ordinary values.
*/
export function calculate(e: Expr): ComputeResult<number>
{
    switch (e.type) {
        case 'num':
            return success(e.value);
        case 'neg': {
            const arg = calculate(e.arg);
            if (!arg.ok) return arg;
            return success(-arg.value);
        }
        case 'bin': {
            if (e.operation === '/') {
                // the divisor is checked before the quotient is ever computed
                const divisor = calculate(e.right);
                if (!divisor.ok) return divisor;
                if (divisor.value === 0) return failure(divisionByZero());

                const dividend = calculate(e.left);
                if (!dividend.ok) return dividend;
                return success(dividend.value / divisor.value);
            }

            const left = calculate(e.left);
            if (!left.ok) return left;
            const right = calculate(e.right);
            if (!right.ok) return right;
            return success(combine(e.operation, left.value, right.value));
        }
        default:
            return unknownNode(e);
    }
}

// unreachable for trees the parser builds
function unknownNode(e: never): ComputeResult<number>
{
    const detail = JSON.stringify(e);
    console.error(`calculate: unexpected node ${detail}`);
    return failure(invalidStructure(`unexpected node ${detail}`));
}
