import { Expr, Binary } from "./ast";

function getOperationPriority(op: Binary['operation']): number {
    switch (op) {
        case '+': return 1;
        case '-': return 1;
        case '*': return 2;
        case '/': return 2;
    }
}

// does the child need parentheses to keep its place in the tree?
function needParens(child: Expr, parentOperation: Binary['operation'], isRightChild: boolean): boolean {
    if (child.type !== 'bin') return false;

    const childPriority = getOperationPriority(child.operation);
    const parentPriority = getOperationPriority(parentOperation);

    if (childPriority > parentPriority) return false;
    if (childPriority < parentPriority) return true;

    // same level: operators fold from the left, so only a right child needs them.
    // this holds for + and * too, since floating point addition is not associative
    return isRightChild;
}

/*
    Literals are printed in plain decimal form, since the default grammar has no exponent.
    Number.prototype.toString switches to exponent form from 1e21 up and below 1e-6.
*/
export function printNumber(value: number): string {
    if (Number.isNaN(value)) return "NaN";
    if (!Number.isFinite(value)) {
        // the shortest literal that still overflows to Infinity
        return (value < 0 ? "-" : "") + "1" + "0".repeat(309);
    }

    const text = value.toString();
    const exponentForm = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
    if (!exponentForm) return text;

    // move the point of the shortest round-trip digits instead of rounding them again
    const [, sign, lead, fraction = "", exp] = exponentForm;
    const digits = lead + fraction;
    const exponent = Number(exp);
    if (exponent >= 0) {
        return sign + digits + "0".repeat(Math.max(0, exponent - fraction.length));
    }
    return sign + "0." + "0".repeat(-exponent - 1) + digits;
}

function printExprRecursive(e: Expr, parentOperation?: Binary['operation'], isRightChild: boolean = false): string {
    switch (e.type) {
        case "num":
            return printNumber(e.value);
        case "neg": {
            const arg = printExprRecursive(e.arg);
            return e.arg.type === 'bin' ? `-(${arg})` : `-${arg}`;
        }
        case "bin": {
            const leftStr = printExprRecursive(e.left, e.operation, false);
            const rightStr = printExprRecursive(e.right, e.operation, true);
            const str = `${leftStr} ${e.operation} ${rightStr}`;

            if (parentOperation && needParens(e, parentOperation, isRightChild)) {
                return `(${str})`;
            }

            return str;
        }
    }
}

export function printExpr(e: Expr): string {
    return printExprRecursive(e);
}
