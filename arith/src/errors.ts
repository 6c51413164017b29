export type ComputeError =
    | EmptyExpressionError
    | ParseError
    | InvalidNumberError
    | DivisionByZeroError
    | InvalidStructureError;

export type ErrorKind = ComputeError['kind'];

// input was empty or whitespace only; detected before matching
export interface EmptyExpressionError {
    kind: 'EmptyExpression';
    message: string;
}

// input does not conform to the grammar
export interface ParseError {
    kind: 'ParseError';
    message: string;
    position: number; // zero-based offset of the rightmost failure
    line: number;
    column: number;
    expected: string;
}

// a number-shaped literal failed to convert
export interface InvalidNumberError {
    kind: 'InvalidNumber';
    message: string;
    literal: string;
}

export interface DivisionByZeroError {
    kind: 'DivisionByZero';
    message: string;
}

// the tree holds a node the evaluator does not know; a parser defect, never a user input problem
export interface InvalidStructureError {
    kind: 'InvalidStructure';
    message: string;
}

export type ComputeResult<T> =
    | { ok: true; value: T }
    | { ok: false; error: ComputeError };

export function success<T>(value: T): ComputeResult<T>
{
    return { ok: true, value };
}

export function failure<T>(error: ComputeError): ComputeResult<T>
{
    return { ok: false, error };
}

export function emptyExpression(): EmptyExpressionError
{
    return { kind: 'EmptyExpression', message: "expression is empty" };
}

export function invalidNumber(literal: string): InvalidNumberError
{
    return { kind: 'InvalidNumber', message: `invalid number literal '${literal}'`, literal };
}

export function divisionByZero(): DivisionByZeroError
{
    return { kind: 'DivisionByZero', message: "division by zero" };
}

export function invalidStructure(detail: string): InvalidStructureError
{
    return { kind: 'InvalidStructure', message: `invalid expression structure: ${detail}` };
}

/*
    ParseError is built from the offset where the grammar stopped matching.
    line and column are 1-based, as in the messages ohm prints.
*/
export function parseError(source: string, position: number, expected: string, message: string): ParseError
{
    let line = 1;
    let column = 1;
    for (let i = 0; i < position && i < source.length; i++) {
        if (source[i] === '\n') {
            line++;
            column = 1;
        } else {
            column++;
        }
    }

    return { kind: 'ParseError', message, position, line, column, expected };
}

export function describeError(error: ComputeError): string
{
    return `${error.kind}: ${error.message}`;
}

// used to unwind out of ohm semantic actions; the parser turns it back into a returned value
export class ComputeFailure extends Error
{
    constructor(public readonly error: ComputeError) {
        super(error.message);
        this.name = "ComputeFailure";
    }
}
