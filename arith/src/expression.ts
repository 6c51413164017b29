/*
    A non-empty expression string, kept verbatim.

    Expression.create() returns undefined for empty or whitespace-only input;
    callers building a batch use that to skip blank lines. The top-level
    evaluate() reports the same input as an EmptyExpression error instead.
*/
export class Expression
{
    private constructor(public readonly text: string) {}

    static create(raw: string): Expression | undefined
    {
        if (raw.trim().length === 0) {
            return undefined;
        }
        return new Expression(raw);
    }

    // builds expressions for a batch, dropping the blank ones
    static collect(raws: Iterable<string>): Expression[]
    {
        const expressions: Expression[] = [];
        for (const raw of raws) {
            const expression = Expression.create(raw);
            if (expression) {
                expressions.push(expression);
            }
        }
        return expressions;
    }

    toString(): string
    {
        return this.text;
    }
}
