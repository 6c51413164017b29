export type Expr = Num | Neg | Binary;

export interface Num {
    readonly type: 'num';
    readonly value: number;
}

export interface Neg {
    readonly type: 'neg';
    readonly arg: Expr;
}

export interface Binary {
    readonly type: 'bin';
    readonly operation: '+' | '-' | '*' | '/';
    readonly left: Expr;
    readonly right: Expr;
}

export function num(value: number): Num {
    return { type: 'num', value };
}

export function neg(arg: Expr): Neg {
    return { type: 'neg', arg };
}

export function bin(operation: Binary['operation'], left: Expr, right: Expr): Binary {
    return { type: 'bin', operation, left, right };
}
