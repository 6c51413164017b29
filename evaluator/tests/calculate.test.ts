import { describe, test, expect, jest, afterEach } from '@jest/globals';
import { calculate } from '../src/calculate';
import { Expr, bin, neg, num } from '../../ast';

// a node no parser would build, as if read back from an older serialized tree
const powNode: Expr = JSON.parse('{"type":"pow","left":{"type":"num","value":2},"right":{"type":"num","value":3}}');

afterEach(() => {
    jest.restoreAllMocks();
});

describe("calculate", () => {
    test("number", () => {
        expect(calculate(num(4.5))).toEqual({ ok: true, value: 4.5 });
    });

    test("each operator", () => {
        expect(calculate(bin('+', num(7), num(2)))).toEqual({ ok: true, value: 9 });
        expect(calculate(bin('-', num(7), num(2)))).toEqual({ ok: true, value: 5 });
        expect(calculate(bin('*', num(7), num(2)))).toEqual({ ok: true, value: 14 });
        expect(calculate(bin('/', num(7), num(2)))).toEqual({ ok: true, value: 3.5 });
    });

    test("negation", () => {
        expect(calculate(neg(num(3)))).toEqual({ ok: true, value: -3 });
        expect(calculate(neg(neg(num(3))))).toEqual({ ok: true, value: 3 });
    });

    test("left-grouped and right-grouped subtraction differ", () => {
        expect(calculate(bin('-', bin('-', num(10), num(5)), num(2)))).toEqual({ ok: true, value: 3 });
        expect(calculate(bin('-', num(10), bin('-', num(5), num(2))))).toEqual({ ok: true, value: 7 });
    });

    test.each([0, -0])("dividing by %p is an error", (zero) => {
        expect(calculate(bin('/', num(1), num(zero)))).toEqual({
            ok: false,
            error: { kind: 'DivisionByZero', message: "division by zero" },
        });
    });

    test("a divisor that evaluates to zero is an error", () => {
        const tree = bin('/', num(5), bin('-', num(3), num(3)));
        expect(calculate(tree)).toEqual({
            ok: false,
            error: { kind: 'DivisionByZero', message: "division by zero" },
        });
    });

    test("a tiny divisor is not zero", () => {
        const result = calculate(bin('/', num(1), num(1e-300)));
        expect(result.ok).toBe(true);
        if (result.ok) expect(result.value).toBeGreaterThan(1e299);
    });

    test("zero divided by something is zero", () => {
        expect(calculate(bin('/', num(0), num(5)))).toEqual({ ok: true, value: 0 });
    });

    test("the divisor is checked before the dividend", () => {
        const logged = jest.spyOn(console, 'error').mockImplementation(() => {});
        const result = calculate(bin('/', powNode, num(0)));

        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.kind).toBe('DivisionByZero');
        expect(logged).not.toHaveBeenCalled();
    });

    test("a failing operand fails the whole expression", () => {
        const tree = bin('+', num(1), bin('*', num(2), bin('/', num(3), num(0))));
        const result = calculate(tree);
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.kind).toBe('DivisionByZero');
    });

    test("overflow propagates as Infinity", () => {
        expect(calculate(bin('*', num(1e308), num(10)))).toEqual({ ok: true, value: Infinity });
        expect(calculate(neg(num(Infinity)))).toEqual({ ok: true, value: -Infinity });
    });

    test("Infinity minus Infinity is NaN, not an error", () => {
        const result = calculate(bin('-', num(Infinity), num(Infinity)));
        expect(result.ok).toBe(true);
        if (result.ok) expect(Number.isNaN(result.value)).toBe(true);
    });

    test("an unknown node is reported as InvalidStructure", () => {
        const logged = jest.spyOn(console, 'error').mockImplementation(() => {});
        const result = calculate(bin('+', num(1), powNode));

        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.kind).toBe('InvalidStructure');
        expect(logged).toHaveBeenCalledTimes(1);
    });

    test("the same tree gives the same result every time", () => {
        const tree = bin('/', bin('+', num(0.1), num(0.2)), num(3));
        expect(calculate(tree)).toEqual(calculate(tree));
        expect(calculate(bin('/', num(1), num(0)))).toEqual(calculate(bin('/', num(1), num(0))));
    });
});
