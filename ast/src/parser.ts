import { ActionDict, FailedMatchResult, Grammar, Semantics } from 'ohm-js';
import {
    arithGrammar, scientificGrammar, selectGrammar, ParseOptions, Expression,
    ComputeFailure, ComputeResult, emptyExpression, failure, invalidNumber, invalidStructure, parseError, success
} from '../../arith';
import { Binary, Expr, bin, neg, num } from './ast';

function toOperation(op: string): Binary['operation'] {
    if (op === '+' || op === '-' || op === '*' || op === '/') {
        return op;
    }
    throw new ComputeFailure(invalidStructure(`unknown operator '${op}'`));
}

export const getExprAst = {
    Expr(expr) { return expr.parse(); },

    // a flat run of operands folds from the left: 10 - 5 - 2 is (10 - 5) - 2
    AddExp(first, operators, rest) {
        let acc: Expr = first.parse();
        const n = operators.children.length;

        for (let i = 0; i < n; i++) {
            const operation = toOperation(operators.child(i).sourceString);
            const rhs: Expr = rest.child(i).parse();
            acc = bin(operation, acc, rhs);
        }

        return acc;
    },

    MulExp(first, operators, rest) {
        let acc: Expr = first.parse();
        const n = operators.children.length;

        for (let i = 0; i < n; i++) {
            const operation = toOperation(operators.child(i).sourceString);
            const rhs: Expr = rest.child(i).parse();
            acc = bin(operation, acc, rhs);
        }

        return acc;
    },

    // "--5" becomes neg(neg(5))
    UnaryExp_neg(_minus, arg) { return neg(arg.parse()); },

    PriExp_num(literal) {
        const value = Number(literal.sourceString);
        // digits never convert to NaN; overflow gives Infinity, which is a value
        if (Number.isNaN(value)) {
            throw new ComputeFailure(invalidNumber(literal.sourceString));
        }
        return num(value);
    },
    PriExp_paren(_open, expr, _close) { return expr.parse(); },
} satisfies ActionDict<Expr>;

function createAstSemantics(grammar: Grammar): Semantics {
    const semantics = grammar.createSemantics();
    semantics.addOperation<Expr>("parse()", getExprAst);
    return semantics;
}

const semantics = new Map<Grammar, Semantics>([
    [arithGrammar, createAstSemantics(arithGrammar)],
    [scientificGrammar, createAstSemantics(scientificGrammar)],
]);

function toParseError(source: string, matchResult: FailedMatchResult) {
    const shortMessage = matchResult.shortMessage ?? "";
    const expected = /expected (.*)$/.exec(shortMessage);
    return parseError(
        source,
        matchResult.getInterval().startIdx,
        expected ? expected[1] : "",
        matchResult.message ?? shortMessage,
    );
}

// passes the input string through the grammar and builds the AST using the semantic action parse()
export function parseExpr(source: string | Expression, options?: ParseOptions): ComputeResult<Expr>
{
    const text = typeof source === 'string' ? source : source.text;
    if (text.trim().length === 0) {
        return failure(emptyExpression());
    }

    const grammar = selectGrammar(options);
    const matchResult = grammar.match(text, "Expr");

    if (matchResult.failed()) {
        return failure(toParseError(text, matchResult));
    }

    const astSemantics = semantics.get(grammar);
    if (!astSemantics) {
        return failure(invalidStructure("no semantics for the selected grammar"));
    }

    try {
        const tree: Expr = astSemantics(matchResult).parse();
        return success(tree);
    } catch (e) {
        if (e instanceof ComputeFailure) {
            return failure(e.error);
        }
        throw e;
    }
}
