export * from "./ast";
export { parseExpr, getExprAst } from "./parser";
export { printExpr, printNumber } from "./printExpr";
