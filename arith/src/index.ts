export { arithGrammar, scientificGrammar, selectGrammar, ParseOptions } from "./grammar";
export { Expression } from "./expression";
export * from "./errors";
