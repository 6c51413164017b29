import { readFileSync } from "fs";
import { join as pathJoin } from "path";
import * as ohm from "ohm-js";

const grammarFile = pathJoin(__dirname, "arith.ohm");

// both grammars come from one source so that ScientificArithmetic can inherit the rules
const grammars = ohm.grammars(readFileSync(grammarFile, "utf-8"));

export const arithGrammar: ohm.Grammar = grammars.Arithmetic;
export const scientificGrammar: ohm.Grammar = grammars.ScientificArithmetic;

export interface ParseOptions {
    // accept an exponent suffix on number literals, e.g. "1.5e3"
    scientific?: boolean;
}

export function selectGrammar(options?: ParseOptions): ohm.Grammar
{
    return options?.scientific ? scientificGrammar : arithGrammar;
}
