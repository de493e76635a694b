/**
 * @pegforge/runtime
 *
 * The memoization and left-recursion engine every pegforge parser runs on,
 * the interpreter that executes a compiled grammar directly, and the base
 * class of generated parsers.
 *
 * @example
 * ```typescript
 * import { compileSource } from "@pegforge/compiler";
 * import { createParser } from "@pegforge/runtime";
 * import { tokenize } from "@pegforge/tokenizer";
 *
 * const parser = createParser(compileSource("sum: sum '+' NUMBER | NUMBER\n"));
 * parser.parseOrThrow(tokenize("1 + 2 + 3", { newlines: false })); // [[tok, "+", tok], "+", tok]
 * ```
 *
 * @module
 */

export { FAIL } from "./types.js";
export type { Fail, MemoStats, ParseOutcome, ActionContext, ActionHandler, ActionNode } from "./types.js";
export { MemoTable, IN_PROGRESS, type MemoEntry } from "./memo.js";
export { ParseContext } from "./context.js";
export { applyRule, type EngineRule, type RuleBody } from "./engine.js";
export { matchesCategory, matchesLiteral, isToken, type KeywordTables } from "./tokens.js";
export { ForcedMatchError, ParseError } from "./errors.js";
export { actionTable, actionNode, defaultValue } from "./actions.js";
export { createParser, type GrammarParser, type ParserOptions } from "./interpreter.js";
export { BaseParser } from "./base-parser.js";
