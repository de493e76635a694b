/**
 * @pegforge/compiler
 *
 * Turns a validated, analyzed grammar into a {@link CompiledGrammar}: the
 * plan that the interpreter executes and the code generator renders.
 *
 * @example
 * ```typescript
 * import { compileSource } from "@pegforge/compiler";
 *
 * const compiled = compileSource("expr: expr '+' NUMBER | NUMBER\n");
 * compiled.rules[0].leader; // true
 * ```
 *
 * @module
 */

export type {
  KeywordClass,
  LiteralMatcher,
  TokenMatcher,
  RuleMatcher,
  ChoiceMatcher,
  OptionalMatcher,
  RepeatMatcher,
  GatherMatcher,
  LookaheadMatcher,
  CutMatcher,
  ForcedMatcher,
  Matcher,
  CompiledItem,
  CompiledAction,
  ResultKind,
  CompiledAlternative,
  CompiledRule,
  CompiledGrammar,
} from "./types.js";
export { compileGrammar, compileSource, type CompileOptions } from "./compile.js";
export { RuleCompiler } from "./rule-compiler.js";
export { BindingScope, defaultBindingName, isValueBearing } from "./names.js";
