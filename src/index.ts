/**
 * pegforge - PEG parser generator with left recursion
 *
 * Reads `.gram` grammars, analyzes them (nullability, left-recursive
 * clusters and their leaders, memoization, first sets), and either runs
 * them directly or generates a TypeScript parser class.
 *
 * @example
 * ```typescript
 * import { compileSource, createParser, actionTable, tokenize } from "pegforge";
 *
 * const grammar = compileSource(`
 * expr: expr '+' term { add } | term
 * term: NUMBER
 * `);
 * const parser = createParser(grammar, {
 *   actions: actionTable({ add: ({ values: [left, , right] }) => ["add", left, right] }),
 * });
 * parser.parseOrThrow(tokenize("1 + 2 + 3", { newlines: false }));
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Infrastructure
// ============================================================================

export {
  config,
  defineConfig,
  createLogger,
  silentLogger,
  PegforgeError,
  explainDiagnostic,
  renderDiagnosticCLI,
  type PegforgeConfig,
  type Logger,
  type RichDiagnostic,
  type SourceSpan,
} from "@pegforge/core";

// ============================================================================
// Front End
// ============================================================================

export { tokenize, describeToken, TokenizeError, type Token, type TokenType } from "@pegforge/tokenizer";
export {
  parseGrammar,
  validateGrammar,
  formatGrammar,
  GrammarError,
  GrammarSyntaxError,
  UnknownRuleOrTokenError,
  type Grammar,
  type Rule,
} from "@pegforge/grammar";

// ============================================================================
// Analysis & Compilation
// ============================================================================

export { analyze, AmbiguousLeftRecursionError, type GrammarAnalysis } from "@pegforge/analyzer";
export { compileGrammar, compileSource, type CompileOptions, type CompiledGrammar } from "@pegforge/compiler";

// ============================================================================
// Backends
// ============================================================================

export {
  FAIL,
  BaseParser,
  createParser,
  actionTable,
  ForcedMatchError,
  ParseError,
  type ParseOutcome,
  type ActionHandler,
  type ActionNode,
  type GrammarParser,
} from "@pegforge/runtime";
export { generateParser, GeneratedSyntaxError, type GenerateOptions } from "@pegforge/codegen";

// ============================================================================
// CLI
// ============================================================================

export { runCli, parseArgs, type CliIO, type CliOptions } from "./cli/commands.js";
