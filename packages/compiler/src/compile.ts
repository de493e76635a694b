/**
 * The compile pipeline: validate, analyze, then compile every rule.
 */

import { createLogger } from "@pegforge/core";
import type { Logger, MemoizationMode } from "@pegforge/core";
import { analyze } from "@pegforge/analyzer";
import { parseGrammar, UnknownRuleOrTokenError, validateGrammar } from "@pegforge/grammar";
import type { Grammar } from "@pegforge/grammar";
import { RuleCompiler } from "./rule-compiler.js";
import type { CompiledGrammar } from "./types.js";

export interface CompileOptions {
  /** Token categories beyond the built-in ones */
  extraTokens?: Iterable<string>;
  /** Overrides the `memoization.mode` configuration */
  memoization?: MemoizationMode;
  /** Start rule (default: the first rule) */
  start?: string;
  logger?: Logger;
}

function deepFreeze<T>(value: T): T {
  if (Array.isArray(value)) {
    for (const element of value) deepFreeze(element);
    Object.freeze(value);
  } else if (typeof value === "object" && value !== null && Object.getPrototypeOf(value) === Object.prototype) {
    for (const property of Object.values(value)) deepFreeze(property);
    Object.freeze(value);
  }
  return value;
}

/**
 * Compile a grammar IR into a frozen plan.
 *
 * @throws GrammarError when validation fails
 * @throws AmbiguousLeftRecursionError when a left-recursive cluster has no leader
 */
export function compileGrammar(grammar: Grammar, options: CompileOptions = {}): CompiledGrammar {
  const logger = options.logger ?? createLogger("compiler");
  const { index, warnings } = validateGrammar(grammar, { extraTokens: options.extraTokens });
  const analysis = analyze(grammar, { memoization: options.memoization, logger: logger.child("analyzer") });

  const start = options.start ?? grammar.rules[0].name;
  const startIndex = index.indexOf(start);
  if (startIndex === undefined) throw new UnknownRuleOrTokenError("<start>", start);

  const compiler = new RuleCompiler(grammar, index);
  const rules = grammar.rules.map((rule) => compiler.compileRule(rule));
  logger.debug(
    `compiled ${rules.length} rules with ${compiler.helperCount} helpers and ${compiler.actions.length} actions`
  );

  return deepFreeze({
    rules,
    ruleIndex: new Map(rules.map((r): [string, number] => [r.name, r.index])),
    start: startIndex,
    keywords: grammar.keywords,
    softKeywords: grammar.softKeywords,
    metas: grammar.metas,
    actions: compiler.actions,
    analysis,
    warnings: [...warnings, ...analysis.warnings],
    ...(grammar.fileName !== undefined ? { fileName: grammar.fileName } : {}),
  });
}

/** Parse `.gram` source and compile it. */
export function compileSource(source: string, options: CompileOptions & { fileName?: string } = {}): CompiledGrammar {
  return compileGrammar(parseGrammar(source, { fileName: options.fileName }), options);
}
