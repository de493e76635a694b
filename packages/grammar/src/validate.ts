/**
 * Name resolution and structural validation.
 *
 * Runs once, before analysis. Errors make the grammar unusable; warnings
 * (unreachable alternatives) are reported and compilation continues.
 */

import { DiagnosticBuilder, PEG1002, PEG1004, PEG1005, PEG1006 } from "@pegforge/core";
import type { RichDiagnostic } from "@pegforge/core";
import type { Alternative, Grammar, Rule } from "./types.js";
import { BUILTIN_TOKENS } from "./types.js";
import { GrammarError, UnknownRuleOrTokenError } from "./errors.js";
import { formatAlternative, formatNamedItem } from "./printer.js";
import { walkItems } from "./visitor.js";

// ---------------------------------------------------------------------------
// Rule index
// ---------------------------------------------------------------------------

/** Name → declaration index, built once per grammar. */
export class RuleIndex {
  private readonly indices = new Map<string, number>();

  constructor(readonly rules: readonly Rule[]) {
    rules.forEach((rule, i) => {
      if (!this.indices.has(rule.name)) this.indices.set(rule.name, i);
    });
  }

  get size(): number {
    return this.rules.length;
  }

  has(name: string): boolean {
    return this.indices.has(name);
  }

  indexOf(name: string): number | undefined {
    return this.indices.get(name);
  }

  get(name: string): Rule | undefined {
    const index = this.indices.get(name);
    return index === undefined ? undefined : this.rules[index];
  }

  /** Index of `name`; throws when the name is not a rule. */
  resolve(name: string, from = "<grammar>"): number {
    const index = this.indices.get(name);
    if (index === undefined) throw new UnknownRuleOrTokenError(from, name);
    return index;
  }

  names(): string[] {
    return this.rules.map((r) => r.name);
  }
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export interface ValidateOptions {
  /** Token categories the caller's tokenizer produces beyond the built-in ones. */
  extraTokens?: Iterable<string>;
}

export interface GrammarCheck {
  errors: GrammarError[];
  warnings: RichDiagnostic[];
}

function isPrefix(shorter: readonly string[], longer: readonly string[]): boolean {
  return shorter.length <= longer.length && shorter.every((text, i) => text === longer[i]);
}

/** Warn about alternatives that an earlier alternative of the same choice always beats. */
function checkShadowing(rule: Rule, alternatives: readonly Alternative[], warnings: RichDiagnostic[]): void {
  const forms = alternatives.map((a) => a.items.map((n) => formatNamedItem({ item: n.item })));
  for (let later = 1; later < alternatives.length; later++) {
    const earlier = forms.slice(0, later).findIndex((form) => isPrefix(form, forms[later]));
    if (earlier === -1) continue;
    warnings.push(
      new DiagnosticBuilder(PEG1006)
        .at(alternatives[later].span)
        .withArgs({ rule: rule.name, alternative: formatAlternative(alternatives[later]) })
        .note(`\`${formatAlternative(alternatives[earlier])}\` matches first`)
        .build()
    );
  }
}

/**
 * Collect every error and warning in `grammar` without throwing.
 */
export function checkGrammar(grammar: Grammar, options: ValidateOptions = {}): GrammarCheck {
  const errors: GrammarError[] = [];
  const warnings: RichDiagnostic[] = [];
  const tokens = new Set([...BUILTIN_TOKENS, ...(options.extraTokens ?? [])]);
  const index = new RuleIndex(grammar.rules);

  if (grammar.rules.length === 0) {
    const span = grammar.fileName ? { file: grammar.fileName, line: 1, column: 1 } : undefined;
    errors.push(new GrammarError(new DiagnosticBuilder(PEG1005).at(span).build()));
    return { errors, warnings };
  }

  const seen = new Set<string>();
  for (const rule of grammar.rules) {
    if (rule.name.startsWith("_")) {
      errors.push(new GrammarError(new DiagnosticBuilder(PEG1004).at(rule.span).withArgs({ name: rule.name }).build()));
    }
    if (seen.has(rule.name)) {
      errors.push(new GrammarError(new DiagnosticBuilder(PEG1002).at(rule.span).withArgs({ name: rule.name }).build()));
    }
    seen.add(rule.name);

    walkItems(rule.alternatives, (item) => {
      if (item.kind === "ruleRef" && !index.has(item.name)) {
        errors.push(new UnknownRuleOrTokenError(rule.name, item.name, item.span));
      } else if (item.kind === "tokenRef" && !tokens.has(item.category)) {
        errors.push(new UnknownRuleOrTokenError(rule.name, item.category, item.span));
      }
    });

    checkShadowing(rule, rule.alternatives, warnings);
    walkItems(rule.alternatives, (item) => {
      if (item.kind === "group") checkShadowing(rule, item.alternatives, warnings);
    });
  }

  return { errors, warnings };
}

/**
 * Validate `grammar` and build its rule index.
 *
 * @throws GrammarError the first error found (UnknownRuleOrTokenError for
 *   unresolved names)
 */
export function validateGrammar(
  grammar: Grammar,
  options: ValidateOptions = {}
): { index: RuleIndex; warnings: RichDiagnostic[] } {
  const { errors, warnings } = checkGrammar(grammar, options);
  if (errors.length > 0) throw errors[0];
  return { index: new RuleIndex(grammar.rules), warnings };
}
