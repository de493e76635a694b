/**
 * Rule Compiler: grammar IR rules to executable plans.
 *
 * Helper names (`_tmp_N`, `_loop0_N`, `_loop1_N`, `_gather_N`) are numbered
 * grammar-wide in the order the compiler meets them: rules in declaration
 * order, items left to right, outer before inner.
 */

import type { Alternative, Grammar, Item, Rule, RuleIndex } from "@pegforge/grammar";
import { formatAlternative, formatItem } from "@pegforge/grammar";
import { BindingScope, defaultBindingName, isValueBearing } from "./names.js";
import type { CompiledAction, CompiledAlternative, CompiledItem, CompiledRule, KeywordClass, Matcher } from "./types.js";

export class RuleCompiler {
  private helpers = 0;
  private readonly actionIds = new Map<string, number>();
  readonly actions: string[] = [];

  constructor(
    private readonly grammar: Grammar,
    private readonly index: RuleIndex
  ) {}

  /** Number of helper matchers named so far. */
  get helperCount(): number {
    return this.helpers;
  }

  compileRule(rule: Rule): CompiledRule {
    const alternatives = rule.alternatives.map((a) => this.compileAlternative(rule, a, true));
    return {
      name: rule.name,
      index: this.index.resolve(rule.name),
      ...(rule.type !== undefined ? { type: rule.type } : {}),
      alternatives,
      resultKind: alternatives.every((a) => a.resultKind === "value") ? "value" : "sequence",
      nullable: rule.nullable,
      leftRecursive: rule.leftRecursive,
      leader: rule.leader,
      memoize: rule.memoize,
    };
  }

  private helperName(prefix: string): string {
    this.helpers++;
    return `${prefix}_${this.helpers}`;
  }

  private keywordClass(value: string): KeywordClass {
    if (this.grammar.keywords.has(value)) return "hard";
    if (this.grammar.softKeywords.has(value)) return "soft";
    return "none";
  }

  private compileAction(alternative: Alternative, observed: boolean): CompiledAction {
    const { action } = alternative;
    switch (action.kind) {
      case "none":
        return action;
      case "default":
        return observed ? action : { kind: "none" };
      case "custom": {
        let id = this.actionIds.get(action.code);
        if (id === undefined) {
          id = this.actions.length;
          this.actions.push(action.code);
          this.actionIds.set(action.code, id);
        }
        return { kind: "custom", code: action.code, id };
      }
    }
  }

  /**
   * @param observed false under a lookahead or in a gather separator, where
   *   the alternative's value is thrown away
   */
  private compileAlternative(rule: Rule, alternative: Alternative, observed: boolean): CompiledAlternative {
    const scope = new BindingScope();
    const items: CompiledItem[] = alternative.items.map((named) => {
      const matcher = this.compileItem(rule, named.item, observed);
      if (!isValueBearing(matcher)) return { matcher };
      const name = named.name ?? defaultBindingName(matcher);
      if (name === undefined) return { matcher };
      return {
        matcher,
        binding: scope.claim(name),
        ...(named.type !== undefined ? { type: named.type } : {}),
      };
    });

    const bindings = items.flatMap((i) => (i.binding === undefined ? [] : [i.binding]));
    const action = this.compileAction(alternative, observed);
    return {
      items,
      bindings,
      action,
      cutIndex: items.findIndex((i) => i.matcher.kind === "cut"),
      resultKind: action.kind === "custom" || bindings.length === 1 ? "value" : "sequence",
      text: formatAlternative(alternative),
    };
  }

  private compileItem(rule: Rule, item: Item, observed: boolean): Matcher {
    switch (item.kind) {
      case "literal":
        return { kind: "literal", value: item.value, keyword: this.keywordClass(item.value) };
      case "tokenRef":
        return { kind: "token", category: item.category };
      case "ruleRef":
        return { kind: "rule", name: item.name, index: this.index.resolve(item.name, rule.name) };
      case "group": {
        const name = this.helperName("_tmp");
        return {
          kind: "choice",
          name,
          alternatives: item.alternatives.map((a) => this.compileAlternative(rule, a, observed)),
        };
      }
      case "opt":
        return { kind: "optional", matcher: this.compileItem(rule, item.item, observed) };
      case "repeat0":
      case "repeat1": {
        const min = item.kind === "repeat0" ? 0 : 1;
        const name = this.helperName(`_loop${min}`);
        return { kind: "repeat", name, min, matcher: this.compileItem(rule, item.item, observed) };
      }
      case "gather": {
        const name = this.helperName("_gather");
        return {
          kind: "gather",
          name,
          separator: this.compileItem(rule, item.separator, false),
          element: this.compileItem(rule, item.element, observed),
        };
      }
      case "lookahead":
        return { kind: "lookahead", positive: item.positive, matcher: this.compileItem(rule, item.item, false) };
      case "cut":
        return { kind: "cut" };
      case "forced":
        return {
          kind: "forced",
          matcher: this.compileItem(rule, item.item, observed),
          expected: formatItem(item.item),
        };
    }
  }
}
