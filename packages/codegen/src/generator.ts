/**
 * TypeScript code generator.
 *
 * Renders a compiled grammar as an ES module exporting one class that
 * extends `BaseParser`: a method per rule, wrapped in the engine call its
 * flags ask for, and a protected method per helper (`_tmp_N`, `_loop0_N`,
 * `_loop1_N`, `_gather_N`). Alternatives become labeled blocks that bind
 * item values to `const`s and `break` out on the first failure.
 *
 * A binding whose name is reserved in strict mode is declared as
 * {@link bindingLocal} renames it, and actions refer to it by that name:
 * `start: '(' default ')' { default_ }`.
 */

import { config, createLogger } from "@pegforge/core";
import type { Logger } from "@pegforge/core";
import type {
  ChoiceMatcher,
  CompiledAlternative,
  CompiledGrammar,
  CompiledRule,
  GatherMatcher,
  Matcher,
  RepeatMatcher,
} from "@pegforge/compiler";
import { checkGeneratedSource } from "./check.js";
import { CodeWriter } from "./writer.js";

export interface GenerateOptions {
  /** Class name; wins over `@class` and `codegen.className` */
  className?: string;
  /** Module the runtime is imported from (default: `codegen.runtimeModule`) */
  runtimeModule?: string;
  /** Run the TypeScript syntax check on the output (default: true) */
  check?: boolean;
  logger?: Logger;
}

export const DEFAULT_CLASS_NAME = "GeneratedParser";

// Names a strict-mode module cannot declare, plus the runtime's FAIL.
const RESERVED_BINDINGS: ReadonlySet<string> = new Set(
  [
    "arguments await break case catch class const continue debugger default delete do else enum eval export",
    "extends false finally for function if implements import in instanceof interface let new null package",
    "private protected public return static super switch this throw true try typeof var void while with yield",
    "FAIL",
  ]
    .join(" ")
    .split(" ")
);

/**
 * The local a binding is declared as: reserved names get a trailing `_`,
 * repeated until it clashes with no other binding of the alternative.
 */
export function bindingLocal(name: string, taken: readonly string[] = []): string {
  if (!RESERVED_BINDINGS.has(name)) return name;
  let local = `${name}_`;
  while (taken.includes(local)) local += "_";
  return local;
}

// Members of BaseParser a rule method must not override.
const RESERVED_METHODS: ReadonlySet<string> = new Set([
  "constructor",
  "context",
  "current",
  "keywordTables",
  "startRule",
  "parse",
  "parseOrThrow",
  "withContext",
  "mark",
  "reset",
  "expect",
  "expectSoft",
  "token",
  "consumeIf",
  "optional",
  "lookahead",
  "forced",
  "repeat",
  "gather",
  "memoRule",
  "leftRecursiveRule",
]);

/** Method name of a rule: the rule name, or `<name>_rule` where that would shadow the base class. */
export function ruleMethodName(name: string): string {
  return RESERVED_METHODS.has(name) ? `${name}_rule` : name;
}

export function resolveClassName(grammar: CompiledGrammar, options: GenerateOptions = {}): string {
  return (
    options.className ?? grammar.metas.get("class") ?? config.get<string>("codegen.className") ?? DEFAULT_CLASS_NAME
  );
}

type HelperMatcher = ChoiceMatcher | RepeatMatcher | GatherMatcher;

function stringLiteral(value: string): string {
  return JSON.stringify(value);
}

function ruleHeader(rule: CompiledRule): string {
  return rule.type !== undefined ? `${rule.name}[${rule.type}]` : rule.name;
}

/** Grammar text on one line, for `//` comments. */
function oneLine(text: string): string {
  return text.replace(/\s*\n\s*/g, " ");
}

function helperText(alternatives: readonly CompiledAlternative[]): string {
  return oneLine(`(${alternatives.map((a) => a.text).join(" | ")})`);
}

class ParserGenerator {
  private readonly out = new CodeWriter();
  private readonly helpers: HelperMatcher[] = [];

  constructor(
    private readonly grammar: CompiledGrammar,
    private readonly className: string,
    private readonly runtimeModule: string
  ) {}

  get helperCount(): number {
    return this.helpers.length;
  }

  generate(): string {
    const { grammar, out } = this;
    const header = grammar.metas.get("header");
    const subheader = grammar.metas.get("subheader");
    const trailer = grammar.metas.get("trailer");

    out.line(`// Generated by pegforge from ${grammar.fileName ?? "a grammar"}. Do not edit.`);
    if (header !== undefined) out.raw(header);
    out.line(`import { BaseParser, FAIL } from ${stringLiteral(this.runtimeModule)};`);
    if (subheader !== undefined) out.raw(subheader);
    out.line();
    out.line(`const KEYWORDS: ReadonlySet<string> = new Set(${this.stringArray(grammar.keywords)});`);
    out.line(`const SOFT_KEYWORDS: ReadonlySet<string> = new Set(${this.stringArray(grammar.softKeywords)});`);
    out.line();

    out.block(`export class ${this.className} extends BaseParser {`, () => {
      out.line("protected readonly keywordTables = { keywords: KEYWORDS, softKeywords: SOFT_KEYWORDS };");
      out.line();
      out.block("protected startRule(): unknown {", () => {
        out.line(`return this.${ruleMethodName(grammar.rules[grammar.start].name)}();`);
      });
      for (const rule of grammar.rules) {
        out.line();
        this.emitRule(rule);
      }
      // Helper bodies can register further helpers.
      for (let i = 0; i < this.helpers.length; i++) {
        out.line();
        this.emitHelper(this.helpers[i]);
      }
    });

    if (trailer !== undefined) {
      out.line();
      out.raw(trailer);
    }
    return out.toString();
  }

  private stringArray(values: ReadonlySet<string>): string {
    return `[${[...values].sort().map(stringLiteral).join(", ")}]`;
  }

  // -------------------------------------------------------------------------
  // Rules and helpers
  // -------------------------------------------------------------------------

  private emitRule(rule: CompiledRule): void {
    const { out } = this;
    const [first, ...rest] = rule.alternatives;
    out.doc([`${ruleHeader(rule)}: ${first.text}`, ...rest.map((a) => `    | ${a.text}`)]);

    out.block(`${ruleMethodName(rule.name)}(): unknown {`, () => {
      const name = stringLiteral(rule.name);
      if (rule.leftRecursive) {
        out.block(
          `return this.leftRecursiveRule(${rule.index}, ${name}, ${rule.leader}, () => {`,
          () => this.emitAlternatives(rule.alternatives),
          "});"
        );
      } else if (rule.memoize) {
        out.block(
          `return this.memoRule(${rule.index}, ${name}, () => {`,
          () => this.emitAlternatives(rule.alternatives),
          "});"
        );
      } else {
        this.emitAlternatives(rule.alternatives);
      }
    });
  }

  private emitHelper(helper: HelperMatcher): void {
    const { out } = this;
    const open = `protected ${helper.name}(): unknown {`;
    switch (helper.kind) {
      case "choice": {
        const { alternatives } = helper;
        out.line(`// ${helperText(alternatives)}`);
        out.block(open, () => this.emitAlternatives(alternatives));
        break;
      }
      case "repeat": {
        const match = this.expression(helper.matcher);
        const { min } = helper;
        out.block(open, () => out.line(`return this.repeat(() => ${match}, ${min});`));
        break;
      }
      case "gather": {
        const element = this.expression(helper.element);
        const separator = this.expression(helper.separator);
        out.block(open, () => out.line(`return this.gather(() => ${element}, () => ${separator});`));
        break;
      }
    }
  }

  // -------------------------------------------------------------------------
  // Alternatives
  // -------------------------------------------------------------------------

  private emitAlternatives(alternatives: readonly CompiledAlternative[]): void {
    const { out } = this;
    out.line("const $mark = this.mark();");
    if (alternatives.some((a) => a.cutIndex >= 0)) out.line("let $cut = false;");

    alternatives.forEach((alternative, i) => {
      const label = `alt${i + 1}`;
      out.line(`// ${oneLine(alternative.text)}`);
      out.block(`${label}: {`, () => this.emitItems(alternative, label));
      out.line("this.reset($mark);");
      if (alternative.cutIndex >= 0) out.line("if ($cut) return FAIL;");
    });
    out.line("return FAIL;");
  }

  private emitItems(alternative: CompiledAlternative, label: string): void {
    const { out } = this;
    const locals = new Map(alternative.bindings.map((name) => [name, bindingLocal(name, alternative.bindings)]));
    for (const item of alternative.items) {
      const { matcher, binding } = item;
      if (matcher.kind === "cut") {
        out.line("$cut = true;");
        continue;
      }
      const expression = this.expression(matcher);
      if (binding === undefined) {
        out.line(`if (${expression} === FAIL) break ${label};`);
        continue;
      }
      const local = locals.get(binding) ?? binding;
      out.line(`const ${local} = ${expression};`);
      if (matcher.kind !== "optional") out.line(`if (${local} === FAIL) break ${label};`);
    }
    out.line(`return ${this.actionExpression(alternative, locals)};`);
  }

  private actionExpression(alternative: CompiledAlternative, locals: ReadonlyMap<string, string>): string {
    const { action } = alternative;
    const bindings = alternative.bindings.map((name) => locals.get(name) ?? name);
    switch (action.kind) {
      case "none":
        return "null";
      case "default":
        return bindings.length === 1 ? bindings[0] : `[${bindings.join(", ")}]`;
      case "custom":
        return `(${action.code})`;
    }
  }

  // -------------------------------------------------------------------------
  // Matchers
  // -------------------------------------------------------------------------

  private expression(matcher: Matcher): string {
    switch (matcher.kind) {
      case "literal":
        return matcher.keyword === "soft"
          ? `this.expectSoft(${stringLiteral(matcher.value)})`
          : `this.expect(${stringLiteral(matcher.value)})`;
      case "token":
        return `this.token(${stringLiteral(matcher.category)})`;
      case "rule":
        return `this.${ruleMethodName(matcher.name)}()`;
      case "choice":
      case "repeat":
      case "gather":
        this.helpers.push(matcher);
        return `this.${matcher.name}()`;
      case "optional":
        return `this.optional(() => ${this.expression(matcher.matcher)})`;
      case "lookahead":
        return `this.lookahead(${matcher.positive}, () => ${this.expression(matcher.matcher)})`;
      case "forced":
        return `this.forced(() => ${this.expression(matcher.matcher)}, ${stringLiteral(matcher.expected)})`;
      case "cut":
        return "null";
    }
  }
}

/**
 * Render a compiled grammar as a TypeScript module.
 *
 * @throws GeneratedSyntaxError when the output does not parse (usually a
 *   custom action that is not a TypeScript expression)
 */
export function generateParser(grammar: CompiledGrammar, options: GenerateOptions = {}): string {
  const logger = options.logger ?? createLogger("codegen");
  const className = resolveClassName(grammar, options);
  const runtimeModule =
    options.runtimeModule ?? config.get<string>("codegen.runtimeModule") ?? "@pegforge/runtime";

  const generator = new ParserGenerator(grammar, className, runtimeModule);
  const code = generator.generate();
  logger.debug(`${className}: ${grammar.rules.length} rule methods, ${generator.helperCount} helpers`);

  if (options.check ?? true) {
    checkGeneratedSource(code, `${className}.ts`);
  }
  return code;
}
