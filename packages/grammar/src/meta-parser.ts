/**
 * Reader for `.gram` files.
 *
 * Recursive descent over the token stream of `@pegforge/tokenizer`:
 *
 * ```
 * grammar:    meta* rule* ENDMARKER
 * meta:       "@" NAME [NAME | STRING] NEWLINE
 * rule:       rulename memoflag? ":" alts NEWLINE [INDENT more_alts DEDENT]
 *           | rulename memoflag? ":" NEWLINE INDENT more_alts DEDENT
 * rulename:   NAME ['[' type ']']
 * memoflag:   '(' "memo" ')'
 * alts:       alt ('|' alt)*
 * more_alts:  ('|' alts NEWLINE)+
 * alt:        named_item+ '$'? action?
 * named_item: NAME ['[' type ']'] '=' ~ item | '&' '&' ~ atom | '&' ~ atom | '!' ~ atom | '~' | item
 * item:       '[' ~ alts ']' | atom '?' | atom '*' | atom '+' | atom '.' atom '+' | atom
 * atom:       '(' ~ alts ')' | NAME | STRING
 * ```
 *
 * A failure after `~` is a syntax error at the furthest token reached.
 */

import type { SourceSpan } from "@pegforge/core";
import { describeToken, tokenize, TokenizeError } from "@pegforge/tokenizer";
import type { Token, TokenType } from "@pegforge/tokenizer";
import type { Alternative, Grammar, Item, NamedItem, ParseResult, Rule } from "./types.js";
import {
  alt,
  cut,
  forced,
  gather,
  grammar,
  group,
  lit,
  lookahead,
  named,
  not,
  opt,
  plus,
  ref,
  rule,
  soft,
  star,
  tok,
} from "./builders.js";
import { GrammarSyntaxError } from "./errors.js";
import { mapAlternative } from "./visitor.js";

export interface ParseGrammarOptions {
  /** File name used in spans and diagnostics */
  fileName?: string;
}

function ok<T>(value: T, pos: number): ParseResult<T> {
  return { ok: true, value, pos };
}

function fail<T>(pos: number, expected: string): ParseResult<T> {
  return { ok: false, pos, expected };
}

type Success<T> = Extract<ParseResult<T>, { ok: true }>;

// ---------------------------------------------------------------------------
// String literals
// ---------------------------------------------------------------------------

const ESCAPES: Readonly<Record<string, string>> = { n: "\n", t: "\t", r: "\r", "0": "\0" };

/** Strip prefix and quotes from a STRING token; returns the quote used. */
export function unquote(text: string): { value: string; quote: string } {
  const match = /^([rRbBuUfF]*)('''|"""|'|"|`)/.exec(text);
  if (!match) return { value: text, quote: "" };
  const [opening, prefix, quote] = match;
  const body = text.slice(opening.length, text.length - quote.length);
  if (/[rR]/.test(prefix)) return { value: body, quote };
  return { value: body.replace(/\\(.)/gs, (_, c: string) => ESCAPES[c] ?? c), quote };
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

/** `[x]` and `(x)` around a single plain item are just `x`. */
function simplify(alternatives: Alternative[]): Item {
  if (alternatives.length === 1) {
    const [only] = alternatives;
    if (only.items.length === 1 && only.action.kind === "default" && only.items[0].name === undefined) {
      return only.items[0].item;
    }
  }
  return group(...alternatives);
}

class MetaParser {
  private furthest = 0;
  private expected = new Set<string>();

  constructor(
    private readonly source: string,
    private readonly tokens: readonly Token[],
    private readonly fileName: string | undefined
  ) {}

  parse(): Grammar {
    let pos = 0;
    const metas: Record<string, string | undefined> = {};
    for (let meta = this.meta(pos); meta.ok; meta = this.meta(pos)) {
      const [name, value] = meta.value;
      metas[name] = value;
      pos = meta.pos;
    }

    const rules: Rule[] = [];
    for (let parsed = this.rule(pos); parsed.ok; parsed = this.rule(pos)) {
      rules.push(parsed.value);
      pos = parsed.pos;
    }

    this.commit(this.expect(pos, "ENDMARKER", "end of file"));
    return grammar(resolveNames(rules), { metas, fileName: this.fileName, source: this.source });
  }

  // -- token helpers --------------------------------------------------------

  private tokenAt(pos: number): Token {
    return this.tokens[Math.min(pos, this.tokens.length - 1)];
  }

  private spanOf(token: Token): SourceSpan {
    return {
      file: this.fileName,
      line: token.start.line,
      column: token.start.column,
      endLine: token.end.line,
      endColumn: token.end.column,
    };
  }

  private miss<T>(pos: number, expected: string): ParseResult<T> {
    if (pos > this.furthest) {
      this.furthest = pos;
      this.expected = new Set([expected]);
    } else if (pos === this.furthest) {
      this.expected.add(expected);
    }
    return fail(pos, expected);
  }

  private expect(pos: number, type: TokenType, expected: string): ParseResult<Token> {
    const token = this.tokenAt(pos);
    return token.type === type ? ok(token, pos + 1) : this.miss(pos, expected);
  }

  private op(pos: number, value: string): ParseResult<Token> {
    const token = this.tokenAt(pos);
    return token.type === "OP" && token.string === value ? ok(token, pos + 1) : this.miss(pos, `'${value}'`);
  }

  private isOp(pos: number, value: string): boolean {
    const token = this.tokenAt(pos);
    return token.type === "OP" && token.string === value;
  }

  private syntaxError(): never {
    const token = this.tokenAt(this.furthest);
    const found = token.type === "ENDMARKER" ? "end of file" : describeToken(token);
    const expected = [...this.expected];
    const detail = expected.length > 0 ? `expected ${expected.join(" or ")}, found ${found}` : `unexpected ${found}`;
    throw new GrammarSyntaxError(detail, this.spanOf(token));
  }

  /** Past a cut: the result must be a success. */
  private commit<T>(result: ParseResult<T>): Success<T> {
    if (!result.ok) return this.syntaxError();
    return result;
  }

  /** Text between `open` and its matching `close`, nesting included. */
  private bracketed(pos: number, open: string, close: string): ParseResult<string> {
    const start = this.op(pos, open);
    if (!start.ok) return start;
    let depth = 1;
    for (let p = start.pos; ; p++) {
      const token = this.tokenAt(p);
      if (token.type === "ENDMARKER") return this.miss(p, `'${close}'`);
      if (token.type !== "OP") continue;
      if (token.string === open) depth++;
      else if (token.string === close && --depth === 0) {
        return ok(this.source.slice(start.value.endOffset, token.offset).trim(), p + 1);
      }
    }
  }

  // -- grammar structure ----------------------------------------------------

  private meta(pos: number): ParseResult<[string, string | undefined]> {
    const at = this.op(pos, "@");
    if (!at.ok) return at;
    const name = this.commit(this.expect(at.pos, "NAME", "directive name"));
    let p = name.pos;
    let value: string | undefined;
    const next = this.tokenAt(p);
    if (next.type === "NAME" || next.type === "STRING") {
      value = next.type === "STRING" ? unquote(next.string).value : next.string;
      p++;
    }
    const end = this.commit(this.expect(p, "NEWLINE", "newline"));
    return ok([name.value.string, value], end.pos);
  }

  private rule(pos: number): ParseResult<Rule> {
    const name = this.expect(pos, "NAME", "rule name");
    if (!name.ok) return name;
    let p = name.pos;

    let type: string | undefined;
    const typed = this.bracketed(p, "[", "]");
    if (typed.ok) {
      type = typed.value;
      p = typed.pos;
    }

    let memo = false;
    if (this.isOp(p, "(")) {
      this.commit(this.expect(p + 1, "NAME", "'memo'"));
      if (this.tokenAt(p + 1).string !== "memo") return this.syntaxError();
      p = this.commit(this.op(p + 2, ")")).pos;
      memo = true;
    }

    const colon = this.commit(this.op(p, ":"));
    p = colon.pos;

    const alternatives: Alternative[] = [];
    const newline = this.expect(p, "NEWLINE", "newline");
    if (newline.ok) {
      this.commit(this.expect(newline.pos, "INDENT", "indented alternatives"));
      const more = this.commit(this.moreAlts(newline.pos + 1));
      alternatives.push(...more.value);
      p = this.commit(this.expect(more.pos, "DEDENT", "dedent")).pos;
    } else {
      const first = this.commit(this.alts(p));
      alternatives.push(...first.value);
      p = this.commit(this.expect(first.pos, "NEWLINE", "newline")).pos;
      const indent = this.expect(p, "INDENT", "indented alternatives");
      if (indent.ok) {
        const more = this.commit(this.moreAlts(indent.pos));
        alternatives.push(...more.value);
        p = this.commit(this.expect(more.pos, "DEDENT", "dedent")).pos;
      }
    }

    const created = rule(name.value.string, alternatives, { type, memo, span: this.spanOf(name.value) });
    return ok(created, p);
  }

  private moreAlts(pos: number): ParseResult<Alternative[]> {
    const alternatives: Alternative[] = [];
    let p = pos;
    for (let bar = this.op(p, "|"); bar.ok; bar = this.op(p, "|")) {
      const line = this.commit(this.alts(bar.pos));
      alternatives.push(...line.value);
      p = this.commit(this.expect(line.pos, "NEWLINE", "newline")).pos;
    }
    return alternatives.length > 0 ? ok(alternatives, p) : this.miss(pos, "'|'");
  }

  private alts(pos: number): ParseResult<Alternative[]> {
    const first = this.alt(pos);
    if (!first.ok) return first;
    const alternatives = [first.value];
    let p = first.pos;
    for (let bar = this.op(p, "|"); bar.ok; bar = this.op(p, "|")) {
      const next = this.commit(this.alt(bar.pos));
      alternatives.push(next.value);
      p = next.pos;
    }
    return ok(alternatives, p);
  }

  private alt(pos: number): ParseResult<Alternative> {
    const items: NamedItem[] = [];
    let p = pos;
    for (let item = this.namedItem(p); item.ok; item = this.namedItem(p)) {
      items.push(item.value);
      p = item.pos;
    }
    if (items.length === 0) return this.miss(pos, "grammar item");

    const dollar = this.op(p, "$");
    if (dollar.ok) {
      items.push({ item: tok("ENDMARKER", this.spanOf(dollar.value)) });
      p = dollar.pos;
    }

    let action: string | undefined;
    const code = this.bracketed(p, "{", "}");
    if (code.ok) {
      action = code.value;
      p = code.pos;
    }
    return ok(alt(items, action, this.spanOf(this.tokenAt(pos))), p);
  }

  private namedItem(pos: number): ParseResult<NamedItem> {
    const first = this.tokenAt(pos);
    if (first.type === "NAME") {
      let p = pos + 1;
      let type: string | undefined;
      const typed = this.bracketed(p, "[", "]");
      if (typed.ok) {
        type = typed.value;
        p = typed.pos;
      }
      const eq = this.op(p, "=");
      if (eq.ok) {
        const item = this.commit(this.item(eq.pos));
        return ok(named(first.string, item.value, type), item.pos);
      }
    }

    if (this.isOp(pos, "&")) {
      if (this.isOp(pos + 1, "&")) {
        const atom = this.commit(this.atom(pos + 2));
        return ok({ item: forced(atom.value) }, atom.pos);
      }
      const atom = this.commit(this.atom(pos + 1));
      return ok({ item: lookahead(atom.value) }, atom.pos);
    }
    if (this.isOp(pos, "!")) {
      const atom = this.commit(this.atom(pos + 1));
      return ok({ item: not(atom.value) }, atom.pos);
    }
    if (this.isOp(pos, "~")) return ok({ item: cut() }, pos + 1);

    const item = this.item(pos);
    if (!item.ok) return item;
    return ok({ item: item.value }, item.pos);
  }

  private item(pos: number): ParseResult<Item> {
    const bracket = this.op(pos, "[");
    if (bracket.ok) {
      const inner = this.commit(this.alts(bracket.pos));
      const close = this.commit(this.op(inner.pos, "]"));
      return ok(opt(simplify(inner.value)), close.pos);
    }

    const atom = this.atom(pos);
    if (!atom.ok) return atom;
    const p = atom.pos;
    if (this.isOp(p, "?")) return ok(opt(atom.value), p + 1);
    if (this.isOp(p, "*")) return ok(star(atom.value), p + 1);
    if (this.isOp(p, "+")) return ok(plus(atom.value), p + 1);
    if (this.isOp(p, ".")) {
      const element = this.atom(p + 1);
      if (element.ok && this.isOp(element.pos, "+")) {
        return ok(gather(atom.value, element.value), element.pos + 1);
      }
    }
    return atom;
  }

  private atom(pos: number): ParseResult<Item> {
    const token = this.tokenAt(pos);
    if (token.type === "OP" && token.string === "(") {
      const inner = this.commit(this.alts(pos + 1));
      const close = this.commit(this.op(inner.pos, ")"));
      return ok(simplify(inner.value), close.pos);
    }
    if (token.type === "NAME") {
      return ok(ref(token.string, this.spanOf(token)), pos + 1);
    }
    if (token.type === "STRING") {
      const { value, quote } = unquote(token.string);
      const span = this.spanOf(token);
      return ok(quote === '"' ? soft(value, span) : lit(value, span), pos + 1);
    }
    return this.miss(pos, "grammar item");
  }
}

/** Names that are not rules refer to token categories. */
function resolveNames(rules: Rule[]): Rule[] {
  const ruleNames = new Set(rules.map((r) => r.name));
  const resolve = (item: Item): Item =>
    item.kind === "ruleRef" && !ruleNames.has(item.name) ? tok(item.name, item.span) : item;
  return rules.map((r) => ({ ...r, alternatives: r.alternatives.map((a) => mapAlternative(a, resolve)) }));
}

/**
 * Parse `.gram` source text into a grammar.
 *
 * @throws GrammarSyntaxError on malformed input (tokenizer errors included)
 */
export function parseGrammar(source: string, options: ParseGrammarOptions = {}): Grammar {
  let tokens: Token[];
  try {
    tokens = tokenize(source, { fileName: options.fileName });
  } catch (error) {
    if (error instanceof TokenizeError) {
      throw new GrammarSyntaxError(error.detail, { file: options.fileName, ...error.position });
    }
    throw error;
  }
  return new MetaParser(source, tokens, options.fileName).parse();
}
