/**
 * @pegforge/grammar
 *
 * The grammar IR, its builders and printer, name resolution and the `.gram`
 * reader.
 *
 * @example
 * ```typescript
 * import { parseGrammar, validateGrammar } from "@pegforge/grammar";
 *
 * const g = parseGrammar(`
 * expr: expr '+' term | term
 * term: NUMBER
 * `);
 * const { index } = validateGrammar(g);
 * index.indexOf("term"); // 1
 * ```
 *
 * @module
 */

export type {
  ParseResult,
  Item,
  ItemKind,
  Literal,
  RuleRef,
  TokenRef,
  Group,
  Opt,
  Repeat0,
  Repeat1,
  Gather,
  Lookahead,
  Cut,
  Forced,
  Action,
  NamedItem,
  Alternative,
  RuleAnnotations,
  Rule,
  Grammar,
} from "./types.js";
export { BUILTIN_TOKENS } from "./types.js";

export {
  lit,
  soft,
  ref,
  tok,
  group,
  seq,
  opt,
  star,
  plus,
  gather,
  lookahead,
  not,
  cut,
  forced,
  named,
  alt,
  rule,
  grammar,
  toNamedItem,
  type ItemLike,
  type RuleOptions,
  type GrammarOptions,
} from "./builders.js";

export { collectKeywords, isIdentifierLike } from "./keywords.js";
export { formatItem, formatNamedItem, formatAlternative, formatRule, formatGrammar } from "./printer.js";
export { childItems, walkItems, mapItem, mapAlternative } from "./visitor.js";
export { GrammarError, GrammarSyntaxError, UnknownRuleOrTokenError } from "./errors.js";
export { RuleIndex, checkGrammar, validateGrammar, type ValidateOptions, type GrammarCheck } from "./validate.js";
export { parseGrammar, unquote, type ParseGrammarOptions } from "./meta-parser.js";
